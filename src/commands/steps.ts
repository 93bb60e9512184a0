import { loadPlanModule } from "../core/plan.js";
import type { StepMetadata } from "../types/step.js";

export type PlanListing = {
  steps: StepMetadata[];
  finalizer: StepMetadata | null;
};

export type StepsResult = { ok: true; listing: PlanListing } | { ok: false; error: { code: string; message: string } };

/** Load a plan and list its step metadata without running anything. */
export async function listSteps(planPath: string): Promise<StepsResult> {
  const loaded = await loadPlanModule(planPath);
  if (!loaded.ok) return loaded;
  return {
    ok: true,
    listing: {
      steps: loaded.plan.steps.map((s) => ({ ...s.metadata })),
      finalizer: loaded.plan.finalizer ? { ...loaded.plan.finalizer.metadata } : null,
    },
  };
}
