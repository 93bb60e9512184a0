import path from "node:path";
import { pathToFileURL } from "node:url";
import { errorMessage } from "./errors.js";
import type { StepSpec } from "./step.js";

/** Ordered steps plus an optional finalizer. Frozen once created. */
export type RunPlan = {
  readonly steps: readonly StepSpec[];
  readonly finalizer: StepSpec | null;
};

export function createRunPlan(steps: readonly StepSpec[], opts?: { finalizer?: StepSpec }): RunPlan {
  return Object.freeze({
    steps: Object.freeze([...steps]),
    finalizer: opts?.finalizer ?? null,
  });
}

function isStepSpec(value: unknown): value is StepSpec {
  return (
    typeof value === "object" &&
    value !== null &&
    "create" in value &&
    typeof value.create === "function" &&
    "metadata" in value &&
    typeof value.metadata === "object" &&
    value.metadata !== null &&
    "id" in value.metadata &&
    typeof value.metadata.id === "string"
  );
}

/** Structural check for plans coming from a station module. */
export function isRunPlan(value: unknown): value is RunPlan {
  if (typeof value !== "object" || value === null) return false;
  if (!("steps" in value) || !Array.isArray(value.steps) || !value.steps.every(isStepSpec)) return false;
  return "finalizer" in value && (value.finalizer === null || isStepSpec(value.finalizer));
}

export type PlanLoadResult = { ok: true; plan: RunPlan } | { ok: false; error: { code: string; message: string } };

/**
 * Import a station plan module. It must export `plan` (or a default export)
 * built with createRunPlan().
 */
export async function loadPlanModule(modulePath: string): Promise<PlanLoadResult> {
  const resolved = path.resolve(modulePath);
  let mod: Record<string, unknown>;
  try {
    mod = await import(pathToFileURL(resolved).href);
  } catch (e) {
    return {
      ok: false,
      error: { code: "PLAN_IMPORT_FAILED", message: `Failed to import plan module ${resolved}: ${errorMessage(e)}` },
    };
  }

  const candidate = mod.plan ?? mod.default;
  if (!isRunPlan(candidate)) {
    return {
      ok: false,
      error: { code: "PLAN_INVALID", message: `${resolved} does not export a plan created with createRunPlan()` },
    };
  }
  return { ok: true, plan: candidate };
}
