import type { RunVerdict, StepExecution, StepOutcome } from "../types/step.js";

/** Marker a step returns to fail with a message instead of a bare `false`. */
export type StepFailure = {
  readonly kind: "step_failure";
  readonly detail: string;
};

export type StepReturn = void | undefined | boolean | StepFailure;

export function stepFailure(detail: string): StepFailure {
  return { kind: "step_failure", detail };
}

function isStepFailure(value: unknown): value is StepFailure {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "step_failure" &&
    "detail" in value &&
    typeof value.detail === "string"
  );
}

/**
 * Pure function: map what run() returned to an outcome.
 * Only an explicit `false` or a failure marker fails the step.
 */
export function classifyReturn(value: unknown): StepOutcome {
  if (value === false) return { status: "failed", detail: "Step returned false" };
  if (isStepFailure(value)) return { status: "failed", detail: value.detail };
  return { status: "passed" };
}

export function isFailing(outcome: StepOutcome): boolean {
  return outcome.status === "failed" || outcome.status === "errored" || outcome.status === "aborted";
}

/**
 * Aggregate verdict. Skipped records never count; the finalizer counts only
 * when `finalizerAffectsVerdict` is set.
 */
export function computeVerdict(
  steps: StepExecution[],
  finalizer: StepExecution | null,
  finalizerAffectsVerdict: boolean,
): RunVerdict {
  if (steps.some((s) => isFailing(s.outcome))) return "failed";
  if (finalizerAffectsVerdict && finalizer && isFailing(finalizer.outcome)) return "failed";
  return "passed";
}
