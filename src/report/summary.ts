import type { RunResult, StepExecution, StopReason } from "../types/step.js";

const STATUS_LABEL = {
  passed: "PASS",
  failed: "FAIL",
  errored: "ERROR",
  aborted: "ABORT",
  skipped: "SKIP",
} as const;

function describeOutcome(record: StepExecution): string {
  const outcome = record.outcome;
  switch (outcome.status) {
    case "failed":
      return ` — ${outcome.detail}`;
    case "errored":
    case "aborted":
      return ` — ${outcome.cause.name}: ${outcome.cause.message}`;
    case "skipped":
    case "passed":
      return "";
  }
}

function line(record: StepExecution): string {
  const label = STATUS_LABEL[record.outcome.status].padEnd(5);
  const prefix = record.role === "finalizer" ? "finalizer" : `${record.index + 1}.`;
  return `${label} ${prefix} ${record.display_name}${describeOutcome(record)}`;
}

function describeStop(stop: StopReason): string {
  switch (stop.kind) {
    case "completed":
      return "all steps ran";
    case "stop_on_fail":
      return `stopped after ${stop.step} failed`;
    case "infrastructure":
      return `aborted at ${stop.step}: ${stop.cause.message}`;
  }
}

/** Human-readable run summary, one line per step plus a verdict line. */
export function formatSummary(result: RunResult): string[] {
  const lines = result.steps.map(line);
  if (result.finalizer) lines.push(line(result.finalizer));
  lines.push(`Verdict: ${result.verdict.toUpperCase()} (${describeStop(result.stop)})`);
  return lines;
}
