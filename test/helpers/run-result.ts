import type { RunResult, StepExecution, StepOutcome } from "../../src/types/step.js";

export function execution(
  index: number,
  id: string,
  displayName: string,
  outcome: StepOutcome,
  extra: Partial<StepExecution> = {},
): StepExecution {
  const ran = outcome.status !== "skipped";
  return {
    id,
    display_name: displayName,
    description: displayName,
    image: null,
    link: null,
    stop_on_fail: true,
    index,
    role: "step",
    outcome,
    logs: [],
    started_at: ran ? "2026-01-05T10:00:00.000Z" : null,
    finished_at: ran ? "2026-01-05T10:00:01.000Z" : null,
    duration_ms: 0,
    ...extra,
  };
}

/** A failed run: pass, fail (stop_on_fail), skip, and an erroring finalizer. */
export function sampleRunResult(): RunResult {
  return {
    run_id: "bench-20260105-100000-abc123",
    station_id: "bench",
    started_at: "2026-01-05T10:00:00.000Z",
    finished_at: "2026-01-05T10:00:02.000Z",
    verdict: "failed",
    stop: { kind: "stop_on_fail", step: "MeasureVoltage", index: 1 },
    steps: [
      execution(0, "PowerOn", "Power On", { status: "passed" }, {
        duration_ms: 1500,
        logs: [
          { stream: "out", text: "powered", at: "2026-01-05T10:00:00.500Z" },
          { stream: "err", text: "rail ramp slow", at: "2026-01-05T10:00:00.600Z" },
        ],
        link: { url: "https://www.example.com", text: "Fixture manual" },
      }),
      execution(1, "MeasureVoltage", "Measure Voltage", { status: "failed", detail: "3.1V is below 3.3V" }, {
        duration_ms: 250,
      }),
      execution(2, "Flash", "Flash", { status: "skipped", reason: "stop_on_fail" }),
    ],
    finalizer: execution(3, "Shutdown", "Shutdown", {
      status: "errored",
      cause: { name: "Error", code: null, message: "relay stuck" },
    }, { role: "finalizer", duration_ms: 100 }),
    finalizer_affects_verdict: false,
    revision: "abc1234",
  };
}
