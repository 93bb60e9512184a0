import type { SequencerEvent } from "../core/sequencer.js";
import type { Diagnostic, OutputFormat } from "../types/diagnostic.js";

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

/**
 * Print a diagnostic. Diagnostics go to stderr: stdout may be carrying the
 * operator console protocol.
 */
export function printDiagnostic(d: Diagnostic, format: OutputFormat, out: NodeJS.WritableStream = process.stderr): void {
  if (format === "jsonl") {
    out.write(JSON.stringify(d) + "\n");
  } else {
    out.write(`[${d.level}] ${d.message}\n`);
  }
}

/** Map sequencer lifecycle events to diagnostics. */
export function eventDiagnostic(event: SequencerEvent): Diagnostic {
  switch (event.type) {
    case "run_started":
      return diag("info", "RUN_STARTED", `Run ${event.run_id}: ${event.steps} step(s)${event.finalizer ? " + finalizer" : ""}`, {
        details: { run_id: event.run_id },
      });
    case "step_started":
      return diag("info", "STEP_STARTED", `${event.role === "finalizer" ? "finalizer" : `${event.index + 1}.`} ${event.display_name}`, {
        details: { id: event.id, index: event.index },
      });
    case "step_finished": {
      const { outcome } = event.record;
      const level = outcome.status === "passed" ? "info" : outcome.status === "failed" ? "warn" : "error";
      return diag(level, `STEP_${outcome.status.toUpperCase()}`, `${event.record.display_name}: ${outcome.status}`, {
        details: { id: event.record.id, index: event.record.index, duration_ms: event.record.duration_ms },
      });
    }
    case "step_skipped":
      return diag("info", "STEP_SKIPPED", `${event.record.display_name}: skipped`, {
        details: { id: event.record.id, index: event.record.index },
      });
    case "run_aborted":
      return diag("error", "RUN_ABORTED", `Run aborted at ${event.stop.step}: ${event.stop.cause.message}`, {
        details: { code: event.stop.cause.code },
      });
    case "finalizer_started":
      return diag("info", "FINALIZER_STARTED", `Finalizer ${event.id}`);
    case "run_finished":
      return diag(event.result.verdict === "passed" ? "info" : "warn", "RUN_FINISHED", `Verdict: ${event.result.verdict}`, {
        details: { run_id: event.result.run_id, stop: event.result.stop.kind },
      });
  }
}
