import { XMLBuilder } from "fast-xml-parser";
import type { RunResult, StepExecution } from "../types/step.js";

type XmlNode = Record<string, unknown>;

function seconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}

function streamText(record: StepExecution, stream: "out" | "err"): string | undefined {
  const lines = record.logs.filter((l) => l.stream === stream).map((l) => l.text);
  return lines.length > 0 ? lines.join("\n") : undefined;
}

function toTestcase(record: StepExecution): XmlNode {
  const node: XmlNode = {
    "@_name": record.display_name,
    "@_classname": record.role === "finalizer" ? "finalizer" : "steps",
    "@_time": seconds(record.duration_ms),
  };

  const outcome = record.outcome;
  switch (outcome.status) {
    case "failed":
      node.failure = { "@_message": outcome.detail, "@_type": "StepFailed" };
      break;
    case "errored":
    case "aborted":
      node.error = {
        "@_message": outcome.cause.message,
        "@_type": outcome.status === "aborted" ? `Infrastructure:${outcome.cause.name}` : outcome.cause.name,
        "#text": outcome.cause.stack ?? outcome.cause.message,
      };
      break;
    case "skipped":
      node.skipped = { "@_message": outcome.reason };
      break;
    case "passed":
      break;
  }

  const out = streamText(record, "out");
  const err = streamText(record, "err");
  if (out !== undefined) node["system-out"] = out;
  if (err !== undefined) node["system-err"] = err;
  return node;
}

/**
 * Render a run as JUnit XML: one testsuite per run, one testcase per step,
 * the finalizer last with classname "finalizer".
 */
export function buildJunitXml(result: RunResult): string {
  const records = result.finalizer ? [...result.steps, result.finalizer] : [...result.steps];
  const count = (statuses: string[]) => records.filter((r) => statuses.includes(r.outcome.status)).length;
  const totalMs = records.reduce((sum, r) => sum + r.duration_ms, 0);

  const suite: XmlNode = {
    "@_name": result.station_id ?? "station",
    "@_id": result.run_id,
    "@_tests": records.length,
    "@_failures": count(["failed"]),
    "@_errors": count(["errored", "aborted"]),
    "@_skipped": count(["skipped"]),
    "@_time": seconds(totalMs),
    "@_timestamp": result.started_at,
    testcase: records.map(toTestcase),
  };

  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    format: true,
    suppressEmptyNode: true,
  });

  return builder.build({
    "?xml": { "@_version": "1.0", "@_encoding": "UTF-8" },
    testsuites: { "@_name": result.run_id, "@_verdict": result.verdict, testsuite: suite },
  });
}
