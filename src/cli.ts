#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { EXIT } from "./commands/exit-codes.js";
import { printDiagnostic } from "./commands/output.js";
import { run } from "./commands/run.js";
import { listSteps } from "./commands/steps.js";
import { validateAll } from "./commands/validate.js";
import { formatSummary } from "./report/summary.js";
import type { OutputFormat } from "./types/diagnostic.js";

function parseFormat(value: string): OutputFormat {
  if (value === "human" || value === "jsonl") return value;
  throw new InvalidArgumentError("Output format must be human or jsonl");
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name("stationctl")
  .description("Human-in-the-loop acceptance test sequencer")
  .version("0.1.0")
  .exitOverride((err) => {
    process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  });

program
  .command("run")
  .description("Run a station plan with the operator console on stdin/stdout")
  .argument("<plan>", "Path to the station plan module")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config environment layered over base.yaml")
  .option("--secret <NAME=VALUE>", "Developer secret override (repeatable)", collect, [])
  .option("--artifacts-dir <path>", "Override artifacts_dir from config")
  .option("--format <format>", "Diagnostic format: human|jsonl", parseFormat, "human")
  .action(
    async (
      plan: string,
      opts: { config: string; env?: string; secret: string[]; artifactsDir?: string; format: OutputFormat },
    ) => {
      const res = await run({
        planPath: plan,
        configDir: opts.config,
        env: opts.env,
        secrets: opts.secret,
        artifactsDir: opts.artifactsDir,
        onDiagnostic: (d) => printDiagnostic(d, opts.format),
      });

      if (!res.ok) {
        printDiagnostic({ level: "error", code: res.error.code, message: res.error.message }, opts.format);
        process.exit(res.exitCode);
      }

      if (opts.format === "human") {
        for (const line of formatSummary(res.result)) process.stderr.write(line + "\n");
      }
      process.exit(res.exitCode);
    },
  );

program
  .command("steps")
  .description("List the steps of a station plan")
  .argument("<plan>", "Path to the station plan module")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (plan: string, opts: { format: OutputFormat }) => {
    const res = await listSteps(plan);
    if (!res.ok) {
      printDiagnostic({ level: "error", code: res.error.code, message: res.error.message }, opts.format);
      process.exit(EXIT.INPUT_INVALID);
    }

    const { steps, finalizer } = res.listing;
    if (opts.format === "jsonl") {
      for (const s of steps) process.stdout.write(JSON.stringify({ role: "step", ...s }) + "\n");
      if (finalizer) process.stdout.write(JSON.stringify({ role: "finalizer", ...finalizer }) + "\n");
      return;
    }
    steps.forEach((s, i) => {
      console.log(`${String(i + 1).padStart(3)}. ${s.display_name}${s.stop_on_fail ? "" : "  (continues on failure)"}`);
    });
    if (finalizer) console.log(`  finalizer: ${finalizer.display_name}`);
  });

program
  .command("validate")
  .description("Validate config, schemas and (optionally) a run report")
  .option("--config <path>", "Path to config directory", "config")
  .option("--report <path>", "Run report directory to verify against its manifest")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (opts: { config: string; report?: string; format: OutputFormat }) => {
    const res = await validateAll({ configDir: opts.config, reportDir: opts.report });

    if (!res.ok) {
      for (const err of res.errors) printDiagnostic(err, opts.format);
      process.exit(EXIT.INPUT_INVALID);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      console.log("OK");
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ level: "error", code: "UNEXPECTED", message }) + "\n");
  process.exit(EXIT.RUN_ABORTED);
});
