import path from "node:path";
import type { Readable, Writable } from "node:stream";
import { loadConfig, resolveSecretsConfig, resolveSequencerConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { loadPlanModule } from "../core/plan.js";
import { generateRunId } from "../core/run-id.js";
import { Sequencer } from "../core/sequencer.js";
import { formatRevision, readStationRevision } from "../git/revision.js";
import { InteractionChannel } from "../interaction/channel.js";
import { JsonlConsoleTransport } from "../interaction/jsonl-transport.js";
import { writeRunReport } from "../report/writer.js";
import { createRegistry } from "../schema/registry.js";
import {
  ChainedSecretStore,
  EnvSecretStore,
  KeystoreFileSecretStore,
  parseSecretAssignments,
  StaticSecretStore,
  type SecretStore,
} from "../secrets/store.js";
import type { SecretsConfig } from "../types/config.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { RunResult } from "../types/step.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { diag, eventDiagnostic } from "./output.js";

export type RunOptions = {
  planPath: string;
  configDir?: string;
  env?: string;
  /** `NAME=VALUE` developer overrides. */
  secrets?: string[];
  artifactsDir?: string;
  runId?: string;
  /** Operator console streams; default stdin/stdout. */
  input?: Readable;
  output?: Writable;
  processEnv?: NodeJS.ProcessEnv;
  onDiagnostic?: (d: Diagnostic) => void;
};

export type RunCommandResult =
  | { ok: true; result: RunResult; runDir: string; exitCode: ExitCode }
  | { ok: false; error: { code: string; message: string }; exitCode: ExitCode };

/** Exit code for a finished run. */
export function exitCodeFor(result: RunResult): ExitCode {
  if (result.stop.kind === "infrastructure") return EXIT.RUN_ABORTED;
  return result.verdict === "passed" ? EXIT.SUCCESS : EXIT.RUN_FAILED;
}

function buildSecretStore(
  overrides: Map<string, string>,
  secrets: SecretsConfig,
  configDir: string,
  env: NodeJS.ProcessEnv,
): SecretStore {
  const stores: SecretStore[] = [
    new StaticSecretStore(overrides),
    new EnvSecretStore(secrets.declared, secrets.env_prefix, env),
  ];
  if (secrets.keystore_file) {
    stores.push(new KeystoreFileSecretStore(path.resolve(configDir, secrets.keystore_file)));
  }
  return new ChainedSecretStore(stores);
}

/**
 * Run a station plan once: load config and plan, drive the sequencer with the
 * operator console attached, then write result.json, junit.xml and the manifest.
 */
export async function run(opts: RunOptions): Promise<RunCommandResult> {
  const env = opts.processEnv ?? process.env;
  const configDir = path.resolve(opts.configDir ?? "config");
  const report = opts.onDiagnostic ?? (() => undefined);

  const assignments = parseSecretAssignments(opts.secrets ?? []);
  if (!assignments.ok) {
    return { ok: false, error: { code: "SECRET_ASSIGNMENT_INVALID", message: assignments.error }, exitCode: EXIT.INVALID_ARGS };
  }

  const checked = validateConfig(loadConfig(opts.env, configDir, env));
  if (!checked.valid) {
    return { ok: false, error: { code: "CONFIG_INVALID", message: `Config invalid: ${checked.errors}` }, exitCode: EXIT.INPUT_INVALID };
  }
  const config = checked.config;

  const loaded = await loadPlanModule(opts.planPath);
  if (!loaded.ok) return { ok: false, error: loaded.error, exitCode: EXIT.INPUT_INVALID };

  const sequencerConfig = resolveSequencerConfig(config);
  const runId = opts.runId ?? generateRunId(config.station_id);
  const channel = new InteractionChannel({
    runId,
    defaultTimeoutMs: sequencerConfig.interaction_timeout_s > 0 ? sequencerConfig.interaction_timeout_s * 1000 : null,
  });
  const transport = new JsonlConsoleTransport(opts.input ?? process.stdin, opts.output ?? process.stdout);
  transport.connect(channel, (error, line) => {
    report(diag("warn", "CONSOLE_MESSAGE_REFUSED", error, { details: { line } }));
  });

  const revision = await readStationRevision(path.dirname(path.resolve(opts.planPath)));
  const sequencer = new Sequencer({
    runId,
    channel,
    secrets: buildSecretStore(assignments.values, resolveSecretsConfig(config), configDir, env),
    stationId: config.station_id,
    finalizerAffectsVerdict: sequencerConfig.finalizer_affects_verdict,
    revision: formatRevision(revision),
    observer: (event) => report(eventDiagnostic(event)),
  });

  let result: RunResult;
  try {
    result = await sequencer.execute(loaded.plan);
    await channel.flush();
  } finally {
    channel.close("run finished");
    transport.close();
  }

  const registry = await createRegistry();
  const { runDir } = writeRunReport(result, path.resolve(opts.artifactsDir ?? config.artifacts_dir), registry);
  report(diag("info", "REPORT_WRITTEN", `Report written to ${runDir}`, { path: runDir }));

  return { ok: true, result, runDir, exitCode: exitCodeFor(result) };
}
