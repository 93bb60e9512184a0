import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { errorMessage } from "../core/errors.js";
import { verifyRunReport } from "../report/writer.js";
import { createRegistry } from "../schema/registry.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { diag } from "./output.js";

export type ValidateResult = { ok: true } | { ok: false; errors: Diagnostic[] };

/** Environment names found in the config dir: every `<env>.yaml` except base. */
function listEnvironments(configDir: string): string[] {
  return fs
    .readdirSync(configDir, { withFileTypes: true })
    .filter((e) => e.isFile() && e.name.endsWith(".yaml") && e.name !== "base.yaml")
    .map((e) => e.name.replace(/\.yaml$/, ""))
    .sort();
}

function checkLayer(configDir: string, envName: string | undefined, env: NodeJS.ProcessEnv): Diagnostic | null {
  const label = envName ?? "base";
  try {
    const res = validateConfig(loadConfig(envName, configDir, env));
    if (res.valid) return null;
    return diag("error", "CONFIG_INVALID", `Config invalid (${label}): ${res.errors}`, {
      path: path.join(configDir, `${label}.yaml`),
    });
  } catch (e) {
    return diag("error", "CONFIG_READ_FAILED", `Failed to read config (${label}): ${errorMessage(e)}`, {
      path: path.join(configDir, `${label}.yaml`),
    });
  }
}

/**
 * Validate the config directory (base alone and base merged with each
 * environment file), the schema registry and, optionally, one run report
 * directory against its manifest.
 */
export async function validateAll(opts: {
  configDir: string;
  reportDir?: string;
  schemaDir?: string;
  processEnv?: NodeJS.ProcessEnv;
}): Promise<ValidateResult> {
  const errors: Diagnostic[] = [];
  const configDir = path.resolve(opts.configDir);
  const env = opts.processEnv ?? process.env;

  if (!fs.existsSync(path.join(configDir, "base.yaml"))) {
    return {
      ok: false,
      errors: [diag("error", "CONFIG_BASE_MISSING", `base.yaml not found in ${configDir}`, { path: configDir })],
    };
  }

  for (const envName of [undefined, ...listEnvironments(configDir)]) {
    const problem = checkLayer(configDir, envName, env);
    if (problem) errors.push(problem);
  }

  try {
    await createRegistry(opts.schemaDir);
  } catch (e) {
    errors.push(diag("error", "SCHEMA_LOAD_FAILED", `Failed to load schemas: ${errorMessage(e)}`));
  }

  if (opts.reportDir) {
    const reportDir = path.resolve(opts.reportDir);
    if (!fs.existsSync(path.join(reportDir, "manifest.json"))) {
      errors.push(diag("error", "REPORT_MANIFEST_MISSING", `Missing manifest: ${reportDir}/manifest.json`, { path: reportDir }));
    } else {
      try {
        for (const mismatch of verifyRunReport(reportDir)) {
          errors.push(
            diag("error", "REPORT_CHECKSUM_MISMATCH", `Artifact missing or modified: ${mismatch}`, {
              path: path.join(reportDir, mismatch),
            }),
          );
        }
      } catch (e) {
        errors.push(diag("error", "REPORT_MANIFEST_INVALID", `Invalid manifest: ${errorMessage(e)}`, { path: reportDir }));
      }
    }
  }

  return errors.length === 0 ? { ok: true } : { ok: false, errors };
}
