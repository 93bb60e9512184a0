import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { SequencerConfig, SecretsConfig, StationConfig } from "../types/config.js";

const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

const ENV_PREFIX = "STATION_";

export const SEQUENCER_DEFAULTS: SequencerConfig = {
  finalizer_affects_verdict: false,
  interaction_timeout_s: 0,
};

export const SECRETS_DEFAULTS: SecretsConfig = {
  env_prefix: "STATION_SECRET_",
  declared: [],
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  return isPlainObject(parsed) ? parsed : {};
}

/** YAML scalar semantics for env values, so "true" and "30" keep their types. */
function parseEnvValue(raw: string): unknown {
  try {
    return YAML.parse(raw);
  } catch {
    return raw;
  }
}

/**
 * Apply STATION_ prefixed environment variable overrides. A double underscore
 * descends one level: STATION_SEQUENCER__INTERACTION_TIMEOUT_S → sequencer.interaction_timeout_s.
 * Secret values (STATION_SECRET_*) are never config.
 */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    if (key.startsWith(SECRETS_DEFAULTS.env_prefix)) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    let patch: Record<string, unknown> = { [segments[segments.length - 1]]: parseEnvValue(value) };
    for (const segment of segments.slice(0, -1).reverse()) patch = { [segment]: patch };
    result = deepMerge(result, patch);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables.
 *
 * The result is not validated; run validateConfig() before trusting it.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }
  return applyEnvOverrides(merged, env);
}

/** Fill optional sections with their defaults. */
export function resolveSequencerConfig(config: StationConfig): SequencerConfig {
  return { ...SEQUENCER_DEFAULTS, ...config.sequencer };
}

export function resolveSecretsConfig(config: StationConfig): SecretsConfig {
  return { ...SECRETS_DEFAULTS, ...config.secrets };
}
