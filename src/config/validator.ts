import { createAjv } from "../schema/ajv.js";
import type { StationConfig } from "../types/config.js";

/** Station config schema: required fields and value ranges. */
const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "station_id", "artifacts_dir"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    station_id: { type: "string", pattern: "^[A-Za-z0-9_.-]+$" },
    artifacts_dir: { type: "string", minLength: 1 },
    sequencer: {
      type: "object",
      properties: {
        finalizer_affects_verdict: { type: "boolean" },
        interaction_timeout_s: { type: "number", minimum: 0, maximum: 2147483 },
      },
      additionalProperties: false,
    },
    secrets: {
      type: "object",
      properties: {
        env_prefix: { type: "string", minLength: 1 },
        declared: { type: "array", items: { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*$" }, uniqueItems: true },
        keystore_file: { type: "string", minLength: 1 },
      },
      additionalProperties: false,
    },
  },
};

const ajv = createAjv();
const validate = ajv.compile(CONFIG_SCHEMA);

export type ConfigValidationResult = { valid: true; config: StationConfig; errors: null } | { valid: false; errors: string };

function isStationConfig(data: unknown): data is StationConfig {
  return validate(data);
}

/** Validate a loaded config against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  if (isStationConfig(config)) return { valid: true, config, errors: null };
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
