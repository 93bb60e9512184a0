import { createAjv } from "../schema/ajv.js";
import type { ConsoleMessage } from "../types/interaction.js";

/** Shape check for console → engine messages; selections are checked per request later. */
const CONSOLE_MESSAGE_SCHEMA = {
  type: "object",
  required: ["type", "id", "selection"],
  properties: {
    type: { const: "interaction_response" },
    id: { type: "string", minLength: 1 },
    selection: {},
  },
  additionalProperties: false,
};

const ajv = createAjv();
const validateConsoleMessage = ajv.compile(CONSOLE_MESSAGE_SCHEMA);

export type ParsedConsoleMessage = { ok: true; message: ConsoleMessage } | { ok: false; error: string };

function isConsoleMessage(data: unknown): data is ConsoleMessage {
  return validateConsoleMessage(data);
}

export function parseConsoleMessage(data: unknown): ParsedConsoleMessage {
  if (isConsoleMessage(data)) return { ok: true, message: data };
  return { ok: false, error: ajv.errorsText(validateConsoleMessage.errors) };
}
