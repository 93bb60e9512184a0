/** Operator console protocol: requests, responses and wire messages. */
import type { LogStream } from "./step.js";

export type OptionValue = string | number | boolean | null;

export type InteractionOption = {
  name: string;
  value: OptionValue;
};

/** What step authors pass: a bare label (name == value) or a [label, value] pair. */
export type OptionSpec = string | readonly [string, OptionValue];

export type InteractionKind = "buttons" | "pass_fail" | "text_input" | "radios" | "checkboxes" | "select";

export type InteractionRequest =
  | { kind: "buttons"; prompt: string; options: InteractionOption[] }
  | { kind: "pass_fail"; prompt: string; options: InteractionOption[] }
  | { kind: "text_input"; prompt: string; options: InteractionOption[]; size: number }
  | { kind: "radios"; prompt: string; options: InteractionOption[] }
  | { kind: "checkboxes"; prompt: string; options: InteractionOption[] }
  | { kind: "select"; prompt: string; options: InteractionOption[]; allow_multiple: boolean };

/** A validated response, already resolved against the originating request. */
export type InteractionResponse =
  | { kind: "value"; value: OptionValue }
  | { kind: "text"; text: string }
  | { kind: "option"; option: InteractionOption }
  | { kind: "options"; options: InteractionOption[] };

export type InteractionConstraints = {
  size?: number;
  allow_multiple?: boolean;
};

export type LogMessage = {
  type: "log";
  run_id: string;
  stream: LogStream;
  text: string;
};

export type InteractionRequestMessage = {
  type: "interaction_request";
  run_id: string;
  id: string;
  kind: InteractionKind;
  prompt: string;
  options: InteractionOption[];
  constraints: InteractionConstraints;
};

export type EngineMessage = LogMessage | InteractionRequestMessage;

export type InteractionResponseMessage = {
  type: "interaction_response";
  id: string;
  selection: unknown;
};

export type ConsoleMessage = InteractionResponseMessage;
