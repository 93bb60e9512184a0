import { ValidationError } from "../core/errors.js";
import type {
  InteractionOption,
  InteractionRequest,
  InteractionResponse,
  OptionSpec,
  OptionValue,
} from "../types/interaction.js";

/** Normalize bare labels and [label, value] pairs to { name, value }. */
export function normalizeOptions(specs: readonly OptionSpec[]): InteractionOption[] {
  return specs.map((spec) => {
    if (typeof spec === "string") return { name: spec, value: spec };
    const [name, value] = spec;
    return { name, value };
  });
}

function findByValue(options: InteractionOption[], value: unknown): InteractionOption | undefined {
  return options.find((o) => o.value === value);
}

function describeValue(value: unknown): string {
  return JSON.stringify(value) ?? String(value);
}

/**
 * Resolve one selected entry. The console may answer with the bare value or
 * with { name, value }; either way the value must be one of the request's
 * options and a given name must agree with it.
 */
function resolveOne(request: InteractionRequest, entry: unknown): InteractionOption {
  let value: unknown = entry;
  let name: unknown;
  if (typeof entry === "object" && entry !== null && "value" in entry) {
    value = entry.value;
    name = "name" in entry ? entry.name : undefined;
  }

  const option = findByValue(request.options, value);
  if (!option) {
    throw new ValidationError(`Value ${describeValue(value)} is not an option of this ${request.kind} request`);
  }
  if (name !== undefined && name !== option.name) {
    throw new ValidationError(
      `Option name ${describeValue(name)} does not match value ${describeValue(value)} (expected "${option.name}")`,
    );
  }
  return option;
}

/**
 * Resolve a list selection to an ordered, duplicate-free list of options.
 * Order follows the request's option order.
 */
function resolveMany(request: InteractionRequest, selection: unknown): InteractionOption[] {
  if (!Array.isArray(selection)) {
    throw new ValidationError(`A ${request.kind} response must be a list of options`);
  }
  const picked = new Set<string>();
  for (const entry of selection) {
    const option = resolveOne(request, entry);
    if (picked.has(option.name)) {
      throw new ValidationError(`Option "${option.name}" selected more than once`);
    }
    picked.add(option.name);
  }
  return request.options.filter((o) => picked.has(o.name));
}

/** Check a raw console selection against its originating request. */
export function resolveSelection(request: InteractionRequest, selection: unknown): InteractionResponse {
  switch (request.kind) {
    case "buttons":
    case "pass_fail":
      return { kind: "value", value: resolveOne(request, selection).value };
    case "text_input":
      if (typeof selection !== "string") {
        throw new ValidationError(`A text_input response must be a string, got ${describeValue(selection)}`);
      }
      return { kind: "text", text: selection };
    case "radios":
      return { kind: "option", option: resolveOne(request, selection) };
    case "checkboxes":
      return { kind: "options", options: resolveMany(request, selection) };
    case "select":
      if (request.allow_multiple) return { kind: "options", options: resolveMany(request, selection) };
      return { kind: "option", option: resolveOne(request, selection) };
  }
}

/** Option lists must be unambiguous: no repeated names, no repeated values. */
export function assertDistinctOptions(options: InteractionOption[]): void {
  const names = new Set<string>();
  const values = new Set<OptionValue>();
  for (const o of options) {
    if (names.has(o.name)) throw new Error(`Duplicate option name: ${o.name}`);
    if (values.has(o.value)) throw new Error(`Duplicate option value: ${describeValue(o.value)}`);
    names.add(o.name);
    values.add(o.value);
  }
}
