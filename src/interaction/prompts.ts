import { ValidationError } from "../core/errors.js";
import type {
  InteractionOption,
  InteractionRequest,
  InteractionResponse,
  OptionSpec,
  OptionValue,
} from "../types/interaction.js";
import type { RequestOptions } from "./channel.js";
import { normalizeOptions } from "./options.js";

/** The part of the channel a step may use to talk to the operator. */
export interface InteractionPort {
  request(request: InteractionRequest, opts?: RequestOptions): Promise<InteractionResponse>;
}

export type PromptOptions = RequestOptions & { prompt?: string };

export const DEFAULT_TEXT_INPUT_SIZE = 50;

function unexpected(kind: string, response: InteractionResponse): ValidationError {
  return new ValidationError(`Expected a response of kind ${kind}, got ${response.kind}`);
}

/**
 * Operator prompts for step authors. Each call blocks the step until the
 * operator answers; the answer is already checked against the options shown.
 */
export class OperatorPrompts {
  constructor(private readonly port: InteractionPort) {}

  /** Show buttons; resolves to the value of the one clicked. */
  async buttons(options: readonly OptionSpec[], opts?: PromptOptions): Promise<OptionValue> {
    const response = await this.port.request(
      { kind: "buttons", prompt: opts?.prompt ?? "", options: normalizeOptions(options) },
      opts,
    );
    if (response.kind !== "value") throw unexpected("value", response);
    return response.value;
  }

  /** Green "Pass" and red "Fail" buttons; true when the operator clicks Pass. */
  async passFail(opts?: PromptOptions): Promise<boolean> {
    const response = await this.port.request(
      {
        kind: "pass_fail",
        prompt: opts?.prompt ?? "",
        options: normalizeOptions([
          ["Pass", true],
          ["Fail", false],
        ]),
      },
      opts,
    );
    if (response.kind !== "value") throw unexpected("value", response);
    return response.value === true;
  }

  async textInput(prompt: string, opts?: RequestOptions & { size?: number }): Promise<string> {
    const response = await this.port.request(
      { kind: "text_input", prompt, options: [], size: opts?.size ?? DEFAULT_TEXT_INPUT_SIZE },
      opts,
    );
    if (response.kind !== "text") throw unexpected("text", response);
    return response.text;
  }

  /** Exactly one choice. */
  async radios(prompt: string, options: readonly OptionSpec[], opts?: RequestOptions): Promise<InteractionOption> {
    const response = await this.port.request({ kind: "radios", prompt, options: normalizeOptions(options) }, opts);
    if (response.kind !== "option") throw unexpected("option", response);
    return response.option;
  }

  /** Any number of choices, including none. */
  async checkboxes(prompt: string, options: readonly OptionSpec[], opts?: RequestOptions): Promise<InteractionOption[]> {
    const response = await this.port.request({ kind: "checkboxes", prompt, options: normalizeOptions(options) }, opts);
    if (response.kind !== "options") throw unexpected("options", response);
    return response.options;
  }

  select(
    prompt: string,
    options: readonly OptionSpec[],
    opts?: RequestOptions & { allowMultiple?: false },
  ): Promise<InteractionOption>;
  select(
    prompt: string,
    options: readonly OptionSpec[],
    opts: RequestOptions & { allowMultiple: true },
  ): Promise<InteractionOption[]>;
  async select(
    prompt: string,
    options: readonly OptionSpec[],
    opts?: RequestOptions & { allowMultiple?: boolean },
  ): Promise<InteractionOption | InteractionOption[]> {
    const allowMultiple = opts?.allowMultiple ?? false;
    const response = await this.port.request(
      { kind: "select", prompt, options: normalizeOptions(options), allow_multiple: allowMultiple },
      opts,
    );
    if (allowMultiple) {
      if (response.kind !== "options") throw unexpected("options", response);
      return response.options;
    }
    if (response.kind !== "option") throw unexpected("option", response);
    return response.option;
  }
}
