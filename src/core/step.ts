import type { InteractionPort, OperatorPrompts } from "../interaction/prompts.js";
import type { SecretStore } from "../secrets/store.js";
import type { StepLink, StepMetadata } from "../types/step.js";
import { displayNameFromId } from "./display-name.js";
import { stepFailure, type StepFailure, type StepReturn } from "./outcome.js";
import type { RunState } from "./run-state.js";

/** Log output bound to one step record; also forwarded to the operator console. */
export interface LogSink {
  out(text: string): void;
  err(text: string): void;
}

/** Everything a step sees while it runs. */
export type StepContext = {
  readonly runId: string;
  readonly metadata: StepMetadata;
  readonly state: RunState;
  readonly interaction: InteractionPort;
  readonly prompts: OperatorPrompts;
  readonly secrets: SecretStore;
  readonly log: LogSink;
};

/**
 * Base class for station steps. Implement run(): return nothing (or true) to
 * pass, `false` or `this.fail(detail)` to fail; a thrown error marks the step
 * errored.
 */
export abstract class Step {
  constructor(protected readonly context: StepContext) {}

  abstract run(): StepReturn | Promise<StepReturn>;

  /** State shared with every other step of this run. */
  protected get state(): RunState {
    return this.context.state;
  }

  protected get prompts(): OperatorPrompts {
    return this.context.prompts;
  }

  /** Line to the operator's stdout pane. */
  protected log(text: string): void {
    this.context.log.out(text);
  }

  /** Line to the operator's stderr pane. */
  protected logError(text: string): void {
    this.context.log.err(text);
  }

  protected secret(name: string): Promise<string> {
    return this.context.secrets.get(name);
  }

  protected fail(detail: string): StepFailure {
    return stepFailure(detail);
  }
}

export type StepClass = new (context: StepContext) => Step;

export type StepFunction = (context: StepContext) => StepReturn | Promise<StepReturn>;

export type RunnableStep = {
  run(): StepReturn | Promise<StepReturn>;
};

export type StepOptions = {
  id?: string;
  displayName?: string;
  description?: string;
  /** Path of a static image, relative to the station project. */
  image?: string;
  /** A url, or [url, link text]. */
  link?: string | readonly [string, string];
  stopOnFail?: boolean;
};

/** One registry entry: resolved metadata plus a factory. */
export type StepSpec = {
  readonly metadata: Readonly<StepMetadata>;
  create(context: StepContext): RunnableStep;
};

function resolveLink(link: StepOptions["link"]): StepLink | null {
  if (link === undefined) return null;
  const url = typeof link === "string" ? link : link[0];
  const text = typeof link === "string" ? undefined : link[1];
  try {
    new URL(url);
  } catch {
    throw new Error(`Step link is not a valid URL: ${url}`);
  }
  return text === undefined ? { url } : { url, text };
}

export function resolveMetadata(id: string, options: StepOptions = {}): StepMetadata {
  if (id.trim().length === 0) throw new Error("Step id must not be empty");
  const displayName = options.displayName ?? displayNameFromId(id);
  return {
    id,
    display_name: displayName,
    description: options.description ?? displayName,
    image: options.image ?? null,
    link: resolveLink(options.link),
    stop_on_fail: options.stopOnFail ?? true,
  };
}

/**
 * Register a step. Classes are identified by their class name unless `id`
 * is given; functions need an explicit id.
 */
export function defineStep(step: StepClass, options?: StepOptions): StepSpec;
export function defineStep(id: string, run: StepFunction, options?: Omit<StepOptions, "id">): StepSpec;
export function defineStep(
  first: StepClass | string,
  second?: StepFunction | StepOptions,
  third?: Omit<StepOptions, "id">,
): StepSpec {
  if (typeof first === "string") {
    if (typeof second !== "function") throw new Error(`Step ${first} needs a run function`);
    const run = second;
    const metadata = Object.freeze(resolveMetadata(first, third));
    return Object.freeze({
      metadata,
      create: (context: StepContext): RunnableStep => ({ run: () => run(context) }),
    });
  }

  const StepCtor = first;
  const options = typeof second === "object" ? second : undefined;
  const metadata = Object.freeze(resolveMetadata(options?.id ?? StepCtor.name, options));
  return Object.freeze({
    metadata,
    create: (context: StepContext): RunnableStep => new StepCtor(context),
  });
}
