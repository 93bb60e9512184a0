import type { InteractionChannel } from "../interaction/channel.js";
import { OperatorPrompts, type InteractionPort } from "../interaction/prompts.js";
import type { SecretStore } from "../secrets/store.js";
import type { LogLine, LogStream, StepMetadata } from "../types/step.js";
import { isInfrastructureError, type InfrastructureError } from "./errors.js";
import type { RunState } from "./run-state.js";
import type { StepContext } from "./step.js";

export type StepScopeDeps = {
  runId: string;
  metadata: StepMetadata;
  state: RunState;
  channel: InteractionChannel;
  secrets: SecretStore;
};

/**
 * Per-invocation wiring between a step and the run's collaborators.
 * Captures the step's log lines and remembers any infrastructure failure
 * that passed through it, even one the step caught itself.
 */
export class StepScope {
  readonly logs: LogLine[] = [];
  private fault: InfrastructureError | null = null;

  constructor(private readonly deps: StepScopeDeps) {}

  context(): StepContext {
    const interaction: InteractionPort = {
      request: (request, opts) => this.guard(this.deps.channel.request(request, opts)),
    };
    const secrets: SecretStore = {
      get: (name) => this.guard(this.deps.secrets.get(name)),
    };
    return {
      runId: this.deps.runId,
      metadata: this.deps.metadata,
      state: this.deps.state,
      interaction,
      prompts: new OperatorPrompts(interaction),
      secrets,
      log: {
        out: (text) => this.write("out", text),
        err: (text) => this.write("err", text),
      },
    };
  }

  /** First infrastructure failure seen during this invocation, if any. */
  takeFault(): InfrastructureError | null {
    const fault = this.fault;
    this.fault = null;
    return fault;
  }

  private write(stream: LogStream, text: string): void {
    this.logs.push({ stream, text, at: new Date().toISOString() });
    this.deps.channel.sendLog(stream, text);
  }

  private async guard<T>(work: Promise<T>): Promise<T> {
    try {
      return await work;
    } catch (e) {
      if (isInfrastructureError(e)) this.fault ??= e;
      throw e;
    }
  }
}
