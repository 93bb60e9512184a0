import type { InteractionChannel } from "../interaction/channel.js";
import type { SecretStore } from "../secrets/store.js";
import type {
  RunResult,
  SkipReason,
  StepExecution,
  StepOutcome,
  StepRole,
  StopReason,
} from "../types/step.js";
import { describeError, isInfrastructureError } from "./errors.js";
import { classifyReturn, computeVerdict, isFailing } from "./outcome.js";
import type { RunPlan } from "./plan.js";
import { RunState } from "./run-state.js";
import type { StepSpec } from "./step.js";
import { StepScope } from "./step-scope.js";

export type SequencerEvent =
  | { type: "run_started"; run_id: string; steps: number; finalizer: boolean }
  | { type: "step_started"; index: number; role: StepRole; id: string; display_name: string }
  | { type: "step_finished"; record: StepExecution }
  | { type: "step_skipped"; record: StepExecution }
  | { type: "run_aborted"; stop: Extract<StopReason, { kind: "infrastructure" }> }
  | { type: "finalizer_started"; id: string }
  | { type: "run_finished"; result: RunResult };

export type SequencerObserver = (event: SequencerEvent) => void;

export type SequencerOptions = {
  runId: string;
  channel: InteractionChannel;
  secrets: SecretStore;
  stationId?: string | null;
  finalizerAffectsVerdict?: boolean;
  /** Station project revision, recorded on the result. */
  revision?: string | null;
  observer?: SequencerObserver;
};

function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Drives one run of a plan.
 *
 * Main loop: instantiate → run → classify → record, in plan order. A failing
 * step with stop_on_fail ends the loop; an infrastructure failure ends it
 * regardless of policy. The finalizer then runs exactly once.
 */
export class Sequencer {
  private readonly opts: SequencerOptions;
  private started = false;

  constructor(opts: SequencerOptions) {
    this.opts = opts;
  }

  async execute(plan: RunPlan): Promise<RunResult> {
    if (this.started) throw new Error("A Sequencer drives a single run; create a new one per run");
    this.started = true;

    const state = new RunState();
    const startedAt = nowIso();
    const steps: StepExecution[] = [];
    let stop: StopReason = { kind: "completed" };

    this.emit({ type: "run_started", run_id: this.opts.runId, steps: plan.steps.length, finalizer: plan.finalizer !== null });

    for (const [index, spec] of plan.steps.entries()) {
      if (stop.kind !== "completed") {
        const record = this.skipped(spec, index, stop.kind);
        steps.push(record);
        this.emit({ type: "step_skipped", record });
        continue;
      }

      const record = await this.invoke(spec, index, "step", state);
      steps.push(record);
      this.emit({ type: "step_finished", record });

      if (record.outcome.status === "aborted") {
        const aborted: Extract<StopReason, { kind: "infrastructure" }> = {
          kind: "infrastructure",
          step: spec.metadata.id,
          index,
          cause: record.outcome.cause,
        };
        stop = aborted;
        this.emit({ type: "run_aborted", stop: aborted });
      } else if (isFailing(record.outcome) && spec.metadata.stop_on_fail) {
        stop = { kind: "stop_on_fail", step: spec.metadata.id, index };
      }
    }

    let finalizer: StepExecution | null = null;
    if (plan.finalizer) {
      this.emit({ type: "finalizer_started", id: plan.finalizer.metadata.id });
      finalizer = await this.invoke(plan.finalizer, plan.steps.length, "finalizer", state);
      this.emit({ type: "step_finished", record: finalizer });
    }

    const finalizerAffectsVerdict = this.opts.finalizerAffectsVerdict ?? false;
    const result: RunResult = {
      run_id: this.opts.runId,
      station_id: this.opts.stationId ?? null,
      started_at: startedAt,
      finished_at: nowIso(),
      verdict: computeVerdict(steps, finalizer, finalizerAffectsVerdict),
      stop,
      steps,
      finalizer,
      finalizer_affects_verdict: finalizerAffectsVerdict,
      revision: this.opts.revision ?? null,
    };
    this.emit({ type: "run_finished", result });
    return result;
  }

  private async invoke(spec: StepSpec, index: number, role: StepRole, state: RunState): Promise<StepExecution> {
    const scope = new StepScope({
      runId: this.opts.runId,
      metadata: spec.metadata,
      state,
      channel: this.opts.channel,
      secrets: this.opts.secrets,
    });

    this.emit({ type: "step_started", index, role, id: spec.metadata.id, display_name: spec.metadata.display_name });
    const startedAt = nowIso();
    const start = Date.now();

    let outcome: StepOutcome;
    try {
      const step = spec.create(scope.context());
      outcome = classifyReturn(await step.run());
    } catch (e) {
      outcome = isInfrastructureError(e)
        ? { status: "aborted", cause: describeError(e) }
        : { status: "errored", cause: describeError(e) };
    }

    // A step may catch an infrastructure failure itself; it still aborts the run.
    // Logs are sent asynchronously, so wait for them before checking.
    await this.opts.channel.flush();
    const fault = scope.takeFault() ?? this.opts.channel.takeFault();
    if (fault && outcome.status !== "aborted") {
      outcome = { status: "aborted", cause: describeError(fault) };
    }

    return {
      ...spec.metadata,
      index,
      role,
      outcome,
      logs: scope.logs,
      started_at: startedAt,
      finished_at: nowIso(),
      duration_ms: Date.now() - start,
    };
  }

  private skipped(spec: StepSpec, index: number, reason: SkipReason): StepExecution {
    return {
      ...spec.metadata,
      index,
      role: "step",
      outcome: { status: "skipped", reason },
      logs: [],
      started_at: null,
      finished_at: null,
      duration_ms: 0,
    };
  }

  private emit(event: SequencerEvent): void {
    this.opts.observer?.(event);
  }
}
