export { Step, defineStep, resolveMetadata } from "./core/step.js";
export type { LogSink, StepClass, StepContext, StepFunction, StepOptions, StepSpec } from "./core/step.js";
export { createRunPlan, isRunPlan, loadPlanModule } from "./core/plan.js";
export type { PlanLoadResult, RunPlan } from "./core/plan.js";
export { RunState } from "./core/run-state.js";
export { Sequencer } from "./core/sequencer.js";
export type { SequencerEvent, SequencerObserver, SequencerOptions } from "./core/sequencer.js";
export { classifyReturn, computeVerdict, stepFailure } from "./core/outcome.js";
export type { StepFailure, StepReturn } from "./core/outcome.js";
export { displayNameFromId } from "./core/display-name.js";
export { generateRunId } from "./core/run-id.js";
export * from "./core/errors.js";

export { InteractionChannel } from "./interaction/channel.js";
export type { ConsoleTransport, DeliveryResult, RequestOptions } from "./interaction/channel.js";
export { OperatorPrompts, DEFAULT_TEXT_INPUT_SIZE } from "./interaction/prompts.js";
export type { InteractionPort, PromptOptions } from "./interaction/prompts.js";
export { JsonlConsoleTransport } from "./interaction/jsonl-transport.js";
export { normalizeOptions, resolveSelection } from "./interaction/options.js";

export {
  ChainedSecretStore,
  EnvSecretStore,
  KeystoreFileSecretStore,
  StaticSecretStore,
  parseSecretAssignments,
} from "./secrets/store.js";
export type { SecretStore } from "./secrets/store.js";

export { buildJunitXml } from "./report/junit.js";
export { formatSummary } from "./report/summary.js";
export { RunReportWriter, verifyRunReport, writeRunReport } from "./report/writer.js";

export type * from "./types/step.js";
export type * from "./types/interaction.js";
export type * from "./types/config.js";
