/** Step records and run results, the persisted shape of a station run. */
export type LogStream = "out" | "err";

export type LogLine = {
  stream: LogStream;
  text: string;
  at: string;
};

export type StepLink = {
  url: string;
  text?: string;
};

/** Static metadata, resolved once when a step is defined. */
export type StepMetadata = {
  id: string;
  display_name: string;
  description: string;
  image: string | null;
  link: StepLink | null;
  stop_on_fail: boolean;
};

export type ErrorCause = {
  name: string;
  code: string | null;
  message: string;
  stack?: string;
};

export type SkipReason = "stop_on_fail" | "infrastructure";

export type StepOutcome =
  | { status: "passed" }
  | { status: "failed"; detail: string }
  | { status: "errored"; cause: ErrorCause }
  | { status: "aborted"; cause: ErrorCause }
  | { status: "skipped"; reason: SkipReason };

export type StepStatus = StepOutcome["status"];

export type StepRole = "step" | "finalizer";

export type StepExecution = StepMetadata & {
  index: number;
  role: StepRole;
  outcome: StepOutcome;
  logs: LogLine[];
  started_at: string | null;
  finished_at: string | null;
  duration_ms: number;
};

export type StopReason =
  | { kind: "completed" }
  | { kind: "stop_on_fail"; step: string; index: number }
  | { kind: "infrastructure"; step: string; index: number; cause: ErrorCause };

export type RunVerdict = "passed" | "failed";

export type RunResult = {
  run_id: string;
  station_id: string | null;
  started_at: string;
  finished_at: string;
  verdict: RunVerdict;
  stop: StopReason;
  steps: StepExecution[];
  finalizer: StepExecution | null;
  finalizer_affects_verdict: boolean;
  revision: string | null;
};
