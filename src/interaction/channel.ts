import {
  errorMessage,
  InfrastructureError,
  InteractionCancelledError,
  InteractionTimeoutError,
  TransportError,
  ValidationError,
} from "../core/errors.js";
import type { LogStream } from "../types/step.js";
import type {
  EngineMessage,
  InteractionConstraints,
  InteractionRequest,
  InteractionResponse,
} from "../types/interaction.js";
import { assertDistinctOptions, resolveSelection } from "./options.js";
import { parseConsoleMessage } from "./protocol.js";

/** Engine → console half of a connection. */
export interface ConsoleTransport {
  send(message: EngineMessage): void | Promise<void>;
}

/** Largest delay a Node timer accepts; longer ones fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

function checkTimeout(timeoutMs: number | null): void {
  if (timeoutMs !== null && timeoutMs > MAX_TIMEOUT_MS) {
    throw new RangeError(`Interaction timeout ${timeoutMs}ms exceeds the maximum of ${MAX_TIMEOUT_MS}ms`);
  }
}

export type RequestOptions = {
  /** Overrides the channel default. 0 or null waits indefinitely. */
  timeoutMs?: number | null;
};

export type DeliveryResult = { ok: true; id: string } | { ok: false; error: string };

type PendingRequest = {
  id: string;
  request: InteractionRequest;
  resolve: (response: InteractionResponse) => void;
  reject: (error: InfrastructureError) => void;
  timer: NodeJS.Timeout | null;
};

function constraintsOf(request: InteractionRequest): InteractionConstraints {
  if (request.kind === "text_input") return { size: request.size };
  if (request.kind === "select") return { allow_multiple: request.allow_multiple };
  return {};
}

/**
 * Interaction channel for one run.
 *
 * Outbound messages (logs, requests) are queued and delivered in call order;
 * while no console is attached they are buffered and flushed on attach.
 * Inbound responses are matched to the outstanding request carrying the same
 * id and validated against it before the waiting step resumes.
 */
export class InteractionChannel {
  private readonly runId: string;
  private readonly defaultTimeoutMs: number | null;
  private transport: ConsoleTransport | null = null;
  private readonly buffer: EngineMessage[] = [];
  private outbound: Promise<void> = Promise.resolve();
  private readonly pending = new Map<string, PendingRequest>();
  private fault: InfrastructureError | null = null;
  private closed = false;
  private seq = 0;

  constructor(opts: { runId: string; defaultTimeoutMs?: number | null }) {
    this.runId = opts.runId;
    this.defaultTimeoutMs = opts.defaultTimeoutMs ?? null;
    checkTimeout(this.defaultTimeoutMs);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isAttached(): boolean {
    return this.transport !== null;
  }

  /** Ids of requests still waiting for an operator response. */
  pendingIds(): string[] {
    return [...this.pending.keys()];
  }

  /** Connect a console and flush everything buffered so far. */
  attach(transport: ConsoleTransport): void {
    if (this.closed) throw new Error("Cannot attach a console to a closed channel");
    this.transport = transport;
    const queued = this.buffer.splice(0, this.buffer.length);
    for (const message of queued) this.enqueue(transport, message);
  }

  /** Operator disconnected: cancel the outstanding wait, buffer further output. */
  detach(reason = "operator disconnected"): void {
    this.transport = null;
    this.cancelPending(reason);
  }

  /** Tear the channel down. Idempotent. */
  close(reason = "channel closed"): void {
    if (this.closed) return;
    this.closed = true;
    this.transport = null;
    this.buffer.length = 0;
    this.cancelPending(reason);
  }

  /** Fire-and-forget log line. Ordered per stream; never blocks the step. */
  sendLog(stream: LogStream, text: string): void {
    if (this.closed) return;
    this.emit({ type: "log", run_id: this.runId, stream, text });
  }

  /** Ask the operator and wait for a correlated, validated response. */
  async request(request: InteractionRequest, opts?: RequestOptions): Promise<InteractionResponse> {
    assertDistinctOptions(request.options);
    const id = `${this.runId}:${++this.seq}`;
    if (this.closed) throw new InteractionCancelledError(id, "channel closed");

    const timeoutMs = opts?.timeoutMs === undefined ? this.defaultTimeoutMs : opts.timeoutMs;
    checkTimeout(timeoutMs);

    return new Promise<InteractionResponse>((resolve, reject) => {
      const entry: PendingRequest = { id, request, resolve, reject, timer: null };
      if (timeoutMs !== null && timeoutMs > 0) {
        entry.timer = setTimeout(() => {
          if (this.settle(id)) reject(new InteractionTimeoutError(id, timeoutMs));
        }, timeoutMs);
      }
      this.pending.set(id, entry);
      this.emit({
        type: "interaction_request",
        run_id: this.runId,
        id,
        kind: request.kind,
        prompt: request.prompt,
        options: request.options,
        constraints: constraintsOf(request),
      });
    });
  }

  /**
   * Console → engine. Responses to ids that are not outstanding are refused
   * and leave the run untouched; a response that does not fit its request
   * fails that request with ValidationError.
   */
  deliver(data: unknown): DeliveryResult {
    const parsed = parseConsoleMessage(data);
    if (!parsed.ok) {
      const id = typeof data === "object" && data !== null && "id" in data ? data.id : undefined;
      if (typeof id === "string") {
        const entry = this.settle(id);
        if (entry) entry.reject(new ValidationError(`Malformed response to ${id}: ${parsed.error}`));
      }
      return { ok: false, error: parsed.error };
    }

    const { id, selection } = parsed.message;
    const entry = this.settle(id);
    if (!entry) return { ok: false, error: `No outstanding request with id ${id}` };

    try {
      entry.resolve(resolveSelection(entry.request, selection));
      return { ok: true, id };
    } catch (e) {
      const error = e instanceof ValidationError ? e : new ValidationError(String(e));
      entry.reject(error);
      return { ok: false, error: error.message };
    }
  }

  /** Return and clear the last transport failure not tied to a request. */
  takeFault(): InfrastructureError | null {
    const fault = this.fault;
    this.fault = null;
    return fault;
  }

  /** Resolves once every message handed to a transport has been sent. */
  flush(): Promise<void> {
    return this.outbound;
  }

  private emit(message: EngineMessage): void {
    if (this.transport) this.enqueue(this.transport, message);
    else this.buffer.push(message);
  }

  private enqueue(transport: ConsoleTransport, message: EngineMessage): void {
    this.outbound = this.outbound
      .then(() => transport.send(message))
      .catch((e: unknown) => {
        const error = new TransportError(`Failed to send ${message.type} to console: ${errorMessage(e)}`, { cause: e });
        const entry = message.type === "interaction_request" ? this.settle(message.id) : undefined;
        if (entry) entry.reject(error);
        else this.fault ??= error;
      });
  }

  private settle(id: string): PendingRequest | undefined {
    const entry = this.pending.get(id);
    if (!entry) return undefined;
    this.pending.delete(id);
    if (entry.timer) clearTimeout(entry.timer);
    return entry;
  }

  private cancelPending(reason: string): void {
    for (const id of [...this.pending.keys()]) {
      const entry = this.settle(id);
      if (entry) entry.reject(new InteractionCancelledError(id, reason));
    }
  }
}
