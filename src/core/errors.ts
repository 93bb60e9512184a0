import type { ErrorCause } from "../types/step.js";

/**
 * Failure in engine plumbing rather than in a step's own test logic.
 * Always aborts the remaining regular steps; the finalizer still runs.
 */
export class InfrastructureError extends Error {
  readonly code: string;

  constructor(message: string, code = "INFRASTRUCTURE", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InfrastructureError";
    this.code = code;
  }
}

/** An operator response that does not fit the request it answers. */
export class ValidationError extends InfrastructureError {
  constructor(message: string) {
    super(message, "RESPONSE_INVALID");
    this.name = "ValidationError";
  }
}

export class InteractionCancelledError extends InfrastructureError {
  readonly requestId: string;

  constructor(requestId: string, reason: string) {
    super(`Interaction ${requestId} cancelled: ${reason}`, "INTERACTION_CANCELLED");
    this.name = "InteractionCancelledError";
    this.requestId = requestId;
  }
}

export class InteractionTimeoutError extends InfrastructureError {
  readonly requestId: string;
  readonly timeoutMs: number;

  constructor(requestId: string, timeoutMs: number) {
    super(`No operator response to ${requestId} within ${timeoutMs}ms`, "INTERACTION_TIMEOUT");
    this.name = "InteractionTimeoutError";
    this.requestId = requestId;
    this.timeoutMs = timeoutMs;
  }
}

export class TransportError extends InfrastructureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "TRANSPORT_FAILED", options);
    this.name = "TransportError";
  }
}

export class SecretStoreUnavailableError extends InfrastructureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "SECRET_STORE_UNAVAILABLE", options);
    this.name = "SecretStoreUnavailableError";
  }
}

/** Raised to the requesting step; it may handle it or let it fail the step. */
export class SecretNotFoundError extends Error {
  readonly code = "SECRET_NOT_FOUND";
  readonly secretName: string;

  constructor(secretName: string) {
    super(`Secret not declared for this run: ${secretName}`);
    this.name = "SecretNotFoundError";
    this.secretName = secretName;
  }
}

export class StateKeyNotFoundError extends Error {
  readonly code = "STATE_KEY_NOT_FOUND";
  readonly key: string;

  constructor(key: string) {
    super(`Run state has no key: ${key}`);
    this.name = "StateKeyNotFoundError";
    this.key = key;
  }
}

export function isInfrastructureError(e: unknown): e is InfrastructureError {
  return e instanceof InfrastructureError;
}

/** Capture a thrown value in the shape stored on step records. */
export function describeError(e: unknown): ErrorCause {
  if (e instanceof Error) {
    const code = "code" in e && typeof e.code === "string" ? e.code : null;
    const cause: ErrorCause = { name: e.name, code, message: e.message };
    if (e.stack) cause.stack = e.stack;
    return cause;
  }
  return { name: "Error", code: null, message: String(e) };
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
