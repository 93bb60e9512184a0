import { StateKeyNotFoundError } from "./errors.js";

/**
 * Shared mapping for one run. Every step and the finalizer of that run receive
 * the same instance; a new run always starts from an empty one.
 */
export class RunState {
  private readonly values = new Map<string, unknown>();

  /** Value stored under `key`, or undefined when the key was never set. */
  get(key: string): unknown {
    return this.values.get(key);
  }

  /** Like get(), but throws StateKeyNotFoundError for a missing key. */
  require(key: string): unknown {
    if (!this.values.has(key)) throw new StateKeyNotFoundError(key);
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  set(key: string, value: unknown): void {
    this.values.set(key, value);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }
}
