import fs from "node:fs/promises";
import { SecretNotFoundError, SecretStoreUnavailableError } from "../core/errors.js";

/** Read-only secret lookup for one run. */
export interface SecretStore {
  /** Resolves the secret, or rejects with SecretNotFoundError when it is not declared. */
  get(name: string): Promise<string>;
}

/** Developer override table, e.g. from `--secret NAME=VALUE`. */
export class StaticSecretStore implements SecretStore {
  private readonly values: ReadonlyMap<string, string>;

  constructor(values: Record<string, string> | Map<string, string>) {
    this.values = values instanceof Map ? new Map(values) : new Map(Object.entries(values));
  }

  async get(name: string): Promise<string> {
    const value = this.values.get(name);
    if (value === undefined) throw new SecretNotFoundError(name);
    return value;
  }
}

/**
 * Declared secrets read from prefixed environment variables; the production
 * keystore hands decrypted values to the station this way.
 * Only declared names resolve, even if other prefixed variables exist.
 */
export class EnvSecretStore implements SecretStore {
  private readonly declared: ReadonlySet<string>;

  constructor(
    declared: readonly string[],
    private readonly prefix: string,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {
    this.declared = new Set(declared);
  }

  async get(name: string): Promise<string> {
    const value = this.declared.has(name) ? this.env[this.prefix + name] : undefined;
    if (value === undefined) throw new SecretNotFoundError(name);
    return value;
  }
}

/**
 * Keystore file provisioned by the hosting system: a JSON object of
 * name → value, read once on first lookup. An unreadable file is an
 * infrastructure failure, not a missing secret.
 */
export class KeystoreFileSecretStore implements SecretStore {
  private values: Map<string, string> | null = null;
  private loading: Promise<Map<string, string>> | null = null;

  constructor(private readonly filePath: string) {}

  async get(name: string): Promise<string> {
    const values = await this.load();
    const value = values.get(name);
    if (value === undefined) throw new SecretNotFoundError(name);
    return value;
  }

  async load(): Promise<Map<string, string>> {
    if (this.values) return this.values;
    this.loading ??= this.read();
    this.values = await this.loading;
    return this.values;
  }

  private async read(): Promise<Map<string, string>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (e) {
      this.loading = null;
      throw new SecretStoreUnavailableError(`Keystore not readable: ${this.filePath}`, { cause: e });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      this.loading = null;
      throw new SecretStoreUnavailableError(`Keystore is not valid JSON: ${this.filePath}`, { cause: e });
    }
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      this.loading = null;
      throw new SecretStoreUnavailableError(`Keystore must be a JSON object: ${this.filePath}`);
    }

    const values = new Map<string, string>();
    for (const [name, value] of Object.entries(parsed)) {
      if (typeof value === "string") values.set(name, value);
    }
    return values;
  }
}

/** First store that knows the name wins. */
export class ChainedSecretStore implements SecretStore {
  private readonly stores: readonly SecretStore[];

  constructor(stores: readonly SecretStore[]) {
    this.stores = stores;
  }

  async get(name: string): Promise<string> {
    for (const store of this.stores) {
      try {
        return await store.get(name);
      } catch (e) {
        if (!(e instanceof SecretNotFoundError)) throw e;
      }
    }
    throw new SecretNotFoundError(name);
  }
}

export type SecretAssignments = { ok: true; values: Map<string, string> } | { ok: false; error: string };

/** Parse `NAME=VALUE` pairs. The value may itself contain `=`. */
export function parseSecretAssignments(pairs: readonly string[]): SecretAssignments {
  const values = new Map<string, string>();
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) return { ok: false, error: `Invalid secret assignment (expected NAME=VALUE): ${pair}` };
    const name = pair.slice(0, eq).trim();
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
      return { ok: false, error: `Invalid secret name: ${name}` };
    }
    values.set(name, pair.slice(eq + 1));
  }
  return { ok: true, values };
}
