/**
 * Secure key storage with a one-way in-memory fallback.
 *
 * The store starts on a secure backend. The first backend failure switches
 * it, for the rest of the process, to an in-memory map; nothing written
 * after that survives a restart, which the identity layer reports as
 * ephemeral keys.
 *
 * @module secure-store
 */
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { fromBase64, initSodium, toBase64 } from "@otto/crypto";
import type { Logger } from "./logger.js";

/** Storage slots. */
export const StorageKeys = {
  IDENTITY_SEED_HEX: "device_identity_seed_hex",
  LEGACY_PRIVATE_KEY_PEM: "device_private_key_pem",
  LEGACY_PUBLIC_KEY_PEM: "device_public_key_pem",
  SERVER_PUBLIC_KEY_PEM: "server_public_key_pem",
} as const;

/** Platform secure storage capability (keychain, keystore, protected file). */
export interface SecureBackend {
  read(key: string): Promise<Uint8Array | null>;
  write(key: string, value: Uint8Array): Promise<void>;
  delete(key: string): Promise<void>;
}

/** Process-local map. Also the fallback strategy of {@link SecureKeyStore}. */
export class MemoryBackend implements SecureBackend {
  private readonly entries = new Map<string, Uint8Array>();

  async read(key: string): Promise<Uint8Array | null> {
    const value = this.entries.get(key);
    return value ? Uint8Array.from(value) : null;
  }

  async write(key: string, value: Uint8Array): Promise<void> {
    this.entries.set(key, Uint8Array.from(value));
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }
}

/**
 * JSON file of base64 values, created with mode 0600. Writes go to a
 * temporary file first and are renamed into place.
 */
export class FileSecureBackend implements SecureBackend {
  constructor(private readonly filePath: string) {}

  private async load(): Promise<Record<string, string>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (err) {
      if (isNotFound(err)) return {};
      throw err;
    }
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Keystore ${this.filePath} is not a JSON object`);
    }
    const entries: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === "string") entries[key] = value;
    }
    return entries;
  }

  private async save(entries: Record<string, string>): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
    const tmp = `${this.filePath}.tmp`;
    await writeFile(tmp, JSON.stringify(entries), { mode: 0o600 });
    await rename(tmp, this.filePath);
  }

  async read(key: string): Promise<Uint8Array | null> {
    await initSodium();
    const value = (await this.load())[key];
    return value === undefined ? null : fromBase64(value, key);
  }

  async write(key: string, value: Uint8Array): Promise<void> {
    await initSodium();
    const entries = await this.load();
    entries[key] = toBase64(value);
    await this.save(entries);
  }

  async delete(key: string): Promise<void> {
    const entries = await this.load();
    if (!(key in entries)) return;
    delete entries[key];
    await this.save(entries);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

type StoreStrategy =
  | { kind: "secure"; backend: SecureBackend }
  | { kind: "memory"; backend: MemoryBackend; cause: unknown };

export type StoreMode = StoreStrategy["kind"];

/**
 * Key-value byte store over a {@link SecureBackend}. Backend errors never
 * propagate: they flip the store into memory mode and the operation is
 * served from memory.
 */
export class SecureKeyStore {
  private strategy: StoreStrategy;

  constructor(
    backend: SecureBackend,
    private readonly logger: Logger,
  ) {
    this.strategy = { kind: "secure", backend };
  }

  /** "memory" once the secure backend has failed in this process. */
  get mode(): StoreMode {
    return this.strategy.kind;
  }

  /** Whether anything stored now will be lost when the process exits. */
  get isEphemeral(): boolean {
    return this.strategy.kind === "memory";
  }

  private async run<T>(
    op: string,
    key: string,
    action: (backend: SecureBackend) => Promise<T>,
  ): Promise<T> {
    const current = this.strategy;
    if (current.kind === "memory") return action(current.backend);
    try {
      return await action(current.backend);
    } catch (err) {
      this.degrade(op, key, err);
      return this.run(op, key, action);
    }
  }

  private degrade(op: string, key: string, cause: unknown): void {
    if (this.strategy.kind === "memory") return;
    const reason = cause instanceof Error ? cause.message : String(cause);
    this.logger.warn(
      `Secure storage ${op}(${key}) failed (${reason}); ` +
        "falling back to in-memory storage, keys will not survive a restart",
    );
    this.strategy = { kind: "memory", backend: new MemoryBackend(), cause };
  }

  read(key: string): Promise<Uint8Array | null> {
    return this.run("read", key, (b) => b.read(key));
  }

  write(key: string, value: Uint8Array): Promise<void> {
    return this.run("write", key, (b) => b.write(key, value));
  }

  delete(key: string): Promise<void> {
    return this.run("delete", key, (b) => b.delete(key));
  }

  async readText(key: string): Promise<string | null> {
    const bytes = await this.read(key);
    return bytes === null ? null : new TextDecoder().decode(bytes);
  }

  writeText(key: string, value: string): Promise<void> {
    return this.write(key, new TextEncoder().encode(value));
  }
}
