/**
 * Hybrid channel to the backend: the server publishes an RSA public key,
 * and symmetric keys bound for it are wrapped with RSA-OAEP(SHA-256).
 *
 *   no-server-key ──fetch ok / cache loaded──▶ has-server-key
 *   has-server-key ──invalidate()──▶ no-server-key
 *
 * @module server-channel
 */
import {
  decodePublicKeyPEM,
  E2eeError,
  FetchTimeoutError,
  initSodium,
  KeyFormatError,
  rsaOaepEncrypt,
  ServerKeyUnavailableError,
  type RsaPublicKey,
} from "@otto/crypto";
import type { Logger } from "./logger.js";
import { serverPublicKeyResponseSchema } from "./schema.js";
import { StorageKeys, type SecureKeyStore } from "./secure-store.js";

export const SERVER_PUBLIC_KEY_PATH = "/users/server-public-key";

/** The subset of `fetch` the channel calls; injectable for tests. */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type ServerKeySource = "network" | "cache";

type ChannelState =
  | { kind: "no-server-key" }
  | { kind: "has-server-key"; key: RsaPublicKey; source: ServerKeySource };

export interface ServerChannelOptions {
  baseUrl: string;
  timeoutMs: number;
  fetch?: FetchLike;
}

export class HybridServerChannel {
  private state: ChannelState = { kind: "no-server-key" };
  private fetching: Promise<void> | null = null;
  private readonly fetchFn: FetchLike;

  constructor(
    private readonly store: SecureKeyStore,
    private readonly logger: Logger,
    private readonly options: ServerChannelOptions,
  ) {
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  }

  get hasServerKey(): boolean {
    return this.state.kind === "has-server-key";
  }

  /** Where the current key came from, or null without one. */
  get keySource(): ServerKeySource | null {
    return this.state.kind === "has-server-key" ? this.state.source : null;
  }

  /**
   * Download, validate and persist the server key. On failure the channel
   * keeps a key it already holds or falls back to the persisted copy, and
   * only throws when neither exists: a timeout as FetchTimeoutError, any
   * other failure (including a malformed key) as ServerKeyUnavailableError.
   * Concurrent calls share one request.
   */
  fetchServerPublicKey(baseUrl: string = this.options.baseUrl): Promise<void> {
    if (!this.fetching) {
      this.fetching = this.refresh(baseUrl).finally(() => {
        this.fetching = null;
      });
    }
    return this.fetching;
  }

  private async refresh(baseUrl: string): Promise<void> {
    await initSodium();
    try {
      const pem = await this.download(baseUrl);
      const key = decodePublicKeyPEM(pem);
      await this.store.writeText(StorageKeys.SERVER_PUBLIC_KEY_PEM, pem);
      this.state = { kind: "has-server-key", key, source: "network" };
      this.logger.info("Server public key fetched");
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Server public key fetch failed: ${reason}`);
      if (this.state.kind === "has-server-key") return;
      if (await this.loadCached()) return;
      if (err instanceof FetchTimeoutError || err instanceof ServerKeyUnavailableError) throw err;
      throw new ServerKeyUnavailableError(`No usable server public key: ${reason}`, { cause: err });
    }
  }

  private async download(baseUrl: string): Promise<string> {
    const url = baseUrl.replace(/\/+$/, "") + SERVER_PUBLIC_KEY_PATH;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let body: unknown;
    try {
      const res = await this.fetchFn(url, {
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });
      if (!res.ok) {
        throw new ServerKeyUnavailableError(`HTTP ${res.status} from ${url}`);
      }
      body = await res.json();
    } catch (err) {
      if (controller.signal.aborted) throw new FetchTimeoutError(this.options.timeoutMs, url);
      if (err instanceof E2eeError) throw err;
      throw new ServerKeyUnavailableError(`Request to ${url} failed`, { cause: err });
    } finally {
      clearTimeout(timer);
    }

    const parsed = serverPublicKeyResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new KeyFormatError("Server response carries no PEM public key", "public_key", {
        cause: parsed.error,
      });
    }
    return parsed.data.public_key;
  }

  /** Load the persisted key. A corrupt copy is deleted and the channel invalidated. */
  private async loadCached(): Promise<boolean> {
    await initSodium();
    const pem = await this.store.readText(StorageKeys.SERVER_PUBLIC_KEY_PEM);
    if (!pem) return false;
    try {
      const key = decodePublicKeyPEM(pem);
      this.state = { kind: "has-server-key", key, source: "cache" };
      this.logger.info("Using cached server public key");
      return true;
    } catch (err) {
      if (!(err instanceof KeyFormatError)) throw err;
      this.logger.warn("Cached server public key is corrupt; discarding it");
      await this.store.delete(StorageKeys.SERVER_PUBLIC_KEY_PEM);
      this.invalidate();
      return false;
    }
  }

  /** Drop the in-memory key; the next use reloads it from storage or the network. */
  invalidate(): void {
    if (this.state.kind === "has-server-key") {
      this.logger.info("Server public key invalidated");
    }
    this.state = { kind: "no-server-key" };
  }

  /**
   * The current server key. Without one in memory the persisted copy is
   * loaded, and failing that the key is fetched before the caller proceeds;
   * a failed fetch rejects the call.
   */
  async requireServerKey(): Promise<RsaPublicKey> {
    if (this.state.kind === "no-server-key") await this.loadCached();
    if (this.state.kind === "no-server-key") await this.fetchServerPublicKey();
    if (this.state.kind === "no-server-key") {
      throw new ServerKeyUnavailableError("No server public key is available");
    }
    return this.state.key;
  }

  /** RSA-OAEP(SHA-256) encrypt `data` to the server. */
  async encryptForServer(data: Uint8Array): Promise<Uint8Array> {
    return rsaOaepEncrypt(await this.requireServerKey(), data);
  }
}
