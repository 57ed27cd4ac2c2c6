/**
 * Shared stand-ins for the client tests.
 */
import { createLogger, type Logger } from "../src/logger.js";
import type { SecureBackend } from "../src/secure-store.js";
import type { FetchLike } from "../src/server-channel.js";

/** A backend whose every operation fails, like a locked keychain. */
export class FailingBackend implements SecureBackend {
  calls = 0;

  async read(): Promise<Uint8Array | null> {
    this.calls++;
    throw new Error("keychain locked");
  }

  async write(): Promise<void> {
    this.calls++;
    throw new Error("keychain locked");
  }

  async delete(): Promise<void> {
    this.calls++;
    throw new Error("keychain locked");
  }
}

/** Logger that records formatted lines instead of printing them. */
export function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = createLogger({ level: "debug", sink: (line) => lines.push(line) });
  return { logger, lines };
}

/** Fetch stand-in that answers with a fixed status and JSON body and records URLs. */
export function jsonFetch(body: unknown, status = 200): FetchLike & { urls: string[] } {
  const urls: string[] = [];
  const fn = async (url: string): Promise<Response> => {
    urls.push(url);
    return new Response(JSON.stringify(body), {
      status,
      headers: { "Content-Type": "application/json" },
    });
  };
  return Object.assign(fn, { urls });
}

/** Fetch stand-in that never answers and only rejects when aborted. */
export const hangingFetch: FetchLike = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
  });
