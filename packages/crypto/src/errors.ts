/**
 * Typed error taxonomy shared by the crypto primitives and the client
 * services. Codec and crypto failures always propagate as one of these.
 * @module errors
 */

/** Base class for every E2EE failure. */
export abstract class E2eeError extends Error {
  /** Whether repeating the operation later can succeed without new input. */
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed PEM, DER, base64, hex or key length. Retrying the same input never helps. */
export class KeyFormatError extends E2eeError {
  readonly retryable = false;

  constructor(
    message: string,
    public readonly field?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The identity is not (or could not be) initialized. */
export class KeysUnavailableError extends E2eeError {
  readonly retryable = true;
}

/** Unknown word, wrong length or checksum mismatch in a recovery phrase. */
export class InvalidMnemonicError extends E2eeError {
  readonly retryable = false;
}

/** AEAD or RSA-OAEP rejected the input. Never return partial plaintext. */
export class AuthenticationFailedError extends E2eeError {
  readonly retryable = false;

  constructor(message = "Cannot decrypt this message", options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** No server public key in memory, on disk, or from the network. */
export class ServerKeyUnavailableError extends E2eeError {
  readonly retryable = true;
}

/** A network fetch exceeded its deadline. */
export class FetchTimeoutError extends E2eeError {
  readonly retryable = true;

  constructor(
    public readonly timeoutMs: number,
    url: string,
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
  }
}

export function isRetryable(err: unknown): boolean {
  return err instanceof E2eeError && err.retryable;
}
