/**
 * Per-conversation AES-256 keys, held in memory for the process lifetime.
 *
 * Keys are not persisted. A restart starts from an empty cache: random
 * keys are regenerated, and keys agreed with a peer are re-derived from
 * the identity seed and the peer's public key.
 *
 * @module conversation-keys
 */
import {
  generateSymmetricKey,
  KeyFormatError,
  SYMMETRIC_KEY_BYTES,
} from "@otto/crypto";
import type { Logger } from "./logger.js";

export type KeyFactory = () => Promise<Uint8Array>;

/** Anything that can agree a conversation key with a peer (the identity). */
export interface ConversationKeyDeriver {
  deriveConversationKey(remotePublicKey: Uint8Array, conversationId: string): Promise<Uint8Array>;
}

const randomKey: KeyFactory = async () => generateSymmetricKey();

export class ConversationKeyCache {
  private readonly keys = new Map<string, Promise<Uint8Array>>();

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.keys.size;
  }

  has(conversationId: string): boolean {
    return this.keys.has(conversationId);
  }

  /**
   * Return the key for a conversation, creating it on first use.
   * Concurrent callers for the same id share one in-flight creation and
   * all observe the same key.
   */
  getOrCreate(conversationId: string, factory: KeyFactory = randomKey): Promise<Uint8Array> {
    const existing = this.keys.get(conversationId);
    if (existing) return existing;

    const pending = Promise.resolve()
      .then(factory)
      .then((key) => {
        if (key.length !== SYMMETRIC_KEY_BYTES) {
          throw new KeyFormatError(
            `Conversation key must be ${SYMMETRIC_KEY_BYTES} bytes, got ${key.length}`,
            "key",
          );
        }
        return key;
      });
    this.keys.set(conversationId, pending);
    // Evict a failed creation so the next call retries; callers still
    // receive the rejection through `pending`.
    pending.then(undefined, () => {
      if (this.keys.get(conversationId) === pending) this.keys.delete(conversationId);
    });
    return pending;
  }

  /** Key agreed with a peer via X25519 + HKDF, cached like any other. */
  getOrDerive(
    conversationId: string,
    remotePublicKey: Uint8Array,
    deriver: ConversationKeyDeriver,
  ): Promise<Uint8Array> {
    return this.getOrCreate(conversationId, () =>
      deriver.deriveConversationKey(remotePublicKey, conversationId),
    );
  }

  /** Cached key, or null without creating one. */
  async get(conversationId: string): Promise<Uint8Array | null> {
    const pending = this.keys.get(conversationId);
    return pending ? pending : null;
  }

  delete(conversationId: string): void {
    this.keys.delete(conversationId);
  }

  /** Forget every key. In-flight creations finish but are not cached. */
  clear(): void {
    if (this.keys.size > 0) {
      this.logger.info(`Cleared ${this.keys.size} conversation key(s)`);
    }
    this.keys.clear();
  }
}
