/**
 * Envelope building for the chat transport. Every operation first
 * requires an initialized identity, so chat is blocked when the identity
 * cannot be established.
 *
 * @module message-crypto
 */
import {
  AuthenticationFailedError,
  encryptSymmetric,
  decryptSymmetric,
  envelopeFromWire,
  envelopeToWire,
  KeyFormatError,
  KeysUnavailableError,
  openHybridEnvelope,
  sealHybridEnvelope,
  type EncryptedEnvelope,
  type WireEnvelope,
} from "@otto/crypto";
import type { ConversationKeyCache } from "./conversation-keys.js";
import type { IdentityKeyManager } from "./identity-manager.js";
import { wireEnvelopeSchema } from "./schema.js";
import type { HybridServerChannel } from "./server-channel.js";

/** Validate untrusted wire JSON and decode its base64 fields. */
export function parseWireEnvelope(input: unknown): EncryptedEnvelope {
  const parsed = wireEnvelopeSchema.safeParse(input);
  if (!parsed.success) {
    const field = parsed.error.issues[0]?.path.join(".") || "envelope";
    throw new KeyFormatError("Malformed message envelope", field, { cause: parsed.error });
  }
  return envelopeFromWire(parsed.data);
}

export class MessageCrypto {
  constructor(
    private readonly identity: IdentityKeyManager,
    private readonly conversationKeys: ConversationKeyCache,
    private readonly channel: HybridServerChannel,
  ) {}

  /**
   * Agree the conversation key with a peer instead of drawing a random
   * one. Both sides arrive at the same key from their own seed and the
   * other's public key.
   */
  async establishPeerKey(conversationId: string, remotePublicKey: Uint8Array): Promise<void> {
    await this.identity.ensureReady();
    await this.conversationKeys.getOrDerive(conversationId, remotePublicKey, this.identity);
  }

  /** Encrypt under the conversation key and wrap that key for the server. */
  async encrypt(conversationId: string, plaintext: string): Promise<WireEnvelope> {
    await this.identity.ensureReady();
    const key = await this.conversationKeys.getOrCreate(conversationId);
    const serverKey = await this.channel.requireServerKey();
    return envelopeToWire(await sealHybridEnvelope(plaintext, key, serverKey));
  }

  /** Encrypt under the conversation key only; no `encrypted_key` field. */
  async encryptSymmetricOnly(conversationId: string, plaintext: string): Promise<WireEnvelope> {
    await this.identity.ensureReady();
    const key = await this.conversationKeys.getOrCreate(conversationId);
    return envelopeToWire(await encryptSymmetric(plaintext, key));
  }

  /**
   * Open an envelope with the cached conversation key.
   * @throws AuthenticationFailedError when no key is cached or the envelope does not verify.
   */
  async decrypt(conversationId: string, wire: unknown): Promise<string> {
    await this.identity.ensureReady();
    const envelope = parseWireEnvelope(wire);
    const key = await this.conversationKeys.get(conversationId);
    if (!key) {
      throw new AuthenticationFailedError("No key is cached for this conversation");
    }
    return decryptSymmetric(envelope, key);
  }

  /** Open a server reply whose key was wrapped for the legacy RSA identity. */
  async decryptWithLegacyIdentity(wire: unknown): Promise<string> {
    await this.identity.ensureReady();
    const legacy = this.identity.getLegacyIdentity();
    if (!legacy) {
      throw new KeysUnavailableError("No legacy RSA identity is loaded");
    }
    return openHybridEnvelope(parseWireEnvelope(wire), legacy.privateKey);
  }
}
