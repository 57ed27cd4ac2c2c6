/**
 * @otto/client: stateful E2EE services for the Otto chat client.
 *
 * `createE2eeClient` is the composition root: it builds every service
 * once per process and hands out the same instances to all consumers.
 */
import { loadConfig, type ClientConfig } from "./config.js";
import { ConversationKeyCache } from "./conversation-keys.js";
import { IdentityKeyManager } from "./identity-manager.js";
import { createLogger, type Logger } from "./logger.js";
import { MessageCrypto } from "./message-crypto.js";
import { FileSecureBackend, SecureKeyStore, type SecureBackend } from "./secure-store.js";
import { HybridServerChannel, type FetchLike } from "./server-channel.js";

export interface E2eeClientOptions {
  /** Defaults to a {@link FileSecureBackend} at `config.keystorePath`. */
  backend?: SecureBackend;
  logger?: Logger;
  fetch?: FetchLike;
}

export interface StartResult {
  keysWereJustGenerated: boolean;
  isEphemeral: boolean;
  serverKeyAvailable: boolean;
}

export interface E2eeClient {
  readonly config: ClientConfig;
  readonly logger: Logger;
  readonly store: SecureKeyStore;
  readonly identity: IdentityKeyManager;
  readonly conversationKeys: ConversationKeyCache;
  readonly serverChannel: HybridServerChannel;
  readonly messages: MessageCrypto;
  /**
   * Initialize the identity, then fetch the server key. An identity
   * failure rejects with KeysUnavailableError; a server key failure is
   * logged and reported in the result.
   */
  start(): Promise<StartResult>;
}

export function createE2eeClient(
  config: ClientConfig = loadConfig(),
  options: E2eeClientOptions = {},
): E2eeClient {
  const logger =
    options.logger ?? createLogger({ level: config.logLevel, timestamps: config.logTimestamps });
  const store = new SecureKeyStore(
    options.backend ?? new FileSecureBackend(config.keystorePath),
    logger.child("store"),
  );
  const conversationKeys = new ConversationKeyCache(logger.child("conversations"));
  const identity = new IdentityKeyManager(store, logger.child("identity"), { conversationKeys });
  const serverChannel = new HybridServerChannel(store, logger.child("server-key"), {
    baseUrl: config.baseUrl,
    timeoutMs: config.fetchTimeoutMs,
    fetch: options.fetch,
  });
  const messages = new MessageCrypto(identity, conversationKeys, serverChannel);

  async function start(): Promise<StartResult> {
    await identity.initializeKeys();
    let serverKeyAvailable = true;
    try {
      await serverChannel.fetchServerPublicKey();
    } catch (err) {
      serverKeyAvailable = false;
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn(`Starting without a server public key: ${reason}`);
    }
    return {
      keysWereJustGenerated: identity.keysWereJustGenerated,
      isEphemeral: identity.isEphemeral,
      serverKeyAvailable,
    };
  }

  return { config, logger, store, identity, conversationKeys, serverChannel, messages, start };
}

export { loadConfig } from "./config.js";
export type { ClientConfig, LogLevel } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";
export {
  StorageKeys,
  MemoryBackend,
  FileSecureBackend,
  SecureKeyStore,
} from "./secure-store.js";
export type { SecureBackend, StoreMode } from "./secure-store.js";
export { detectStoredIdentity, parseLegacyIdentity, parseSeedHex } from "./stored-identity.js";
export type { LegacyRsaIdentity, StoredIdentity } from "./stored-identity.js";
export { IdentityPhase, InvalidTransitionError, transitionTo } from "./identity-state.js";
export { IdentityKeyManager } from "./identity-manager.js";
export type { IdentityKeyManagerOptions } from "./identity-manager.js";
export { ConversationKeyCache } from "./conversation-keys.js";
export type { ConversationKeyDeriver, KeyFactory } from "./conversation-keys.js";
export { HybridServerChannel, SERVER_PUBLIC_KEY_PATH } from "./server-channel.js";
export type { FetchLike, ServerChannelOptions, ServerKeySource } from "./server-channel.js";
export { MessageCrypto, parseWireEnvelope } from "./message-crypto.js";
export {
  LEGACY_EXPORT_TYPE,
  legacyKeyExportSchema,
  seedBackupSchema,
  serverPublicKeyResponseSchema,
  wireEnvelopeSchema,
} from "./schema.js";
export type { LegacyKeyExport } from "./schema.js";
