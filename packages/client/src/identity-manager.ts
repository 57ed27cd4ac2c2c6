/**
 * Long-term identity lifecycle: load-or-generate on init, seed import,
 * recovery phrase and QR export, signing and key agreement.
 *
 * The 32-byte seed is the only persisted secret (hex, in the key store).
 * The Ed25519 keypair is re-derived from it on every start, and the X25519
 * agreement key is mapped from the same seed, so the recovery phrase backs
 * up both.
 *
 * @module identity-manager
 */
import {
  assertSeed,
  createSeedBackup,
  deriveConversationKey,
  deriveIdentityKeypair,
  deriveSharedSecret,
  encodePrivateKeyPEM,
  encodePublicKeyPEM,
  generateIdentitySeed,
  KeysUnavailableError,
  mnemonicFromSeed,
  publicPart,
  restoreSeedBackup,
  seedFromMnemonic,
  seedToQrFrames,
  signDetached,
  toBase64,
  toHex,
  verifySignature,
  type Argon2Params,
  type IdentityKeypair,
  type SeedBackupPayload,
} from "@otto/crypto";
import type { ConversationKeyCache, ConversationKeyDeriver } from "./conversation-keys.js";
import { IdentityPhase, transitionTo } from "./identity-state.js";
import type { Logger } from "./logger.js";
import {
  LEGACY_EXPORT_TYPE,
  legacyKeyExportSchema,
  seedBackupSchema,
  type LegacyKeyExport,
} from "./schema.js";
import { StorageKeys, type SecureKeyStore } from "./secure-store.js";
import {
  detectStoredIdentity,
  parseLegacyIdentity,
  type LegacyRsaIdentity,
} from "./stored-identity.js";

export interface IdentityKeyManagerOptions {
  /** Cleared whenever the seed is replaced. */
  conversationKeys?: ConversationKeyCache;
  /** Seed-to-keypair derivation; defaults to Ed25519 from @otto/crypto. */
  deriveKeypair?: (seed: Uint8Array) => Promise<IdentityKeypair>;
}

export class IdentityKeyManager implements ConversationKeyDeriver {
  private phase = IdentityPhase.UNINITIALIZED;
  private identity: IdentityKeypair | null = null;
  private legacy: LegacyRsaIdentity | null = null;
  private justGenerated = false;
  private migrated = false;
  private initializing: Promise<void> | null = null;
  /** Tail of the chain every seed write (init, migration, import) runs on. */
  private seedWrites: Promise<void> | null = null;
  private readonly conversationKeys: ConversationKeyCache | undefined;
  private readonly derive: (seed: Uint8Array) => Promise<IdentityKeypair>;

  constructor(
    private readonly store: SecureKeyStore,
    private readonly logger: Logger,
    options: IdentityKeyManagerOptions = {},
  ) {
    this.conversationKeys = options.conversationKeys;
    this.derive = options.deriveKeypair ?? deriveIdentityKeypair;
  }

  get currentPhase(): IdentityPhase {
    return this.phase;
  }

  /** True when this session created the seed (fresh install or migration). */
  get keysWereJustGenerated(): boolean {
    return this.justGenerated;
  }

  /** Read and clear the generation flag; the auth layer uploads once per generation. */
  consumeKeysWereJustGenerated(): boolean {
    const value = this.justGenerated;
    this.justGenerated = false;
    return value;
  }

  /** True when the seed was created to replace a legacy RSA identity. */
  get migratedFromLegacy(): boolean {
    return this.migrated;
  }

  /** The identity lives only in memory and will not survive a restart. */
  get isEphemeral(): boolean {
    return this.store.isEphemeral;
  }

  private enter(to: IdentityPhase): void {
    this.phase = transitionTo(this.phase, to);
  }

  // --- Initialization ---

  /**
   * Run `task` after every earlier seed write has settled, so no two of
   * them interleave their storage reads and writes.
   */
  private serializeSeedWrite(task: () => Promise<void>): Promise<void> {
    const previous = this.seedWrites ?? Promise.resolve();
    // An earlier write's failure belongs to its own caller.
    const run = previous.then(task, task);
    const tail: Promise<void> = run.finally(() => {
      if (this.seedWrites === tail) this.seedWrites = null;
    });
    this.seedWrites = tail;
    return tail;
  }

  /**
   * Load the stored seed or create one. Concurrent calls share a single
   * attempt, queued behind any seed import in flight; once initialized
   * this is a no-op.
   * @throws KeysUnavailableError if the identity cannot be established.
   */
  initializeKeys(): Promise<void> {
    if (this.phase === IdentityPhase.INITIALIZED && this.identity && !this.seedWrites) {
      return Promise.resolve();
    }
    if (!this.initializing) {
      this.initializing = this.serializeSeedWrite(() => this.runInitialization()).finally(() => {
        this.initializing = null;
      });
    }
    return this.initializing;
  }

  private async runInitialization(): Promise<void> {
    // A seed import queued ahead of this attempt already settled the identity.
    if (this.phase === IdentityPhase.INITIALIZED && this.identity) return;
    this.justGenerated = false;
    try {
      const stored = await detectStoredIdentity(this.store);
      switch (stored.kind) {
        case "seed":
          this.identity = await this.derive(stored.seed);
          this.legacy = stored.legacy;
          this.logger.info("Loaded identity from stored seed");
          break;
        case "legacy-rsa":
          if (stored.discardedSeed) await this.discardStoredSeed();
          await this.migrateLegacyIdentity(stored.legacy);
          break;
        case "none":
          if (stored.discardedSeed) await this.discardStoredSeed();
          await this.generateIdentity();
          break;
      }
      this.enter(IdentityPhase.INITIALIZED);
      if (this.store.isEphemeral) {
        this.logger.warn("Identity is held in memory only and will be lost on restart");
      }
    } catch (err) {
      this.identity = null;
      this.enter(IdentityPhase.DEGRADED);
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.error(`Cannot initialize secure identity: ${reason}`);
      throw new KeysUnavailableError("Cannot initialize secure identity", { cause: err });
    }
  }

  private async discardStoredSeed(): Promise<void> {
    this.logger.warn("Stored identity seed is malformed; discarding it");
    await this.store.delete(StorageKeys.IDENTITY_SEED_HEX);
  }

  private async generateIdentity(): Promise<void> {
    const seed = await generateIdentitySeed();
    this.identity = await this.derive(seed);
    await this.store.writeText(StorageKeys.IDENTITY_SEED_HEX, toHex(seed));
    this.justGenerated = true;
    this.logger.info("Generated new identity seed");
  }

  /**
   * Replace a legacy RSA identity with a fresh seed. The RSA pair stays
   * loaded (and stored) until {@link retireLegacyIdentity}, so envelopes
   * already addressed to it can still be opened.
   */
  private async migrateLegacyIdentity(legacy: LegacyRsaIdentity): Promise<void> {
    await this.generateIdentity();
    this.legacy = legacy;
    this.migrated = true;
    this.logger.info("Migrated legacy RSA identity to a seed identity");
  }

  private async ready(): Promise<IdentityKeypair> {
    if (this.phase !== IdentityPhase.INITIALIZED || !this.identity || this.seedWrites) {
      await this.initializeKeys();
    }
    if (!this.identity) {
      throw new KeysUnavailableError("Identity is not initialized");
    }
    return this.identity;
  }

  /** Resolve once an identity is available; chat must not proceed otherwise. */
  async ensureReady(): Promise<void> {
    await this.ready();
  }

  // --- Seed replacement ---

  /**
   * Overwrite the stored seed with an imported one. Destructive: the old
   * seed is gone and cached conversation keys are dropped. Runs in turn
   * with initialization, so a concurrent lazy init cannot write over it.
   * A seed that fails to derive leaves the current identity in place.
   */
  async importIdentitySeed(seed: Uint8Array): Promise<void> {
    assertSeed(seed);
    const copy = Uint8Array.from(seed);
    await this.serializeSeedWrite(() => this.replaceSeed(copy));
  }

  private async replaceSeed(seed: Uint8Array): Promise<void> {
    let keypair: IdentityKeypair;
    try {
      keypair = await this.derive(seed);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.error(`Imported identity seed could not be derived: ${reason}`);
      throw new KeysUnavailableError("Failed to import identity seed", { cause: err });
    }
    await this.store.writeText(StorageKeys.IDENTITY_SEED_HEX, toHex(seed));
    this.identity = keypair;
    this.justGenerated = false;
    this.conversationKeys?.clear();
    this.enter(IdentityPhase.INITIALIZED);
    this.logger.info("Imported identity seed");
  }

  mnemonicFromSeed(seed: Uint8Array): string {
    return mnemonicFromSeed(seed);
  }

  seedFromMnemonic(phrase: string): Uint8Array {
    return seedFromMnemonic(phrase);
  }

  /** @throws InvalidMnemonicError before touching storage. */
  async importMnemonic(phrase: string): Promise<void> {
    await this.importIdentitySeed(seedFromMnemonic(phrase));
  }

  async exportMnemonic(): Promise<string> {
    return mnemonicFromSeed((await this.ready()).seed);
  }

  async exportQrFrames(): Promise<string[]> {
    return seedToQrFrames((await this.ready()).seed);
  }

  async createBackup(passphrase: string, params?: Argon2Params): Promise<SeedBackupPayload> {
    return createSeedBackup((await this.ready()).seed, passphrase, params);
  }

  /**
   * Restore from a passphrase backup and import the recovered seed.
   * @throws AuthenticationFailedError on a wrong passphrase.
   */
  async restoreBackup(payload: unknown, passphrase: string): Promise<void> {
    const parsed = seedBackupSchema.parse(payload);
    const seed = await restoreSeedBackup(parsed, passphrase);
    await this.importIdentitySeed(seed);
  }

  // --- Identity use ---

  /** A copy of the seed, for backup flows. */
  async getIdentitySeed(): Promise<Uint8Array> {
    return Uint8Array.from((await this.ready()).seed);
  }

  async getPublicKey(): Promise<Uint8Array> {
    return Uint8Array.from((await this.ready()).publicKey);
  }

  async getPublicKeyBase64(): Promise<string> {
    return toBase64((await this.ready()).publicKey);
  }

  async sign(data: Uint8Array): Promise<Uint8Array> {
    return signDetached(data, await this.ready());
  }

  /** Verify against `publicKey`, or our own identity when omitted. */
  async verify(signature: Uint8Array, data: Uint8Array, publicKey?: Uint8Array): Promise<boolean> {
    return verifySignature(signature, data, publicKey ?? (await this.ready()).publicKey);
  }

  /** X25519 secret shared with the owner of `remotePublicKey` (Ed25519). */
  async deriveSharedSecret(remotePublicKey: Uint8Array): Promise<Uint8Array> {
    return deriveSharedSecret((await this.ready()).seed, remotePublicKey);
  }

  async deriveConversationKey(
    remotePublicKey: Uint8Array,
    conversationId: string,
  ): Promise<Uint8Array> {
    const secret = await this.deriveSharedSecret(remotePublicKey);
    return deriveConversationKey(secret, conversationId);
  }

  // --- Legacy RSA identity ---

  /** The RSA identity still inside its migration window, if any. */
  getLegacyIdentity(): LegacyRsaIdentity | null {
    return this.legacy;
  }

  /**
   * Import a legacy `otto_e2ee_keypair` export. The pair is stored in the
   * legacy slots and usable for opening old envelopes; the seed identity
   * is unaffected.
   */
  async importLegacyExport(payload: unknown): Promise<void> {
    const parsed = legacyKeyExportSchema.parse(payload);
    const legacy = parseLegacyIdentity(parsed.private_key_pem, parsed.public_key_pem);
    await this.store.writeText(StorageKeys.LEGACY_PRIVATE_KEY_PEM, legacy.privateKeyPem);
    await this.store.writeText(StorageKeys.LEGACY_PUBLIC_KEY_PEM, legacy.publicKeyPem);
    this.legacy = legacy;
    this.logger.info("Imported legacy RSA identity");
  }

  exportLegacyIdentity(): LegacyKeyExport | null {
    if (!this.legacy) return null;
    return {
      version: 1,
      type: LEGACY_EXPORT_TYPE,
      private_key_pem: encodePrivateKeyPEM(this.legacy.privateKey),
      public_key_pem: encodePublicKeyPEM(publicPart(this.legacy.privateKey)),
    };
  }

  /** End the migration window: delete the legacy PEMs. */
  async retireLegacyIdentity(): Promise<void> {
    await this.store.delete(StorageKeys.LEGACY_PRIVATE_KEY_PEM);
    await this.store.delete(StorageKeys.LEGACY_PUBLIC_KEY_PEM);
    if (this.legacy) this.logger.info("Retired legacy RSA identity");
    this.legacy = null;
  }
}
