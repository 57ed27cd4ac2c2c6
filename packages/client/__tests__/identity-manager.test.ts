import { describe, it, expect, beforeAll } from "vitest";
import {
  initSodium,
  deriveIdentityKeypair,
  encodePrivateKeyPEM,
  encodePublicKeyPEM,
  generateIdentitySeed,
  generateLegacyRsaKeypair,
  publicPart,
  QrFrameAssembler,
  toHex,
  verifySignature,
  InvalidMnemonicError,
  KeyFormatError,
  KeysUnavailableError,
  type CompleteRsaPrivateKey,
  type IdentityKeypair,
} from "@otto/crypto";
import { ConversationKeyCache } from "../src/conversation-keys.js";
import { IdentityKeyManager } from "../src/identity-manager.js";
import { IdentityPhase } from "../src/identity-state.js";
import { silentLogger } from "../src/logger.js";
import { MemoryBackend, SecureKeyStore, StorageKeys } from "../src/secure-store.js";
import { captureLogger, FailingBackend } from "./helpers.js";

const ZERO_PHRASE = `${"abandon ".repeat(23)}art`;
const FAST_BACKUP = { opsLimit: 1, memLimit: 8 * 1024 * 1024 };

let legacyKey: CompleteRsaPrivateKey;
let otherKey: CompleteRsaPrivateKey;

beforeAll(async () => {
  await initSodium();
  legacyKey = await generateLegacyRsaKeypair(1024);
  otherKey = await generateLegacyRsaKeypair(1024);
});

function memoryStore(): SecureKeyStore {
  return new SecureKeyStore(new MemoryBackend(), silentLogger);
}

async function storeLegacyPair(store: SecureKeyStore, key: CompleteRsaPrivateKey): Promise<void> {
  await store.writeText(StorageKeys.LEGACY_PRIVATE_KEY_PEM, encodePrivateKeyPEM(key));
  await store.writeText(StorageKeys.LEGACY_PUBLIC_KEY_PEM, encodePublicKeyPEM(publicPart(key)));
}

describe("initializeKeys", () => {
  it("should generate and persist a seed on first run", async () => {
    const store = memoryStore();
    const manager = new IdentityKeyManager(store, silentLogger);
    expect(manager.currentPhase).toBe(IdentityPhase.UNINITIALIZED);

    await manager.initializeKeys();

    const hex = await store.readText(StorageKeys.IDENTITY_SEED_HEX);
    expect(hex).toMatch(/^[0-9a-f]{64}$/);
    expect(manager.keysWereJustGenerated).toBe(true);
    expect(manager.currentPhase).toBe(IdentityPhase.INITIALIZED);
    expect(await manager.getPublicKey()).toHaveLength(32);
    expect(toHex(await manager.getIdentitySeed())).toBe(hex);
  });

  it("should load the same identity on the next start", async () => {
    const store = memoryStore();
    const first = new IdentityKeyManager(store, silentLogger);
    await first.initializeKeys();

    const second = new IdentityKeyManager(store, silentLogger);
    await second.initializeKeys();
    expect(second.keysWereJustGenerated).toBe(false);
    expect(await second.getPublicKey()).toEqual(await first.getPublicKey());
    expect(await second.getPublicKeyBase64()).toBe(await first.getPublicKeyBase64());
  });

  it("should replace a corrupted seed without throwing", async () => {
    const { logger, lines } = captureLogger();
    const store = memoryStore();
    const corrupted = "ab".repeat(15);
    await store.writeText(StorageKeys.IDENTITY_SEED_HEX, corrupted);

    const manager = new IdentityKeyManager(store, logger);
    await manager.initializeKeys();

    const hex = await store.readText(StorageKeys.IDENTITY_SEED_HEX);
    expect(hex).toMatch(/^[0-9a-f]{64}$/);
    expect(manager.keysWereJustGenerated).toBe(true);
    expect(lines).toContain("[WARN] Stored identity seed is malformed; discarding it");
  });

  it("should replace a seed that is not hex", async () => {
    const store = memoryStore();
    await store.writeText(StorageKeys.IDENTITY_SEED_HEX, "z".repeat(64));
    const manager = new IdentityKeyManager(store, silentLogger);
    await manager.initializeKeys();
    expect(await store.readText(StorageKeys.IDENTITY_SEED_HEX)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("should collapse concurrent initialization into one attempt", async () => {
    let derivations = 0;
    const manager = new IdentityKeyManager(memoryStore(), silentLogger, {
      deriveKeypair: async (seed) => {
        derivations++;
        return deriveIdentityKeypair(seed);
      },
    });

    const [, , publicKey] = await Promise.all([
      manager.initializeKeys(),
      manager.initializeKeys(),
      manager.getPublicKey(),
    ]);
    expect(derivations).toBe(1);
    expect(publicKey).toHaveLength(32);

    await manager.initializeKeys();
    expect(derivations).toBe(1);
  });

  it("should enter the degraded phase and recover on the next call", async () => {
    let failures = 1;
    const store = memoryStore();
    const manager = new IdentityKeyManager(store, silentLogger, {
      deriveKeypair: async (seed): Promise<IdentityKeypair> => {
        if (failures-- > 0) throw new Error("platform crypto unavailable");
        return deriveIdentityKeypair(seed);
      },
    });

    await expect(manager.initializeKeys()).rejects.toThrow(KeysUnavailableError);
    expect(manager.currentPhase).toBe(IdentityPhase.DEGRADED);
    expect(await store.readText(StorageKeys.IDENTITY_SEED_HEX)).toBeNull();

    expect(await manager.getPublicKey()).toHaveLength(32);
    expect(manager.currentPhase).toBe(IdentityPhase.INITIALIZED);
  });

  it("should keep working in memory when secure storage fails", async () => {
    const { logger, lines } = captureLogger();
    const store = new SecureKeyStore(new FailingBackend(), logger);
    const manager = new IdentityKeyManager(store, logger);
    await manager.initializeKeys();

    expect(manager.isEphemeral).toBe(true);
    expect(await manager.getPublicKey()).toHaveLength(32);
    expect(lines).toContain("[WARN] Identity is held in memory only and will be lost on restart");
  });

  it("should hand out the generation flag once", async () => {
    const manager = new IdentityKeyManager(memoryStore(), silentLogger);
    await manager.initializeKeys();
    expect(manager.consumeKeysWereJustGenerated()).toBe(true);
    expect(manager.consumeKeysWereJustGenerated()).toBe(false);
    expect(manager.keysWereJustGenerated).toBe(false);
  });
});

describe("seed import", () => {
  it("should overwrite the stored seed and clear conversation keys", async () => {
    const store = memoryStore();
    const cache = new ConversationKeyCache(silentLogger);
    const manager = new IdentityKeyManager(store, silentLogger, { conversationKeys: cache });
    await manager.initializeKeys();
    const before = await cache.getOrCreate("conv-1");

    const seed = await generateIdentitySeed();
    await manager.importIdentitySeed(seed);

    expect(await store.readText(StorageKeys.IDENTITY_SEED_HEX)).toBe(toHex(seed));
    expect(manager.keysWereJustGenerated).toBe(false);
    expect(cache.size).toBe(0);
    const after = await cache.getOrCreate("conv-1");
    expect(toHex(after)).not.toBe(toHex(before));
    expect(await manager.getPublicKey()).toEqual((await deriveIdentityKeypair(seed)).publicKey);
  });

  it("should work before initialization", async () => {
    const manager = new IdentityKeyManager(memoryStore(), silentLogger);
    await manager.importIdentitySeed(new Uint8Array(32));
    expect(manager.currentPhase).toBe(IdentityPhase.INITIALIZED);
    expect(await manager.getIdentitySeed()).toEqual(new Uint8Array(32));
  });

  it("should keep a seed imported while a lazy initialization starts", async () => {
    const store = memoryStore();
    const manager = new IdentityKeyManager(store, silentLogger);
    const seed = await generateIdentitySeed();
    const data = new Uint8Array([1]);

    const [, signature] = await Promise.all([manager.importIdentitySeed(seed), manager.sign(data)]);

    const imported = await deriveIdentityKeypair(seed);
    expect(await store.readText(StorageKeys.IDENTITY_SEED_HEX)).toBe(toHex(seed));
    expect(await manager.getPublicKey()).toEqual(imported.publicKey);
    expect(await verifySignature(signature, data, imported.publicKey)).toBe(true);
    expect(manager.keysWereJustGenerated).toBe(false);
  });

  it("should apply an import that follows a lazy initialization", async () => {
    const store = memoryStore();
    const manager = new IdentityKeyManager(store, silentLogger);
    const seed = await generateIdentitySeed();

    await Promise.all([manager.getPublicKey(), manager.importIdentitySeed(seed)]);

    expect(await store.readText(StorageKeys.IDENTITY_SEED_HEX)).toBe(toHex(seed));
    expect(await manager.getIdentitySeed()).toEqual(seed);
  });

  it("should keep the current identity when an imported seed fails to derive", async () => {
    const store = memoryStore();
    const manager = new IdentityKeyManager(store, silentLogger, {
      deriveKeypair: async (seed) => {
        if (seed[0] === 0xff) throw new Error("platform crypto unavailable");
        return deriveIdentityKeypair(seed);
      },
    });
    await manager.initializeKeys();
    const hex = await store.readText(StorageKeys.IDENTITY_SEED_HEX);
    const publicKey = await manager.getPublicKey();

    await expect(manager.importIdentitySeed(new Uint8Array(32).fill(0xff))).rejects.toThrow(
      new KeysUnavailableError("Failed to import identity seed"),
    );
    expect(await store.readText(StorageKeys.IDENTITY_SEED_HEX)).toBe(hex);
    expect(manager.currentPhase).toBe(IdentityPhase.INITIALIZED);
    expect(await manager.getPublicKey()).toEqual(publicKey);
  });

  it("should reject a seed of the wrong length", async () => {
    const manager = new IdentityKeyManager(memoryStore(), silentLogger);
    await expect(manager.importIdentitySeed(new Uint8Array(16))).rejects.toThrow(KeyFormatError);
    expect(manager.currentPhase).toBe(IdentityPhase.UNINITIALIZED);
  });

  it("should import and export recovery phrases", async () => {
    const manager = new IdentityKeyManager(memoryStore(), silentLogger);
    await manager.importMnemonic(ZERO_PHRASE.toUpperCase());
    expect(await manager.getIdentitySeed()).toEqual(new Uint8Array(32));
    expect(await manager.exportMnemonic()).toBe(ZERO_PHRASE);
    expect(manager.seedFromMnemonic(manager.mnemonicFromSeed(new Uint8Array(32)))).toEqual(
      new Uint8Array(32),
    );
  });

  it("should leave the stored seed alone for an invalid phrase", async () => {
    const store = memoryStore();
    const manager = new IdentityKeyManager(store, silentLogger);
    await manager.initializeKeys();
    const hex = await store.readText(StorageKeys.IDENTITY_SEED_HEX);

    await expect(manager.importMnemonic("abandon ".repeat(24).trim())).rejects.toThrow(
      InvalidMnemonicError,
    );
    expect(await store.readText(StorageKeys.IDENTITY_SEED_HEX)).toBe(hex);
  });

  it("should transfer the seed through QR frames", async () => {
    const manager = new IdentityKeyManager(memoryStore(), silentLogger);
    await manager.initializeKeys();
    const assembler = new QrFrameAssembler();
    for (const frame of await manager.exportQrFrames()) assembler.accept(frame);
    expect(await assembler.finish()).toEqual(await manager.getIdentitySeed());
  });

  it("should restore from a passphrase backup on another device", async () => {
    const source = new IdentityKeyManager(memoryStore(), silentLogger);
    await source.initializeKeys();
    const backup = JSON.parse(JSON.stringify(await source.createBackup("test-secret", FAST_BACKUP)));

    const target = new IdentityKeyManager(memoryStore(), silentLogger);
    await target.restoreBackup(backup, "test-secret");
    expect(await target.getPublicKey()).toEqual(await source.getPublicKey());
  });

  it("should reject a backup that fails validation", async () => {
    const manager = new IdentityKeyManager(memoryStore(), silentLogger);
    await expect(manager.restoreBackup({ version: 1 }, "test-secret")).rejects.toThrow();
    expect(manager.currentPhase).toBe(IdentityPhase.UNINITIALIZED);
  });
});

describe("identity use", () => {
  it("should sign and verify", async () => {
    const manager = new IdentityKeyManager(memoryStore(), silentLogger);
    const data = new TextEncoder().encode("upload me");
    const signature = await manager.sign(data);
    expect(signature).toHaveLength(64);
    expect(await manager.verify(signature, data)).toBe(true);
    expect(await verifySignature(signature, data, await manager.getPublicKey())).toBe(true);
    expect(await manager.verify(signature, new TextEncoder().encode("other"))).toBe(false);
  });

  it("should agree the same secret and conversation key with a peer", async () => {
    const alice = new IdentityKeyManager(memoryStore(), silentLogger);
    const bob = new IdentityKeyManager(memoryStore(), silentLogger);
    const alicePub = await alice.getPublicKey();
    const bobPub = await bob.getPublicKey();

    expect(toHex(await alice.deriveSharedSecret(bobPub))).toBe(
      toHex(await bob.deriveSharedSecret(alicePub)),
    );
    expect(toHex(await alice.deriveConversationKey(bobPub, "dm-1"))).toBe(
      toHex(await bob.deriveConversationKey(alicePub, "dm-1")),
    );
  });
});

describe("legacy RSA identity", () => {
  it("should migrate a legacy pair to a fresh seed and keep it loaded", async () => {
    const store = memoryStore();
    await storeLegacyPair(store, legacyKey);

    const manager = new IdentityKeyManager(store, silentLogger);
    await manager.initializeKeys();

    expect(manager.migratedFromLegacy).toBe(true);
    expect(manager.keysWereJustGenerated).toBe(true);
    expect(await store.readText(StorageKeys.IDENTITY_SEED_HEX)).toMatch(/^[0-9a-f]{64}$/);
    expect(manager.getLegacyIdentity()?.privateKey).toEqual(legacyKey);

    // Still inside the migration window on the next start.
    const restarted = new IdentityKeyManager(store, silentLogger);
    await restarted.initializeKeys();
    expect(restarted.migratedFromLegacy).toBe(false);
    expect(restarted.keysWereJustGenerated).toBe(false);
    expect(restarted.getLegacyIdentity()?.scheme).toBe("legacy-rsa");
  });

  it("should retire the legacy pair", async () => {
    const store = memoryStore();
    await storeLegacyPair(store, legacyKey);
    const manager = new IdentityKeyManager(store, silentLogger);
    await manager.initializeKeys();

    await manager.retireLegacyIdentity();
    expect(manager.getLegacyIdentity()).toBeNull();
    expect(await store.readText(StorageKeys.LEGACY_PRIVATE_KEY_PEM)).toBeNull();
    expect(await store.readText(StorageKeys.LEGACY_PUBLIC_KEY_PEM)).toBeNull();
  });

  it("should ignore a legacy pair whose halves do not match", async () => {
    const store = memoryStore();
    await store.writeText(StorageKeys.LEGACY_PRIVATE_KEY_PEM, encodePrivateKeyPEM(legacyKey));
    await store.writeText(
      StorageKeys.LEGACY_PUBLIC_KEY_PEM,
      encodePublicKeyPEM(publicPart(otherKey)),
    );
    const manager = new IdentityKeyManager(store, silentLogger);
    await manager.initializeKeys();
    expect(manager.migratedFromLegacy).toBe(false);
    expect(manager.getLegacyIdentity()).toBeNull();
  });

  it("should round-trip the legacy export payload", async () => {
    const payload = {
      version: 1,
      type: "otto_e2ee_keypair",
      private_key_pem: encodePrivateKeyPEM(legacyKey),
      public_key_pem: encodePublicKeyPEM(publicPart(legacyKey)),
    };
    const store = memoryStore();
    const manager = new IdentityKeyManager(store, silentLogger);
    expect(manager.exportLegacyIdentity()).toBeNull();

    await manager.importLegacyExport(payload);
    expect(manager.exportLegacyIdentity()).toEqual(payload);
    expect(await store.readText(StorageKeys.LEGACY_PRIVATE_KEY_PEM)).toBe(payload.private_key_pem);
  });

  it("should reject an export whose public key belongs to another pair", async () => {
    const manager = new IdentityKeyManager(memoryStore(), silentLogger);
    await expect(
      manager.importLegacyExport({
        version: 1,
        type: "otto_e2ee_keypair",
        private_key_pem: encodePrivateKeyPEM(legacyKey),
        public_key_pem: encodePublicKeyPEM(publicPart(otherKey)),
      }),
    ).rejects.toMatchObject({ name: "KeyFormatError", field: "public_key_pem" });
  });

  it("should reject an export with the wrong type marker", async () => {
    const manager = new IdentityKeyManager(memoryStore(), silentLogger);
    await expect(
      manager.importLegacyExport({
        version: 1,
        type: "something_else",
        private_key_pem: encodePrivateKeyPEM(legacyKey),
        public_key_pem: encodePublicKeyPEM(publicPart(legacyKey)),
      }),
    ).rejects.toThrow();
    expect(manager.getLegacyIdentity()).toBeNull();
  });
});
