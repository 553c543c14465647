/**
 * Unit Tests: CryptoKeyStore and handle-based crypto
 *
 * @see libs/crypto/keyManager.ts
 * @see libs/crypto/handles.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { CryptoKeyStore } from '../../libs/crypto/keyManager.js';
import { CryptoHandles } from '../../libs/crypto/handles.js';
import { sha3Hash, verify } from '../../libs/crypto/primitives.js';
import { CapabilityRegistry, Handle } from '../../libs/registry/CapabilityRegistry.js';
import type { ContextObjects, ContextRegistry } from '../../libs/context/objects.js';

describe('CryptoKeyStore', () => {
    it('should issue app keys bound to its owner key', () => {
        const store = CryptoKeyStore.generate();
        const appKeys = store.issueAppKeys();

        assert.deepStrictEqual(appKeys.ownerKey, store.signPublicKey);
        for (const key of [appKeys.encKey, appKeys.signPk, appKeys.signSk, appKeys.encPk, appKeys.encSk]) {
            assert.strictEqual(key.length, 32);
        }
        assert.notDeepStrictEqual(appKeys.signPk, store.signPublicKey);
    });

    it('should rebuild an app store from granted keys', () => {
        const owner = CryptoKeyStore.generate();
        const appKeys = owner.issueAppKeys();
        const appStore = CryptoKeyStore.fromAppKeys(appKeys);

        assert.deepStrictEqual(appStore.signPublicKey, appKeys.signPk);
        assert.deepStrictEqual(appStore.ownerKey, owner.signPublicKey);
        assert.deepStrictEqual(appStore.symmetricKey, appKeys.encKey);
    });

    it('should sign payloads verifiable with its public key', () => {
        const store = CryptoKeyStore.generate();
        const payload = Buffer.from('request');
        assert.strictEqual(verify(payload, store.signPayload(payload), store.signPublicKey), true);
    });

    it('should derive purpose-bound keys', async () => {
        const store = CryptoKeyStore.generate();
        const first = await store.deriveKey('config/root');
        assert.deepStrictEqual(await store.deriveKey('config/root'), first);
        assert.notDeepStrictEqual(await store.deriveKey('access-container/entry'), first);
    });
});

describe('CryptoHandles', () => {
    let registry: ContextRegistry;
    let keys: CryptoKeyStore;
    let crypto: CryptoHandles;

    beforeEach(() => {
        registry = new CapabilityRegistry<ContextObjects>();
        keys = CryptoKeyStore.generate();
        crypto = new CryptoHandles(registry, keys);
    });

    it('should expose the app public keys as handles', () => {
        assert.deepStrictEqual(crypto.signPubKeyGet(crypto.appPubSignKey()), keys.signPublicKey);
        assert.deepStrictEqual(crypto.encPubKeyGet(crypto.appPubEncKey()), keys.encKeys.publicKey);
    });

    it('should refuse app keys in an unregistered context', () => {
        const unregistered = new CryptoHandles(registry, null);
        assert.throws(() => unregistered.appPubSignKey(), { kind: 'PermissionDenied' });
    });

    it('should round-trip a sealed box through handles', () => {
        const pair = crypto.encGenerateKeyPair();
        const sealed = crypto.encryptSealedBox(Buffer.from('secret note'), pair.publicKey);
        assert.deepStrictEqual(crypto.decryptSealedBox(sealed, pair.publicKey, pair.secretKey), Buffer.from('secret note'));
    });

    it('should round-trip a box between two handle keypairs', () => {
        const alice = crypto.encGenerateKeyPair();
        const bob = crypto.encGenerateKeyPair();
        const sealed = crypto.encrypt(Buffer.from('hi bob'), bob.publicKey, alice.secretKey);
        assert.deepStrictEqual(crypto.decrypt(sealed, alice.publicKey, bob.secretKey), Buffer.from('hi bob'));
    });

    it('should validate raw key lengths', () => {
        assert.throws(() => crypto.encPubKeyNew(Buffer.alloc(31)), { kind: 'CryptoError' });
        assert.throws(() => crypto.encSecretKeyNew(Buffer.alloc(33)), { kind: 'CryptoError' });
        const handle = crypto.signPubKeyNew(Buffer.alloc(32, 1));
        assert.deepStrictEqual(crypto.signPubKeyGet(handle), Buffer.alloc(32, 1));
    });

    it('should free key handles and reject other kinds', () => {
        const pair = crypto.encGenerateKeyPair();
        crypto.free(pair.publicKey);
        assert.throws(() => crypto.encPubKeyGet(pair.publicKey), { kind: 'HandleInvalid' });

        const cipherOpt = registry.create('cipherOpt', { kind: 'PlainText' });
        const asKey: Handle<'encPublicKey'> = { context: cipherOpt.context, index: cipherOpt.index, generation: cipherOpt.generation };
        assert.throws(() => crypto.free(asKey), { kind: 'HandleTypeMismatch' });
    });

    it('should hash with SHA3-256', () => {
        assert.deepStrictEqual(crypto.sha3Hash(Buffer.from('abc')), sha3Hash(Buffer.from('abc')));
    });
});
