/**
 * Handle-based crypto operations exposed to an application context.
 */

import { CoreError } from '../errors/CoreError.js';
import { Handle } from '../registry/CapabilityRegistry.js';
import type { ContextRegistry } from '../context/objects.js';
import { CryptoKeyStore } from './keyManager.js';
import {
    boxDecrypt,
    boxEncrypt,
    generateEncryptKeyPair,
    sealDecrypt,
    sealEncrypt,
    sha3Hash
} from './primitives.js';

const RAW_KEY_BYTES = 32;

type KeyKind = 'signPublicKey' | 'encPublicKey' | 'encSecretKey';

const KEY_KINDS: ReadonlySet<string> = new Set<KeyKind>(['signPublicKey', 'encPublicKey', 'encSecretKey']);

function checkLength(raw: Buffer, label: string): Buffer {
    if (raw.length !== RAW_KEY_BYTES) {
        throw new CoreError('CryptoError', `${label} must be ${RAW_KEY_BYTES} bytes, got ${raw.length}`);
    }
    return Buffer.from(raw);
}

export class CryptoHandles {
    constructor(
        private readonly registry: ContextRegistry,
        private readonly keys: CryptoKeyStore | null
    ) { }

    appPubSignKey(): Handle<'signPublicKey'> {
        return this.registry.create('signPublicKey', this.appKeys().signPublicKey);
    }

    appPubEncKey(): Handle<'encPublicKey'> {
        return this.registry.create('encPublicKey', this.appKeys().encKeys.publicKey);
    }

    signPubKeyNew(raw: Buffer): Handle<'signPublicKey'> {
        return this.registry.create('signPublicKey', checkLength(raw, 'Signing public key'));
    }

    signPubKeyGet(handle: Handle<'signPublicKey'>): Buffer {
        return Buffer.from(this.registry.resolve(handle, 'signPublicKey'));
    }

    encPubKeyNew(raw: Buffer): Handle<'encPublicKey'> {
        return this.registry.create('encPublicKey', checkLength(raw, 'Encryption public key'));
    }

    encPubKeyGet(handle: Handle<'encPublicKey'>): Buffer {
        return Buffer.from(this.registry.resolve(handle, 'encPublicKey'));
    }

    encSecretKeyNew(raw: Buffer): Handle<'encSecretKey'> {
        return this.registry.create('encSecretKey', checkLength(raw, 'Encryption secret key'));
    }

    encSecretKeyGet(handle: Handle<'encSecretKey'>): Buffer {
        return Buffer.from(this.registry.resolve(handle, 'encSecretKey'));
    }

    encGenerateKeyPair(): { publicKey: Handle<'encPublicKey'>; secretKey: Handle<'encSecretKey'> } {
        const pair = generateEncryptKeyPair();
        return {
            publicKey: this.registry.create('encPublicKey', pair.publicKey),
            secretKey: this.registry.create('encSecretKey', pair.secretKey)
        };
    }

    encryptSealedBox(data: Buffer, recipient: Handle<'encPublicKey'>): Buffer {
        return sealEncrypt(data, this.registry.resolve(recipient, 'encPublicKey'));
    }

    decryptSealedBox(data: Buffer, publicKey: Handle<'encPublicKey'>, secretKey: Handle<'encSecretKey'>): Buffer {
        return sealDecrypt(data, {
            publicKey: this.registry.resolve(publicKey, 'encPublicKey'),
            secretKey: this.registry.resolve(secretKey, 'encSecretKey')
        });
    }

    encrypt(data: Buffer, peer: Handle<'encPublicKey'>, ours: Handle<'encSecretKey'>): Buffer {
        return boxEncrypt(data, this.registry.resolve(peer, 'encPublicKey'), this.registry.resolve(ours, 'encSecretKey'));
    }

    decrypt(data: Buffer, peer: Handle<'encPublicKey'>, ours: Handle<'encSecretKey'>): Buffer {
        return boxDecrypt(data, this.registry.resolve(peer, 'encPublicKey'), this.registry.resolve(ours, 'encSecretKey'));
    }

    sha3Hash(data: Buffer): Buffer {
        return sha3Hash(data);
    }

    free(handle: Handle<KeyKind>): void {
        const kind = this.registry.kindOf(handle);
        if (!KEY_KINDS.has(kind)) {
            throw new CoreError('HandleTypeMismatch', `Expected a key handle, got ${kind}`);
        }
        this.registry.free(handle);
    }

    private appKeys(): CryptoKeyStore {
        if (!this.keys) {
            throw new CoreError('PermissionDenied', 'Unregistered contexts hold no app keys');
        }
        return this.keys;
    }
}
