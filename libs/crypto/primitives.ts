/**
 * Raw cryptographic primitives.
 *
 * Keys are carried as raw 32-byte buffers and converted to KeyObjects at the call site:
 * Ed25519 for signatures, X25519 + HKDF-SHA256 for key agreement, AES-256-GCM for
 * authenticated encryption (nonce || ciphertext || tag), SHA3-256 for content addressing.
 */

import {
    createCipheriv,
    createDecipheriv,
    createHash,
    createHmac,
    createPrivateKey,
    createPublicKey,
    diffieHellman,
    generateKeyPairSync,
    hkdfSync,
    KeyObject,
    randomBytes,
    sign as cryptoSign,
    verify as cryptoVerify
} from 'node:crypto';
import { CoreError } from '../errors/CoreError.js';

export const SYMMETRIC_KEY_BYTES = 32;
export const NONCE_BYTES = 12;
export const TAG_BYTES = 16;
export const PUBLIC_KEY_BYTES = 32;
export const SIGNATURE_BYTES = 64;

const ED25519_PKCS8_PREFIX = Buffer.from('302e020100300506032b657004220420', 'hex');
const ED25519_SPKI_PREFIX = Buffer.from('302a300506032b6570032100', 'hex');
const X25519_PKCS8_PREFIX = Buffer.from('302e020100300506032b656e04220420', 'hex');
const X25519_SPKI_PREFIX = Buffer.from('302a300506032b656e032100', 'hex');

export interface SignKeyPair {
    readonly publicKey: Buffer;
    readonly secretKey: Buffer;
}

export interface EncryptKeyPair {
    readonly publicKey: Buffer;
    readonly secretKey: Buffer;
}

// ──────────────── Hashing ────────────────

export function sha3Hash(data: Uint8Array): Buffer {
    return createHash('sha3-256').update(data).digest();
}

export function sha256Hash(data: Uint8Array): Buffer {
    return createHash('sha256').update(data).digest();
}

/**
 * Short, log-safe label for a public key.
 */
export function keyFingerprint(publicKey: Uint8Array): string {
    return sha256Hash(publicKey).subarray(0, 8).toString('hex');
}

// ──────────────── Random material ────────────────

export function generateNonce(): Buffer {
    return randomBytes(NONCE_BYTES);
}

export function generateSymmetricKey(): Buffer {
    return randomBytes(SYMMETRIC_KEY_BYTES);
}

// ──────────────── Keypairs ────────────────

export function generateSignKeyPair(): SignKeyPair {
    const { publicKey, privateKey } = generateKeyPairSync('ed25519');
    return {
        publicKey: publicKey.export({ format: 'der', type: 'spki' }).subarray(ED25519_SPKI_PREFIX.length),
        secretKey: privateKey.export({ format: 'der', type: 'pkcs8' }).subarray(ED25519_PKCS8_PREFIX.length)
    };
}

export function generateEncryptKeyPair(seed?: Uint8Array): EncryptKeyPair {
    if (seed) {
        const privateKey = x25519Private(seed);
        return {
            publicKey: createPublicKey(privateKey).export({ format: 'der', type: 'spki' }).subarray(X25519_SPKI_PREFIX.length),
            secretKey: Buffer.from(seed)
        };
    }
    const { publicKey, privateKey } = generateKeyPairSync('x25519');
    return {
        publicKey: publicKey.export({ format: 'der', type: 'spki' }).subarray(X25519_SPKI_PREFIX.length),
        secretKey: privateKey.export({ format: 'der', type: 'pkcs8' }).subarray(X25519_PKCS8_PREFIX.length)
    };
}

function importKey(factory: () => KeyObject, label: string): KeyObject {
    try {
        return factory();
    } catch (err: unknown) {
        throw new CoreError('CryptoError', `Malformed ${label}`, { cause: err });
    }
}

function ed25519Private(secretKey: Uint8Array): KeyObject {
    return importKey(() => createPrivateKey({
        key: Buffer.concat([ED25519_PKCS8_PREFIX, secretKey]),
        format: 'der',
        type: 'pkcs8'
    }), 'signing secret key');
}

function ed25519Public(publicKey: Uint8Array): KeyObject {
    return importKey(() => createPublicKey({
        key: Buffer.concat([ED25519_SPKI_PREFIX, publicKey]),
        format: 'der',
        type: 'spki'
    }), 'signing public key');
}

function x25519Private(secretKey: Uint8Array): KeyObject {
    return importKey(() => createPrivateKey({
        key: Buffer.concat([X25519_PKCS8_PREFIX, secretKey]),
        format: 'der',
        type: 'pkcs8'
    }), 'encryption secret key');
}

function x25519Public(publicKey: Uint8Array): KeyObject {
    return importKey(() => createPublicKey({
        key: Buffer.concat([X25519_SPKI_PREFIX, publicKey]),
        format: 'der',
        type: 'spki'
    }), 'encryption public key');
}

// ──────────────── Ed25519 ────────────────

export function sign(data: Uint8Array, secretKey: Uint8Array): Buffer {
    return cryptoSign(null, data, ed25519Private(secretKey));
}

export function verify(data: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): boolean {
    if (signature.length !== SIGNATURE_BYTES) {
        return false;
    }
    return cryptoVerify(null, data, ed25519Public(publicKey), signature);
}

// ──────────────── AES-256-GCM ────────────────

export function symmetricEncrypt(plaintext: Uint8Array, key: Uint8Array, nonce: Uint8Array = generateNonce()): Buffer {
    if (key.length !== SYMMETRIC_KEY_BYTES || nonce.length !== NONCE_BYTES) {
        throw new CoreError('CryptoError', 'Symmetric key or nonce has the wrong length');
    }
    const cipher = createCipheriv('aes-256-gcm', key, nonce, { authTagLength: TAG_BYTES });
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]);
}

export function symmetricDecrypt(sealed: Uint8Array, key: Uint8Array): Buffer {
    if (key.length !== SYMMETRIC_KEY_BYTES) {
        throw new CoreError('CryptoError', 'Symmetric key has the wrong length');
    }
    if (sealed.length < NONCE_BYTES + TAG_BYTES) {
        throw new CoreError('CryptoError', 'Ciphertext is too short');
    }
    const nonce = sealed.subarray(0, NONCE_BYTES);
    const tag = sealed.subarray(sealed.length - TAG_BYTES);
    const body = sealed.subarray(NONCE_BYTES, sealed.length - TAG_BYTES);
    try {
        const decipher = createDecipheriv('aes-256-gcm', key, nonce, { authTagLength: TAG_BYTES });
        decipher.setAuthTag(tag);
        return Buffer.concat([decipher.update(body), decipher.final()]);
    } catch (err: unknown) {
        throw new CoreError('CryptoError', 'Decryption failed: wrong key or tampered ciphertext', { cause: err });
    }
}

/**
 * Nonce bound to key and plaintext: identical inputs give identical ciphertexts.
 */
export function deterministicNonce(key: Uint8Array, plaintext: Uint8Array): Buffer {
    return createHmac('sha256', key).update(plaintext).digest().subarray(0, NONCE_BYTES);
}

export function deterministicSymmetricEncrypt(plaintext: Uint8Array, key: Uint8Array): Buffer {
    return symmetricEncrypt(plaintext, key, deterministicNonce(key, plaintext));
}

// ──────────────── X25519 box / sealed box ────────────────

function deriveAgreementKey(secretKey: Uint8Array, publicKey: Uint8Array, salt: Uint8Array, info: string): Buffer {
    let shared: Buffer;
    try {
        shared = diffieHellman({ privateKey: x25519Private(secretKey), publicKey: x25519Public(publicKey) });
    } catch (err: unknown) {
        if (err instanceof CoreError) throw err;
        throw new CoreError('CryptoError', 'Key agreement failed', { cause: err });
    }
    return Buffer.from(hkdfSync('sha256', shared, salt, info, SYMMETRIC_KEY_BYTES));
}

/**
 * Authenticated encryption between two known parties.
 */
export function boxEncrypt(plaintext: Uint8Array, theirPublicKey: Uint8Array, ourSecretKey: Uint8Array): Buffer {
    return symmetricEncrypt(plaintext, deriveAgreementKey(ourSecretKey, theirPublicKey, Buffer.alloc(0), 'meshvault/box'));
}

export function boxDecrypt(sealed: Uint8Array, theirPublicKey: Uint8Array, ourSecretKey: Uint8Array): Buffer {
    return symmetricDecrypt(sealed, deriveAgreementKey(ourSecretKey, theirPublicKey, Buffer.alloc(0), 'meshvault/box'));
}

/**
 * Anonymous encryption to a public key: ephemeralPk || nonce || ciphertext || tag.
 * With `deterministic`, the ephemeral key and nonce derive from the recipient and plaintext.
 */
export function sealEncrypt(plaintext: Uint8Array, recipientPublicKey: Uint8Array, options: { deterministic?: boolean } = {}): Buffer {
    const ephemeral = options.deterministic
        ? generateEncryptKeyPair(createHmac('sha256', recipientPublicKey).update(plaintext).digest())
        : generateEncryptKeyPair();
    const salt = Buffer.concat([ephemeral.publicKey, recipientPublicKey]);
    const key = deriveAgreementKey(ephemeral.secretKey, recipientPublicKey, salt, 'meshvault/seal');
    const nonce = options.deterministic ? deterministicNonce(key, plaintext) : generateNonce();
    return Buffer.concat([ephemeral.publicKey, symmetricEncrypt(plaintext, key, nonce)]);
}

export function sealDecrypt(sealed: Uint8Array, recipient: EncryptKeyPair): Buffer {
    if (sealed.length < PUBLIC_KEY_BYTES + NONCE_BYTES + TAG_BYTES) {
        throw new CoreError('CryptoError', 'Sealed box is too short');
    }
    const ephemeralPublicKey = sealed.subarray(0, PUBLIC_KEY_BYTES);
    const salt = Buffer.concat([ephemeralPublicKey, recipient.publicKey]);
    const key = deriveAgreementKey(recipient.secretKey, ephemeralPublicKey, salt, 'meshvault/seal');
    return symmetricDecrypt(sealed.subarray(PUBLIC_KEY_BYTES), key);
}

export function deriveSubKey(rootKey: Uint8Array, purpose: string): Buffer {
    return Buffer.from(hkdfSync('sha256', rootKey, 'meshvault', purpose, SYMMETRIC_KEY_BYTES));
}
