import { logger } from "../logging/logger.js";
import {
    deriveSubKey,
    EncryptKeyPair,
    generateEncryptKeyPair,
    generateSignKeyPair,
    generateSymmetricKey,
    keyFingerprint,
    sign,
    SignKeyPair
} from "./primitives.js";

/**
 * Standard interface for purpose-bound key derivation.
 */
export interface KeyManager {
    /**
     * Derives a purpose-bound key (e.g. 'access-container/entry', 'config/root').
     */
    deriveKey(purpose: string): Promise<Buffer>;
}

/**
 * Key bundle issued to an application on a successful grant. Owned by the granted
 * App context until revocation.
 */
export interface AppKeys {
    /** Signing public key of the account owner that granted the keys */
    readonly ownerKey: Buffer;
    /** Symmetric data-encryption key */
    readonly encKey: Buffer;
    readonly signPk: Buffer;
    readonly signSk: Buffer;
    readonly encPk: Buffer;
    readonly encSk: Buffer;
}

/**
 * Owns one context's signing and encryption keypairs plus the symmetric root key.
 */
export class CryptoKeyStore implements KeyManager {
    constructor(
        readonly signKeys: SignKeyPair,
        readonly encKeys: EncryptKeyPair,
        private readonly rootKey: Buffer,
        readonly ownerKey: Buffer = signKeys.publicKey
    ) { }

    static generate(): CryptoKeyStore {
        return new CryptoKeyStore(generateSignKeyPair(), generateEncryptKeyPair(), generateSymmetricKey());
    }

    static fromAppKeys(keys: AppKeys): CryptoKeyStore {
        return new CryptoKeyStore(
            { publicKey: keys.signPk, secretKey: keys.signSk },
            { publicKey: keys.encPk, secretKey: keys.encSk },
            keys.encKey,
            keys.ownerKey
        );
    }

    get signPublicKey(): Buffer {
        return this.signKeys.publicKey;
    }

    get symmetricKey(): Buffer {
        return this.rootKey;
    }

    async deriveKey(purpose: string): Promise<Buffer> {
        cryptoAudit.logKeyUsage(purpose, keyFingerprint(this.signKeys.publicKey));
        return deriveSubKey(this.rootKey, purpose);
    }

    signPayload(payload: Uint8Array): Buffer {
        return sign(payload, this.signKeys.secretKey);
    }

    /**
     * Issues a fresh key bundle for an application, bound to this store's owner key.
     */
    issueAppKeys(): AppKeys {
        const signKeys = generateSignKeyPair();
        const encKeys = generateEncryptKeyPair();
        const appKeys: AppKeys = {
            ownerKey: this.ownerKey,
            encKey: generateSymmetricKey(),
            signPk: signKeys.publicKey,
            signSk: signKeys.secretKey,
            encPk: encKeys.publicKey,
            encSk: encKeys.secretKey
        };
        cryptoAudit.logKeyUsage('app-keys/issue', keyFingerprint(appKeys.signPk));
        return appKeys;
    }
}

/**
 * Logging discipline: key material never reaches logs, only purpose and fingerprint.
 */
export const cryptoAudit = {
    logKeyUsage: (purpose: string, keyId: string) => {
        logger.debug({ purpose, keyId }, "Cryptographic key usage");
    }
};
