/**
 * MDataInfo
 *
 * Identity of a mutable record (name + type tag) plus, for private records, the keying
 * material that encrypts entry keys and values. Public records carry no keying material.
 */

import { z } from 'zod';
import { CoreError } from '../errors/CoreError.js';
import {
    generateNonce,
    generateSymmetricKey,
    NONCE_BYTES,
    sha3Hash,
    symmetricDecrypt,
    symmetricEncrypt,
    SYMMETRIC_KEY_BYTES
} from '../crypto/primitives.js';
import { validate } from '../validation/zod-middleware.js';

export const NAME_BYTES = 32;

export interface EncInfo {
    readonly key: Buffer;
    readonly nonce: Buffer;
}

export type MDataKind = 'Public' | 'Private';

const base64 = z.string().transform(value => Buffer.from(value, 'base64'));

const EncInfoSchema = z.object({ key: base64, nonce: base64 }).refine(
    info => info.key.length === SYMMETRIC_KEY_BYTES && info.nonce.length === NONCE_BYTES,
    { message: 'Encryption key or nonce has the wrong length' }
);

export const MDataInfoSchema = z.object({
    name: base64.refine(name => name.length === NAME_BYTES, { message: 'Record name must be 32 bytes' }),
    typeTag: z.number().int().nonnegative(),
    encInfo: EncInfoSchema.optional(),
    newEncInfo: EncInfoSchema.optional()
});

export interface MDataInfoJSON {
    name: string;
    typeTag: number;
    encInfo?: { key: string; nonce: string };
    newEncInfo?: { key: string; nonce: string };
}

function encInfoJSON(info: EncInfo): { key: string; nonce: string } {
    return { key: info.key.toString('base64'), nonce: info.nonce.toString('base64') };
}

export class MDataInfo {
    private constructor(
        readonly name: Buffer,
        readonly typeTag: number,
        readonly encInfo?: EncInfo,
        /** Pending keys while a private record is being re-encrypted */
        readonly newEncInfo?: EncInfo
    ) {
        if (name.length !== NAME_BYTES) {
            throw new CoreError('CryptoError', `Record name must be ${NAME_BYTES} bytes, got ${name.length}`);
        }
    }

    static newPublic(name: Buffer, typeTag: number): MDataInfo {
        return new MDataInfo(name, typeTag);
    }

    static newPrivate(name: Buffer, typeTag: number, encInfo: EncInfo): MDataInfo {
        if (encInfo.key.length !== SYMMETRIC_KEY_BYTES || encInfo.nonce.length !== NONCE_BYTES) {
            throw new CoreError('CryptoError', 'Encryption key or nonce has the wrong length');
        }
        return new MDataInfo(name, typeTag, encInfo);
    }

    static random(kind: MDataKind, typeTag: number): MDataInfo {
        const name = sha3Hash(generateSymmetricKey());
        return kind === 'Public'
            ? MDataInfo.newPublic(name, typeTag)
            : MDataInfo.newPrivate(name, typeTag, { key: generateSymmetricKey(), nonce: generateNonce() });
    }

    static deserialise(serialised: Buffer | string): MDataInfo {
        let raw: unknown;
        try {
            raw = JSON.parse(typeof serialised === 'string' ? serialised : serialised.toString('utf8'));
        } catch (err: unknown) {
            throw new CoreError('DecodeError', 'MDataInfo is not valid JSON', { cause: err });
        }
        return MDataInfo.fromJSON(validate(MDataInfoSchema, raw, 'MDataInfo.deserialise'));
    }

    static fromJSON(parsed: z.infer<typeof MDataInfoSchema>): MDataInfo {
        return new MDataInfo(parsed.name, parsed.typeTag, parsed.encInfo, parsed.newEncInfo);
    }

    get kind(): MDataKind {
        return this.encInfo ? 'Private' : 'Public';
    }

    isPrivate(): boolean {
        return this.encInfo !== undefined;
    }

    /**
     * Deterministic: the same plaintext key always maps to the same stored key,
     * so entries can be looked up by plaintext.
     */
    encryptEntryKey(key: Buffer): Buffer {
        if (!this.encInfo) {
            return key;
        }
        const nonce = sha3Hash(Buffer.concat([key, this.encInfo.nonce])).subarray(0, NONCE_BYTES);
        return symmetricEncrypt(key, this.encInfo.key, nonce);
    }

    encryptEntryValue(value: Buffer): Buffer {
        return this.encInfo ? symmetricEncrypt(value, this.encInfo.key) : value;
    }

    /**
     * Decrypts an entry key or value. Falls back to the pending keys while a re-encryption
     * is in progress.
     */
    decrypt(ciphertext: Buffer): Buffer {
        if (!this.encInfo) {
            return ciphertext;
        }
        try {
            return symmetricDecrypt(ciphertext, this.encInfo.key);
        } catch (err: unknown) {
            if (!this.newEncInfo) {
                throw err;
            }
            return symmetricDecrypt(ciphertext, this.newEncInfo.key);
        }
    }

    /**
     * Starts a key rotation: fresh keys are staged next to the current ones.
     */
    withPendingKeys(): MDataInfo {
        if (!this.encInfo) {
            return this;
        }
        return new MDataInfo(this.name, this.typeTag, this.encInfo, this.newEncInfo ?? {
            key: generateSymmetricKey(),
            nonce: generateNonce()
        });
    }

    /**
     * Completes a key rotation: the staged keys become current.
     */
    commitPendingKeys(): MDataInfo {
        return this.newEncInfo ? new MDataInfo(this.name, this.typeTag, this.newEncInfo) : this;
    }

    /**
     * View of this record that encrypts with the staged keys, if any.
     */
    withNewKeysOnly(): MDataInfo {
        return this.newEncInfo ? new MDataInfo(this.name, this.typeTag, this.newEncInfo) : this;
    }

    sameRecord(other: MDataInfo): boolean {
        return this.name.equals(other.name) && this.typeTag === other.typeTag;
    }

    toJSON(): MDataInfoJSON {
        return {
            name: this.name.toString('base64'),
            typeTag: this.typeTag,
            ...(this.encInfo ? { encInfo: encInfoJSON(this.encInfo) } : {}),
            ...(this.newEncInfo ? { newEncInfo: encInfoJSON(this.newEncInfo) } : {})
        };
    }

    serialise(): Buffer {
        return Buffer.from(JSON.stringify(this.toJSON()), 'utf8');
    }
}
