/**
 * Cipher options for the data map of an immutable blob, and the wrapper that records
 * which option was used.
 *
 * Symmetric and Asymmetric wrapping are deterministic, so the same content under the same
 * key material always lands at the same address.
 */

import { z } from 'zod';
import { CoreError } from '../errors/CoreError.js';
import { CryptoKeyStore } from '../crypto/keyManager.js';
import { deterministicSymmetricEncrypt, sealDecrypt, sealEncrypt, symmetricDecrypt } from '../crypto/primitives.js';
import { validate } from '../validation/zod-middleware.js';

export type CipherOpt =
    | { readonly kind: 'PlainText' }
    | { readonly kind: 'Symmetric' }
    | { readonly kind: 'Asymmetric'; readonly peerEncryptKey: Buffer };

const WRAPPER_VERSION = 1;

const WrapperSchema = z.object({
    v: z.literal(WRAPPER_VERSION),
    cipher: z.enum(['PlainText', 'Symmetric', 'Asymmetric']),
    payload: z.string().transform(value => Buffer.from(value, 'base64'))
});

function requireKeys(keys: CryptoKeyStore | null, kind: CipherOpt['kind']): CryptoKeyStore {
    if (!keys) {
        throw new CoreError('CryptoError', `${kind} data maps need key material this context does not hold`);
    }
    return keys;
}

export function wrapDataMap(dataMap: Buffer, opt: CipherOpt, keys: CryptoKeyStore | null): Buffer {
    let payload: Buffer;
    switch (opt.kind) {
        case 'PlainText':
            payload = dataMap;
            break;
        case 'Symmetric':
            payload = deterministicSymmetricEncrypt(dataMap, requireKeys(keys, opt.kind).symmetricKey);
            break;
        case 'Asymmetric':
            payload = sealEncrypt(dataMap, opt.peerEncryptKey, { deterministic: true });
            break;
    }
    return Buffer.from(JSON.stringify({ v: WRAPPER_VERSION, cipher: opt.kind, payload: payload.toString('base64') }), 'utf8');
}

export function unwrapDataMap(wrapper: Buffer, keys: CryptoKeyStore | null): Buffer {
    let raw: unknown;
    try {
        raw = JSON.parse(wrapper.toString('utf8'));
    } catch (err: unknown) {
        throw new CoreError('DecodeError', 'Blob is not a data map wrapper', { cause: err });
    }
    const parsed = validate(WrapperSchema, raw, 'data map wrapper');
    switch (parsed.cipher) {
        case 'PlainText':
            return parsed.payload;
        case 'Symmetric':
            return symmetricDecrypt(parsed.payload, requireKeys(keys, parsed.cipher).symmetricKey);
        case 'Asymmetric':
            return sealDecrypt(parsed.payload, requireKeys(keys, parsed.cipher).encKeys);
    }
}
