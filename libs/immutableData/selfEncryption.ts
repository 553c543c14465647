/**
 * Self-encryption of an immutable blob.
 *
 * Content is split into content-defined chunks. Chunk i is encrypted with AES-256-CTR keyed by
 * the plaintext hash of chunk i-1, with an IV from the hash of chunk i-2 (indices wrap), then
 * XOR-padded with a hash over all three. Each encrypted chunk is addressed by its SHA3-256.
 * Small content stays inline in the data map.
 */

import { createCipheriv, createDecipheriv } from 'node:crypto';
import { z } from 'zod';
import { CoreError } from '../errors/CoreError.js';
import { sha3Hash } from '../crypto/primitives.js';
import { validate } from '../validation/zod-middleware.js';
import { chunkBoundaries, ChunkSizes } from './chunker.js';

const IV_BYTES = 16;

export interface ChunkDetails {
    readonly index: number;
    readonly offset: number;
    readonly size: number;
    /** SHA3-256 of the plaintext chunk, hex */
    readonly preHash: string;
    /** SHA3-256 of the encrypted chunk, hex; also its network address */
    readonly postHash: string;
}

export type DataMap =
    | { readonly kind: 'Inline'; readonly content: Buffer }
    | { readonly kind: 'Chunks'; readonly chunks: readonly ChunkDetails[] };

export interface EncryptedChunk {
    readonly address: string;
    readonly content: Buffer;
}

const hex64 = z.string().regex(/^[0-9a-f]{64}$/);

const DataMapSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('Inline'), content: z.string().transform(value => Buffer.from(value, 'base64')) }),
    z.object({
        kind: z.literal('Chunks'),
        chunks: z.array(z.object({
            index: z.number().int().nonnegative(),
            offset: z.number().int().nonnegative(),
            size: z.number().int().positive(),
            preHash: hex64,
            postHash: hex64
        })).min(1)
    })
]);

function hashAt(preHashes: readonly Buffer[], index: number): Buffer {
    const n = preHashes.length;
    const hash = preHashes[((index % n) + n) % n];
    if (!hash) {
        throw new CoreError('CryptoError', `Data map has no chunk ${index}`);
    }
    return hash;
}

function chunkKeyMaterial(preHashes: readonly Buffer[], index: number): { key: Buffer; iv: Buffer; pad: Buffer } {
    const own = hashAt(preHashes, index);
    const previous = hashAt(preHashes, index - 1);
    const beforePrevious = hashAt(preHashes, index - 2);
    return {
        key: previous,
        iv: beforePrevious.subarray(0, IV_BYTES),
        pad: sha3Hash(Buffer.concat([own, previous, beforePrevious]))
    };
}

function xorPad(data: Buffer, pad: Buffer): Buffer {
    const out = Buffer.allocUnsafe(data.length);
    for (let i = 0; i < data.length; i++) {
        out[i] = (data[i] ?? 0) ^ (pad[i % pad.length] ?? 0);
    }
    return out;
}

export function selfEncrypt(content: Buffer, sizes: ChunkSizes): { dataMap: DataMap; chunks: EncryptedChunk[] } {
    if (content.length < 3 * sizes.minSize) {
        return { dataMap: { kind: 'Inline', content: Buffer.from(content) }, chunks: [] };
    }

    const spans = chunkBoundaries(content, sizes);
    const plainChunks = spans.map(span => content.subarray(span.offset, span.offset + span.length));
    const preHashes = plainChunks.map(chunk => sha3Hash(chunk));

    const chunks: EncryptedChunk[] = [];
    const details: ChunkDetails[] = [];
    plainChunks.forEach((plain, index) => {
        const { key, iv, pad } = chunkKeyMaterial(preHashes, index);
        const cipher = createCipheriv('aes-256-ctr', key, iv);
        const encrypted = xorPad(Buffer.concat([cipher.update(plain), cipher.final()]), pad);
        const address = sha3Hash(encrypted).toString('hex');
        chunks.push({ address, content: encrypted });
        details.push({
            index,
            offset: spans[index]?.offset ?? 0,
            size: plain.length,
            preHash: hashAt(preHashes, index).toString('hex'),
            postHash: address
        });
    });

    return { dataMap: { kind: 'Chunks', chunks: details }, chunks };
}

/**
 * Decrypts one chunk fetched from the network, verifying its address and plaintext hash.
 */
export function decryptChunk(dataMap: Extract<DataMap, { kind: 'Chunks' }>, index: number, encrypted: Buffer): Buffer {
    const details = dataMap.chunks[index];
    if (!details) {
        throw new CoreError('CryptoError', `Data map has no chunk ${index}`);
    }
    if (sha3Hash(encrypted).toString('hex') !== details.postHash) {
        throw new CoreError('CryptoError', `Chunk ${index} does not match its address`);
    }

    const preHashes = dataMap.chunks.map(chunk => Buffer.from(chunk.preHash, 'hex'));
    const { key, iv, pad } = chunkKeyMaterial(preHashes, index);
    const decipher = createDecipheriv('aes-256-ctr', key, iv);
    const plain = Buffer.concat([decipher.update(xorPad(encrypted, pad)), decipher.final()]);
    if (sha3Hash(plain).toString('hex') !== details.preHash) {
        throw new CoreError('CryptoError', `Chunk ${index} failed to decrypt`);
    }
    return plain;
}

export function dataMapSize(dataMap: DataMap): number {
    if (dataMap.kind === 'Inline') {
        return dataMap.content.length;
    }
    return dataMap.chunks.reduce((total, chunk) => total + chunk.size, 0);
}

export function serialiseDataMap(dataMap: DataMap): Buffer {
    const json = dataMap.kind === 'Inline'
        ? { kind: 'Inline', content: dataMap.content.toString('base64') }
        : { kind: 'Chunks', chunks: dataMap.chunks };
    return Buffer.from(JSON.stringify(json), 'utf8');
}

export function parseDataMap(serialised: Buffer): DataMap {
    let raw: unknown;
    try {
        raw = JSON.parse(serialised.toString('utf8'));
    } catch (err: unknown) {
        throw new CoreError('DecodeError', 'Data map is not valid JSON', { cause: err });
    }
    return validate(DataMapSchema, raw, 'data map');
}
