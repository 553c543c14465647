/**
 * ImmutableContentStore
 *
 * Handle-based streaming writer and reader for self-encrypted immutable blobs.
 * A blob's content address is the SHA3-256 (hex) of its wrapped data map.
 */

import { LRUCache } from 'lru-cache';
import { coreConfig } from '../bootstrap/config/core-config.js';
import { CoreError } from '../errors/CoreError.js';
import { CryptoKeyStore } from '../crypto/keyManager.js';
import { PUBLIC_KEY_BYTES } from '../crypto/primitives.js';
import { ContextLogger } from '../logging/logger.js';
import { NetworkClient } from '../network/client.js';
import { Handle } from '../registry/CapabilityRegistry.js';
import type { ContextRegistry } from '../context/objects.js';
import { ChunkSizes } from './chunker.js';
import { CipherOpt, unwrapDataMap, wrapDataMap } from './cipherOpt.js';
import { DataMap, dataMapSize, decryptChunk, parseDataMap, selfEncrypt, serialiseDataMap } from './selfEncryption.js';

export interface SelfEncryptorWriter {
    readonly pieces: Buffer[];
}

export interface SelfEncryptorReader {
    readonly address: string;
    readonly dataMap: DataMap;
    readonly size: number;
}

export interface ImmutableStoreOptions {
    readonly chunkSizes?: ChunkSizes;
    readonly cacheSize?: number;
}

export class ImmutableContentStore {
    private readonly cache: LRUCache<string, Buffer>;
    private readonly chunkSizes: ChunkSizes;

    constructor(
        private readonly registry: ContextRegistry,
        private readonly client: NetworkClient,
        private readonly keys: CryptoKeyStore | null,
        private readonly log: ContextLogger,
        options: ImmutableStoreOptions = {}
    ) {
        const config = coreConfig();
        this.chunkSizes = options.chunkSizes ?? {
            minSize: config.minChunkSize,
            avgSize: config.avgChunkSize,
            maxSize: config.maxChunkSize
        };
        this.cache = new LRUCache<string, Buffer>({ max: options.cacheSize ?? config.chunkCacheSize });
    }

    // ──────────────── Cipher options ────────────────

    newPlainText(): Handle<'cipherOpt'> {
        return this.registry.create('cipherOpt', { kind: 'PlainText' });
    }

    newSymmetric(): Handle<'cipherOpt'> {
        return this.registry.create('cipherOpt', { kind: 'Symmetric' });
    }

    newAsymmetric(peerEncryptKey: Handle<'encPublicKey'>): Handle<'cipherOpt'> {
        const key = this.registry.resolve(peerEncryptKey, 'encPublicKey');
        if (key.length !== PUBLIC_KEY_BYTES) {
            throw new CoreError('CryptoError', 'Peer encryption key has the wrong length');
        }
        return this.registry.create('cipherOpt', { kind: 'Asymmetric', peerEncryptKey: key });
    }

    freeCipherOpt(handle: Handle<'cipherOpt'>): void {
        this.registry.resolve(handle, 'cipherOpt');
        this.registry.free(handle);
    }

    // ──────────────── Writer ────────────────

    newWriter(): Handle<'selfEncryptorWriter'> {
        return this.registry.create('selfEncryptorWriter', { pieces: [] });
    }

    async write(writer: Handle<'selfEncryptorWriter'>, data: Uint8Array): Promise<void> {
        this.registry.resolve(writer, 'selfEncryptorWriter').pieces.push(Buffer.from(data));
    }

    /**
     * Encrypts and stores everything written so far and returns the content address.
     * The writer handle is consumed once the data map is stored; after a failure it stays
     * live so the close can be retried.
     */
    async close(writer: Handle<'selfEncryptorWriter'>, cipherOpt: Handle<'cipherOpt'>): Promise<string> {
        const state = this.registry.resolve(writer, 'selfEncryptorWriter');
        const opt: CipherOpt = this.registry.resolve(cipherOpt, 'cipherOpt');

        const content = Buffer.concat(state.pieces);
        const { dataMap, chunks } = selfEncrypt(content, this.chunkSizes);
        await Promise.all(chunks.map(chunk => this.client.putIData(chunk.content)));

        const address = await this.client.putIData(wrapDataMap(serialiseDataMap(dataMap), opt, this.keys));
        this.registry.free(writer);
        this.log.debug({ address, chunks: chunks.length, bytes: content.length, cipher: opt.kind }, 'Immutable blob stored');
        return address;
    }

    /**
     * Discards uncommitted data.
     */
    freeWriter(writer: Handle<'selfEncryptorWriter'>): void {
        this.registry.resolve(writer, 'selfEncryptorWriter');
        this.registry.free(writer);
    }

    // ──────────────── Reader ────────────────

    async openReader(address: string): Promise<Handle<'selfEncryptorReader'>> {
        this.registry.assertOpen();
        const wrapper = await this.client.getIData(address);
        const dataMap = parseDataMap(unwrapDataMap(wrapper, this.keys));
        return this.registry.create('selfEncryptorReader', { address, dataMap, size: dataMapSize(dataMap) });
    }

    size(reader: Handle<'selfEncryptorReader'>): number {
        return this.registry.resolve(reader, 'selfEncryptorReader').size;
    }

    /**
     * Reads a sub-range, fetching and decrypting only the chunks it touches.
     * Ranges past the end are clamped.
     */
    async read(reader: Handle<'selfEncryptorReader'>, offset: number, length: number): Promise<Buffer> {
        const { dataMap, size } = this.registry.resolve(reader, 'selfEncryptorReader');
        const start = Math.min(Math.max(0, offset), size);
        const end = Math.max(start, Math.min(start + Math.max(0, length), size));
        if (dataMap.kind === 'Inline') {
            return Buffer.from(dataMap.content.subarray(start, end));
        }

        const touched = dataMap.chunks
            .map((chunk, index) => ({ chunk, index }))
            .filter(({ chunk }) => chunk.offset < end && chunk.offset + chunk.size > start);
        const plains = await Promise.all(touched.map(({ index }) => this.plainChunk(dataMap, index)));
        return Buffer.concat(touched.map(({ chunk }, i) => {
            const plain = plains[i] ?? Buffer.alloc(0);
            return plain.subarray(Math.max(0, start - chunk.offset), Math.min(chunk.size, end - chunk.offset));
        }));
    }

    freeReader(reader: Handle<'selfEncryptorReader'>): void {
        this.registry.resolve(reader, 'selfEncryptorReader');
        this.registry.free(reader);
    }

    private async plainChunk(dataMap: Extract<DataMap, { kind: 'Chunks' }>, index: number): Promise<Buffer> {
        const details = dataMap.chunks[index];
        if (!details) {
            throw new CoreError('CryptoError', `Data map has no chunk ${index}`);
        }
        const cached = this.cache.get(details.postHash);
        if (cached) {
            return cached;
        }
        const plain = decryptChunk(dataMap, index, await this.client.getIData(details.postHash));
        this.cache.set(details.postHash, plain);
        return plain;
    }
}
