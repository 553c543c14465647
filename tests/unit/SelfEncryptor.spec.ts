/**
 * Unit Tests: Self-encrypted immutable content
 *
 * @see libs/immutableData/store.ts
 * @see libs/immutableData/selfEncryption.ts
 * @see libs/immutableData/chunker.ts
 */

import { describe, it, before } from 'node:test';
import assert from 'node:assert';
import { App } from '../../libs/context/app.js';
import { chunkBoundaries } from '../../libs/immutableData/chunker.js';
import { selfEncrypt } from '../../libs/immutableData/selfEncryption.js';
import { MemoryNetwork } from '../../libs/network/memoryNetwork.js';
import { APP_OPTIONS, createAuthenticator, registerApp, SMALL_CHUNKS } from '../helpers/fixtures.js';

const CONTENT = Buffer.from(Array.from({ length: 1000 }, (_, i) => (i * 7 + 3) % 256));

async function store(app: App, pieces: Buffer[], cipher: 'PlainText' | 'Symmetric'): Promise<string> {
    const writer = app.idata.newWriter();
    for (const piece of pieces) {
        await app.idata.write(writer, piece);
    }
    const opt = cipher === 'PlainText' ? app.idata.newPlainText() : app.idata.newSymmetric();
    return app.idata.close(writer, opt);
}

async function readAll(app: App, address: string): Promise<Buffer> {
    const reader = await app.idata.openReader(address);
    const content = await app.idata.read(reader, 0, app.idata.size(reader));
    app.idata.freeReader(reader);
    return content;
}

describe('chunkBoundaries', () => {
    it('should cover the content with spans inside the size bounds', () => {
        const spans = chunkBoundaries(CONTENT, SMALL_CHUNKS);
        const last = spans[spans.length - 1];

        assert.ok(spans.length > 1);
        assert.strictEqual(spans.reduce((total, span) => total + span.length, 0), CONTENT.length);
        assert.ok(spans.every(span => span.length <= SMALL_CHUNKS.maxSize));
        assert.ok(spans.slice(0, -1).every(span => span.length >= SMALL_CHUNKS.minSize));
        assert.strictEqual(last ? last.offset + last.length : 0, CONTENT.length);
    });

    it('should return no spans for empty content', () => {
        assert.deepStrictEqual(chunkBoundaries(Buffer.alloc(0), SMALL_CHUNKS), []);
    });
});

describe('selfEncrypt', () => {
    it('should keep small content inline', () => {
        const { dataMap, chunks } = selfEncrypt(Buffer.from('tiny'), SMALL_CHUNKS);
        assert.deepStrictEqual(dataMap, { kind: 'Inline', content: Buffer.from('tiny') });
        assert.strictEqual(chunks.length, 0);
    });

    it('should be deterministic and never store plaintext chunks', () => {
        const first = selfEncrypt(CONTENT, SMALL_CHUNKS);
        const second = selfEncrypt(CONTENT, SMALL_CHUNKS);

        assert.deepStrictEqual(first.dataMap, second.dataMap);
        assert.ok(first.chunks.length > 1);
        assert.ok(first.chunks.every(chunk => !CONTENT.includes(chunk.content)));
    });
});

describe('ImmutableContentStore', () => {
    let network: MemoryNetwork;
    let owner: App;
    let other: App;

    before(async () => {
        network = new MemoryNetwork();
        const authenticator = await createAuthenticator(network);
        ({ app: owner } = await registerApp(authenticator, network, 'writer-app', []));
        ({ app: other } = await registerApp(authenticator, network, 'other-app', []));
    });

    it('should read back content written in pieces under PlainText', async () => {
        const address = await store(owner, [Buffer.from('hello '), Buffer.from('world')], 'PlainText');
        const reader = await owner.idata.openReader(address);

        assert.match(address, /^[0-9a-f]{64}$/);
        assert.strictEqual(owner.idata.size(reader), 11);
        assert.deepStrictEqual(await owner.idata.read(reader, 0, 11), Buffer.from('hello world'));
        assert.deepStrictEqual(await owner.idata.read(reader, 6, 5), Buffer.from('world'));
    });

    it('should store chunked content and read arbitrary ranges', async () => {
        const putsBefore = network.callCount('PutIData');
        const address = await store(owner, [CONTENT.subarray(0, 300), CONTENT.subarray(300, 301), CONTENT.subarray(301)], 'Symmetric');
        const reader = await owner.idata.openReader(address);

        assert.ok(network.callCount('PutIData') - putsBefore > 2);
        assert.strictEqual(owner.idata.size(reader), 1000);
        assert.deepStrictEqual(await owner.idata.read(reader, 0, 1000), CONTENT);
        assert.deepStrictEqual(await owner.idata.read(reader, 100, 50), CONTENT.subarray(100, 150));
        assert.deepStrictEqual(await owner.idata.read(reader, 990, 100), CONTENT.subarray(990));
        assert.deepStrictEqual(await owner.idata.read(reader, 2000, 10), Buffer.alloc(0));
    });

    it('should give identical content the same address', async () => {
        const first = await store(owner, [CONTENT], 'PlainText');
        const second = await store(owner, [CONTENT.subarray(0, 10), CONTENT.subarray(10)], 'PlainText');
        assert.strictEqual(first, second);
    });

    it('should give symmetric content the same address and bytes whatever the write split', async () => {
        const whole = await store(owner, [CONTENT], 'Symmetric');
        const split = await store(owner, [CONTENT.subarray(0, 1), CONTENT.subarray(1, 500), CONTENT.subarray(500)], 'Symmetric');
        const bytewise = await store(owner, Array.from(CONTENT, byte => Buffer.from([byte])), 'Symmetric');

        assert.strictEqual(split, whole);
        assert.strictEqual(bytewise, whole);
        assert.deepStrictEqual(await readAll(owner, whole), CONTENT);
        assert.deepStrictEqual(await readAll(owner, split), await readAll(owner, bytewise));
    });

    it('should keep symmetric data maps private to the writer', async () => {
        const address = await store(owner, [CONTENT], 'Symmetric');

        assert.deepStrictEqual(await readAll(owner, address), CONTENT);
        await assert.rejects(other.idata.openReader(address), { kind: 'CryptoError' });
    });

    it('should seal asymmetric data maps to the peer key', async () => {
        const writer = owner.idata.newWriter();
        await owner.idata.write(writer, Buffer.from('for your eyes only'));
        const peerKey = owner.crypto.encPubKeyNew(other.crypto.encPubKeyGet(other.crypto.appPubEncKey()));
        const address = await owner.idata.close(writer, owner.idata.newAsymmetric(peerKey));

        assert.deepStrictEqual(await readAll(other, address), Buffer.from('for your eyes only'));
        await assert.rejects(owner.idata.openReader(address), { kind: 'CryptoError' });
    });

    it('should let unregistered contexts read only plain data maps', async () => {
        const plain = await store(owner, [Buffer.from('public notice')], 'PlainText');
        const secret = await store(owner, [Buffer.from('private notice')], 'Symmetric');
        const reader = App.unregistered(network, APP_OPTIONS);

        assert.deepStrictEqual(await readAll(reader, plain), Buffer.from('public notice'));
        await assert.rejects(reader.idata.openReader(secret), {
            kind: 'CryptoError',
            message: 'Symmetric data maps need key material this context does not hold'
        });
        await reader.shutdown();
    });

    it('should discard a freed writer', async () => {
        const writer = owner.idata.newWriter();
        await owner.idata.write(writer, Buffer.from('draft'));
        owner.idata.freeWriter(writer);

        await assert.rejects(owner.idata.write(writer, Buffer.from('more')), { kind: 'HandleInvalid' });
        await assert.rejects(owner.idata.close(writer, owner.idata.newPlainText()), { kind: 'HandleInvalid' });
    });

    it('should consume the writer on close', async () => {
        const writer = owner.idata.newWriter();
        await owner.idata.write(writer, Buffer.from('once'));
        await owner.idata.close(writer, owner.idata.newPlainText());

        await assert.rejects(owner.idata.write(writer, Buffer.from('twice')), { kind: 'HandleInvalid' });
    });

    it('should fail NotFound for an unknown address', async () => {
        await assert.rejects(owner.idata.openReader('0'.repeat(64)), { kind: 'NotFound' });
    });

    it('should retry transient failures while storing', async () => {
        network.failNext(2, operation => operation === 'PutIData');
        const address = await store(owner, [Buffer.from('retried')], 'PlainText');
        assert.deepStrictEqual(await readAll(owner, address), Buffer.from('retried'));
    });

    it('should keep the writer live when storing fails so the close can be retried', async () => {
        let failing = true;
        network.failNext(1000, operation => failing && operation === 'PutIData');
        const writer = owner.idata.newWriter();
        await owner.idata.write(writer, CONTENT);
        const opt = owner.idata.newSymmetric();

        await assert.rejects(owner.idata.close(writer, opt), { kind: 'NetworkError' });
        failing = false;
        const address = await owner.idata.close(writer, opt);

        assert.strictEqual(address, await store(owner, [CONTENT], 'Symmetric'));
        assert.deepStrictEqual(await readAll(owner, address), CONTENT);
        await assert.rejects(owner.idata.write(writer, Buffer.from('late')), { kind: 'HandleInvalid' });
    });

    it('should refuse new handles once the context is shut down', async () => {
        const address = await store(owner, [Buffer.from('after hours')], 'PlainText');
        const reader = App.unregistered(network, APP_OPTIONS);
        await reader.shutdown();
        const getsBefore = network.callCount('GetIData');

        await assert.rejects(reader.idata.openReader(address), {
            kind: 'HandleInvalid',
            message: `Context ${reader.registry.contextId} is shut down`
        });
        assert.throws(() => reader.idata.newWriter(), { kind: 'HandleInvalid' });
        assert.throws(() => reader.mdata.newInfoPublic(Buffer.alloc(32, 1), 15001), { kind: 'HandleInvalid' });
        assert.strictEqual(network.callCount('GetIData'), getsBefore);
    });
});
