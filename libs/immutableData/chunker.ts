/**
 * Content-defined chunking with a gear rolling hash.
 *
 * A boundary is cut when the low bits of the rolling hash are zero (expected spacing of
 * `avgSize`), never before `minSize` and always at `maxSize`.
 */

import { sha256Hash } from '../crypto/primitives.js';

export interface ChunkSizes {
    readonly minSize: number;
    readonly avgSize: number;
    readonly maxSize: number;
}

export interface ChunkSpan {
    readonly offset: number;
    readonly length: number;
}

const GEAR: Uint32Array = (() => {
    const table = new Uint32Array(256);
    for (let i = 0; i < 256; i++) {
        table[i] = sha256Hash(Buffer.from(`gear:${i}`)).readUInt32BE(0);
    }
    return table;
})();

function boundaryMask(avgSize: number): number {
    const bits = Math.min(30, Math.max(1, Math.round(Math.log2(avgSize))));
    return ((1 << bits) - 1) >>> 0;
}

export function chunkBoundaries(content: Uint8Array, sizes: ChunkSizes): ChunkSpan[] {
    const spans: ChunkSpan[] = [];
    const mask = boundaryMask(sizes.avgSize);
    let start = 0;
    let hash = 0;

    for (let i = 0; i < content.length; i++) {
        hash = ((hash << 1) + (GEAR[content[i] ?? 0] ?? 0)) >>> 0;
        const length = i - start + 1;
        if (length >= sizes.maxSize || (length >= sizes.minSize && (hash & mask) === 0)) {
            spans.push({ offset: start, length });
            start = i + 1;
            hash = 0;
        }
    }
    if (start < content.length) {
        spans.push({ offset: start, length: content.length - start });
    }
    return spans;
}
