/**
 * Capability Registry
 *
 * Per-context arena mapping opaque handles to typed in-memory objects.
 * Slots are generation-checked: freeing a slot bumps its generation, so a stale
 * handle (double free, use after free) is detected instead of dereferenced.
 */

import { CoreError } from '../errors/CoreError.js';

declare const HANDLE_KIND: unique symbol;

/**
 * Opaque, context-scoped handle. The kind parameter only exists at the type level;
 * the registry re-checks it at runtime on every resolve.
 */
export interface Handle<K extends string = string> {
    readonly context: number;
    readonly index: number;
    readonly generation: number;
    readonly [HANDLE_KIND]?: K;
}

interface Slot {
    generation: number;
    kind: string | null;
    value: unknown;
}

export interface RegistryOptions {
    readonly maxObjects?: number;
}

let nextContextId = 1;

export function allocateContextId(): number {
    return nextContextId++;
}

export class CapabilityRegistry<M extends { [kind: string]: unknown }> {
    private readonly slots: Slot[] = [];
    private readonly freeList: number[] = [];
    private live = 0;
    private closed = false;
    private readonly maxObjects: number;

    constructor(
        readonly contextId: number = allocateContextId(),
        options: RegistryOptions = {}
    ) {
        this.maxObjects = options.maxObjects ?? Number.MAX_SAFE_INTEGER;
    }

    create<K extends keyof M & string>(kind: K, value: M[K]): Handle<K> {
        this.assertOpen();
        if (this.live >= this.maxObjects) {
            throw new CoreError('AllocationError', `Registry for context ${this.contextId} is full (${this.maxObjects} objects)`);
        }

        let index = this.freeList.pop();
        let slot: Slot;
        if (index === undefined) {
            index = this.slots.length;
            slot = { generation: 0, kind, value };
            this.slots.push(slot);
        } else {
            slot = this.slotAt(index);
            slot.kind = kind;
            slot.value = value;
        }

        this.live += 1;
        return Object.freeze({ context: this.contextId, index, generation: slot.generation });
    }

    resolve<K extends keyof M & string>(handle: Handle<K>, kind: K): M[K] {
        const slot = this.liveSlot(handle);
        if (slot.kind !== kind) {
            throw new CoreError('HandleTypeMismatch', `Handle ${describe(handle)} refers to a ${slot.kind ?? 'freed object'}, expected ${kind}`);
        }
        // The kind tag was checked above and is only ever written together with a value of M[kind].
        return slot.value as M[K];
    }

    /**
     * Replaces the object behind a live handle (collections are stored by value).
     */
    update<K extends keyof M & string>(handle: Handle<K>, kind: K, value: M[K]): void {
        this.resolve(handle, kind);
        this.liveSlot(handle).value = value;
    }

    /**
     * Returns the kind of a live handle without resolving its value.
     */
    kindOf(handle: Handle): string {
        const kind = this.liveSlot(handle).kind;
        if (kind === null) {
            throw new CoreError('HandleInvalid', `Handle ${describe(handle)} is not live`);
        }
        return kind;
    }

    free(handle: Handle): void {
        const slot = this.liveSlot(handle);
        slot.kind = null;
        slot.value = undefined;
        slot.generation += 1;
        this.live -= 1;
        this.freeList.push(handle.index);
    }

    size(): number {
        return this.live;
    }

    /**
     * Releases every object; all outstanding handles become invalid.
     */
    clear(): void {
        this.slots.forEach((slot, index) => {
            if (slot.kind !== null) {
                slot.kind = null;
                slot.value = undefined;
                slot.generation += 1;
                this.freeList.push(index);
            }
        });
        this.live = 0;
    }

    /**
     * Releases every object and refuses new ones; the context is finished.
     */
    close(): void {
        this.clear();
        this.closed = true;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    assertOpen(): void {
        if (this.closed) {
            throw new CoreError('HandleInvalid', `Context ${this.contextId} is shut down`);
        }
    }

    private liveSlot(handle: Handle): Slot {
        if (handle.context !== this.contextId) {
            throw new CoreError('HandleInvalid', `Handle ${describe(handle)} belongs to another context`);
        }
        const slot = this.slots[handle.index];
        if (!slot || slot.kind === null || slot.generation !== handle.generation) {
            throw new CoreError('HandleInvalid', `Handle ${describe(handle)} is stale or was never issued`);
        }
        return slot;
    }

    private slotAt(index: number): Slot {
        const slot = this.slots[index];
        if (!slot) {
            throw new CoreError('AllocationError', `Registry slot ${index} vanished`);
        }
        return slot;
    }
}

function describe(handle: Handle): string {
    return `${handle.context}:${handle.index}@${handle.generation}`;
}
