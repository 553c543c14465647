/**
 * Entry-level value types and the EntryActions batch builder.
 */

export interface MDataValue {
    readonly content: Buffer;
    readonly version: number;
}

export interface MDataEntry extends MDataValue {
    readonly key: Buffer;
}

/**
 * Stored entry. Deleted entries stay as tombstones so their version keeps increasing
 * across delete and re-insert.
 */
export interface StoredEntry extends MDataEntry {
    readonly deleted: boolean;
}

export type EntryAction =
    | { readonly type: 'Insert'; readonly key: Buffer; readonly content: Buffer }
    | { readonly type: 'Update'; readonly key: Buffer; readonly content: Buffer; readonly expectedVersion: number }
    | { readonly type: 'Delete'; readonly key: Buffer; readonly expectedVersion: number };

/**
 * At most one action per key; later actions on the same key replace earlier ones.
 */
export type EntryActionsCollection = ReadonlyMap<string, EntryAction>;

export type EntriesCollection = ReadonlyMap<string, MDataEntry>;

export function entryKeyId(key: Uint8Array): string {
    return Buffer.from(key).toString('hex');
}

export class EntryActions {
    private readonly actions = new Map<string, EntryAction>();

    insert(key: Buffer, content: Buffer): this {
        this.actions.set(entryKeyId(key), { type: 'Insert', key, content });
        return this;
    }

    update(key: Buffer, content: Buffer, expectedVersion: number): this {
        this.actions.set(entryKeyId(key), { type: 'Update', key, content, expectedVersion });
        return this;
    }

    delete(key: Buffer, expectedVersion: number): this {
        this.actions.set(entryKeyId(key), { type: 'Delete', key, expectedVersion });
        return this;
    }

    get size(): number {
        return this.actions.size;
    }

    build(): EntryActionsCollection {
        return new Map(this.actions);
    }
}

export function withAction(actions: EntryActionsCollection, action: EntryAction): EntryActionsCollection {
    const next = new Map(actions);
    next.set(entryKeyId(action.key), action);
    return next;
}

export function withEntry(entries: EntriesCollection, key: Buffer, content: Buffer, version = 0): EntriesCollection {
    const next = new Map(entries);
    next.set(entryKeyId(key), { key, content, version });
    return next;
}
