/**
 * Handle-based entry, entry-action, key, value and permission collections.
 *
 * Collections and permission sets are stored by value: inserting a permission set into a
 * permissions collection copies it, so freeing the set afterwards cannot invalidate the
 * collection.
 */

import { CoreError } from '../errors/CoreError.js';
import { Handle } from '../registry/CapabilityRegistry.js';
import type { ContextRegistry } from '../context/objects.js';
import { entryKeyId, MDataEntry, MDataValue, withAction, withEntry } from './entries.js';
import { Action, ANYONE, PermissionSet, PermissionState, User, UserPermissions, userId, userKey } from './permissions.js';

/**
 * A user as named through the handle interface.
 */
export type UserRef =
    | { readonly kind: 'Anyone' }
    | { readonly kind: 'Key'; readonly handle: Handle<'signPublicKey'> };

export class MDataCollections {
    constructor(private readonly registry: ContextRegistry) { }

    resolveUser(ref: UserRef): User {
        return ref.kind === 'Anyone' ? ANYONE : userKey(this.registry.resolve(ref.handle, 'signPublicKey'));
    }

    // ──────────────── Entries ────────────────

    newEntries(): Handle<'entries'> {
        return this.registry.create('entries', new Map());
    }

    insertEntry(entries: Handle<'entries'>, key: Buffer, content: Buffer): void {
        const current = this.registry.resolve(entries, 'entries');
        if (current.has(entryKeyId(key))) {
            throw new CoreError('AlreadyExists', `Entry ${key.toString('hex')} is already in the collection`);
        }
        this.registry.update(entries, 'entries', withEntry(current, key, content));
    }

    entriesLen(entries: Handle<'entries'>): number {
        return this.registry.resolve(entries, 'entries').size;
    }

    getEntry(entries: Handle<'entries'>, key: Buffer): MDataValue {
        const entry = this.registry.resolve(entries, 'entries').get(entryKeyId(key));
        if (!entry) {
            throw new CoreError('NotFound', `Entry ${key.toString('hex')} is not in the collection`);
        }
        return { content: entry.content, version: entry.version };
    }

    /**
     * Yields every entry once; the iteration ending is the terminal completion.
     */
    async *iterateEntries(entries: Handle<'entries'>): AsyncGenerator<MDataEntry> {
        const snapshot = [...this.registry.resolve(entries, 'entries').values()];
        for (const entry of snapshot) {
            yield entry;
        }
    }

    freeEntries(entries: Handle<'entries'>): void {
        this.freeAs(entries, 'entries');
    }

    // ──────────────── Entry actions ────────────────

    newEntryActions(): Handle<'entryActions'> {
        return this.registry.create('entryActions', new Map());
    }

    insertAction(actions: Handle<'entryActions'>, key: Buffer, content: Buffer): void {
        const current = this.registry.resolve(actions, 'entryActions');
        this.registry.update(actions, 'entryActions', withAction(current, { type: 'Insert', key, content }));
    }

    updateAction(actions: Handle<'entryActions'>, key: Buffer, content: Buffer, expectedVersion: number): void {
        const current = this.registry.resolve(actions, 'entryActions');
        this.registry.update(actions, 'entryActions', withAction(current, { type: 'Update', key, content, expectedVersion }));
    }

    deleteAction(actions: Handle<'entryActions'>, key: Buffer, expectedVersion: number): void {
        const current = this.registry.resolve(actions, 'entryActions');
        this.registry.update(actions, 'entryActions', withAction(current, { type: 'Delete', key, expectedVersion }));
    }

    freeEntryActions(actions: Handle<'entryActions'>): void {
        this.freeAs(actions, 'entryActions');
    }

    // ──────────────── Keys and values ────────────────

    keysLen(keys: Handle<'keys'>): number {
        return this.registry.resolve(keys, 'keys').length;
    }

    async *iterateKeys(keys: Handle<'keys'>): AsyncGenerator<Buffer> {
        yield* [...this.registry.resolve(keys, 'keys')];
    }

    freeKeys(keys: Handle<'keys'>): void {
        this.freeAs(keys, 'keys');
    }

    valuesLen(values: Handle<'values'>): number {
        return this.registry.resolve(values, 'values').length;
    }

    async *iterateValues(values: Handle<'values'>): AsyncGenerator<MDataValue> {
        yield* [...this.registry.resolve(values, 'values')];
    }

    freeValues(values: Handle<'values'>): void {
        this.freeAs(values, 'values');
    }

    // ──────────────── Permissions ────────────────

    newPermissions(): Handle<'permissions'> {
        return this.registry.create('permissions', new Map());
    }

    permissionsLen(permissions: Handle<'permissions'>): number {
        return this.registry.resolve(permissions, 'permissions').size;
    }

    /**
     * Copies the stored set for `user` into a new permission-set handle.
     */
    getUserPermissions(permissions: Handle<'permissions'>, user: UserRef): Handle<'permissionSet'> {
        const resolved = this.resolveUser(user);
        const entry = this.registry.resolve(permissions, 'permissions').get(userId(resolved));
        if (!entry) {
            throw new CoreError('NotFound', `No permissions for ${userId(resolved)}`);
        }
        return this.registry.create('permissionSet', entry.set);
    }

    insertPermissions(permissions: Handle<'permissions'>, user: UserRef, set: Handle<'permissionSet'>): void {
        const resolved = this.resolveUser(user);
        const value = this.registry.resolve(set, 'permissionSet');
        const next = new Map(this.registry.resolve(permissions, 'permissions'));
        next.set(userId(resolved), { user: resolved, set: value });
        this.registry.update(permissions, 'permissions', next);
    }

    async *iteratePermissions(permissions: Handle<'permissions'>): AsyncGenerator<UserPermissions> {
        yield* [...this.registry.resolve(permissions, 'permissions').values()];
    }

    freePermissions(permissions: Handle<'permissions'>): void {
        this.freeAs(permissions, 'permissions');
    }

    // ──────────────── Permission sets ────────────────

    newPermissionSet(): Handle<'permissionSet'> {
        return this.registry.create('permissionSet', PermissionSet.empty());
    }

    allow(set: Handle<'permissionSet'>, action: Action): void {
        this.registry.update(set, 'permissionSet', this.registry.resolve(set, 'permissionSet').allow(action));
    }

    deny(set: Handle<'permissionSet'>, action: Action): void {
        this.registry.update(set, 'permissionSet', this.registry.resolve(set, 'permissionSet').deny(action));
    }

    clear(set: Handle<'permissionSet'>, action: Action): void {
        this.registry.update(set, 'permissionSet', this.registry.resolve(set, 'permissionSet').clear(action));
    }

    getPermission(set: Handle<'permissionSet'>, action: Action): PermissionState {
        return this.registry.resolve(set, 'permissionSet').get(action);
    }

    freePermissionSet(set: Handle<'permissionSet'>): void {
        this.freeAs(set, 'permissionSet');
    }

    private freeAs<K extends 'entries' | 'entryActions' | 'keys' | 'values' | 'permissions' | 'permissionSet'>(handle: Handle<K>, kind: K): void {
        this.registry.resolve(handle, kind);
        this.registry.free(handle);
    }
}
