/**
 * Mutable record rules.
 *
 * Pure functions that validate and apply one request against one record. The storage
 * network applies them atomically per record; any failure leaves the record untouched.
 */

import { CoreError } from '../errors/CoreError.js';
import { EntriesCollection, EntryAction, EntryActionsCollection, entryKeyId, MDataEntry, StoredEntry } from './entries.js';
import {
    Action,
    anyonePermission,
    effectivePermission,
    PermissionSet,
    PermissionsCollection,
    User,
    userId
} from './permissions.js';

export interface MutableDataRecord {
    readonly name: Buffer;
    readonly typeTag: number;
    readonly owner: Buffer;
    /** Structural version: bumped by permission and owner changes */
    readonly version: number;
    readonly entries: ReadonlyMap<string, StoredEntry>;
    readonly permissions: PermissionsCollection;
}

export interface Requester {
    readonly key: Buffer;
    /** Whether the owner account has authorised this key */
    readonly authorised: boolean;
}

export function recordId(name: Uint8Array, typeTag: number): string {
    return `${Buffer.from(name).toString('hex')}:${typeTag}`;
}

export function newRecord(params: {
    name: Buffer;
    typeTag: number;
    owner: Buffer;
    permissions?: PermissionsCollection;
    entries?: EntriesCollection;
}): MutableDataRecord {
    const entries = new Map<string, StoredEntry>();
    for (const entry of params.entries?.values() ?? []) {
        entries.set(entryKeyId(entry.key), { key: entry.key, content: entry.content, version: entry.version, deleted: false });
    }
    return Object.freeze({
        name: params.name,
        typeTag: params.typeTag,
        owner: params.owner,
        version: 0,
        entries,
        permissions: new Map(params.permissions ?? [])
    });
}

export function liveEntries(record: MutableDataRecord): MDataEntry[] {
    const live: MDataEntry[] = [];
    for (const entry of record.entries.values()) {
        if (!entry.deleted) {
            live.push({ key: entry.key, content: entry.content, version: entry.version });
        }
    }
    return live;
}

export function authorize(record: MutableDataRecord, requester: Requester, action: Action): void {
    if (record.owner.equals(requester.key)) {
        return;
    }
    if (!requester.authorised) {
        throw new CoreError('PermissionDenied', 'Requester key is not authorised by the record owner');
    }
    const decision = effectivePermission(record.permissions, record.owner, requester.key, action);
    if (decision !== 'Allowed') {
        throw new CoreError('PermissionDenied', `${action} is ${decision === 'Denied' ? 'denied' : 'not granted'} for this requester`);
    }
}

/**
 * Keys the owner authorised follow the tri-state Read permission. Other keys, and requests
 * that carry no key at all, read only where Anyone is allowed to.
 */
export function authorizeRead(record: MutableDataRecord, requester: Requester | null): void {
    if (requester && (requester.authorised || record.owner.equals(requester.key))) {
        authorize(record, requester, 'Read');
        return;
    }
    if (anyonePermission(record.permissions, 'Read') !== 'Allowed') {
        throw new CoreError(
            'PermissionDenied',
            requester ? 'Requester key is not authorised by the record owner' : 'Read is not granted to anonymous requesters'
        );
    }
}

function checkRecordVersion(record: MutableDataRecord, expectedVersion: number): void {
    if (record.version !== expectedVersion) {
        throw new CoreError('VersionConflict', `Record version is ${record.version}, request expected ${expectedVersion}`);
    }
}

function requiredAction(action: EntryAction): Action {
    return action.type;
}

function validateAction(current: StoredEntry | undefined, action: EntryAction): CoreError | null {
    const label = action.key.toString('hex');
    switch (action.type) {
        case 'Insert':
            if (current && !current.deleted) {
                return new CoreError('AlreadyExists', `Entry ${label} already exists`);
            }
            return null;
        case 'Update':
        case 'Delete':
            if (!current || current.deleted) {
                return new CoreError('NotFound', `Entry ${label} does not exist`);
            }
            if (current.version !== action.expectedVersion) {
                return new CoreError(
                    'VersionConflict',
                    `Entry ${label} is at version ${current.version}, ${action.type} expected ${action.expectedVersion}`
                );
            }
            return null;
    }
}

function applyAction(current: StoredEntry | undefined, action: EntryAction): StoredEntry {
    switch (action.type) {
        case 'Insert':
            return { key: action.key, content: action.content, version: current ? current.version + 1 : 0, deleted: false };
        case 'Update':
            return { key: action.key, content: action.content, version: action.expectedVersion + 1, deleted: false };
        case 'Delete':
            return { key: action.key, content: Buffer.alloc(0), version: action.expectedVersion + 1, deleted: true };
    }
}

/**
 * Applies a batch atomically. A single failing action aborts the whole batch;
 * VersionConflict is reported in preference to any other failure.
 */
export function applyEntryActions(
    record: MutableDataRecord,
    actions: EntryActionsCollection,
    requester: Requester
): MutableDataRecord {
    const kinds = new Set<Action>();
    for (const action of actions.values()) {
        kinds.add(requiredAction(action));
    }
    for (const kind of kinds) {
        authorize(record, requester, kind);
    }

    const failures: CoreError[] = [];
    for (const [id, action] of actions) {
        const failure = validateAction(record.entries.get(id), action);
        if (failure) {
            failures.push(failure);
        }
    }
    const first = failures.find(failure => failure.kind === 'VersionConflict') ?? failures[0];
    if (first) {
        throw failures.length === 1
            ? first
            : new CoreError(first.kind, `${failures.length} entry actions failed: ${failures.map(f => f.description).join('; ')}`);
    }

    const entries = new Map(record.entries);
    for (const [id, action] of actions) {
        entries.set(id, applyAction(record.entries.get(id), action));
    }
    return Object.freeze({ ...record, entries });
}

export function setUserPermissions(
    record: MutableDataRecord,
    user: User,
    set: PermissionSet,
    expectedVersion: number,
    requester: Requester
): MutableDataRecord {
    authorize(record, requester, 'ManagePermissions');
    checkRecordVersion(record, expectedVersion);

    const permissions = new Map(record.permissions);
    permissions.set(userId(user), { user, set });
    return Object.freeze({ ...record, permissions, version: record.version + 1 });
}

export function deleteUserPermissions(
    record: MutableDataRecord,
    user: User,
    expectedVersion: number,
    requester: Requester
): MutableDataRecord {
    authorize(record, requester, 'ManagePermissions');
    checkRecordVersion(record, expectedVersion);

    const id = userId(user);
    if (!record.permissions.has(id)) {
        throw new CoreError('NotFound', `No permissions stored for ${id}`);
    }
    const permissions = new Map(record.permissions);
    permissions.delete(id);
    return Object.freeze({ ...record, permissions, version: record.version + 1 });
}

export function changeOwner(
    record: MutableDataRecord,
    newOwner: Buffer,
    expectedVersion: number,
    requester: Requester
): MutableDataRecord {
    if (!record.owner.equals(requester.key)) {
        throw new CoreError('PermissionDenied', 'Only the current owner may transfer ownership');
    }
    checkRecordVersion(record, expectedVersion);
    return Object.freeze({ ...record, owner: newOwner, version: record.version + 1 });
}
