/**
 * Storage network boundary.
 *
 * The network itself is an external collaborator; the core only depends on this interface.
 * Every mutating request, and every record read by a context holding keys, is signed by
 * the requester's signing key.
 */

import { EntriesCollection, EntryActionsCollection } from '../mutableData/entries.js';
import { MutableDataRecord } from '../mutableData/record.js';
import { PermissionSet, PermissionsCollection, User } from '../mutableData/permissions.js';

export interface RecordAddress {
    readonly name: Buffer;
    readonly typeTag: number;
}

export type MutationRequest =
    | { readonly type: 'CreateAccount' }
    | {
        readonly type: 'PutMData';
        readonly address: RecordAddress;
        readonly owner: Buffer;
        readonly permissions: PermissionsCollection;
        readonly entries: EntriesCollection;
    }
    | { readonly type: 'MutateMDataEntries'; readonly address: RecordAddress; readonly actions: EntryActionsCollection }
    | {
        readonly type: 'SetMDataUserPermissions';
        readonly address: RecordAddress;
        readonly user: User;
        readonly set: PermissionSet;
        readonly version: number;
    }
    | { readonly type: 'DelMDataUserPermissions'; readonly address: RecordAddress; readonly user: User; readonly version: number }
    | { readonly type: 'ChangeMDataOwner'; readonly address: RecordAddress; readonly newOwner: Buffer; readonly version: number }
    | { readonly type: 'PutIData'; readonly content: Buffer }
    | { readonly type: 'InsAuthKey'; readonly key: Buffer; readonly version: number }
    | { readonly type: 'DelAuthKey'; readonly key: Buffer; readonly version: number };

export type MutationType = MutationRequest['type'];

export type NetworkOperation = 'GetMData' | 'GetIData' | 'ListAuthKeys' | MutationType;

export interface RequestAuth {
    readonly requester: Buffer;
    readonly signature: Buffer;
}

export interface AuthKeys {
    readonly keys: readonly Buffer[];
    readonly version: number;
}

export interface DataNetwork {
    /**
     * Fails NotFound when no record exists at the address, PermissionDenied when the
     * requester may not read it. A null auth reads anonymously.
     */
    getMData(address: RecordAddress, auth: RequestAuth | null): Promise<MutableDataRecord>;
    /** Fails NotFound when no blob exists at the address (64 hex chars) */
    getIData(address: string): Promise<Buffer>;
    listAuthKeys(owner: Buffer): Promise<AuthKeys>;
    /** Returns the content address for PutIData, otherwise null */
    mutate(request: MutationRequest, auth: RequestAuth): Promise<string | null>;
}

function canonicalReplacer(_key: string, value: unknown): unknown {
    if (value instanceof Map) {
        return [...value.entries()].sort(([a], [b]) => (String(a) < String(b) ? -1 : String(a) > String(b) ? 1 : 0));
    }
    if (value instanceof Uint8Array) {
        return Buffer.from(value).toString('hex');
    }
    if (typeof value === 'object' && value !== null && 'type' in value && value.type === 'Buffer' && 'data' in value && Array.isArray(value.data)) {
        return Buffer.from(value.data).toString('hex');
    }
    return value;
}

/**
 * Canonical bytes a requester signs for a mutation.
 */
export function mutationPayload(request: MutationRequest): Buffer {
    return Buffer.from(JSON.stringify(request, canonicalReplacer), 'utf8');
}

/**
 * Canonical bytes a requester signs to read a record.
 */
export function readPayload(address: RecordAddress): Buffer {
    return Buffer.from(JSON.stringify({ type: 'GetMData', address }, canonicalReplacer), 'utf8');
}
