/**
 * Value-level mutable-data operations over a NetworkClient.
 * The handle-based MutableDataStore and the authenticator both build on these.
 */

import { CoreError } from '../errors/CoreError.js';
import { NetworkClient } from '../network/client.js';
import { RecordAddress } from '../network/types.js';
import { EntriesCollection, EntryActionsCollection, entryKeyId, MDataEntry, MDataValue } from './entries.js';
import { MDataInfo } from './mdataInfo.js';
import { PermissionSet, PermissionsCollection, User } from './permissions.js';
import { liveEntries, MutableDataRecord } from './record.js';

export function addressOf(info: MDataInfo): RecordAddress {
    return { name: info.name, typeTag: info.typeTag };
}

export class MDataOps {
    constructor(readonly client: NetworkClient) { }

    async put(
        info: MDataInfo,
        owner: Buffer,
        permissions: PermissionsCollection = new Map(),
        entries: EntriesCollection = new Map()
    ): Promise<void> {
        await this.client.mutate({ type: 'PutMData', address: addressOf(info), owner, permissions, entries });
    }

    get(info: MDataInfo): Promise<MutableDataRecord> {
        return this.client.getMData(addressOf(info));
    }

    async getVersion(info: MDataInfo): Promise<number> {
        return (await this.get(info)).version;
    }

    /**
     * Looks up an entry by its stored (possibly encrypted) key.
     */
    async getValue(info: MDataInfo, key: Buffer): Promise<MDataValue> {
        const entry = (await this.get(info)).entries.get(entryKeyId(key));
        if (!entry || entry.deleted) {
            throw new CoreError('NotFound', `No entry ${key.toString('hex')} in record`);
        }
        return { content: entry.content, version: entry.version };
    }

    async entries(info: MDataInfo): Promise<MDataEntry[]> {
        return liveEntries(await this.get(info));
    }

    async mutate(info: MDataInfo, actions: EntryActionsCollection): Promise<void> {
        await this.client.mutate({ type: 'MutateMDataEntries', address: addressOf(info), actions });
    }

    async permissions(info: MDataInfo): Promise<PermissionsCollection> {
        return (await this.get(info)).permissions;
    }

    async setUserPermissions(info: MDataInfo, user: User, set: PermissionSet, version: number): Promise<void> {
        await this.client.mutate({ type: 'SetMDataUserPermissions', address: addressOf(info), user, set, version });
    }

    async deleteUserPermissions(info: MDataInfo, user: User, version: number): Promise<void> {
        await this.client.mutate({ type: 'DelMDataUserPermissions', address: addressOf(info), user, version });
    }

    async changeOwner(info: MDataInfo, newOwner: Buffer, version: number): Promise<void> {
        await this.client.mutate({ type: 'ChangeMDataOwner', address: addressOf(info), newOwner, version });
    }

    // ──────────────── Plaintext helpers for private records ────────────────

    async getPlainValue(info: MDataInfo, plainKey: Buffer): Promise<MDataValue> {
        const value = await this.getValue(info, info.encryptEntryKey(plainKey));
        return { content: info.decrypt(value.content), version: value.version };
    }

    async findPlainValue(info: MDataInfo, plainKey: Buffer): Promise<MDataValue | null> {
        try {
            return await this.getPlainValue(info, plainKey);
        } catch (err: unknown) {
            if (err instanceof CoreError && err.kind === 'NotFound') {
                return null;
            }
            throw err;
        }
    }
}
