/**
 * MutableDataStore
 *
 * Handle-based operations on versioned, permissioned records. Values of private records
 * are returned as stored; callers decrypt through the record's MDataInfo.
 */

import { z } from 'zod';
import { ContextLogger } from '../logging/logger.js';
import { Handle } from '../registry/CapabilityRegistry.js';
import type { ContextRegistry } from '../context/objects.js';
import { validate } from '../validation/zod-middleware.js';
import { CoreError } from '../errors/CoreError.js';
import { EntriesCollection, MDataValue } from './entries.js';
import { MDataCollections, UserRef } from './collections.js';
import { MDataInfo, MDataKind } from './mdataInfo.js';
import { MDataOps } from './operations.js';
import { PermissionsCollection, userId } from './permissions.js';

export const METADATA_KEY = Buffer.from('_metadata', 'utf8');

const UserMetadataSchema = z.object({
    name: z.string().optional(),
    description: z.string().optional()
});

export type UserMetadata = z.infer<typeof UserMetadataSchema>;

export function encodeMetadata(metadata: UserMetadata): Buffer {
    return Buffer.from(JSON.stringify(validate(UserMetadataSchema, metadata, 'record metadata')), 'utf8');
}

export function decodeMetadata(encoded: Buffer): UserMetadata {
    let raw: unknown;
    try {
        raw = JSON.parse(encoded.toString('utf8'));
    } catch (err: unknown) {
        throw new CoreError('DecodeError', 'Record metadata is not valid JSON', { cause: err });
    }
    return validate(UserMetadataSchema, raw, 'record metadata');
}

export class MutableDataStore {
    constructor(
        private readonly registry: ContextRegistry,
        private readonly ops: MDataOps,
        private readonly collections: MDataCollections,
        private readonly log: ContextLogger
    ) { }

    // ──────────────── Record identity ────────────────

    newInfoPublic(name: Buffer, typeTag: number): Handle<'mdataInfo'> {
        return this.registry.create('mdataInfo', MDataInfo.newPublic(name, typeTag));
    }

    newInfoPrivate(name: Buffer, typeTag: number, key: Buffer, nonce: Buffer): Handle<'mdataInfo'> {
        return this.registry.create('mdataInfo', MDataInfo.newPrivate(name, typeTag, { key, nonce }));
    }

    newInfoRandom(kind: MDataKind, typeTag: number): Handle<'mdataInfo'> {
        return this.registry.create('mdataInfo', MDataInfo.random(kind, typeTag));
    }

    encryptEntryKey(info: Handle<'mdataInfo'>, key: Buffer): Buffer {
        return this.registry.resolve(info, 'mdataInfo').encryptEntryKey(key);
    }

    encryptEntryValue(info: Handle<'mdataInfo'>, value: Buffer): Buffer {
        return this.registry.resolve(info, 'mdataInfo').encryptEntryValue(value);
    }

    decrypt(info: Handle<'mdataInfo'>, ciphertext: Buffer): Buffer {
        return this.registry.resolve(info, 'mdataInfo').decrypt(ciphertext);
    }

    serialiseInfo(info: Handle<'mdataInfo'>): Buffer {
        return this.registry.resolve(info, 'mdataInfo').serialise();
    }

    deserialiseInfo(serialised: Buffer): Handle<'mdataInfo'> {
        return this.registry.create('mdataInfo', MDataInfo.deserialise(serialised));
    }

    freeInfo(info: Handle<'mdataInfo'>): void {
        this.registry.resolve(info, 'mdataInfo');
        this.registry.free(info);
    }

    // ──────────────── Records ────────────────

    /**
     * Creates the record, owned by this context's owner key.
     */
    async put(info: Handle<'mdataInfo'>, permissions?: Handle<'permissions'>, entries?: Handle<'entries'>): Promise<void> {
        const mdata = this.registry.resolve(info, 'mdataInfo');
        const permissionsValue: PermissionsCollection = permissions ? this.registry.resolve(permissions, 'permissions') : new Map();
        const entriesValue: EntriesCollection = entries ? this.registry.resolve(entries, 'entries') : new Map();
        await this.ops.put(mdata, this.ops.client.ownerKey, permissionsValue, entriesValue);
        this.log.debug({ typeTag: mdata.typeTag, entries: entriesValue.size }, 'Mutable record created');
    }

    async getVersion(info: Handle<'mdataInfo'>): Promise<number> {
        return this.ops.getVersion(this.registry.resolve(info, 'mdataInfo'));
    }

    async getValue(info: Handle<'mdataInfo'>, key: Buffer): Promise<MDataValue> {
        return this.ops.getValue(this.registry.resolve(info, 'mdataInfo'), key);
    }

    async listEntries(info: Handle<'mdataInfo'>): Promise<Handle<'entries'>> {
        const entries = await this.ops.entries(this.registry.resolve(info, 'mdataInfo'));
        const collection = this.collections.newEntries();
        this.registry.update(collection, 'entries', new Map(entries.map(entry => [entry.key.toString('hex'), entry])));
        return collection;
    }

    async listKeys(info: Handle<'mdataInfo'>): Promise<Handle<'keys'>> {
        const entries = await this.ops.entries(this.registry.resolve(info, 'mdataInfo'));
        return this.registry.create('keys', entries.map(entry => entry.key));
    }

    async listValues(info: Handle<'mdataInfo'>): Promise<Handle<'values'>> {
        const entries = await this.ops.entries(this.registry.resolve(info, 'mdataInfo'));
        return this.registry.create('values', entries.map(entry => ({ content: entry.content, version: entry.version })));
    }

    /**
     * Applies the batch atomically; any failure leaves the record unchanged.
     */
    async mutate(info: Handle<'mdataInfo'>, actions: Handle<'entryActions'>): Promise<void> {
        const mdata = this.registry.resolve(info, 'mdataInfo');
        const batch = this.registry.resolve(actions, 'entryActions');
        await this.ops.mutate(mdata, batch);
        this.log.debug({ typeTag: mdata.typeTag, actions: batch.size }, 'Entry actions applied');
    }

    async listPermissions(info: Handle<'mdataInfo'>): Promise<Handle<'permissions'>> {
        const permissions = await this.ops.permissions(this.registry.resolve(info, 'mdataInfo'));
        return this.registry.create('permissions', new Map(permissions));
    }

    async listUserPermissions(info: Handle<'mdataInfo'>, user: UserRef): Promise<Handle<'permissionSet'>> {
        const mdata = this.registry.resolve(info, 'mdataInfo');
        const resolved = this.collections.resolveUser(user);
        const entry = (await this.ops.permissions(mdata)).get(userId(resolved));
        if (!entry) {
            throw new CoreError('NotFound', `No permissions for ${userId(resolved)}`);
        }
        return this.registry.create('permissionSet', entry.set);
    }

    async setUserPermissions(
        info: Handle<'mdataInfo'>,
        user: UserRef,
        set: Handle<'permissionSet'>,
        expectedVersion: number
    ): Promise<void> {
        await this.ops.setUserPermissions(
            this.registry.resolve(info, 'mdataInfo'),
            this.collections.resolveUser(user),
            this.registry.resolve(set, 'permissionSet'),
            expectedVersion
        );
    }

    async deleteUserPermissions(info: Handle<'mdataInfo'>, user: UserRef, expectedVersion: number): Promise<void> {
        await this.ops.deleteUserPermissions(
            this.registry.resolve(info, 'mdataInfo'),
            this.collections.resolveUser(user),
            expectedVersion
        );
    }

    async changeOwner(info: Handle<'mdataInfo'>, newOwner: Handle<'signPublicKey'>, expectedVersion: number): Promise<void> {
        await this.ops.changeOwner(
            this.registry.resolve(info, 'mdataInfo'),
            this.registry.resolve(newOwner, 'signPublicKey'),
            expectedVersion
        );
    }

    encodeMetadata(metadata: UserMetadata): Buffer {
        return encodeMetadata(metadata);
    }
}
