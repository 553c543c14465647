/**
 * Unit Tests: Mutable record rules
 *
 * Atomic entry batches, version checks and authorisation as applied by the network.
 *
 * @see libs/mutableData/record.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { isCoreError } from '../../libs/errors/CoreError.js';
import { EntryActions, withEntry } from '../../libs/mutableData/entries.js';
import { ANYONE, PermissionSet, userId, userKey } from '../../libs/mutableData/permissions.js';
import {
    applyEntryActions,
    changeOwner,
    deleteUserPermissions,
    liveEntries,
    MutableDataRecord,
    newRecord,
    Requester,
    setUserPermissions
} from '../../libs/mutableData/record.js';

const OWNER = Buffer.alloc(32, 1);
const APP = Buffer.alloc(32, 2);
const STRANGER = Buffer.alloc(32, 3);

const owner: Requester = { key: OWNER, authorised: false };
const app: Requester = { key: APP, authorised: true };
const stranger: Requester = { key: STRANGER, authorised: false };

const keyA = Buffer.from('a');
const keyB = Buffer.from('b');

function seeded(): MutableDataRecord {
    let entries = withEntry(new Map(), keyA, Buffer.from('one'));
    entries = withEntry(entries, keyB, Buffer.from('two'));
    return newRecord({ name: Buffer.alloc(32, 9), typeTag: 15000, owner: OWNER, entries });
}

function valueOf(record: MutableDataRecord, key: Buffer): { content: string; version: number } | undefined {
    const entry = record.entries.get(key.toString('hex'));
    return entry && !entry.deleted ? { content: entry.content.toString(), version: entry.version } : undefined;
}

describe('applyEntryActions', () => {
    it('should apply a valid batch and bump entry versions', () => {
        const next = applyEntryActions(seeded(), new EntryActions()
            .update(keyA, Buffer.from('uno'), 0)
            .insert(Buffer.from('c'), Buffer.from('three'))
            .build(), owner);

        assert.deepStrictEqual(valueOf(next, keyA), { content: 'uno', version: 1 });
        assert.deepStrictEqual(valueOf(next, Buffer.from('c')), { content: 'three', version: 0 });
        assert.deepStrictEqual(valueOf(next, keyB), { content: 'two', version: 0 });
    });

    it('should leave the record unchanged when one action has a stale version', () => {
        const record = seeded();
        assert.throws(
            () => applyEntryActions(record, new EntryActions()
                .update(keyA, Buffer.from('uno'), 0)
                .update(keyB, Buffer.from('dos'), 5)
                .build(), owner),
            { kind: 'VersionConflict' }
        );
        assert.deepStrictEqual(valueOf(record, keyA), { content: 'one', version: 0 });
        assert.deepStrictEqual(valueOf(record, keyB), { content: 'two', version: 0 });
    });

    it('should report VersionConflict ahead of other failures', () => {
        assert.throws(
            () => applyEntryActions(seeded(), new EntryActions()
                .insert(keyA, Buffer.from('dup'))
                .delete(keyB, 3)
                .build(), owner),
            (err: unknown) => isCoreError(err, 'VersionConflict') && err.message.startsWith('2 entry actions failed: ')
        );
    });

    it('should reject inserting an existing key', () => {
        assert.throws(
            () => applyEntryActions(seeded(), new EntryActions().insert(keyA, Buffer.from('again')).build(), owner),
            { kind: 'AlreadyExists' }
        );
    });

    it('should keep a tombstone version across delete and re-insert', () => {
        const deleted = applyEntryActions(seeded(), new EntryActions().delete(keyA, 0).build(), owner);
        assert.strictEqual(valueOf(deleted, keyA), undefined);
        assert.strictEqual(liveEntries(deleted).length, 1);

        const reinserted = applyEntryActions(deleted, new EntryActions().insert(keyA, Buffer.from('back')).build(), owner);
        assert.deepStrictEqual(valueOf(reinserted, keyA), { content: 'back', version: 2 });
    });

    it('should fail Update on a missing entry with NotFound', () => {
        assert.throws(
            () => applyEntryActions(seeded(), new EntryActions().update(Buffer.from('zz'), Buffer.from('x'), 0).build(), owner),
            { kind: 'NotFound' }
        );
    });

    it('should require an authorised key for non-owners', () => {
        const record = setUserPermissions(seeded(), ANYONE, PermissionSet.empty().allow('Insert'), 0, owner);
        assert.throws(
            () => applyEntryActions(record, new EntryActions().insert(Buffer.from('c'), Buffer.from('x')).build(), stranger),
            { kind: 'PermissionDenied' }
        );
    });

    it('should check every action kind in the batch', () => {
        const record = setUserPermissions(seeded(), userKey(APP), PermissionSet.empty().allow('Insert'), 0, owner);
        const insertOnly = new EntryActions().insert(Buffer.from('c'), Buffer.from('x')).build();
        assert.doesNotThrow(() => applyEntryActions(record, insertOnly, app));

        const withUpdate = new EntryActions()
            .insert(Buffer.from('c'), Buffer.from('x'))
            .update(keyA, Buffer.from('y'), 0)
            .build();
        assert.throws(() => applyEntryActions(record, withUpdate, app), { kind: 'PermissionDenied', message: 'Update is not granted for this requester' });
    });
});

describe('Permission and owner changes', () => {
    it('should version-check permission changes', () => {
        const record = setUserPermissions(seeded(), userKey(APP), PermissionSet.empty().allow('Read'), 0, owner);
        assert.strictEqual(record.version, 1);
        assert.throws(
            () => setUserPermissions(record, ANYONE, PermissionSet.empty().allow('Read'), 0, owner),
            { kind: 'VersionConflict' }
        );
    });

    it('should let a ManagePermissions holder change permissions', () => {
        const record = setUserPermissions(seeded(), userKey(APP), PermissionSet.empty().allow('ManagePermissions'), 0, owner);
        const next = setUserPermissions(record, ANYONE, PermissionSet.empty().allow('Read'), 1, app);
        assert.strictEqual(next.version, 2);
        assert.strictEqual(next.permissions.get(userId(ANYONE))?.set.get('Read'), 'Allowed');
    });

    it('should delete permissions and fail NotFound when none are stored', () => {
        const record = setUserPermissions(seeded(), userKey(APP), PermissionSet.empty().allow('Read'), 0, owner);
        const removed = deleteUserPermissions(record, userKey(APP), 1, owner);
        assert.strictEqual(removed.permissions.size, 0);
        assert.strictEqual(removed.version, 2);
        assert.throws(() => deleteUserPermissions(removed, userKey(APP), 2, owner), { kind: 'NotFound' });
    });

    it('should only let the owner transfer ownership', () => {
        const record = setUserPermissions(seeded(), userKey(APP), PermissionSet.empty().allow('ManagePermissions'), 0, owner);
        assert.throws(() => changeOwner(record, APP, 1, app), { kind: 'PermissionDenied' });
        assert.throws(() => changeOwner(record, APP, 0, owner), { kind: 'VersionConflict' });

        const transferred = changeOwner(record, APP, 1, owner);
        assert.deepStrictEqual(transferred.owner, APP);
        assert.strictEqual(transferred.version, 2);
    });
});
