/**
 * Unit Tests: Tri-state permission evaluation
 *
 * @see libs/mutableData/permissions.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    ACTIONS,
    ANYONE,
    effectivePermission,
    isActionAllowed,
    PermissionSet,
    PermissionsCollection,
    User,
    userId,
    userKey
} from '../../libs/mutableData/permissions.js';

const OWNER = Buffer.alloc(32, 1);
const ALICE = Buffer.alloc(32, 2);
const BOB = Buffer.alloc(32, 3);

function collection(...grants: Array<[User, PermissionSet]>): PermissionsCollection {
    return new Map(grants.map(([user, set]) => [userId(user), { user, set }]));
}

describe('PermissionSet', () => {
    it('should start with every action NotSet', () => {
        const set = PermissionSet.empty();
        for (const action of ACTIONS) {
            assert.strictEqual(set.get(action), 'NotSet');
        }
        assert.strictEqual(set.isEmpty(), true);
    });

    it('should return new sets from allow, deny and clear', () => {
        const empty = PermissionSet.empty();
        const allowed = empty.allow('Insert');
        const denied = allowed.deny('Delete');
        const cleared = denied.clear('Insert');

        assert.strictEqual(empty.get('Insert'), 'NotSet');
        assert.strictEqual(allowed.get('Insert'), 'Allowed');
        assert.strictEqual(denied.get('Delete'), 'Denied');
        assert.strictEqual(cleared.get('Insert'), 'NotSet');
        assert.strictEqual(cleared.get('Delete'), 'Denied');
    });

    it('should convert to and from the boolean request form', () => {
        const set = PermissionSet.fromRequest({ read: true, insert: true, delete: false });
        assert.strictEqual(set.get('Read'), 'Allowed');
        assert.strictEqual(set.get('Insert'), 'Allowed');
        assert.strictEqual(set.get('Delete'), 'NotSet');
        assert.deepStrictEqual(set.toRequest(), { read: true, insert: true });
    });

    it('should grant on top of existing states', () => {
        const set = PermissionSet.empty().deny('Update').grant({ read: true });
        assert.strictEqual(set.get('Read'), 'Allowed');
        assert.strictEqual(set.get('Update'), 'Denied');
    });

    it('should compare by state', () => {
        assert.strictEqual(PermissionSet.fromRequest({ read: true }).equals(PermissionSet.empty().allow('Read')), true);
        assert.strictEqual(PermissionSet.empty().allow('Read').equals(PermissionSet.empty().deny('Read')), false);
    });

    it('should serialise only stored states in action order', () => {
        const set = PermissionSet.empty().deny('Delete').allow('Read');
        assert.deepStrictEqual(set.toJSON(), [['Read', 'Allowed'], ['Delete', 'Denied']]);
    });
});

describe('effectivePermission', () => {
    it('should fall back to anyone for actions the user leaves NotSet', () => {
        const permissions = collection(
            [userKey(ALICE), PermissionSet.empty().allow('Insert').deny('Delete')],
            [ANYONE, PermissionSet.empty().allow('Update')]
        );

        assert.strictEqual(effectivePermission(permissions, OWNER, ALICE, 'Insert'), 'Allowed');
        assert.strictEqual(effectivePermission(permissions, OWNER, ALICE, 'Delete'), 'Denied');
        assert.strictEqual(effectivePermission(permissions, OWNER, ALICE, 'Update'), 'Allowed');
    });

    it('should let a specific entry win over anyone', () => {
        const permissions = collection(
            [userKey(ALICE), PermissionSet.empty().deny('Read').allow('Insert')],
            [ANYONE, PermissionSet.empty().allow('Read').deny('Insert')]
        );

        assert.strictEqual(effectivePermission(permissions, OWNER, ALICE, 'Read'), 'Denied');
        assert.strictEqual(effectivePermission(permissions, OWNER, ALICE, 'Insert'), 'Allowed');
        assert.strictEqual(effectivePermission(permissions, OWNER, BOB, 'Read'), 'Allowed');
        assert.strictEqual(effectivePermission(permissions, OWNER, BOB, 'Insert'), 'Denied');
    });

    it('should leave unlisted actions NotSet and deny them', () => {
        const permissions = collection([userKey(ALICE), PermissionSet.empty().allow('Read')]);

        assert.strictEqual(effectivePermission(permissions, OWNER, ALICE, 'ManagePermissions'), 'NotSet');
        assert.strictEqual(isActionAllowed(permissions, OWNER, ALICE, 'ManagePermissions'), false);
        assert.strictEqual(effectivePermission(permissions, OWNER, BOB, 'Read'), 'NotSet');
    });

    it('should always allow the owner, even over explicit denies', () => {
        const permissions = collection(
            [userKey(OWNER), PermissionSet.empty().deny('Delete')],
            [ANYONE, PermissionSet.empty().deny('ManagePermissions')]
        );

        for (const action of ACTIONS) {
            assert.strictEqual(effectivePermission(permissions, OWNER, OWNER, action), 'Allowed');
        }
    });

    it('should give the same decision for the same inputs', () => {
        const permissions = collection(
            [userKey(ALICE), PermissionSet.empty().allow('Insert')],
            [ANYONE, PermissionSet.empty().deny('Insert')]
        );
        const decisions = Array.from({ length: 5 }, () => effectivePermission(permissions, OWNER, ALICE, 'Insert'));
        assert.deepStrictEqual(decisions, ['Allowed', 'Allowed', 'Allowed', 'Allowed', 'Allowed']);
    });
});
