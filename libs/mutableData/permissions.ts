/**
 * Tri-state permission model for mutable records.
 *
 * A stored PermissionSet maps each action to Allowed or Denied; an absent action is NotSet.
 * Requests use the plain boolean form (PermissionRequest).
 */

export const ACTIONS = ['Read', 'Insert', 'Update', 'Delete', 'ManagePermissions'] as const;

export type Action = (typeof ACTIONS)[number];

export type PermissionState = 'NotSet' | 'Allowed' | 'Denied';

export type User =
    | { readonly kind: 'Anyone' }
    | { readonly kind: 'Key'; readonly key: Buffer };

export const ANYONE: User = Object.freeze({ kind: 'Anyone' });

export function userKey(key: Buffer): User {
    return Object.freeze({ kind: 'Key', key });
}

/**
 * Stable map key for a user.
 */
export function userId(user: User): string {
    return user.kind === 'Anyone' ? 'anyone' : `key:${user.key.toString('hex')}`;
}

/**
 * Boolean-per-axis form used in IPC requests.
 */
export interface PermissionRequest {
    readonly read?: boolean;
    readonly insert?: boolean;
    readonly update?: boolean;
    readonly delete?: boolean;
    readonly managePermissions?: boolean;
}

const REQUEST_AXES: ReadonlyArray<readonly [keyof PermissionRequest, Action]> = [
    ['read', 'Read'],
    ['insert', 'Insert'],
    ['update', 'Update'],
    ['delete', 'Delete'],
    ['managePermissions', 'ManagePermissions']
];

type StoredState = Exclude<PermissionState, 'NotSet'>;

export class PermissionSet {
    private constructor(private readonly states: ReadonlyMap<Action, StoredState>) { }

    static empty(): PermissionSet {
        return new PermissionSet(new Map());
    }

    static fromRequest(request: PermissionRequest): PermissionSet {
        return PermissionSet.empty().grant(request);
    }

    static fromEntries(entries: Iterable<readonly [Action, StoredState]>): PermissionSet {
        return new PermissionSet(new Map(entries));
    }

    allow(action: Action): PermissionSet {
        return this.with(action, 'Allowed');
    }

    deny(action: Action): PermissionSet {
        return this.with(action, 'Denied');
    }

    /**
     * Allows every axis the request sets; other axes keep their state.
     */
    grant(request: PermissionRequest): PermissionSet {
        let set: PermissionSet = this;
        for (const [axis, action] of REQUEST_AXES) {
            if (request[axis] === true) {
                set = set.allow(action);
            }
        }
        return set;
    }

    clear(action: Action): PermissionSet {
        const next = new Map(this.states);
        next.delete(action);
        return new PermissionSet(next);
    }

    get(action: Action): PermissionState {
        return this.states.get(action) ?? 'NotSet';
    }

    isEmpty(): boolean {
        return this.states.size === 0;
    }

    toRequest(): PermissionRequest {
        const request: { -readonly [K in keyof PermissionRequest]: boolean } = {};
        for (const [axis, action] of REQUEST_AXES) {
            if (this.get(action) === 'Allowed') {
                request[axis] = true;
            }
        }
        return request;
    }

    toJSON(): Array<[Action, StoredState]> {
        return ACTIONS.flatMap((action): Array<[Action, StoredState]> => {
            const state = this.states.get(action);
            return state ? [[action, state]] : [];
        });
    }

    equals(other: PermissionSet): boolean {
        return ACTIONS.every(action => this.get(action) === other.get(action));
    }

    private with(action: Action, state: StoredState): PermissionSet {
        const next = new Map(this.states);
        next.set(action, state);
        return new PermissionSet(next);
    }
}

export const FULL_PERMISSIONS: PermissionRequest = Object.freeze({
    read: true,
    insert: true,
    update: true,
    delete: true,
    managePermissions: true
});

export interface UserPermissions {
    readonly user: User;
    readonly set: PermissionSet;
}

export type PermissionsCollection = ReadonlyMap<string, UserPermissions>;

function decide(set: PermissionSet | undefined, action: Action): PermissionState {
    return set ? set.get(action) : 'NotSet';
}

/**
 * Effective decision for one (user, action) pair.
 *
 * The owner is granted every action, including ManagePermissions. For anyone else the
 * order is: specific Denied, specific Allowed, anyone Denied, anyone Allowed, NotSet.
 * NotSet is a deny for enforcement purposes.
 */
export function effectivePermission(
    permissions: PermissionsCollection,
    owner: Buffer,
    actor: Buffer,
    action: Action
): PermissionState {
    if (owner.equals(actor)) {
        return 'Allowed';
    }

    const specific = decide(permissions.get(userId(userKey(actor)))?.set, action);
    if (specific !== 'NotSet') {
        return specific;
    }

    return anyonePermission(permissions, action);
}

/**
 * Decision the Anyone entry alone gives; it covers requesters the owner has not authorised.
 */
export function anyonePermission(permissions: PermissionsCollection, action: Action): PermissionState {
    return decide(permissions.get(userId(ANYONE))?.set, action);
}

export function isActionAllowed(
    permissions: PermissionsCollection,
    owner: Buffer,
    actor: Buffer,
    action: Action
): boolean {
    return effectivePermission(permissions, owner, actor, action) === 'Allowed';
}
