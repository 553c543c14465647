/**
 * UserAccount
 *
 * The authenticator's persistent state on the network: the user's root container map,
 * the encrypted config record (registered apps and the revocation queue) and the shared
 * access container.
 */

import { z } from 'zod';
import { CryptoKeyStore, AppKeys } from '../crypto/keyManager.js';
import { generateNonce, NONCE_BYTES, sha3Hash } from '../crypto/primitives.js';
import { CoreError } from '../errors/CoreError.js';
import { EntryActions, EntriesCollection, withEntry } from '../mutableData/entries.js';
import { MDataInfo, MDataKind } from '../mutableData/mdataInfo.js';
import { MDataOps } from '../mutableData/operations.js';
import { AppExchangeInfoSchema, AppKeysSchema } from '../validation/ipcSchema.js';
import { validate } from '../validation/zod-middleware.js';
import { AccessContainerEntry, AccessContInfo, AppExchangeInfo } from '../ipc/types.js';
import {
    accessContainerMDataInfo,
    accessEntryKey,
    decodeAccessEntry,
    encodeAccessEntry
} from '../accessContainer/entry.js';

export const CONTAINER_TYPE_TAG = 15000;
export const ACCESS_CONTAINER_TYPE_TAG = 15001;
export const CONFIG_TYPE_TAG = 15002;
export const USER_ROOT_TYPE_TAG = 15003;

const CONFIG_APPS_KEY = 'authenticator-config';
const CONFIG_QUEUE_KEY = 'revocation-queue';

export interface AppRecord {
    readonly info: AppExchangeInfo;
    readonly keys: AppKeys;
}

export type AppState = 'Authenticated' | 'Revoked' | 'NotAuthenticated';

/**
 * A value read from a record entry; `version` is null when the entry does not exist yet.
 */
export interface Versioned<T> {
    readonly value: T;
    readonly version: number | null;
}

export interface ContainerSpec {
    readonly name: string;
    readonly kind: MDataKind;
}

const AppsSchema = z.array(z.tuple([z.string(), z.object({ info: AppExchangeInfoSchema, keys: AppKeysSchema })]));

const QueueSchema = z.array(z.string().min(1));

function parseJSON(content: Buffer, label: string): unknown {
    try {
        return JSON.parse(content.toString('utf8'));
    } catch (err: unknown) {
        throw new CoreError('DecodeError', `${label} is not valid JSON`, { cause: err });
    }
}

function appsToWire(apps: ReadonlyMap<string, AppRecord>): unknown {
    return [...apps.entries()].map(([appId, record]) => [appId, {
        info: record.info,
        keys: {
            ownerKey: record.keys.ownerKey.toString('base64'),
            encKey: record.keys.encKey.toString('base64'),
            signPk: record.keys.signPk.toString('base64'),
            signSk: record.keys.signSk.toString('base64'),
            encPk: record.keys.encPk.toString('base64'),
            encSk: record.keys.encSk.toString('base64')
        }
    }]);
}

export class UserAccount {
    constructor(
        readonly keys: CryptoKeyStore,
        readonly ops: MDataOps,
        readonly root: MDataInfo,
        readonly config: MDataInfo,
        readonly accessContainer: AccessContInfo
    ) { }

    get ownerKey(): Buffer {
        return this.keys.signPublicKey;
    }

    /**
     * Creates the account, its default containers and the bookkeeping records.
     */
    static async create(keys: CryptoKeyStore, ops: MDataOps, containers: readonly ContainerSpec[]): Promise<UserAccount> {
        await ops.client.mutate({ type: 'CreateAccount' });
        const owner = keys.signPublicKey;

        const root = MDataInfo.random('Private', USER_ROOT_TYPE_TAG);
        let rootEntries: EntriesCollection = new Map();
        for (const spec of containers) {
            const info = MDataInfo.random(spec.kind, CONTAINER_TYPE_TAG);
            await ops.put(info, owner);
            rootEntries = withEntry(
                rootEntries,
                root.encryptEntryKey(Buffer.from(spec.name, 'utf8')),
                root.encryptEntryValue(info.serialise())
            );
        }
        await ops.put(root, owner, new Map(), rootEntries);

        // Config record location and keys follow from the account keys alone
        const config = MDataInfo.newPrivate(sha3Hash(await keys.deriveKey('config/name')), CONFIG_TYPE_TAG, {
            key: await keys.deriveKey('config/root'),
            nonce: (await keys.deriveKey('config/nonce')).subarray(0, NONCE_BYTES)
        });
        await ops.put(config, owner);

        const access = MDataInfo.random('Public', ACCESS_CONTAINER_TYPE_TAG);
        await ops.put(access, owner);

        return new UserAccount(keys, ops, root, config, {
            contentAddress: access.name,
            typeTag: access.typeTag,
            nonce: generateNonce()
        });
    }

    // ──────────────── Root container map ────────────────

    async containers(): Promise<Map<string, MDataInfo>> {
        const result = new Map<string, MDataInfo>();
        for (const entry of await this.ops.entries(this.root)) {
            const name = this.root.decrypt(entry.key).toString('utf8');
            result.set(name, MDataInfo.deserialise(this.root.decrypt(entry.content)));
        }
        return result;
    }

    async container(name: string): Promise<Versioned<MDataInfo> | null> {
        const stored = await this.ops.findPlainValue(this.root, Buffer.from(name, 'utf8'));
        return stored ? { value: MDataInfo.deserialise(stored.content), version: stored.version } : null;
    }

    async saveContainer(name: string, info: MDataInfo, version: number | null): Promise<void> {
        await this.writePlain(this.root, name, info.serialise(), version);
    }

    // ──────────────── Config record ────────────────

    async loadApps(): Promise<Versioned<Map<string, AppRecord>>> {
        const stored = await this.ops.findPlainValue(this.config, Buffer.from(CONFIG_APPS_KEY, 'utf8'));
        if (!stored) {
            return { value: new Map(), version: null };
        }
        const pairs = validate(AppsSchema, parseJSON(stored.content, 'Authenticator config'), 'authenticator config');
        return { value: new Map(pairs), version: stored.version };
    }

    async saveApps(apps: ReadonlyMap<string, AppRecord>, version: number | null): Promise<void> {
        await this.writePlain(this.config, CONFIG_APPS_KEY, Buffer.from(JSON.stringify(appsToWire(apps)), 'utf8'), version);
    }

    async updateApps(update: (apps: Map<string, AppRecord>) => void): Promise<void> {
        const { value, version } = await this.loadApps();
        const next = new Map(value);
        update(next);
        await this.saveApps(next, version);
    }

    async loadQueue(): Promise<Versioned<string[]>> {
        const stored = await this.ops.findPlainValue(this.config, Buffer.from(CONFIG_QUEUE_KEY, 'utf8'));
        if (!stored) {
            return { value: [], version: null };
        }
        return {
            value: validate(QueueSchema, parseJSON(stored.content, 'Revocation queue'), 'revocation queue'),
            version: stored.version
        };
    }

    async saveQueue(queue: readonly string[], version: number | null): Promise<void> {
        await this.writePlain(this.config, CONFIG_QUEUE_KEY, Buffer.from(JSON.stringify(queue), 'utf8'), version);
    }

    // ──────────────── Access container ────────────────

    async accessEntry(app: AppRecord): Promise<Versioned<AccessContainerEntry> | null> {
        const key = accessEntryKey(app.info.id, app.keys.encKey, this.accessContainer);
        try {
            const stored = await this.ops.getValue(accessContainerMDataInfo(this.accessContainer), key);
            return { value: decodeAccessEntry(stored.content, app.keys.encKey), version: stored.version };
        } catch (err: unknown) {
            if (err instanceof CoreError && err.kind === 'NotFound') {
                return null;
            }
            throw err;
        }
    }

    async saveAccessEntry(app: AppRecord, entry: AccessContainerEntry, version: number | null): Promise<void> {
        const key = accessEntryKey(app.info.id, app.keys.encKey, this.accessContainer);
        const value = encodeAccessEntry(entry, app.keys.encKey);
        const actions = new EntryActions();
        if (version === null) {
            actions.insert(key, value);
        } else {
            actions.update(key, value, version);
        }
        await this.ops.mutate(accessContainerMDataInfo(this.accessContainer), actions.build());
    }

    async deleteAccessEntry(app: AppRecord, version: number): Promise<void> {
        const key = accessEntryKey(app.info.id, app.keys.encKey, this.accessContainer);
        await this.ops.mutate(accessContainerMDataInfo(this.accessContainer), new EntryActions().delete(key, version).build());
    }

    /**
     * Authenticated: known and holding an access entry. Revoked: known, entry removed.
     */
    async appState(appId: string, apps?: ReadonlyMap<string, AppRecord>): Promise<AppState> {
        const app = (apps ?? (await this.loadApps()).value).get(appId);
        if (!app) {
            return 'NotAuthenticated';
        }
        return (await this.accessEntry(app)) ? 'Authenticated' : 'Revoked';
    }

    // ──────────────── Authorised keys ────────────────

    async listAuthorisedKeys(): Promise<Buffer[]> {
        return [...(await this.ops.client.listAuthKeys(this.ownerKey)).keys];
    }

    async authoriseKey(key: Buffer): Promise<void> {
        const { keys, version } = await this.ops.client.listAuthKeys(this.ownerKey);
        if (keys.some(existing => existing.equals(key))) {
            return;
        }
        await this.ops.client.mutate({ type: 'InsAuthKey', key, version });
    }

    async revokeKey(key: Buffer): Promise<void> {
        const { keys, version } = await this.ops.client.listAuthKeys(this.ownerKey);
        if (!keys.some(existing => existing.equals(key))) {
            return;
        }
        await this.ops.client.mutate({ type: 'DelAuthKey', key, version });
    }

    private async writePlain(info: MDataInfo, key: string, content: Buffer, version: number | null): Promise<void> {
        const storedKey = info.encryptEntryKey(Buffer.from(key, 'utf8'));
        const storedValue = info.encryptEntryValue(content);
        const actions = new EntryActions();
        if (version === null) {
            actions.insert(storedKey, storedValue);
        } else {
            actions.update(storedKey, storedValue, version);
        }
        await this.ops.mutate(info, actions.build());
    }
}
