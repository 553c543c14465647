/**
 * RevocationQueue
 *
 * FIFO of app ids awaiting revocation, persisted in the config record so that `flush`
 * resumes after a crash. Every step checks current state before acting, so re-running a
 * step that already completed is a no-op. The app's access entry is removed last: while it
 * exists, the revocation is unfinished. The key and its permissions are cleared even for an
 * app that holds no entry, which is what a grant that failed part-way leaves behind.
 */

import { getComponentLogger } from '../logging/logger.js';
import { AuditLogger } from '../audit/logger.js';
import { CoreError } from '../errors/CoreError.js';
import { encodeRevoked } from '../ipc/authIpc.js';
import { accessContainerMDataInfo, withContainer } from '../accessContainer/entry.js';
import { EntryActions } from '../mutableData/entries.js';
import { MDataInfo } from '../mutableData/mdataInfo.js';
import { User, userId, userKey } from '../mutableData/permissions.js';
import { RetryPolicy, withRetry } from '../network/retry.js';
import { AppRecord, UserAccount } from './account.js';

const logger = getComponentLogger('RevocationQueue');

function sameKeys(a: MDataInfo, b: MDataInfo): boolean {
    if (!a.encInfo || !b.encInfo) {
        return a.encInfo === b.encInfo;
    }
    return a.encInfo.key.equals(b.encInfo.key) && a.encInfo.nonce.equals(b.encInfo.nonce);
}

export class RevocationQueue {
    constructor(
        private readonly account: UserAccount,
        private readonly audit: AuditLogger,
        private readonly policy: RetryPolicy
    ) { }

    async pending(): Promise<string[]> {
        return (await this.account.loadQueue()).value;
    }

    /**
     * Appends an app id; enqueueing an id that is already queued is a no-op.
     */
    async enqueue(appId: string): Promise<void> {
        const { value: apps } = await this.account.loadApps();
        if (!apps.has(appId)) {
            throw new CoreError('NotFound', `Unknown app ${appId}`);
        }
        const { value: queue, version } = await this.account.loadQueue();
        if (queue.includes(appId)) {
            return;
        }
        await this.account.saveQueue([...queue, appId], version);
        this.audit.log({ type: 'REVOCATION_ENQUEUED', appId, decision: 'EXECUTED' });
    }

    /**
     * Revokes queued apps strictly in order until the queue is empty.
     */
    async flush(): Promise<void> {
        for (;;) {
            const { value: queue } = await this.account.loadQueue();
            const next = queue[0];
            if (next === undefined) {
                return;
            }
            await this.revokeSingle(next);
            await this.step('pop-queue', next, () => this.pop(next));
        }
    }

    /**
     * Enqueues and flushes, returning the `Revoked` notification for the app.
     */
    async revokeApp(appId: string): Promise<string> {
        await this.enqueue(appId);
        await this.flush();
        return encodeRevoked(appId);
    }

    private step<T>(label: string, appId: string, operation: () => Promise<T>): Promise<T> {
        logger.debug({ appId, step: label }, 'Revocation step');
        return withRetry(`revocation.${label}`, operation, this.policy);
    }

    private async pop(appId: string): Promise<void> {
        const { value: queue, version } = await this.account.loadQueue();
        if (queue[0] === appId) {
            await this.account.saveQueue(queue.slice(1), version);
        }
    }

    private async revokeSingle(appId: string): Promise<void> {
        const { value: apps } = await this.account.loadApps();
        const app = apps.get(appId);
        if (!app) {
            logger.warn({ appId }, 'Queued app is unknown; dropping');
            return;
        }
        const access = await this.step('read-entry', appId, () => this.account.accessEntry(app));

        await this.step('delete-auth-key', appId, () => this.account.revokeKey(app.keys.signPk));

        const user = userKey(app.keys.signPk);
        const records = await this.step('list-containers', appId, () => this.grantableRecords());
        for (const info of records) {
            await this.step('strip-permissions', appId, () => this.stripPermissions(info, user));
        }
        if (!access) {
            logger.debug({ appId }, 'App holds no access entry; key and permissions cleared');
            return;
        }

        for (const [name, { info }] of access.value) {
            if (info.isPrivate()) {
                await this.step('rotate-container', appId, () => this.rotateContainer(name, info, appId, apps));
            }
        }

        await this.step('delete-entry', appId, async () => {
            const current = await this.account.accessEntry(app);
            if (current && current.version !== null) {
                await this.account.deleteAccessEntry(app, current.version);
            }
        });

        this.audit.log({ type: 'APP_REVOKED', appId, decision: 'EXECUTED', resources: [...access.value.keys()] });
        logger.info({ appId, containers: access.value.size }, 'App revoked');
    }

    /**
     * Every record a grant can give an app permissions on: the access container and the
     * root containers.
     */
    private async grantableRecords(): Promise<MDataInfo[]> {
        const containers = await this.account.containers();
        return [accessContainerMDataInfo(this.account.accessContainer), ...containers.values()];
    }

    private async stripPermissions(info: MDataInfo, user: User): Promise<void> {
        const record = await this.account.ops.get(info);
        if (record.permissions.has(userId(user))) {
            await this.account.ops.deleteUserPermissions(info, user, record.version);
        }
    }

    /**
     * Re-keys a private container the revoked app could decrypt: stage new keys in the root
     * map, re-encrypt every entry, commit, then hand the new keys to the remaining apps.
     */
    private async rotateContainer(
        name: string,
        revokedView: MDataInfo,
        revokedAppId: string,
        apps: ReadonlyMap<string, AppRecord>
    ): Promise<void> {
        const current = await this.account.container(name);
        if (!current || current.version === null) {
            return;
        }
        let info = current.value;
        let version = current.version;

        if (info.newEncInfo || sameKeys(info, revokedView)) {
            if (!info.newEncInfo) {
                info = info.withPendingKeys();
                await this.account.saveContainer(name, info, version);
                version += 1;
            }
            await this.reencryptEntries(info);
            info = info.commitPendingKeys();
            await this.account.saveContainer(name, info, version);
        }

        await this.propagate(name, info, revokedAppId, apps);
    }

    private async reencryptEntries(info: MDataInfo): Promise<void> {
        const target = info.withNewKeysOnly();
        const actions = new EntryActions();
        for (const entry of await this.account.ops.entries(info)) {
            const plainKey = info.decrypt(entry.key);
            const newKey = target.encryptEntryKey(plainKey);
            if (newKey.equals(entry.key)) {
                continue;
            }
            actions.delete(entry.key, entry.version);
            actions.insert(newKey, target.encryptEntryValue(info.decrypt(entry.content)));
        }
        if (actions.size > 0) {
            await this.account.ops.mutate(info, actions.build());
        }
    }

    private async propagate(
        name: string,
        info: MDataInfo,
        revokedAppId: string,
        apps: ReadonlyMap<string, AppRecord>
    ): Promise<void> {
        for (const [appId, app] of apps) {
            if (appId === revokedAppId) {
                continue;
            }
            const access = await this.account.accessEntry(app);
            const granted = access?.value.get(name);
            if (!access || access.version === null || !granted || sameKeys(granted.info, info)) {
                continue;
            }
            await this.account.saveAccessEntry(
                app,
                withContainer(access.value, name, { info, permissions: granted.permissions }),
                access.version
            );
        }
    }
}
