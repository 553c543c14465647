/**
 * Authenticator
 *
 * The user's side of the capability exchange. Decodes app requests, records them as pending,
 * and answers each exactly once with a grant or a denial. Every public operation runs on the
 * authenticator's own context scheduler; grants, denials and revocations take its exclusive
 * lane, since each is a read-modify-write of the account. A request stays pending until its
 * answer has been encoded, so a grant that fails can be retried or denied.
 */

import { AuditLogger } from '../audit/logger.js';
import { ContextScheduler } from '../context/scheduler.js';
import type { ContextObjects, ContextRegistry } from '../context/objects.js';
import { CryptoKeyStore } from '../crypto/keyManager.js';
import { CoreError, isCoreError } from '../errors/CoreError.js';
import { IpcErrorCode, ipcError } from '../errors/IpcError.js';
import { OperationResult } from '../errors/result.js';
import { accessContainerMDataInfo, withContainer } from '../accessContainer/entry.js';
import {
    authGrantedResponse,
    decodeIpcRequest,
    encodeIpcResponse,
    errorResponse,
    UNREGISTERED_PREFIX
} from '../ipc/authIpc.js';
import {
    AccessContainerEntry,
    AppExchangeInfo,
    AuthReq,
    ContainerPermission,
    ContainersReq,
    IpcReq,
    IpcResp,
    ShareMDataReq,
    UnregisteredReq
} from '../ipc/types.js';
import { ContextLogger, getContextLogger } from '../logging/logger.js';
import { MDataInfo } from '../mutableData/mdataInfo.js';
import { MDataOps } from '../mutableData/operations.js';
import {
    FULL_PERMISSIONS,
    PermissionRequest,
    PermissionSet,
    User,
    userId,
    userKey
} from '../mutableData/permissions.js';
import { NetworkClient, defaultRetryPolicy } from '../network/client.js';
import { RetryPolicy } from '../network/retry.js';
import { DataNetwork } from '../network/types.js';
import { CapabilityRegistry } from '../registry/CapabilityRegistry.js';
import { coreConfig } from '../bootstrap/config/core-config.js';
import { AppRecord, CONTAINER_TYPE_TAG, ContainerSpec, UserAccount } from './account.js';
import { RevocationQueue } from './revocation.js';

export const DEFAULT_CONTAINERS: readonly ContainerSpec[] = [
    { name: '_documents', kind: 'Private' },
    { name: '_downloads', kind: 'Private' },
    { name: '_music', kind: 'Private' },
    { name: '_pictures', kind: 'Private' },
    { name: '_videos', kind: 'Private' },
    { name: '_public', kind: 'Public' },
    { name: '_publicNames', kind: 'Public' }
];

export interface AuthenticatorOptions {
    /** Network bootstrap blob handed to apps on a grant */
    readonly bootstrapConfig?: Buffer;
    readonly retryPolicy?: RetryPolicy;
    readonly concurrency?: number;
    readonly maxObjects?: number;
    readonly containers?: readonly ContainerSpec[];
}

export type AuthDecodeOutcome =
    | { readonly kind: 'Auth'; readonly requestId: number; readonly req: AuthReq }
    | { readonly kind: 'Containers'; readonly requestId: number; readonly req: ContainersReq }
    | { readonly kind: 'Unregistered'; readonly requestId: number; readonly req: UnregisteredReq }
    | { readonly kind: 'ShareMData'; readonly requestId: number; readonly req: ShareMDataReq }
    /** Answered immediately; `response` is the error token to hand back to the app */
    | { readonly kind: 'Rejected'; readonly requestId: number; readonly error: IpcErrorCode; readonly response: string }
    | { readonly kind: 'DecodeError'; readonly description: string };

export interface MDataAccessor {
    readonly app: AppExchangeInfo;
    readonly permissions: PermissionRequest;
}

const DENIAL_CODES: Readonly<Record<IpcReq['type'], IpcErrorCode>> = {
    Auth: 'AuthDenied',
    Containers: 'ContainersDenied',
    Unregistered: 'AuthDenied',
    ShareMData: 'ShareMDataDenied'
};

const DENIAL_EVENTS = {
    Auth: 'AUTH_DENIED',
    Containers: 'CONTAINERS_DENIED',
    Unregistered: 'UNREGISTERED_DENIED',
    ShareMData: 'SHARE_MDATA_DENIED'
} as const;

function isRequestOf<T extends IpcReq['type']>(request: IpcReq, type: T): request is Extract<IpcReq, { type: T }> {
    return request.type === type;
}

function responsePrefix(request: IpcReq): string {
    return request.type === 'Unregistered' ? UNREGISTERED_PREFIX : request.req.app.id;
}

export function appContainerName(appId: string): string {
    return `apps/${appId}`;
}

function mergePermissions(current: PermissionRequest | undefined, requested: PermissionRequest): PermissionRequest {
    return PermissionSet.fromRequest(current ?? {}).grant(requested).toRequest();
}

export class Authenticator {
    private readonly pending = new Map<number, IpcReq>();
    readonly revocation: RevocationQueue;

    private constructor(
        readonly account: UserAccount,
        readonly registry: ContextRegistry,
        readonly scheduler: ContextScheduler,
        readonly audit: AuditLogger,
        private readonly log: ContextLogger,
        private readonly bootstrapConfig: Buffer,
        retryPolicy: RetryPolicy
    ) {
        this.revocation = new RevocationQueue(account, audit, retryPolicy);
    }

    /**
     * Creates a fresh account on the network with the default containers.
     */
    static async create(network: DataNetwork, options: AuthenticatorOptions = {}): Promise<Authenticator> {
        const config = coreConfig();
        const retryPolicy = options.retryPolicy ?? defaultRetryPolicy();
        const keys = CryptoKeyStore.generate();
        const ops = new MDataOps(new NetworkClient(network, keys, retryPolicy));
        const account = await UserAccount.create(keys, ops, options.containers ?? DEFAULT_CONTAINERS);

        const registry: ContextRegistry = new CapabilityRegistry<ContextObjects>(undefined, { maxObjects: options.maxObjects ?? config.maxHandles });
        const scheduler = new ContextScheduler(registry.contextId, options.concurrency ?? config.schedulerConcurrency);
        const log = getContextLogger({ contextId: registry.contextId, role: 'authenticator' });
        const audit = new AuditLogger(log);

        log.info({ containers: (options.containers ?? DEFAULT_CONTAINERS).length }, 'Authenticator account created');
        return new Authenticator(account, registry, scheduler, audit, log, options.bootstrapConfig ?? Buffer.alloc(0), retryPolicy);
    }

    get ownerKey(): Buffer {
        return this.account.ownerKey;
    }

    // ──────────────── Requests ────────────────

    /**
     * Decodes an app's token. Valid requests become pending until granted or denied;
     * requests that cannot be honoured are answered at once.
     */
    decodeRequest(token: string): Promise<AuthDecodeOutcome> {
        return this.scheduler.submit('authenticator.decodeRequest', async (): Promise<AuthDecodeOutcome> => {
            const decoded = decodeIpcRequest(token);
            if (decoded.kind === 'DecodeError') {
                this.log.warn({ description: decoded.description }, 'Rejected undecodable request');
                return decoded;
            }
            const { requestId, request } = decoded;

            const rejection = await this.check(request);
            if (rejection) {
                const { code, message } = rejection;
                this.recordDenial(request, requestId, code);
                return {
                    kind: 'Rejected',
                    requestId,
                    error: code,
                    response: encodeIpcResponse(requestId, responsePrefix(request), errorResponse(request.type, ipcError(code, message)))
                };
            }

            this.pending.set(requestId, request);
            switch (request.type) {
                case 'Auth':
                    return { kind: 'Auth', requestId, req: request.req };
                case 'Containers':
                    return { kind: 'Containers', requestId, req: request.req };
                case 'Unregistered':
                    return { kind: 'Unregistered', requestId, req: request.req };
                case 'ShareMData':
                    return { kind: 'ShareMData', requestId, req: request.req };
            }
        });
    }

    /**
     * Grants a pending Auth request: app keys, container permissions and the access entry.
     *
     * The app record is persisted before its key is authorised, so a grant that fails part-way
     * leaves a Revoked app whose key the revocation queue can find. An app already on record
     * (revoked, or left over from such a failure) keeps its keys.
     */
    grantAuth(requestId: number): Promise<string> {
        return this.exclusive('authenticator.grantAuth', async () => {
            const request = this.pendingOf(requestId, 'Auth');
            const { req } = request;
            const known = (await this.account.loadApps()).value.get(req.app.id);
            if (known && (await this.account.accessEntry(known))) {
                return this.answer(requestId, this.refuse(request, requestId, 'AlreadyAuthorised'));
            }

            const app: AppRecord = known ?? { info: req.app, keys: this.account.keys.issueAppKeys() };
            if (!known) {
                await this.account.updateApps(apps => {
                    apps.set(req.app.id, app);
                });
            }
            const user = userKey(app.keys.signPk);
            await this.account.authoriseKey(app.keys.signPk);
            await this.grantPermissions(accessContainerMDataInfo(this.account.accessContainer), user, { read: true });

            let entry = await this.grantContainerAccess(new Map(), user, req.containers);
            if (req.appContainer) {
                const name = appContainerName(req.app.id);
                const info = await this.ensureAppContainer(name);
                await this.grantPermissions(info, user, FULL_PERMISSIONS);
                entry = withContainer(entry, name, { info, permissions: FULL_PERMISSIONS });
            }
            await this.account.saveAccessEntry(app, entry, null);

            this.audit.log({ type: 'AUTH_GRANTED', requestId, appId: req.app.id, decision: 'ALLOW', resources: [...entry.keys()] });
            this.log.info({ appId: req.app.id, containers: entry.size, reused: known !== undefined }, 'App authorised');
            return this.answer(requestId, encodeIpcResponse(requestId, req.app.id, authGrantedResponse({
                appKeys: app.keys,
                bootstrapConfig: this.bootstrapConfig,
                accessContainer: this.account.accessContainer,
                accessContainerEntry: entry
            })));
        });
    }

    /**
     * Grants additional containers to an already authorised app.
     */
    grantContainers(requestId: number): Promise<string> {
        return this.exclusive('authenticator.grantContainers', async () => {
            const request = this.pendingOf(requestId, 'Containers');
            const { req } = request;
            const app = (await this.account.loadApps()).value.get(req.app.id);
            const access = app ? await this.account.accessEntry(app) : null;
            if (!app || !access) {
                return this.answer(requestId, this.refuse(request, requestId, 'UnknownApp'));
            }

            const entry = await this.grantContainerAccess(access.value, userKey(app.keys.signPk), req.containers);
            await this.account.saveAccessEntry(app, entry, access.version);

            this.audit.log({
                type: 'CONTAINERS_GRANTED',
                requestId,
                appId: req.app.id,
                decision: 'ALLOW',
                resources: req.containers.map(container => container.containerName)
            });
            return this.answer(requestId, encodeIpcResponse(requestId, req.app.id, { type: 'Containers', result: { ok: true, value: null } }));
        });
    }

    /**
     * Grants an app permissions on records the user owns. Nothing is granted unless the user
     * owns every requested record.
     */
    grantShareMData(requestId: number): Promise<string> {
        return this.exclusive('authenticator.grantShareMData', async () => {
            const request = this.pendingOf(requestId, 'ShareMData');
            const { req } = request;
            const app = (await this.account.loadApps()).value.get(req.app.id);
            if (!app || !(await this.account.accessEntry(app))) {
                return this.answer(requestId, this.refuse(request, requestId, 'UnknownApp'));
            }

            const infos = req.mdata.map(share => MDataInfo.newPublic(share.name, share.typeTag));
            for (const info of infos) {
                if (!(await this.ownsRecord(info))) {
                    const message = `Record ${info.name.toString('hex')} is not owned by the user`;
                    return this.answer(requestId, this.refuse(request, requestId, 'InvalidOwner', message));
                }
            }
            for (const [index, share] of req.mdata.entries()) {
                const info = infos[index];
                if (info) {
                    await this.grantPermissions(info, userKey(app.keys.signPk), share.permissions);
                }
            }

            this.audit.log({
                type: 'SHARE_MDATA_GRANTED',
                requestId,
                appId: req.app.id,
                decision: 'ALLOW',
                resources: infos.map(info => `${info.name.toString('hex')}:${info.typeTag}`)
            });
            return this.answer(requestId, encodeIpcResponse(requestId, req.app.id, { type: 'ShareMData', result: { ok: true, value: null } }));
        });
    }

    /**
     * Answers an unregistered client with the network bootstrap blob only.
     */
    grantUnregistered(requestId: number): Promise<string> {
        return this.exclusive('authenticator.grantUnregistered', async () => {
            this.pendingOf(requestId, 'Unregistered');
            this.audit.log({ type: 'UNREGISTERED_GRANTED', requestId, decision: 'ALLOW' });
            return this.answer(requestId, encodeIpcResponse(requestId, UNREGISTERED_PREFIX, {
                type: 'Unregistered',
                result: { ok: true, value: this.bootstrapConfig }
            }));
        });
    }

    deny(requestId: number): Promise<string> {
        return this.exclusive('authenticator.deny', async () => {
            const request = this.pending.get(requestId);
            if (!request) {
                throw new CoreError('NotFound', `No pending request ${requestId}`);
            }
            return this.answer(requestId, this.refuse(request, requestId, DENIAL_CODES[request.type]));
        });
    }

    pendingRequests(): number[] {
        return [...this.pending.keys()];
    }

    // ──────────────── Revocation ────────────────

    revokeApp(appId: string): Promise<string> {
        return this.exclusive('authenticator.revokeApp', () => this.revocation.revokeApp(appId));
    }

    enqueueRevocation(appId: string): Promise<void> {
        return this.exclusive('authenticator.enqueueRevocation', () => this.revocation.enqueue(appId));
    }

    flushRevocationQueue(): Promise<void> {
        return this.exclusive('authenticator.flushRevocationQueue', () => this.revocation.flush());
    }

    // ──────────────── Snapshots ────────────────

    listRegisteredApps(): Promise<AppExchangeInfo[]> {
        return this.scheduler.submit('authenticator.listRegisteredApps', () => this.appsInState('Authenticated'));
    }

    listRevokedApps(): Promise<AppExchangeInfo[]> {
        return this.scheduler.submit('authenticator.listRevokedApps', () => this.appsInState('Revoked'));
    }

    listAuthorisedKeys(): Promise<Buffer[]> {
        return this.scheduler.submit('authenticator.listAuthorisedKeys', () => this.account.listAuthorisedKeys());
    }

    /**
     * Registered apps holding a permission entry on the given record.
     */
    appsAccessingMData(name: Buffer, typeTag: number): Promise<MDataAccessor[]> {
        return this.scheduler.submit('authenticator.appsAccessingMData', async () => {
            const permissions = await this.account.ops.permissions(MDataInfo.newPublic(name, typeTag));
            const { value: apps } = await this.account.loadApps();
            const accessors: MDataAccessor[] = [];
            for (const app of apps.values()) {
                const granted = permissions.get(userId(userKey(app.keys.signPk)));
                if (granted && (await this.account.appState(app.info.id, apps)) === 'Authenticated') {
                    accessors.push({ app: app.info, permissions: granted.set.toRequest() });
                }
            }
            return accessors;
        });
    }

    containerInfo(name: string): Promise<MDataInfo> {
        return this.scheduler.submit('authenticator.containerInfo', async () => {
            const container = await this.account.container(name);
            if (!container) {
                throw new CoreError('NotFound', `No container ${name}`);
            }
            return container.value;
        });
    }

    settle<T>(label: string, operation: (authenticator: Authenticator) => Promise<T>): Promise<OperationResult<T>> {
        return this.scheduler.submitSettled(label, () => operation(this));
    }

    async shutdown(): Promise<void> {
        await this.scheduler.shutdown();
        this.registry.close();
        this.pending.clear();
        this.log.info('Authenticator shut down');
    }

    // ──────────────── Internals ────────────────

    private async check(request: IpcReq): Promise<{ code: IpcErrorCode; message?: string } | null> {
        if (request.type === 'Unregistered') {
            return null;
        }
        const state = await this.account.appState(request.req.app.id);
        if (request.type === 'Auth' && state === 'Authenticated') {
            return { code: 'AlreadyAuthorised' };
        }
        if (request.type !== 'Auth' && state !== 'Authenticated') {
            return { code: 'UnknownApp' };
        }
        if (request.type === 'ShareMData') {
            return null;
        }
        const containers = await this.account.containers();
        const unknown = request.req.containers.find(container => !containers.has(container.containerName));
        return unknown ? { code: 'InvalidMsg', message: `Unknown container ${unknown.containerName}` } : null;
    }

    private exclusive<T>(label: string, operation: () => Promise<T>): Promise<T> {
        return this.scheduler.submit(label, operation, { exclusive: true });
    }

    private pendingOf<T extends IpcReq['type']>(requestId: number, type: T): Extract<IpcReq, { type: T }> {
        const request = this.pending.get(requestId);
        if (!request || !isRequestOf(request, type)) {
            throw new CoreError('NotFound', `No pending ${type} request ${requestId}`);
        }
        return request;
    }

    /**
     * Settles a pending request with its encoded answer.
     */
    private answer(requestId: number, response: string): string {
        this.pending.delete(requestId);
        return response;
    }

    private refuse(request: IpcReq, requestId: number, code: IpcErrorCode, message?: string): string {
        this.recordDenial(request, requestId, code);
        const response: IpcResp = errorResponse(request.type, ipcError(code, message));
        return encodeIpcResponse(requestId, responsePrefix(request), response);
    }

    private recordDenial(request: IpcReq, requestId: number, reason: IpcErrorCode): void {
        this.audit.log({
            type: DENIAL_EVENTS[request.type],
            requestId,
            ...(request.type === 'Unregistered' ? {} : { appId: request.req.app.id }),
            decision: 'DENY',
            reason
        });
    }

    private async grantContainerAccess(
        entry: AccessContainerEntry,
        user: User,
        requested: readonly ContainerPermission[]
    ): Promise<AccessContainerEntry> {
        const containers = await this.account.containers();
        let next = entry;
        for (const { containerName, permissions } of requested) {
            const info = containers.get(containerName);
            if (!info) {
                throw new CoreError('NotFound', `No container ${containerName}`);
            }
            const merged = mergePermissions(next.get(containerName)?.permissions, permissions);
            await this.grantPermissions(info, user, merged);
            next = withContainer(next, containerName, { info, permissions: merged });
        }
        return next;
    }

    private async grantPermissions(info: MDataInfo, user: User, request: PermissionRequest): Promise<void> {
        const record = await this.account.ops.get(info);
        const current = record.permissions.get(userId(user))?.set ?? PermissionSet.empty();
        const next = current.grant(request);
        if (!next.equals(current)) {
            await this.account.ops.setUserPermissions(info, user, next, record.version);
        }
    }

    private async ensureAppContainer(name: string): Promise<MDataInfo> {
        const existing = await this.account.container(name);
        if (existing) {
            return existing.value;
        }
        const info = MDataInfo.random('Private', CONTAINER_TYPE_TAG);
        await this.account.ops.put(info, this.ownerKey);
        await this.account.saveContainer(name, info, null);
        return info;
    }

    private async ownsRecord(info: MDataInfo): Promise<boolean> {
        try {
            return (await this.account.ops.get(info)).owner.equals(this.ownerKey);
        } catch (err: unknown) {
            if (isCoreError(err, 'NotFound') || isCoreError(err, 'PermissionDenied')) {
                return false;
            }
            throw err;
        }
    }

    private async appsInState(state: 'Authenticated' | 'Revoked'): Promise<AppExchangeInfo[]> {
        const { value: apps } = await this.account.loadApps();
        const result: AppExchangeInfo[] = [];
        for (const app of apps.values()) {
            if ((await this.account.appState(app.info.id, apps)) === state) {
                result.push(app.info);
            }
        }
        return result;
    }
}
