/**
 * App context
 *
 * One application session: its registry of handles, its scheduler, and the stores that
 * operate on the network with the app's granted keys. Unregistered contexts hold no keys
 * and can only read.
 */

import { AccessContainer } from '../accessContainer/AccessContainer.js';
import { coreConfig } from '../bootstrap/config/core-config.js';
import { CryptoHandles } from '../crypto/handles.js';
import { CryptoKeyStore } from '../crypto/keyManager.js';
import { OperationResult } from '../errors/result.js';
import { ImmutableContentStore, ImmutableStoreOptions } from '../immutableData/store.js';
import { AuthGranted } from '../ipc/types.js';
import { ContextLogger, getContextLogger } from '../logging/logger.js';
import { MDataCollections } from '../mutableData/collections.js';
import { MDataOps } from '../mutableData/operations.js';
import { MutableDataStore } from '../mutableData/store.js';
import { NetworkClient, defaultRetryPolicy } from '../network/client.js';
import { RetryPolicy } from '../network/retry.js';
import { DataNetwork } from '../network/types.js';
import { CapabilityRegistry } from '../registry/CapabilityRegistry.js';
import type { ContextObjects, ContextRegistry } from './objects.js';
import { ContextScheduler } from './scheduler.js';

export interface AppOptions {
    readonly retryPolicy?: RetryPolicy;
    readonly concurrency?: number;
    readonly maxObjects?: number;
    readonly immutable?: ImmutableStoreOptions;
}

export class App {
    readonly mdata: MutableDataStore;
    readonly collections: MDataCollections;
    readonly idata: ImmutableContentStore;
    readonly crypto: CryptoHandles;
    readonly accessContainer: AccessContainer | null;

    private constructor(
        readonly appId: string | null,
        readonly registry: ContextRegistry,
        readonly scheduler: ContextScheduler,
        readonly client: NetworkClient,
        readonly log: ContextLogger,
        keys: CryptoKeyStore | null,
        authGranted: AuthGranted | null,
        options: AppOptions
    ) {
        const ops = new MDataOps(client);
        this.collections = new MDataCollections(registry);
        this.mdata = new MutableDataStore(registry, ops, this.collections, log);
        this.idata = new ImmutableContentStore(registry, client, keys, log, options.immutable);
        this.crypto = new CryptoHandles(registry, keys);
        this.accessContainer = appId && authGranted
            ? new AccessContainer(
                registry,
                ops,
                appId,
                authGranted.appKeys.encKey,
                authGranted.accessContainer,
                log,
                authGranted.accessContainerEntry
            )
            : null;
    }

    /**
     * Opens a session for an app using the grant the authenticator returned.
     */
    static registered(appId: string, authGranted: AuthGranted, network: DataNetwork, options: AppOptions = {}): App {
        const keys = CryptoKeyStore.fromAppKeys(authGranted.appKeys);
        return App.open(appId, network, keys, authGranted, options);
    }

    /**
     * Opens a read-only session without keys.
     */
    static unregistered(network: DataNetwork, options: AppOptions = {}): App {
        return App.open(null, network, null, null, options);
    }

    private static open(
        appId: string | null,
        network: DataNetwork,
        keys: CryptoKeyStore | null,
        authGranted: AuthGranted | null,
        options: AppOptions
    ): App {
        const config = coreConfig();
        const registry: ContextRegistry = new CapabilityRegistry<ContextObjects>(undefined, {
            maxObjects: options.maxObjects ?? config.maxHandles
        });
        const scheduler = new ContextScheduler(registry.contextId, options.concurrency ?? config.schedulerConcurrency);
        const log = getContextLogger({
            contextId: registry.contextId,
            role: appId ? 'app' : 'unregistered-app',
            ...(appId ? { appId } : {})
        });
        const client = new NetworkClient(network, keys, options.retryPolicy ?? defaultRetryPolicy());
        log.debug('App context opened');
        return new App(appId, registry, scheduler, client, log, keys, authGranted, options);
    }

    get isRegistered(): boolean {
        return this.accessContainer !== null;
    }

    /**
     * Runs an operation on this context's scheduler.
     */
    submit<T>(label: string, operation: (app: App) => Promise<T>): Promise<T> {
        return this.scheduler.submit(label, () => operation(this));
    }

    /**
     * Like submit, but completes with the result contract instead of rejecting.
     */
    settle<T>(label: string, operation: (app: App) => Promise<T>): Promise<OperationResult<T>> {
        return this.scheduler.submitSettled(label, () => operation(this));
    }

    /**
     * Waits for in-flight work, then invalidates every handle of this context.
     */
    async shutdown(): Promise<void> {
        await this.scheduler.shutdown();
        this.registry.close();
        this.log.debug('App context closed');
    }
}
