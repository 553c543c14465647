/**
 * AccessContainer
 *
 * App-side view of the containers the authenticator granted. The entry is cached after the
 * first fetch; `refresh` re-reads it from the network.
 */

import { CoreError } from '../errors/CoreError.js';
import { ContextLogger } from '../logging/logger.js';
import { MDataInfo } from '../mutableData/mdataInfo.js';
import { MDataOps } from '../mutableData/operations.js';
import { PermissionRequest } from '../mutableData/permissions.js';
import { Handle } from '../registry/CapabilityRegistry.js';
import type { ContextRegistry } from '../context/objects.js';
import { AccessContainerEntry, AccessContInfo } from '../ipc/types.js';
import { accessContainerMDataInfo, accessEntryKey, decodeAccessEntry } from './entry.js';

export class AccessContainer {
    private entry: AccessContainerEntry | null;

    constructor(
        private readonly registry: ContextRegistry,
        private readonly ops: MDataOps,
        private readonly appId: string,
        private readonly encKey: Buffer,
        readonly info: AccessContInfo,
        private readonly log: ContextLogger,
        initial: AccessContainerEntry | null = null
    ) {
        this.entry = initial;
    }

    /**
     * Re-reads this app's entry. Fails PermissionDenied once the app's access was revoked.
     */
    async refresh(): Promise<void> {
        const key = accessEntryKey(this.appId, this.encKey, this.info);
        const value = await this.ops.getValue(accessContainerMDataInfo(this.info), key);
        this.entry = decodeAccessEntry(value.content, this.encKey);
        this.log.debug({ containers: this.entry.size, entryVersion: value.version }, 'Access container refreshed');
    }

    /**
     * Names of the containers currently granted.
     */
    async fetch(): Promise<string[]> {
        await this.refresh();
        return [...this.current().keys()].sort();
    }

    async getContainerInfo(name: string): Promise<Handle<'mdataInfo'>> {
        return this.registry.create('mdataInfo', await this.containerInfo(name));
    }

    async containerInfo(name: string): Promise<MDataInfo> {
        return (await this.access(name)).info;
    }

    async getContainerPermissions(name: string): Promise<PermissionRequest> {
        return (await this.access(name)).permissions;
    }

    private async access(name: string): Promise<{ info: MDataInfo; permissions: PermissionRequest }> {
        if (!this.entry) {
            await this.refresh();
        }
        const access = this.current().get(name);
        if (!access) {
            throw new CoreError('NotFound', `Container ${name} was not granted to ${this.appId}`);
        }
        return access;
    }

    private current(): AccessContainerEntry {
        if (!this.entry) {
            throw new CoreError('NotFound', 'Access container has not been fetched');
        }
        return this.entry;
    }
}
