/**
 * MemoryNetwork
 *
 * In-process storage network. Verifies request signatures and applies the record rules
 * atomically: each request waits one macrotask, then validates and commits synchronously,
 * so concurrent requests on the same record serialize on their version checks.
 */

import { getComponentLogger } from '../logging/logger.js';
import { setImmediate as tick } from 'node:timers/promises';
import { CoreError } from '../errors/CoreError.js';
import { keyFingerprint, sha3Hash, verify } from '../crypto/primitives.js';
import {
    applyEntryActions,
    authorizeRead,
    changeOwner,
    deleteUserPermissions,
    MutableDataRecord,
    newRecord,
    recordId,
    Requester,
    setUserPermissions
} from '../mutableData/record.js';
import {
    AuthKeys,
    DataNetwork,
    MutationRequest,
    mutationPayload,
    NetworkOperation,
    readPayload,
    RecordAddress,
    RequestAuth
} from './types.js';

const logger = getComponentLogger('MemoryNetwork');

interface Account {
    readonly keys: Map<string, Buffer>;
    version: number;
}

interface InjectedFault {
    remaining: number;
    readonly matches: (operation: NetworkOperation) => boolean;
}

export class MemoryNetwork implements DataNetwork {
    private readonly records = new Map<string, MutableDataRecord>();
    private readonly blobs = new Map<string, Buffer>();
    private readonly accounts = new Map<string, Account>();
    private readonly faults: InjectedFault[] = [];
    private readonly counters = new Map<NetworkOperation, number>();

    /**
     * Makes the next `count` matching operations fail with a transient NetworkError.
     */
    failNext(count: number, matches: (operation: NetworkOperation) => boolean = () => true): void {
        this.faults.push({ remaining: count, matches });
    }

    /**
     * Number of times an operation reached the network (including injected failures).
     */
    callCount(operation: NetworkOperation): number {
        return this.counters.get(operation) ?? 0;
    }

    async getMData(address: RecordAddress, auth: RequestAuth | null): Promise<MutableDataRecord> {
        await this.enter('GetMData');
        const record = this.records.get(recordId(address.name, address.typeTag));
        if (!record) {
            throw new CoreError('NotFound', `No mutable record at ${recordId(address.name, address.typeTag)}`);
        }
        if (auth && !verify(readPayload(address), auth.signature, auth.requester)) {
            throw new CoreError('CryptoError', 'Signature on GetMData does not verify');
        }
        authorizeRead(record, auth ? this.requester(record.owner, auth.requester) : null);
        return record;
    }

    async getIData(address: string): Promise<Buffer> {
        await this.enter('GetIData');
        const blob = this.blobs.get(address);
        if (!blob) {
            throw new CoreError('NotFound', `No immutable blob at ${address}`);
        }
        return Buffer.from(blob);
    }

    async listAuthKeys(owner: Buffer): Promise<AuthKeys> {
        await this.enter('ListAuthKeys');
        const account = this.account(owner);
        return { keys: [...account.keys.values()], version: account.version };
    }

    async mutate(request: MutationRequest, auth: RequestAuth): Promise<string | null> {
        await this.enter(request.type);
        if (!verify(mutationPayload(request), auth.signature, auth.requester)) {
            throw new CoreError('CryptoError', `Signature on ${request.type} does not verify`);
        }
        const result = this.apply(request, auth.requester);
        logger.debug({ operation: request.type, requester: keyFingerprint(auth.requester) }, 'Mutation committed');
        return result;
    }

    private apply(request: MutationRequest, requesterKey: Buffer): string | null {
        switch (request.type) {
            case 'CreateAccount': {
                const id = requesterKey.toString('hex');
                if (this.accounts.has(id)) {
                    throw new CoreError('AlreadyExists', 'Account already exists');
                }
                this.accounts.set(id, { keys: new Map(), version: 0 });
                return null;
            }
            case 'PutMData': {
                const id = recordId(request.address.name, request.address.typeTag);
                if (this.records.has(id)) {
                    throw new CoreError('AlreadyExists', `Mutable record ${id} already exists`);
                }
                const requester = this.requester(request.owner, requesterKey);
                if (!request.owner.equals(requesterKey) && !requester.authorised) {
                    throw new CoreError('PermissionDenied', 'Requester may not create records for this owner');
                }
                this.records.set(id, newRecord({
                    name: request.address.name,
                    typeTag: request.address.typeTag,
                    owner: request.owner,
                    permissions: request.permissions,
                    entries: request.entries
                }));
                return null;
            }
            case 'MutateMDataEntries':
                this.updateRecord(request.address, requesterKey, (record, requester) =>
                    applyEntryActions(record, request.actions, requester));
                return null;
            case 'SetMDataUserPermissions':
                this.updateRecord(request.address, requesterKey, (record, requester) =>
                    setUserPermissions(record, request.user, request.set, request.version, requester));
                return null;
            case 'DelMDataUserPermissions':
                this.updateRecord(request.address, requesterKey, (record, requester) =>
                    deleteUserPermissions(record, request.user, request.version, requester));
                return null;
            case 'ChangeMDataOwner':
                this.updateRecord(request.address, requesterKey, (record, requester) =>
                    changeOwner(record, request.newOwner, request.version, requester));
                return null;
            case 'PutIData': {
                const address = sha3Hash(request.content).toString('hex');
                if (!this.blobs.has(address)) {
                    this.blobs.set(address, Buffer.from(request.content));
                }
                return address;
            }
            case 'InsAuthKey': {
                const account = this.account(requesterKey);
                this.checkAccountVersion(account, request.version);
                account.keys.set(request.key.toString('hex'), request.key);
                account.version += 1;
                return null;
            }
            case 'DelAuthKey': {
                const account = this.account(requesterKey);
                this.checkAccountVersion(account, request.version);
                if (!account.keys.delete(request.key.toString('hex'))) {
                    throw new CoreError('NotFound', 'Key is not authorised on this account');
                }
                account.version += 1;
                return null;
            }
        }
    }

    private updateRecord(
        address: RecordAddress,
        requesterKey: Buffer,
        rule: (record: MutableDataRecord, requester: Requester) => MutableDataRecord
    ): void {
        const id = recordId(address.name, address.typeTag);
        const record = this.records.get(id);
        if (!record) {
            throw new CoreError('NotFound', `No mutable record at ${id}`);
        }
        this.records.set(id, rule(record, this.requester(record.owner, requesterKey)));
    }

    private requester(owner: Buffer, key: Buffer): Requester {
        const account = this.accounts.get(owner.toString('hex'));
        return { key, authorised: account?.keys.has(key.toString('hex')) ?? false };
    }

    private account(owner: Buffer): Account {
        const account = this.accounts.get(owner.toString('hex'));
        if (!account) {
            throw new CoreError('NotFound', `No account for ${keyFingerprint(owner)}`);
        }
        return account;
    }

    private checkAccountVersion(account: Account, expected: number): void {
        if (account.version !== expected) {
            throw new CoreError('VersionConflict', `Account version is ${account.version}, request expected ${expected}`);
        }
    }

    private async enter(operation: NetworkOperation): Promise<void> {
        this.counters.set(operation, this.callCount(operation) + 1);
        const fault = this.faults.find(candidate => candidate.remaining > 0 && candidate.matches(operation));
        if (fault) {
            fault.remaining -= 1;
        }
        await tick();
        if (fault) {
            throw new CoreError('NetworkError', `Injected transient failure on ${operation}`);
        }
    }
}
