/**
 * NetworkClient
 *
 * A context's view of the storage network: signs mutations with the context's signing
 * key and retries transient failures under the configured policy.
 */

import { coreConfig } from '../bootstrap/config/core-config.js';
import { CoreError } from '../errors/CoreError.js';
import { CryptoKeyStore } from '../crypto/keyManager.js';
import { MutableDataRecord } from '../mutableData/record.js';
import { withRetry, RetryPolicy } from './retry.js';
import { AuthKeys, DataNetwork, MutationRequest, mutationPayload, readPayload, RecordAddress, RequestAuth } from './types.js';

export function defaultRetryPolicy(): RetryPolicy {
    const config = coreConfig();
    return { attempts: config.networkRetryAttempts, baseDelayMs: config.retryBaseDelayMs };
}

export class NetworkClient {
    constructor(
        readonly network: DataNetwork,
        /** Absent for unregistered contexts, which may only read what Anyone may read */
        private readonly keys: CryptoKeyStore | null,
        readonly retryPolicy: RetryPolicy = defaultRetryPolicy()
    ) { }

    get requesterKey(): Buffer {
        return this.signer().signPublicKey;
    }

    /** Owner of records this context creates */
    get ownerKey(): Buffer {
        return this.signer().ownerKey;
    }

    /**
     * Reads are signed when this context holds keys; unregistered contexts read anonymously.
     */
    getMData(address: RecordAddress): Promise<MutableDataRecord> {
        const auth: RequestAuth | null = this.keys
            ? { requester: this.keys.signPublicKey, signature: this.keys.signPayload(readPayload(address)) }
            : null;
        return withRetry('network.getMData', () => this.network.getMData(address, auth), this.retryPolicy);
    }

    getIData(address: string): Promise<Buffer> {
        return withRetry('network.getIData', () => this.network.getIData(address), this.retryPolicy);
    }

    listAuthKeys(owner: Buffer): Promise<AuthKeys> {
        return withRetry('network.listAuthKeys', () => this.network.listAuthKeys(owner), this.retryPolicy);
    }

    async mutate(request: MutationRequest): Promise<string | null> {
        const signer = this.signer();
        const auth = {
            requester: signer.signPublicKey,
            signature: signer.signPayload(mutationPayload(request))
        };
        return withRetry(`network.${request.type}`, () => this.network.mutate(request, auth), this.retryPolicy);
    }

    async putIData(content: Buffer): Promise<string> {
        const address = await this.mutate({ type: 'PutIData', content });
        if (address === null) {
            throw new CoreError('NetworkError', 'Network returned no address for an immutable blob');
        }
        return address;
    }

    private signer(): CryptoKeyStore {
        if (!this.keys) {
            throw new CoreError('PermissionDenied', 'Unregistered contexts cannot sign network requests');
        }
        return this.keys;
    }
}
