/**
 * Shared fixtures for unit tests: fast retry policy, small chunk sizes and an
 * end-to-end app registration against an in-process network.
 */

import { Authenticator, AuthenticatorOptions } from '../../libs/authenticator/authenticator.js';
import { App, AppOptions } from '../../libs/context/app.js';
import { decodeIpcMsg, encodeAuthReq } from '../../libs/ipc/appIpc.js';
import { AppExchangeInfo, AuthGranted, ContainerPermission } from '../../libs/ipc/types.js';
import { MemoryNetwork } from '../../libs/network/memoryNetwork.js';
import { RetryPolicy } from '../../libs/network/retry.js';
import { ChunkSizes } from '../../libs/immutableData/chunker.js';

export const FAST_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 0 };

export const SMALL_CHUNKS: ChunkSizes = { minSize: 16, avgSize: 32, maxSize: 64 };

export const APP_OPTIONS: AppOptions = { retryPolicy: FAST_RETRY, immutable: { chunkSizes: SMALL_CHUNKS } };

export function testAppInfo(id: string): AppExchangeInfo {
    return { id, name: `Test app ${id}`, vendor: 'Test Vendor' };
}

export async function createAuthenticator(
    network: MemoryNetwork,
    options: AuthenticatorOptions = {}
): Promise<Authenticator> {
    return Authenticator.create(network, { retryPolicy: FAST_RETRY, ...options });
}

export interface RegisteredApp {
    readonly app: App;
    readonly authGranted: AuthGranted;
}

/**
 * Runs the full request, grant and decode exchange and opens the app's context.
 */
export async function registerApp(
    authenticator: Authenticator,
    network: MemoryNetwork,
    appId: string,
    containers: readonly ContainerPermission[],
    appContainer = false
): Promise<RegisteredApp> {
    const { token } = encodeAuthReq({ app: testAppInfo(appId), appContainer, containers });
    const decoded = await authenticator.decodeRequest(token);
    if (decoded.kind !== 'Auth') {
        throw new Error(`Expected an Auth request, got ${decoded.kind}`);
    }
    const outcome = decodeIpcMsg(await authenticator.grantAuth(decoded.requestId));
    if (outcome.kind !== 'AuthGranted') {
        throw new Error(`Expected AuthGranted, got ${outcome.kind}`);
    }
    return {
        app: App.registered(appId, outcome.authGranted, network, APP_OPTIONS),
        authGranted: outcome.authGranted
    };
}
