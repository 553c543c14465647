/**
 * App side of the IPC protocol: request encoders and a total response decoder.
 */

import { isCoreError } from '../errors/CoreError.js';
import { IpcError } from '../errors/IpcError.js';
import { logger } from '../logging/logger.js';
import { AUTHENTICATOR_PREFIX, DecodedToken, decodeIpcToken, encodeIpcMsg, generateRequestId } from './codec.js';
import { AuthGranted, AuthReq, ContainersReq, IpcReq, ShareMDataReq } from './types.js';

export interface EncodedRequest {
    readonly requestId: number;
    readonly token: string;
}

export type AppIpcOutcome =
    | { readonly kind: 'AuthGranted'; readonly requestId: number; readonly authGranted: AuthGranted }
    | { readonly kind: 'Unregistered'; readonly requestId: number; readonly bootstrapConfig: Buffer }
    | { readonly kind: 'ContainersGranted'; readonly requestId: number }
    | { readonly kind: 'ShareMDataGranted'; readonly requestId: number }
    | { readonly kind: 'Revoked'; readonly appId: string }
    | { readonly kind: 'Denied'; readonly requestId: number | null; readonly error: IpcError }
    | { readonly kind: 'DecodeError'; readonly description: string };

function encodeRequest(request: IpcReq): EncodedRequest {
    const requestId = generateRequestId();
    return { requestId, token: encodeIpcMsg({ kind: 'Req', requestId, request }, AUTHENTICATOR_PREFIX) };
}

export function encodeAuthReq(req: AuthReq): EncodedRequest {
    return encodeRequest({ type: 'Auth', req });
}

export function encodeContainersReq(req: ContainersReq): EncodedRequest {
    return encodeRequest({ type: 'Containers', req });
}

export function encodeUnregisteredReq(extraData: Buffer = Buffer.alloc(0)): EncodedRequest {
    return encodeRequest({ type: 'Unregistered', req: { extraData } });
}

export function encodeShareMDataReq(req: ShareMDataReq): EncodedRequest {
    return encodeRequest({ type: 'ShareMData', req });
}

/**
 * Decodes a token received from the authenticator. Never throws.
 */
export function decodeIpcMsg(token: string): AppIpcOutcome {
    let decoded: DecodedToken;
    try {
        decoded = decodeIpcToken(token);
    } catch (err: unknown) {
        const description = isCoreError(err) ? err.description : String(err);
        logger.debug({ description }, 'Discarding undecodable IPC token');
        return { kind: 'DecodeError', description };
    }

    const { msg } = decoded;
    switch (msg.kind) {
        case 'Revoked':
            return { kind: 'Revoked', appId: msg.appId };
        case 'Err':
            return { kind: 'Denied', requestId: null, error: msg.error };
        case 'Req':
            return { kind: 'DecodeError', description: `Unexpected ${msg.request.type} request addressed to an app` };
        case 'Resp':
            break;
    }

    const { requestId, response } = msg;
    switch (response.type) {
        case 'Auth':
            return response.result.ok
                ? { kind: 'AuthGranted', requestId, authGranted: response.result.value }
                : { kind: 'Denied', requestId, error: response.result.error };
        case 'Unregistered':
            return response.result.ok
                ? { kind: 'Unregistered', requestId, bootstrapConfig: response.result.value }
                : { kind: 'Denied', requestId, error: response.result.error };
        case 'Containers':
            return response.result.ok
                ? { kind: 'ContainersGranted', requestId }
                : { kind: 'Denied', requestId, error: response.result.error };
        case 'ShareMData':
            return response.result.ok
                ? { kind: 'ShareMDataGranted', requestId }
                : { kind: 'Denied', requestId, error: response.result.error };
    }
}
