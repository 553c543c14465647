/**
 * Authenticator side of the IPC protocol.
 */

import { isCoreError } from '../errors/CoreError.js';
import { IpcError } from '../errors/IpcError.js';
import { decodeIpcToken, encodeIpcMsg } from './codec.js';
import { AuthGranted, IpcReq, IpcResp } from './types.js';

export const UNREGISTERED_PREFIX = 'unregistered';

export type DecodedRequest =
    | { readonly kind: 'Request'; readonly requestId: number; readonly request: IpcReq }
    | { readonly kind: 'DecodeError'; readonly description: string };

/**
 * Decodes a token sent by an app. Never throws; only requests are accepted.
 */
export function decodeIpcRequest(token: string): DecodedRequest {
    try {
        const { msg } = decodeIpcToken(token);
        if (msg.kind !== 'Req') {
            return { kind: 'DecodeError', description: `Expected a request, got ${msg.kind}` };
        }
        return { kind: 'Request', requestId: msg.requestId, request: msg.request };
    } catch (err: unknown) {
        return { kind: 'DecodeError', description: isCoreError(err) ? err.description : String(err) };
    }
}

export function errorResponse(type: IpcReq['type'], error: IpcError): IpcResp {
    switch (type) {
        case 'Auth':
            return { type, result: { ok: false, error } };
        case 'Containers':
            return { type, result: { ok: false, error } };
        case 'Unregistered':
            return { type, result: { ok: false, error } };
        case 'ShareMData':
            return { type, result: { ok: false, error } };
    }
}

export function authGrantedResponse(authGranted: AuthGranted): IpcResp {
    return { type: 'Auth', result: { ok: true, value: authGranted } };
}

export function encodeIpcResponse(requestId: number, prefix: string, response: IpcResp): string {
    return encodeIpcMsg({ kind: 'Resp', requestId, response }, prefix);
}

export function encodeRevoked(appId: string): string {
    return encodeIpcMsg({ kind: 'Revoked', appId }, appId);
}
