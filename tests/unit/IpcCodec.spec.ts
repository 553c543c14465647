/**
 * Unit Tests: IPC token codec
 *
 * @see libs/ipc/codec.ts
 * @see libs/ipc/appIpc.ts
 * @see libs/ipc/authIpc.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CryptoKeyStore } from '../../libs/crypto/keyManager.js';
import { ipcError } from '../../libs/errors/IpcError.js';
import { decodeIpcToken } from '../../libs/ipc/codec.js';
import { decodeIpcMsg, encodeAuthReq, encodeShareMDataReq, encodeUnregisteredReq } from '../../libs/ipc/appIpc.js';
import {
    authGrantedResponse,
    decodeIpcRequest,
    encodeIpcResponse,
    encodeRevoked,
    errorResponse,
    UNREGISTERED_PREFIX
} from '../../libs/ipc/authIpc.js';
import { AuthGranted, AuthReq } from '../../libs/ipc/types.js';
import { MDataInfo } from '../../libs/mutableData/mdataInfo.js';

const AUTH_REQ: AuthReq = {
    app: { id: 'net.example.videos', name: 'Video Player', vendor: 'Example Vendor' },
    appContainer: false,
    containers: [{ containerName: 'videos', permissions: { read: true } }]
};

function rawToken(prefix: string, message: unknown): string {
    return `safe-${Buffer.from(prefix).toString('base64url')}:${Buffer.from(JSON.stringify(message)).toString('base64url')}`;
}

describe('IPC requests', () => {
    it('should decode an auth request identical to the one encoded', () => {
        const { requestId, token } = encodeAuthReq(AUTH_REQ);
        const decoded = decodeIpcRequest(token);

        assert.deepStrictEqual(decoded, { kind: 'Request', requestId, request: { type: 'Auth', req: AUTH_REQ } });
    });

    it('should address requests to the authenticator with a u32 request id', () => {
        const { requestId, token } = encodeAuthReq(AUTH_REQ);

        assert.ok(token.startsWith('safe-YXV0aA:'));
        assert.strictEqual(decodeIpcToken(token).prefix, 'auth');
        assert.ok(Number.isInteger(requestId) && requestId >= 1 && requestId <= 0xffff_ffff);
    });

    it('should carry binary fields of unregistered and share requests', () => {
        const unregistered = encodeUnregisteredReq(Buffer.from([0, 1, 2, 255]));
        assert.deepStrictEqual(decodeIpcRequest(unregistered.token), {
            kind: 'Request',
            requestId: unregistered.requestId,
            request: { type: 'Unregistered', req: { extraData: Buffer.from([0, 1, 2, 255]) } }
        });

        const shareReq = {
            app: AUTH_REQ.app,
            mdata: [{ typeTag: 20000, name: Buffer.alloc(32, 6), permissions: { insert: true, update: true } }]
        };
        const share = encodeShareMDataReq(shareReq);
        assert.deepStrictEqual(decodeIpcRequest(share.token), {
            kind: 'Request',
            requestId: share.requestId,
            request: { type: 'ShareMData', req: shareReq }
        });
    });

    it('should refuse anything but a request on the authenticator side', () => {
        assert.deepStrictEqual(decodeIpcRequest(encodeRevoked('app1')), {
            kind: 'DecodeError',
            description: 'Expected a request, got Revoked'
        });
    });

    it('should reject unknown permission axes', () => {
        const token = rawToken('auth', {
            kind: 'Req',
            requestId: 5,
            request: {
                type: 'Auth',
                req: { ...AUTH_REQ, containers: [{ containerName: 'videos', permissions: { read: true, admin: true } }] }
            }
        });
        const decoded = decodeIpcRequest(token);
        assert.strictEqual(decoded.kind, 'DecodeError');
    });
});

describe('IPC responses', () => {
    it('should decode a denial with its request id', () => {
        const token = encodeIpcResponse(42, 'app1', errorResponse('Containers', ipcError('ContainersDenied')));
        assert.deepStrictEqual(decodeIpcMsg(token), { kind: 'Denied', requestId: 42, error: { code: 'ContainersDenied' } });
        assert.strictEqual(decodeIpcToken(token).prefix, 'app1');
    });

    it('should keep the message of a denial', () => {
        const token = encodeIpcResponse(9, 'app1', errorResponse('Auth', ipcError('InvalidMsg', 'Unknown container videos')));
        assert.deepStrictEqual(decodeIpcMsg(token), {
            kind: 'Denied',
            requestId: 9,
            error: { code: 'InvalidMsg', message: 'Unknown container videos' }
        });
    });

    it('should decode an unregistered grant', () => {
        const token = encodeIpcResponse(7, UNREGISTERED_PREFIX, {
            type: 'Unregistered',
            result: { ok: true, value: Buffer.from('bootstrap') }
        });
        assert.deepStrictEqual(decodeIpcMsg(token), { kind: 'Unregistered', requestId: 7, bootstrapConfig: Buffer.from('bootstrap') });
    });

    it('should decode a full auth grant', () => {
        const appKeys = CryptoKeyStore.generate().issueAppKeys();
        const videos = MDataInfo.newPrivate(Buffer.alloc(32, 3), 15000, { key: Buffer.alloc(32, 4), nonce: Buffer.alloc(12, 5) });
        const granted: AuthGranted = {
            appKeys,
            bootstrapConfig: Buffer.from('bootstrap'),
            accessContainer: { contentAddress: Buffer.alloc(32, 8), typeTag: 15001, nonce: Buffer.alloc(12, 1) },
            accessContainerEntry: new Map([['_videos', { info: videos, permissions: { read: true } }]])
        };

        const outcome = decodeIpcMsg(encodeIpcResponse(11, 'app1', authGrantedResponse(granted)));
        assert.strictEqual(outcome.kind, 'AuthGranted');
        if (outcome.kind !== 'AuthGranted') {
            return;
        }
        assert.strictEqual(outcome.requestId, 11);
        assert.deepStrictEqual(outcome.authGranted.appKeys, appKeys);
        assert.deepStrictEqual(outcome.authGranted.accessContainer, granted.accessContainer);
        assert.deepStrictEqual(outcome.authGranted.bootstrapConfig, Buffer.from('bootstrap'));

        const access = outcome.authGranted.accessContainerEntry.get('_videos');
        assert.deepStrictEqual(access?.info.toJSON(), videos.toJSON());
        assert.deepStrictEqual(access?.permissions, { read: true });
    });

    it('should decode a revocation notice', () => {
        const token = encodeRevoked('app1');
        assert.deepStrictEqual(decodeIpcMsg(token), { kind: 'Revoked', appId: 'app1' });
        assert.strictEqual(decodeIpcToken(token).prefix, 'app1');
    });

    it('should decode an error message', () => {
        const token = rawToken('app1', { kind: 'Err', error: { code: 'EncodeDecodeError' } });
        assert.deepStrictEqual(decodeIpcMsg(token), { kind: 'Denied', requestId: null, error: { code: 'EncodeDecodeError' } });
    });
});

describe('decodeIpcMsg on malformed input', () => {
    it('should report a token that does not match the format', () => {
        assert.deepStrictEqual(decodeIpcMsg('hello'), { kind: 'DecodeError', description: 'Not an IPC token' });
        assert.deepStrictEqual(decodeIpcMsg('safe-YXV0aA:!!!'), { kind: 'DecodeError', description: 'Not an IPC token' });
    });

    it('should report a payload that is not JSON', () => {
        const token = `safe-YXV0aA:${Buffer.from('not json').toString('base64url')}`;
        assert.deepStrictEqual(decodeIpcMsg(token), { kind: 'DecodeError', description: 'IPC payload is not valid JSON' });
    });

    it('should report a message of unknown kind', () => {
        const outcome = decodeIpcMsg(rawToken('app1', { kind: 'Nope' }));
        assert.strictEqual(outcome.kind, 'DecodeError');
        assert.ok(outcome.kind === 'DecodeError' && outcome.description.startsWith('Invalid IPC message: kind: '));
    });

    it('should reject a request id outside the u32 range', () => {
        const outcome = decodeIpcMsg(rawToken('app1', { kind: 'Resp', requestId: 0, response: { type: 'Containers', result: { ok: true, value: null } } }));
        assert.strictEqual(outcome.kind, 'DecodeError');
    });

    it('should refuse a request addressed to an app', () => {
        assert.deepStrictEqual(decodeIpcMsg(encodeAuthReq(AUTH_REQ).token), {
            kind: 'DecodeError',
            description: 'Unexpected Auth request addressed to an app'
        });
    });
});
