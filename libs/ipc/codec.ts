/**
 * IPC token codec.
 *
 * Token format: `safe-<base64url(prefix)>:<base64url(JSON message)>`. The prefix is `auth`
 * for requests addressed to the authenticator and the app id for responses.
 */

import { randomInt } from 'node:crypto';
import { CoreError } from '../errors/CoreError.js';
import { MDataInfo } from '../mutableData/mdataInfo.js';
import { IpcMsgSchema } from '../validation/ipcSchema.js';
import { validate } from '../validation/zod-middleware.js';
import { IpcMsg } from './types.js';

export const AUTHENTICATOR_PREFIX = 'auth';

const TOKEN_PATTERN = /^safe-([A-Za-z0-9_-]*):([A-Za-z0-9_-]+)$/;

export interface DecodedToken {
    readonly prefix: string;
    readonly msg: IpcMsg;
}

/**
 * Fresh correlation id: a random non-zero u32.
 */
export function generateRequestId(): number {
    return randomInt(1, 0x1_0000_0000);
}

function toWire(value: unknown): unknown {
    if (Buffer.isBuffer(value)) {
        return value.toString('base64');
    }
    if (value instanceof MDataInfo) {
        return value.toJSON();
    }
    if (value instanceof Map) {
        return [...value.entries()].map(([key, entry]) => [key, toWire(entry)]);
    }
    if (Array.isArray(value)) {
        return value.map(toWire);
    }
    if (value !== null && typeof value === 'object') {
        return Object.fromEntries(
            Object.entries(value)
                .filter(([, field]) => field !== undefined)
                .map(([key, field]) => [key, toWire(field)])
        );
    }
    return value;
}

export function encodeIpcMsg(msg: IpcMsg, prefix: string): string {
    const payload = Buffer.from(JSON.stringify(toWire(msg)), 'utf8').toString('base64url');
    return `safe-${Buffer.from(prefix, 'utf8').toString('base64url')}:${payload}`;
}

/**
 * Throws DecodeError for anything that is not a well-formed token.
 */
export function decodeIpcToken(token: string): DecodedToken {
    const match = TOKEN_PATTERN.exec(token.trim());
    if (!match) {
        throw new CoreError('DecodeError', 'Not an IPC token');
    }
    const [, prefix = '', payload = ''] = match;

    let raw: unknown;
    try {
        raw = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
    } catch (err: unknown) {
        throw new CoreError('DecodeError', 'IPC payload is not valid JSON', { cause: err });
    }
    const msg: IpcMsg = validate(IpcMsgSchema, raw, 'IPC message');
    return { prefix: Buffer.from(prefix, 'base64url').toString('utf8'), msg };
}
