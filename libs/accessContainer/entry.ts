/**
 * Encoding of access-container entries.
 *
 * The access container is one shared record with an entry per registered app. The entry key
 * is SHA3(appId) encrypted under the app's key with the access-container nonce; the value is
 * the app's container map encrypted under the same key.
 */

import { sha3Hash, symmetricDecrypt, symmetricEncrypt } from '../crypto/primitives.js';
import { CoreError } from '../errors/CoreError.js';
import { MDataInfo } from '../mutableData/mdataInfo.js';
import { AccessContainerEntrySchema } from '../validation/ipcSchema.js';
import { validate } from '../validation/zod-middleware.js';
import { AccessContainerEntry, AccessContInfo, ContainerAccess } from '../ipc/types.js';

export function accessEntryKey(appId: string, encKey: Buffer, accessContainer: AccessContInfo): Buffer {
    return symmetricEncrypt(sha3Hash(Buffer.from(appId, 'utf8')), encKey, accessContainer.nonce);
}

export function accessContainerMDataInfo(accessContainer: AccessContInfo): MDataInfo {
    return MDataInfo.newPublic(accessContainer.contentAddress, accessContainer.typeTag);
}

export function encodeAccessEntry(entry: AccessContainerEntry, encKey: Buffer): Buffer {
    const wire = [...entry.entries()].map(([name, access]) => [name, { info: access.info.toJSON(), permissions: access.permissions }]);
    return symmetricEncrypt(Buffer.from(JSON.stringify(wire), 'utf8'), encKey);
}

export function decodeAccessEntry(ciphertext: Buffer, encKey: Buffer): AccessContainerEntry {
    const plain = symmetricDecrypt(ciphertext, encKey);
    let raw: unknown;
    try {
        raw = JSON.parse(plain.toString('utf8'));
    } catch (err: unknown) {
        throw new CoreError('DecodeError', 'Access-container entry is not valid JSON', { cause: err });
    }
    return validate(AccessContainerEntrySchema, raw, 'access-container entry');
}

export function withContainer(entry: AccessContainerEntry, name: string, access: ContainerAccess): AccessContainerEntry {
    const next = new Map(entry);
    next.set(name, access);
    return next;
}
