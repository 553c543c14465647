/**
 * Object kinds a context registry can hold, keyed by handle kind.
 */

import type { CapabilityRegistry } from '../registry/CapabilityRegistry.js';
import type { MDataInfo } from '../mutableData/mdataInfo.js';
import type { EntriesCollection, EntryActionsCollection, MDataValue } from '../mutableData/entries.js';
import type { PermissionSet, PermissionsCollection } from '../mutableData/permissions.js';
import type { CipherOpt } from '../immutableData/cipherOpt.js';
import type { SelfEncryptorReader, SelfEncryptorWriter } from '../immutableData/store.js';

export type ContextObjects = {
    mdataInfo: MDataInfo;
    entries: EntriesCollection;
    entryActions: EntryActionsCollection;
    keys: readonly Buffer[];
    values: readonly MDataValue[];
    permissions: PermissionsCollection;
    permissionSet: PermissionSet;
    signPublicKey: Buffer;
    signSecretKey: Buffer;
    encPublicKey: Buffer;
    encSecretKey: Buffer;
    cipherOpt: CipherOpt;
    selfEncryptorWriter: SelfEncryptorWriter;
    selfEncryptorReader: SelfEncryptorReader;
};

export type ObjectKind = keyof ContextObjects;

export type ContextRegistry = CapabilityRegistry<ContextObjects>;
