/**
 * Messages exchanged between an application and the authenticator.
 */

import type { AppKeys } from '../crypto/keyManager.js';
import type { IpcError } from '../errors/IpcError.js';
import type { MDataInfo } from '../mutableData/mdataInfo.js';
import type { PermissionRequest } from '../mutableData/permissions.js';

export interface AppExchangeInfo {
    /** Stable identity used for revocation and audit */
    readonly id: string;
    /** Distinguishes app instances sharing an id */
    readonly scope?: string;
    readonly name: string;
    readonly vendor: string;
}

export interface ContainerPermission {
    readonly containerName: string;
    readonly permissions: PermissionRequest;
}

export interface AuthReq {
    readonly app: AppExchangeInfo;
    /** Whether the app wants its own dedicated container */
    readonly appContainer: boolean;
    readonly containers: readonly ContainerPermission[];
}

export interface ContainersReq {
    readonly app: AppExchangeInfo;
    readonly containers: readonly ContainerPermission[];
}

export interface UnregisteredReq {
    readonly extraData: Buffer;
}

export interface ShareMData {
    readonly typeTag: number;
    readonly name: Buffer;
    readonly permissions: PermissionRequest;
}

export interface ShareMDataReq {
    readonly app: AppExchangeInfo;
    readonly mdata: readonly ShareMData[];
}

export type IpcReq =
    | { readonly type: 'Auth'; readonly req: AuthReq }
    | { readonly type: 'Containers'; readonly req: ContainersReq }
    | { readonly type: 'Unregistered'; readonly req: UnregisteredReq }
    | { readonly type: 'ShareMData'; readonly req: ShareMDataReq };

/**
 * Locates and decrypts the per-app access-container entry.
 */
export interface AccessContInfo {
    /** Name of the access-container record */
    readonly contentAddress: Buffer;
    readonly typeTag: number;
    readonly nonce: Buffer;
}

export interface ContainerAccess {
    readonly info: MDataInfo;
    readonly permissions: PermissionRequest;
}

/**
 * Container name to keying info, as stored in an app's access-container entry.
 */
export type AccessContainerEntry = ReadonlyMap<string, ContainerAccess>;

export interface AuthGranted {
    readonly appKeys: AppKeys;
    readonly bootstrapConfig: Buffer;
    readonly accessContainer: AccessContInfo;
    readonly accessContainerEntry: AccessContainerEntry;
}

export type IpcResult<T> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: IpcError };

export type IpcResp =
    | { readonly type: 'Auth'; readonly result: IpcResult<AuthGranted> }
    | { readonly type: 'Containers'; readonly result: IpcResult<null> }
    | { readonly type: 'Unregistered'; readonly result: IpcResult<Buffer> }
    | { readonly type: 'ShareMData'; readonly result: IpcResult<null> };

export type IpcMsg =
    | { readonly kind: 'Req'; readonly requestId: number; readonly request: IpcReq }
    | { readonly kind: 'Resp'; readonly requestId: number; readonly response: IpcResp }
    | { readonly kind: 'Revoked'; readonly appId: string }
    | { readonly kind: 'Err'; readonly error: IpcError };
