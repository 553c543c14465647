/**
 * Errors carried inside IPC responses. Unlike CoreError these cross the
 * app/authenticator boundary, so they are plain codes with an optional message.
 */

export const IPC_ERROR_CODES = [
    'AuthDenied',
    'ContainersDenied',
    'ShareMDataDenied',
    'AlreadyAuthorised',
    'UnknownApp',
    'InvalidMsg',
    'InvalidOwner',
    'EncodeDecodeError'
] as const;

export type IpcErrorCode = (typeof IPC_ERROR_CODES)[number];

export interface IpcError {
    readonly code: IpcErrorCode;
    readonly message?: string;
}

export function ipcError(code: IpcErrorCode, message?: string): IpcError {
    return message === undefined ? { code } : { code, message };
}
