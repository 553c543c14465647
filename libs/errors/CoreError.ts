/**
 * CoreError
 * Canonical error for every terminal failure of the core, with a machine-readable kind.
 * Each asynchronous operation surfaces exactly one of these (or its result-contract form).
 */

export type ErrorKind =
    | 'HandleInvalid'
    | 'HandleTypeMismatch'
    | 'VersionConflict'
    | 'PermissionDenied'
    | 'CryptoError'
    | 'DecodeError'
    | 'AlreadyExists'
    | 'NotFound'
    | 'NetworkError'
    | 'AllocationError'
    | 'InvalidConfig';

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>(['NetworkError']);

export class CoreError extends Error {
    readonly kind: ErrorKind;
    readonly retryable: boolean;

    constructor(kind: ErrorKind, description: string, options?: { cause?: unknown }) {
        super(description, options);
        this.name = 'CoreError';
        this.kind = kind;
        this.retryable = RETRYABLE_KINDS.has(kind);
        Object.setPrototypeOf(this, CoreError.prototype);
    }

    get description(): string {
        return this.message;
    }
}

export function isCoreError(err: unknown, kind?: ErrorKind): err is CoreError {
    return err instanceof CoreError && (kind === undefined || err.kind === kind);
}
