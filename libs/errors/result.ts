import { CoreError, ErrorKind } from './CoreError.js';
import { ErrorSanitizer } from './sanitizer.js';

/**
 * Result contract: every asynchronous operation completes with either a success payload
 * or an (errorKind, description) pair.
 */
export type OperationResult<T> =
    | { success: true; value: T }
    | { success: false; error: { kind: ErrorKind; description: string } };

export async function settle<T>(operation: Promise<T> | (() => Promise<T>), contextLabel = 'operation'): Promise<OperationResult<T>> {
    try {
        const value = await (typeof operation === 'function' ? operation() : operation);
        return { success: true, value };
    } catch (err: unknown) {
        const error = err instanceof CoreError ? err : ErrorSanitizer.sanitize(err, contextLabel, 'AllocationError');
        return { success: false, error: { kind: error.kind, description: error.description } };
    }
}

/**
 * Inverse of settle: turns a failed result back into a thrown CoreError.
 */
export function unwrap<T>(result: OperationResult<T>): T {
    if (result.success) {
        return result.value;
    }
    throw new CoreError(result.error.kind, result.error.description);
}
