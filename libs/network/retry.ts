/**
 * Bounded retry for transient network failures.
 *
 * Only retryable CoreErrors (NetworkError) are retried; every other kind, VersionConflict
 * in particular, surfaces on the first failure.
 */

import { getComponentLogger } from '../logging/logger.js';
import { setTimeout as sleep } from 'node:timers/promises';
import { ErrorSanitizer } from '../errors/sanitizer.js';

const logger = getComponentLogger('NetworkRetry');

const MAX_BACKOFF_MS = 5_000;

export interface RetryPolicy {
    /** Total attempts, including the first */
    readonly attempts: number;
    readonly baseDelayMs: number;
}

export function calculateBackoffMs(attemptNo: number, baseDelayMs: number): number {
    const backoff = baseDelayMs * Math.pow(2, Math.max(0, attemptNo - 1));
    return Math.min(backoff, MAX_BACKOFF_MS);
}

export async function withRetry<T>(label: string, operation: () => Promise<T>, policy: RetryPolicy): Promise<T> {
    const attempts = Math.max(1, policy.attempts);
    for (let attemptNo = 1; ; attemptNo++) {
        try {
            return await operation();
        } catch (err: unknown) {
            const error = ErrorSanitizer.sanitize(err, label);
            if (!error.retryable || attemptNo >= attempts) {
                throw error;
            }
            const delayMs = calculateBackoffMs(attemptNo, policy.baseDelayMs);
            logger.warn({ label, attemptNo, delayMs, kind: error.kind }, 'Transient failure, retrying');
            await sleep(delayMs);
        }
    }
}
