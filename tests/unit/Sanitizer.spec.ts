/**
 * Unit Tests: ErrorSanitizer
 *
 * Tests wrapping of foreign throwables into CoreError with an incident id.
 *
 * @see libs/errors/sanitizer.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CoreError } from '../../libs/errors/CoreError.js';
import { ErrorSanitizer } from '../../libs/errors/sanitizer.js';

describe('ErrorSanitizer', () => {
    it('should wrap raw errors as NetworkError by default', () => {
        const sanitized = ErrorSanitizer.sanitize(new Error('ECONNRESET'), 'network.getMData');

        assert.ok(sanitized instanceof CoreError);
        assert.strictEqual(sanitized.kind, 'NetworkError');
        assert.strictEqual(sanitized.retryable, true);
        assert.match(sanitized.description, /^network\.getMData failed: ECONNRESET \(incident [0-9a-f-]{36}\)$/);
    });

    it('should honour the fallback kind', () => {
        const sanitized = ErrorSanitizer.sanitize('broken invariant', 'collections', 'AllocationError');
        assert.strictEqual(sanitized.kind, 'AllocationError');
        assert.strictEqual(sanitized.retryable, false);
    });

    it('should pass through an existing CoreError unchanged', () => {
        const original = new CoreError('VersionConflict', 'stale');
        assert.strictEqual(ErrorSanitizer.sanitize(original, 'mutate'), original);
    });

    it('should keep the original throwable as cause', () => {
        const raw = new Error('socket hang up');
        assert.strictEqual(ErrorSanitizer.sanitize(raw, 'network').cause, raw);
    });
});
