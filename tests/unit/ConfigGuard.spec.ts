/**
 * Unit Tests: Configuration guard and core configuration
 *
 * @see libs/bootstrap/config-guard.ts
 * @see libs/bootstrap/config/core-config.ts
 * @see libs/bootstrap/config/log-level.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ConfigGuard } from '../../libs/bootstrap/config-guard.js';
import { loadCoreConfig } from '../../libs/bootstrap/config/core-config.js';
import { logLevelFrom } from '../../libs/bootstrap/config/log-level.js';
import { getComponentLogger, logger } from '../../libs/logging/logger.js';

describe('loadCoreConfig', () => {
    it('should apply defaults to an empty environment', () => {
        assert.deepStrictEqual({ ...loadCoreConfig({}) }, {
            logLevel: 'info',
            networkRetryAttempts: 3,
            retryBaseDelayMs: 50,
            schedulerConcurrency: 8,
            chunkCacheSize: 64,
            minChunkSize: 1024,
            avgChunkSize: 16 * 1024,
            maxChunkSize: 64 * 1024,
            maxHandles: 1 << 20
        });
    });

    it('should coerce numeric variables', () => {
        const config = loadCoreConfig({ MESHVAULT_SCHEDULER_CONCURRENCY: '2', MESHVAULT_LOG_LEVEL: 'debug' });
        assert.strictEqual(config.schedulerConcurrency, 2);
        assert.strictEqual(config.logLevel, 'debug');
    });

    it('should reject unordered chunk sizes', () => {
        assert.throws(
            () => loadCoreConfig({ MESHVAULT_MIN_CHUNK_SIZE: '4096', MESHVAULT_AVG_CHUNK_SIZE: '1024' }),
            (err: Error & { kind?: string }) => {
                assert.strictEqual(err.kind, 'InvalidConfig');
                assert.match(err.message, /MESHVAULT_MIN_CHUNK_SIZE must not exceed MESHVAULT_AVG_CHUNK_SIZE/);
                return true;
            }
        );
    });

    it('should reject non-numeric values', () => {
        assert.throws(
            () => loadCoreConfig({ MESHVAULT_SCHEDULER_CONCURRENCY: 'many' }),
            /Invalid core configuration: MESHVAULT_SCHEDULER_CONCURRENCY/
        );
    });

    it('should forbid disabling retries in production', () => {
        assert.throws(
            () => loadCoreConfig({ NODE_ENV: 'production', MESHVAULT_NETWORK_RETRY_ATTEMPTS: '1' }),
            /Production requires at least one network retry \(Rule: ZERO_RETRY_IN_PRODUCTION\)/
        );
    });
});

describe('ConfigGuard', () => {
    it('should report every violation together', () => {
        assert.throws(
            () => ConfigGuard.enforce([
                { type: 'assert', check: (env) => env.FIRST_VAR !== undefined, message: 'FIRST_VAR must be set' },
                { type: 'forbidIf', name: 'NO_SECOND', when: (env) => env.SECOND_VAR === undefined, message: 'SECOND_VAR must be set' }
            ], {}),
            {
                kind: 'InvalidConfig',
                message: 'FATAL CONFIG: FIRST_VAR must be set; FATAL CONFIG: SECOND_VAR must be set (Rule: NO_SECOND)'
            }
        );
    });

    it('should report a rule that throws', () => {
        assert.throws(
            () => ConfigGuard.enforce([{
                type: 'assert',
                check: () => {
                    throw new Error('oops');
                },
                message: 'unused'
            }], {}),
            { message: 'Check failed for rule: oops' }
        );
    });

    it('should pass when every rule holds', () => {
        assert.doesNotThrow(() => ConfigGuard.enforce([
            { type: 'assert', check: (env) => env.PRESENT === 'yes', message: 'PRESENT must be yes' }
        ], { PRESENT: 'yes' }));
    });
});

describe('logLevelFrom', () => {
    it('should read the configured level', () => {
        assert.strictEqual(logLevelFrom({ MESHVAULT_LOG_LEVEL: 'warn' }), 'warn');
        assert.strictEqual(logLevelFrom({}), 'info');
    });

    it('should agree with the loaded core configuration', () => {
        const env = { MESHVAULT_LOG_LEVEL: 'error' };
        assert.strictEqual(loadCoreConfig(env).logLevel, logLevelFrom(env));
    });

    it('should fall back to info for an unknown level', () => {
        assert.strictEqual(logLevelFrom({ MESHVAULT_LOG_LEVEL: 'loud' }), 'info');
        assert.throws(() => loadCoreConfig({ MESHVAULT_LOG_LEVEL: 'loud' }), { kind: 'InvalidConfig' });
    });

    it('should drive the root and component loggers', () => {
        assert.strictEqual(logger.level, logLevelFrom(process.env));
        assert.strictEqual(getComponentLogger('NetworkRetry').level, logger.level);
    });
});
