import { z } from 'zod';
import { ConfigGuard, EnvSource, GuardRule } from '../config-guard.js';
import { CoreError } from '../../errors/CoreError.js';
import { LogLevel, LogLevelSchema } from './log-level.js';

const positiveInt = (fallback: number) =>
    z.coerce.number().int().positive().default(fallback);

const CoreConfigSchema = z.object({
    MESHVAULT_LOG_LEVEL: LogLevelSchema,
    MESHVAULT_NETWORK_RETRY_ATTEMPTS: positiveInt(3),
    MESHVAULT_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(50),
    MESHVAULT_SCHEDULER_CONCURRENCY: positiveInt(8),
    MESHVAULT_CHUNK_CACHE_SIZE: positiveInt(64),
    MESHVAULT_MIN_CHUNK_SIZE: positiveInt(1024),
    MESHVAULT_AVG_CHUNK_SIZE: positiveInt(16 * 1024),
    MESHVAULT_MAX_CHUNK_SIZE: positiveInt(64 * 1024),
    MESHVAULT_MAX_HANDLES: positiveInt(1 << 20)
});

export interface CoreConfig {
    readonly logLevel: LogLevel;
    readonly networkRetryAttempts: number;
    readonly retryBaseDelayMs: number;
    readonly schedulerConcurrency: number;
    readonly chunkCacheSize: number;
    readonly minChunkSize: number;
    readonly avgChunkSize: number;
    readonly maxChunkSize: number;
    readonly maxHandles: number;
}

/**
 * Chunk sizing must stay ordered, otherwise the chunker cannot make progress.
 */
export const CHUNKING_GUARDS: GuardRule[] = [
    {
        type: 'assert',
        check: (env) => Number(env.MESHVAULT_MIN_CHUNK_SIZE ?? 1024) <= Number(env.MESHVAULT_AVG_CHUNK_SIZE ?? 16 * 1024),
        message: 'MESHVAULT_MIN_CHUNK_SIZE must not exceed MESHVAULT_AVG_CHUNK_SIZE'
    },
    {
        type: 'assert',
        check: (env) => Number(env.MESHVAULT_AVG_CHUNK_SIZE ?? 16 * 1024) <= Number(env.MESHVAULT_MAX_CHUNK_SIZE ?? 64 * 1024),
        message: 'MESHVAULT_AVG_CHUNK_SIZE must not exceed MESHVAULT_MAX_CHUNK_SIZE'
    },
    {
        type: 'forbidIf',
        name: 'ZERO_RETRY_IN_PRODUCTION',
        when: (env) => env.NODE_ENV === 'production' && env.MESHVAULT_NETWORK_RETRY_ATTEMPTS === '1',
        message: 'Production requires at least one network retry'
    }
];

export function loadCoreConfig(env: EnvSource = process.env): CoreConfig {
    ConfigGuard.enforce(CHUNKING_GUARDS, env);

    const parsed = CoreConfigSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new CoreError('InvalidConfig', `Invalid core configuration: ${details.join('; ')}`);
    }

    const cfg = parsed.data;
    return Object.freeze({
        logLevel: cfg.MESHVAULT_LOG_LEVEL,
        networkRetryAttempts: cfg.MESHVAULT_NETWORK_RETRY_ATTEMPTS,
        retryBaseDelayMs: cfg.MESHVAULT_RETRY_BASE_DELAY_MS,
        schedulerConcurrency: cfg.MESHVAULT_SCHEDULER_CONCURRENCY,
        chunkCacheSize: cfg.MESHVAULT_CHUNK_CACHE_SIZE,
        minChunkSize: cfg.MESHVAULT_MIN_CHUNK_SIZE,
        avgChunkSize: cfg.MESHVAULT_AVG_CHUNK_SIZE,
        maxChunkSize: cfg.MESHVAULT_MAX_CHUNK_SIZE,
        maxHandles: cfg.MESHVAULT_MAX_HANDLES
    });
}

let cachedConfig: CoreConfig | null = null;

export function coreConfig(): CoreConfig {
    if (!cachedConfig) {
        cachedConfig = loadCoreConfig(process.env);
    }
    return cachedConfig;
}
