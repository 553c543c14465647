import { z } from 'zod';
import type { EnvSource } from '../config-guard.js';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info');

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Level for the root logger, read before the rest of the core configuration is loaded.
 * An unparseable value falls back to info here; loadCoreConfig rejects it.
 */
export function logLevelFrom(env: EnvSource): LogLevel {
    const parsed = LogLevelSchema.safeParse(env.MESHVAULT_LOG_LEVEL);
    return parsed.success ? parsed.data : 'info';
}
