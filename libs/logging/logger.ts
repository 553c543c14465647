import pino from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";
import { logLevelFrom } from "../bootstrap/config/log-level.js";

export type ContextRole = 'app' | 'unregistered-app' | 'authenticator';

export interface LoggableContext {
    readonly contextId: number;
    readonly role: ContextRole;
    readonly appId?: string;
}

export const logger = pino({
    level: logLevelFrom(process.env),
    base: {
        system: "meshvault"
    },
    redact: {
        paths: REDACT_KEYS,
        censor: REDACT_CENSOR
    }
});

/**
 * Named logger for a component that is not tied to one context.
 */
export function getComponentLogger(name: string) {
    return logger.child({ name });
}

/**
 * Returns a child logger with context identity attached.
 */
export function getContextLogger(context: LoggableContext) {
    return logger.child({
        contextId: context.contextId,
        role: context.role,
        ...(context.appId ? { appId: context.appId } : {})
    });
}

export type ContextLogger = ReturnType<typeof getContextLogger>;
