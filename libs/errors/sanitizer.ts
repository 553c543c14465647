import { logger } from '../logging/logger.js';
import crypto from 'crypto';
import { CoreError, ErrorKind } from './CoreError.js';

/**
 * Wraps foreign throwables (transport failures, bugs in collaborators) into a CoreError
 * and records an IncidentID so the log line and the surfaced error can be correlated.
 */
export const ErrorSanitizer = {
    sanitize: (err: unknown, contextLabel: string, fallbackKind: ErrorKind = 'NetworkError'): CoreError => {
        if (err instanceof CoreError) return err;

        let originalErrorMessage: string;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else {
            originalErrorMessage = String(err);
        }

        const incidentId = crypto.randomUUID();
        logger.error({
            incidentId,
            context: contextLabel,
            originalError: originalErrorMessage,
            stack: originalErrorStack
        }, 'Unexpected failure wrapped into CoreError');

        return new CoreError(
            fallbackKind,
            `${contextLabel} failed: ${originalErrorMessage} (incident ${incidentId})`,
            { cause: err }
        );
    }
};
