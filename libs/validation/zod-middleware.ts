import { ZodSchema, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { CoreError } from '../errors/CoreError.js';

/**
 * Validates decoded input and throws a DecodeError listing every issue.
 * Decoded payloads are never logged, only the issue paths.
 */
export function validate<T, I = T>(schema: ZodSchema<T, ZodTypeDef, I>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({ context, errors: errorDetails }, 'Decoded payload failed validation');

        throw new CoreError('DecodeError', `Invalid ${context}: ${errorDetails.map(e => `${e.path || '<root>'}: ${e.message}`).join('; ')}`);
    }

    return result.data;
}

/**
 * Binds a schema to a reusable validator.
 */
export const createValidator = <T, I = T>(schema: ZodSchema<T, ZodTypeDef, I>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
