import { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { InputValidationError } from '../errors/credentialErrors.js';

/**
 * Validates untrusted input and throws a typed InputValidationError on failure.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({
            context,
            errors: errorDetails
        }, "Input validation failure");

        throw new InputValidationError(`Validation failed in ${context}`, errorDetails);
    }

    return result.data;
}

/**
 * Factory for reusable validators bound to one schema.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
