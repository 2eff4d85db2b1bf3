import type { ZodType, ZodTypeDef } from 'zod';
import { FieldErrorCollector } from '../errors/fieldErrors.js';
import { logger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';

export const ROOT_FIELD = 'request';

/**
 * Validation Middleware
 * Every issue the schema reports is collected into one Validation failure,
 * keyed by field path. Values are never logged, only which fields failed.
 */
export function validate<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    data: unknown,
    context: string,
    log: Logger = logger
): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const collector = new FieldErrorCollector();
        for (const issue of result.error.issues) {
            const field = issue.path.length > 0 ? issue.path.join('.') : ROOT_FIELD;
            collector.add(field, issue.message);
        }

        const fieldErrors = collector.toFieldErrors();
        log.debug({
            context,
            fields: Object.keys(fieldErrors)
        }, 'Input validation failure');

        throw collector.toFailure();
    }

    return result.data;
}

/**
 * Factory for reusable validators bound to one schema.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
