import { Failure, Failures, isFailure } from './failure.js';

/**
 * Error Information Disclosure Prevention
 * Anything that is not already a classified Failure is wrapped exactly once as
 * an Infrastructure failure. The original error rides along as the cause so
 * the translator can log it; it never reaches the response.
 */
export const ErrorSanitizer = {
    toFailure: (err: unknown, contextLabel: string): Failure => {
        if (isFailure(err)) return err;
        return Failures.infrastructure(err, contextLabel);
    },

    /**
     * Flattens an arbitrary thrown value into a loggable record.
     */
    describe: (err: unknown): { message: string; stack?: string; code?: string } => {
        if (typeof err === 'string') {
            return { message: err };
        }
        if (err instanceof Error || (typeof err === 'object' && err !== null && 'message' in err)) {
            const message = 'message' in err ? err.message : undefined;
            const stack = 'stack' in err ? err.stack : undefined;
            const code = 'code' in err ? err.code : undefined;
            return {
                message: typeof message === 'string' ? message : String(message),
                stack: typeof stack === 'string' ? stack : undefined,
                code: typeof code === 'string' ? code : undefined,
            };
        }
        return { message: String(err) };
    },
};
