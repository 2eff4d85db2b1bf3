import { pino } from 'pino';
import type { DestinationStream, Logger } from 'pino';
import { RequestContext } from '../context/requestContext.js';

import { REDACT_KEYS, REDACT_CENSOR } from './redactionConfig.js';

export type { Logger } from 'pino';

export interface LoggerOptions {
    level?: string;
    name?: string;
    destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const config = {
        name: options.name,
        level: options.level ?? 'info',
        base: {
            system: 'pattern-catalog'
        },
        redact: {
            paths: REDACT_KEYS,
            censor: REDACT_CENSOR
        }
    };
    return options.destination ? pino(config, options.destination) : pino(config);
}

export const logger = createLogger({ level: process.env.LOG_LEVEL ?? 'info' });

/**
 * Returns a child logger with the active request scope attached, or the base
 * logger when called outside a request.
 */
export function getRequestLogger(base: Logger = logger): Logger {
    const scope = RequestContext.current();
    if (!scope) {
        return base;
    }
    return base.child({
        requestId: scope.requestId,
        method: scope.method,
        path: scope.path
    });
}
