import crypto from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { RequestContext } from '../context/requestContext.js';

export const REQUEST_ID_HEADER = 'x-request-id';

const MAX_REQUEST_ID_LENGTH = 128;

function incomingRequestId(req: Request): string | undefined {
    const header = req.headers[REQUEST_ID_HEADER];
    if (typeof header !== 'string') {
        return undefined;
    }
    const trimmed = header.trim();
    return trimmed.length > 0 && trimmed.length <= MAX_REQUEST_ID_LENGTH ? trimmed : undefined;
}

/**
 * Establishes the request scope for everything downstream and echoes the
 * request id back to the caller.
 */
export function requestContextMiddleware(generateId: () => string = () => crypto.randomUUID()) {
    return (req: Request, res: Response, next: NextFunction): void => {
        const requestId = incomingRequestId(req) ?? generateId();
        res.setHeader(REQUEST_ID_HEADER, requestId);
        RequestContext.run({
            requestId,
            method: req.method,
            path: req.path,
            startedAt: Date.now()
        }, () => next());
    };
}
