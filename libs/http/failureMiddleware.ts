import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { Failures } from '../errors/failure.js';
import { MessageKey, describeMessage } from '../errors/messageKeys.js';
import type { FailureTranslator } from './FailureTranslator.js';

/**
 * body-parser reports its own errors with a `type` tag; map the ones a client
 * can cause to domain failures before translation.
 */
export function fromBodyParserError(err: unknown): unknown {
    if (typeof err !== 'object' || err === null || !('type' in err)) {
        return err;
    }
    switch (err.type) {
        case 'entity.parse.failed':
            return Failures.domainRule(
                MessageKey.MalformedRequestBody,
                describeMessage(MessageKey.MalformedRequestBody)
            );
        case 'entity.too.large':
            return Failures.domainRule(
                MessageKey.PayloadTooLarge,
                describeMessage(MessageKey.PayloadTooLarge),
                413
            );
        default:
            return err;
    }
}

/**
 * Last handler in the chain. Writes the translated envelope with the
 * envelope's status; hands off to express when the response already started.
 */
export function createFailureMiddleware(translator: FailureTranslator): ErrorRequestHandler {
    return (err: unknown, _req: Request, res: Response, next: NextFunction): void => {
        const { envelope } = translator.translate(fromBodyParserError(err));
        if (res.headersSent) {
            next(err);
            return;
        }
        res.status(envelope.statusCode).json(envelope);
    };
}

export const notFoundHandler: RequestHandler = (req, _res, next) => {
    next(Failures.notFound('Route', `${req.method} ${req.path}`, MessageKey.RouteNotFound));
};
