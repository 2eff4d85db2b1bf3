import express from 'express';
import type { NextFunction, Request, Response, Router } from 'express';
import { withUnitOfWork } from '../db/unitOfWork.js';
import { MessageKey } from '../errors/messageKeys.js';
import type { CatalogUnitOfWorkFactory } from '../catalog/catalogUnitOfWork.js';
import { PatternService } from '../catalog/PatternService.js';
import { getRequestLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { successEnvelope } from './envelope.js';

export interface CatalogRouteDeps {
    createUnitOfWork: CatalogUnitOfWorkFactory;
    logger: Logger;
    now?: () => Date;
}

type Handler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Aborts once the client goes away before the response was written.
 */
function abortOnDisconnect(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableFinished) {
            controller.abort(new Error('Client disconnected'));
        }
    });
    return controller.signal;
}

/**
 * One unit of work and one service per request.
 */
export function createPatternHandlers(deps: CatalogRouteDeps) {
    const execute = <T>(work: (service: PatternService) => Promise<T>): Promise<T> =>
        withUnitOfWork(deps.createUnitOfWork, (unitOfWork) =>
            work(new PatternService({ unitOfWork, logger: getRequestLogger(deps.logger) }))
        );

    const create: Handler = async (req, res, next) => {
        try {
            const signal = abortOnDisconnect(res);
            const view = await execute((service) => service.createPattern(req.body, signal));
            res.status(201).json(successEnvelope(view, { messageKey: MessageKey.Created, statusCode: 201, now: deps.now }));
        } catch (error) {
            next(error);
        }
    };

    const update: Handler = async (req, res, next) => {
        try {
            const signal = abortOnDisconnect(res);
            const view = await execute((service) => service.updatePattern(req.params.id, req.body, signal));
            res.status(200).json(successEnvelope(view, { now: deps.now }));
        } catch (error) {
            next(error);
        }
    };

    const remove: Handler = async (req, res, next) => {
        try {
            const signal = abortOnDisconnect(res);
            const deleted = await execute((service) => service.deletePattern(req.params.id, signal));
            res.status(200).json(successEnvelope(deleted, { now: deps.now }));
        } catch (error) {
            next(error);
        }
    };

    const getBySlug: Handler = async (req, res, next) => {
        try {
            const signal = abortOnDisconnect(res);
            const view = await execute((service) => service.getPatternBySlug(req.params.slug, signal));
            res.status(200).json(successEnvelope(view, { now: deps.now }));
        } catch (error) {
            next(error);
        }
    };

    return { create, update, remove, getBySlug };
}

export function createCatalogRouter(deps: CatalogRouteDeps): Router {
    const handlers = createPatternHandlers(deps);
    const router = express.Router();

    router.post('/patterns', handlers.create);
    router.put('/patterns/:id', handlers.update);
    router.delete('/patterns/:id', handlers.remove);
    router.get('/patterns/:slug', handlers.getBySlug);

    return router;
}
