import express from 'express';
import type { Express } from 'express';
import type { CatalogUnitOfWorkFactory } from '../catalog/catalogUnitOfWork.js';
import type { Logger } from '../logging/logger.js';
import { createCatalogRouter } from './catalogRouter.js';
import { FailureTranslator } from './FailureTranslator.js';
import { createFailureMiddleware, notFoundHandler } from './failureMiddleware.js';
import { requestContextMiddleware } from './requestContextMiddleware.js';

export interface AppDeps {
    createUnitOfWork: CatalogUnitOfWorkFactory;
    logger: Logger;
    now?: () => Date;
    bodyLimit?: string;
}

export function createApp(deps: AppDeps): Express {
    const app = express();
    app.disable('x-powered-by');

    // Parse first: the request scope must be entered after body-parser's
    // stream callbacks or it is lost on the way to the handlers.
    app.use(express.json({ limit: deps.bodyLimit ?? '100kb' }));
    app.use(requestContextMiddleware());

    app.use('/api', createCatalogRouter(deps));
    app.use(notFoundHandler);
    app.use(createFailureMiddleware(new FailureTranslator({ logger: deps.logger, now: deps.now })));

    return app;
}
