import type { Pool } from 'pg';
import { PgSession, PgSessionSource, poolQueryable } from '../db/index.js';
import { UnitOfWork } from '../db/unitOfWork.js';
import type { TransactionUnit } from '../db/unitOfWork.js';
import type { Logger } from '../logging/logger.js';
import { PgCategoryRepository, PgPatternRepository } from './repository.js';
import type { CategoryRepository, PatternRepository } from './repository.js';

/**
 * A transaction unit plus the repositories that stage changes on it.
 * One instance per operation; never shared between concurrent requests.
 */
export interface CatalogUnitOfWork extends TransactionUnit {
    readonly patterns: PatternRepository;
    readonly categories: CategoryRepository;
}

export class PgCatalogUnitOfWork extends UnitOfWork<PgSession> implements CatalogUnitOfWork {
    readonly patterns: PatternRepository;
    readonly categories: CategoryRepository;

    constructor(pool: Pool, logger: Logger) {
        super(new PgSessionSource(pool), logger);
        const reader = poolQueryable(pool);
        this.patterns = new PgPatternRepository(this, reader);
        this.categories = new PgCategoryRepository(this, reader);
    }
}

export type CatalogUnitOfWorkFactory = () => CatalogUnitOfWork;

export function pgCatalogUnitOfWorkFactory(pool: Pool, logger: Logger): CatalogUnitOfWorkFactory {
    return () => new PgCatalogUnitOfWork(pool, logger);
}
