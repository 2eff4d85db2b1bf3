import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import type { PersistenceSession, SessionSource } from './unitOfWork.js';

export type Queryable = {
    query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
};

/**
 * Read access straight through the pool, outside any transaction.
 */
export function poolQueryable(pool: Pool): Queryable {
    return {
        query: <T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) =>
            pool.query<T>(text, params)
    };
}

/**
 * One checked-out pg client driving one transaction.
 */
export class PgSession implements PersistenceSession, Queryable {
    constructor(private readonly client: PoolClient) { }

    query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
        return this.client.query<T>(text, params);
    }

    async begin(): Promise<void> {
        await this.client.query('BEGIN');
    }

    async commit(): Promise<void> {
        await this.client.query('COMMIT');
    }

    async rollback(): Promise<void> {
        await this.client.query('ROLLBACK');
    }

    /**
     * A client released with an error is destroyed by the pool rather than
     * handed to the next caller in an unknown transaction state.
     */
    release(error?: Error): void {
        if (error) {
            this.client.release(error);
        } else {
            this.client.release();
        }
    }
}

export class PgSessionSource implements SessionSource<PgSession> {
    constructor(private readonly pool: Pool) { }

    async acquire(): Promise<PgSession> {
        return new PgSession(await this.pool.connect());
    }
}

export { createPool } from './pool.js';
export { UnitOfWork, withUnitOfWork, TransactionStateError } from './unitOfWork.js';
export type { TransactionState, TransactionUnit, PersistenceSession, SessionSource, StagedChange } from './unitOfWork.js';
