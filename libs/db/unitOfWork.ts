/**
 * Unit of Work
 * Owns at most one persistence session and one transaction at a time.
 * Mutations are staged in memory and only reach the session on saveChanges();
 * they become durable only on commit().
 */

import { ErrorSanitizer } from '../errors/sanitizer.js';
import { Failures } from '../errors/failure.js';
import type { Logger } from '../logging/logger.js';

export type TransactionState = 'Idle' | 'Active' | 'Committed' | 'RolledBack';

/**
 * A checked-out connection able to run one transaction.
 */
export interface PersistenceSession {
    begin(): Promise<void>;
    commit(): Promise<void>;
    rollback(): Promise<void>;
    /** Passing an error tells the source the session must not be reused. */
    release(error?: Error): void;
}

export interface SessionSource<S extends PersistenceSession> {
    acquire(): Promise<S>;
}

export interface StagedChange<S> {
    readonly label: string;
    apply(session: S): Promise<void>;
}

/**
 * The transaction surface an orchestrator drives.
 */
export interface TransactionUnit {
    readonly state: TransactionState;
    readonly pendingChanges: number;
    begin(): Promise<void>;
    saveChanges(): Promise<void>;
    commit(): Promise<void>;
    rollback(): Promise<void>;
    dispose(): Promise<void>;
}

export class TransactionStateError extends Error {
    constructor(
        readonly operation: string,
        readonly state: TransactionState
    ) {
        super(`Cannot ${operation} while transaction is ${state}`);
        this.name = 'TransactionStateError';
    }
}

function asError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

export class UnitOfWork<S extends PersistenceSession> implements TransactionUnit {
    private currentState: TransactionState = 'Idle';
    private session: S | null = null;
    private staged: StagedChange<S>[] = [];
    private disposed = false;
    private starting = false;

    constructor(
        private readonly source: SessionSource<S>,
        protected readonly logger: Logger
    ) { }

    get state(): TransactionState {
        return this.currentState;
    }

    get pendingChanges(): number {
        return this.staged.length;
    }

    /**
     * Session of the active transaction, for reads that must see staged
     * writes already flushed by saveChanges().
     */
    get activeSession(): S | null {
        return this.currentState === 'Active' ? this.session : null;
    }

    async begin(): Promise<void> {
        if (this.disposed) {
            throw Failures.infrastructure(new TransactionStateError('begin', this.currentState), 'UnitOfWork:Begin:Disposed');
        }
        // A begin still waiting on its session counts as Active.
        if (this.currentState === 'Active' || this.starting) {
            throw Failures.infrastructure(new TransactionStateError('begin', 'Active'), 'UnitOfWork:Begin:AlreadyActive');
        }

        this.starting = true;
        let session: S;
        try {
            session = await this.openSession();
        } finally {
            this.starting = false;
        }

        this.session = session;
        this.currentState = 'Active';
        this.logger.debug({ component: 'UnitOfWork' }, 'Transaction started');
    }

    private async openSession(): Promise<S> {
        let session: S;
        try {
            session = await this.source.acquire();
        } catch (error) {
            throw ErrorSanitizer.toFailure(error, 'UnitOfWork:Acquire');
        }

        try {
            await session.begin();
        } catch (error) {
            this.releaseSession(session, asError(error));
            throw ErrorSanitizer.toFailure(error, 'UnitOfWork:Begin');
        }
        return session;
    }

    stage(change: StagedChange<S>): void {
        this.staged.push(change);
    }

    async saveChanges(): Promise<void> {
        const session = this.requireActive('save changes');
        const changes = this.staged;
        this.staged = [];

        for (const change of changes) {
            try {
                await change.apply(session);
            } catch (error) {
                throw ErrorSanitizer.toFailure(error, `UnitOfWork:SaveChanges:${change.label}`);
            }
        }
    }

    async commit(): Promise<void> {
        const session = this.requireActive('commit');
        if (this.staged.length > 0) {
            this.logger.warn(
                { component: 'UnitOfWork', discarded: this.staged.map(change => change.label) },
                'Committing with unsaved staged changes; they are discarded'
            );
            this.staged = [];
        }

        try {
            await session.commit();
        } catch (error) {
            // A failed COMMIT leaves nothing durable; the session is destroyed.
            this.finish(session, 'RolledBack', asError(error));
            throw ErrorSanitizer.toFailure(error, 'UnitOfWork:Commit');
        }
        this.finish(session, 'Committed');
        this.logger.debug({ component: 'UnitOfWork' }, 'Transaction committed');
    }

    async rollback(): Promise<void> {
        const session = this.requireActive('rollback');
        this.staged = [];

        try {
            await session.rollback();
        } catch (error) {
            this.finish(session, 'RolledBack', asError(error));
            throw ErrorSanitizer.toFailure(error, 'UnitOfWork:Rollback');
        }
        this.finish(session, 'RolledBack');
        this.logger.debug({ component: 'UnitOfWork' }, 'Transaction rolled back');
    }

    /**
     * Idempotent. Rolls back an abandoned transaction and releases the session.
     */
    async dispose(): Promise<void> {
        if (this.disposed) {
            return;
        }
        this.disposed = true;
        this.staged = [];

        const session = this.session;
        if (!session) {
            return;
        }

        if (this.currentState === 'Active') {
            try {
                await session.rollback();
                this.finish(session, 'RolledBack');
            } catch (error) {
                this.logger.error({ component: 'UnitOfWork', err: error }, 'Rollback failed during dispose');
                this.finish(session, 'RolledBack', asError(error));
            }
            return;
        }

        this.session = null;
        this.releaseSession(session);
    }

    private requireActive(operation: string): S {
        if (this.currentState !== 'Active' || !this.session) {
            throw Failures.infrastructure(new TransactionStateError(operation, this.currentState), 'UnitOfWork:NotActive');
        }
        return this.session;
    }

    private finish(session: S, state: TransactionState, error?: Error): void {
        this.session = null;
        this.currentState = state;
        this.releaseSession(session, error);
    }

    private releaseSession(session: S, error?: Error): void {
        try {
            session.release(error);
        } catch (releaseError) {
            this.logger.error({ component: 'UnitOfWork', err: releaseError }, 'Failed to release session');
        }
    }
}

/**
 * Scoped guard: the unit is disposed on every exit path, which rolls back
 * anything left Active.
 */
export async function withUnitOfWork<U extends TransactionUnit, T>(
    create: () => U,
    work: (unit: U) => Promise<T>
): Promise<T> {
    const unit = create();
    try {
        return await work(unit);
    } finally {
        await unit.dispose();
    }
}
