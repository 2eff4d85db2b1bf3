/**
 * Pattern Service
 *
 * Every mutating use case runs the same sequence:
 *   validate -> transform -> begin -> stage mutation -> saveChanges -> commit
 * and on any failure after begin: rollback (best effort), then re-raise.
 * Classified failures propagate unchanged; anything else is wrapped once as
 * Infrastructure. The service never builds a response envelope.
 */

import crypto from 'crypto';
import type { ZodType, ZodTypeDef } from 'zod';
import { Failures } from '../errors/failure.js';
import { MessageKey, describeMessage } from '../errors/messageKeys.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger as defaultLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { validate } from '../validation/zod-middleware.js';
import {
    CreatePatternSchema,
    DeletePatternSchema,
    GetPatternSchema,
    UpdatePatternSchema
} from '../validation/schema.js';
import type { CatalogUnitOfWork } from './catalogUnitOfWork.js';
import type { Category, DeletedPattern, PatternView } from './pattern.js';
import { applyPatternUpdate, toNewPattern, toPatternView } from './patternMapper.js';

export type OperationState =
    | 'Idle'
    | 'Validating'
    | 'Transforming'
    | 'Persisting'
    | 'Committed'
    | 'Completed'
    | 'Failed';

export interface PatternServiceDeps {
    unitOfWork: CatalogUnitOfWork;
    logger?: Logger;
    generateId?: () => string;
}

export class PatternService {
    private readonly unitOfWork: CatalogUnitOfWork;
    private readonly logger: Logger;
    private readonly generateId: () => string;
    private state: OperationState = 'Idle';

    constructor(deps: PatternServiceDeps) {
        this.unitOfWork = deps.unitOfWork;
        this.logger = deps.logger ?? defaultLogger;
        this.generateId = deps.generateId ?? (() => crypto.randomUUID());
    }

    get lastOperationState(): OperationState {
        return this.state;
    }

    async createPattern(request: unknown, signal?: AbortSignal): Promise<PatternView> {
        const label = 'PatternService:CreatePattern';
        return this.run(label, signal, async () => {
            const input = this.validateRequest(CreatePatternSchema, request, label);

            this.state = 'Transforming';
            const category = await this.requireCategory(input.categoryId);
            await this.ensureSlugAvailable(input.slug);
            const pattern = toNewPattern(input, this.generateId());

            await this.persist(label, signal, (uow) => uow.patterns.add(pattern));

            this.logger.info({ patternId: pattern.id, slug: pattern.slug }, 'Pattern created');
            return toPatternView(pattern, category);
        });
    }

    async updatePattern(id: string, request: unknown, signal?: AbortSignal): Promise<PatternView> {
        const label = 'PatternService:UpdatePattern';
        return this.run(label, signal, async () => {
            const body = this.requireRequestShape(request);
            const input = this.validateRequest(UpdatePatternSchema, { ...body, id }, label);

            this.state = 'Transforming';
            const existing = await this.unitOfWork.patterns.findById(input.id);
            if (!existing) {
                throw Failures.notFound('Pattern', input.id);
            }
            const category = await this.requireCategory(input.categoryId);
            if (input.slug !== existing.slug) {
                await this.ensureSlugAvailable(input.slug, existing.id);
            }
            const updated = applyPatternUpdate(existing, input);

            await this.persist(label, signal, (uow) => uow.patterns.update(updated));

            this.logger.info({ patternId: updated.id }, 'Pattern updated');
            return toPatternView(updated, category);
        });
    }

    async deletePattern(id: string, signal?: AbortSignal): Promise<DeletedPattern> {
        const label = 'PatternService:DeletePattern';
        return this.run(label, signal, async () => {
            const input = this.validateRequest(DeletePatternSchema, { id }, label);

            this.state = 'Transforming';
            const existing = await this.unitOfWork.patterns.findById(input.id);
            if (!existing) {
                throw Failures.notFound('Pattern', input.id);
            }

            await this.persist(label, signal, (uow) => uow.patterns.delete(existing));

            this.logger.info({ patternId: existing.id }, 'Pattern deleted');
            return { id: existing.id };
        });
    }

    /**
     * Read-only: no transaction is opened.
     */
    async getPatternBySlug(slug: string, signal?: AbortSignal): Promise<PatternView> {
        const label = 'PatternService:GetPatternBySlug';
        return this.run(label, signal, async () => {
            const input = this.validateRequest(GetPatternSchema, { slug }, label);

            const pattern = await this.unitOfWork.patterns.findBySlug(input.slug);
            if (!pattern) {
                throw Failures.notFound('Pattern', input.slug);
            }
            const category = await this.unitOfWork.categories.findById(pattern.categoryId);

            this.state = 'Completed';
            return toPatternView(pattern, category);
        });
    }

    private async run<T>(label: string, signal: AbortSignal | undefined, body: () => Promise<T>): Promise<T> {
        this.state = 'Validating';
        try {
            return await body();
        } catch (error) {
            this.state = 'Failed';
            if (signal?.aborted && error === signal.reason) {
                throw error;
            }
            throw ErrorSanitizer.toFailure(error, label);
        }
    }

    private requireRequestShape(request: unknown): object {
        if (request === null || request === undefined || typeof request !== 'object' || Array.isArray(request)) {
            throw Failures.domainRule(
                MessageKey.RequestCannotBeNull,
                describeMessage(MessageKey.RequestCannotBeNull)
            );
        }
        return request;
    }

    private validateRequest<T>(schema: ZodType<T, ZodTypeDef, unknown>, request: unknown, label: string): T {
        this.requireRequestShape(request);
        return validate(schema, request, label, this.logger);
    }

    private async requireCategory(categoryId: string): Promise<Category> {
        const category = await this.unitOfWork.categories.findById(categoryId);
        if (!category) {
            throw Failures.notFound('Category', categoryId);
        }
        return category;
    }

    private async ensureSlugAvailable(slug: string, exceptId?: string): Promise<void> {
        const holder = await this.unitOfWork.patterns.findBySlug(slug);
        if (holder && holder.id !== exceptId) {
            throw Failures.domainRule(
                MessageKey.PatternSlugTaken,
                `Pattern slug '${slug}' is already in use.`,
                409,
                'PATTERN_SLUG_TAKEN'
            );
        }
    }

    /**
     * Begin, stage, save, commit. A cancelled request is rolled back before
     * the abort propagates.
     */
    private async persist(
        label: string,
        signal: AbortSignal | undefined,
        mutate: (uow: CatalogUnitOfWork) => void
    ): Promise<void> {
        const uow = this.unitOfWork;
        signal?.throwIfAborted();

        this.state = 'Persisting';
        await uow.begin();
        try {
            mutate(uow);
            signal?.throwIfAborted();
            await uow.saveChanges();
            signal?.throwIfAborted();
            await uow.commit();
        } catch (error) {
            await this.rollbackQuietly(label, error);
            throw error;
        }
        this.state = 'Committed';
    }

    private async rollbackQuietly(label: string, cause: unknown): Promise<void> {
        if (this.unitOfWork.state !== 'Active') {
            return;
        }
        try {
            await this.unitOfWork.rollback();
        } catch (rollbackError) {
            this.logger.error({
                context: label,
                err: rollbackError,
                originalError: ErrorSanitizer.describe(cause)
            }, 'Rollback failed; original failure is re-raised');
        }
    }
}
