/**
 * Unit Tests: Pattern Service
 *
 * Runs every use case against the in-memory catalog so commits, rollbacks
 * and released sessions can be observed directly.
 *
 * @see libs/catalog/PatternService.ts
 */

import { describe, it, beforeEach, mock } from 'node:test';
import assert from 'node:assert';
import { PatternService } from '../../libs/catalog/PatternService.js';
import { FailureKind, isFailure } from '../../libs/errors/failure.js';
import type { Failure } from '../../libs/errors/failure.js';
import { MessageKey } from '../../libs/errors/messageKeys.js';
import {
    CATEGORY_ID,
    InMemoryCatalogStore,
    InMemoryCatalogUnitOfWork,
    MISSING_ID,
    OTHER_CATEGORY_ID,
    captureLogger,
    samplePattern,
    seededStore
} from '../support/inMemoryCatalog.js';
import type { LogLine } from '../support/inMemoryCatalog.js';

const NEW_ID = '5d4c3b2a-1f0e-4d9c-8b7a-6f5e4d3c2b1a';

const CREATE_REQUEST = {
    name: 'Singleton',
    slug: 'singleton',
    summary: 'One instance per process.',
    problem: 'Shared access to a single resource.',
    solution: 'A private constructor and a static accessor.',
    categoryId: CATEGORY_ID
};

function failureOf(error: unknown): Failure {
    assert.ok(isFailure(error), `expected a Failure, got ${String(error)}`);
    return error;
}

describe('PatternService', () => {
    let store: InMemoryCatalogStore;
    let unit: InMemoryCatalogUnitOfWork;
    let service: PatternService;
    let lines: LogLine[];

    beforeEach(() => {
        store = seededStore();
        const capture = captureLogger();
        lines = capture.lines;
        unit = new InMemoryCatalogUnitOfWork(store, capture.logger);
        service = new PatternService({ unitOfWork: unit, logger: capture.logger, generateId: () => NEW_ID });
    });

    describe('createPattern', () => {
        it('should validate, persist and commit a new pattern', async () => {
            const view = await service.createPattern(CREATE_REQUEST);

            assert.deepStrictEqual(view, { ...CREATE_REQUEST, id: NEW_ID, categoryName: 'Creational' });
            assert.deepStrictEqual(store.patterns.get(NEW_ID), { ...CREATE_REQUEST, id: NEW_ID });
            assert.strictEqual(unit.state, 'Committed');
            assert.strictEqual(service.lastOperationState, 'Committed');
            assert.deepStrictEqual(store.sessions[0].calls, ['begin', 'commit', 'release']);
            assert.ok(lines.some(line => line.msg === 'Pattern created' && line.patternId === NEW_ID));
        });

        it('should report every invalid field without opening a transaction', async () => {
            await assert.rejects(service.createPattern({ name: ' ', slug: 'Bad Slug', categoryId: CATEGORY_ID }), (error: unknown) => {
                const failure = failureOf(error);
                assert.strictEqual(failure.kind, FailureKind.Validation);
                assert.deepStrictEqual(failure.fieldErrors, {
                    name: ['Name cannot be empty.'],
                    slug: ['Slug may only contain lowercase letters, digits and single hyphens.']
                });
                return true;
            });

            assert.strictEqual(store.sessions.length, 0);
            assert.strictEqual(unit.state, 'Idle');
            assert.strictEqual(service.lastOperationState, 'Failed');
        });

        it('should reject an absent request body', async () => {
            for (const request of [null, undefined, 'text', [CREATE_REQUEST]]) {
                await assert.rejects(service.createPattern(request), (error: unknown) => {
                    const failure = failureOf(error);
                    assert.strictEqual(failure.kind, FailureKind.DomainRule);
                    assert.strictEqual(failure.messageKey, MessageKey.RequestCannotBeNull);
                    assert.strictEqual(failure.httpStatus, 400);
                    assert.strictEqual(failure.errorCode, 'BAD_REQUEST');
                    return true;
                });
            }
        });

        it('should fail with NotFound when the category does not exist', async () => {
            await assert.rejects(service.createPattern({ ...CREATE_REQUEST, categoryId: MISSING_ID }), (error: unknown) => {
                const failure = failureOf(error);
                assert.strictEqual(failure.kind, FailureKind.NotFound);
                assert.strictEqual(failure.humanMessage, `Category with key '${MISSING_ID}' does not exist.`);
                return true;
            });

            assert.strictEqual(store.sessions.length, 0);
            assert.strictEqual(store.patterns.size, 0);
        });

        it('should refuse a slug that is already taken', async () => {
            store.patterns.set(samplePattern().id, samplePattern());

            await assert.rejects(service.createPattern({ ...CREATE_REQUEST, slug: 'builder' }), (error: unknown) => {
                const failure = failureOf(error);
                assert.strictEqual(failure.kind, FailureKind.DomainRule);
                assert.strictEqual(failure.httpStatus, 409);
                assert.strictEqual(failure.errorCode, 'PATTERN_SLUG_TAKEN');
                assert.strictEqual(failure.humanMessage, "Pattern slug 'builder' is already in use.");
                return true;
            });
            assert.strictEqual(store.patterns.size, 1);
        });

        it('should roll back and persist nothing when saving fails', async () => {
            store.failOn('write', new Error('disk full'));

            await assert.rejects(service.createPattern(CREATE_REQUEST), (error: unknown) => {
                const failure = failureOf(error);
                assert.strictEqual(failure.kind, FailureKind.Infrastructure);
                assert.strictEqual(failure.httpStatus, 500);
                assert.strictEqual(failure.context, 'UnitOfWork:SaveChanges:patterns.insert');
                return true;
            });

            assert.strictEqual(unit.state, 'RolledBack');
            assert.strictEqual(service.lastOperationState, 'Failed');
            assert.strictEqual(store.patterns.size, 0);
            assert.deepStrictEqual(store.sessions[0].calls, ['begin', 'rollback', 'release']);
        });

        it('should leave nothing durable when commit fails', async () => {
            store.failOn('commit');

            await assert.rejects(service.createPattern(CREATE_REQUEST), (error: unknown) => {
                assert.strictEqual(failureOf(error).context, 'UnitOfWork:Commit');
                return true;
            });
            assert.strictEqual(unit.state, 'RolledBack');
            assert.strictEqual(store.patterns.size, 0);
        });

        it('should re-raise the original failure when rollback also fails', async () => {
            store.failOn('write').failOn('rollback');

            await assert.rejects(service.createPattern(CREATE_REQUEST), (error: unknown) => {
                assert.strictEqual(failureOf(error).context, 'UnitOfWork:SaveChanges:patterns.insert');
                return true;
            });
            assert.strictEqual(unit.state, 'RolledBack');
            assert.ok(lines.some(line => line.level === 50 && line.msg === 'Rollback failed; original failure is re-raised'));
        });

        it('should wrap unexpected lookup errors once with the operation label', async () => {
            const cause = new Error('connection reset');
            store.failOn('read', cause);

            await assert.rejects(service.createPattern(CREATE_REQUEST), (error: unknown) => {
                const failure = failureOf(error);
                assert.strictEqual(failure.kind, FailureKind.Infrastructure);
                assert.strictEqual(failure.context, 'PatternService:CreatePattern');
                assert.strictEqual(failure.cause, cause);
                return true;
            });
        });

        it('should roll back and surface the abort reason when cancelled mid-flight', async () => {
            const controller = new AbortController();
            const reason = new Error('client went away');
            store.beforeWrite = () => controller.abort(reason);

            await assert.rejects(service.createPattern(CREATE_REQUEST, controller.signal), (error: unknown) => {
                assert.strictEqual(error, reason);
                return true;
            });

            assert.strictEqual(unit.state, 'RolledBack');
            assert.strictEqual(service.lastOperationState, 'Failed');
            assert.strictEqual(store.patterns.size, 0);
        });

        it('should not open a transaction once already cancelled', async () => {
            const controller = new AbortController();
            const reason = new Error('cancelled');
            controller.abort(reason);

            await assert.rejects(service.createPattern(CREATE_REQUEST, controller.signal), (error: unknown) => {
                assert.strictEqual(error, reason);
                return true;
            });
            assert.strictEqual(store.sessions.length, 0);
        });
    });

    describe('updatePattern', () => {
        beforeEach(() => {
            store.patterns.set(samplePattern().id, samplePattern());
        });

        it('should apply the changes and keep the id from the path', async () => {
            const id = samplePattern().id;
            const view = await service.updatePattern(id, {
                id: MISSING_ID,
                name: 'Fluent Builder',
                slug: 'fluent-builder',
                categoryId: OTHER_CATEGORY_ID
            });

            assert.strictEqual(view.id, id);
            assert.strictEqual(view.categoryName, 'Structural');
            assert.deepStrictEqual(store.patterns.get(id), {
                id,
                name: 'Fluent Builder',
                slug: 'fluent-builder',
                summary: '',
                problem: '',
                solution: '',
                categoryId: OTHER_CATEGORY_ID
            });
            assert.strictEqual(store.patterns.has(MISSING_ID), false);
            assert.strictEqual(unit.state, 'Committed');
        });

        it('should allow keeping the same slug', async () => {
            const existing = samplePattern();
            const view = await service.updatePattern(existing.id, { ...existing, name: 'Builder (revised)' });

            assert.strictEqual(view.slug, 'builder');
            assert.strictEqual(store.patterns.get(existing.id)?.name, 'Builder (revised)');
        });

        it('should refuse a slug held by another pattern', async () => {
            store.patterns.set(NEW_ID, { ...samplePattern(), id: NEW_ID, slug: 'singleton' });

            await assert.rejects(
                service.updatePattern(samplePattern().id, { ...samplePattern(), slug: 'singleton' }),
                (error: unknown) => failureOf(error).errorCode === 'PATTERN_SLUG_TAKEN'
            );
            assert.strictEqual(store.patterns.get(samplePattern().id)?.slug, 'builder');
        });

        it('should fail with NotFound before opening a transaction', async () => {
            await assert.rejects(service.updatePattern(MISSING_ID, CREATE_REQUEST), (error: unknown) => {
                const failure = failureOf(error);
                assert.strictEqual(failure.kind, FailureKind.NotFound);
                assert.strictEqual(failure.humanMessage, `Pattern with key '${MISSING_ID}' does not exist.`);
                return true;
            });
            assert.strictEqual(store.sessions.length, 0);
        });

        it('should validate the path id', async () => {
            await assert.rejects(service.updatePattern('42', CREATE_REQUEST), (error: unknown) => {
                assert.deepStrictEqual(failureOf(error).fieldErrors, { id: ['Id must be a valid UUID.'] });
                return true;
            });
        });

        it('should reject an absent request body', async () => {
            await assert.rejects(
                service.updatePattern(samplePattern().id, null),
                (error: unknown) => failureOf(error).messageKey === MessageKey.RequestCannotBeNull
            );
        });
    });

    describe('deletePattern', () => {
        it('should remove the pattern and return its id', async () => {
            store.patterns.set(samplePattern().id, samplePattern());

            const result = await service.deletePattern(samplePattern().id);

            assert.deepStrictEqual(result, { id: samplePattern().id });
            assert.strictEqual(store.patterns.size, 0);
            assert.strictEqual(unit.state, 'Committed');
        });

        it('should roll back with NotFound when the pattern disappears before the delete', async () => {
            store.patterns.set(samplePattern().id, samplePattern());
            mock.method(unit.patterns, 'findById', async (id: string) => {
                const found = store.patterns.get(id) ?? null;
                store.patterns.delete(id);
                return found;
            });

            await assert.rejects(service.deletePattern(samplePattern().id), (error: unknown) => {
                const failure = failureOf(error);
                assert.strictEqual(failure.kind, FailureKind.NotFound);
                assert.strictEqual(failure.humanMessage, `Pattern with key '${samplePattern().id}' does not exist.`);
                return true;
            });
            assert.strictEqual(unit.state, 'RolledBack');
            assert.deepStrictEqual(store.sessions[0].calls, ['begin', 'rollback', 'release']);
            assert.strictEqual(service.lastOperationState, 'Failed');
        });

        it('should fail with NotFound for an unknown id', async () => {
            await assert.rejects(
                service.deletePattern(MISSING_ID),
                (error: unknown) => failureOf(error).kind === FailureKind.NotFound
            );
            assert.strictEqual(store.sessions.length, 0);
        });
    });

    describe('getPatternBySlug', () => {
        it('should return the view without opening a transaction', async () => {
            store.patterns.set(samplePattern().id, samplePattern());

            const view = await service.getPatternBySlug('builder');

            assert.deepStrictEqual(view, { ...samplePattern(), categoryName: 'Creational' });
            assert.strictEqual(store.sessions.length, 0);
            assert.strictEqual(service.lastOperationState, 'Completed');
        });

        it('should fail with NotFound for an unknown slug', async () => {
            await assert.rejects(service.getPatternBySlug('missing'), (error: unknown) => {
                assert.strictEqual(failureOf(error).humanMessage, "Pattern with key 'missing' does not exist.");
                return true;
            });
        });

        it('should reject malformed slugs', async () => {
            await assert.rejects(
                service.getPatternBySlug('Not A Slug'),
                (error: unknown) => failureOf(error).kind === FailureKind.Validation
            );
        });
    });
});
