/**
 * Catalog Repositories
 *
 * add/update/delete only stage a change on the owning unit of work; nothing
 * reaches the database before saveChanges(). Finds read through the active
 * transaction when there is one so they see already flushed writes.
 * All queries use parameterized statements and explicit column lists.
 */

import { Failures } from '../errors/failure.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import type { PgSession, Queryable } from '../db/index.js';
import type { UnitOfWork } from '../db/unitOfWork.js';
import type { Category, Pattern } from './pattern.js';

export interface PatternRepository {
    add(pattern: Pattern): void;
    update(pattern: Pattern): void;
    delete(pattern: Pattern): void;
    /** Returns null if not found; does NOT throw. */
    findById(id: string): Promise<Pattern | null>;
    /** Returns null if not found; does NOT throw. */
    findBySlug(slug: string): Promise<Pattern | null>;
}

export interface CategoryRepository {
    findById(id: string): Promise<Category | null>;
}

type PatternRow = {
    id: string;
    name: string;
    slug: string;
    summary: string;
    problem: string;
    solution: string;
    category_id: string;
};

type CategoryRow = {
    id: string;
    name: string;
    slug: string;
};

const PATTERN_COLUMNS = 'id, name, slug, summary, problem, solution, category_id';

function readerFor(unit: UnitOfWork<PgSession>, pool: Queryable): Queryable {
    return unit.activeSession ?? pool;
}

export class PgPatternRepository implements PatternRepository {
    constructor(
        private readonly unit: UnitOfWork<PgSession>,
        private readonly pool: Queryable
    ) { }

    add(pattern: Pattern): void {
        this.unit.stage({
            label: 'patterns.insert',
            apply: async (session) => {
                await session.query(
                    `INSERT INTO patterns (${PATTERN_COLUMNS})
                     VALUES ($1, $2, $3, $4, $5, $6, $7)`,
                    [pattern.id, pattern.name, pattern.slug, pattern.summary, pattern.problem, pattern.solution, pattern.categoryId]
                );
            }
        });
    }

    update(pattern: Pattern): void {
        this.unit.stage({
            label: 'patterns.update',
            apply: async (session) => {
                const result = await session.query(
                    `UPDATE patterns
                     SET name = $2, slug = $3, summary = $4, problem = $5, solution = $6, category_id = $7
                     WHERE id = $1`,
                    [pattern.id, pattern.name, pattern.slug, pattern.summary, pattern.problem, pattern.solution, pattern.categoryId]
                );
                expectOneRow(result.rowCount, pattern.id);
            }
        });
    }

    delete(pattern: Pattern): void {
        this.unit.stage({
            label: 'patterns.delete',
            apply: async (session) => {
                const result = await session.query('DELETE FROM patterns WHERE id = $1', [pattern.id]);
                expectOneRow(result.rowCount, pattern.id);
            }
        });
    }

    async findById(id: string): Promise<Pattern | null> {
        return this.findOne('id', id, 'PatternRepository:FindById');
    }

    async findBySlug(slug: string): Promise<Pattern | null> {
        return this.findOne('slug', slug, 'PatternRepository:FindBySlug');
    }

    private async findOne(column: 'id' | 'slug', value: string, contextLabel: string): Promise<Pattern | null> {
        try {
            const result = await readerFor(this.unit, this.pool).query<PatternRow>(
                `SELECT ${PATTERN_COLUMNS}
                 FROM patterns
                 WHERE ${column} = $1
                 LIMIT 1`,
                [value]
            );
            const row = result.rows[0];
            return row ? mapRowToPattern(row) : null;
        } catch (error) {
            throw ErrorSanitizer.toFailure(error, contextLabel);
        }
    }
}

export class PgCategoryRepository implements CategoryRepository {
    constructor(
        private readonly unit: UnitOfWork<PgSession>,
        private readonly pool: Queryable
    ) { }

    async findById(id: string): Promise<Category | null> {
        try {
            const result = await readerFor(this.unit, this.pool).query<CategoryRow>(
                `SELECT id, name, slug
                 FROM categories
                 WHERE id = $1
                 LIMIT 1`,
                [id]
            );
            const row = result.rows[0];
            return row ? Object.freeze({ id: row.id, name: row.name, slug: row.slug }) : null;
        } catch (error) {
            throw ErrorSanitizer.toFailure(error, 'CategoryRepository:FindById');
        }
    }
}

/**
 * The row was read before the transaction began; a concurrent delete leaves
 * nothing to change.
 */
function expectOneRow(rowCount: number | null, id: string): void {
    if (rowCount !== 1) {
        throw Failures.notFound('Pattern', id);
    }
}

function mapRowToPattern(row: PatternRow): Pattern {
    return Object.freeze({
        id: row.id,
        name: row.name,
        slug: row.slug,
        summary: row.summary,
        problem: row.problem,
        solution: row.solution,
        categoryId: row.category_id
    });
}
