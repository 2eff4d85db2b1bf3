import type { CreatePatternInput, UpdatePatternInput } from '../validation/schema.js';
import type { Category, Pattern, PatternView } from './pattern.js';

export function toNewPattern(input: CreatePatternInput, id: string): Pattern {
    return Object.freeze({
        id,
        name: input.name,
        slug: input.slug,
        summary: input.summary,
        problem: input.problem,
        solution: input.solution,
        categoryId: input.categoryId
    });
}

/**
 * The id always comes from the existing entity, never from the input.
 */
export function applyPatternUpdate(existing: Pattern, input: UpdatePatternInput): Pattern {
    return Object.freeze({
        id: existing.id,
        name: input.name,
        slug: input.slug,
        summary: input.summary,
        problem: input.problem,
        solution: input.solution,
        categoryId: input.categoryId
    });
}

export function toPatternView(pattern: Pattern, category: Category | null): PatternView {
    return {
        id: pattern.id,
        name: pattern.name,
        slug: pattern.slug,
        summary: pattern.summary,
        problem: pattern.problem,
        solution: pattern.solution,
        categoryId: pattern.categoryId,
        categoryName: category?.name ?? ''
    };
}
