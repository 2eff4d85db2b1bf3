/**
 * Catalog Model
 * A pattern belongs to exactly one category. Entities are immutable values;
 * an update produces a new Pattern.
 */

export interface Category {
    readonly id: string;
    readonly name: string;
    readonly slug: string;
}

export interface Pattern {
    readonly id: string;
    readonly name: string;
    readonly slug: string;
    readonly summary: string;
    readonly problem: string;
    readonly solution: string;
    readonly categoryId: string;
}

/**
 * Wire representation returned to callers.
 */
export interface PatternView {
    readonly id: string;
    readonly name: string;
    readonly slug: string;
    readonly summary: string;
    readonly problem: string;
    readonly solution: string;
    readonly categoryId: string;
    readonly categoryName: string;
}

export interface DeletedPattern {
    readonly id: string;
}
