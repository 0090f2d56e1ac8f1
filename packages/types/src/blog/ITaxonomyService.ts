import type { ITaxonomyTerm, TaxonomyKind } from './ITaxonomyTerm.js';

/**
 * Tags and categories.
 */
export interface ITaxonomyService {
    /**
     * Terms of one kind by name.
     */
    listTerms(kind: TaxonomyKind): Promise<ITaxonomyTerm[]>;

    getTermBySlug(kind: TaxonomyKind, slug: string): Promise<ITaxonomyTerm | null>;

    /**
     * Terms by id, in the order given. Unknown ids are skipped.
     */
    getTermsByIds(kind: TaxonomyKind, ids: readonly number[]): Promise<ITaxonomyTerm[]>;

    /**
     * @throws {ValidationError} When the name has no sluggable characters
     * @throws {DuplicateKeyError} When a term with the same slug exists
     */
    createTerm(kind: TaxonomyKind, name: string, description?: string): Promise<ITaxonomyTerm>;

    /**
     * Ids of the named terms, creating the missing ones. Names that share a
     * slug resolve to one term; the result keeps first-seen order.
     */
    resolveNames(kind: TaxonomyKind, names: readonly string[]): Promise<number[]>;

    deleteTerm(kind: TaxonomyKind, id: number): Promise<boolean>;
}
