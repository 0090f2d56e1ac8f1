/**
 * Kinds of label a post can carry.
 */
export type TaxonomyKind = 'tag' | 'category';

/**
 * Tag or category. Names and slugs are unique within a kind.
 */
export interface ITaxonomyTerm {
    id: number;
    kind: TaxonomyKind;
    name: string;
    slug: string;

    /**
     * Free text shown on category listings. Always `''` for tags.
     */
    description: string;
}
