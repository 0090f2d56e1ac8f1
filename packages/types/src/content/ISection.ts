/**
 * An inline-editable content block on a public page.
 *
 * Identity is the (`page`, `sectionKey`) pair; the store guarantees at most
 * one section per pair. `id` is a numeric handle assigned on insert and used
 * by the delete endpoint.
 */
export interface ISection {
    id: number;
    page: string;
    sectionKey: string;
    title: string;

    /**
     * Markdown source. May be empty.
     */
    content: string;

    /**
     * Display position within the page, ascending. Seeded sections take their
     * catalog position.
     */
    order: number;

    visible: boolean;

    /**
     * Refreshed on every content mutation.
     */
    updatedAt: Date;
}

/**
 * Ordered mapping of section key to section, iteration order is display order.
 */
export type SectionMap = Map<string, ISection>;
