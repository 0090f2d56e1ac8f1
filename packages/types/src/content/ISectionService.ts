import type { ISection, SectionMap } from './ISection.js';

/**
 * Lifecycle of inline-editable page sections.
 *
 * Reads come in two flavors: `getSection` and `getPageSections` never write,
 * while `getOrCreateSection` and `getSectionsForPage` seed missing rows from
 * the content catalog before returning.
 */
export interface ISectionService {
    getSection(page: string, sectionKey: string): Promise<ISection | null>;

    /**
     * Return the stored section, creating it from catalog defaults if absent.
     * Concurrent callers for one pair end up with a single row.
     */
    getOrCreateSection(page: string, sectionKey: string): Promise<ISection>;

    /**
     * Stored sections of a page by `order`, then `id`. Never writes.
     */
    getPageSections(page: string): Promise<SectionMap>;

    /**
     * Stored sections plus every catalog section of the page, seeding what
     * is missing.
     */
    getSectionsForPage(page: string): Promise<SectionMap>;

    /**
     * Bulk-seed catalog sections of a page that are not stored yet.
     *
     * @returns Catalog sections of the page in catalog order
     */
    initPageSections(page: string): Promise<SectionMap>;

    updateSection(page: string, sectionKey: string, content: string, title?: string | null): Promise<ISection>;

    /**
     * @throws {DuplicateKeyError} When the pair already exists
     */
    createSection(page: string, sectionKey: string, title: string, content: string, order?: number): Promise<ISection>;

    deleteSection(id: number): Promise<boolean>;

    /**
     * Rendered HTML of the section content, `''` for a missing section or
     * empty content.
     */
    renderSection(section: ISection | null | undefined): Promise<string>;
}
