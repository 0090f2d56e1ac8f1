/**
 * Title and markdown body of a built-in default.
 */
export interface ICatalogEntry {
    title: string;
    content: string;
}

/**
 * Default title and content for one section.
 *
 * An absent `title` means "derive one from the key"; an empty string means
 * the section deliberately has no heading.
 */
export interface ICatalogSectionDefaults {
    title?: string;
    content: string;
}

/**
 * Catalog entry for one section of a page.
 */
export interface ICatalogSection extends ICatalogSectionDefaults {
    key: string;
}

/**
 * Default for a long-form page.
 */
export interface ICatalogPage extends ICatalogEntry {
    metaDescription: string;
}

/**
 * Default for a resume block, seeded in list order.
 */
export interface ICatalogResumeSection extends ICatalogEntry {
    key: string;
    sectionType: string;
    order: number;
}

/**
 * Setting default with an optional admin-facing description.
 */
export interface ICatalogSetting {
    value: string;
    description?: string;
}

/**
 * Raw catalog data as loaded from disk or built by a test.
 */
export interface IContentCatalogData {
    /**
     * Page -> sections in seeding order.
     */
    sections: Record<string, ICatalogSection[]>;
    pages: Record<string, ICatalogPage>;
    settings: Record<string, ICatalogSetting>;
    resume: ICatalogResumeSection[];
}

/**
 * Read-only built-in content used whenever the store has no record.
 *
 * Lookups never throw on unknown pages or keys: section misses return empty
 * content without a title and page misses return null.
 */
export interface IContentCatalog {
    /**
     * Sections defined for a page, in seeding order. Empty for unknown pages.
     */
    getSectionEntries(page: string): readonly ICatalogSection[];

    /**
     * Defaults for one section. A miss yields `{ content: '' }` with no title.
     */
    getSectionEntry(page: string, key: string): ICatalogSectionDefaults;

    getPageDefaults(slug: string): ICatalogPage | null;

    getPageSlugs(): string[];

    /**
     * Default value per setting key.
     */
    getSettingDefaults(): Record<string, string>;

    getSettingDescription(key: string): string;

    getResumeDefaults(): readonly ICatalogResumeSection[];
}
