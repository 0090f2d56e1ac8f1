import type { IContentPage, IContentPagePatch, IContentPageSummary } from './IContentPage.js';

/**
 * Long-form pages with catalog defaults.
 */
export interface IContentPageService {
    /**
     * Stored page, else the unpersisted catalog default, else null. Never
     * writes.
     */
    getPage(slug: string): Promise<IContentPage | null>;

    /**
     * Stored page, else a new row seeded from the catalog or left blank.
     */
    getOrCreatePage(slug: string): Promise<IContentPage>;

    updatePage(slug: string, patch: IContentPagePatch): Promise<IContentPage>;

    /**
     * Catalog slugs first, in catalog order, then slugs that are only stored.
     */
    listPages(): Promise<IContentPageSummary[]>;
}
