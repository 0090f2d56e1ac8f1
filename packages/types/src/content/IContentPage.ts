/**
 * Long-form static page such as "about" or "now", identified by slug.
 */
export interface IContentPage {
    slug: string;
    title: string;
    content: string;
    metaDescription: string;

    /**
     * Null while the page exists only as a catalog default.
     */
    updatedAt: Date | null;
}

/**
 * Fields an admin edit may change. Omitted fields keep their stored value.
 */
export interface IContentPagePatch {
    title?: string;
    content?: string;
    metaDescription?: string;
}

/**
 * Row in the admin page listing.
 */
export interface IContentPageSummary {
    slug: string;
    title: string;

    /**
     * False when the page only exists as a catalog default.
     */
    stored: boolean;

    updatedAt: Date | null;
}
