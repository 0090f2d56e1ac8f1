import type { ITaxonomyTerm } from './ITaxonomyTerm.js';

/**
 * Blog post with its resolved tags and categories.
 */
export interface IPost {
    id: number;
    title: string;
    slug: string;

    /**
     * Markdown body.
     */
    content: string;

    /**
     * Excerpt written by the admin. `''` means one is generated from the
     * content when the post is listed.
     */
    excerpt: string;

    published: boolean;
    tags: ITaxonomyTerm[];
    categories: ITaxonomyTerm[];
    createdAt: Date;
    updatedAt: Date;
}

/**
 * Input for creating a post.
 *
 * Tags and categories are given by name and created on first use. An empty
 * or missing slug is derived from the title.
 */
export interface IPostInput {
    title: string;
    content: string;
    slug?: string;
    excerpt?: string;
    published?: boolean;
    tags?: string[];
    categories?: string[];
}

/**
 * Fields an admin edit may change. Omitted fields keep their stored value;
 * an empty slug is derived from the (new) title again.
 */
export type IPostPatch = Partial<IPostInput>;

/**
 * Criteria for a post listing. Every given criterion must hold.
 */
export interface IPostFilter {
    publishedOnly?: boolean;
    tagId?: number;
    categoryId?: number;

    /**
     * Calendar year of `createdAt`, in UTC.
     */
    year?: number;

    /**
     * Month 1-12 within `year`. Ignored without a year.
     */
    month?: number;

    limit?: number;
}

/**
 * Number of published posts in one calendar month.
 */
export interface IBlogArchive {
    year: number;
    month: number;

    /**
     * Short English month name, e.g. `Jan`.
     */
    monthName: string;

    count: number;
}
