import type { ObjectId } from 'mongodb';

/**
 * MongoDB document for a blog post. Unique on `id` and on `slug`.
 *
 * Tags and categories are referenced by id. Ids of deleted terms are left
 * in place and skipped when the post is read.
 */
export interface IPostDocument {
    _id?: ObjectId;
    id: number;
    title: string;
    slug: string;
    content: string;
    excerpt: string;
    published: boolean;
    tagIds: number[];
    categoryIds: number[];
    createdAt: Date;
    updatedAt: Date;
}
