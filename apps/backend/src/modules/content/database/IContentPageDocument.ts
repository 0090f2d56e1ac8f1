import type { ObjectId } from 'mongodb';

/**
 * MongoDB document for a long-form page. Unique on `slug`.
 */
export interface IContentPageDocument {
    _id?: ObjectId;
    slug: string;
    title: string;
    content: string;
    metaDescription: string;
    updatedAt: Date;
}
