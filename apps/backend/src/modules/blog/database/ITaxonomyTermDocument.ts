import type { ObjectId } from 'mongodb';

/**
 * MongoDB document for a tag (collection `tags`) or a category (collection
 * `categories`). Unique on `id` and on `slug` within its collection.
 */
export interface ITaxonomyTermDocument {
    _id?: ObjectId;
    id: number;
    name: string;
    slug: string;
    description: string;
}
