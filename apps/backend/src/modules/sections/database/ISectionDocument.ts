import type { ObjectId } from 'mongodb';

/**
 * MongoDB document for a page section.
 *
 * `id` is the public numeric handle from the `sections` counter; `_id` stays
 * internal and never leaves the service.
 */
export interface ISectionDocument {
    _id?: ObjectId;
    id: number;
    page: string;
    sectionKey: string;
    title: string;
    content: string;
    order: number;
    visible: boolean;
    updatedAt: Date;
}
