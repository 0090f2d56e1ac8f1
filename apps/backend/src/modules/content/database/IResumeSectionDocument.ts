import type { ObjectId } from 'mongodb';

/**
 * MongoDB document for a resume block.
 *
 * `seedKey` is set only on rows seeded from the catalog; a sparse unique
 * index on it keeps concurrent seeding from duplicating defaults.
 */
export interface IResumeSectionDocument {
    _id?: ObjectId;
    id: number;
    sectionType: string;
    title: string;
    content: string;
    order: number;
    visible: boolean;
    updatedAt: Date;
    seedKey?: string;
}
