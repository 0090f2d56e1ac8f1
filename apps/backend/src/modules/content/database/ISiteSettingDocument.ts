import type { ObjectId } from 'mongodb';

/**
 * MongoDB document for a stored site setting. Unique on `key`.
 */
export interface ISiteSettingDocument {
    _id?: ObjectId;
    key: string;
    value: string;
    description: string;
    updatedAt: Date;
}
