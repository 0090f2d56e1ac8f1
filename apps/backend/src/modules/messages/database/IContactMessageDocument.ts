import type { ObjectId } from 'mongodb';

/**
 * MongoDB document for a contact form message. Unique on `id`.
 */
export interface IContactMessageDocument {
    _id?: ObjectId;
    id: number;
    name: string;
    email: string;
    message: string;
    read: boolean;
    createdAt: Date;
}
