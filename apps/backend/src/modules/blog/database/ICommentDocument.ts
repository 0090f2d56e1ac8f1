import type { ObjectId } from 'mongodb';

/**
 * MongoDB document for a reader comment.
 */
export interface ICommentDocument {
    _id?: ObjectId;
    id: number;
    postId: number;
    authorName: string;
    authorEmail: string;
    content: string;
    approved: boolean;
    createdAt: Date;
}
