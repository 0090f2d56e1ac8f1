import type { IComment, ICommentInput } from './IComment.js';

/**
 * Moderated reader comments.
 */
export interface ICommentService {
    /**
     * Store a new, unapproved comment.
     */
    addComment(postId: number, input: ICommentInput): Promise<IComment>;

    /**
     * Approved comments of a post, oldest first.
     */
    listApproved(postId: number): Promise<IComment[]>;

    /**
     * Every comment for moderation: pending ones first, newest first within
     * each group.
     */
    listAll(): Promise<IComment[]>;

    /**
     * @returns The approved comment, or null for an unknown id
     */
    approveComment(id: number): Promise<IComment | null>;

    deleteComment(id: number): Promise<boolean>;

    deleteForPost(postId: number): Promise<number>;
}
