/**
 * Reader comment on a post. Hidden until an admin approves it.
 */
export interface IComment {
    id: number;
    postId: number;
    authorName: string;
    authorEmail: string;
    content: string;
    approved: boolean;
    createdAt: Date;
}

export interface ICommentInput {
    authorName: string;
    authorEmail: string;
    content: string;
}
