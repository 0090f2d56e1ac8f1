import type { IComment, ICommentInput, ICommentService, IDatabaseService, ILogger } from '@portfolio/types';
import { escalateDuplicate } from '../../../lib/errors.js';
import type { ICommentDocument } from '../database/index.js';

export const COMMENTS_COLLECTION = 'comments';

const COMMENT_SEQUENCE = 'comments';

function toComment(doc: ICommentDocument): IComment {
    return {
        id: doc.id,
        postId: doc.postId,
        authorName: doc.authorName,
        authorEmail: doc.authorEmail,
        content: doc.content,
        approved: doc.approved,
        createdAt: doc.createdAt
    };
}

/**
 * Reader comments. New comments wait for approval before they are shown.
 */
export class CommentService implements ICommentService {
    private readonly logger: ILogger;

    constructor(
        private readonly database: IDatabaseService,
        logger: ILogger
    ) {
        this.logger = logger.child({ service: 'comment-service' });
    }

    async ensureIndexes(): Promise<void> {
        await this.database.createIndex(COMMENTS_COLLECTION, { id: 1 }, { unique: true, name: 'id_unique' });
        await this.database.createIndex(COMMENTS_COLLECTION, { postId: 1, approved: 1 }, { name: 'post_approved' });
    }

    async addComment(postId: number, input: ICommentInput): Promise<IComment> {
        const doc: ICommentDocument = {
            id: await this.database.nextSequence(COMMENT_SEQUENCE),
            postId,
            authorName: input.authorName,
            authorEmail: input.authorEmail,
            content: input.content,
            approved: false,
            createdAt: new Date()
        };

        try {
            await this.database.insertOne(COMMENTS_COLLECTION, doc);
        } catch (error) {
            throw escalateDuplicate(error);
        }

        this.logger.info({ id: doc.id, postId }, 'Comment awaiting approval');
        return toComment(doc);
    }

    async listApproved(postId: number): Promise<IComment[]> {
        const docs = await this.database.find<ICommentDocument>(
            COMMENTS_COLLECTION,
            { postId, approved: true },
            { sort: { createdAt: 1, id: 1 } }
        );
        return docs.map(toComment);
    }

    async listAll(): Promise<IComment[]> {
        const docs = await this.database.find<ICommentDocument>(
            COMMENTS_COLLECTION,
            {},
            { sort: { approved: 1, createdAt: -1, id: -1 } }
        );
        return docs.map(toComment);
    }

    async approveComment(id: number): Promise<IComment | null> {
        const result = await this.database.updateOne<ICommentDocument>(COMMENTS_COLLECTION, { id }, {
            $set: { approved: true }
        });
        if (result.matchedCount === 0) {
            return null;
        }

        this.logger.info({ id }, 'Approved comment');
        const doc = await this.database.findOne<ICommentDocument>(COMMENTS_COLLECTION, { id });
        return doc ? toComment(doc) : null;
    }

    async deleteComment(id: number): Promise<boolean> {
        const deleted = await this.database.deleteOne<ICommentDocument>(COMMENTS_COLLECTION, { id });
        if (deleted) {
            this.logger.info({ id }, 'Deleted comment');
        }
        return deleted;
    }

    async deleteForPost(postId: number): Promise<number> {
        return this.database.deleteMany<ICommentDocument>(COMMENTS_COLLECTION, { postId });
    }
}
