import type { Request, Response } from 'express';
import type { ICommentService, IPostService } from '@portfolio/types';
import { parseIdParam } from '../../../api/params.js';
import { NotFoundError } from '../../../lib/errors.js';
import { createCommentSchema } from './blog.schemas.js';
import { serializeComment } from './serializers.js';

/**
 * Comment submission and moderation endpoints.
 */
export class CommentsController {
    constructor(
        private readonly commentService: ICommentService,
        private readonly postService: IPostService
    ) {}

    /**
     * POST /api/content/blog/posts/:slug/comments
     *
     * Request body: { author_name, author_email, content }. The comment is
     * held for moderation; drafts and unknown slugs are a 404.
     */
    async addComment(req: Request, res: Response): Promise<void> {
        const body = createCommentSchema.parse(req.body);
        const post = await this.postService.getPostBySlug(req.params.slug);
        if (!post || !post.published) {
            throw new NotFoundError('Post not found');
        }

        const comment = await this.commentService.addComment(post.id, {
            authorName: body.author_name,
            authorEmail: body.author_email,
            content: body.content
        });
        res.status(201).json({ success: true, id: comment.id, approved: comment.approved });
    }

    /**
     * GET /api/admin/comments
     *
     * Pending comments first, newest first within each group.
     */
    async listComments(_req: Request, res: Response): Promise<void> {
        const comments = await this.commentService.listAll();
        res.json({ comments: comments.map(serializeComment) });
    }

    /**
     * POST /api/admin/comments/:id/approve
     */
    async approveComment(req: Request, res: Response): Promise<void> {
        const comment = await this.commentService.approveComment(parseIdParam(req.params.id, 'Comment'));
        if (!comment) {
            throw new NotFoundError('Comment not found');
        }
        res.json(serializeComment(comment));
    }

    /**
     * DELETE /api/admin/comments/:id
     */
    async deleteComment(req: Request, res: Response): Promise<void> {
        const deleted = await this.commentService.deleteComment(parseIdParam(req.params.id, 'Comment'));
        if (!deleted) {
            throw new NotFoundError('Comment not found');
        }
        res.json({ success: true });
    }
}
