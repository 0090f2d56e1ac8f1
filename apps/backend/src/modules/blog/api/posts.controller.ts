import type { Request, Response } from 'express';
import type { ICommentService, IMarkdownService, IPostFilter, IPostService, ITaxonomyService } from '@portfolio/types';
import { parseIdParam } from '../../../api/params.js';
import { NotFoundError } from '../../../lib/errors.js';
import { createPostSchema, listPostsQuerySchema, updatePostSchema } from './blog.schemas.js';
import { serializePost, serializePostSummary, serializePublicComment } from './serializers.js';

/**
 * Blog post endpoints.
 */
export class PostsController {
    constructor(
        private readonly postService: IPostService,
        private readonly taxonomyService: ITaxonomyService,
        private readonly commentService: ICommentService,
        private readonly markdown: IMarkdownService
    ) {}

    // ============================================================================
    // Public Endpoints
    // ============================================================================

    /**
     * GET /api/content/blog/posts
     *
     * Query: tag, category (slugs), year, month, limit. Published posts only,
     * newest first. An unknown tag or category slug is a 404.
     */
    async listPublishedPosts(req: Request, res: Response): Promise<void> {
        const query = listPostsQuerySchema.parse(req.query);
        const filter: IPostFilter = {
            publishedOnly: true,
            year: query.year,
            month: query.month,
            limit: query.limit
        };

        if (query.tag !== undefined) {
            const tag = await this.taxonomyService.getTermBySlug('tag', query.tag);
            if (!tag) {
                throw new NotFoundError('Tag not found');
            }
            filter.tagId = tag.id;
        }
        if (query.category !== undefined) {
            const category = await this.taxonomyService.getTermBySlug('category', query.category);
            if (!category) {
                throw new NotFoundError('Category not found');
            }
            filter.categoryId = category.id;
        }

        const posts = await this.postService.listPosts(filter);
        res.json({ posts: posts.map(post => serializePostSummary(post, this.markdown)) });
    }

    /**
     * GET /api/content/blog/archives
     */
    async getArchives(_req: Request, res: Response): Promise<void> {
        const archives = await this.postService.getArchives();
        res.json({
            archives: archives.map(archive => ({
                year: archive.year,
                month: archive.month,
                month_name: archive.monthName,
                count: archive.count
            }))
        });
    }

    /**
     * GET /api/content/blog/posts/:slug
     *
     * Rendered post with its approved comments. Drafts are a 404.
     */
    async getPublishedPost(req: Request, res: Response): Promise<void> {
        const post = await this.postService.getPostBySlug(req.params.slug);
        if (!post || !post.published) {
            throw new NotFoundError('Post not found');
        }

        const comments = await this.commentService.listApproved(post.id);
        res.json({
            ...serializePostSummary(post, this.markdown),
            html: await this.markdown.renderMarkdown(post.content),
            comments: comments.map(serializePublicComment)
        });
    }

    // ============================================================================
    // Admin Endpoints
    // ============================================================================

    /**
     * GET /api/admin/posts
     *
     * Drafts included, newest first.
     */
    async listPosts(_req: Request, res: Response): Promise<void> {
        const posts = await this.postService.listPosts();
        res.json({ posts: posts.map(post => serializePostSummary(post, this.markdown)) });
    }

    /**
     * GET /api/admin/posts/:id
     */
    async getPost(req: Request, res: Response): Promise<void> {
        const post = await this.postService.getPost(parseIdParam(req.params.id, 'Post'));
        if (!post) {
            throw new NotFoundError('Post not found');
        }
        res.json(serializePost(post));
    }

    /**
     * POST /api/admin/posts
     *
     * Request body: { title, content, slug?, excerpt?, published?, tags?, categories? }
     * where tags and categories are name arrays or comma-separated strings.
     */
    async createPost(req: Request, res: Response): Promise<void> {
        const body = createPostSchema.parse(req.body);
        const post = await this.postService.createPost(body);
        res.status(201).json(serializePost(post));
    }

    /**
     * PUT /api/admin/posts/:id
     */
    async updatePost(req: Request, res: Response): Promise<void> {
        const id = parseIdParam(req.params.id, 'Post');
        const body = updatePostSchema.parse(req.body);

        const post = await this.postService.updatePost(id, body);
        if (!post) {
            throw new NotFoundError('Post not found');
        }
        res.json(serializePost(post));
    }

    /**
     * DELETE /api/admin/posts/:id
     *
     * Removes the post's comments as well.
     */
    async deletePost(req: Request, res: Response): Promise<void> {
        const deleted = await this.postService.deletePost(parseIdParam(req.params.id, 'Post'));
        if (!deleted) {
            throw new NotFoundError('Post not found');
        }
        res.json({ success: true });
    }
}
