import { Router } from 'express';
import type { RequestHandler } from 'express';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import type { CommentsController } from './comments.controller.js';
import type { PostsController } from './posts.controller.js';
import type { TaxonomyController } from './taxonomy.controller.js';

export interface IBlogControllers {
    posts: PostsController;
    taxonomy: TaxonomyController;
    comments: CommentsController;
}

/**
 * Create the public blog router. Mounted at /api/content.
 *
 * @param controllers - Blog controller instances
 * @returns Express router with the reader endpoints registered
 */
export function createPublicBlogRouter(controllers: IBlogControllers): Router {
    const router = Router();
    const { posts, taxonomy, comments } = controllers;

    router.get('/blog/posts', asyncHandler(posts.listPublishedPosts.bind(posts)));
    router.get('/blog/posts/:slug', asyncHandler(posts.getPublishedPost.bind(posts)));
    router.post('/blog/posts/:slug/comments', asyncHandler(comments.addComment.bind(comments)));
    router.get('/blog/archives', asyncHandler(posts.getArchives.bind(posts)));
    router.get('/blog/taxonomy', asyncHandler(taxonomy.getTaxonomy.bind(taxonomy)));

    return router;
}

/**
 * Create the blog admin router. Mounted at /api/admin behind the admin
 * guard.
 *
 * @param controllers - Blog controller instances
 * @param requireAdmin - Admin authentication middleware
 * @returns Express router with post, taxonomy and comment management endpoints
 */
export function createBlogAdminRouter(controllers: IBlogControllers, requireAdmin: RequestHandler): Router {
    const router = Router();
    const { posts, taxonomy, comments } = controllers;

    router.use(['/posts', '/tags', '/categories', '/comments'], requireAdmin);

    // ============================================================================
    // Post Routes
    // ============================================================================

    router.get('/posts', asyncHandler(posts.listPosts.bind(posts)));
    router.post('/posts', asyncHandler(posts.createPost.bind(posts)));
    router.get('/posts/:id', asyncHandler(posts.getPost.bind(posts)));
    router.put('/posts/:id', asyncHandler(posts.updatePost.bind(posts)));
    router.delete('/posts/:id', asyncHandler(posts.deletePost.bind(posts)));

    // ============================================================================
    // Taxonomy Routes
    // ============================================================================

    router.get('/tags', asyncHandler(taxonomy.listTerms.bind(taxonomy, 'tag')));
    router.post('/tags', asyncHandler(taxonomy.createTerm.bind(taxonomy, 'tag')));
    router.delete('/tags/:id', asyncHandler(taxonomy.deleteTerm.bind(taxonomy, 'tag')));

    router.get('/categories', asyncHandler(taxonomy.listTerms.bind(taxonomy, 'category')));
    router.post('/categories', asyncHandler(taxonomy.createTerm.bind(taxonomy, 'category')));
    router.delete('/categories/:id', asyncHandler(taxonomy.deleteTerm.bind(taxonomy, 'category')));

    // ============================================================================
    // Comment Moderation Routes
    // ============================================================================

    router.get('/comments', asyncHandler(comments.listComments.bind(comments)));
    router.post('/comments/:id/approve', asyncHandler(comments.approveComment.bind(comments)));
    router.delete('/comments/:id', asyncHandler(comments.deleteComment.bind(comments)));

    return router;
}
