import { z } from 'zod';
import { nameListSchema } from '../../../api/schemas.js';

const postFields = {
    slug: z.string().max(200).optional(),
    excerpt: z.string().max(500).optional(),
    published: z.boolean().optional(),
    tags: nameListSchema.optional(),
    categories: nameListSchema.optional()
};

/**
 * POST /api/admin/posts
 */
export const createPostSchema = z.object({
    title: z.string().trim().min(1).max(200),
    content: z.string(),
    ...postFields
});

/**
 * PUT /api/admin/posts/:id
 */
export const updatePostSchema = z.object({
    title: z.string().trim().min(1).max(200).optional(),
    content: z.string().optional(),
    ...postFields
});

/**
 * GET /api/content/blog/posts query string.
 */
export const listPostsQuerySchema = z
    .object({
        tag: z.string().min(1).optional(),
        category: z.string().min(1).optional(),
        year: z.coerce.number().int().min(1970).max(9999).optional(),
        month: z.coerce.number().int().min(1).max(12).optional(),
        limit: z.coerce.number().int().min(1).max(100).optional()
    })
    .refine(query => query.month === undefined || query.year !== undefined, {
        message: 'A month filter needs a year',
        path: ['month']
    });

/**
 * POST /api/admin/tags and /api/admin/categories
 */
export const createTermSchema = z.object({
    name: z.string().trim().min(1).max(100),
    description: z.string().max(300).optional()
});

/**
 * POST /api/content/blog/posts/:slug/comments
 */
export const createCommentSchema = z.object({
    author_name: z.string().trim().min(1).max(100),
    author_email: z.string().trim().email().max(200),
    content: z.string().trim().min(1).max(5000)
});
