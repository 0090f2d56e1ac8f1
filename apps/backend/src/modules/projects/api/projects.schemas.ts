import { z } from 'zod';
import { nameListSchema } from '../../../api/schemas.js';

/**
 * An optional link: a URL, or blank/null for none.
 */
const linkSchema = z.union([z.literal(''), z.string().url().max(500)]).nullable().optional();

const projectFields = {
    slug: z.string().max(200).optional(),
    tech_stack: nameListSchema.optional(),
    metrics: z.string().max(1000).optional(),
    github_url: linkSchema,
    live_url: linkSchema,
    featured: z.boolean().optional(),
    order: z.number().int().optional()
};

/**
 * POST /api/admin/projects
 */
export const createProjectSchema = z.object({
    title: z.string().trim().min(1).max(200),
    short_description: z.string().max(300),
    description: z.string(),
    ...projectFields
});

/**
 * PUT /api/admin/projects/:id
 */
export const updateProjectSchema = z.object({
    title: z.string().trim().min(1).max(200).optional(),
    short_description: z.string().max(300).optional(),
    description: z.string().optional(),
    ...projectFields
});

/**
 * GET /api/content/projects query string.
 */
export const listProjectsQuerySchema = z.object({
    featured: z
        .enum(['true', 'false'])
        .optional()
        .transform(value => value === 'true'),
    limit: z.coerce.number().int().min(1).max(100).optional()
});
