import { z } from 'zod';

/**
 * PUT /api/section/:page/:sectionKey
 *
 * A null or absent title leaves the stored title unchanged.
 */
export const updateSectionSchema = z.object({
    content: z.string().default(''),
    title: z.string().nullish()
});

/**
 * POST /api/section
 *
 * `page` and `section_key` are checked by the controller so a missing pair
 * reports a single readable message.
 */
export const createSectionSchema = z.object({
    page: z.string().optional(),
    section_key: z.string().optional(),
    title: z.string().default(''),
    content: z.string().default(''),
    order: z.number().int().default(99)
});

/**
 * POST /api/markdown
 */
export const previewMarkdownSchema = z.object({
    content: z.string().default('')
});
