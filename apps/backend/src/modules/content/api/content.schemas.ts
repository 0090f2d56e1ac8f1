import { z } from 'zod';

const settingKey = z.string().regex(/^[a-z0-9_]{1,100}$/, 'Setting keys are lowercase letters, digits and underscores');

/**
 * PUT /api/admin/settings
 *
 * Either a batch `{ settings }` or a single `{ key, value, description? }`.
 */
export const updateSettingsSchema = z.union([
    z.object({ settings: z.record(settingKey, z.string()) }),
    z.object({ key: settingKey, value: z.string(), description: z.string().optional() })
]);

/**
 * PUT /api/admin/pages/:slug
 */
export const updatePageSchema = z.object({
    title: z.string().optional(),
    content: z.string().optional(),
    meta_description: z.string().optional()
});

const resumeFields = {
    title: z.string().optional(),
    content: z.string().optional(),
    order: z.number().int().optional(),
    visible: z.boolean().optional()
};

/**
 * POST /api/admin/resume
 */
export const createResumeSectionSchema = z.object({
    section_type: z.string().min(1),
    ...resumeFields
});

/**
 * PUT /api/admin/resume/:id
 */
export const updateResumeSectionSchema = z.object({
    section_type: z.string().min(1).optional(),
    ...resumeFields
});
