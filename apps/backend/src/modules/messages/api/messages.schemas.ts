import { z } from 'zod';

/**
 * POST /api/content/contact
 */
export const contactMessageSchema = z.object({
    name: z.string().trim().min(1).max(100),
    email: z.string().trim().email().max(200),
    message: z.string().trim().min(1).max(5000)
});
