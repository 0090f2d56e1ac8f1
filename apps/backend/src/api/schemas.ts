import { z } from 'zod';

/**
 * Names as a JSON array or a comma-separated string, trimmed, blanks
 * dropped. `"go, rust,"` and `["go", " rust"]` both give `["go", "rust"]`.
 * Used for post tags and categories and for project tech stacks.
 */
export const nameListSchema = z
    .union([z.array(z.string().max(100)), z.string()])
    .transform(value => (Array.isArray(value) ? value : value.split(',')).map(name => name.trim()).filter(Boolean));
