import { ValidationError } from './errors.js';

/**
 * Turn a storage key into a display title.
 *
 * Underscores become spaces and every run of letters, in any script, is title-cased, so
 * `what_i_do` reads "What I Do" and `looking_for` reads "Looking For".
 *
 * @param key - Snake-case section key or page slug
 * @returns Human-readable title
 */
export function humanize(key: string): string {
    return key
        .replace(/_/g, ' ')
        .replace(/\p{L}+/gu, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * URL slug from a title or term name.
 *
 * Accents are folded to their base letters, every other run of characters
 * outside `a-z0-9` becomes one dash, and leading or trailing dashes are
 * dropped. `Hello, Wörld!` becomes `hello-world`.
 *
 * @returns The slug, or `''` when nothing sluggable remains
 */
export function slugify(text: string): string {
    return text
        .normalize('NFKD')
        .replace(/\p{M}/gu, '')
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}

/**
 * Slug for a post or project: the explicit slug when it has any content,
 * otherwise one built from the title.
 *
 * @throws {ValidationError} When neither yields any slug characters
 */
export function resolveSlug(explicit: string | undefined, title: string): string {
    const slug = slugify(explicit?.trim() ? explicit : title);
    if (!slug) {
        throw new ValidationError('Cannot derive a slug from the title');
    }
    return slug;
}
