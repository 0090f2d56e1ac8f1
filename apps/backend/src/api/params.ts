import { ValidationError } from '../lib/errors.js';

/**
 * Numeric id from a route parameter.
 *
 * @param label - Entity name for the error, e.g. `Post`
 * @throws {ValidationError} When the parameter is not an integer
 */
export function parseIdParam(raw: string, label: string): number {
    const id = Number(raw);
    if (raw.trim() === '' || !Number.isSafeInteger(id)) {
        throw new ValidationError(`${label} id must be an integer`);
    }
    return id;
}
