/**
 * Layered key/value resolution.
 *
 * Content defaults ship with the application and stored records override
 * them key by key. Settings and the page listing both resolve through these
 * helpers so the precedence rule lives in one place: later layers win.
 */

/**
 * Merge layers into one record, later layers overriding earlier ones.
 *
 * Keys from every layer are present in the result. Insertion order follows
 * the first layer that introduced each key.
 *
 * @param layers - Records from lowest to highest precedence
 * @returns A new record; inputs are not modified
 *
 * @example
 * mergeLayers({ site_name: 'Default', site_tagline: 'T' }, { site_name: 'X' });
 * // { site_name: 'X', site_tagline: 'T' }
 */
export function mergeLayers<V>(...layers: ReadonlyArray<Readonly<Record<string, V>>>): Record<string, V> {
    // Plain assignment would send a `__proto__` key to the prototype setter
    const merged = new Map<string, V>();
    for (const layer of layers) {
        for (const [key, value] of Object.entries(layer)) {
            merged.set(key, value);
        }
    }
    return Object.fromEntries(merged);
}

/**
 * Resolve a single key against layers, highest precedence first wins.
 *
 * @param key - Key to resolve
 * @param layers - Records from lowest to highest precedence
 * @returns The value from the last layer that defines `key`, or undefined
 */
export function lookupLayered<V>(key: string, ...layers: ReadonlyArray<Readonly<Record<string, V>>>): V | undefined {
    for (let i = layers.length - 1; i >= 0; i--) {
        const layer = layers[i];
        if (Object.prototype.hasOwnProperty.call(layer, key)) {
            return layer[key];
        }
    }
    return undefined;
}
