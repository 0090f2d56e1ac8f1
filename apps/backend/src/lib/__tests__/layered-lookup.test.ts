/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { lookupLayered, mergeLayers } from '../layered-lookup.js';

describe('mergeLayers', () => {
    it('should let later layers win key by key', () => {
        expect(mergeLayers({ site_name: 'Default', site_tagline: 'T' }, { site_name: 'X' })).toEqual({
            site_name: 'X',
            site_tagline: 'T'
        });
    });

    it('should keep the key order of the first layer that introduced each key', () => {
        const merged = mergeLayers({ b: 1, a: 2 }, { c: 3, b: 4 });
        expect(Object.keys(merged)).toEqual(['b', 'a', 'c']);
    });

    it('should keep a __proto__ key as an ordinary entry', () => {
        const stored: Record<string, string> = Object.fromEntries([['__proto__', 'x']]);
        const merged = mergeLayers<string>({ site_name: 'Default' }, stored);

        expect(Object.keys(merged)).toEqual(['site_name', '__proto__']);
        expect(Object.getOwnPropertyDescriptor(merged, '__proto__')?.value).toBe('x');
        expect(Object.getPrototypeOf(merged)).toBe(Object.prototype);
    });

    it('should not modify its inputs', () => {
        const defaults = { a: 1 };
        mergeLayers(defaults, { a: 2 });
        expect(defaults).toEqual({ a: 1 });
    });
});

describe('lookupLayered', () => {
    it('should return the value from the highest layer defining the key', () => {
        expect(lookupLayered('a', { a: 1 }, { a: 2 }, { b: 3 })).toBe(2);
    });

    it('should return undefined when no layer defines the key', () => {
        expect(lookupLayered('z', { a: 1 })).toBeUndefined();
    });

    it('should ignore inherited properties', () => {
        expect(lookupLayered('toString', { a: 'x' })).toBeUndefined();
    });
});
