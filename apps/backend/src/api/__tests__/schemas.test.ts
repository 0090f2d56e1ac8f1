/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { nameListSchema } from '../schemas.js';

describe('nameListSchema', () => {
    it('should split a comma-separated string', () => {
        expect(nameListSchema.parse('go, rust,')).toEqual(['go', 'rust']);
    });

    it('should trim array entries and drop blanks', () => {
        expect(nameListSchema.parse([' TypeScript ', '', 'Node'])).toEqual(['TypeScript', 'Node']);
    });

    it('should reject other types', () => {
        expect(nameListSchema.safeParse(42).success).toBe(false);
    });
});
