/// <reference types="vitest" />

import { describe, it, expect, beforeEach } from 'vitest';
import { TaxonomyService, CATEGORIES_COLLECTION, TAGS_COLLECTION } from '../services/taxonomy.service.js';
import { DuplicateKeyError, ValidationError } from '../../../lib/errors.js';
import { createMockDatabaseService, type MockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';

describe('TaxonomyService', () => {
    let mockDb: MockDatabaseService;
    let service: TaxonomyService;

    beforeEach(async () => {
        mockDb = createMockDatabaseService();
        service = new TaxonomyService(mockDb, createMockLogger());
        await service.ensureIndexes();
    });

    describe('createTerm', () => {
        it('should store a trimmed name with its slug', async () => {
            const category = await service.createTerm('category', '  Web Dev ', 'Frontend and backend');

            expect(category).toEqual({
                id: 1,
                kind: 'category',
                name: 'Web Dev',
                slug: 'web-dev',
                description: 'Frontend and backend'
            });
        });

        it('should drop the description of tags', async () => {
            const tag = await service.createTerm('tag', 'Go', 'ignored');
            expect(tag.description).toBe('');
        });

        it('should keep tags and categories apart', async () => {
            await service.createTerm('tag', 'Go');
            await service.createTerm('category', 'Go');

            expect(mockDb.getCollectionData(TAGS_COLLECTION)).toHaveLength(1);
            expect(mockDb.getCollectionData(CATEGORIES_COLLECTION)).toHaveLength(1);
        });

        it('should reject a name whose slug is taken', async () => {
            await service.createTerm('tag', 'Node JS');

            await expect(service.createTerm('tag', 'node-js')).rejects.toThrow('A tag named "node-js" already exists');
            await expect(service.createTerm('tag', 'NODE js')).rejects.toBeInstanceOf(DuplicateKeyError);
        });

        it('should reject a name without slug characters', async () => {
            await expect(service.createTerm('category', '???')).rejects.toBeInstanceOf(ValidationError);
        });
    });

    describe('resolveNames', () => {
        it('should create missing terms and keep first-seen order without repeats', async () => {
            await service.createTerm('tag', 'Rust');

            const ids = await service.resolveNames('tag', ['Go', ' rust ', '', 'GO', 'Zig']);

            expect(ids).toEqual([2, 1, 3]);
            expect((await service.listTerms('tag')).map(term => term.name)).toEqual(['Go', 'Rust', 'Zig']);
        });

        it('should settle on the stored term when two callers create it at once', async () => {
            const [first, second] = await Promise.all([
                service.resolveNames('tag', ['Go']),
                service.resolveNames('tag', ['Go'])
            ]);

            expect(first).toEqual(second);
            expect(mockDb.getCollectionData(TAGS_COLLECTION)).toHaveLength(1);
        });
    });

    describe('getTermsByIds', () => {
        it('should follow the given order and skip unknown ids', async () => {
            await service.createTerm('tag', 'Go');
            await service.createTerm('tag', 'Rust');

            const terms = await service.getTermsByIds('tag', [2, 7, 1]);

            expect(terms.map(term => term.name)).toEqual(['Rust', 'Go']);
        });

        it('should not query for an empty id list', async () => {
            expect(await service.getTermsByIds('tag', [])).toEqual([]);
        });
    });

    describe('deleteTerm', () => {
        it('should report whether a term was removed', async () => {
            const tag = await service.createTerm('tag', 'Go');

            expect(await service.deleteTerm('tag', tag.id)).toBe(true);
            expect(await service.deleteTerm('tag', tag.id)).toBe(false);
            expect(await service.getTermBySlug('tag', 'go')).toBeNull();
        });
    });
});
