/// <reference types="vitest" />

import { describe, it, expect, beforeEach } from 'vitest';
import { ContentPageService, PAGES_COLLECTION } from '../services/content-page.service.js';
import { createMockDatabaseService, type MockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';
import { createTestCatalog } from './fixtures.js';

describe('ContentPageService', () => {
    let mockDb: MockDatabaseService;
    let service: ContentPageService;

    beforeEach(async () => {
        mockDb = createMockDatabaseService();
        service = new ContentPageService(mockDb, createTestCatalog(), createMockLogger());
        await service.ensureIndexes();
    });

    describe('getPage', () => {
        it('should serve the catalog default without storing it', async () => {
            const page = await service.getPage('about');

            expect(page).toEqual({
                slug: 'about',
                title: 'About Me',
                content: '# About\n\nHello there',
                metaDescription: 'About page',
                updatedAt: null
            });
            expect(mockDb.getCollectionData(PAGES_COLLECTION)).toHaveLength(0);
        });

        it('should return null for an unknown slug', async () => {
            expect(await service.getPage('uses')).toBeNull();
        });

        it('should prefer the stored page', async () => {
            await service.updatePage('about', { title: 'About' });

            expect((await service.getPage('about'))?.title).toBe('About');
        });
    });

    describe('getOrCreatePage', () => {
        it('should store a page seeded from the catalog', async () => {
            const page = await service.getOrCreatePage('about');

            expect(page.title).toBe('About Me');
            expect(page.updatedAt).toBeInstanceOf(Date);
            expect(mockDb.getCollectionData(PAGES_COLLECTION)).toHaveLength(1);
        });

        it('should store a blank page with a derived title for unknown slugs', async () => {
            const page = await service.getOrCreatePage('side_projects');

            expect(page).toMatchObject({ slug: 'side_projects', title: 'Side Projects', content: '', metaDescription: '' });
        });

        it('should leave one row when two callers race', async () => {
            await Promise.all([service.getOrCreatePage('about'), service.getOrCreatePage('about')]);

            expect(mockDb.getCollectionData(PAGES_COLLECTION)).toHaveLength(1);
        });
    });

    describe('updatePage', () => {
        it('should change only the given fields', async () => {
            const page = await service.updatePage('about', { content: 'New body' });

            expect(page).toMatchObject({
                slug: 'about',
                title: 'About Me',
                content: 'New body',
                metaDescription: 'About page'
            });
        });

        it('should update the meta description', async () => {
            const page = await service.updatePage('about', { metaDescription: 'Who I am' });
            expect(page.metaDescription).toBe('Who I am');
        });
    });

    describe('listPages', () => {
        it('should list catalog pages as unstored', async () => {
            expect(await service.listPages()).toEqual([
                { slug: 'about', title: 'About Me', stored: false, updatedAt: null }
            ]);
        });

        it('should layer stored pages over catalog pages', async () => {
            await service.getOrCreatePage('uses');
            await service.updatePage('about', { title: 'About' });

            const pages = await service.listPages();

            expect(pages.map(page => [page.slug, page.title, page.stored])).toEqual([
                ['about', 'About', true],
                ['uses', 'Uses', true]
            ]);
            expect(pages[0].updatedAt).toBeInstanceOf(Date);
        });
    });
});
