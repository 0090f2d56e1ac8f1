/// <reference types="vitest" />

import { describe, it, expect, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import { SectionsController } from '../api/sections.controller.js';
import { SectionService, SECTIONS_COLLECTION } from '../services/section.service.js';
import { DefaultContentCatalog } from '../../../services/catalog/default-content-catalog.js';
import { MarkdownService } from '../../../services/markdown/markdown.service.js';
import { DuplicateKeyError, NotFoundError, ValidationError } from '../../../lib/errors.js';
import { createMockDatabaseService, type MockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';
import { createMockRequest, createMockResponse } from '../../../tests/vitest/mocks/express.js';

const catalog = new DefaultContentCatalog({
    sections: {
        home: [
            { key: 'hero', title: 'Hello', content: 'Hero text' },
            { key: 'cta', title: '', content: '' }
        ]
    },
    pages: {},
    settings: {},
    resume: []
});

describe('SectionsController', () => {
    let mockDb: MockDatabaseService;
    let service: SectionService;
    let controller: SectionsController;

    beforeEach(async () => {
        mockDb = createMockDatabaseService();
        const markdown = new MarkdownService();
        service = new SectionService(mockDb, catalog, markdown, createMockLogger());
        await service.ensureIndexes();
        controller = new SectionsController(service, markdown);
    });

    // ============================================================================
    // Admin Endpoint Tests
    // ============================================================================

    describe('getSection', () => {
        it('should return the section with snake_case keys, creating it on first read', async () => {
            const req = createMockRequest({ params: { page: 'home', sectionKey: 'hero' } });
            const res = createMockResponse();

            await controller.getSection(req, res.res);

            expect(res.body()).toEqual({
                id: 1,
                page: 'home',
                section_key: 'hero',
                title: 'Hello',
                content: 'Hero text',
                visible: true,
                order: 0
            });
            expect(mockDb.getCollectionData(SECTIONS_COLLECTION)).toHaveLength(1);
        });
    });

    describe('updateSection', () => {
        it('should store the content and return rendered html', async () => {
            const req = createMockRequest({
                params: { page: 'home', sectionKey: 'hero' },
                body: { content: '**Bold**' }
            });
            const res = createMockResponse();

            await controller.updateSection(req, res.res);

            expect(res.body()).toEqual({ success: true, html: '<p><strong>Bold</strong></p>', section_key: 'hero' });
            expect((await service.getSection('home', 'hero'))?.title).toBe('Hello');
        });

        it('should update the title when given', async () => {
            const req = createMockRequest({
                params: { page: 'home', sectionKey: 'hero' },
                body: { content: 'Text', title: 'Welcome' }
            });

            await controller.updateSection(req, createMockResponse().res);

            expect((await service.getSection('home', 'hero'))?.title).toBe('Welcome');
        });

        it('should treat a missing content field as empty', async () => {
            const req = createMockRequest({ params: { page: 'home', sectionKey: 'hero' }, body: {} });
            const res = createMockResponse();

            await controller.updateSection(req, res.res);

            expect(res.body()).toEqual({ success: true, html: '', section_key: 'hero' });
        });

        it('should reject a non-string content field', async () => {
            const req = createMockRequest({ params: { page: 'home', sectionKey: 'hero' }, body: { content: 42 } });

            await expect(controller.updateSection(req, createMockResponse().res)).rejects.toBeInstanceOf(ZodError);
        });
    });

    describe('createSection', () => {
        it('should create a section ordered after seeded ones by default', async () => {
            const req = createMockRequest({
                body: { page: 'home', section_key: 'extra', title: 'Extra', content: 'Hi' }
            });
            const res = createMockResponse();

            await controller.createSection(req, res.res);

            expect(res.body()).toEqual({
                success: true,
                section: { id: 1, page: 'home', section_key: 'extra', title: 'Extra', html: '<p>Hi</p>' }
            });
            expect((await service.getSection('home', 'extra'))?.order).toBe(99);
        });

        it('should require page and section_key', async () => {
            const req = createMockRequest({ body: { page: 'home' } });

            await expect(controller.createSection(req, createMockResponse().res)).rejects.toThrow(
                new ValidationError('page and section_key are required')
            );
        });

        it('should reject a key that already exists on the page', async () => {
            await service.getOrCreateSection('home', 'hero');
            const req = createMockRequest({ body: { page: 'home', section_key: 'hero' } });

            await expect(controller.createSection(req, createMockResponse().res)).rejects.toBeInstanceOf(
                DuplicateKeyError
            );
        });
    });

    describe('deleteSection', () => {
        it('should delete an existing section', async () => {
            const section = await service.getOrCreateSection('home', 'hero');
            const req = createMockRequest({ params: { sectionId: String(section.id) } });
            const res = createMockResponse();

            await controller.deleteSection(req, res.res);

            expect(res.body()).toEqual({ success: true });
            expect(mockDb.getCollectionData(SECTIONS_COLLECTION)).toHaveLength(0);
        });

        it('should report an unknown id as not found', async () => {
            const req = createMockRequest({ params: { sectionId: '404' } });

            await expect(controller.deleteSection(req, createMockResponse().res)).rejects.toBeInstanceOf(NotFoundError);
        });

        it('should reject a non-numeric id', async () => {
            const req = createMockRequest({ params: { sectionId: 'abc' } });

            await expect(controller.deleteSection(req, createMockResponse().res)).rejects.toBeInstanceOf(
                ValidationError
            );
        });
    });

    describe('listSections', () => {
        it('should list stored sections without seeding', async () => {
            await service.createSection('home', 'extra', 'Extra', '', 99);
            const req = createMockRequest({ params: { page: 'home' } });
            const res = createMockResponse();

            await controller.listSections(req, res.res);

            expect(res.body()).toEqual({
                sections: [{ id: 1, section_key: 'extra', title: 'Extra', order: 99, visible: true }]
            });
            expect(mockDb.getCollectionData(SECTIONS_COLLECTION)).toHaveLength(1);
        });
    });

    describe('previewMarkdown', () => {
        it('should render the posted markdown', async () => {
            const req = createMockRequest({ body: { content: '# Title' } });
            const res = createMockResponse();

            await controller.previewMarkdown(req, res.res);

            expect(res.body()).toEqual({ html: '<h1 id="title">Title</h1>' });
        });
    });

    // ============================================================================
    // Public Endpoint Tests
    // ============================================================================

    describe('getPublicSections', () => {
        it('should seed and render every visible section in order', async () => {
            const req = createMockRequest({ params: { page: 'home' } });
            const res = createMockResponse();

            await controller.getPublicSections(req, res.res);

            expect(res.body()).toEqual({
                page: 'home',
                sections: [
                    { id: 1, section_key: 'hero', title: 'Hello', html: '<p>Hero text</p>', order: 0 },
                    { id: 2, section_key: 'cta', title: '', html: '', order: 1 }
                ]
            });
        });

        it('should leave out hidden sections', async () => {
            await service.initPageSections('home');
            await mockDb.updateOne(SECTIONS_COLLECTION, { sectionKey: 'cta' }, { $set: { visible: false } });
            const req = createMockRequest({ params: { page: 'home' } });
            const res = createMockResponse();

            await controller.getPublicSections(req, res.res);

            expect(res.body()).toEqual({
                page: 'home',
                sections: [{ id: 1, section_key: 'hero', title: 'Hello', html: '<p>Hero text</p>', order: 0 }]
            });
        });
    });
});
