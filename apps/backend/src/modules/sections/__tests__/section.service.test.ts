/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SectionService, SECTIONS_COLLECTION } from '../services/section.service.js';
import { DefaultContentCatalog } from '../../../services/catalog/default-content-catalog.js';
import { MarkdownService } from '../../../services/markdown/markdown.service.js';
import { DuplicateKeyError } from '../../../lib/errors.js';
import { createMockDatabaseService, type MockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';

const catalog = new DefaultContentCatalog({
    sections: {
        home: [
            { key: 'hero', title: 'Hello', content: 'Hero text' },
            { key: 'what_i_do', content: 'Things I do' },
            { key: 'cta', title: '', content: 'Get in touch' }
        ]
    },
    pages: {},
    settings: {},
    resume: []
});

describe('SectionService', () => {
    let mockDb: MockDatabaseService;
    let service: SectionService;

    beforeEach(async () => {
        mockDb = createMockDatabaseService();
        service = new SectionService(mockDb, catalog, new MarkdownService(), createMockLogger());
        await service.ensureIndexes();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    describe('ensureIndexes', () => {
        it('should declare unique indexes on the pair and on id', () => {
            expect(mockDb.getIndexes(SECTIONS_COLLECTION)).toEqual([
                { name: 'page_section_key_unique', keys: { page: 1, sectionKey: 1 }, unique: true, sparse: false },
                { name: 'id_unique', keys: { id: 1 }, unique: true, sparse: false }
            ]);
        });
    });

    // ============================================================================
    // getOrCreateSection
    // ============================================================================

    describe('getOrCreateSection', () => {
        it('should seed a missing section from the catalog', async () => {
            const section = await service.getOrCreateSection('home', 'hero');

            expect(section).toMatchObject({
                id: 1,
                page: 'home',
                sectionKey: 'hero',
                title: 'Hello',
                content: 'Hero text',
                order: 0,
                visible: true
            });
            expect(mockDb.getCollectionData(SECTIONS_COLLECTION)).toHaveLength(1);
        });

        it('should derive a title from the key when the catalog entry has none', async () => {
            const section = await service.getOrCreateSection('home', 'what_i_do');
            expect(section.title).toBe('What I Do');
        });

        it('should keep an explicitly empty catalog title', async () => {
            const section = await service.getOrCreateSection('home', 'cta');
            expect(section.title).toBe('');
        });

        it('should create unknown keys with a humanized title and empty content', async () => {
            const section = await service.getOrCreateSection('blog', 'side_note');

            expect(section.title).toBe('Side Note');
            expect(section.content).toBe('');
        });

        it('should return the stored row without writing again', async () => {
            const first = await service.getOrCreateSection('home', 'hero');
            const second = await service.getOrCreateSection('home', 'hero');

            expect(second).toEqual(first);
            expect(mockDb.getCollectionData(SECTIONS_COLLECTION)).toHaveLength(1);
        });

        it('should leave exactly one row when two callers race', async () => {
            const [a, b] = await Promise.all([
                service.getOrCreateSection('home', 'hero'),
                service.getOrCreateSection('home', 'hero')
            ]);

            const rows = mockDb.getCollectionData(SECTIONS_COLLECTION);
            expect(rows).toHaveLength(1);
            expect(a.id).toBe(rows[0].id);
            expect(b.id).toBe(rows[0].id);
            expect(a.sectionKey).toBe('hero');
            expect(b.sectionKey).toBe('hero');
        });

        it('should rethrow the duplicate error when the winning row cannot be read back', async () => {
            mockDb.injectError(
                SECTIONS_COLLECTION,
                'insertOne',
                new DuplicateKeyError('Duplicate key in sections', undefined, 'page_section_key_unique')
            );

            await expect(service.getOrCreateSection('home', 'hero')).rejects.toBeInstanceOf(DuplicateKeyError);
        });

        it('should fail as an internal error when the new id collides with another row', async () => {
            // A row written outside the sequence takes the id the counter hands out next
            await mockDb.insertOne(SECTIONS_COLLECTION, {
                id: 1,
                page: 'about',
                sectionKey: 'intro',
                title: 'Intro',
                content: '',
                order: 0,
                visible: true,
                updatedAt: new Date()
            });

            const result = service.getOrCreateSection('home', 'hero');

            await expect(result).rejects.toThrow('Unexpected duplicate key on index id_unique');
            await expect(result).rejects.not.toBeInstanceOf(DuplicateKeyError);
            expect(await service.getSection('home', 'hero')).toBeNull();
        });

        it('should propagate other insert errors', async () => {
            mockDb.injectError(SECTIONS_COLLECTION, 'insertOne', new Error('connection reset'));

            await expect(service.getOrCreateSection('home', 'hero')).rejects.toThrow('connection reset');
        });
    });

    // ============================================================================
    // Reads
    // ============================================================================

    describe('getSection', () => {
        it('should return null without creating anything', async () => {
            expect(await service.getSection('home', 'hero')).toBeNull();
            expect(mockDb.getCollectionData(SECTIONS_COLLECTION)).toHaveLength(0);
        });
    });

    describe('getPageSections', () => {
        it('should never create rows', async () => {
            const sections = await service.getPageSections('home');

            expect(sections.size).toBe(0);
            expect(mockDb.getCollectionData(SECTIONS_COLLECTION)).toHaveLength(0);
        });

        it('should order by order then id', async () => {
            await service.createSection('home', 'late', 'Late', '', 5);
            await service.createSection('home', 'first', 'First', '', 1);
            await service.createSection('home', 'tie', 'Tie', '', 5);
            await service.createSection('about', 'elsewhere', 'Elsewhere', '', 0);

            const sections = await service.getPageSections('home');

            expect([...sections.keys()]).toEqual(['first', 'late', 'tie']);
        });

        it('should return the same result on repeated reads', async () => {
            await service.initPageSections('home');

            const first = await service.getPageSections('home');
            const second = await service.getPageSections('home');

            expect([...second.entries()]).toEqual([...first.entries()]);
        });
    });

    describe('getSectionsForPage', () => {
        it('should seed every catalog section on an empty store', async () => {
            const sections = await service.getSectionsForPage('home');

            expect([...sections.keys()]).toEqual(['hero', 'what_i_do', 'cta']);
            expect([...sections.values()].map(section => section.order)).toEqual([0, 1, 2]);
            expect(sections.get('cta')?.content).toBe('Get in touch');
            expect(mockDb.getCollectionData(SECTIONS_COLLECTION)).toHaveLength(3);
        });

        it('should fill in catalog sections missing from a partly stored page', async () => {
            await service.createSection('home', 'cta', 'Contact', 'Custom', 2);

            const sections = await service.getSectionsForPage('home');

            expect([...sections.keys()]).toEqual(['hero', 'what_i_do', 'cta']);
            expect(sections.get('cta')?.content).toBe('Custom');
        });

        it('should include stored sections the catalog does not know', async () => {
            await service.createSection('home', 'extra', 'Extra', 'More', 99);

            const sections = await service.getSectionsForPage('home');

            expect([...sections.keys()]).toEqual(['hero', 'what_i_do', 'cta', 'extra']);
        });

        it('should not write when every catalog section exists', async () => {
            await service.initPageSections('home');
            const spy = vi.spyOn(mockDb, 'insertOne');

            await service.getSectionsForPage('home');

            expect(spy).not.toHaveBeenCalled();
        });

        it('should match the built-in catalog for the home page', async () => {
            const builtIn = await DefaultContentCatalog.load();
            const builtInService = new SectionService(mockDb, builtIn, new MarkdownService(), createMockLogger());

            const sections = await builtInService.getSectionsForPage('home');

            expect([...sections.keys()]).toEqual(['hero', 'what_i_do', 'cta']);
            for (const [key, section] of sections) {
                expect(section.content).toBe(builtIn.getSectionEntry('home', key).content);
            }
        });
    });

    // ============================================================================
    // initPageSections
    // ============================================================================

    describe('initPageSections', () => {
        it('should seed catalog sections with their catalog position as order', async () => {
            const sections = await service.initPageSections('home');

            expect([...sections.values()].map(section => [section.sectionKey, section.order, section.title])).toEqual([
                ['hero', 0, 'Hello'],
                ['what_i_do', 1, 'What I Do'],
                ['cta', 2, '']
            ]);
        });

        it('should be idempotent', async () => {
            const first = await service.initPageSections('home');
            const second = await service.initPageSections('home');

            expect(mockDb.getCollectionData(SECTIONS_COLLECTION)).toHaveLength(3);
            expect([...second.entries()]).toEqual([...first.entries()]);
        });

        it('should keep sections that already exist', async () => {
            await service.updateSection('home', 'what_i_do', 'Edited');

            const sections = await service.initPageSections('home');

            expect(sections.get('what_i_do')?.content).toBe('Edited');
            expect(mockDb.getCollectionData(SECTIONS_COLLECTION)).toHaveLength(3);
        });

        it('should return only catalog keys', async () => {
            await service.createSection('home', 'extra', 'Extra', '', 99);

            const sections = await service.initPageSections('home');

            expect([...sections.keys()]).toEqual(['hero', 'what_i_do', 'cta']);
        });

        it('should tolerate a concurrent seed of the same page', async () => {
            const [a, b] = await Promise.all([service.initPageSections('home'), service.initPageSections('home')]);

            expect(mockDb.getCollectionData(SECTIONS_COLLECTION)).toHaveLength(3);
            expect([...a.keys()]).toEqual(['hero', 'what_i_do', 'cta']);
            expect([...b.entries()]).toEqual([...a.entries()]);
        });

        it('should return an empty map for a page without catalog sections', async () => {
            const sections = await service.initPageSections('blog');
            expect(sections.size).toBe(0);
        });
    });

    // ============================================================================
    // Mutations
    // ============================================================================

    describe('updateSection', () => {
        it('should store new content and refresh updatedAt', async () => {
            vi.useFakeTimers({ toFake: ['Date'] });
            vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
            const before = await service.getOrCreateSection('home', 'hero');

            vi.setSystemTime(new Date('2024-01-02T00:00:00Z'));
            await service.updateSection('home', 'hero', 'new text');

            const after = await service.getSection('home', 'hero');
            expect(after?.content).toBe('new text');
            expect(after?.updatedAt.getTime()).toBeGreaterThan(before.updatedAt.getTime());
        });

        it('should keep the title when none is given', async () => {
            const updated = await service.updateSection('home', 'hero', 'text', null);
            expect(updated.title).toBe('Hello');
        });

        it('should replace the title when one is given', async () => {
            await service.updateSection('home', 'hero', 'text', 'Welcome');

            const stored = await service.getSection('home', 'hero');
            expect(stored?.title).toBe('Welcome');
        });

        it('should create the section first when it is missing', async () => {
            const updated = await service.updateSection('home', 'brand_new', 'body');

            expect(updated.title).toBe('Brand New');
            expect(mockDb.getCollectionData(SECTIONS_COLLECTION)).toHaveLength(1);
        });
    });

    describe('createSection', () => {
        it('should insert with the given fields', async () => {
            const section = await service.createSection('home', 'extra', 'Extra', 'Body', 99);

            expect(section).toMatchObject({
                id: 1,
                page: 'home',
                sectionKey: 'extra',
                title: 'Extra',
                content: 'Body',
                order: 99,
                visible: true
            });
        });

        it('should reject an existing pair and leave the row unchanged', async () => {
            const original = await service.getOrCreateSection('home', 'hero');

            await expect(service.createSection('home', 'hero', 'Other', 'Other body')).rejects.toBeInstanceOf(
                DuplicateKeyError
            );

            expect(await service.getSection('home', 'hero')).toEqual(original);
            expect(mockDb.getCollectionData(SECTIONS_COLLECTION)).toHaveLength(1);
        });

        it('should report a pair created after the existence check as already existing', async () => {
            mockDb.injectError(
                SECTIONS_COLLECTION,
                'insertOne',
                new DuplicateKeyError('Duplicate key in sections', undefined, 'page_section_key_unique')
            );

            await expect(service.createSection('home', 'late', 'Late', 'Body')).rejects.toThrow('Section already exists');
        });

        it('should not report an id collision as an existing section', async () => {
            mockDb.injectError(
                SECTIONS_COLLECTION,
                'insertOne',
                new DuplicateKeyError('Duplicate key in sections', undefined, 'id_unique')
            );

            await expect(service.createSection('home', 'late', 'Late', 'Body')).rejects.toThrow(
                'Unexpected duplicate key on index id_unique'
            );
        });
    });

    describe('deleteSection', () => {
        it('should report whether a row was removed', async () => {
            const section = await service.getOrCreateSection('home', 'hero');

            expect(await service.deleteSection(section.id)).toBe(true);
            expect(await service.deleteSection(section.id)).toBe(false);
            expect(await service.getSection('home', 'hero')).toBeNull();
        });
    });

    // ============================================================================
    // renderSection
    // ============================================================================

    describe('renderSection', () => {
        it('should return an empty string for a missing section', async () => {
            expect(await service.renderSection(null)).toBe('');
            expect(await service.renderSection(undefined)).toBe('');
        });

        it('should return an empty string for empty content', async () => {
            const section = await service.createSection('home', 'blank', '', '');
            expect(await service.renderSection(section)).toBe('');
        });

        it('should render the content as markdown', async () => {
            const section = await service.createSection('home', 'bold', '', '**Bold**');
            expect(await service.renderSection(section)).toBe('<p><strong>Bold</strong></p>');
        });
    });
});
