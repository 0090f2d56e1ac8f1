import type {
    IContentCatalog,
    IDatabaseService,
    ILogger,
    IMarkdownService,
    ISection,
    ISectionService,
    SectionMap
} from '@portfolio/types';
import { DuplicateKeyError, escalateDuplicate, isDuplicateOn } from '../../../lib/errors.js';
import { humanize } from '../../../lib/text.js';
import type { ISectionDocument } from '../database/index.js';

/**
 * Logical collection name for sections.
 */
export const SECTIONS_COLLECTION = 'sections';

/**
 * Counter that hands out section ids.
 */
const SECTION_SEQUENCE = 'sections';

/**
 * Unique index backing the (page, sectionKey) identity. Only a duplicate on
 * this index means another request created the same section.
 */
export const SECTION_KEY_INDEX = 'page_section_key_unique';

/**
 * Sort applied to every multi-section read.
 */
const DISPLAY_ORDER = { order: 1, id: 1 } as const;

function toSection(doc: ISectionDocument): ISection {
    return {
        id: doc.id,
        page: doc.page,
        sectionKey: doc.sectionKey,
        title: doc.title,
        content: doc.content,
        order: doc.order,
        visible: doc.visible,
        updatedAt: doc.updatedAt
    };
}

function byDisplayOrder(a: ISection, b: ISection): number {
    return a.order - b.order || a.id - b.id;
}

/**
 * Service for inline-editable page sections.
 *
 * Sections are keyed by (`page`, `sectionKey`) with a unique index backing
 * that identity, so concurrent seeding never produces two rows for one pair.
 * When an insert loses a race the service re-reads the row the winner wrote
 * instead of failing the request.
 *
 * Defaults come from the content catalog. A catalog entry's title is used as
 * given, even when empty; keys the catalog does not know get a title derived
 * from the key and empty content.
 */
export class SectionService implements ISectionService {
    private readonly logger: ILogger;

    /**
     * @param database - Database service for the `sections` collection
     * @param catalog - Default titles, content and order per page
     * @param markdown - Renderer for section content
     * @param logger - Parent logger, a `section-service` child is derived from it
     */
    constructor(
        private readonly database: IDatabaseService,
        private readonly catalog: IContentCatalog,
        private readonly markdown: IMarkdownService,
        logger: ILogger
    ) {
        this.logger = logger.child({ service: 'section-service' });
    }

    /**
     * Create the unique indexes the section identity relies on.
     *
     * Called once during module run, before any route is mounted.
     */
    async ensureIndexes(): Promise<void> {
        await this.database.createIndex(SECTIONS_COLLECTION, { page: 1, sectionKey: 1 }, {
            unique: true,
            name: SECTION_KEY_INDEX
        });
        await this.database.createIndex(SECTIONS_COLLECTION, { id: 1 }, { unique: true, name: 'id_unique' });
    }

    // ============================================================================
    // Reads
    // ============================================================================

    async getSection(page: string, sectionKey: string): Promise<ISection | null> {
        const doc = await this.database.findOne<ISectionDocument>(SECTIONS_COLLECTION, { page, sectionKey });
        return doc ? toSection(doc) : null;
    }

    async getOrCreateSection(page: string, sectionKey: string): Promise<ISection> {
        const existing = await this.getSection(page, sectionKey);
        if (existing) {
            return existing;
        }

        const doc = await this.buildDefaultDocument(page, sectionKey, 0, new Date());

        try {
            await this.database.insertOne(SECTIONS_COLLECTION, doc);
            this.logger.debug({ page, sectionKey, id: doc.id }, 'Created section from defaults');
            return toSection(doc);
        } catch (error) {
            if (!isDuplicateOn(error, SECTION_KEY_INDEX)) {
                throw escalateDuplicate(error);
            }

            // Another request created the row between our read and insert
            const winner = await this.getSection(page, sectionKey);
            if (!winner) {
                throw error;
            }
            this.logger.debug({ page, sectionKey }, 'Section created concurrently, using stored row');
            return winner;
        }
    }

    async getPageSections(page: string): Promise<SectionMap> {
        const docs = await this.database.find<ISectionDocument>(SECTIONS_COLLECTION, { page }, { sort: DISPLAY_ORDER });
        return new Map(docs.map(doc => [doc.sectionKey, toSection(doc)]));
    }

    async getSectionsForPage(page: string): Promise<SectionMap> {
        const entries = this.catalog.getSectionEntries(page);
        let stored = await this.getPageSections(page);

        // First view of a page: seed it in one batch with catalog positions
        if (stored.size === 0 && entries.length > 0) {
            stored = await this.initPageSections(page);
        }

        const missing = entries.filter(entry => !stored.has(entry.key));
        if (missing.length === 0) {
            return stored;
        }

        for (const entry of missing) {
            stored.set(entry.key, await this.getOrCreateSection(page, entry.key));
        }

        const ordered = [...stored.values()].sort(byDisplayOrder);
        return new Map(ordered.map(section => [section.sectionKey, section]));
    }

    // ============================================================================
    // Writes
    // ============================================================================

    async initPageSections(page: string): Promise<SectionMap> {
        const entries = this.catalog.getSectionEntries(page);
        const stored = await this.getPageSections(page);
        const now = new Date();

        const missing: ISectionDocument[] = [];
        for (const [index, entry] of entries.entries()) {
            if (!stored.has(entry.key)) {
                missing.push(await this.buildDefaultDocument(page, entry.key, index, now));
            }
        }

        if (missing.length > 0) {
            try {
                const inserted = await this.database.insertMany(SECTIONS_COLLECTION, missing, { ordered: false });
                this.logger.info({ page, inserted }, 'Seeded page sections');
            } catch (error) {
                if (!isDuplicateOn(error, SECTION_KEY_INDEX)) {
                    throw escalateDuplicate(error);
                }
                this.logger.debug({ page, details: error.details }, 'Some sections were seeded concurrently');
            }
        }

        const current = await this.getPageSections(page);
        const result: SectionMap = new Map();
        for (const entry of entries) {
            const section = current.get(entry.key);
            if (section) {
                result.set(entry.key, section);
            }
        }
        return result;
    }

    async updateSection(page: string, sectionKey: string, content: string, title?: string | null): Promise<ISection> {
        const section = await this.getOrCreateSection(page, sectionKey);

        const updatedAt = new Date();
        const nextTitle = title ?? section.title;

        await this.database.updateOne<ISectionDocument>(
            SECTIONS_COLLECTION,
            { id: section.id },
            { $set: { content, title: nextTitle, updatedAt } }
        );
        this.logger.info({ page, sectionKey, id: section.id }, 'Updated section');

        return { ...section, content, title: nextTitle, updatedAt };
    }

    async createSection(
        page: string,
        sectionKey: string,
        title: string,
        content: string,
        order = 0
    ): Promise<ISection> {
        const existing = await this.getSection(page, sectionKey);
        if (existing) {
            throw sectionExists(page, sectionKey);
        }

        const doc: ISectionDocument = {
            id: await this.database.nextSequence(SECTION_SEQUENCE),
            page,
            sectionKey,
            title,
            content,
            order,
            visible: true,
            updatedAt: new Date()
        };
        try {
            await this.database.insertOne(SECTIONS_COLLECTION, doc);
        } catch (error) {
            // Created by someone else since the check above
            if (isDuplicateOn(error, SECTION_KEY_INDEX)) {
                throw sectionExists(page, sectionKey);
            }
            throw escalateDuplicate(error);
        }
        this.logger.info({ page, sectionKey, id: doc.id }, 'Created section');

        return toSection(doc);
    }

    async deleteSection(id: number): Promise<boolean> {
        const deleted = await this.database.deleteOne<ISectionDocument>(SECTIONS_COLLECTION, { id });
        if (deleted) {
            this.logger.info({ id }, 'Deleted section');
        }
        return deleted;
    }

    // ============================================================================
    // Rendering
    // ============================================================================

    async renderSection(section: ISection | null | undefined): Promise<string> {
        if (!section || !section.content) {
            return '';
        }
        return this.markdown.renderMarkdown(section.content);
    }

    /**
     * Title and content a newly created section starts with.
     */
    private resolveDefaults(page: string, sectionKey: string): { title: string; content: string } {
        const entry = this.catalog.getSectionEntry(page, sectionKey);
        return {
            title: entry.title ?? humanize(sectionKey),
            content: entry.content
        };
    }

    /**
     * New visible section row filled from the catalog defaults.
     */
    private async buildDefaultDocument(
        page: string,
        sectionKey: string,
        order: number,
        updatedAt: Date
    ): Promise<ISectionDocument> {
        const defaults = this.resolveDefaults(page, sectionKey);
        return {
            id: await this.database.nextSequence(SECTION_SEQUENCE),
            page,
            sectionKey,
            title: defaults.title,
            content: defaults.content,
            order,
            visible: true,
            updatedAt
        };
    }
}

function sectionExists(page: string, sectionKey: string): DuplicateKeyError {
    return new DuplicateKeyError('Section already exists', { page, sectionKey }, SECTION_KEY_INDEX);
}
