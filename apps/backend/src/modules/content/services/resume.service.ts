import type { Filter } from 'mongodb';
import type {
    IContentCatalog,
    IDatabaseService,
    ILogger,
    IResumeSection,
    IResumeSectionInput,
    IResumeSectionPatch,
    IResumeService
} from '@portfolio/types';
import { escalateDuplicate, isDuplicateOn } from '../../../lib/errors.js';
import type { IResumeSectionDocument } from '../database/index.js';

export const RESUME_COLLECTION = 'resume_sections';

const RESUME_SEQUENCE = 'resume_sections';
const SEED_KEY_INDEX = 'seed_key_unique';

function toResumeSection(doc: IResumeSectionDocument): IResumeSection {
    const section: IResumeSection = {
        id: doc.id,
        sectionType: doc.sectionType,
        title: doc.title,
        content: doc.content,
        order: doc.order,
        visible: doc.visible,
        updatedAt: doc.updatedAt
    };
    if (doc.seedKey !== undefined) {
        section.seedKey = doc.seedKey;
    }
    return section;
}

/**
 * Parse the JSON object stored by structured blocks (header, experience,
 * education).
 *
 * @returns The object, or null when the content is prose or not an object
 */
export function parseStructuredContent(content: string): Record<string, unknown> | null {
    const trimmed = content.trim();
    if (!trimmed.startsWith('{')) {
        return null;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(trimmed);
    } catch {
        return null;
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        return null;
    }
    return Object.fromEntries(Object.entries(parsed));
}

/**
 * Resume blocks with catalog seeding.
 *
 * The first read of an empty collection inserts the catalog defaults. Seeded
 * rows carry their catalog key in `seedKey`; the sparse unique index on it
 * turns a concurrent second seed into duplicate-key errors that are skipped.
 */
export class ResumeService implements IResumeService {
    private readonly logger: ILogger;

    constructor(
        private readonly database: IDatabaseService,
        private readonly catalog: IContentCatalog,
        logger: ILogger
    ) {
        this.logger = logger.child({ service: 'resume-service' });
    }

    async ensureIndexes(): Promise<void> {
        await this.database.createIndex(RESUME_COLLECTION, { id: 1 }, { unique: true, name: 'id_unique' });
        await this.database.createIndex(RESUME_COLLECTION, { seedKey: 1 }, {
            unique: true,
            sparse: true,
            name: SEED_KEY_INDEX
        });
    }

    async listSections(options: { visibleOnly?: boolean } = {}): Promise<IResumeSection[]> {
        if ((await this.database.count(RESUME_COLLECTION, {})) === 0) {
            await this.seedDefaults();
        }

        const filter: Filter<IResumeSectionDocument> = options.visibleOnly ? { visible: true } : {};
        const docs = await this.database.find<IResumeSectionDocument>(RESUME_COLLECTION, filter, {
            sort: { order: 1, id: 1 }
        });
        return docs.map(toResumeSection);
    }

    async getSection(id: number): Promise<IResumeSection | null> {
        const doc = await this.database.findOne<IResumeSectionDocument>(RESUME_COLLECTION, { id });
        return doc ? toResumeSection(doc) : null;
    }

    async createSection(input: IResumeSectionInput): Promise<IResumeSection> {
        const doc: IResumeSectionDocument = {
            id: await this.database.nextSequence(RESUME_SEQUENCE),
            sectionType: input.sectionType,
            title: input.title ?? '',
            content: input.content ?? '',
            order: input.order ?? 0,
            visible: input.visible ?? true,
            updatedAt: new Date()
        };

        try {
            await this.database.insertOne(RESUME_COLLECTION, doc);
        } catch (error) {
            throw escalateDuplicate(error);
        }
        this.logger.info({ id: doc.id, sectionType: doc.sectionType }, 'Created resume section');
        return toResumeSection(doc);
    }

    async updateSection(id: number, patch: IResumeSectionPatch): Promise<IResumeSection | null> {
        const existing = await this.getSection(id);
        if (!existing) {
            return null;
        }

        const changes: Partial<IResumeSectionDocument> = { updatedAt: new Date() };
        if (patch.sectionType !== undefined) {
            changes.sectionType = patch.sectionType;
        }
        if (patch.title !== undefined) {
            changes.title = patch.title;
        }
        if (patch.content !== undefined) {
            changes.content = patch.content;
        }
        if (patch.order !== undefined) {
            changes.order = patch.order;
        }
        if (patch.visible !== undefined) {
            changes.visible = patch.visible;
        }

        const result = await this.database.updateOne<IResumeSectionDocument>(RESUME_COLLECTION, { id }, {
            $set: changes
        });
        if (result.matchedCount === 0) {
            return null;
        }

        this.logger.info({ id, fields: Object.keys(changes) }, 'Updated resume section');
        return this.getSection(id);
    }

    async deleteSection(id: number): Promise<boolean> {
        const deleted = await this.database.deleteOne<IResumeSectionDocument>(RESUME_COLLECTION, { id });
        if (deleted) {
            this.logger.info({ id }, 'Deleted resume section');
        }
        return deleted;
    }

    /**
     * Insert every catalog default. Rows another request seeded first are
     * skipped through the seedKey index.
     */
    private async seedDefaults(): Promise<void> {
        const defaults = this.catalog.getResumeDefaults();
        if (defaults.length === 0) {
            return;
        }

        const now = new Date();
        const docs: IResumeSectionDocument[] = [];
        for (const entry of defaults) {
            docs.push({
                id: await this.database.nextSequence(RESUME_SEQUENCE),
                sectionType: entry.sectionType,
                title: entry.title,
                content: entry.content,
                order: entry.order,
                visible: true,
                updatedAt: now,
                seedKey: entry.key
            });
        }

        try {
            const inserted = await this.database.insertMany(RESUME_COLLECTION, docs, { ordered: false });
            this.logger.info({ inserted }, 'Seeded resume sections');
        } catch (error) {
            if (!isDuplicateOn(error, SEED_KEY_INDEX)) {
                throw escalateDuplicate(error);
            }
            this.logger.debug({ details: error.details }, 'Resume sections were seeded concurrently');
        }
    }
}
