import type {
    IContentCatalog,
    IContentPage,
    IContentPagePatch,
    IContentPageService,
    IContentPageSummary,
    IDatabaseService,
    ILogger
} from '@portfolio/types';
import { escalateDuplicate, isDuplicateOn } from '../../../lib/errors.js';
import { mergeLayers } from '../../../lib/layered-lookup.js';
import { humanize } from '../../../lib/text.js';
import type { IContentPageDocument } from '../database/index.js';

export const PAGES_COLLECTION = 'pages';
const SLUG_INDEX = 'slug_unique';

function toPage(doc: IContentPageDocument): IContentPage {
    return {
        slug: doc.slug,
        title: doc.title,
        content: doc.content,
        metaDescription: doc.metaDescription,
        updatedAt: doc.updatedAt
    };
}

/**
 * Long-form pages such as "about" and "now".
 *
 * Public reads fall back to the catalog without writing. Admin reads and
 * edits persist the page on first touch so later edits have a row to update.
 */
export class ContentPageService implements IContentPageService {
    private readonly logger: ILogger;

    constructor(
        private readonly database: IDatabaseService,
        private readonly catalog: IContentCatalog,
        logger: ILogger
    ) {
        this.logger = logger.child({ service: 'content-page-service' });
    }

    async ensureIndexes(): Promise<void> {
        await this.database.createIndex(PAGES_COLLECTION, { slug: 1 }, { unique: true, name: SLUG_INDEX });
    }

    async getPage(slug: string): Promise<IContentPage | null> {
        const stored = await this.database.findOne<IContentPageDocument>(PAGES_COLLECTION, { slug });
        if (stored) {
            return toPage(stored);
        }

        const defaults = this.catalog.getPageDefaults(slug);
        if (!defaults) {
            return null;
        }
        return {
            slug,
            title: defaults.title,
            content: defaults.content,
            metaDescription: defaults.metaDescription,
            updatedAt: null
        };
    }

    async getOrCreatePage(slug: string): Promise<IContentPage> {
        const stored = await this.database.findOne<IContentPageDocument>(PAGES_COLLECTION, { slug });
        if (stored) {
            return toPage(stored);
        }

        const defaults = this.catalog.getPageDefaults(slug);
        const doc: IContentPageDocument = {
            slug,
            title: defaults?.title ?? humanize(slug),
            content: defaults?.content ?? '',
            metaDescription: defaults?.metaDescription ?? '',
            updatedAt: new Date()
        };

        try {
            await this.database.insertOne(PAGES_COLLECTION, doc);
            this.logger.info({ slug, seeded: defaults !== null }, 'Created page');
            return toPage(doc);
        } catch (error) {
            if (!isDuplicateOn(error, SLUG_INDEX)) {
                throw escalateDuplicate(error);
            }
            const winner = await this.database.findOne<IContentPageDocument>(PAGES_COLLECTION, { slug });
            if (!winner) {
                throw error;
            }
            return toPage(winner);
        }
    }

    async updatePage(slug: string, patch: IContentPagePatch): Promise<IContentPage> {
        const page = await this.getOrCreatePage(slug);

        const changes: Partial<IContentPageDocument> = { updatedAt: new Date() };
        if (patch.title !== undefined) {
            changes.title = patch.title;
        }
        if (patch.content !== undefined) {
            changes.content = patch.content;
        }
        if (patch.metaDescription !== undefined) {
            changes.metaDescription = patch.metaDescription;
        }

        await this.database.updateOne<IContentPageDocument>(PAGES_COLLECTION, { slug }, { $set: changes });
        this.logger.info({ slug, fields: Object.keys(changes) }, 'Updated page');

        const updated = await this.database.findOne<IContentPageDocument>(PAGES_COLLECTION, { slug });
        return updated ? toPage(updated) : page;
    }

    async listPages(): Promise<IContentPageSummary[]> {
        const docs = await this.database.find<IContentPageDocument>(PAGES_COLLECTION, {}, { sort: { slug: 1 } });

        const defaults: Record<string, IContentPageSummary> = {};
        for (const slug of this.catalog.getPageSlugs()) {
            const page = this.catalog.getPageDefaults(slug);
            defaults[slug] = { slug, title: page?.title ?? humanize(slug), stored: false, updatedAt: null };
        }

        const stored: Record<string, IContentPageSummary> = {};
        for (const doc of docs) {
            stored[doc.slug] = { slug: doc.slug, title: doc.title, stored: true, updatedAt: doc.updatedAt };
        }

        return Object.values(mergeLayers(defaults, stored));
    }
}
