import type { IDatabaseService, ILogger, ITaxonomyService, ITaxonomyTerm, TaxonomyKind } from '@portfolio/types';
import { DuplicateKeyError, ValidationError, escalateDuplicate, isDuplicateOn } from '../../../lib/errors.js';
import { slugify } from '../../../lib/text.js';
import type { ITaxonomyTermDocument } from '../database/index.js';

export const TAGS_COLLECTION = 'tags';
export const CATEGORIES_COLLECTION = 'categories';

const COLLECTIONS: Record<TaxonomyKind, string> = {
    tag: TAGS_COLLECTION,
    category: CATEGORIES_COLLECTION
};

const SLUG_INDEX = 'slug_unique';

function toTerm(kind: TaxonomyKind, doc: ITaxonomyTermDocument): ITaxonomyTerm {
    return {
        id: doc.id,
        kind,
        name: doc.name,
        slug: doc.slug,
        description: doc.description
    };
}

/**
 * Tags and categories, one collection each.
 *
 * A term is identified by the slug of its name, so "Node JS" and "node-js"
 * are the same tag. Post editing creates terms on first use through
 * {@link TaxonomyService.resolveNames}.
 */
export class TaxonomyService implements ITaxonomyService {
    private readonly logger: ILogger;

    constructor(
        private readonly database: IDatabaseService,
        logger: ILogger
    ) {
        this.logger = logger.child({ service: 'taxonomy-service' });
    }

    async ensureIndexes(): Promise<void> {
        for (const collection of Object.values(COLLECTIONS)) {
            await this.database.createIndex(collection, { id: 1 }, { unique: true, name: 'id_unique' });
            await this.database.createIndex(collection, { slug: 1 }, { unique: true, name: SLUG_INDEX });
        }
    }

    async listTerms(kind: TaxonomyKind): Promise<ITaxonomyTerm[]> {
        const docs = await this.database.find<ITaxonomyTermDocument>(COLLECTIONS[kind], {}, { sort: { name: 1 } });
        return docs.map(doc => toTerm(kind, doc));
    }

    async getTermBySlug(kind: TaxonomyKind, slug: string): Promise<ITaxonomyTerm | null> {
        const doc = await this.database.findOne<ITaxonomyTermDocument>(COLLECTIONS[kind], { slug });
        return doc ? toTerm(kind, doc) : null;
    }

    async getTermsByIds(kind: TaxonomyKind, ids: readonly number[]): Promise<ITaxonomyTerm[]> {
        if (ids.length === 0) {
            return [];
        }

        const docs = await this.database.find<ITaxonomyTermDocument>(COLLECTIONS[kind], { id: { $in: [...ids] } });
        const byId = new Map(docs.map(doc => [doc.id, doc]));

        return ids.flatMap(id => {
            const doc = byId.get(id);
            return doc ? [toTerm(kind, doc)] : [];
        });
    }

    async createTerm(kind: TaxonomyKind, name: string, description = ''): Promise<ITaxonomyTerm> {
        const trimmed = name.trim();
        const slug = slugify(trimmed);
        if (!slug) {
            throw new ValidationError(`Cannot derive a ${kind} slug from "${name}"`);
        }

        const collection = COLLECTIONS[kind];
        const doc: ITaxonomyTermDocument = {
            id: await this.database.nextSequence(collection),
            name: trimmed,
            slug,
            description: kind === 'category' ? description : ''
        };

        try {
            await this.database.insertOne(collection, doc);
        } catch (error) {
            if (isDuplicateOn(error, SLUG_INDEX)) {
                throw new DuplicateKeyError(`A ${kind} named "${trimmed}" already exists`, { kind, slug }, SLUG_INDEX);
            }
            throw escalateDuplicate(error);
        }

        this.logger.info({ kind, id: doc.id, slug }, 'Created taxonomy term');
        return toTerm(kind, doc);
    }

    async resolveNames(kind: TaxonomyKind, names: readonly string[]): Promise<number[]> {
        const ids: number[] = [];
        for (const name of names) {
            if (!name.trim()) {
                continue;
            }
            const term = await this.findOrCreate(kind, name);
            if (!ids.includes(term.id)) {
                ids.push(term.id);
            }
        }
        return ids;
    }

    async deleteTerm(kind: TaxonomyKind, id: number): Promise<boolean> {
        const deleted = await this.database.deleteOne<ITaxonomyTermDocument>(COLLECTIONS[kind], { id });
        if (deleted) {
            this.logger.info({ kind, id }, 'Deleted taxonomy term');
        }
        return deleted;
    }

    /**
     * Existing term with the name's slug, else a new one. A concurrent
     * create of the same slug resolves to the row that won.
     */
    private async findOrCreate(kind: TaxonomyKind, name: string): Promise<ITaxonomyTerm> {
        const existing = await this.getTermBySlug(kind, slugify(name));
        if (existing) {
            return existing;
        }

        try {
            return await this.createTerm(kind, name);
        } catch (error) {
            if (!isDuplicateOn(error, SLUG_INDEX)) {
                throw error;
            }
            const winner = await this.getTermBySlug(kind, slugify(name));
            if (!winner) {
                throw error;
            }
            return winner;
        }
    }
}
