import type { Filter } from 'mongodb';
import type {
    IBlogArchive,
    ICommentService,
    IDatabaseService,
    ILogger,
    IPost,
    IPostFilter,
    IPostInput,
    IPostPatch,
    IPostService,
    ITaxonomyService,
    ITaxonomyTerm
} from '@portfolio/types';
import { DuplicateKeyError, escalateDuplicate, isDuplicateOn } from '../../../lib/errors.js';
import { resolveSlug } from '../../../lib/text.js';
import type { IPostDocument } from '../database/index.js';

export const POSTS_COLLECTION = 'posts';

const POST_SEQUENCE = 'posts';
const SLUG_INDEX = 'slug_unique';

const MONTH_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

/**
 * Half-open UTC range covering a year, or one month of it.
 */
function createdAtRange(year: number, month?: number): { $gte: Date; $lt: Date } {
    if (month === undefined) {
        return { $gte: new Date(Date.UTC(year, 0, 1)), $lt: new Date(Date.UTC(year + 1, 0, 1)) };
    }
    return { $gte: new Date(Date.UTC(year, month - 1, 1)), $lt: new Date(Date.UTC(year, month, 1)) };
}

function pickTerms(ids: readonly number[], byId: ReadonlyMap<number, ITaxonomyTerm>): ITaxonomyTerm[] {
    return ids.flatMap(id => {
        const term = byId.get(id);
        return term ? [term] : [];
    });
}

function buildPost(doc: IPostDocument, tags: ITaxonomyTerm[], categories: ITaxonomyTerm[]): IPost {
    return {
        id: doc.id,
        title: doc.title,
        slug: doc.slug,
        content: doc.content,
        excerpt: doc.excerpt,
        published: doc.published,
        tags,
        categories,
        createdAt: doc.createdAt,
        updatedAt: doc.updatedAt
    };
}

/**
 * Blog posts with their tags and categories.
 *
 * Posts reference terms by id; names given on create or update are resolved
 * through the taxonomy service, creating terms as needed. Deleting a post
 * deletes its comments.
 */
export class PostService implements IPostService {
    private readonly logger: ILogger;

    constructor(
        private readonly database: IDatabaseService,
        private readonly taxonomy: ITaxonomyService,
        private readonly comments: ICommentService,
        logger: ILogger
    ) {
        this.logger = logger.child({ service: 'post-service' });
    }

    async ensureIndexes(): Promise<void> {
        await this.database.createIndex(POSTS_COLLECTION, { id: 1 }, { unique: true, name: 'id_unique' });
        await this.database.createIndex(POSTS_COLLECTION, { slug: 1 }, { unique: true, name: SLUG_INDEX });
        await this.database.createIndex(POSTS_COLLECTION, { published: 1, createdAt: -1 }, {
            name: 'published_created_at'
        });
    }

    async listPosts(filter: IPostFilter = {}): Promise<IPost[]> {
        const query: Filter<IPostDocument> = {};
        if (filter.publishedOnly) {
            query.published = true;
        }
        if (filter.tagId !== undefined) {
            query.tagIds = filter.tagId;
        }
        if (filter.categoryId !== undefined) {
            query.categoryIds = filter.categoryId;
        }
        if (filter.year !== undefined) {
            query.createdAt = createdAtRange(filter.year, filter.month);
        }

        const docs = await this.database.find<IPostDocument>(POSTS_COLLECTION, query, {
            sort: { createdAt: -1, id: -1 },
            limit: filter.limit
        });
        return this.toPosts(docs);
    }

    async getPost(id: number): Promise<IPost | null> {
        const doc = await this.database.findOne<IPostDocument>(POSTS_COLLECTION, { id });
        return doc ? this.toPost(doc) : null;
    }

    async getPostBySlug(slug: string): Promise<IPost | null> {
        const doc = await this.database.findOne<IPostDocument>(POSTS_COLLECTION, { slug });
        return doc ? this.toPost(doc) : null;
    }

    async createPost(input: IPostInput): Promise<IPost> {
        const slug = resolveSlug(input.slug, input.title);
        const [tagIds, categoryIds] = await Promise.all([
            this.taxonomy.resolveNames('tag', input.tags ?? []),
            this.taxonomy.resolveNames('category', input.categories ?? [])
        ]);

        const now = new Date();
        const doc: IPostDocument = {
            id: await this.database.nextSequence(POST_SEQUENCE),
            title: input.title,
            slug,
            content: input.content,
            excerpt: input.excerpt ?? '',
            published: input.published ?? false,
            tagIds,
            categoryIds,
            createdAt: now,
            updatedAt: now
        };

        try {
            await this.database.insertOne(POSTS_COLLECTION, doc);
        } catch (error) {
            throw slugTaken(error, slug);
        }

        this.logger.info({ id: doc.id, slug, published: doc.published }, 'Created post');
        return this.toPost(doc);
    }

    async updatePost(id: number, patch: IPostPatch): Promise<IPost | null> {
        const existing = await this.database.findOne<IPostDocument>(POSTS_COLLECTION, { id });
        if (!existing) {
            return null;
        }

        const changes: Partial<IPostDocument> = { updatedAt: new Date() };
        if (patch.title !== undefined) {
            changes.title = patch.title;
        }
        if (patch.slug !== undefined) {
            changes.slug = resolveSlug(patch.slug, patch.title ?? existing.title);
        }
        if (patch.content !== undefined) {
            changes.content = patch.content;
        }
        if (patch.excerpt !== undefined) {
            changes.excerpt = patch.excerpt;
        }
        if (patch.published !== undefined) {
            changes.published = patch.published;
        }
        if (patch.tags !== undefined) {
            changes.tagIds = await this.taxonomy.resolveNames('tag', patch.tags);
        }
        if (patch.categories !== undefined) {
            changes.categoryIds = await this.taxonomy.resolveNames('category', patch.categories);
        }

        try {
            await this.database.updateOne<IPostDocument>(POSTS_COLLECTION, { id }, { $set: changes });
        } catch (error) {
            throw slugTaken(error, changes.slug ?? existing.slug);
        }

        this.logger.info({ id, fields: Object.keys(changes) }, 'Updated post');
        return this.getPost(id);
    }

    async deletePost(id: number): Promise<boolean> {
        const deleted = await this.database.deleteOne<IPostDocument>(POSTS_COLLECTION, { id });
        if (!deleted) {
            return false;
        }

        const comments = await this.comments.deleteForPost(id);
        this.logger.info({ id, comments }, 'Deleted post');
        return true;
    }

    async getArchives(): Promise<IBlogArchive[]> {
        const docs = await this.database.find<IPostDocument>(POSTS_COLLECTION, { published: true }, {
            sort: { createdAt: -1 }
        });

        const archives: IBlogArchive[] = [];
        for (const doc of docs) {
            const year = doc.createdAt.getUTCFullYear();
            const month = doc.createdAt.getUTCMonth() + 1;
            const last = archives.at(-1);
            if (last && last.year === year && last.month === month) {
                last.count += 1;
            } else {
                archives.push({ year, month, monthName: MONTH_NAMES[month - 1], count: 1 });
            }
        }
        return archives;
    }

    private async toPost(doc: IPostDocument): Promise<IPost> {
        const [tags, categories] = await Promise.all([
            this.taxonomy.getTermsByIds('tag', doc.tagIds),
            this.taxonomy.getTermsByIds('category', doc.categoryIds)
        ]);
        return buildPost(doc, tags, categories);
    }

    /**
     * Resolve the terms of many posts with one lookup per kind.
     */
    private async toPosts(docs: IPostDocument[]): Promise<IPost[]> {
        const tagIds = [...new Set(docs.flatMap(doc => doc.tagIds))];
        const categoryIds = [...new Set(docs.flatMap(doc => doc.categoryIds))];
        const [tags, categories] = await Promise.all([
            this.taxonomy.getTermsByIds('tag', tagIds),
            this.taxonomy.getTermsByIds('category', categoryIds)
        ]);

        const tagById = new Map(tags.map(term => [term.id, term]));
        const categoryById = new Map(categories.map(term => [term.id, term]));
        return docs.map(doc => buildPost(doc, pickTerms(doc.tagIds, tagById), pickTerms(doc.categoryIds, categoryById)));
    }
}

/**
 * A slug collision becomes a 400; a collision on any other index stays a
 * store fault.
 */
function slugTaken(error: unknown, slug: string): unknown {
    if (isDuplicateOn(error, SLUG_INDEX)) {
        return new DuplicateKeyError('A post with this slug already exists', { slug }, SLUG_INDEX);
    }
    return escalateDuplicate(error);
}
