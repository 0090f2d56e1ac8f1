import type { Filter } from 'mongodb';
import type { IDatabaseService, ILogger, IProject, IProjectInput, IProjectPatch, IProjectService } from '@portfolio/types';
import { DuplicateKeyError, escalateDuplicate, isDuplicateOn } from '../../../lib/errors.js';
import { resolveSlug } from '../../../lib/text.js';
import type { IProjectDocument } from '../database/index.js';

export const PROJECTS_COLLECTION = 'projects';

const PROJECT_SEQUENCE = 'projects';
const SLUG_INDEX = 'slug_unique';

/**
 * Stored form of an optional link: blank means no link.
 */
function toUrl(value: string | null | undefined): string | null {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
}

function toProject(doc: IProjectDocument): IProject {
    return {
        id: doc.id,
        title: doc.title,
        slug: doc.slug,
        shortDescription: doc.shortDescription,
        description: doc.description,
        techStack: doc.techStack,
        metrics: doc.metrics,
        githubUrl: doc.githubUrl,
        liveUrl: doc.liveUrl,
        featured: doc.featured,
        order: doc.order,
        createdAt: doc.createdAt,
        updatedAt: doc.updatedAt
    };
}

function slugTaken(error: unknown, slug: string): unknown {
    if (isDuplicateOn(error, SLUG_INDEX)) {
        return new DuplicateKeyError('A project with this slug already exists', { slug }, SLUG_INDEX);
    }
    return escalateDuplicate(error);
}

/**
 * Portfolio projects.
 *
 * Listings sort by the admin-set `order`, then newest first, so projects
 * sharing an order keep a stable, recent-first sequence.
 */
export class ProjectService implements IProjectService {
    private readonly logger: ILogger;

    constructor(
        private readonly database: IDatabaseService,
        logger: ILogger
    ) {
        this.logger = logger.child({ service: 'project-service' });
    }

    async ensureIndexes(): Promise<void> {
        await this.database.createIndex(PROJECTS_COLLECTION, { id: 1 }, { unique: true, name: 'id_unique' });
        await this.database.createIndex(PROJECTS_COLLECTION, { slug: 1 }, { unique: true, name: SLUG_INDEX });
        await this.database.createIndex(PROJECTS_COLLECTION, { featured: 1, order: 1 }, { name: 'featured_order' });
    }

    async listProjects(options: { featuredOnly?: boolean; limit?: number } = {}): Promise<IProject[]> {
        const filter: Filter<IProjectDocument> = options.featuredOnly ? { featured: true } : {};
        const docs = await this.database.find<IProjectDocument>(PROJECTS_COLLECTION, filter, {
            sort: { order: 1, createdAt: -1, id: -1 },
            limit: options.limit
        });
        return docs.map(toProject);
    }

    async getProject(id: number): Promise<IProject | null> {
        const doc = await this.database.findOne<IProjectDocument>(PROJECTS_COLLECTION, { id });
        return doc ? toProject(doc) : null;
    }

    async getProjectBySlug(slug: string): Promise<IProject | null> {
        const doc = await this.database.findOne<IProjectDocument>(PROJECTS_COLLECTION, { slug });
        return doc ? toProject(doc) : null;
    }

    async createProject(input: IProjectInput): Promise<IProject> {
        const slug = resolveSlug(input.slug, input.title);
        const now = new Date();
        const doc: IProjectDocument = {
            id: await this.database.nextSequence(PROJECT_SEQUENCE),
            title: input.title,
            slug,
            shortDescription: input.shortDescription,
            description: input.description,
            techStack: input.techStack ?? [],
            metrics: input.metrics ?? '',
            githubUrl: toUrl(input.githubUrl),
            liveUrl: toUrl(input.liveUrl),
            featured: input.featured ?? false,
            order: input.order ?? 0,
            createdAt: now,
            updatedAt: now
        };

        try {
            await this.database.insertOne(PROJECTS_COLLECTION, doc);
        } catch (error) {
            throw slugTaken(error, slug);
        }

        this.logger.info({ id: doc.id, slug }, 'Created project');
        return toProject(doc);
    }

    async updateProject(id: number, patch: IProjectPatch): Promise<IProject | null> {
        const existing = await this.database.findOne<IProjectDocument>(PROJECTS_COLLECTION, { id });
        if (!existing) {
            return null;
        }

        const changes: Partial<IProjectDocument> = { updatedAt: new Date() };
        if (patch.title !== undefined) {
            changes.title = patch.title;
        }
        if (patch.slug !== undefined) {
            changes.slug = resolveSlug(patch.slug, patch.title ?? existing.title);
        }
        if (patch.shortDescription !== undefined) {
            changes.shortDescription = patch.shortDescription;
        }
        if (patch.description !== undefined) {
            changes.description = patch.description;
        }
        if (patch.techStack !== undefined) {
            changes.techStack = patch.techStack;
        }
        if (patch.metrics !== undefined) {
            changes.metrics = patch.metrics;
        }
        if (patch.githubUrl !== undefined) {
            changes.githubUrl = toUrl(patch.githubUrl);
        }
        if (patch.liveUrl !== undefined) {
            changes.liveUrl = toUrl(patch.liveUrl);
        }
        if (patch.featured !== undefined) {
            changes.featured = patch.featured;
        }
        if (patch.order !== undefined) {
            changes.order = patch.order;
        }

        try {
            await this.database.updateOne<IProjectDocument>(PROJECTS_COLLECTION, { id }, { $set: changes });
        } catch (error) {
            throw slugTaken(error, changes.slug ?? existing.slug);
        }

        this.logger.info({ id, fields: Object.keys(changes) }, 'Updated project');
        return this.getProject(id);
    }

    async deleteProject(id: number): Promise<boolean> {
        const deleted = await this.database.deleteOne<IProjectDocument>(PROJECTS_COLLECTION, { id });
        if (deleted) {
            this.logger.info({ id }, 'Deleted project');
        }
        return deleted;
    }
}
