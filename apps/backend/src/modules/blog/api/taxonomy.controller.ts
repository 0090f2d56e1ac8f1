import type { Request, Response } from 'express';
import type { ITaxonomyService, TaxonomyKind } from '@portfolio/types';
import { parseIdParam } from '../../../api/params.js';
import { NotFoundError } from '../../../lib/errors.js';
import { createTermSchema } from './blog.schemas.js';
import { serializeTerm } from './serializers.js';

const LABELS: Record<TaxonomyKind, string> = {
    tag: 'Tag',
    category: 'Category'
};

/**
 * Tag and category endpoints. Routes bind the kind as the first argument.
 */
export class TaxonomyController {
    constructor(private readonly taxonomyService: ITaxonomyService) {}

    /**
     * GET /api/content/blog/taxonomy
     *
     * Both kinds at once, for the blog sidebar.
     */
    async getTaxonomy(_req: Request, res: Response): Promise<void> {
        const [tags, categories] = await Promise.all([
            this.taxonomyService.listTerms('tag'),
            this.taxonomyService.listTerms('category')
        ]);
        res.json({ tags: tags.map(serializeTerm), categories: categories.map(serializeTerm) });
    }

    /**
     * GET /api/admin/tags and /api/admin/categories
     */
    async listTerms(kind: TaxonomyKind, _req: Request, res: Response): Promise<void> {
        const terms = await this.taxonomyService.listTerms(kind);
        res.json({ terms: terms.map(serializeTerm) });
    }

    /**
     * POST /api/admin/tags and /api/admin/categories
     *
     * Request body: { name, description? }. Tags ignore the description.
     */
    async createTerm(kind: TaxonomyKind, req: Request, res: Response): Promise<void> {
        const body = createTermSchema.parse(req.body);
        const term = await this.taxonomyService.createTerm(kind, body.name, body.description);
        res.status(201).json(serializeTerm(term));
    }

    /**
     * DELETE /api/admin/tags/:id and /api/admin/categories/:id
     *
     * Posts keep no reference to the deleted term once read again.
     */
    async deleteTerm(kind: TaxonomyKind, req: Request, res: Response): Promise<void> {
        const label = LABELS[kind];
        const deleted = await this.taxonomyService.deleteTerm(kind, parseIdParam(req.params.id, label));
        if (!deleted) {
            throw new NotFoundError(`${label} not found`);
        }
        res.json({ success: true });
    }
}
