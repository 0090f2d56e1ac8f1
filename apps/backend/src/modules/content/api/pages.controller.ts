import type { Request, Response } from 'express';
import type { IContentPage, IContentPageService, IMarkdownService } from '@portfolio/types';
import { NotFoundError } from '../../../lib/errors.js';
import { updatePageSchema } from './content.schemas.js';

function serializePage(page: IContentPage) {
    return {
        slug: page.slug,
        title: page.title,
        content: page.content,
        meta_description: page.metaDescription,
        updated_at: page.updatedAt
    };
}

/**
 * Long-form page endpoints.
 */
export class PagesController {
    constructor(
        private readonly pageService: IContentPageService,
        private readonly markdown: IMarkdownService
    ) {}

    // ============================================================================
    // Public Endpoints
    // ============================================================================

    /**
     * GET /api/content/pages/:slug
     *
     * Rendered page with reading metadata. Catalog defaults are served
     * without being stored.
     */
    async getPublicPage(req: Request, res: Response): Promise<void> {
        const page = await this.pageService.getPage(req.params.slug);
        if (!page) {
            throw new NotFoundError('Page not found');
        }

        res.json({
            slug: page.slug,
            title: page.title,
            html: await this.markdown.renderMarkdown(page.content),
            meta_description: page.metaDescription,
            read_time: this.markdown.estimateReadTime(page.content),
            excerpt: this.markdown.generateExcerpt(page.content),
            updated_at: page.updatedAt
        });
    }

    // ============================================================================
    // Admin Endpoints
    // ============================================================================

    /**
     * GET /api/admin/pages
     */
    async listPages(_req: Request, res: Response): Promise<void> {
        const pages = await this.pageService.listPages();
        res.json({
            pages: pages.map(page => ({
                slug: page.slug,
                title: page.title,
                stored: page.stored,
                updated_at: page.updatedAt
            }))
        });
    }

    /**
     * GET /api/admin/pages/:slug
     *
     * Creates the page on first access so the editor always has a row.
     */
    async getPage(req: Request, res: Response): Promise<void> {
        const page = await this.pageService.getOrCreatePage(req.params.slug);
        res.json(serializePage(page));
    }

    /**
     * PUT /api/admin/pages/:slug
     *
     * Request body: { title?, content?, meta_description? }
     */
    async updatePage(req: Request, res: Response): Promise<void> {
        const body = updatePageSchema.parse(req.body);
        const page = await this.pageService.updatePage(req.params.slug, {
            title: body.title,
            content: body.content,
            metaDescription: body.meta_description
        });

        res.json({ ...serializePage(page), html: await this.markdown.renderMarkdown(page.content) });
    }
}
