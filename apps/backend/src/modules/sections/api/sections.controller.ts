import type { Request, Response } from 'express';
import type { IMarkdownService, ISectionService } from '@portfolio/types';
import { parseIdParam } from '../../../api/params.js';
import { NotFoundError, ValidationError } from '../../../lib/errors.js';
import { createSectionSchema, previewMarkdownSchema, updateSectionSchema } from './sections.schemas.js';

/**
 * Controller for the inline-editing API and the public section listing.
 *
 * Handlers throw domain errors and leave the status mapping to the error
 * handler; routes wrap every handler in asyncHandler. Response bodies use
 * snake_case keys.
 */
export class SectionsController {
    constructor(
        private readonly sectionService: ISectionService,
        private readonly markdown: IMarkdownService
    ) {}

    // ============================================================================
    // Admin Endpoints
    // ============================================================================

    /**
     * GET /api/section/:page/:sectionKey
     *
     * Section content for editing. Creates the section from defaults when it
     * does not exist yet.
     */
    async getSection(req: Request, res: Response): Promise<void> {
        const { page, sectionKey } = req.params;
        const section = await this.sectionService.getOrCreateSection(page, sectionKey);

        res.json({
            id: section.id,
            page: section.page,
            section_key: section.sectionKey,
            title: section.title,
            content: section.content,
            visible: section.visible,
            order: section.order
        });
    }

    /**
     * PUT /api/section/:page/:sectionKey
     *
     * Request body: { content, title? }
     * Response: { success, html, section_key }
     */
    async updateSection(req: Request, res: Response): Promise<void> {
        const { page, sectionKey } = req.params;
        const body = updateSectionSchema.parse(req.body);

        const section = await this.sectionService.updateSection(page, sectionKey, body.content, body.title);

        res.json({
            success: true,
            html: await this.sectionService.renderSection(section),
            section_key: sectionKey
        });
    }

    /**
     * POST /api/section
     *
     * Request body: { page, section_key, title?, content?, order? }
     * An existing pair is rejected with 400 by the service's DuplicateKeyError.
     * Response: { success, section: { id, page, section_key, title, html } }
     */
    async createSection(req: Request, res: Response): Promise<void> {
        const body = createSectionSchema.parse(req.body);
        if (!body.page || !body.section_key) {
            throw new ValidationError('page and section_key are required');
        }

        const section = await this.sectionService.createSection(
            body.page,
            body.section_key,
            body.title,
            body.content,
            body.order
        );

        res.json({
            success: true,
            section: {
                id: section.id,
                page: section.page,
                section_key: section.sectionKey,
                title: section.title,
                html: await this.sectionService.renderSection(section)
            }
        });
    }

    /**
     * DELETE /api/section/:sectionId
     */
    async deleteSection(req: Request, res: Response): Promise<void> {
        const deleted = await this.sectionService.deleteSection(parseIdParam(req.params.sectionId, 'Section'));
        if (!deleted) {
            throw new NotFoundError('Section not found');
        }

        res.json({ success: true });
    }

    /**
     * GET /api/sections/:page
     *
     * Stored sections only, in display order. Never seeds.
     */
    async listSections(req: Request, res: Response): Promise<void> {
        const sections = await this.sectionService.getPageSections(req.params.page);

        res.json({
            sections: [...sections.values()].map(section => ({
                id: section.id,
                section_key: section.sectionKey,
                title: section.title,
                order: section.order,
                visible: section.visible
            }))
        });
    }

    /**
     * POST /api/markdown
     *
     * Live preview for the inline editor.
     */
    async previewMarkdown(req: Request, res: Response): Promise<void> {
        const body = previewMarkdownSchema.parse(req.body);
        res.json({ html: await this.markdown.renderMarkdown(body.content) });
    }

    // ============================================================================
    // Public Endpoints
    // ============================================================================

    /**
     * GET /api/content/pages/:page/sections
     *
     * Every section of a page with rendered HTML, seeding catalog sections on
     * first view. Hidden sections are left out.
     */
    async getPublicSections(req: Request, res: Response): Promise<void> {
        const { page } = req.params;
        const sections = await this.sectionService.getSectionsForPage(page);

        const visible = [...sections.values()].filter(section => section.visible);
        const rendered = await Promise.all(
            visible.map(async section => ({
                id: section.id,
                section_key: section.sectionKey,
                title: section.title,
                html: await this.sectionService.renderSection(section),
                order: section.order
            }))
        );

        res.json({ page, sections: rendered });
    }
}
