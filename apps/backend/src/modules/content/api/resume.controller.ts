import type { Request, Response } from 'express';
import type { IMarkdownService, IResumeSection, IResumeService } from '@portfolio/types';
import { parseIdParam } from '../../../api/params.js';
import { NotFoundError } from '../../../lib/errors.js';
import { parseStructuredContent } from '../services/resume.service.js';
import { createResumeSectionSchema, updateResumeSectionSchema } from './content.schemas.js';

function serializeSection(section: IResumeSection) {
    return {
        id: section.id,
        section_type: section.sectionType,
        title: section.title,
        content: section.content,
        order: section.order,
        visible: section.visible,
        updated_at: section.updatedAt
    };
}

/**
 * Resume endpoints.
 */
export class ResumeController {
    constructor(
        private readonly resumeService: IResumeService,
        private readonly markdown: IMarkdownService
    ) {}

    /**
     * GET /api/content/resume
     *
     * Visible blocks in order. Structured blocks come back parsed under
     * `data`; prose blocks come back rendered under `html`.
     */
    async getPublicResume(_req: Request, res: Response): Promise<void> {
        const sections = await this.resumeService.listSections({ visibleOnly: true });

        const rendered = await Promise.all(
            sections.map(async section => {
                const base = {
                    id: section.id,
                    section_type: section.sectionType,
                    title: section.title,
                    order: section.order
                };
                const data = parseStructuredContent(section.content);
                if (data) {
                    return { ...base, data };
                }
                return { ...base, html: await this.markdown.renderMarkdown(section.content) };
            })
        );

        res.json({ sections: rendered });
    }

    /**
     * GET /api/admin/resume
     */
    async listSections(_req: Request, res: Response): Promise<void> {
        const sections = await this.resumeService.listSections();
        res.json({ sections: sections.map(serializeSection) });
    }

    /**
     * POST /api/admin/resume
     */
    async createSection(req: Request, res: Response): Promise<void> {
        const body = createResumeSectionSchema.parse(req.body);
        const section = await this.resumeService.createSection({
            sectionType: body.section_type,
            title: body.title,
            content: body.content,
            order: body.order,
            visible: body.visible
        });
        res.status(201).json(serializeSection(section));
    }

    /**
     * PUT /api/admin/resume/:id
     */
    async updateSection(req: Request, res: Response): Promise<void> {
        const id = parseIdParam(req.params.id, 'Resume section');
        const body = updateResumeSectionSchema.parse(req.body);

        const section = await this.resumeService.updateSection(id, {
            sectionType: body.section_type,
            title: body.title,
            content: body.content,
            order: body.order,
            visible: body.visible
        });
        if (!section) {
            throw new NotFoundError('Resume section not found');
        }

        res.json(serializeSection(section));
    }

    /**
     * DELETE /api/admin/resume/:id
     */
    async deleteSection(req: Request, res: Response): Promise<void> {
        const deleted = await this.resumeService.deleteSection(parseIdParam(req.params.id, 'Resume section'));
        if (!deleted) {
            throw new NotFoundError('Resume section not found');
        }
        res.json({ success: true });
    }
}
