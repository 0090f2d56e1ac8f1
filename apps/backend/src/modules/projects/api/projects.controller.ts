import type { Request, Response } from 'express';
import type { IMarkdownService, IProjectService } from '@portfolio/types';
import { parseIdParam } from '../../../api/params.js';
import { NotFoundError } from '../../../lib/errors.js';
import { createProjectSchema, listProjectsQuerySchema, updateProjectSchema } from './projects.schemas.js';
import { serializeProject, serializeProjectSummary } from './serializers.js';

/**
 * Portfolio project endpoints.
 */
export class ProjectsController {
    constructor(
        private readonly projectService: IProjectService,
        private readonly markdown: IMarkdownService
    ) {}

    // ============================================================================
    // Public Endpoints
    // ============================================================================

    /**
     * GET /api/content/projects
     *
     * Query: featured=true for the home page selection, limit.
     */
    async listPublicProjects(req: Request, res: Response): Promise<void> {
        const query = listProjectsQuerySchema.parse(req.query);
        const projects = await this.projectService.listProjects({
            featuredOnly: query.featured,
            limit: query.limit
        });
        res.json({ projects: projects.map(serializeProjectSummary) });
    }

    /**
     * GET /api/content/projects/:slug
     */
    async getPublicProject(req: Request, res: Response): Promise<void> {
        const project = await this.projectService.getProjectBySlug(req.params.slug);
        if (!project) {
            throw new NotFoundError('Project not found');
        }
        res.json({
            ...serializeProject(project),
            html: await this.markdown.renderMarkdown(project.description)
        });
    }

    // ============================================================================
    // Admin Endpoints
    // ============================================================================

    /**
     * GET /api/admin/projects
     */
    async listProjects(_req: Request, res: Response): Promise<void> {
        const projects = await this.projectService.listProjects();
        res.json({ projects: projects.map(serializeProject) });
    }

    /**
     * GET /api/admin/projects/:id
     */
    async getProject(req: Request, res: Response): Promise<void> {
        const project = await this.projectService.getProject(parseIdParam(req.params.id, 'Project'));
        if (!project) {
            throw new NotFoundError('Project not found');
        }
        res.json(serializeProject(project));
    }

    /**
     * POST /api/admin/projects
     *
     * Request body: { title, short_description, description, slug?, tech_stack?,
     * metrics?, github_url?, live_url?, featured?, order? }
     */
    async createProject(req: Request, res: Response): Promise<void> {
        const body = createProjectSchema.parse(req.body);
        const project = await this.projectService.createProject({
            title: body.title,
            shortDescription: body.short_description,
            description: body.description,
            slug: body.slug,
            techStack: body.tech_stack,
            metrics: body.metrics,
            githubUrl: body.github_url,
            liveUrl: body.live_url,
            featured: body.featured,
            order: body.order
        });
        res.status(201).json(serializeProject(project));
    }

    /**
     * PUT /api/admin/projects/:id
     *
     * Omitted fields keep their value; a blank URL clears the link.
     */
    async updateProject(req: Request, res: Response): Promise<void> {
        const id = parseIdParam(req.params.id, 'Project');
        const body = updateProjectSchema.parse(req.body);

        const project = await this.projectService.updateProject(id, {
            title: body.title,
            shortDescription: body.short_description,
            description: body.description,
            slug: body.slug,
            techStack: body.tech_stack,
            metrics: body.metrics,
            githubUrl: body.github_url,
            liveUrl: body.live_url,
            featured: body.featured,
            order: body.order
        });
        if (!project) {
            throw new NotFoundError('Project not found');
        }
        res.json(serializeProject(project));
    }

    /**
     * DELETE /api/admin/projects/:id
     */
    async deleteProject(req: Request, res: Response): Promise<void> {
        const deleted = await this.projectService.deleteProject(parseIdParam(req.params.id, 'Project'));
        if (!deleted) {
            throw new NotFoundError('Project not found');
        }
        res.json({ success: true });
    }
}
