/**
 * Projects module implementation.
 *
 * Portfolio projects: public listing and detail pages, admin management.
 */

import type { Express, RequestHandler } from 'express';
import type { IDatabaseService, ILogger, IMarkdownService, IModule, IModuleMetadata } from '@portfolio/types';
import { ProjectService } from './services/project.service.js';
import { ProjectsController } from './api/projects.controller.js';
import { createProjectsAdminRouter, createPublicProjectsRouter } from './api/projects.routes.js';

export interface IProjectsModuleDependencies {
    database: IDatabaseService;
    markdown: IMarkdownService;
    requireAdmin: RequestHandler;
    app: Express;
    logger: ILogger;
}

/**
 * Projects module.
 *
 * init() builds the service and controller; run() ensures the `projects`
 * indexes and mounts the routers at /api/content and /api/admin.
 */
export class ProjectsModule implements IModule<IProjectsModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'projects',
        name: 'Projects',
        version: '1.0.0',
        description: 'Portfolio projects with featured selection and manual ordering'
    };

    private app!: Express;
    private requireAdmin!: RequestHandler;
    private logger!: ILogger;

    private projectService!: ProjectService;
    private controller!: ProjectsController;

    async init(dependencies: IProjectsModuleDependencies): Promise<void> {
        this.logger = dependencies.logger.child({ module: 'projects' });
        this.logger.info('Initializing projects module...');

        this.app = dependencies.app;
        this.requireAdmin = dependencies.requireAdmin;
        this.projectService = new ProjectService(dependencies.database, this.logger);
        this.controller = new ProjectsController(this.projectService, dependencies.markdown);

        this.logger.info('Projects module initialized');
    }

    async run(): Promise<void> {
        this.logger.info('Running projects module...');

        await this.projectService.ensureIndexes();

        this.app.use('/api/content', createPublicProjectsRouter(this.controller));
        this.app.use('/api/admin', createProjectsAdminRouter(this.controller, this.requireAdmin));

        this.logger.info('Projects module running');
    }
}
