/**
 * Content module implementation.
 *
 * Site settings, long-form pages and the resume, each with catalog defaults
 * and lazy persistence. Public reads mount at /api/content, management
 * endpoints at /api/admin.
 */

import type { Express, RequestHandler } from 'express';
import type {
    IContentCatalog,
    IDatabaseService,
    ILogger,
    IMarkdownService,
    IModule,
    IModuleMetadata
} from '@portfolio/types';
import { SettingsService } from './services/settings.service.js';
import { ContentPageService } from './services/content-page.service.js';
import { ResumeService } from './services/resume.service.js';
import { SettingsController } from './api/settings.controller.js';
import { PagesController } from './api/pages.controller.js';
import { ResumeController } from './api/resume.controller.js';
import { createContentAdminRouter, createPublicContentRouter } from './api/content.routes.js';
import type { IContentControllers } from './api/content.routes.js';

export interface IContentModuleDependencies {
    database: IDatabaseService;
    catalog: IContentCatalog;
    markdown: IMarkdownService;
    requireAdmin: RequestHandler;
    app: Express;
    logger: ILogger;
}

/**
 * Content module for settings, pages and resume blocks.
 *
 * ## Lifecycle
 *
 * ### init() phase:
 * - Instantiates the three services and their controllers
 *
 * ### run() phase:
 * - Ensures the unique indexes of `site_settings`, `pages` and `resume_sections`
 * - Mounts the public router at /api/content and the admin router at /api/admin
 */
export class ContentModule implements IModule<IContentModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'content',
        name: 'Content',
        version: '1.0.0',
        description: 'Site settings, long-form pages and resume blocks with catalog defaults'
    };

    private app!: Express;
    private requireAdmin!: RequestHandler;
    private logger!: ILogger;

    private settingsService!: SettingsService;
    private pageService!: ContentPageService;
    private resumeService!: ResumeService;
    private controllers!: IContentControllers;

    async init(dependencies: IContentModuleDependencies): Promise<void> {
        this.logger = dependencies.logger.child({ module: 'content' });
        this.logger.info('Initializing content module...');

        this.app = dependencies.app;
        this.requireAdmin = dependencies.requireAdmin;

        const { database, catalog, markdown } = dependencies;
        this.settingsService = new SettingsService(database, catalog, this.logger);
        this.pageService = new ContentPageService(database, catalog, this.logger);
        this.resumeService = new ResumeService(database, catalog, this.logger);

        this.controllers = {
            settings: new SettingsController(this.settingsService),
            pages: new PagesController(this.pageService, markdown),
            resume: new ResumeController(this.resumeService, markdown)
        };

        this.logger.info('Content module initialized');
    }

    async run(): Promise<void> {
        this.logger.info('Running content module...');

        await this.settingsService.ensureIndexes();
        await this.pageService.ensureIndexes();
        await this.resumeService.ensureIndexes();

        this.app.use('/api/content', createPublicContentRouter(this.controllers));
        this.app.use('/api/admin', createContentAdminRouter(this.controllers, this.requireAdmin));
        this.logger.info('Content routers mounted at /api/content and /api/admin');

        this.logger.info('Content module running');
    }

    /**
     * Settings service for other modules. Only valid after init().
     *
     * @throws {Error} If called before init() completes
     */
    getSettingsService(): SettingsService {
        if (!this.settingsService) {
            throw new Error('ContentModule not initialized - call init() first');
        }
        return this.settingsService;
    }
}
