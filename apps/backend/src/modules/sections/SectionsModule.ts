/**
 * Sections module implementation.
 *
 * Owns the inline-editable page sections: storage, catalog seeding, the admin
 * editing API and the public per-page listing.
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
import { SectionService } from './services/section.service.js';
import { SectionsController } from './api/sections.controller.js';
import { createPublicSectionsRouter, createSectionsRouter } from './api/sections.routes.js';

/**
 * Sections module dependencies for initialization.
 */
export interface ISectionsModuleDependencies {
    /**
     * Database service for the `sections` collection.
     */
    database: IDatabaseService;

    /**
     * Default titles, content and order for seeded sections.
     */
    catalog: IContentCatalog;

    markdown: IMarkdownService;

    /**
     * Guard for the editing routes.
     */
    requireAdmin: RequestHandler;

    /**
     * Express application instance; the module mounts its own routers.
     */
    app: Express;

    logger: ILogger;
}

/**
 * Sections module for inline page editing.
 *
 * ## Lifecycle
 *
 * ### init() phase:
 * - Stores injected dependencies
 * - Instantiates SectionService and SectionsController
 * - Does NOT touch the database or mount routes
 *
 * ### run() phase:
 * - Ensures the unique (page, sectionKey) and id indexes
 * - Mounts the editing router at /api and the public router at /api/content
 *
 * @example
 * ```typescript
 * const sectionsModule = new SectionsModule();
 * await sectionsModule.init({ database, catalog, markdown, requireAdmin, app, logger });
 * await sectionsModule.run();
 *
 * const sections = sectionsModule.getSectionService();
 * ```
 */
export class SectionsModule implements IModule<ISectionsModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'sections',
        name: 'Sections',
        version: '1.0.0',
        description: 'Inline-editable page sections seeded from the content catalog'
    };

    private app!: Express;
    private requireAdmin!: RequestHandler;
    private logger!: ILogger;

    private sectionService!: SectionService;
    private controller!: SectionsController;

    async init(dependencies: ISectionsModuleDependencies): Promise<void> {
        this.logger = dependencies.logger.child({ module: 'sections' });
        this.logger.info('Initializing sections module...');

        this.app = dependencies.app;
        this.requireAdmin = dependencies.requireAdmin;

        this.sectionService = new SectionService(
            dependencies.database,
            dependencies.catalog,
            dependencies.markdown,
            this.logger
        );
        this.controller = new SectionsController(this.sectionService, dependencies.markdown);

        this.logger.info('Sections module initialized');
    }

    async run(): Promise<void> {
        this.logger.info('Running sections module...');

        await this.sectionService.ensureIndexes();

        this.app.use('/api', createSectionsRouter(this.controller, this.requireAdmin));
        this.app.use('/api/content', createPublicSectionsRouter(this.controller));
        this.logger.info('Sections routers mounted at /api and /api/content');

        this.logger.info('Sections module running');
    }

    /**
     * Section service for other modules and tests. Only valid after init().
     *
     * @throws {Error} If called before init() completes
     */
    getSectionService(): SectionService {
        if (!this.sectionService) {
            throw new Error('SectionsModule not initialized - call init() first');
        }
        return this.sectionService;
    }
}
