/**
 * @fileoverview Application entry point with two-phase lifecycle.
 *
 * Orchestrates startup using a strict init/run separation. Every module
 * completes init() before any starts run(), so a misconfigured module fails
 * the process before a single route is mounted.
 *
 * @module index
 */

import http from 'node:http';
import type { Express } from 'express';
import { env } from './config/env.js';
import { createExpressApp, mountErrorHandler } from './loaders/express.js';
import { connectDatabase, disconnectDatabase } from './loaders/database.js';
import { logger } from './lib/logger.js';
import { DatabaseService } from './services/database/database.service.js';
import { DefaultContentCatalog, DEFAULT_CATALOG_DIR } from './services/catalog/default-content-catalog.js';
import { MarkdownService } from './services/markdown/markdown.service.js';
import { SessionService } from './services/session/session.service.js';
import { createAdminAuth } from './api/middleware/admin-auth.js';
import { AuthModule } from './modules/auth/index.js';
import { SectionsModule } from './modules/sections/index.js';
import { ContentModule } from './modules/content/index.js';
import { BlogModule } from './modules/blog/index.js';
import { ProjectsModule } from './modules/projects/index.js';
import { MessagesModule } from './modules/messages/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Main application entry point.
 *
 * Executes the startup sequence (infrastructure, modules, server) and
 * registers signal handlers for graceful shutdown.
 *
 * @throws Logs error and exits with code 1 if bootstrap fails
 */
async function bootstrap(): Promise<void> {
    try {
        const ctx = await bootstrapInit();
        await bootstrapRun(ctx);

        ctx.server.listen(env.PORT, () => {
            logger.info({ port: env.PORT }, 'Server listening');
        });

        const shutdown = (signal: NodeJS.Signals) => {
            logger.info({ signal }, 'Shutting down');
            ctx.server.close(() => {
                disconnectDatabase()
                    .then(() => process.exit(0))
                    .catch(error => {
                        logger.error({ error }, 'Failed to close database connection');
                        process.exit(1);
                    });
            });
        };

        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
    } catch (error) {
        logger.error({ error }, 'Failed to bootstrap application');
        process.exit(1);
    }
}

void bootstrap();

// ─────────────────────────────────────────────────────────────────────────────
// Two-Phase Lifecycle
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Components created during init and consumed during run.
 */
interface BootstrapContext {
    app: Express;
    server: http.Server;
    modules: {
        auth: AuthModule;
        sections: SectionsModule;
        content: ContentModule;
        blog: BlogModule;
        projects: ProjectsModule;
        messages: MessagesModule;
    };
}

/**
 * Init Phase: connect infrastructure, build shared services, init modules.
 *
 * Nothing here mounts routes. The catalog is loaded and validated up front,
 * so a broken catalog file stops the process before it starts listening.
 *
 * @returns Context holding the app, server and initialized modules
 */
async function bootstrapInit(): Promise<BootstrapContext> {
    const client = await connectDatabase();
    const database = new DatabaseService(client.db(), logger.child({ module: 'database' }));

    const catalogDir = env.CATALOG_DIR ?? DEFAULT_CATALOG_DIR;
    const catalog = await DefaultContentCatalog.load(catalogDir);
    logger.info({ catalogDir }, 'Content catalog loaded');

    const markdown = new MarkdownService();
    const sessions = new SessionService({
        username: env.ADMIN_USERNAME,
        password: env.ADMIN_PASSWORD,
        maxAgeSeconds: env.SESSION_MAX_AGE_SECONDS
    });
    const requireAdmin = createAdminAuth({ adminToken: env.ADMIN_API_TOKEN, sessions });

    const app = createExpressApp();
    const server = http.createServer(app);

    const authModule = new AuthModule();
    const sectionsModule = new SectionsModule();
    const contentModule = new ContentModule();
    const blogModule = new BlogModule();
    const projectsModule = new ProjectsModule();
    const messagesModule = new MessagesModule();

    await authModule.init({
        sessions,
        secureCookies: env.NODE_ENV === 'production',
        app,
        logger
    });
    await sectionsModule.init({ database, catalog, markdown, requireAdmin, app, logger });
    await contentModule.init({ database, catalog, markdown, requireAdmin, app, logger });
    await blogModule.init({ database, markdown, requireAdmin, app, logger });
    await projectsModule.init({ database, markdown, requireAdmin, app, logger });
    await messagesModule.init({ database, requireAdmin, app, logger });

    return {
        app,
        server,
        modules: {
            auth: authModule,
            sections: sectionsModule,
            content: contentModule,
            blog: blogModule,
            projects: projectsModule,
            messages: messagesModule
        }
    };
}

/**
 * Run Phase: ensure indexes and mount routes.
 *
 * The error handler goes last so it sees errors from every module router.
 *
 * @param ctx - Bootstrap context from the init phase
 */
async function bootstrapRun(ctx: BootstrapContext): Promise<void> {
    const { modules } = ctx;

    await modules.auth.run();
    await modules.sections.run();
    await modules.content.run();
    await modules.blog.run();
    await modules.projects.run();
    await modules.messages.run();

    mountErrorHandler(ctx.app);
    logger.info({}, 'All modules initialized');
}
