import { Router } from 'express';
import type { RequestHandler } from 'express';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import type { PagesController } from './pages.controller.js';
import type { ResumeController } from './resume.controller.js';
import type { SettingsController } from './settings.controller.js';

export interface IContentControllers {
    settings: SettingsController;
    pages: PagesController;
    resume: ResumeController;
}

/**
 * Create the public content router. Mounted at /api/content.
 *
 * @param controllers - Content controller instances
 * @returns Express router with the read-only endpoints registered
 */
export function createPublicContentRouter(controllers: IContentControllers): Router {
    const router = Router();
    const { settings, pages, resume } = controllers;

    router.get('/settings', asyncHandler(settings.getSettings.bind(settings)));
    router.get('/resume', asyncHandler(resume.getPublicResume.bind(resume)));
    router.get('/pages/:slug', asyncHandler(pages.getPublicPage.bind(pages)));

    return router;
}

/**
 * Create the content admin router. Mounted at /api/admin behind the admin
 * guard.
 *
 * @param controllers - Content controller instances
 * @param requireAdmin - Admin authentication middleware
 * @returns Express router with settings, page and resume management endpoints
 */
export function createContentAdminRouter(controllers: IContentControllers, requireAdmin: RequestHandler): Router {
    const router = Router();
    const { settings, pages, resume } = controllers;

    router.use(['/settings', '/pages', '/resume'], requireAdmin);

    // ============================================================================
    // Settings Routes
    // ============================================================================

    router.get('/settings', asyncHandler(settings.getSettings.bind(settings)));
    router.put('/settings', asyncHandler(settings.updateSettings.bind(settings)));

    // ============================================================================
    // Page Routes
    // ============================================================================

    router.get('/pages', asyncHandler(pages.listPages.bind(pages)));
    router.get('/pages/:slug', asyncHandler(pages.getPage.bind(pages)));
    router.put('/pages/:slug', asyncHandler(pages.updatePage.bind(pages)));

    // ============================================================================
    // Resume Routes
    // ============================================================================

    router.get('/resume', asyncHandler(resume.listSections.bind(resume)));
    router.post('/resume', asyncHandler(resume.createSection.bind(resume)));
    router.put('/resume/:id', asyncHandler(resume.updateSection.bind(resume)));
    router.delete('/resume/:id', asyncHandler(resume.deleteSection.bind(resume)));

    return router;
}
