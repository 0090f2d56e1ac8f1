import { Router } from 'express';
import type { RequestHandler } from 'express';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import type { SectionsController } from './sections.controller.js';

/**
 * Create the inline-editing router.
 *
 * Every route requires admin authentication. Mounted at /api.
 *
 * @param controller - Sections controller instance
 * @param requireAdmin - Admin authentication middleware
 * @returns Express router with the editing endpoints registered
 */
export function createSectionsRouter(controller: SectionsController, requireAdmin: RequestHandler): Router {
    const router = Router();

    router.use(['/section', '/sections', '/markdown'], requireAdmin);

    router.get('/section/:page/:sectionKey', asyncHandler(controller.getSection.bind(controller)));
    router.put('/section/:page/:sectionKey', asyncHandler(controller.updateSection.bind(controller)));
    router.post('/section', asyncHandler(controller.createSection.bind(controller)));
    router.delete('/section/:sectionId', asyncHandler(controller.deleteSection.bind(controller)));

    router.get('/sections/:page', asyncHandler(controller.listSections.bind(controller)));

    router.post('/markdown', asyncHandler(controller.previewMarkdown.bind(controller)));

    return router;
}

/**
 * Create the public section router. Mounted at /api/content.
 *
 * @param controller - Sections controller instance
 * @returns Express router with the public endpoints registered
 */
export function createPublicSectionsRouter(controller: SectionsController): Router {
    const router = Router();

    /**
     * GET /api/content/pages/:page/sections
     */
    router.get('/pages/:page/sections', asyncHandler(controller.getPublicSections.bind(controller)));

    return router;
}
