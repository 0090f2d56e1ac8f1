import { Router } from 'express';
import type { RequestHandler } from 'express';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import type { ProjectsController } from './projects.controller.js';

/**
 * Create the public projects router. Mounted at /api/content.
 */
export function createPublicProjectsRouter(projects: ProjectsController): Router {
    const router = Router();

    router.get('/projects', asyncHandler(projects.listPublicProjects.bind(projects)));
    router.get('/projects/:slug', asyncHandler(projects.getPublicProject.bind(projects)));

    return router;
}

/**
 * Create the projects admin router. Mounted at /api/admin behind the admin
 * guard.
 *
 * @param projects - Projects controller
 * @param requireAdmin - Admin authentication middleware
 * @returns Express router with project management endpoints
 */
export function createProjectsAdminRouter(projects: ProjectsController, requireAdmin: RequestHandler): Router {
    const router = Router();

    router.use('/projects', requireAdmin);

    router.get('/projects', asyncHandler(projects.listProjects.bind(projects)));
    router.post('/projects', asyncHandler(projects.createProject.bind(projects)));
    router.get('/projects/:id', asyncHandler(projects.getProject.bind(projects)));
    router.put('/projects/:id', asyncHandler(projects.updateProject.bind(projects)));
    router.delete('/projects/:id', asyncHandler(projects.deleteProject.bind(projects)));

    return router;
}
