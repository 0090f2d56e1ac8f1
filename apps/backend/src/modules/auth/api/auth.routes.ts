import { Router } from 'express';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import type { AuthController } from './auth.controller.js';

/**
 * Create the login router. Mounted at /api/admin; both routes are open.
 *
 * @param controller - Auth controller instance
 * @returns Express router with login and logout registered
 */
export function createAuthRouter(controller: AuthController): Router {
    const router = Router();

    router.post('/login', asyncHandler(controller.login.bind(controller)));
    router.post('/logout', asyncHandler(controller.logout.bind(controller)));

    return router;
}
