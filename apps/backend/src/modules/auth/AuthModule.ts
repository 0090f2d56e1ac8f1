/**
 * Auth module implementation.
 *
 * Exposes admin login and logout. The session service itself is created at
 * bootstrap because the admin guard shared by every module needs it too.
 */

import type { Express } from 'express';
import type { ILogger, IModule, IModuleMetadata } from '@portfolio/types';
import type { SessionService } from '../../services/session/session.service.js';
import { AuthController } from './api/auth.controller.js';
import { createAuthRouter } from './api/auth.routes.js';

export interface IAuthModuleDependencies {
    sessions: SessionService;

    /**
     * Mark the session cookie `Secure`. On in production.
     */
    secureCookies: boolean;

    app: Express;
    logger: ILogger;
}

export class AuthModule implements IModule<IAuthModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'auth',
        name: 'Admin Auth',
        version: '1.0.0',
        description: 'Admin login and logout with a signed session cookie'
    };

    private app!: Express;
    private logger!: ILogger;
    private controller!: AuthController;

    async init(dependencies: IAuthModuleDependencies): Promise<void> {
        this.logger = dependencies.logger.child({ module: 'auth' });
        this.app = dependencies.app;
        this.controller = new AuthController(dependencies.sessions, dependencies.secureCookies, this.logger);

        if (!dependencies.sessions.isLoginEnabled()) {
            this.logger.warn('ADMIN_PASSWORD is not set; login is disabled and only the API token is accepted');
        }
        this.logger.info('Auth module initialized');
    }

    async run(): Promise<void> {
        this.app.use('/api/admin', createAuthRouter(this.controller));
        this.logger.info('Auth router mounted at /api/admin');
    }
}
