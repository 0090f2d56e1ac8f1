import type { CookieOptions, Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import type { ILogger } from '@portfolio/types';
import { UnauthorizedError } from '../../../lib/errors.js';
import type { SessionService } from '../../../services/session/session.service.js';
import { SESSION_COOKIE } from '../../../services/session/session.service.js';

const loginSchema = z.object({
    username: z.string(),
    password: z.string()
});

/**
 * Admin login and logout.
 *
 * A successful login sets the signed session cookie that the admin guard
 * accepts alongside the static API token.
 */
export class AuthController {
    /**
     * @param sessions - Credential check and token encoding
     * @param secureCookies - Send the cookie over HTTPS only
     * @param logger - Module logger
     */
    constructor(
        private readonly sessions: SessionService,
        private readonly secureCookies: boolean,
        private readonly logger: ILogger
    ) {}

    /**
     * POST /api/admin/login
     *
     * Request body: { username, password }
     * Response: { success: true } with the session cookie, 401 on bad
     * credentials, 503 while no admin password is configured.
     */
    async login(req: Request, res: Response): Promise<void> {
        if (!this.sessions.isLoginEnabled()) {
            res.status(StatusCodes.SERVICE_UNAVAILABLE).json({
                success: false,
                error: 'Login is disabled: no admin password configured'
            });
            return;
        }

        const body = loginSchema.parse(req.body);
        if (!this.sessions.verifyCredentials(body.username, body.password)) {
            this.logger.warn({ username: body.username, requestId: req.id }, 'Rejected admin login');
            throw new UnauthorizedError('Invalid credentials');
        }

        res.cookie(SESSION_COOKIE, this.sessions.createToken(body.username), {
            ...this.cookieOptions(),
            maxAge: this.sessions.getMaxAgeMs(),
            signed: true
        });
        this.logger.info({ username: body.username }, 'Admin logged in');

        res.json({ success: true });
    }

    /**
     * POST /api/admin/logout
     */
    async logout(_req: Request, res: Response): Promise<void> {
        res.clearCookie(SESSION_COOKIE, this.cookieOptions());
        res.json({ success: true });
    }

    private cookieOptions(): CookieOptions {
        return {
            httpOnly: true,
            sameSite: 'lax',
            secure: this.secureCookies,
            path: '/'
        };
    }
}
