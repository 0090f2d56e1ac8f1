import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { SessionService } from '../../services/session/session.service.js';
import { SESSION_COOKIE } from '../../services/session/session.service.js';

export interface IAdminAuthOptions {
    /**
     * Static API token. Token authentication is off when unset.
     */
    adminToken?: string;

    /**
     * Decoder for the signed session cookie set by the login endpoint.
     */
    sessions: SessionService;
}

/**
 * Read the admin token from the request headers.
 *
 * Supported authentication methods:
 * - x-admin-token header (recommended)
 * - Authorization: Bearer {token} header
 *
 * Query parameter tokens are not read: URLs end up in access logs and
 * Referer headers.
 */
function readToken(req: Request): string | undefined {
    const xAdminToken = req.headers['x-admin-token'];
    const candidate = Array.isArray(xAdminToken) ? xAdminToken[0] : xAdminToken;
    if (candidate) {
        return candidate;
    }

    const authHeader = req.headers['authorization'];
    if (authHeader && authHeader.startsWith('Bearer ')) {
        return authHeader.substring(7);
    }

    return undefined;
}

/**
 * Create the admin authentication middleware.
 *
 * A request passes with either the configured admin token or a valid,
 * unexpired session cookie. Anything else gets 401 `{ error: 'Unauthorized' }`.
 *
 * @param options - Token and session decoder
 * @returns Express middleware guarding admin routes
 *
 * @example
 * const requireAdmin = createAdminAuth({ adminToken: env.ADMIN_API_TOKEN, sessions });
 * router.put('/section/:page/:sectionKey', requireAdmin, handler);
 */
export function createAdminAuth(options: IAdminAuthOptions): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const token = readToken(req);
        if (options.adminToken && token === options.adminToken) {
            next();
            return;
        }

        const signedCookies: Record<string, unknown> = req.signedCookies ?? {};
        if (options.sessions.verifyToken(signedCookies[SESSION_COOKIE])) {
            next();
            return;
        }

        res.status(401).json({ success: false, error: 'Unauthorized' });
    };
}
