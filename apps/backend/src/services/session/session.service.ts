import { timingSafeEqual } from 'crypto';

/**
 * Name of the signed cookie carrying the admin session.
 */
export const SESSION_COOKIE = 'session';

/**
 * Decoded admin session.
 */
export interface IAdminSession {
    username: string;

    /**
     * Expiry as epoch milliseconds.
     */
    expiresAt: number;
}

export interface ISessionServiceOptions {
    username: string;

    /**
     * Login is disabled while no password is configured.
     */
    password?: string;

    maxAgeSeconds: number;

    /**
     * Clock source, replaceable in tests.
     */
    now?: () => number;
}

/**
 * Compare two strings in constant time with respect to their content.
 */
function safeEqual(a: string, b: string): boolean {
    const left = Buffer.from(a, 'utf8');
    const right = Buffer.from(b, 'utf8');
    if (left.length !== right.length) {
        return false;
    }
    return timingSafeEqual(left, right);
}

/**
 * Admin credential check and session token encoding.
 *
 * The token is `<username>|<expiresAt>`. It travels in a cookie signed by
 * cookie-parser with `SESSION_SECRET`, so a token read back through
 * `req.signedCookies` has already passed the signature check; this service
 * only decodes it and enforces expiry.
 */
export class SessionService {
    private readonly now: () => number;

    constructor(private readonly options: ISessionServiceOptions) {
        this.now = options.now ?? Date.now;
    }

    /**
     * Whether a password is configured at all.
     */
    isLoginEnabled(): boolean {
        return Boolean(this.options.password);
    }

    /**
     * Check submitted credentials against the configured admin account.
     */
    verifyCredentials(username: string, password: string): boolean {
        if (!this.options.password) {
            return false;
        }
        const userMatches = safeEqual(username, this.options.username);
        const passwordMatches = safeEqual(password, this.options.password);
        return userMatches && passwordMatches;
    }

    /**
     * Session lifetime in milliseconds, used for the cookie `maxAge`.
     */
    getMaxAgeMs(): number {
        return this.options.maxAgeSeconds * 1000;
    }

    /**
     * Encode a fresh session for `username`.
     */
    createToken(username: string): string {
        return `${username}|${this.now() + this.getMaxAgeMs()}`;
    }

    /**
     * Decode a token read from the signed cookie.
     *
     * cookie-parser yields `false` for a cookie whose signature does not match
     * and `undefined` for a missing one; both decode to null, as do malformed
     * and expired tokens.
     *
     * @param value - Raw `req.signedCookies.session` value
     * @returns The session, or null when it is absent, malformed or expired
     */
    verifyToken(value: unknown): IAdminSession | null {
        if (typeof value !== 'string') {
            return null;
        }

        const separator = value.lastIndexOf('|');
        if (separator <= 0) {
            return null;
        }

        const username = value.slice(0, separator);
        const expiresAt = Number(value.slice(separator + 1));
        if (!Number.isFinite(expiresAt) || expiresAt <= this.now()) {
            return null;
        }

        return { username, expiresAt };
    }
}
