import pino from 'pino';
import { env } from '../config/env.js';

/**
 * Logger utilities for the portfolio backend.
 *
 * Every module logs through a child of the shared `logger` so entries carry a
 * `module` binding:
 *
 * ```typescript
 * import { logger } from './lib/logger.js';
 *
 * const sectionsLogger = logger.child({ module: 'sections' });
 * sectionsLogger.info({ page }, 'Seeded page sections');
 * ```
 */

/**
 * Resolve the log level from configuration.
 *
 * `LOG_LEVEL` wins when set. Otherwise tests are silent, production logs
 * `info` and above, and everything else logs `debug` and above.
 */
function resolveLevel(): pino.LevelWithSilent {
    if (env.LOG_LEVEL) {
        return env.LOG_LEVEL;
    }
    if (env.NODE_ENV === 'test') {
        return 'silent';
    }
    return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Creates a Pino logger instance with the standard backend configuration.
 *
 * Development and staging write through `pino-pretty` for colorized,
 * human-readable output. Production writes newline-delimited JSON to stdout
 * for the log collector. Tests get no transport at all, so no worker thread
 * outlives the run.
 *
 * @returns Configured Pino logger instance
 */
export function createLogger(): pino.Logger {
    const options: pino.LoggerOptions = {
        level: resolveLevel(),
        base: {
            service: 'portfolio-backend'
        }
    };

    if (env.NODE_ENV === 'production' || env.NODE_ENV === 'test') {
        return pino(options);
    }

    const transport = pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            singleLine: false,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
        }
    });

    return pino(options, transport);
}

/**
 * Application logger singleton.
 *
 * @example
 * import { logger } from './lib/logger.js';
 * logger.info({ port: 4000 }, 'Server listening');
 * logger.error({ error }, 'Failed to connect');
 */
export const logger = createLogger();
