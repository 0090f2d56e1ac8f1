import compression from 'compression';
import cookieParser from 'cookie-parser';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import type { Express } from 'express';
import { requestContext } from '../api/middleware/request-context.js';
import { errorHandler } from '../api/middleware/error-handler.js';
import { env } from '../config/env.js';

/**
 * Origins allowed to call the API with credentials.
 */
function buildAllowedOrigins(): string[] {
  const allowedOrigins: string[] = [
    'http://localhost:3000',
    'http://localhost:4000'
  ];

  if (env.SITE_URL) {
    allowedOrigins.push(env.SITE_URL);

    // www variant for production domains
    if (env.SITE_URL.startsWith('https://') && !env.SITE_URL.includes('www.')) {
      allowedOrigins.push(env.SITE_URL.replace('https://', 'https://www.'));
    }
  }

  return allowedOrigins;
}

/**
 * Build the Express application with the shared middleware stack.
 *
 * Feature routers are mounted by the modules during their run phase, so the
 * error handler is not installed here; call {@link mountErrorHandler} once
 * every module has run.
 */
export function createExpressApp(): Express {
  const app = express();
  const allowedOrigins = buildAllowedOrigins();

  app.set('trust proxy', true);
  app.use(requestContext);
  app.use(helmet());

  app.use(cors({
    origin: (origin, callback) => {
      // Requests with no origin (curl, server-side fetches)
      if (!origin) return callback(null, true);

      if (allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error('CORS policy: Origin not allowed'));
      }
    },
    credentials: true
  }));

  app.use(compression());
  // The secret signs the admin session cookie
  app.use(cookieParser(env.SESSION_SECRET));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));
  if (env.NODE_ENV !== 'test') {
    app.use(morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev'));
  }

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  return app;
}

/**
 * Install the JSON error handler. Must come after every router.
 */
export function mountErrorHandler(app: Express): void {
  app.use(errorHandler);
}
