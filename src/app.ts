import express, { Application } from 'express';
import cors, { CorsOptions } from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import hpp from 'hpp';
import { env } from './config';
import type { AppContainer } from './container';
import { errorHandler, notFound, requestLogger } from './middlewares';
import { createRoutes } from './routes';
import { sendError } from './utils';

const BODY_LIMIT = '1mb';

// Requests without an Origin header (curl, provider webhooks) are always allowed
const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    const allowed = !origin || env.CORS_ORIGIN.includes('*') || env.CORS_ORIGIN.includes(origin);
    callback(null, allowed);
  },
  credentials: true,
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept'],
};

const rateLimiter = () =>
  rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX_REQUESTS,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => {
      sendError(res, 'Too many requests, please try again later', 429, { code: 'RATE_LIMITED' });
    },
  });

/**
 * Builds the HTTP app around an already-constructed container.
 * Tests pass an in-memory container; `src/index.ts` passes the real one.
 */
export const createApp = (container: AppContainer): Application => {
  const app = express();

  app.use(helmet(), hpp(), cors(corsOptions), rateLimiter());
  app.use(express.json({ limit: BODY_LIMIT }), express.urlencoded({ extended: true, limit: BODY_LIMIT }));
  app.use(compression(), requestLogger);

  app.use(env.API_PREFIX, createRoutes(container));

  app.get('/', (_req, res) => {
    res.json({
      success: true,
      message: 'Intercompany Reconciliation API',
      version: '1.0.0',
      health: `${env.API_PREFIX}/health`,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(notFound, errorHandler);

  return app;
};

export default createApp;
