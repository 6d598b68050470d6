/**
 * app.ts
 * Express application wiring: security headers, CORS, rate limiting, identity,
 * response cache, then the API routes
 */

import cors from 'cors';
import express, { type Express } from 'express';
import helmet from 'helmet';

import type { AppContext } from './context.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { authenticate } from './middleware/identity.js';
import { createRateLimiter } from './middleware/rateLimiter.js';
import { createResponseCache } from './middleware/responseCache.js';
import { createApiRouter } from './routes/api.js';
import { logger } from './utils/logger.js';

export function createApp(context: AppContext): Express {
  const { config } = context;
  const app = express();

  if (config.trustProxy) {
    app.set('trust proxy', true);
  }

  // Security middleware - JSON API only, so the strict defaults apply
  app.use(
    helmet({
      crossOriginResourcePolicy: { policy: 'cross-origin' },
      hsts: false,
      referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    })
  );

  // CORS middleware
  const origins = config.security.corsOrigins;
  app.use(cors({ origin: origins.includes('*') ? '*' : origins }));

  // Body parsing middleware
  app.use(express.json({ limit: '10mb' }));

  // Request logging
  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.path}`);
    next();
  });

  // Rate limiting precedes authentication
  app.use(
    createRateLimiter(
      context.rateLimiter,
      {
        enabled: config.rateLimit.enabled,
        excludePaths: config.rateLimit.excludePaths,
        excludePrefixes: config.rateLimit.excludePrefixes,
      },
      context.clock
    )
  );

  app.use(
    authenticate({
      enabled: config.security.enableAuth,
      apiKeys: config.security.apiKeys,
      adminApiKeys: config.security.adminApiKeys,
      apiKeyUsers: config.security.apiKeyUsers,
      userIdHeader: config.security.userIdHeader,
      publicPaths: ['/api/health'],
    })
  );

  app.use(createResponseCache(context.cache, config.cache, context.clock));

  app.use('/api', createApiRouter(context));

  // 404 handler
  app.use(notFoundHandler);

  // Error handler
  app.use(errorHandler);

  return app;
}
