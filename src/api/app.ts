/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as accessLogger } from 'hono/logger';

import { isRepositoryError } from '../types/index.js';
import type { Clock } from '../lib/clock.js';
import type { Logger } from '../lib/logger.js';

import {
  createAuthMiddleware,
  createPublicMiddleware,
} from './middleware/auth.js';
import { createAuthRoutes } from './routes/auth.js';
import { createHealthRoutes } from './routes/health.js';
import { createLicenseRoutes } from './routes/licenses.js';
import { createSubscriptionRoutes } from './routes/subscriptions.js';
import type { ApiServices } from './types.js';

/**
 * App configuration
 */
interface AppConfig {
  services: ApiServices;
  logger: Logger;
  storageDriver: 'supabase' | 'memory';
  allowedOrigins?: string[];
  clock?: Clock;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { services, logger, storageDriver, allowedOrigins } = config;
  const app = new Hono();

  // Global middleware
  app.use(
    '*',
    accessLogger((message: string) => {
      logger.info(message, { component: 'http' });
    })
  );
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Public routes (no auth)
  const publicMiddleware = createPublicMiddleware();
  app.use('/api/v1/health', publicMiddleware);
  app.use('/api/v1/licenses/*', publicMiddleware);
  app.use('/api/v1/auth/*', publicMiddleware);

  app.route(
    '/api/v1',
    createHealthRoutes({
      storageDriver,
      ...(config.clock !== undefined && { clock: config.clock }),
    })
  );
  app.route(
    '/api/v1',
    createLicenseRoutes({ licenseService: services.licenseService })
  );
  app.route(
    '/api/v1',
    createAuthRoutes({
      accessTokens: services.accessTokens,
      operatorApiKeyHash: services.operatorApiKeyHash,
      logger,
    })
  );

  // Operator routes
  const authMiddleware = createAuthMiddleware({
    accessTokens: services.accessTokens,
  });
  app.use('/api/v1/subscriptions/*', authMiddleware);
  app.use('/api/v1/subscriptions', authMiddleware);
  app.route(
    '/api/v1',
    createSubscriptionRoutes({
      subscriptionService: services.subscriptionService,
    })
  );

  // 404 handler
  app.notFound((c) => {
    const requestId = c.get('requestId') || 'unknown';

    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId,
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    const requestId = c.get('requestId') || 'unknown';
    const code = isRepositoryError(err) ? 'REPOSITORY_ERROR' : 'INTERNAL_ERROR';

    logger.error('Unhandled error', {
      requestId,
      method: c.req.method,
      path: c.req.path,
      code,
      error: err,
    });

    return c.json(
      {
        error: {
          code,
          message:
            code === 'REPOSITORY_ERROR'
              ? 'Storage is unavailable'
              : 'An unexpected error occurred',
          requestId,
        },
      },
      500
    );
  });

  return app;
}
