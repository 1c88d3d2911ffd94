/**
 * Health Route
 * Public endpoint for liveness checks
 */

import { Hono } from 'hono';

import type { Clock } from '../../lib/clock.js';
import { systemClock } from '../../lib/clock.js';

interface HealthRoutesDeps {
  storageDriver: 'supabase' | 'memory';
  clock?: Clock;
}

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: HealthRoutesDeps): Hono {
  const clock = deps.clock ?? systemClock;
  const app = new Hono();

  /**
   * GET /health
   * No authentication required
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      service: 'licensing-engine',
      storage: deps.storageDriver,
      timestamp: clock().toISOString(),
      version: 'v1',
    });
  });

  return app;
}
