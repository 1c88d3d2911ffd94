/**
 * Subscription Routes
 * Operator endpoints for subscription administration
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import type { Result, SubscriptionView } from '../../types/index.js';
import { SUBSCRIPTION_TIERS } from '../../types/index.js';
import type { SubscriptionService } from '../../services/subscription.service.js';
import {
  presentAnalytics,
  presentExpiring,
  presentSubscription,
} from '../utils/present.js';
import {
  errorResponse,
  getActor,
  getRequestId,
  parseBody,
  successResponse,
} from '../utils/response.js';

const featureMapSchema = z.record(z.union([z.boolean(), z.number()]));

const createSubscriptionSchema = z.object({
  customerId: z.string().trim().min(1, 'customerId is required'),
  tier: z.enum(SUBSCRIPTION_TIERS),
  durationDays: z.number().int().positive().optional(),
  maxDevices: z.number().int().min(1).optional(),
  features: featureMapSchema.optional(),
  gracePeriodDays: z.number().int().min(0).max(90).optional(),
  startsAt: z.string().datetime({ offset: true }).optional(),
  autoRenew: z.boolean().optional(),
  metadata: z.record(z.unknown()).optional(),
  status: z.enum(['pending', 'active']).optional(),
});

const extendSchema = z.object({
  days: z.number().int().positive('days must be positive'),
});

const updateTierSchema = z.object({
  tier: z.enum(SUBSCRIPTION_TIERS),
  features: featureMapSchema.optional(),
});

const expiringQuerySchema = z.object({
  days: z.coerce.number().int().positive().max(365).default(7),
});

interface SubscriptionRoutesDeps {
  subscriptionService: SubscriptionService;
}

/**
 * Create subscription routes
 */
export function createSubscriptionRoutes(deps: SubscriptionRoutesDeps): Hono {
  const { subscriptionService } = deps;
  const app = new Hono();

  function respond(
    c: Context,
    result: Result<SubscriptionView>,
    requestId: string,
    status: 200 | 201 = 200
  ): Response {
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, presentSubscription(result.data), requestId, status);
  }

  /**
   * POST /subscriptions
   * Create a subscription with a freshly generated license key
   */
  app.post('/subscriptions', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const body = await parseBody(c, createSubscriptionSchema);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const { startsAt, ...params } = body.data;
    const result = await subscriptionService.createSubscription(actor, {
      ...params,
      ...(startsAt !== undefined && { startsAt: new Date(startsAt) }),
    });
    return respond(c, result, requestId, 201);
  });

  /**
   * GET /subscriptions/expiring?days=7
   */
  app.get('/subscriptions/expiring', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const query = expiringQuerySchema.safeParse({ days: c.req.query('days') });
    if (!query.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: query.error.issues[0]?.message ?? 'Invalid days parameter',
        },
        requestId
      );
    }

    const result = await subscriptionService.listExpiringSubscriptions(
      actor,
      query.data.days
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data.map(presentExpiring), requestId);
  });

  /**
   * GET /subscriptions/by-key/:licenseKey
   */
  app.get('/subscriptions/by-key/:licenseKey', async (c) => {
    const result = await subscriptionService.getSubscriptionByLicenseKey(
      getActor(c),
      c.req.param('licenseKey')
    );
    return respond(c, result, getRequestId(c));
  });

  /**
   * GET /subscriptions/:id
   */
  app.get('/subscriptions/:id', async (c) => {
    const result = await subscriptionService.getSubscription(
      getActor(c),
      c.req.param('id')
    );
    return respond(c, result, getRequestId(c));
  });

  /**
   * GET /subscriptions/:id/analytics
   */
  app.get('/subscriptions/:id/analytics', async (c) => {
    const requestId = getRequestId(c);
    const result = await subscriptionService.getSubscriptionAnalytics(
      getActor(c),
      c.req.param('id')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, presentAnalytics(result.data), requestId);
  });

  /**
   * PUT /subscriptions/:id/{activate,suspend,cancel,resume}
   */
  app.put('/subscriptions/:id/activate', async (c) => {
    const result = await subscriptionService.activateSubscription(
      getActor(c),
      c.req.param('id')
    );
    return respond(c, result, getRequestId(c));
  });

  app.put('/subscriptions/:id/suspend', async (c) => {
    const result = await subscriptionService.suspendSubscription(
      getActor(c),
      c.req.param('id')
    );
    return respond(c, result, getRequestId(c));
  });

  app.put('/subscriptions/:id/cancel', async (c) => {
    const result = await subscriptionService.cancelSubscription(
      getActor(c),
      c.req.param('id')
    );
    return respond(c, result, getRequestId(c));
  });

  app.put('/subscriptions/:id/resume', async (c) => {
    const result = await subscriptionService.resumeSubscription(
      getActor(c),
      c.req.param('id')
    );
    return respond(c, result, getRequestId(c));
  });

  /**
   * PUT /subscriptions/:id/extend
   */
  app.put('/subscriptions/:id/extend', async (c) => {
    const requestId = getRequestId(c);

    const body = await parseBody(c, extendSchema);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const result = await subscriptionService.extendSubscription(
      getActor(c),
      c.req.param('id'),
      body.data.days
    );
    return respond(c, result, requestId);
  });

  /**
   * PUT /subscriptions/:id/tier
   */
  app.put('/subscriptions/:id/tier', async (c) => {
    const requestId = getRequestId(c);

    const body = await parseBody(c, updateTierSchema);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const result = await subscriptionService.updateSubscriptionTier(
      getActor(c),
      c.req.param('id'),
      body.data
    );
    return respond(c, result, requestId);
  });

  return app;
}
