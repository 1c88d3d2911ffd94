/**
 * Auth Routes
 * Exchanges the operator API key for a short-lived access token
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { AccessTokenAuthority } from '../../services/access-token.service.js';
import { verifyOperatorApiKey } from '../../services/access-token.service.js';
import type { Logger } from '../../lib/logger.js';
import {
  errorResponse,
  getRequestId,
  parseBody,
  successResponse,
} from '../utils/response.js';

const tokenRequestSchema = z.object({
  apiKey: z.string().min(1, 'apiKey is required'),
  operatorId: z.string().trim().min(1).max(128).default('operator'),
  role: z.enum(['admin', 'viewer']).default('admin'),
});

interface AuthRoutesDeps {
  accessTokens: AccessTokenAuthority;
  operatorApiKeyHash: string;
  logger: Logger;
}

/**
 * Create auth routes
 */
export function createAuthRoutes(deps: AuthRoutesDeps): Hono {
  const { accessTokens, operatorApiKeyHash, logger } = deps;
  const app = new Hono();

  /**
   * POST /auth/token
   * Issue an operator access token
   */
  app.post('/auth/token', async (c) => {
    const requestId = getRequestId(c);

    const body = await parseBody(c, tokenRequestSchema);
    if (!body.success) {
      return errorResponse(c, body.error, requestId);
    }

    const { apiKey, operatorId, role } = body.data;
    if (!verifyOperatorApiKey(apiKey, operatorApiKeyHash)) {
      logger.warn('Operator token request rejected', { requestId, operatorId });
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'Invalid API key' },
        requestId
      );
    }

    const issued = accessTokens.issue({ subject: operatorId, role });
    logger.info('Operator token issued', { requestId, operatorId, role });

    return successResponse(
      c,
      {
        accessToken: issued.token,
        tokenType: 'Bearer',
        expiresAt: issued.expiresAt.toISOString(),
      },
      requestId
    );
  });

  return app;
}
