/**
 * Auth Middleware
 * Constructs ActorContext from an operator access token
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

import type { ActorContext } from '../../types/index.js';
import type { AccessTokenAuthority } from '../../services/access-token.service.js';

/**
 * Auth middleware dependencies
 */
interface AuthMiddlewareDeps {
  accessTokens: AccessTokenAuthority;
}

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

function clientDetails(c: Context): Pick<ActorContext, 'ip' | 'userAgent'> {
  const ip = c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip');
  const userAgent = c.req.header('user-agent');
  return {
    ...(ip !== undefined && { ip }),
    ...(userAgent !== undefined && { userAgent }),
  };
}

/**
 * Create auth middleware for operator routes
 * Extracts the Bearer token, verifies it, constructs ActorContext
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const { accessTokens } = deps;

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    // 1. Extract token from Authorization header
    const authHeader = c.req.header('Authorization');
    const token =
      authHeader !== undefined && authHeader.startsWith('Bearer ')
        ? authHeader.slice(7).trim()
        : '';

    if (token === '') {
      return c.json(
        {
          error: {
            code: 'UNAUTHORIZED',
            message: 'Missing or invalid authorization header',
            requestId,
          },
        },
        401
      );
    }

    // 2. Verify signature, issuer, audience and expiry
    const verification = accessTokens.verify(token);
    if (!verification.valid) {
      return c.json(
        {
          error: {
            code: verification.error === 'token_expired' ? 'TOKEN_EXPIRED' : 'UNAUTHORIZED',
            message: verification.message,
            requestId,
          },
        },
        401
      );
    }

    // 3. Construct ActorContext
    const actor: ActorContext = {
      type: verification.claims.role,
      operatorId: verification.claims.subject,
      requestId,
      ...clientDetails(c),
    };

    // 4. Attach to context
    c.set('actor', actor);
    c.set('requestId', requestId);

    return next();
  };
}

/**
 * Create public middleware for routes that don't require auth
 * Creates an anonymous actor
 */
export function createPublicMiddleware() {
  return function publicMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    const actor: ActorContext = {
      type: 'anonymous',
      requestId,
      ...clientDetails(c),
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    return next();
  };
}
