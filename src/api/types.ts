/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ContentfulStatusCode } from 'hono/utils/http-status';

import type { ActorContext, ErrorCode } from '../types/index.js';
import type { AccessTokenAuthority } from '../services/access-token.service.js';
import type { LicenseService } from '../services/license.service.js';
import type { SubscriptionService } from '../services/subscription.service.js';

/**
 * Extended Hono context with actor
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, ContentfulStatusCode> = {
  LICENSE_KEY_INVALID: 400,
  SUBSCRIPTION_EXPIRED: 410,
  SUBSCRIPTION_INACTIVE: 403,
  DEVICE_LIMIT_EXCEEDED: 409,
  DEVICE_NOT_FOUND: 404,
  SUBSCRIPTION_NOT_FOUND: 404,
  REPOSITORY_ERROR: 500,
  TOKEN_EXPIRED: 401,
  TOKEN_INVALID: 401,
  VALIDATION_ERROR: 400,
  INVALID_STATE: 400,
  UNAUTHORIZED: 401,
  PERMISSION_DENIED: 403,
  NOT_FOUND: 404,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: ErrorCode): ContentfulStatusCode {
  return ERROR_STATUS_MAP[code];
}

/**
 * Services the HTTP layer depends on
 */
export interface ApiServices {
  licenseService: LicenseService;
  subscriptionService: SubscriptionService;
  accessTokens: AccessTokenAuthority;
  /** SHA-256 hex digest of the operator API key */
  operatorApiKeyHash: string;
}
