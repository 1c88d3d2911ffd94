/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';
import type { z } from 'zod';

import type { ActorContext, ErrorCode, Result } from '../../types/index.js';
import { failure, success } from '../../types/index.js';
import { getErrorStatus } from '../types.js';

/**
 * Service error shape (matches Result pattern)
 */
interface ServiceError {
  code: ErrorCode;
  message: string;
  details?: unknown;
}

/**
 * Helper to get actor from context
 */
export function getActor(c: Context): ActorContext {
  return c.get('actor');
}

/**
 * Helper to get request ID from context
 */
export function getRequestId(c: Context): string {
  return c.get('requestId') || getActor(c).requestId;
}

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: ServiceError,
  requestId: string
): Response {
  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
        requestId,
      },
    },
    getErrorStatus(error.code)
  );
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 = 200
): Response {
  return c.json(
    {
      data,
      meta: { requestId },
    },
    status
  );
}

/**
 * Read and validate a JSON body. A missing or unparseable body is
 * validated as an empty object.
 */
export async function parseBody<T>(
  c: Context,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<Result<T>> {
  let rawBody: unknown;
  try {
    rawBody = await c.req.json();
  } catch {
    rawBody = {};
  }

  const validation = schema.safeParse(rawBody);
  if (!validation.success) {
    const issue = validation.error.issues[0];
    const field = issue !== undefined && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return failure(
      'VALIDATION_ERROR',
      `${field}${issue?.message ?? 'Invalid request body'}`
    );
  }

  return success(validation.data);
}
