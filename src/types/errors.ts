/**
 * Error codes shared by the service and API layers
 */

export const ERROR_CODES = [
  'LICENSE_KEY_INVALID',
  'SUBSCRIPTION_EXPIRED',
  'SUBSCRIPTION_INACTIVE',
  'DEVICE_LIMIT_EXCEEDED',
  'DEVICE_NOT_FOUND',
  'SUBSCRIPTION_NOT_FOUND',
  'REPOSITORY_ERROR',
  'TOKEN_EXPIRED',
  'TOKEN_INVALID',
  'VALIDATION_ERROR',
  'INVALID_STATE',
  'UNAUTHORIZED',
  'PERMISSION_DENIED',
  'NOT_FOUND',
  'INTERNAL_ERROR',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

/**
 * Opaque storage failure.
 * Repository adapters wrap every driver error in this type so the core
 * never depends on storage-specific errors.
 */
export class RepositoryError extends Error {
  readonly code = 'REPOSITORY_ERROR' as const;
  readonly entity: string | undefined;
  readonly operation: string | undefined;

  constructor(
    message: string,
    options: { entity?: string; operation?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'RepositoryError';
    this.entity = options.entity;
    this.operation = options.operation;
  }
}

export function isRepositoryError(err: unknown): err is RepositoryError {
  return err instanceof RepositoryError;
}
