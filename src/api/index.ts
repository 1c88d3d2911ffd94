/**
 * API Layer Exports
 *
 * API layer is thin - delegates to services for all business logic.
 */

export { createApp } from './app.js';
export type { ApiServices, SuccessResponse, ErrorResponse } from './types.js';
export { ERROR_STATUS_MAP, getErrorStatus } from './types.js';
