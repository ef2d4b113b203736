/**
 * API Layer Exports
 *
 * API layer is thin - delegates to services for all business logic.
 */

export { createApp } from './app.js';
export type { ApiServices } from './types.js';
export type { HealthCheck } from './routes/health.js';
export { ERROR_STATUS_MAP, getErrorStatus } from './types.js';
