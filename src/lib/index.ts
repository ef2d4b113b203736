/**
 * Shared Library Exports
 */

export { createSupabaseAdmin, UNIQUE_VIOLATION, NO_ROWS } from './supabase.js';
export {
  createRedisClient,
  createRedisLease,
  createMemoryLease,
} from './redis.js';
export type { JobLease, LeaseHandle } from './redis.js';
export { createLogger, getLogger } from './logger.js';
export type { Logger } from './logger.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
