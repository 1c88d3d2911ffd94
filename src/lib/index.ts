/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { createSupabaseAdmin } from './supabase.js';
export type { SupabaseConfig } from './supabase.js';
export { createRedisClient } from './redis.js';
export type { RedisConfig } from './redis.js';
export { createInProcessLock, createRedisLock } from './lock.js';
export type { KeyedLock, LockStore, RedisLockOptions } from './lock.js';
export { createLogger, silentLogger, isLogLevel } from './logger.js';
export type { Logger, LogLevel, LogFields, LogSink } from './logger.js';
export { loadConfig, ConfigError } from './config.js';
export type { AppConfig, Env } from './config.js';
export {
  systemClock,
  fixedClock,
  addDays,
  toEpochSeconds,
  fromEpochSeconds,
  MS_PER_DAY,
} from './clock.js';
export type { Clock } from './clock.js';
