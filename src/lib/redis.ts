/**
 * Upstash Redis Client Configuration
 * Backs the distributed per-subscription lock
 */

import { Redis } from '@upstash/redis';

export interface RedisConfig {
  url: string;
  token: string;
}

/**
 * Create a Redis client, or null when Redis is not configured
 */
export function createRedisClient(config: RedisConfig | null): Redis | null {
  if (config === null) {
    return null;
  }
  if (config.url === '' || config.token === '') {
    throw new Error('UPSTASH_REDIS_URL and UPSTASH_REDIS_TOKEN are required');
  }
  return new Redis({
    url: config.url,
    token: config.token,
  });
}
