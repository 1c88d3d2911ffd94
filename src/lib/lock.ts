/**
 * Keyed mutual exclusion
 *
 * Serializes read-modify-write units of work per subscription so a
 * device-slot check and the following insert cannot interleave.
 */

import { nanoid } from 'nanoid';

import { RepositoryError } from '../types/errors.js';

import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

export interface KeyedLock {
  withLock<T>(key: string, work: () => Promise<T>): Promise<T>;
}

/**
 * In-process lock: one promise chain per key.
 * Only serializes callers inside this process.
 */
export function createInProcessLock(): KeyedLock {
  const tails = new Map<string, Promise<void>>();

  return {
    async withLock<T>(key: string, work: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();

      let release: () => void = () => undefined;
      const current = new Promise<void>((resolve) => {
        release = resolve;
      });
      const tail = previous.then(() => current);
      tails.set(key, tail);

      await previous;
      try {
        return await work();
      } finally {
        release();
        if (tails.get(key) === tail) {
          tails.delete(key);
        }
      }
    },
  };
}

/**
 * The two Redis commands the lock needs; an Upstash client satisfies it
 */
export interface LockStore {
  set(
    key: string,
    value: string,
    opts: { nx: true; px: number }
  ): Promise<string | null>;
  eval(script: string, keys: string[], args: string[]): Promise<unknown>;
}

export interface RedisLockOptions {
  /** Lock lease; a crashed holder frees the key after this long */
  ttlMs?: number;
  retryDelayMs?: number;
  /** Give up acquiring after this long */
  maxWaitMs?: number;
  keyPrefix?: string;
  logger?: Logger;
}

const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Distributed lock on Upstash Redis (SET NX PX + compare-and-delete)
 */
export function createRedisLock(
  redis: LockStore,
  options: RedisLockOptions = {}
): KeyedLock {
  const ttlMs = options.ttlMs ?? 10_000;
  const retryDelayMs = options.retryDelayMs ?? 50;
  const maxWaitMs = options.maxWaitMs ?? 5_000;
  const keyPrefix = options.keyPrefix ?? 'licensing:lock:';
  const logger = options.logger ?? silentLogger;

  async function acquire(lockKey: string, owner: string): Promise<void> {
    const deadline = Date.now() + maxWaitMs;
    for (;;) {
      let acquired: string | null;
      try {
        acquired = await redis.set(lockKey, owner, { nx: true, px: ttlMs });
      } catch (err) {
        throw new RepositoryError('Failed to acquire subscription lock', {
          entity: 'lock',
          operation: 'acquire',
          cause: err,
        });
      }
      if (acquired === 'OK') return;
      if (Date.now() >= deadline) {
        throw new RepositoryError('Timed out waiting for subscription lock', {
          entity: 'lock',
          operation: 'acquire',
        });
      }
      await sleep(retryDelayMs);
    }
  }

  return {
    async withLock<T>(key: string, work: () => Promise<T>): Promise<T> {
      const lockKey = `${keyPrefix}${key}`;
      const owner = nanoid();
      await acquire(lockKey, owner);
      try {
        return await work();
      } finally {
        try {
          await redis.eval(RELEASE_SCRIPT, [lockKey], [owner]);
        } catch (err) {
          // The lease still expires after ttlMs
          logger.warn('Failed to release subscription lock', {
            lockKey,
            error: err,
          });
        }
      }
    },
  };
}
