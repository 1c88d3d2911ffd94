/**
 * Licensing Engine Entry Point
 *
 * Loads configuration, wires storage and services, and starts the Hono
 * application. Any failure here is fatal.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import { ConfigError, loadConfig } from './lib/config.js';
import { createInProcessLock, createRedisLock } from './lib/lock.js';
import type { Logger } from './lib/logger.js';
import { createLogger } from './lib/logger.js';
import { createRedisClient } from './lib/redis.js';
import { createSupabaseAdmin } from './lib/supabase.js';
import type { LicenseRepository } from './services/index.js';
import {
  createAccessTokenAuthority,
  createInMemoryLicenseRepository,
  createLicenseRepositoryDb,
  createLicenseService,
  createLicenseTokenAuthority,
  createSubscriptionService,
  loadOrCreateKeyPair,
} from './services/index.js';
import type { AppConfig } from './lib/config.js';

function createRepository(config: AppConfig, logger: Logger): LicenseRepository {
  if (config.storage.driver === 'memory') {
    logger.warn('Using in-memory storage; data is lost on restart');
    return createInMemoryLicenseRepository();
  }

  const redis = createRedisClient(config.redis);
  const lock =
    redis === null
      ? createInProcessLock()
      : createRedisLock(redis, { logger: logger.child({ component: 'lock' }) });
  if (redis === null) {
    logger.warn('UPSTASH_REDIS_URL not set; subscription locks are process-local');
  }

  return createLicenseRepositoryDb(createSupabaseAdmin(config.storage), {
    lock,
    logger: logger.child({ component: 'repository' }),
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ service: 'licensing-engine', level: config.logLevel });

  const keys = await loadOrCreateKeyPair(config.licenseToken, logger);
  const repository = createRepository(config, logger);

  const tokens = createLicenseTokenAuthority({
    keys,
    issuer: config.licenseToken.issuer,
    audience: config.licenseToken.audience,
    ttlDays: config.licenseToken.ttlDays,
    logger: logger.child({ component: 'license-token' }),
  });

  const licenseService = createLicenseService({
    repository,
    tokens,
    licenseKeyPrefix: config.licenseKey.prefix,
    logger: logger.child({ component: 'license' }),
  });

  const subscriptionService = createSubscriptionService({
    repository,
    licenseKeyPrefix: config.licenseKey.prefix,
    licenseKeySegmentLength: config.licenseKey.segmentLength,
    defaultGracePeriodDays: config.subscriptions.defaultGracePeriodDays,
    maxDevicesPerSubscription: config.subscriptions.maxDevicesPerSubscription,
    logger: logger.child({ component: 'subscription' }),
  });

  const accessTokens = createAccessTokenAuthority(config.accessToken);

  const app = createApp({
    services: {
      licenseService,
      subscriptionService,
      accessTokens,
      operatorApiKeyHash: config.operatorApiKeyHash,
    },
    logger,
    storageDriver: config.storage.driver,
    allowedOrigins: config.allowedOrigins,
  });

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info('Server started', {
      port: info.port,
      env: config.env,
      storage: config.storage.driver,
    });
  });
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error('Fatal startup error:', err);
  }
  process.exit(1);
});
