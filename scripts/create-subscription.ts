/**
 * Create a subscription from the command line
 * Uses the configured storage driver and prints the license key
 *
 * Run: npx tsx scripts/create-subscription.ts <customerId> [tier] [durationDays] [maxDevices]
 */

import 'dotenv/config';

import { loadConfig } from '../src/lib/config.js';
import { createInProcessLock, createRedisLock } from '../src/lib/lock.js';
import { createLogger } from '../src/lib/logger.js';
import { createRedisClient } from '../src/lib/redis.js';
import { createSupabaseAdmin } from '../src/lib/supabase.js';
import type { LicenseRepository } from '../src/services/index.js';
import {
  createInMemoryLicenseRepository,
  createLicenseRepositoryDb,
  createSubscriptionService,
} from '../src/services/index.js';
import type { SubscriptionTier } from '../src/types/index.js';
import { SUBSCRIPTION_TIERS, SYSTEM_ACTOR } from '../src/types/index.js';

function isTier(value: string): value is SubscriptionTier {
  return SUBSCRIPTION_TIERS.some((tier) => tier === value);
}

function parseCount(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

async function main(): Promise<void> {
  const [customerId, tierArg = 'basic', durationArg, maxDevicesArg] = process.argv.slice(2);
  if (customerId === undefined) {
    console.error('Usage: create-subscription.ts <customerId> [tier] [durationDays] [maxDevices]');
    process.exit(1);
  }
  if (!isTier(tierArg)) {
    console.error(`Unknown tier '${tierArg}'. Expected one of: ${SUBSCRIPTION_TIERS.join(', ')}`);
    process.exit(1);
  }

  const config = loadConfig();
  const logger = createLogger({ service: 'licensing-cli', level: config.logLevel });

  let repository: LicenseRepository;
  if (config.storage.driver === 'supabase') {
    const redis = createRedisClient(config.redis);
    repository = createLicenseRepositoryDb(createSupabaseAdmin(config.storage), {
      lock: redis === null ? createInProcessLock() : createRedisLock(redis, { logger }),
      logger,
    });
  } else {
    // Nothing persists; useful only to preview a key
    repository = createInMemoryLicenseRepository();
  }

  const subscriptionService = createSubscriptionService({
    repository,
    licenseKeyPrefix: config.licenseKey.prefix,
    licenseKeySegmentLength: config.licenseKey.segmentLength,
    defaultGracePeriodDays: config.subscriptions.defaultGracePeriodDays,
    maxDevicesPerSubscription: config.subscriptions.maxDevicesPerSubscription,
    logger,
  });

  const result = await subscriptionService.createSubscription(SYSTEM_ACTOR, {
    customerId,
    tier: tierArg,
    durationDays: parseCount(durationArg, 'durationDays'),
    maxDevices: parseCount(maxDevicesArg, 'maxDevices'),
  });

  if (!result.success) {
    console.error(`Failed: ${result.error.code} ${result.error.message}`);
    process.exit(1);
  }

  const { subscription } = result.data;
  console.log(`Subscription ${subscription.id} created`);
  console.log(`  License key: ${subscription.licenseKey}`);
  console.log(`  Tier:        ${subscription.tier}`);
  console.log(`  Max devices: ${subscription.maxDevices}`);
  console.log(`  Expires at:  ${subscription.expiresAt?.toISOString() ?? 'never'}`);
}

main().catch((error: unknown) => {
  console.error('Failed to create subscription:', error);
  process.exit(1);
});
