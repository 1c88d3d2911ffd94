/**
 * SubscriptionService Implementation
 *
 * SCOPE: Operator administration of subscriptions
 *
 * GUARDRAILS:
 * - Only admin and system actors can create or modify subscriptions
 * - Viewers can read subscriptions, analytics and expiry listings
 * - Each mutation re-reads the subscription inside its unit of work
 * - Devices flipped by a transition are persisted with it
 *
 * Dependencies: LicenseRepository
 */

import type {
  ActorContext,
  CreateSubscriptionParams,
  ExpiringSubscription,
  Result,
  Subscription,
  SubscriptionAnalytics,
  SubscriptionView,
  UpdateTierParams,
} from '../types/index.js';
import { failure, success } from '../types/index.js';
import type { Clock } from '../lib/clock.js';
import { addDays, MS_PER_DAY, systemClock } from '../lib/clock.js';
import type { Logger } from '../lib/logger.js';
import { silentLogger } from '../lib/logger.js';

import { resolveFeatures } from './feature-catalog.js';
import {
  DEFAULT_LICENSE_KEY_PREFIX,
  generateLicenseKey,
  maskLicenseKey,
  MIN_SEGMENT_LENGTH,
  normalizeLicenseKey,
  validateLicenseKeyFormat,
} from './license-key.js';
import type { LicenseRepository } from './license.repository.js';
import type { TransitionOutcome } from './subscription.aggregate.js';
import {
  activateSubscription,
  cancelSubscription,
  daysUntilExpiry,
  describeSubscription,
  extendExpiry,
  resumeSubscription,
  suspendSubscription,
  updateTier,
} from './subscription.aggregate.js';

/** Attempts at drawing an unused license key */
const LICENSE_KEY_ATTEMPTS = 5;
const DEFAULT_MAX_DEVICES = 1;
const DEFAULT_EXPIRING_WITHIN_DAYS = 7;

/**
 * SubscriptionService interface
 */
export interface SubscriptionService {
  createSubscription(
    actor: ActorContext,
    params: CreateSubscriptionParams
  ): Promise<Result<SubscriptionView>>;
  getSubscription(
    actor: ActorContext,
    subscriptionId: string
  ): Promise<Result<SubscriptionView>>;
  getSubscriptionByLicenseKey(
    actor: ActorContext,
    licenseKey: string
  ): Promise<Result<SubscriptionView>>;
  activateSubscription(
    actor: ActorContext,
    subscriptionId: string
  ): Promise<Result<SubscriptionView>>;
  suspendSubscription(
    actor: ActorContext,
    subscriptionId: string
  ): Promise<Result<SubscriptionView>>;
  cancelSubscription(
    actor: ActorContext,
    subscriptionId: string
  ): Promise<Result<SubscriptionView>>;
  resumeSubscription(
    actor: ActorContext,
    subscriptionId: string
  ): Promise<Result<SubscriptionView>>;
  extendSubscription(
    actor: ActorContext,
    subscriptionId: string,
    days: number
  ): Promise<Result<SubscriptionView>>;
  updateSubscriptionTier(
    actor: ActorContext,
    subscriptionId: string,
    params: UpdateTierParams
  ): Promise<Result<SubscriptionView>>;
  getSubscriptionAnalytics(
    actor: ActorContext,
    subscriptionId: string
  ): Promise<Result<SubscriptionAnalytics>>;
  listExpiringSubscriptions(
    actor: ActorContext,
    withinDays?: number
  ): Promise<Result<ExpiringSubscription[]>>;
}

function canRead(actor: ActorContext): boolean {
  return actor.type === 'admin' || actor.type === 'viewer' || actor.type === 'system';
}

function canWrite(actor: ActorContext): boolean {
  return actor.type === 'admin' || actor.type === 'system';
}

function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/**
 * Create SubscriptionService instance
 */
export function createSubscriptionService(deps: {
  repository: LicenseRepository;
  licenseKeyPrefix?: string;
  licenseKeySegmentLength?: number;
  defaultGracePeriodDays?: number;
  maxDevicesPerSubscription?: number;
  clock?: Clock;
  logger?: Logger;
}): SubscriptionService {
  const { repository } = deps;
  const prefix = deps.licenseKeyPrefix ?? DEFAULT_LICENSE_KEY_PREFIX;
  const segmentLength = deps.licenseKeySegmentLength ?? MIN_SEGMENT_LENGTH;
  const defaultGracePeriodDays = deps.defaultGracePeriodDays ?? 7;
  const maxDevicesCeiling = deps.maxDevicesPerSubscription ?? 10;
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? silentLogger;

  function denied() {
    return failure('PERMISSION_DENIED', 'Operator access required');
  }

  function notFound(subscriptionId: string) {
    return failure('SUBSCRIPTION_NOT_FOUND', 'Subscription not found', {
      subscriptionId,
    });
  }

  function validateCreate(params: CreateSubscriptionParams): Result<void> {
    if (params.customerId.trim() === '') {
      return failure('VALIDATION_ERROR', 'customerId is required');
    }
    const { durationDays, maxDevices, gracePeriodDays } = params;
    if (
      durationDays !== undefined &&
      (!Number.isInteger(durationDays) || durationDays <= 0)
    ) {
      return failure('VALIDATION_ERROR', 'durationDays must be a positive integer', {
        durationDays,
      });
    }
    if (
      maxDevices !== undefined &&
      (!Number.isInteger(maxDevices) || maxDevices < 1 || maxDevices > maxDevicesCeiling)
    ) {
      return failure(
        'VALIDATION_ERROR',
        `maxDevices must be between 1 and ${maxDevicesCeiling}`,
        { maxDevices }
      );
    }
    if (
      gracePeriodDays !== undefined &&
      (!Number.isInteger(gracePeriodDays) || gracePeriodDays < 0)
    ) {
      return failure('VALIDATION_ERROR', 'gracePeriodDays must be a non-negative integer', {
        gracePeriodDays,
      });
    }
    return success(undefined);
  }

  async function drawUnusedLicenseKey(): Promise<string | null> {
    for (let attempt = 1; attempt <= LICENSE_KEY_ATTEMPTS; attempt++) {
      const candidate = generateLicenseKey(prefix, segmentLength);
      const existing = await repository.getSubscriptionByLicenseKey(candidate);
      if (existing === null) {
        return candidate;
      }
      logger.warn('License key collision, retrying', { attempt });
    }
    return null;
  }

  /**
   * Apply a transition in one unit of work and persist everything it changed
   */
  async function transition(
    actor: ActorContext,
    subscriptionId: string,
    action: string,
    apply: (subscription: Subscription, now: Date) => Result<TransitionOutcome>
  ): Promise<Result<SubscriptionView>> {
    if (!canWrite(actor)) {
      return denied();
    }

    const located = await repository.getSubscriptionById(subscriptionId);
    if (located === null) {
      return notFound(subscriptionId);
    }

    const outcome = await repository.transaction(located.licenseKey, async (tx) => {
      const current = await tx.getSubscriptionById(subscriptionId);
      if (current === null) {
        return notFound(subscriptionId);
      }

      const now = clock();
      const applied = apply(current, now);
      if (!applied.success) {
        return applied;
      }

      const { subscription, changedDevices } = applied.data;
      for (const device of changedDevices) {
        await tx.updateDevice(device);
      }
      if (subscription === current) {
        return success(describeSubscription(current, now));
      }
      const saved = await tx.updateSubscription(subscription);
      return success(describeSubscription(saved, now));
    });

    if (outcome.success) {
      logger.info(`Subscription ${action}`, {
        subscriptionId,
        licenseKey: maskLicenseKey(located.licenseKey),
        status: outcome.data.subscription.status,
        operatorId: actor.operatorId,
        requestId: actor.requestId,
      });
    } else {
      logger.warn(`Subscription ${action} rejected`, {
        subscriptionId,
        code: outcome.error.code,
        requestId: actor.requestId,
      });
    }
    return outcome;
  }

  const unchangedDevices = (subscription: Subscription): TransitionOutcome => ({
    subscription,
    changedDevices: [],
  });

  return {
    async createSubscription(
      actor: ActorContext,
      params: CreateSubscriptionParams
    ): Promise<Result<SubscriptionView>> {
      if (!canWrite(actor)) {
        return denied();
      }

      const validation = validateCreate(params);
      if (!validation.success) {
        return validation;
      }

      const licenseKey = await drawUnusedLicenseKey();
      if (licenseKey === null) {
        return failure('INTERNAL_ERROR', 'Could not generate a unique license key');
      }

      const now = clock();
      const startsAt = params.startsAt ?? now;
      const created = await repository.transaction(licenseKey, (tx) =>
        tx.createSubscription({
          customerId: params.customerId,
          licenseKey,
          tier: params.tier,
          status: params.status ?? 'active',
          features: params.features ?? {},
          maxDevices: params.maxDevices ?? DEFAULT_MAX_DEVICES,
          startsAt,
          expiresAt:
            params.durationDays === undefined
              ? null
              : addDays(startsAt, params.durationDays),
          gracePeriodDays: params.gracePeriodDays ?? defaultGracePeriodDays,
          autoRenew: params.autoRenew ?? false,
          metadata: params.metadata ?? {},
          createdAt: now,
          updatedAt: now,
        })
      );

      logger.info('Subscription created', {
        subscriptionId: created.id,
        customerId: created.customerId,
        tier: created.tier,
        licenseKey: maskLicenseKey(licenseKey),
        operatorId: actor.operatorId,
        requestId: actor.requestId,
      });

      return success(describeSubscription(created, now));
    },

    async getSubscription(
      actor: ActorContext,
      subscriptionId: string
    ): Promise<Result<SubscriptionView>> {
      if (!canRead(actor)) {
        return denied();
      }
      const subscription = await repository.getSubscriptionById(subscriptionId);
      if (subscription === null) {
        return notFound(subscriptionId);
      }
      return success(describeSubscription(subscription, clock()));
    },

    async getSubscriptionByLicenseKey(
      actor: ActorContext,
      licenseKey: string
    ): Promise<Result<SubscriptionView>> {
      if (!canRead(actor)) {
        return denied();
      }
      const key = normalizeLicenseKey(licenseKey);
      if (!validateLicenseKeyFormat(key, prefix)) {
        return failure('LICENSE_KEY_INVALID', 'Invalid license key');
      }
      const subscription = await repository.getSubscriptionByLicenseKey(key);
      if (subscription === null) {
        return failure('SUBSCRIPTION_NOT_FOUND', 'Subscription not found');
      }
      return success(describeSubscription(subscription, clock()));
    },

    activateSubscription(actor, subscriptionId) {
      return transition(actor, subscriptionId, 'activated', (subscription, now) =>
        success(unchangedDevices(activateSubscription(subscription, now)))
      );
    },

    suspendSubscription(actor, subscriptionId) {
      return transition(actor, subscriptionId, 'suspended', (subscription, now) =>
        success(unchangedDevices(suspendSubscription(subscription, now)))
      );
    },

    cancelSubscription(actor, subscriptionId) {
      return transition(actor, subscriptionId, 'cancelled', (subscription, now) =>
        success(cancelSubscription(subscription, now))
      );
    },

    resumeSubscription(actor, subscriptionId) {
      return transition(actor, subscriptionId, 'resumed', resumeSubscription);
    },

    extendSubscription(actor, subscriptionId, days) {
      return transition(actor, subscriptionId, 'extended', (subscription, now) => {
        const extended = extendExpiry(subscription, days, now);
        return extended.success ? success(unchangedDevices(extended.data)) : extended;
      });
    },

    updateSubscriptionTier(actor, subscriptionId, params) {
      return transition(actor, subscriptionId, 'tier updated', (subscription, now) =>
        success(
          unchangedDevices(
            updateTier(subscription, params.tier, params.features ?? {}, now)
          )
        )
      );
    },

    async getSubscriptionAnalytics(
      actor: ActorContext,
      subscriptionId: string
    ): Promise<Result<SubscriptionAnalytics>> {
      if (!canRead(actor)) {
        return denied();
      }
      const subscription = await repository.getSubscriptionById(subscriptionId);
      if (subscription === null) {
        return notFound(subscriptionId);
      }

      const now = clock();
      const view = describeSubscription(subscription, now);
      const active = subscription.devices.filter((device) => device.isActive);
      const daysSinceLastSeen = active.flatMap((device) =>
        device.lastSeenAt === null
          ? []
          : [Math.floor((now.getTime() - device.lastSeenAt.getTime()) / MS_PER_DAY)]
      );
      const averageDaysSinceLastSeen =
        daysSinceLastSeen.length === 0
          ? 0
          : roundTo(
              daysSinceLastSeen.reduce((sum, days) => sum + days, 0) /
                daysSinceLastSeen.length,
              2
            );

      return success({
        subscriptionId: subscription.id,
        status: subscription.status,
        tier: subscription.tier,
        usable: view.usable,
        expired: view.expired,
        inGracePeriod: view.inGracePeriod,
        daysUntilExpiry: view.daysUntilExpiry,
        devices: {
          total: subscription.devices.length,
          active: active.length,
          inactive: subscription.devices.length - active.length,
          maxAllowed: subscription.maxDevices,
          utilizationPercent: roundTo((active.length / subscription.maxDevices) * 100, 2),
        },
        activity: {
          daysSinceLastSeen,
          averageDaysSinceLastSeen,
        },
        features: resolveFeatures(subscription.tier, subscription.features),
        createdAt: subscription.createdAt,
        expiresAt: subscription.expiresAt,
      });
    },

    async listExpiringSubscriptions(
      actor: ActorContext,
      withinDays: number = DEFAULT_EXPIRING_WITHIN_DAYS
    ): Promise<Result<ExpiringSubscription[]>> {
      if (!canRead(actor)) {
        return denied();
      }
      if (!Number.isInteger(withinDays) || withinDays <= 0) {
        return failure('VALIDATION_ERROR', 'days must be a positive integer', {
          days: withinDays,
        });
      }

      const now = clock();
      const subscriptions = await repository.listExpiringSubscriptions(
        now,
        addDays(now, withinDays)
      );

      return success(
        subscriptions.flatMap((subscription) =>
          subscription.expiresAt === null
            ? []
            : [
                {
                  subscriptionId: subscription.id,
                  customerId: subscription.customerId,
                  tier: subscription.tier,
                  expiresAt: subscription.expiresAt,
                  daysUntilExpiry: daysUntilExpiry(subscription, now) ?? 0,
                  maskedLicenseKey: maskLicenseKey(subscription.licenseKey),
                },
              ]
        )
      );
    },
  };
}
