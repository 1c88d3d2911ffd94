/**
 * Subscription Aggregate
 *
 * SCOPE: Status transitions and timing predicates
 *
 * Every function is pure: it takes the current subscription and `now`,
 * and returns a new value. Persisting the result is the caller's job.
 *
 * Usability is always derived from (status, startsAt, expiresAt,
 * gracePeriodDays, now). A stored 'expired' status is only a cache and
 * is read as 'active' whenever the timing fields say the window is open.
 */

import type {
  Device,
  FeatureMap,
  Result,
  Subscription,
  SubscriptionTier,
  SubscriptionView,
} from '../types/index.js';
import { failure, success } from '../types/index.js';
import { addDays, MS_PER_DAY } from '../lib/clock.js';

import { resolveFeatures } from './feature-catalog.js';
import { countActiveDevices } from './device-registry.js';

/**
 * A transition together with the devices whose active flag it changed
 */
export interface TransitionOutcome {
  subscription: Subscription;
  changedDevices: Device[];
}

// ─────────────────────────────────────────────────────────────
// Timing predicates
// ─────────────────────────────────────────────────────────────

/**
 * Last instant the subscription is usable; null when it never expires
 */
export function graceEndsAt(subscription: Subscription): Date | null {
  if (subscription.expiresAt === null) {
    return null;
  }
  return addDays(subscription.expiresAt, subscription.gracePeriodDays);
}

/**
 * Past expiry plus grace
 */
export function isExpired(subscription: Subscription, now: Date): boolean {
  const endsAt = graceEndsAt(subscription);
  return endsAt !== null && now.getTime() > endsAt.getTime();
}

/**
 * Past expiry but still inside the grace window
 */
export function isInGracePeriod(subscription: Subscription, now: Date): boolean {
  const { expiresAt } = subscription;
  const endsAt = graceEndsAt(subscription);
  if (expiresAt === null || endsAt === null) {
    return false;
  }
  return (
    now.getTime() > expiresAt.getTime() && now.getTime() <= endsAt.getTime()
  );
}

export function isUsableNow(subscription: Subscription, now: Date): boolean {
  if (subscription.status !== 'active' && subscription.status !== 'expired') {
    return false;
  }
  if (now.getTime() < subscription.startsAt.getTime()) {
    return false;
  }
  return !isExpired(subscription, now);
}

/**
 * Whole days until expiresAt, never negative; null without an expiry
 */
export function daysUntilExpiry(
  subscription: Subscription,
  now: Date
): number | null {
  if (subscription.expiresAt === null) {
    return null;
  }
  const remaining = subscription.expiresAt.getTime() - now.getTime();
  return Math.max(0, Math.floor(remaining / MS_PER_DAY));
}

// ─────────────────────────────────────────────────────────────
// Transitions
// ─────────────────────────────────────────────────────────────

/**
 * pending | suspended | cancelled | expired -> active.
 * Devices are untouched; already active is a no-op.
 */
export function activateSubscription(
  subscription: Subscription,
  now: Date
): Subscription {
  if (subscription.status === 'active') {
    return subscription;
  }
  return { ...subscription, status: 'active', updatedAt: now };
}

/**
 * Any status -> suspended. Devices stay bound and active.
 */
export function suspendSubscription(
  subscription: Subscription,
  now: Date
): Subscription {
  if (subscription.status === 'suspended') {
    return subscription;
  }
  return { ...subscription, status: 'suspended', updatedAt: now };
}

/**
 * Any status -> cancelled, releasing every active device slot
 */
export function cancelSubscription(
  subscription: Subscription,
  now: Date
): TransitionOutcome {
  const changedDevices: Device[] = [];
  const devices = subscription.devices.map((device) => {
    if (!device.isActive) {
      return device;
    }
    const released: Device = {
      ...device,
      isActive: false,
      deactivationReason: 'subscription_cancelled',
      updatedAt: now,
    };
    changedDevices.push(released);
    return released;
  });

  if (subscription.status === 'cancelled' && changedDevices.length === 0) {
    return { subscription, changedDevices };
  }

  return {
    subscription: { ...subscription, status: 'cancelled', devices, updatedAt: now },
    changedDevices,
  };
}

/**
 * suspended | cancelled -> active.
 * Restores devices released by the cancellation, oldest first, while
 * slots remain. Devices the user removed stay inactive.
 */
export function resumeSubscription(
  subscription: Subscription,
  now: Date
): Result<TransitionOutcome> {
  if (subscription.status !== 'suspended' && subscription.status !== 'cancelled') {
    return failure(
      'INVALID_STATE',
      `Cannot resume a subscription in status '${subscription.status}'`,
      { status: subscription.status }
    );
  }

  let active = countActiveDevices(subscription);
  const changedDevices: Device[] = [];
  const devices = subscription.devices.map((device) => {
    if (
      device.isActive ||
      device.deactivationReason !== 'subscription_cancelled' ||
      active >= subscription.maxDevices
    ) {
      return device;
    }
    active += 1;
    const restored: Device = {
      ...device,
      isActive: true,
      deactivationReason: null,
      updatedAt: now,
    };
    changedDevices.push(restored);
    return restored;
  });

  return success({
    subscription: { ...subscription, status: 'active', devices, updatedAt: now },
    changedDevices,
  });
}

/**
 * Push expiresAt out by whole days, counting from now when unset
 */
export function extendExpiry(
  subscription: Subscription,
  days: number,
  now: Date
): Result<Subscription> {
  if (!Number.isInteger(days) || days <= 0) {
    return failure('VALIDATION_ERROR', 'Extension must be a positive number of days', {
      days,
    });
  }

  const base = subscription.expiresAt ?? now;
  return success({
    ...subscription,
    expiresAt: addDays(base, days),
    updatedAt: now,
  });
}

/**
 * Replace the feature inputs. Status and devices are untouched.
 */
export function updateTier(
  subscription: Subscription,
  tier: SubscriptionTier,
  overrides: FeatureMap,
  now: Date
): Subscription {
  return { ...subscription, tier, features: { ...overrides }, updatedAt: now };
}

// ─────────────────────────────────────────────────────────────
// Read view
// ─────────────────────────────────────────────────────────────

export function describeSubscription(
  subscription: Subscription,
  now: Date
): SubscriptionView {
  return {
    subscription,
    features: resolveFeatures(subscription.tier, subscription.features),
    usable: isUsableNow(subscription, now),
    expired: isExpired(subscription, now),
    inGracePeriod: isInGracePeriod(subscription, now),
    daysUntilExpiry: daysUntilExpiry(subscription, now),
    graceEndsAt: graceEndsAt(subscription),
    activeDevices: countActiveDevices(subscription),
  };
}
