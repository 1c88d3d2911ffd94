/**
 * Subscription Aggregate Unit Tests
 */

import { describe, it, expect } from 'vitest';

import {
  activateSubscription,
  cancelSubscription,
  daysUntilExpiry,
  describeSubscription,
  extendExpiry,
  graceEndsAt,
  isExpired,
  isInGracePeriod,
  isUsableNow,
  resumeSubscription,
  suspendSubscription,
  updateTier,
} from '@/services/subscription.aggregate.js';

import { daysFrom, makeDevice, makeSubscription, TEST_NOW } from '../../fixtures/index.js';

const msAfter = (date: Date, ms: number) => new Date(date.getTime() + ms);

describe('Subscription Aggregate', () => {
  // ─────────────────────────────────────────────────────────────
  // Timing predicates
  // ─────────────────────────────────────────────────────────────

  describe('timing predicates', () => {
    const subscription = makeSubscription();
    const expiresAt = daysFrom(TEST_NOW, 30);
    const graceEnd = daysFrom(TEST_NOW, 37);

    it('should end grace gracePeriodDays after expiry', () => {
      expect(graceEndsAt(subscription)?.toISOString()).toBe('2025-07-08T12:00:00.000Z');
      expect(graceEndsAt(makeSubscription({ expiresAt: null }))).toBeNull();
    });

    it('should expire strictly after the grace window ends', () => {
      expect(isExpired(subscription, graceEnd)).toBe(false);
      expect(isExpired(subscription, msAfter(graceEnd, 1))).toBe(true);
    });

    it('should never expire without an expiry date', () => {
      const perpetual = makeSubscription({ expiresAt: null });

      expect(isExpired(perpetual, daysFrom(TEST_NOW, 10_000))).toBe(false);
      expect(isInGracePeriod(perpetual, daysFrom(TEST_NOW, 10_000))).toBe(false);
    });

    it('should be in grace only between expiry and grace end', () => {
      expect(isInGracePeriod(subscription, expiresAt)).toBe(false);
      expect(isInGracePeriod(subscription, msAfter(expiresAt, 1))).toBe(true);
      expect(isInGracePeriod(subscription, graceEnd)).toBe(true);
      expect(isInGracePeriod(subscription, msAfter(graceEnd, 1))).toBe(false);
    });

    it('should have no grace window when gracePeriodDays is 0', () => {
      const strict = makeSubscription({ gracePeriodDays: 0 });

      expect(isInGracePeriod(strict, msAfter(expiresAt, 1))).toBe(false);
      expect(isExpired(strict, msAfter(expiresAt, 1))).toBe(true);
    });

    it('should be usable while active, started and not past grace', () => {
      expect(isUsableNow(subscription, TEST_NOW)).toBe(true);
      expect(isUsableNow(subscription, daysFrom(TEST_NOW, 33))).toBe(true);
      expect(isUsableNow(subscription, msAfter(graceEnd, 1))).toBe(false);
    });

    it('should not be usable before it starts', () => {
      const future = makeSubscription({ startsAt: daysFrom(TEST_NOW, 1) });

      expect(isUsableNow(future, TEST_NOW)).toBe(false);
      expect(isUsableNow(future, daysFrom(TEST_NOW, 1))).toBe(true);
    });

    it.each(['pending', 'suspended', 'cancelled'] as const)(
      'should not be usable while %s',
      (status) => {
        expect(isUsableNow(makeSubscription({ status }), TEST_NOW)).toBe(false);
      }
    );

    it('should read a stored expired status from the timing fields', () => {
      const cached = makeSubscription({ status: 'expired' });

      expect(isUsableNow(cached, TEST_NOW)).toBe(true);
      expect(isUsableNow(cached, msAfter(graceEnd, 1))).toBe(false);
    });

    it('should count whole days until expiry, floored at zero', () => {
      expect(daysUntilExpiry(subscription, TEST_NOW)).toBe(30);
      expect(daysUntilExpiry(subscription, msAfter(daysFrom(TEST_NOW, 29), 1))).toBe(0);
      expect(daysUntilExpiry(subscription, daysFrom(TEST_NOW, 33))).toBe(0);
      expect(daysUntilExpiry(makeSubscription({ expiresAt: null }), TEST_NOW)).toBeNull();
    });
  });

  // ─────────────────────────────────────────────────────────────
  // Transitions
  // ─────────────────────────────────────────────────────────────

  describe('activateSubscription()', () => {
    it('should activate and stamp updatedAt', () => {
      const activated = activateSubscription(makeSubscription({ status: 'pending' }), TEST_NOW);

      expect(activated.status).toBe('active');
      expect(activated.updatedAt).toEqual(TEST_NOW);
    });

    it('should return the same subscription when already active', () => {
      const subscription = makeSubscription();

      expect(activateSubscription(subscription, TEST_NOW)).toBe(subscription);
    });
  });

  describe('suspendSubscription()', () => {
    it('should suspend and leave devices active', () => {
      const subscription = makeSubscription({ devices: [makeDevice()] });
      const suspended = suspendSubscription(subscription, TEST_NOW);

      expect(suspended.status).toBe('suspended');
      expect(suspended.devices[0]?.isActive).toBe(true);
    });

    it('should return the same subscription when already suspended', () => {
      const subscription = makeSubscription({ status: 'suspended' });

      expect(suspendSubscription(subscription, TEST_NOW)).toBe(subscription);
    });
  });

  describe('cancelSubscription()', () => {
    it('should release active devices with the cancellation reason', () => {
      const active = makeDevice({ id: 'row-1', deviceId: 'd1' });
      const removed = makeDevice({
        id: 'row-2',
        deviceId: 'd2',
        isActive: false,
        deactivationReason: 'user',
      });

      const { subscription, changedDevices } = cancelSubscription(
        makeSubscription({ devices: [active, removed] }),
        TEST_NOW
      );

      expect(subscription.status).toBe('cancelled');
      expect(changedDevices).toEqual([
        {
          ...active,
          isActive: false,
          deactivationReason: 'subscription_cancelled',
          updatedAt: TEST_NOW,
        },
      ]);
      expect(subscription.devices[1]).toBe(removed);
    });

    it('should be a no-op when already cancelled with no active devices', () => {
      const cancelled = makeSubscription({ status: 'cancelled' });
      const outcome = cancelSubscription(cancelled, TEST_NOW);

      expect(outcome.subscription).toBe(cancelled);
      expect(outcome.changedDevices).toEqual([]);
    });
  });

  describe('resumeSubscription()', () => {
    const released = (id: string, createdDaysAgo: number) =>
      makeDevice({
        id: `row-${id}`,
        deviceId: id,
        isActive: false,
        deactivationReason: 'subscription_cancelled',
        createdAt: daysFrom(TEST_NOW, -createdDaysAgo),
      });

    it('should restore cancelled devices in order while slots remain', () => {
      const userRemoved = makeDevice({
        id: 'row-u',
        deviceId: 'u',
        isActive: false,
        deactivationReason: 'user',
      });
      const subscription = makeSubscription({
        status: 'cancelled',
        maxDevices: 2,
        devices: [released('d1', 5), userRemoved, released('d2', 4), released('d3', 3)],
      });

      const result = resumeSubscription(subscription, TEST_NOW);

      expect(result.success).toBe(true);
      if (!result.success) return;
      const { subscription: resumed, changedDevices } = result.data;
      expect(resumed.status).toBe('active');
      expect(changedDevices.map((device) => device.deviceId)).toEqual(['d1', 'd2']);
      expect(
        resumed.devices.map((device) => [device.deviceId, device.isActive, device.deactivationReason])
      ).toEqual([
        ['d1', true, null],
        ['u', false, 'user'],
        ['d2', true, null],
        ['d3', false, 'subscription_cancelled'],
      ]);
    });

    it('should resume a suspended subscription without touching devices', () => {
      const result = resumeSubscription(
        makeSubscription({ status: 'suspended', devices: [makeDevice()] }),
        TEST_NOW
      );

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.subscription.status).toBe('active');
      expect(result.data.changedDevices).toEqual([]);
    });

    it.each(['active', 'pending', 'expired'] as const)('should refuse to resume from %s', (status) => {
      const result = resumeSubscription(makeSubscription({ status }), TEST_NOW);

      expect(result).toEqual({
        success: false,
        error: {
          code: 'INVALID_STATE',
          message: `Cannot resume a subscription in status '${status}'`,
          details: { status },
        },
      });
    });
  });

  describe('extendExpiry()', () => {
    it('should add days to the current expiry', () => {
      const result = extendExpiry(makeSubscription(), 10, TEST_NOW);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.expiresAt?.toISOString()).toBe('2025-07-11T12:00:00.000Z');
      expect(result.data.updatedAt).toEqual(TEST_NOW);
    });

    it('should count from now when there is no expiry', () => {
      const result = extendExpiry(makeSubscription({ expiresAt: null }), 30, TEST_NOW);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.expiresAt?.toISOString()).toBe('2025-07-01T12:00:00.000Z');
    });

    it.each([0, -5, 1.5])('should reject %s days', (days) => {
      const result = extendExpiry(makeSubscription(), days, TEST_NOW);

      expect(result).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Extension must be a positive number of days',
          details: { days },
        },
      });
    });
  });

  describe('updateTier()', () => {
    it('should replace tier and overrides but keep status and devices', () => {
      const device = makeDevice();
      const subscription = makeSubscription({
        status: 'suspended',
        features: { analytics: true },
        devices: [device],
      });

      const updated = updateTier(subscription, 'professional', { max_products: 9000 }, TEST_NOW);

      expect(updated.tier).toBe('professional');
      expect(updated.features).toEqual({ max_products: 9000 });
      expect(updated.status).toBe('suspended');
      expect(updated.devices).toEqual([device]);
    });
  });

  describe('describeSubscription()', () => {
    it('should resolve features and every derived flag', () => {
      const subscription = makeSubscription({
        tier: 'trial',
        features: { analytics: true },
        devices: [
          makeDevice({ id: 'row-1', deviceId: 'd1' }),
          makeDevice({ id: 'row-2', deviceId: 'd2', isActive: false, deactivationReason: 'user' }),
        ],
      });

      const view = describeSubscription(subscription, daysFrom(TEST_NOW, 32));

      expect(view).toEqual({
        subscription,
        features: {
          max_customers: 10,
          max_products: 50,
          analytics: true,
          multi_location: false,
          api_access: false,
          priority_support: false,
        },
        usable: true,
        expired: false,
        inGracePeriod: true,
        daysUntilExpiry: 0,
        graceEndsAt: daysFrom(TEST_NOW, 37),
        activeDevices: 1,
      });
    });
  });
});
