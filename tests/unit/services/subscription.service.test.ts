/**
 * SubscriptionService Unit Tests
 *
 * SCOPE: Operator administration of subscriptions
 *
 * GUARDRAILS:
 * - Only admin and system actors can create or modify subscriptions
 * - Viewers can read but not write
 * - Transitions persist the devices they flip
 */

import { beforeEach, describe, it, expect, vi } from 'vitest';

import { validateLicenseKeyFormat } from '@/services/license-key.js';
import type { CreateSubscriptionParams } from '@/types/index.js';
import { SYSTEM_ACTOR } from '@/types/index.js';

import {
  daysFrom,
  TEST_LICENSE_KEY,
  TEST_NOW,
} from '../../fixtures/index.js';
import type { TestHarness } from '../../helpers/test-utils.js';
import {
  createTestActor,
  createTestHarness,
  seedSubscription,
} from '../../helpers/test-utils.js';

const admin = createTestActor('admin');
const viewer = createTestActor('viewer');
const anonymous = createTestActor('anonymous');

describe('SubscriptionService', () => {
  let harness: TestHarness;

  beforeEach(() => {
    harness = createTestHarness();
  });

  // ─────────────────────────────────────────────────────────────
  // createSubscription
  // ─────────────────────────────────────────────────────────────

  describe('createSubscription()', () => {
    it('should create an active subscription with a fresh license key', async () => {
      const result = await harness.subscriptionService.createSubscription(admin, {
        customerId: 'cust-1',
        tier: 'professional',
        durationDays: 365,
        maxDevices: 3,
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      const { subscription } = result.data;
      expect(validateLicenseKeyFormat(subscription.licenseKey)).toBe(true);
      expect(subscription.status).toBe('active');
      expect(subscription.startsAt).toEqual(TEST_NOW);
      expect(subscription.expiresAt?.toISOString()).toBe('2026-06-01T12:00:00.000Z');
      expect(subscription.gracePeriodDays).toBe(7);
      expect(subscription.maxDevices).toBe(3);
      expect(result.data.usable).toBe(true);
      expect(result.data.daysUntilExpiry).toBe(365);
      expect(result.data.features.analytics).toBe(true);

      const stored = await harness.repository.getSubscriptionByLicenseKey(subscription.licenseKey);
      expect(stored?.id).toBe(subscription.id);
    });

    it('should apply defaults for a minimal request', async () => {
      const result = await harness.subscriptionService.createSubscription(SYSTEM_ACTOR, {
        customerId: 'cust-2',
        tier: 'basic',
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.subscription.maxDevices).toBe(1);
      expect(result.data.subscription.expiresAt).toBeNull();
      expect(result.data.subscription.features).toEqual({});
      expect(result.data.subscription.autoRenew).toBe(false);
      expect(result.data.daysUntilExpiry).toBeNull();
    });

    it('should create a pending subscription that is not yet usable', async () => {
      const result = await harness.subscriptionService.createSubscription(admin, {
        customerId: 'cust-3',
        tier: 'trial',
        durationDays: 14,
        status: 'pending',
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.subscription.status).toBe('pending');
      expect(result.data.usable).toBe(false);
    });

    it('should count duration from a given start', async () => {
      const result = await harness.subscriptionService.createSubscription(admin, {
        customerId: 'cust-4',
        tier: 'basic',
        durationDays: 30,
        startsAt: daysFrom(TEST_NOW, 10),
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.subscription.expiresAt?.toISOString()).toBe('2025-07-11T12:00:00.000Z');
      expect(result.data.usable).toBe(false);
    });

    const invalid: [Partial<CreateSubscriptionParams>, string][] = [
      [{ customerId: '  ' }, 'customerId is required'],
      [{ durationDays: 0 }, 'durationDays must be a positive integer'],
      [{ maxDevices: 11 }, 'maxDevices must be between 1 and 10'],
      [{ maxDevices: 0 }, 'maxDevices must be between 1 and 10'],
      [{ gracePeriodDays: -1 }, 'gracePeriodDays must be a non-negative integer'],
    ];

    it.each(invalid)('should reject %j', async (overrides, message) => {
      const result = await harness.subscriptionService.createSubscription(admin, {
        customerId: 'cust-5',
        tier: 'basic',
        ...overrides,
      });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('VALIDATION_ERROR');
      expect(result.error.message).toBe(message);
      expect(harness.repository.size()).toBe(0);
    });

    it('should give up after repeated key collisions', async () => {
      const taken = await seedSubscription(harness.repository);
      const lookup = vi
        .spyOn(harness.repository, 'getSubscriptionByLicenseKey')
        .mockResolvedValue(taken);

      const result = await harness.subscriptionService.createSubscription(admin, {
        customerId: 'cust-6',
        tier: 'basic',
      });

      expect(result).toEqual({
        success: false,
        error: {
          code: 'INTERNAL_ERROR',
          message: 'Could not generate a unique license key',
        },
      });
      expect(lookup).toHaveBeenCalledTimes(5);
    });

    it('should deny viewers and anonymous callers', async () => {
      for (const actor of [viewer, anonymous]) {
        expect(
          await harness.subscriptionService.createSubscription(actor, {
            customerId: 'cust-7',
            tier: 'basic',
          })
        ).toEqual({
          success: false,
          error: { code: 'PERMISSION_DENIED', message: 'Operator access required' },
        });
      }
    });
  });

  // ─────────────────────────────────────────────────────────────
  // Reads
  // ─────────────────────────────────────────────────────────────

  describe('getSubscription()', () => {
    it('should let viewers read', async () => {
      const seeded = await seedSubscription(harness.repository);

      const result = await harness.subscriptionService.getSubscription(viewer, seeded.id);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.subscription).toEqual(seeded);
    });

    it('should report a missing subscription', async () => {
      expect(await harness.subscriptionService.getSubscription(admin, 'missing')).toEqual({
        success: false,
        error: {
          code: 'SUBSCRIPTION_NOT_FOUND',
          message: 'Subscription not found',
          details: { subscriptionId: 'missing' },
        },
      });
    });

    it('should deny anonymous callers', async () => {
      const seeded = await seedSubscription(harness.repository);

      const result = await harness.subscriptionService.getSubscription(anonymous, seeded.id);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('PERMISSION_DENIED');
    });
  });

  describe('getSubscriptionByLicenseKey()', () => {
    it('should find a subscription by a normalized key', async () => {
      const seeded = await seedSubscription(harness.repository);

      const result = await harness.subscriptionService.getSubscriptionByLicenseKey(
        admin,
        TEST_LICENSE_KEY.toLowerCase()
      );

      expect(result.success && result.data.subscription.id).toBe(seeded.id);
    });

    it('should separate malformed from unknown keys', async () => {
      expect(
        await harness.subscriptionService.getSubscriptionByLicenseKey(admin, 'FL-AB')
      ).toEqual({
        success: false,
        error: { code: 'LICENSE_KEY_INVALID', message: 'Invalid license key' },
      });
      expect(
        await harness.subscriptionService.getSubscriptionByLicenseKey(
          admin,
          'FL-ZZZZ-ZZZZ-ZZZZ-ZZZZ'
        )
      ).toEqual({
        success: false,
        error: { code: 'SUBSCRIPTION_NOT_FOUND', message: 'Subscription not found' },
      });
    });
  });

  // ─────────────────────────────────────────────────────────────
  // Transitions
  // ─────────────────────────────────────────────────────────────

  describe('transitions', () => {
    it('should activate a pending subscription', async () => {
      const seeded = await seedSubscription(harness.repository, { status: 'pending' });

      const result = await harness.subscriptionService.activateSubscription(admin, seeded.id);

      expect(result.success && result.data.subscription.status).toBe('active');
      expect((await harness.repository.getSubscriptionById(seeded.id))?.status).toBe('active');
    });

    it('should suspend without releasing devices', async () => {
      const seeded = await seedSubscription(harness.repository, {}, [{ deviceId: 'd1' }]);

      const result = await harness.subscriptionService.suspendSubscription(admin, seeded.id);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.subscription.status).toBe('suspended');
      expect(result.data.activeDevices).toBe(1);
      expect(await harness.licenseService.validate(TEST_LICENSE_KEY, 'd1')).toMatchObject({
        valid: false,
        reason: 'inactive',
      });
    });

    it('should release devices on cancel and restore them on resume', async () => {
      const seeded = await seedSubscription(harness.repository, { maxDevices: 2 }, [
        { deviceId: 'd1' },
        { deviceId: 'd2' },
      ]);

      const cancelled = await harness.subscriptionService.cancelSubscription(admin, seeded.id);
      expect(cancelled.success).toBe(true);
      if (!cancelled.success) return;
      expect(cancelled.data.subscription.status).toBe('cancelled');
      expect(cancelled.data.activeDevices).toBe(0);
      const stored = await harness.repository.getSubscriptionById(seeded.id);
      expect(stored?.devices.map((device) => device.deactivationReason)).toEqual([
        'subscription_cancelled',
        'subscription_cancelled',
      ]);
      expect(await harness.licenseService.validate(TEST_LICENSE_KEY, 'd1')).toMatchObject({
        valid: false,
        reason: 'device_not_activated',
      });

      const resumed = await harness.subscriptionService.resumeSubscription(admin, seeded.id);
      expect(resumed.success).toBe(true);
      if (!resumed.success) return;
      expect(resumed.data.subscription.status).toBe('active');
      expect(resumed.data.activeDevices).toBe(2);
      expect((await harness.licenseService.validate(TEST_LICENSE_KEY, 'd1')).valid).toBe(true);
    });

    it('should refuse to resume an active subscription', async () => {
      const seeded = await seedSubscription(harness.repository);

      expect(await harness.subscriptionService.resumeSubscription(admin, seeded.id)).toEqual({
        success: false,
        error: {
          code: 'INVALID_STATE',
          message: "Cannot resume a subscription in status 'active'",
          details: { status: 'active' },
        },
      });
    });

    it('should extend the expiry', async () => {
      const seeded = await seedSubscription(harness.repository);

      const result = await harness.subscriptionService.extendSubscription(admin, seeded.id, 10);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.subscription.expiresAt?.toISOString()).toBe('2025-07-11T12:00:00.000Z');
      expect(result.data.daysUntilExpiry).toBe(40);
    });

    it('should make a cached expired subscription usable again by extending it', async () => {
      const seeded = await seedSubscription(
        harness.repository,
        { status: 'expired', expiresAt: daysFrom(TEST_NOW, -10) },
        [{ deviceId: 'd1' }]
      );
      expect((await harness.licenseService.validate(TEST_LICENSE_KEY, 'd1')).valid).toBe(false);

      const extended = await harness.subscriptionService.extendSubscription(admin, seeded.id, 30);

      expect(extended.success).toBe(true);
      if (!extended.success) return;
      expect(extended.data.subscription.status).toBe('expired');
      expect(extended.data.usable).toBe(true);
      expect((await harness.licenseService.validate(TEST_LICENSE_KEY, 'd1')).valid).toBe(true);

      const activated = await harness.subscriptionService.activateSubscription(admin, seeded.id);
      expect(activated.success && activated.data.subscription.status).toBe('active');
    });

    it('should reject a non-positive extension', async () => {
      const seeded = await seedSubscription(harness.repository);

      const result = await harness.subscriptionService.extendSubscription(admin, seeded.id, 0);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('VALIDATION_ERROR');
    });

    it('should change tier and replace overrides', async () => {
      const seeded = await seedSubscription(harness.repository, {
        features: { analytics: true },
      });

      const result = await harness.subscriptionService.updateSubscriptionTier(admin, seeded.id, {
        tier: 'enterprise',
        features: { max_customers: 5000 },
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.subscription.tier).toBe('enterprise');
      expect(result.data.subscription.features).toEqual({ max_customers: 5000 });
      expect(result.data.features.max_customers).toBe(5000);
      expect(result.data.features.priority_support).toBe(true);

      const feature = await harness.licenseService.checkFeature(TEST_LICENSE_KEY, 'max_customers');
      expect(feature.success && feature.data.limit).toBe(5000);
    });

    it('should report a missing subscription', async () => {
      expect(await harness.subscriptionService.suspendSubscription(admin, 'missing')).toEqual({
        success: false,
        error: {
          code: 'SUBSCRIPTION_NOT_FOUND',
          message: 'Subscription not found',
          details: { subscriptionId: 'missing' },
        },
      });
    });

    it('should deny viewers', async () => {
      const seeded = await seedSubscription(harness.repository);

      const result = await harness.subscriptionService.cancelSubscription(viewer, seeded.id);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('PERMISSION_DENIED');
      expect((await harness.repository.getSubscriptionById(seeded.id))?.status).toBe('active');
    });
  });

  // ─────────────────────────────────────────────────────────────
  // Reporting
  // ─────────────────────────────────────────────────────────────

  describe('getSubscriptionAnalytics()', () => {
    it('should summarise device utilization and activity', async () => {
      const seeded = await seedSubscription(harness.repository, { maxDevices: 3 }, [
        { deviceId: 'd1', lastSeenAt: daysFrom(TEST_NOW, -1) },
        { deviceId: 'd2', lastSeenAt: daysFrom(TEST_NOW, -4) },
        { deviceId: 'd3', isActive: false, deactivationReason: 'user' },
      ]);

      const result = await harness.subscriptionService.getSubscriptionAnalytics(viewer, seeded.id);

      expect(result).toEqual({
        success: true,
        data: {
          subscriptionId: seeded.id,
          status: 'active',
          tier: 'basic',
          usable: true,
          expired: false,
          inGracePeriod: false,
          daysUntilExpiry: 30,
          devices: {
            total: 3,
            active: 2,
            inactive: 1,
            maxAllowed: 3,
            utilizationPercent: 66.67,
          },
          activity: {
            daysSinceLastSeen: [1, 4],
            averageDaysSinceLastSeen: 2.5,
          },
          features: {
            max_customers: 100,
            max_products: 500,
            analytics: false,
            multi_location: false,
            api_access: false,
            priority_support: false,
          },
          createdAt: daysFrom(TEST_NOW, -30),
          expiresAt: daysFrom(TEST_NOW, 30),
        },
      });
    });

    it('should report zero activity without active devices', async () => {
      const seeded = await seedSubscription(harness.repository);

      const result = await harness.subscriptionService.getSubscriptionAnalytics(admin, seeded.id);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.devices.utilizationPercent).toBe(0);
      expect(result.data.activity).toEqual({ daysSinceLastSeen: [], averageDaysSinceLastSeen: 0 });
    });
  });

  describe('listExpiringSubscriptions()', () => {
    it('should list subscriptions expiring within the window with masked keys', async () => {
      await seedSubscription(harness.repository, {
        licenseKey: 'FL-AAAA-AAAA-AAAA-0001',
        customerId: 'cust-a',
        expiresAt: daysFrom(TEST_NOW, 5),
      });
      await seedSubscription(harness.repository, {
        licenseKey: 'FL-BBBB-AAAA-AAAA-0002',
        customerId: 'cust-b',
        tier: 'enterprise',
        expiresAt: daysFrom(TEST_NOW, 2),
      });
      await seedSubscription(harness.repository, {
        licenseKey: 'FL-CCCC-AAAA-AAAA-0003',
        expiresAt: daysFrom(TEST_NOW, 20),
      });

      const result = await harness.subscriptionService.listExpiringSubscriptions(viewer);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(
        result.data.map(({ customerId, tier, daysUntilExpiry, maskedLicenseKey, expiresAt }) => ({
          customerId,
          tier,
          daysUntilExpiry,
          maskedLicenseKey,
          expiresAt,
        }))
      ).toEqual([
        {
          customerId: 'cust-b',
          tier: 'enterprise',
          daysUntilExpiry: 2,
          maskedLicenseKey: 'FL-BBBB-***',
          expiresAt: daysFrom(TEST_NOW, 2),
        },
        {
          customerId: 'cust-a',
          tier: 'basic',
          daysUntilExpiry: 5,
          maskedLicenseKey: 'FL-AAAA-***',
          expiresAt: daysFrom(TEST_NOW, 5),
        },
      ]);

      const wider = await harness.subscriptionService.listExpiringSubscriptions(admin, 30);
      expect(wider.success && wider.data.length).toBe(3);
    });

    it('should reject a non-positive window', async () => {
      expect(await harness.subscriptionService.listExpiringSubscriptions(admin, 0)).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'days must be a positive integer',
          details: { days: 0 },
        },
      });
    });
  });
});
