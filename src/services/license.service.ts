/**
 * LicenseService Implementation
 *
 * SCOPE: Device activation, validation and deactivation against a license key
 *
 * GUARDRAILS:
 * - Every read-modify-write on a subscription runs in one unit of work
 *   keyed by its license key, so device-slot checks cannot interleave
 * - License problems are results, never exceptions
 * - Storage faults propagate as RepositoryError
 * - License keys are masked in logs
 *
 * Dependencies: LicenseRepository, LicenseTokenAuthority
 */

import type {
  ActivationAction,
  ActivationResult,
  Device,
  DeviceInfo,
  FeatureCheckResult,
  LicenseClaims,
  Result,
  Subscription,
  TokenVerification,
  ValidationResult,
} from '../types/index.js';
import { failure, success } from '../types/index.js';
import type { Clock } from '../lib/clock.js';
import { systemClock } from '../lib/clock.js';
import type { Logger } from '../lib/logger.js';
import { silentLogger } from '../lib/logger.js';

import {
  addDevice,
  canAddDevice,
  countActiveDevices,
  draftDevice,
  findDevice,
  reactivateDevice,
  removeDevice,
  touchDevice,
} from './device-registry.js';
import { getLimit, hasFeature, resolveFeatures } from './feature-catalog.js';
import {
  DEFAULT_LICENSE_KEY_PREFIX,
  maskLicenseKey,
  normalizeLicenseKey,
  validateLicenseKeyFormat,
} from './license-key.js';
import type { LicenseRepository, LicenseRepositoryTx } from './license.repository.js';
import {
  daysUntilExpiry,
  isExpired,
  isInGracePeriod,
  isUsableNow,
} from './subscription.aggregate.js';
import type { LicenseTokenAuthority } from './token.service.js';

const ACTIVATION_MESSAGES: Record<ActivationAction, string> = {
  can_activate: 'Device activated successfully',
  reactivated: 'Device reactivated successfully',
  already_active: 'Device is already activated',
};

/**
 * LicenseService interface
 */
export interface LicenseService {
  activate(
    licenseKey: string,
    deviceId: string,
    deviceInfo?: DeviceInfo
  ): Promise<Result<ActivationResult>>;
  validate(
    licenseKey: string,
    deviceId: string,
    updateLastSeen?: boolean
  ): Promise<ValidationResult>;
  deactivate(licenseKey: string, deviceId: string): Promise<Result<boolean>>;
  checkFeature(
    licenseKey: string,
    featureName: string
  ): Promise<Result<FeatureCheckResult>>;
  verifyToken(token: string): TokenVerification<LicenseClaims>;
}

interface Activation {
  action: ActivationAction;
  subscription: Subscription;
  device: Device;
}

/**
 * Create LicenseService instance
 */
export function createLicenseService(deps: {
  repository: LicenseRepository;
  tokens: LicenseTokenAuthority;
  licenseKeyPrefix?: string;
  clock?: Clock;
  logger?: Logger;
}): LicenseService {
  const { repository, tokens } = deps;
  const prefix = deps.licenseKeyPrefix ?? DEFAULT_LICENSE_KEY_PREFIX;
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? silentLogger;

  /**
   * Normalized key, or null when it cannot be a key at all
   */
  function acceptKey(licenseKey: string): string | null {
    const normalized = normalizeLicenseKey(licenseKey);
    return validateLicenseKeyFormat(normalized, prefix) ? normalized : null;
  }

  /**
   * Reject an unusable subscription. Expiry is derived, never written back.
   */
  function checkUsable(subscription: Subscription, now: Date): Result<Subscription> {
    if (isUsableNow(subscription, now)) {
      return success(subscription);
    }

    if (isExpired(subscription, now)) {
      return failure('SUBSCRIPTION_EXPIRED', 'Subscription has expired', {
        expiresAt: subscription.expiresAt?.toISOString() ?? null,
      });
    }

    return failure('SUBSCRIPTION_INACTIVE', 'Subscription is not active', {
      status: subscription.status,
    });
  }

  async function bindDevice(
    tx: LicenseRepositoryTx,
    subscription: Subscription,
    deviceId: string,
    deviceInfo: DeviceInfo,
    now: Date
  ): Promise<Result<Activation>> {
    const existing = findDevice(subscription, deviceId);

    if (existing !== null && existing.isActive) {
      const touched = touchDevice(subscription, deviceId, now, deviceInfo);
      const device = touched === null ? existing : await tx.updateDevice(touched.device);
      return success({ action: 'already_active', subscription, device });
    }

    if (existing !== null) {
      const reactivated = reactivateDevice(subscription, deviceId, now);
      if (!reactivated.success) {
        return reactivated;
      }
      const device = await tx.updateDevice(reactivated.data.device);
      return success({
        action: 'reactivated',
        subscription: reactivated.data.subscription,
        device,
      });
    }

    if (!canAddDevice(subscription)) {
      const current = countActiveDevices(subscription);
      return failure(
        'DEVICE_LIMIT_EXCEEDED',
        `Device limit reached (${current}/${subscription.maxDevices})`,
        { current, max: subscription.maxDevices }
      );
    }

    const device = await tx.createDevice(
      draftDevice(subscription.id, deviceId, deviceInfo, now)
    );
    const added = addDevice(subscription, device);
    if (!added.success) {
      // Slot was checked above under the same lock; undo the insert
      throw new Error(`Device slot check diverged: ${added.error.message}`);
    }
    return success({ action: 'can_activate', subscription: added.data, device });
  }

  return {
    /**
     * Bind a device to the subscription behind a license key and issue
     * a license token for it
     */
    async activate(
      licenseKey: string,
      deviceId: string,
      deviceInfo: DeviceInfo = {}
    ): Promise<Result<ActivationResult>> {
      const key = acceptKey(licenseKey);
      if (key === null) {
        logger.info('Activation rejected: malformed license key');
        return failure('LICENSE_KEY_INVALID', 'Invalid license key');
      }
      if (deviceId.trim() === '') {
        return failure('VALIDATION_ERROR', 'Device id is required');
      }

      const masked = maskLicenseKey(key);

      const outcome = await repository.transaction(key, async (tx) => {
        const now = clock();
        const subscription = await tx.getSubscriptionByLicenseKey(key);
        if (subscription === null) {
          return failure('LICENSE_KEY_INVALID', 'Invalid license key');
        }

        const usable = checkUsable(subscription, now);
        if (!usable.success) {
          return usable;
        }

        return bindDevice(tx, subscription, deviceId, deviceInfo, now);
      });

      if (!outcome.success) {
        logger.warn('Activation rejected', {
          licenseKey: masked,
          deviceId,
          code: outcome.error.code,
        });
        return outcome;
      }

      const { action, subscription, device } = outcome.data;
      const features = resolveFeatures(subscription.tier, subscription.features);
      const issued = tokens.issue({
        subscriptionId: subscription.id,
        customerId: subscription.customerId,
        tier: subscription.tier,
        features,
        deviceId: device.deviceId,
        expiresAt: subscription.expiresAt,
        gracePeriodDays: subscription.gracePeriodDays,
      });

      logger.info('Device activated', {
        licenseKey: masked,
        subscriptionId: subscription.id,
        deviceId,
        action,
      });

      return success({
        action,
        message: ACTIVATION_MESSAGES[action],
        token: issued.token,
        tokenExpiresAt: issued.expiresAt,
        subscription,
        device,
        features,
        expiresAt: subscription.expiresAt,
      });
    },

    /**
     * Check whether a bound device may use the software right now
     */
    async validate(
      licenseKey: string,
      deviceId: string,
      updateLastSeen = true
    ): Promise<ValidationResult> {
      const key = acceptKey(licenseKey);
      if (key === null) {
        return {
          valid: false,
          reason: 'license_key_invalid',
          message: 'Invalid license key',
        };
      }

      const check = async (tx: LicenseRepositoryTx): Promise<ValidationResult> => {
        const now = clock();
        const subscription = await tx.getSubscriptionByLicenseKey(key);
        if (subscription === null) {
          return {
            valid: false,
            reason: 'license_key_invalid',
            message: 'Invalid license key',
          };
        }

        const device = findDevice(subscription, deviceId);
        if (device === null || !device.isActive) {
          return {
            valid: false,
            reason: 'device_not_activated',
            message: 'Device is not activated for this license',
          };
        }

        if (!isUsableNow(subscription, now)) {
          const expired = isExpired(subscription, now);
          return {
            valid: false,
            reason: expired ? 'expired' : 'inactive',
            message: expired ? 'Subscription has expired' : 'Subscription is not active',
            expiresAt: subscription.expiresAt,
          };
        }

        let current = device;
        if (updateLastSeen) {
          const touched = touchDevice(subscription, deviceId, now);
          if (touched !== null) {
            current = await tx.updateDevice(touched.device);
          }
        }

        return {
          valid: true,
          subscription,
          device: current,
          features: resolveFeatures(subscription.tier, subscription.features),
          inGracePeriod: isInGracePeriod(subscription, now),
          daysUntilExpiry: daysUntilExpiry(subscription, now),
          expiresAt: subscription.expiresAt,
        };
      };

      const result = updateLastSeen
        ? await repository.transaction(key, check)
        : await check(repository);

      if (!result.valid) {
        logger.info('Validation failed', {
          licenseKey: maskLicenseKey(key),
          deviceId,
          reason: result.reason,
        });
      }
      return result;
    },

    /**
     * Release the slot held by a device. False when it was never bound.
     */
    async deactivate(licenseKey: string, deviceId: string): Promise<Result<boolean>> {
      const key = acceptKey(licenseKey);
      if (key === null) {
        return failure('LICENSE_KEY_INVALID', 'Invalid license key');
      }

      const outcome = await repository.transaction(key, async (tx) => {
        const subscription = await tx.getSubscriptionByLicenseKey(key);
        if (subscription === null) {
          return failure('LICENSE_KEY_INVALID', 'Invalid license key');
        }

        const before = findDevice(subscription, deviceId);
        const removed = removeDevice(subscription, deviceId, clock());
        if (removed === null) {
          return success(false);
        }
        if (before?.isActive === true) {
          await tx.updateDevice(removed.device);
        }
        return success(true);
      });

      if (outcome.success) {
        logger.info('Device deactivated', {
          licenseKey: maskLicenseKey(key),
          deviceId,
          found: outcome.data,
        });
      }
      return outcome;
    },

    async checkFeature(
      licenseKey: string,
      featureName: string
    ): Promise<Result<FeatureCheckResult>> {
      const key = acceptKey(licenseKey);
      const subscription =
        key === null ? null : await repository.getSubscriptionByLicenseKey(key);
      if (subscription === null) {
        return failure('LICENSE_KEY_INVALID', 'Invalid license key');
      }

      const features = resolveFeatures(subscription.tier, subscription.features);
      const enabled = hasFeature(features, featureName);
      return success({
        featureName,
        enabled,
        limit: enabled ? getLimit(features, featureName) : null,
        tier: subscription.tier,
      });
    },

    verifyToken(token: string): TokenVerification<LicenseClaims> {
      return tokens.verify(token);
    },
  };
}
