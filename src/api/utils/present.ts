/**
 * Response DTOs
 * Entities are flattened to JSON-safe shapes with ISO-8601 dates
 */

import type {
  ActivationResult,
  Device,
  ExpiringSubscription,
  LicenseClaims,
  SubscriptionAnalytics,
  SubscriptionView,
  ValidationResult,
} from '../../types/index.js';

/**
 * Format nullable date to ISO string
 */
function formatDate(date: Date | null): string | null {
  return date === null ? null : date.toISOString();
}

export function presentDevice(device: Device) {
  return {
    id: device.id,
    deviceId: device.deviceId,
    deviceName: device.deviceName,
    deviceType: device.deviceType,
    fingerprint: device.fingerprint,
    osName: device.osName,
    osVersion: device.osVersion,
    appVersion: device.appVersion,
    isActive: device.isActive,
    deactivationReason: device.deactivationReason,
    lastSeenAt: formatDate(device.lastSeenAt),
    createdAt: device.createdAt.toISOString(),
  };
}

export function presentSubscription(view: SubscriptionView) {
  const { subscription } = view;
  return {
    id: subscription.id,
    customerId: subscription.customerId,
    licenseKey: subscription.licenseKey,
    tier: subscription.tier,
    status: subscription.status,
    features: view.features,
    featureOverrides: subscription.features,
    maxDevices: subscription.maxDevices,
    activeDevices: view.activeDevices,
    startsAt: subscription.startsAt.toISOString(),
    expiresAt: formatDate(subscription.expiresAt),
    gracePeriodDays: subscription.gracePeriodDays,
    graceEndsAt: formatDate(view.graceEndsAt),
    autoRenew: subscription.autoRenew,
    metadata: subscription.metadata,
    usable: view.usable,
    expired: view.expired,
    inGracePeriod: view.inGracePeriod,
    daysUntilExpiry: view.daysUntilExpiry,
    devices: subscription.devices.map(presentDevice),
    createdAt: subscription.createdAt.toISOString(),
    updatedAt: subscription.updatedAt.toISOString(),
  };
}

export function presentActivation(result: ActivationResult) {
  return {
    action: result.action,
    message: result.message,
    token: result.token,
    tokenExpiresAt: result.tokenExpiresAt.toISOString(),
    subscriptionId: result.subscription.id,
    tier: result.subscription.tier,
    features: result.features,
    expiresAt: formatDate(result.expiresAt),
    device: presentDevice(result.device),
  };
}

export function presentValidation(result: ValidationResult) {
  if (!result.valid) {
    return {
      valid: false,
      reason: result.reason,
      message: result.message,
      expiresAt: result.expiresAt === undefined ? null : formatDate(result.expiresAt),
    };
  }
  return {
    valid: true,
    subscriptionId: result.subscription.id,
    tier: result.subscription.tier,
    features: result.features,
    inGracePeriod: result.inGracePeriod,
    daysUntilExpiry: result.daysUntilExpiry,
    expiresAt: formatDate(result.expiresAt),
    lastSeenAt: formatDate(result.device.lastSeenAt),
  };
}

export function presentLicenseClaims(claims: LicenseClaims) {
  return {
    subscriptionId: claims.subscriptionId,
    customerId: claims.customerId,
    tier: claims.tier,
    features: claims.features,
    deviceId: claims.deviceId,
    expiresAt: formatDate(claims.expiresAt),
    gracePeriodDays: claims.gracePeriodDays,
    issuer: claims.issuer,
    audience: claims.audience,
    issuedAt: claims.issuedAt.toISOString(),
    tokenExpiresAt: claims.tokenExpiresAt.toISOString(),
    tokenId: claims.tokenId,
  };
}

export function presentAnalytics(analytics: SubscriptionAnalytics) {
  return {
    ...analytics,
    createdAt: analytics.createdAt.toISOString(),
    expiresAt: formatDate(analytics.expiresAt),
  };
}

export function presentExpiring(entry: ExpiringSubscription) {
  return {
    ...entry,
    expiresAt: entry.expiresAt.toISOString(),
  };
}
