/**
 * Subscription Domain Types
 *
 * SCOPE: Subscriptions, bound devices and resolved feature maps
 */

export const SUBSCRIPTION_TIERS = [
  'basic',
  'professional',
  'enterprise',
  'trial',
] as const;

export type SubscriptionTier = (typeof SUBSCRIPTION_TIERS)[number];

export const SUBSCRIPTION_STATUSES = [
  'pending',
  'active',
  'suspended',
  'cancelled',
  'expired',
] as const;

/**
 * Stored subscription status.
 * 'expired' is only ever a cached value; usability is derived from timing.
 */
export type SubscriptionStatus = (typeof SUBSCRIPTION_STATUSES)[number];

/**
 * Feature value - boolean capability or numeric limit (-1 = unlimited)
 */
export type FeatureValue = boolean | number;

/**
 * Named capabilities and limits
 */
export type FeatureMap = Record<string, FeatureValue>;

/**
 * Why a device slot was released
 */
export type DeactivationReason = 'user' | 'subscription_cancelled';

/**
 * Device entity - a client machine bound to one subscription
 */
export interface Device {
  id: string;
  subscriptionId: string;
  /** Client-supplied identifier, unique within its subscription only */
  deviceId: string;
  deviceName: string | null;
  deviceType: string | null;
  fingerprint: string | null;
  osName: string | null;
  osVersion: string | null;
  appVersion: string | null;
  isActive: boolean;
  deactivationReason: DeactivationReason | null;
  lastSeenAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Subscription entity - owns its devices and feature overrides
 */
export interface Subscription {
  id: string;
  customerId: string;
  licenseKey: string;
  tier: SubscriptionTier;
  status: SubscriptionStatus;
  /** Overrides applied on top of the tier defaults */
  features: FeatureMap;
  maxDevices: number;
  startsAt: Date;
  expiresAt: Date | null;
  gracePeriodDays: number;
  autoRenew: boolean;
  metadata: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
  devices: Device[];
}

/**
 * Device details reported by the client on activation
 */
export interface DeviceInfo {
  deviceName?: string | undefined;
  deviceType?: string | undefined;
  fingerprint?: string | undefined;
  osName?: string | undefined;
  osVersion?: string | undefined;
  appVersion?: string | undefined;
}

/**
 * Read view of a subscription with every derived flag resolved
 */
export interface SubscriptionView {
  subscription: Subscription;
  features: FeatureMap;
  usable: boolean;
  expired: boolean;
  inGracePeriod: boolean;
  daysUntilExpiry: number | null;
  graceEndsAt: Date | null;
  activeDevices: number;
}

/**
 * Parameters for creating a subscription
 */
export interface CreateSubscriptionParams {
  customerId: string;
  tier: SubscriptionTier;
  /** Omit for a subscription that never expires */
  durationDays?: number | undefined;
  maxDevices?: number | undefined;
  features?: FeatureMap | undefined;
  gracePeriodDays?: number | undefined;
  startsAt?: Date | undefined;
  autoRenew?: boolean | undefined;
  metadata?: Record<string, unknown> | undefined;
  /** Defaults to 'active' */
  status?: 'pending' | 'active' | undefined;
}

/**
 * Parameters for changing a subscription tier
 */
export interface UpdateTierParams {
  tier: SubscriptionTier;
  features?: FeatureMap | undefined;
}

/**
 * Device utilization and activity for one subscription
 */
export interface SubscriptionAnalytics {
  subscriptionId: string;
  status: SubscriptionStatus;
  tier: SubscriptionTier;
  usable: boolean;
  expired: boolean;
  inGracePeriod: boolean;
  daysUntilExpiry: number | null;
  devices: {
    total: number;
    active: number;
    inactive: number;
    maxAllowed: number;
    utilizationPercent: number;
  };
  activity: {
    daysSinceLastSeen: number[];
    averageDaysSinceLastSeen: number;
  };
  features: FeatureMap;
  createdAt: Date;
  expiresAt: Date | null;
}

/**
 * Summary row for subscriptions nearing expiry
 */
export interface ExpiringSubscription {
  subscriptionId: string;
  customerId: string;
  tier: SubscriptionTier;
  expiresAt: Date;
  daysUntilExpiry: number;
  maskedLicenseKey: string;
}

/**
 * Device values before storage assigns an id
 */
export type NewDevice = Omit<Device, 'id'>;

/**
 * Subscription values before storage assigns an id
 */
export type NewSubscription = Omit<Subscription, 'id' | 'devices'>;
