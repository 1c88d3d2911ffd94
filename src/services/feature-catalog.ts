/**
 * Feature Catalog
 *
 * Static tier defaults plus per-subscription overrides.
 * Resolution is a pure function of (tier, overrides).
 */

import type {
  FeatureMap,
  FeatureValue,
  SubscriptionTier,
} from '../types/index.js';

/**
 * Numeric limit meaning "no limit"
 */
export const UNLIMITED = -1;

export const TIER_FEATURES: Readonly<Record<SubscriptionTier, Readonly<FeatureMap>>> = {
  basic: {
    max_customers: 100,
    max_products: 500,
    analytics: false,
    multi_location: false,
    api_access: false,
    priority_support: false,
  },
  professional: {
    max_customers: 1000,
    max_products: 5000,
    analytics: true,
    multi_location: true,
    api_access: true,
    priority_support: false,
  },
  enterprise: {
    max_customers: UNLIMITED,
    max_products: UNLIMITED,
    analytics: true,
    multi_location: true,
    api_access: true,
    priority_support: true,
  },
  trial: {
    max_customers: 10,
    max_products: 50,
    analytics: false,
    multi_location: false,
    api_access: false,
    priority_support: false,
  },
};

/**
 * Tier defaults with overrides applied on top. Overrides always win.
 */
export function resolveFeatures(
  tier: SubscriptionTier,
  overrides: FeatureMap = {}
): FeatureMap {
  return { ...TIER_FEATURES[tier], ...overrides };
}

function lookup(features: FeatureMap, name: string): FeatureValue | undefined {
  return Object.prototype.hasOwnProperty.call(features, name)
    ? features[name]
    : undefined;
}

/**
 * A feature is enabled when it is `true` or a non-zero limit.
 * Unknown names are disabled.
 */
export function hasFeature(features: FeatureMap, name: string): boolean {
  const value = lookup(features, name);
  if (typeof value === 'number') {
    return value !== 0;
  }
  return value === true;
}

/**
 * Numeric limit for a feature; unknown or boolean features resolve to 0
 */
export function getLimit(features: FeatureMap, name: string): number {
  const value = lookup(features, name);
  return typeof value === 'number' ? value : 0;
}

export function isUnlimited(limit: number): boolean {
  return limit === UNLIMITED;
}
