/**
 * License Validation Types
 *
 * SCOPE: Device activation, validation and deactivation outcomes
 */

import type {
  Device,
  FeatureMap,
  Subscription,
  SubscriptionTier,
} from './subscription.js';

/**
 * What activation did with the device slot
 */
export type ActivationAction = 'can_activate' | 'reactivated' | 'already_active';

export interface ActivationResult {
  action: ActivationAction;
  message: string;
  token: string;
  tokenExpiresAt: Date;
  subscription: Subscription;
  device: Device;
  features: FeatureMap;
  expiresAt: Date | null;
}

/**
 * Reason codes for a negative validation
 */
export type ValidationFailureReason =
  | 'license_key_invalid'
  | 'device_not_activated'
  | 'expired'
  | 'inactive';

export interface ValidationSuccess {
  valid: true;
  subscription: Subscription;
  device: Device;
  features: FeatureMap;
  inGracePeriod: boolean;
  daysUntilExpiry: number | null;
  expiresAt: Date | null;
}

export interface ValidationFailure {
  valid: false;
  reason: ValidationFailureReason;
  message: string;
  expiresAt?: Date | null;
}

export type ValidationResult = ValidationSuccess | ValidationFailure;

export interface FeatureCheckResult {
  featureName: string;
  enabled: boolean;
  limit: number | null;
  tier: SubscriptionTier;
}
