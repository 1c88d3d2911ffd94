/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type { ErrorCode } from './errors.js';
export { ERROR_CODES, RepositoryError, isRepositoryError } from './errors.js';
export type { ActorContext } from './auth.js';
export { SYSTEM_ACTOR } from './auth.js';
export type {
  SubscriptionTier,
  SubscriptionStatus,
  FeatureValue,
  FeatureMap,
  DeactivationReason,
  Device,
  Subscription,
  DeviceInfo,
  SubscriptionView,
  CreateSubscriptionParams,
  UpdateTierParams,
  SubscriptionAnalytics,
  ExpiringSubscription,
  NewDevice,
  NewSubscription,
} from './subscription.js';
export { SUBSCRIPTION_TIERS, SUBSCRIPTION_STATUSES } from './subscription.js';
export type {
  ActivationAction,
  ActivationResult,
  ValidationFailureReason,
  ValidationSuccess,
  ValidationFailure,
  ValidationResult,
  FeatureCheckResult,
} from './license.js';
export type {
  LicenseTokenPayload,
  LicenseClaims,
  OperatorRole,
  AccessTokenPayload,
  AccessClaims,
  TokenError,
  TokenVerification,
  IssuedToken,
} from './token.js';
