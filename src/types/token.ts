/**
 * Token Types
 *
 * License tokens (RS256) prove a prior successful activation.
 * Access tokens (HS256) authenticate operators on the admin API.
 */

import type { FeatureMap, SubscriptionTier } from './subscription.js';

/**
 * Fields a caller supplies to mint a license token
 */
export interface LicenseTokenPayload {
  subscriptionId: string;
  customerId: string;
  tier: SubscriptionTier;
  features: FeatureMap;
  deviceId: string;
  expiresAt: Date | null;
  gracePeriodDays: number;
}

/**
 * Verified license token claims
 */
export interface LicenseClaims extends LicenseTokenPayload {
  issuer: string;
  audience: string;
  issuedAt: Date;
  /** Token expiry, independent of the subscription expiry */
  tokenExpiresAt: Date;
  tokenId: string;
}

export type OperatorRole = 'admin' | 'viewer';

export interface AccessTokenPayload {
  subject: string;
  role: OperatorRole;
}

export interface AccessClaims extends AccessTokenPayload {
  issuer: string;
  audience: string;
  issuedAt: Date;
  tokenExpiresAt: Date;
}

export type TokenError = 'token_expired' | 'invalid_token';

/**
 * Outcome of a token check. Expected failures are values, not exceptions.
 */
export type TokenVerification<T> =
  | { valid: true; claims: T }
  | { valid: false; error: TokenError; message: string };

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}
