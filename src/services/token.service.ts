/**
 * License Token Authority
 *
 * SCOPE: Issuing and verifying RS256 license tokens
 *
 * A license token proves a prior successful activation. Its lifetime is a
 * fixed ceiling (ttlDays) independent of the subscription's expiry, which
 * the token carries in expires_at.
 */

import { nanoid } from 'nanoid';
import { z } from 'zod';

import type {
  IssuedToken,
  LicenseClaims,
  LicenseTokenPayload,
  TokenVerification,
} from '../types/index.js';
import { SUBSCRIPTION_TIERS } from '../types/index.js';
import type { Clock } from '../lib/clock.js';
import {
  addDays,
  fromEpochSeconds,
  systemClock,
  toEpochSeconds,
} from '../lib/clock.js';
import {
  checkRegisteredClaims,
  createRs256Signer,
  decodeJwt,
  encodeJwt,
} from '../lib/jwt.js';
import type { Logger } from '../lib/logger.js';
import { silentLogger } from '../lib/logger.js';

import type { SigningKeyPair } from './key-store.js';

export const DEFAULT_LICENSE_TOKEN_TTL_DAYS = 30;

/**
 * License fields as they appear on the wire
 */
const licenseClaimsSchema = z.object({
  subscription_id: z.string().min(1),
  customer_id: z.string().min(1),
  tier: z.enum(SUBSCRIPTION_TIERS),
  features: z.record(z.union([z.boolean(), z.number()])),
  device_id: z.string().min(1),
  expires_at: z.string().datetime({ offset: true }).nullable(),
  grace_period_days: z.number().int().min(0),
  jti: z.string().min(1),
});

export interface LicenseTokenAuthority {
  issue(payload: LicenseTokenPayload): IssuedToken;
  verify(token: string): TokenVerification<LicenseClaims>;
}

export interface LicenseTokenAuthorityOptions {
  keys: SigningKeyPair;
  issuer: string;
  audience: string;
  ttlDays?: number;
  clock?: Clock;
  logger?: Logger;
}

function invalid(message: string): TokenVerification<LicenseClaims> {
  return { valid: false, error: 'invalid_token', message };
}

/**
 * Create LicenseTokenAuthority instance
 */
export function createLicenseTokenAuthority(
  options: LicenseTokenAuthorityOptions
): LicenseTokenAuthority {
  const { issuer, audience } = options;
  const ttlDays = options.ttlDays ?? DEFAULT_LICENSE_TOKEN_TTL_DAYS;
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? silentLogger;
  const signer = createRs256Signer(options.keys);

  return {
    issue(payload: LicenseTokenPayload): IssuedToken {
      const now = clock();
      const exp = toEpochSeconds(addDays(now, ttlDays));
      const token = encodeJwt(
        {
          subscription_id: payload.subscriptionId,
          customer_id: payload.customerId,
          tier: payload.tier,
          features: payload.features,
          device_id: payload.deviceId,
          expires_at:
            payload.expiresAt === null ? null : payload.expiresAt.toISOString(),
          grace_period_days: payload.gracePeriodDays,
          iss: issuer,
          aud: audience,
          iat: toEpochSeconds(now),
          exp,
          jti: nanoid(),
        },
        signer
      );

      return { token, expiresAt: fromEpochSeconds(exp) };
    },

    verify(token: string): TokenVerification<LicenseClaims> {
      const decoded = decodeJwt(token, signer);
      if (!decoded.ok) {
        logger.debug('License token rejected', { reason: decoded.reason });
        return invalid('Invalid token');
      }

      const registered = checkRegisteredClaims(decoded.payload, {
        issuer,
        audience,
        nowSeconds: toEpochSeconds(clock()),
      });
      if (!registered.ok) {
        logger.debug('License token rejected', { reason: registered.reason });
        return registered.reason === 'expired'
          ? { valid: false, error: 'token_expired', message: 'Token has expired' }
          : invalid('Invalid token');
      }

      const parsed = licenseClaimsSchema.safeParse(decoded.payload);
      if (!parsed.success) {
        logger.debug('License token rejected', { reason: 'payload_shape' });
        return invalid('Invalid token payload');
      }

      const claims = parsed.data;
      return {
        valid: true,
        claims: {
          subscriptionId: claims.subscription_id,
          customerId: claims.customer_id,
          tier: claims.tier,
          features: claims.features,
          deviceId: claims.device_id,
          expiresAt: claims.expires_at === null ? null : new Date(claims.expires_at),
          gracePeriodDays: claims.grace_period_days,
          issuer: registered.claims.iss,
          audience: registered.claims.aud,
          issuedAt: fromEpochSeconds(registered.claims.iat),
          tokenExpiresAt: fromEpochSeconds(registered.claims.exp),
          tokenId: claims.jti,
        },
      };
    },
  };
}
