/**
 * Operator Access Tokens
 *
 * SCOPE: HS256 tokens for the administrative API
 *
 * Separate secret, issuer and audience from license tokens. An operator
 * obtains one by presenting the API key whose SHA-256 digest is configured.
 */

import { createHash, timingSafeEqual } from 'node:crypto';

import { z } from 'zod';

import type {
  AccessClaims,
  AccessTokenPayload,
  IssuedToken,
  TokenVerification,
} from '../types/index.js';
import type { Clock } from '../lib/clock.js';
import { fromEpochSeconds, systemClock, toEpochSeconds } from '../lib/clock.js';
import {
  checkRegisteredClaims,
  createHs256Signer,
  decodeJwt,
  encodeJwt,
} from '../lib/jwt.js';

const accessClaimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(['admin', 'viewer']),
});

export interface AccessTokenAuthority {
  issue(payload: AccessTokenPayload): IssuedToken;
  verify(token: string): TokenVerification<AccessClaims>;
}

export interface AccessTokenAuthorityOptions {
  secret: string;
  issuer: string;
  audience: string;
  ttlMinutes: number;
  clock?: Clock;
}

/**
 * SHA-256 hex digest of an API key
 */
export function hashApiKey(rawKey: string): string {
  return createHash('sha256').update(rawKey).digest('hex');
}

/**
 * Constant-time comparison of a presented key against the stored digest
 */
export function verifyOperatorApiKey(rawKey: string, expectedHash: string): boolean {
  const actual = Buffer.from(hashApiKey(rawKey), 'hex');
  const expected = Buffer.from(expectedHash, 'hex');
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}

export function createAccessTokenAuthority(
  options: AccessTokenAuthorityOptions
): AccessTokenAuthority {
  const { issuer, audience, ttlMinutes } = options;
  const clock = options.clock ?? systemClock;
  const signer = createHs256Signer(options.secret);

  return {
    issue(payload: AccessTokenPayload): IssuedToken {
      const iat = toEpochSeconds(clock());
      const exp = iat + ttlMinutes * 60;
      const token = encodeJwt(
        { sub: payload.subject, role: payload.role, iss: issuer, aud: audience, iat, exp },
        signer
      );
      return { token, expiresAt: fromEpochSeconds(exp) };
    },

    verify(token: string): TokenVerification<AccessClaims> {
      const decoded = decodeJwt(token, signer);
      if (!decoded.ok) {
        return { valid: false, error: 'invalid_token', message: 'Invalid token' };
      }

      const registered = checkRegisteredClaims(decoded.payload, {
        issuer,
        audience,
        nowSeconds: toEpochSeconds(clock()),
      });
      if (!registered.ok) {
        return registered.reason === 'expired'
          ? { valid: false, error: 'token_expired', message: 'Token has expired' }
          : { valid: false, error: 'invalid_token', message: 'Invalid token' };
      }

      const parsed = accessClaimsSchema.safeParse(decoded.payload);
      if (!parsed.success) {
        return { valid: false, error: 'invalid_token', message: 'Invalid token payload' };
      }

      return {
        valid: true,
        claims: {
          subject: parsed.data.sub,
          role: parsed.data.role,
          issuer: registered.claims.iss,
          audience: registered.claims.aud,
          issuedAt: fromEpochSeconds(registered.claims.iat),
          tokenExpiresAt: fromEpochSeconds(registered.claims.exp),
        },
      };
    },
  };
}
