/**
 * Compact JWS codec
 *
 * header.payload.signature, each segment base64url. Supports RS256 for
 * license tokens and HS256 for operator access tokens. The verifier is
 * bound to one algorithm and rejects tokens whose header names another.
 */

import {
  createHmac,
  createSign,
  createVerify,
  timingSafeEqual,
  type KeyObject,
} from 'node:crypto';

export type JwsAlgorithm = 'RS256' | 'HS256';

export interface JwsSigner {
  readonly algorithm: JwsAlgorithm;
  sign(signingInput: string): Buffer;
  verify(signingInput: string, signature: Buffer): boolean;
}

export type JwtPayload = Record<string, unknown>;

export type DecodeFailure = 'malformed' | 'algorithm_mismatch' | 'bad_signature';

export type DecodeOutcome =
  | { ok: true; payload: JwtPayload }
  | { ok: false; reason: DecodeFailure };

const BASE64URL_SEGMENT = /^[A-Za-z0-9_-]*$/;

function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value), 'utf8').toString('base64url');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeSegment(segment: string): Record<string, unknown> | null {
  if (!BASE64URL_SEGMENT.test(segment)) return null;
  try {
    const parsed: unknown = JSON.parse(
      Buffer.from(segment, 'base64url').toString('utf8')
    );
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * RSA-SHA256 signer. Verification only needs the public key; a signer
 * built without a private key refuses to sign.
 */
export function createRs256Signer(keys: {
  privateKey?: KeyObject;
  publicKey: KeyObject;
}): JwsSigner {
  return {
    algorithm: 'RS256',
    sign(signingInput: string): Buffer {
      if (keys.privateKey === undefined) {
        throw new Error('RS256 signer has no private key');
      }
      return createSign('RSA-SHA256').update(signingInput).sign(keys.privateKey);
    },
    verify(signingInput: string, signature: Buffer): boolean {
      try {
        return createVerify('RSA-SHA256')
          .update(signingInput)
          .verify(keys.publicKey, signature);
      } catch {
        return false;
      }
    },
  };
}

/**
 * HMAC-SHA256 signer
 */
export function createHs256Signer(secret: string): JwsSigner {
  if (secret.length === 0) {
    throw new Error('HS256 secret must not be empty');
  }
  const mac = (input: string) =>
    createHmac('sha256', secret).update(input).digest();

  return {
    algorithm: 'HS256',
    sign: mac,
    verify(signingInput: string, signature: Buffer): boolean {
      const expected = mac(signingInput);
      return (
        expected.length === signature.length &&
        timingSafeEqual(expected, signature)
      );
    },
  };
}

export function encodeJwt(payload: JwtPayload, signer: JwsSigner): string {
  const signingInput = `${encodeSegment({ alg: signer.algorithm, typ: 'JWT' })}.${encodeSegment(payload)}`;
  const signature = signer.sign(signingInput).toString('base64url');
  return `${signingInput}.${signature}`;
}

/**
 * Check structure, algorithm and signature. Claims are not inspected here.
 */
export function decodeJwt(token: string, signer: JwsSigner): DecodeOutcome {
  const segments = token.split('.');
  if (segments.length !== 3) {
    return { ok: false, reason: 'malformed' };
  }
  const [headerSegment = '', payloadSegment = '', signatureSegment = ''] =
    segments;

  const header = decodeSegment(headerSegment);
  const payload = decodeSegment(payloadSegment);
  if (
    header === null ||
    payload === null ||
    signatureSegment === '' ||
    !BASE64URL_SEGMENT.test(signatureSegment)
  ) {
    return { ok: false, reason: 'malformed' };
  }

  if (header.alg !== signer.algorithm) {
    return { ok: false, reason: 'algorithm_mismatch' };
  }

  const signature = Buffer.from(signatureSegment, 'base64url');
  if (!signer.verify(`${headerSegment}.${payloadSegment}`, signature)) {
    return { ok: false, reason: 'bad_signature' };
  }

  return { ok: true, payload };
}

export type RegisteredClaimsFailure =
  | 'expired'
  | 'issuer_mismatch'
  | 'audience_mismatch'
  | 'missing_claims'
  | 'not_yet_valid';

export interface RegisteredClaims {
  iss: string;
  aud: string;
  iat: number;
  exp: number;
}

/**
 * Check iss, aud, iat and exp against expectations
 */
export function checkRegisteredClaims(
  payload: JwtPayload,
  expected: {
    issuer: string;
    audience: string;
    nowSeconds: number;
    clockToleranceSeconds?: number;
  }
):
  | { ok: true; claims: RegisteredClaims }
  | { ok: false; reason: RegisteredClaimsFailure } {
  const { iss, aud, iat, exp } = payload;
  if (
    typeof iss !== 'string' ||
    typeof aud !== 'string' ||
    typeof iat !== 'number' ||
    typeof exp !== 'number'
  ) {
    return { ok: false, reason: 'missing_claims' };
  }

  const tolerance = expected.clockToleranceSeconds ?? 0;
  if (iss !== expected.issuer) {
    return { ok: false, reason: 'issuer_mismatch' };
  }
  if (aud !== expected.audience) {
    return { ok: false, reason: 'audience_mismatch' };
  }
  if (iat > expected.nowSeconds + tolerance) {
    return { ok: false, reason: 'not_yet_valid' };
  }
  if (exp <= expected.nowSeconds - tolerance) {
    return { ok: false, reason: 'expired' };
  }

  return { ok: true, claims: { iss, aud, iat, exp } };
}
