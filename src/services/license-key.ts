/**
 * License Key Codec
 *
 * Keys look like PREFIX-XXXX-XXXX-XXXX-XXXX. Format validation is a cheap
 * pre-check before the storage lookup, never a substitute for it.
 */

import { customAlphabet } from 'nanoid';

export const LICENSE_KEY_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const DEFAULT_LICENSE_KEY_PREFIX = 'FL';
export const LICENSE_KEY_SEGMENTS = 4;
export const MIN_SEGMENT_LENGTH = 4;

const SEGMENT_PATTERN = /^[A-Z0-9]+$/;

const generators = new Map<number, () => string>();

function segmentGenerator(length: number): () => string {
  let generate = generators.get(length);
  if (generate === undefined) {
    generate = customAlphabet(LICENSE_KEY_ALPHABET, length);
    generators.set(length, generate);
  }
  return generate;
}

/**
 * Generate a license key from a cryptographically secure source
 */
export function generateLicenseKey(
  prefix: string = DEFAULT_LICENSE_KEY_PREFIX,
  segmentLength: number = MIN_SEGMENT_LENGTH
): string {
  if (!SEGMENT_PATTERN.test(prefix)) {
    throw new Error(`License key prefix must be uppercase alphanumeric: ${prefix}`);
  }
  if (!Number.isInteger(segmentLength) || segmentLength < MIN_SEGMENT_LENGTH) {
    throw new Error(
      `License key segments must be at least ${MIN_SEGMENT_LENGTH} characters`
    );
  }

  const generate = segmentGenerator(segmentLength);
  const segments = Array.from({ length: LICENSE_KEY_SEGMENTS }, () => generate());
  return [prefix, ...segments].join('-');
}

/**
 * Check segment count, prefix and segment alphabet/length
 */
export function validateLicenseKeyFormat(
  licenseKey: string,
  prefix: string = DEFAULT_LICENSE_KEY_PREFIX
): boolean {
  if (licenseKey === '') {
    return false;
  }

  const parts = licenseKey.split('-');
  if (parts.length !== LICENSE_KEY_SEGMENTS + 1) {
    return false;
  }

  const [head, ...segments] = parts;
  if (head !== prefix) {
    return false;
  }

  return segments.every(
    (segment) =>
      segment.length >= MIN_SEGMENT_LENGTH && SEGMENT_PATTERN.test(segment)
  );
}

/**
 * Clients type keys by hand; tolerate case and surrounding whitespace
 */
export function normalizeLicenseKey(licenseKey: string): string {
  return licenseKey.trim().toUpperCase();
}

/**
 * Safe form for logs and listings
 */
export function maskLicenseKey(licenseKey: string): string {
  return `${licenseKey.slice(0, 8)}***`;
}
