/**
 * License Key Codec Unit Tests
 */

import { describe, it, expect } from 'vitest';

import {
  generateLicenseKey,
  maskLicenseKey,
  normalizeLicenseKey,
  validateLicenseKeyFormat,
} from '@/services/license-key.js';

describe('License Key Codec', () => {
  describe('generateLicenseKey()', () => {
    it('should produce PREFIX plus four segments', () => {
      const key = generateLicenseKey();

      expect(key).toMatch(/^FL-[A-Z0-9]{4}-[A-Z0-9]{4}-[A-Z0-9]{4}-[A-Z0-9]{4}$/);
      expect(validateLicenseKeyFormat(key)).toBe(true);
    });

    it('should honour a custom prefix and segment length', () => {
      const key = generateLicenseKey('ACME', 6);

      expect(key).toMatch(/^ACME(-[A-Z0-9]{6}){4}$/);
      expect(validateLicenseKeyFormat(key, 'ACME')).toBe(true);
    });

    it('should not repeat keys', () => {
      const keys = new Set(Array.from({ length: 200 }, () => generateLicenseKey()));

      expect(keys.size).toBe(200);
    });

    it('should reject bad prefixes and short segments', () => {
      expect(() => generateLicenseKey('fl')).toThrow(
        'License key prefix must be uppercase alphanumeric: fl'
      );
      expect(() => generateLicenseKey('FL', 3)).toThrow(
        'License key segments must be at least 4 characters'
      );
    });
  });

  describe('validateLicenseKeyFormat()', () => {
    it.each([
      ['FL-ABCD-EFGH-JKLM-NPQR', true],
      ['FL-ABCDE-1234-5678-90XY', true],
      ['', false],
      ['FL-AB', false],
      ['FL-ABCD-EFGH-JKLM', false],
      ['FL-ABCD-EFGH-JKLM-NPQR-STUV', false],
      ['XX-ABCD-EFGH-JKLM-NPQR', false],
      ['FL-ABC-EFGH-JKLM-NPQR', false],
      ['FL-abcd-EFGH-JKLM-NPQR', false],
      ['FL-AB_D-EFGH-JKLM-NPQR', false],
      ['FL--EFGH-JKLM-NPQR', false],
    ])('should judge %j as %s', (key, expected) => {
      expect(validateLicenseKeyFormat(key)).toBe(expected);
    });

    it('should check against the configured prefix', () => {
      expect(validateLicenseKeyFormat('ACME-ABCD-EFGH-JKLM-NPQR', 'ACME')).toBe(true);
      expect(validateLicenseKeyFormat('FL-ABCD-EFGH-JKLM-NPQR', 'ACME')).toBe(false);
    });
  });

  it('should normalize case and whitespace', () => {
    expect(normalizeLicenseKey('  fl-abcd-efgh-jklm-npqr\n')).toBe('FL-ABCD-EFGH-JKLM-NPQR');
  });

  it('should mask all but the first eight characters', () => {
    expect(maskLicenseKey('FL-ABCD-EFGH-JKLM-NPQR')).toBe('FL-ABCD-***');
  });
});
