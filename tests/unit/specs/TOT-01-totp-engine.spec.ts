/**
 * TOT-01: TOTP Engine
 *
 * Validates HOTP/TOTP code generation against the published reference
 * values, drift-window verification and secret handling.
 *
 * @see RFC 4226 Appendix D - HOTP Algorithm: Test Values
 * @see RFC 6238 Appendix B - Test Vectors
 */

import { describe, it, expect } from 'vitest';
import {
  SECRET_LENGTH,
  generateSecret,
  hotp,
  isValidSecret,
  timeStep,
  totp,
  verifyTotp,
} from '@authgate/auth-mfa-totp';

/** Base32 of the ASCII key "12345678901234567890" */
const RFC_SECRET = 'GEZDGNBVGY3TQOJQGEZDGNBVGY3TQOJQ';

const HOTP_VALUES = [
  '755224', '287082', '359152', '969429', '338314',
  '254676', '287922', '162583', '399871', '520489',
];

describe('TOT-01: TOTP Engine', () => {
  describe('HOTP', () => {
    it('should match the reference values for counters 0-9', () => {
      HOTP_VALUES.forEach((expected, counter) => {
        expect(hotp(RFC_SECRET, counter)).toBe(expected);
      });
    });

    it('should throw on a secret that is not Base32', () => {
      expect(() => hotp('NOT-BASE32!', 0)).toThrow('TOTP secret is not valid Base32');
    });
  });

  describe('TOTP', () => {
    it.each([
      [59, '287082'],
      [1111111109, '081804'],
      [1111111111, '050471'],
      [1234567890, '005924'],
      [2000000000, '279037'],
    ])('should produce the reference code at T=%i', (time, expected) => {
      expect(totp(RFC_SECRET, time)).toBe(expected);
    });

    it('should keep leading zeros', () => {
      expect(totp(RFC_SECRET, 1234567890)).toHaveLength(6);
    });

    it('should derive the time step from the period', () => {
      expect(timeStep(59)).toBe(1);
      expect(timeStep(60)).toBe(2);
      expect(timeStep(59, 60)).toBe(0);
    });
  });

  describe('verifyTotp', () => {
    it('should accept the current step and one step either side', () => {
      // T=59 is step 1; steps 0, 1 and 2 are inside the window
      expect(verifyTotp(RFC_SECRET, '755224', 59)).toBe(true);
      expect(verifyTotp(RFC_SECRET, '287082', 59)).toBe(true);
      expect(verifyTotp(RFC_SECRET, '359152', 59)).toBe(true);
    });

    it('should reject codes two steps away', () => {
      expect(verifyTotp(RFC_SECRET, '969429', 59)).toBe(false);
    });

    it('should widen acceptance with a larger window', () => {
      expect(verifyTotp(RFC_SECRET, '969429', 59, { window: 2, period: 30 })).toBe(true);
    });

    it('should skip negative counters at the start of time', () => {
      expect(verifyTotp(RFC_SECRET, '755224', 0)).toBe(true);
      expect(verifyTotp(RFC_SECRET, '287082', 0)).toBe(true);
    });

    it('should reject codes that are not exactly six digits', () => {
      expect(verifyTotp(RFC_SECRET, '28708', 59)).toBe(false);
      expect(verifyTotp(RFC_SECRET, '2870820', 59)).toBe(false);
      expect(verifyTotp(RFC_SECRET, '28708a', 59)).toBe(false);
      expect(verifyTotp(RFC_SECRET, ' 287082', 59)).toBe(false);
    });

    it('should reject rather than throw on a malformed secret', () => {
      expect(verifyTotp('not base32!', '287082', 59)).toBe(false);
    });
  });

  describe('secrets', () => {
    it('should generate 32-character Base32 secrets of 20 bytes', () => {
      const secret = generateSecret();

      expect(secret).toHaveLength(SECRET_LENGTH);
      expect(secret).toMatch(/^[A-Z2-7]{32}$/);
      expect(isValidSecret(secret)).toBe(true);
    });

    it('should generate a fresh secret each time', () => {
      expect(generateSecret()).not.toBe(generateSecret());
    });

    it('should accept a lowercase secret', () => {
      expect(isValidSecret(RFC_SECRET.toLowerCase())).toBe(true);
      expect(totp(RFC_SECRET.toLowerCase(), 59)).toBe('287082');
      expect(verifyTotp(RFC_SECRET.toLowerCase(), '287082', 59)).toBe(true);
    });

    it('should reject secrets of the wrong length or alphabet', () => {
      expect(isValidSecret(RFC_SECRET.slice(0, 31))).toBe(false);
      expect(isValidSecret(`${RFC_SECRET.slice(0, 31)}1`)).toBe(false);
      expect(isValidSecret(RFC_SECRET)).toBe(true);
    });
  });
});
