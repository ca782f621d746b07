/**
 * PKC-01: PKCE Engine
 *
 * Validates verifier generation, challenge computation and constant-time
 * verification for the S256 and plain methods.
 *
 * @see RFC 7636 Appendix B - Example for the S256 code_challenge_method
 */

import { describe, it, expect } from 'vitest';
import {
  SUPPORTED_CHALLENGE_METHODS,
  computeChallenge,
  generateCodeVerifier,
  isValidChallenge,
  validateVerifierShape,
  verifyChallenge,
} from '@authgate/shared';
import { unwrap, unwrapError } from '../support/fixtures';

const RFC_VERIFIER = 'dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk';
const RFC_CHALLENGE = 'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM';

describe('PKC-01: PKCE Engine', () => {
  describe('generateCodeVerifier', () => {
    it('should generate a 64-character unreserved verifier by default', () => {
      const verifier = unwrap(generateCodeVerifier());

      expect(verifier).toHaveLength(64);
      expect(verifier).toMatch(/^[A-Za-z0-9\-._~]+$/);
    });

    it('should accept the length bounds 43 and 128', () => {
      expect(unwrap(generateCodeVerifier(43))).toHaveLength(43);
      expect(unwrap(generateCodeVerifier(128))).toHaveLength(128);
    });

    it('should reject lengths outside 43-128', () => {
      for (const length of [42, 129, 0]) {
        const error = unwrapError(generateCodeVerifier(length));
        expect(error.kind).toBe('InvalidParameter');
        expect(error.message).toBe('Code verifier length must be between 43 and 128');
      }
    });

    it('should reject a fractional length', () => {
      expect(unwrapError(generateCodeVerifier(50.5)).kind).toBe('InvalidParameter');
    });

    it('should produce different verifiers on each call', () => {
      expect(unwrap(generateCodeVerifier())).not.toBe(unwrap(generateCodeVerifier()));
    });
  });

  describe('computeChallenge', () => {
    it('should match the RFC 7636 S256 example', () => {
      expect(unwrap(computeChallenge(RFC_VERIFIER, 'S256'))).toBe(RFC_CHALLENGE);
    });

    it('should return the verifier unchanged for plain', () => {
      expect(unwrap(computeChallenge(RFC_VERIFIER, 'plain'))).toBe(RFC_VERIFIER);
    });

    it('should reject an unsupported method', () => {
      const error = unwrapError(computeChallenge(RFC_VERIFIER, 'S512'));
      expect(error.kind).toBe('UnsupportedMethod');
      expect(error.message).toBe('Unsupported code_challenge_method: S512');
    });

    it('should not accept a lowercase method name', () => {
      expect(computeChallenge(RFC_VERIFIER, 's256').ok).toBe(false);
    });
  });

  describe('verifyChallenge', () => {
    it('should verify the matching verifier', () => {
      expect(verifyChallenge(RFC_VERIFIER, RFC_CHALLENGE, 'S256')).toBe(true);
      expect(verifyChallenge(RFC_VERIFIER, RFC_VERIFIER, 'plain')).toBe(true);
    });

    it('should reject a different verifier', () => {
      const other = `${RFC_VERIFIER.slice(0, -1)}A`;
      expect(verifyChallenge(other, RFC_CHALLENGE, 'S256')).toBe(false);
    });

    it('should reject an S256 challenge presented as plain', () => {
      expect(verifyChallenge(RFC_VERIFIER, RFC_CHALLENGE, 'plain')).toBe(false);
    });

    it('should never verify under an unsupported method', () => {
      expect(verifyChallenge(RFC_VERIFIER, RFC_VERIFIER, 'none')).toBe(false);
    });
  });

  describe('validateVerifierShape', () => {
    it('should accept 43 and 128 character verifiers', () => {
      expect(validateVerifierShape('a'.repeat(43)).ok).toBe(true);
      expect(validateVerifierShape('a'.repeat(128)).ok).toBe(true);
    });

    it('should reject verifiers of 42 or 129 characters', () => {
      expect(validateVerifierShape('a'.repeat(42)).ok).toBe(false);
      expect(validateVerifierShape('a'.repeat(129)).ok).toBe(false);
    });

    it('should reject characters outside the unreserved set', () => {
      const error = unwrapError(validateVerifierShape(`${'a'.repeat(42)}+`));
      expect(error.kind).toBe('InvalidParameter');
      expect(error.message).toBe('code_verifier must be 43-128 characters from [A-Za-z0-9-._~]');
    });
  });

  it('should accept an S256 digest as a challenge', () => {
    expect(isValidChallenge(RFC_CHALLENGE)).toBe(true);
    expect(isValidChallenge('too-short')).toBe(false);
  });

  it('should advertise S256 and plain', () => {
    expect(SUPPORTED_CHALLENGE_METHODS).toEqual(['S256', 'plain']);
  });
});
