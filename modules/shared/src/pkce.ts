/**
 * AuthGate - PKCE Verifier
 *
 * Code verifier generation and validation, and S256/plain challenge
 * computation and comparison.
 *
 * @see RFC 7636 Section 4.1 - code_verifier = 43*128unreserved
 * @see RFC 7636 Section 4.2 - code_challenge = BASE64URL(SHA256(ASCII(code_verifier)))
 * @see RFC 7636 Section 4.6 - Server Verifies code_verifier
 */

import type { CodeChallengeMethod } from '../../shared_types/token';
import { base64UrlEncode, constantTimeEqual, randomString, sha256 } from './crypto';
import { fail, ok } from './errors';
import type { Result } from './errors';

// =============================================================================
// Constants
// =============================================================================

/** RFC 3986 Section 2.3 unreserved characters */
const UNRESERVED = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-._~';

export const VERIFIER_MIN_LENGTH = 43;
export const VERIFIER_MAX_LENGTH = 128;

const VERIFIER_PATTERN = /^[A-Za-z0-9\-._~]{43,128}$/;

export const SUPPORTED_CHALLENGE_METHODS: readonly CodeChallengeMethod[] = ['S256', 'plain'];

// =============================================================================
// Errors
// =============================================================================

export type PkceErrorKind = 'InvalidParameter' | 'UnsupportedMethod';

export interface PkceError {
    readonly kind: PkceErrorKind;
    readonly message: string;
}

export function isChallengeMethod(value: string): value is CodeChallengeMethod {
    return value === 'S256' || value === 'plain';
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Generate a code verifier of `length` unreserved characters.
 */
export function generateCodeVerifier(length = 64): Result<string, PkceError> {
    if (!Number.isInteger(length) || length < VERIFIER_MIN_LENGTH || length > VERIFIER_MAX_LENGTH) {
        return fail({
            kind: 'InvalidParameter',
            message: `Code verifier length must be between ${VERIFIER_MIN_LENGTH} and ${VERIFIER_MAX_LENGTH}`,
        });
    }
    return ok(randomString(UNRESERVED, length));
}

/**
 * Compute the challenge for a verifier. `S256` hashes; `plain` returns
 * the verifier unchanged.
 */
export function computeChallenge(verifier: string, method: string): Result<string, PkceError> {
    switch (method) {
        case 'S256':
            return ok(base64UrlEncode(sha256(verifier)));
        case 'plain':
            return ok(verifier);
        default:
            return fail({ kind: 'UnsupportedMethod', message: `Unsupported code_challenge_method: ${method}` });
    }
}

/**
 * Recompute the challenge from `verifier` and compare it with the stored
 * one in constant time. Unsupported methods never verify.
 */
export function verifyChallenge(verifier: string, storedChallenge: string, method: string): boolean {
    const computed = computeChallenge(verifier, method);
    if (!computed.ok) {
        return false;
    }
    return constantTimeEqual(computed.value, storedChallenge);
}

/**
 * Check length and character set of a verifier from an untrusted client.
 */
export function validateVerifierShape(verifier: string): Result<string, PkceError> {
    if (!VERIFIER_PATTERN.test(verifier)) {
        return fail({
            kind: 'InvalidParameter',
            message: 'code_verifier must be 43-128 characters from [A-Za-z0-9-._~]',
        });
    }
    return ok(verifier);
}

/**
 * A challenge must itself look like a verifier: a base64url S256 digest is
 * 43 characters and a plain challenge is the verifier.
 */
export function isValidChallenge(challenge: string): boolean {
    return VERIFIER_PATTERN.test(challenge);
}
