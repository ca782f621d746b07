/**
 * AuthGate - Cryptographic Utilities
 *
 * Token hashing, secure random generation, base64url and constant-time
 * comparison shared by the protocol and MFA modules.
 *
 * - Comparisons of secrets use `constantTimeEqual`
 * - Codes, client secrets and backup codes are stored as SHA-256 hashes
 * - Random generation uses the Node.js CSPRNG
 *
 * @see RFC 4648 Section 5 - Base64url Encoding
 */

import { createHash, randomBytes, randomInt, timingSafeEqual } from 'node:crypto';

// =============================================================================
// Constants
// =============================================================================

const HASH_ALGORITHM = 'sha256';

/** Default entropy bytes for secure random generation */
const DEFAULT_ENTROPY_BYTES = 32;

// =============================================================================
// Hashing
// =============================================================================

/**
 * Hash a token for storage (hex encoded, 64 characters).
 *
 * @example
 * ```typescript
 * const code = generateSecureRandom();
 * const key = `CODE#${hashToken(code)}`;
 * ```
 */
export function hashToken(token: string): string {
    return createHash(HASH_ALGORITHM).update(token).digest('hex');
}

/** Raw SHA-256 digest of an ASCII string */
export function sha256(input: string): Buffer {
    return createHash(HASH_ALGORITHM).update(input, 'ascii').digest();
}

// =============================================================================
// Base64URL Encoding
// =============================================================================

/**
 * Encode to base64url without padding.
 */
export function base64UrlEncode(data: Buffer | string): string {
    const buffer = typeof data === 'string' ? Buffer.from(data) : data;
    return buffer
        .toString('base64')
        .replace(/\+/g, '-')
        .replace(/\//g, '_')
        .replace(/=+$/, '');
}

export function base64UrlDecode(encoded: string): Buffer {
    let base64 = encoded.replace(/-/g, '+').replace(/_/g, '/');

    const padding = 4 - (base64.length % 4);
    if (padding !== 4) {
        base64 += '='.repeat(padding);
    }

    return Buffer.from(base64, 'base64');
}

// =============================================================================
// Secure Random Generation
// =============================================================================

/**
 * Generate a base64url random string.
 *
 * @param byteLength - Number of random bytes (default 32, 256 bits)
 */
export function generateSecureRandom(byteLength = DEFAULT_ENTROPY_BYTES): string {
    return base64UrlEncode(randomBytes(byteLength));
}

/**
 * Draw `length` characters uniformly from `alphabet`.
 */
export function randomString(alphabet: string, length: number): string {
    let out = '';
    for (let i = 0; i < length; i++) {
        out += alphabet[randomInt(alphabet.length)];
    }
    return out;
}

// =============================================================================
// Constant-Time Comparison
// =============================================================================

/**
 * Compare two strings without leaking where they differ or, through an
 * early return, whether their lengths differ. On a length mismatch the
 * expected value is compared against itself and the result discarded.
 */
export function constantTimeEqual(actual: string, expected: string): boolean {
    const a = Buffer.from(actual, 'utf-8');
    const b = Buffer.from(expected, 'utf-8');

    if (a.length !== b.length) {
        timingSafeEqual(b, Buffer.alloc(b.length, 0));
        return false;
    }

    return timingSafeEqual(a, b);
}
