/**
 * AuthGate - Compact JWS Assembly and Verification
 *
 * Tokens are assembled by hand (base64url header and payload) so the
 * signature can come from KMS. Verification checks the RS256 signature,
 * then `iss`, `exp` and optionally `aud`.
 *
 * @see RFC 7515 Section 7.1 - JWS Compact Serialization
 * @see RFC 7519 Section 7.2 - Validating a JWT
 */

import { createVerify } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import { base64UrlDecode, base64UrlEncode } from '../crypto';
import { JwtAlgorithm } from '../constants';
import type { JwtSigner } from './signer';

export type JwtClaims = Record<string, unknown>;

export interface VerifyOptions {
    readonly issuer: string;
    /** Current time, Unix epoch seconds */
    readonly now: number;
    readonly audience?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeSegment(segment: string): Record<string, unknown> | null {
    try {
        const parsed: unknown = JSON.parse(base64UrlDecode(segment).toString('utf-8'));
        return isRecord(parsed) ? parsed : null;
    } catch {
        return null;
    }
}

/**
 * Sign a payload as an RS256 compact JWS.
 */
export async function signJwt<T extends object>(signer: JwtSigner, payload: T): Promise<string> {
    const header = { alg: JwtAlgorithm.RS256, typ: 'JWT', kid: signer.keyId };
    const signingInput = `${base64UrlEncode(JSON.stringify(header))}.${base64UrlEncode(JSON.stringify(payload))}`;
    const signature = await signer.sign(Buffer.from(signingInput));
    return `${signingInput}.${base64UrlEncode(signature)}`;
}

/**
 * Verify a compact JWS and return its claims, or null when the token is
 * malformed, not RS256, badly signed, expired, or for another issuer or
 * audience.
 */
export function verifyJwt(token: string, publicKey: KeyObject, options: VerifyOptions): JwtClaims | null {
    const parts = token.split('.');
    if (parts.length !== 3) {
        return null;
    }
    const [encodedHeader, encodedPayload, encodedSignature] = parts;

    const header = decodeSegment(encodedHeader);
    if (!header || header.alg !== JwtAlgorithm.RS256) {
        return null;
    }

    const valid = createVerify('RSA-SHA256')
        .update(`${encodedHeader}.${encodedPayload}`)
        .verify(publicKey, base64UrlDecode(encodedSignature));
    if (!valid) {
        return null;
    }

    const claims = decodeSegment(encodedPayload);
    if (!claims) {
        return null;
    }
    if (claims.iss !== options.issuer) {
        return null;
    }
    if (typeof claims.exp !== 'number' || claims.exp <= options.now) {
        return null;
    }
    if (options.audience !== undefined && claims.aud !== options.audience) {
        return null;
    }

    return claims;
}

// =============================================================================
// Claim Accessors
// =============================================================================

export function stringClaim(claims: JwtClaims, name: string): string | undefined {
    const value = claims[name];
    return typeof value === 'string' ? value : undefined;
}

export function numberClaim(claims: JwtClaims, name: string): number | undefined {
    const value = claims[name];
    return typeof value === 'number' ? value : undefined;
}

export function stringArrayClaim(claims: JwtClaims, name: string): string[] {
    const value = claims[name];
    return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}
