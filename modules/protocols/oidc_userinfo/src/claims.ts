/**
 * AuthGate - UserInfo Claims
 *
 * Access token verification and scope-based claim release.
 *
 * Scope-Based Claims (OIDC Core Section 5.4):
 *   - openid: sub (always included, required for UserInfo)
 *   - profile: preferred_username, updated_at
 *   - email: email, email_verified
 *
 * @module oidc_userinfo/claims
 * @see https://openid.net/specs/openid-connect-core-1_0.html#ScopeClaims
 */

import { StandardScopes, TokenUse, parseScopes, stringClaim, verifyJwt } from '@authgate/shared';
import type { KeyObject } from 'node:crypto';
import type { UserRecord } from '../../../shared_types/user';

// =============================================================================
// Types
// =============================================================================

export interface VerifiedAccessToken {
    readonly sub: string;
    readonly clientId?: string;
    readonly scopes: readonly string[];
}

/**
 * OIDC UserInfo response per Section 5.3.2.
 */
export interface UserInfoResponse {
    sub: string;
    preferred_username?: string;
    /** Seconds since the epoch */
    updated_at?: number;
    email?: string;
    email_verified?: boolean;
}

// =============================================================================
// Access Token Verification
// =============================================================================

/**
 * Verify an access token issued by this server. ID tokens and session
 * credentials are signed with the same key and are rejected by
 * `token_use`.
 */
export function verifyAccessToken(
    token: string,
    publicKey: KeyObject,
    issuer: string,
    now: number
): VerifiedAccessToken | null {
    const claims = verifyJwt(token, publicKey, { issuer, now });
    if (!claims || claims.token_use !== TokenUse.ACCESS) {
        return null;
    }

    const sub = stringClaim(claims, 'sub');
    if (!sub) {
        return null;
    }

    return {
        sub,
        clientId: stringClaim(claims, 'client_id'),
        scopes: parseScopes(stringClaim(claims, 'scope')),
    };
}

// =============================================================================
// Claims
// =============================================================================

function epochSeconds(isoTimestamp: string): number | undefined {
    const millis = Date.parse(isoTimestamp);
    return isNaN(millis) ? undefined : Math.floor(millis / 1000);
}

export function buildUserInfoResponse(user: UserRecord, scopes: readonly string[]): UserInfoResponse {
    const response: UserInfoResponse = { sub: user.userId };

    if (scopes.includes(StandardScopes.PROFILE)) {
        response.preferred_username = user.username;
        const updatedAt = epochSeconds(user.updatedAt);
        if (updatedAt !== undefined) {
            response.updated_at = updatedAt;
        }
    }

    if (scopes.includes(StandardScopes.EMAIL) && user.email !== undefined) {
        response.email = user.email;
        response.email_verified = user.emailVerified;
    }

    return response;
}
