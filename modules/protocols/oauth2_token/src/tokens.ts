/**
 * AuthGate - Token Minting
 *
 * Builds and signs the tokens returned by a successful code exchange:
 *
 * - Access token: RS256 JWT, audience is the client, lifetime from client policy
 * - Refresh token: 32 random bytes, base64url; not stored
 * - ID token: RS256 JWT, only when `openid` was granted
 *
 * @module oauth2_token/tokens
 * @see RFC 9068 - JWT Profile for OAuth 2.0 Access Tokens
 * @see https://openid.net/specs/openid-connect-core-1_0.html#IDToken
 */

import { randomUUID } from 'node:crypto';
import {
    StandardScopes,
    TokenUse,
    base64UrlEncode,
    generateSecureRandom,
    parseScopes,
    sha256,
    signJwt,
} from '@authgate/shared';
import type { OAuthClient } from '../../../shared_types/client';
import type { AuthorizationCode } from '../../../shared_types/token';
import type { TokenSettings } from './types';

const REFRESH_TOKEN_BYTES = 32;

// =============================================================================
// Claims
// =============================================================================

export interface AccessTokenClaims {
    iss: string;
    sub: string;
    aud: string;
    iat: number;
    exp: number;
    scope: string;
    username: string;
    client_id: string;
    jti: string;
    token_use: 'access';
}

export interface IdTokenClaims {
    iss: string;
    sub: string;
    aud: string;
    iat: number;
    exp: number;
    auth_time: number;
    preferred_username: string;
    at_hash: string;
    nonce?: string;
    token_use: 'id';
}

export interface IssuedTokens {
    accessToken: string;
    accessTokenExpiresIn: number;
    refreshToken: string;
    idToken?: string;
}

export function buildAccessTokenClaims(
    code: AuthorizationCode,
    client: OAuthClient,
    issuer: string,
    now: number
): AccessTokenClaims {
    return {
        iss: issuer,
        sub: code.userId,
        aud: client.clientId,
        iat: now,
        exp: now + client.accessTokenTTL,
        scope: code.scope,
        username: code.username,
        client_id: client.clientId,
        jti: randomUUID(),
        token_use: TokenUse.ACCESS,
    };
}

/**
 * `auth_time` is when the code was issued, the closest record of the
 * user's authentication this server keeps.
 */
export function buildIdTokenClaims(
    code: AuthorizationCode,
    accessToken: string,
    issuer: string,
    now: number,
    ttl: number
): IdTokenClaims {
    return {
        iss: issuer,
        sub: code.userId,
        aud: code.clientId,
        iat: now,
        exp: now + ttl,
        auth_time: code.issuedAt,
        preferred_username: code.username,
        at_hash: computeAtHash(accessToken),
        ...(code.nonce !== undefined && { nonce: code.nonce }),
        token_use: TokenUse.ID,
    };
}

/**
 * Left-most half of the SHA-256 of the access token, base64url.
 *
 * @see https://openid.net/specs/openid-connect-core-1_0.html#CodeIDToken
 */
export function computeAtHash(accessToken: string): string {
    return base64UrlEncode(sha256(accessToken).subarray(0, 16));
}

// =============================================================================
// Minting
// =============================================================================

export async function mintTokens(
    settings: TokenSettings,
    code: AuthorizationCode,
    client: OAuthClient,
    now: number
): Promise<IssuedTokens> {
    const accessToken = await signJwt(settings.signer, buildAccessTokenClaims(code, client, settings.issuer, now));
    const refreshToken = generateSecureRandom(REFRESH_TOKEN_BYTES);

    if (!parseScopes(code.scope).includes(StandardScopes.OPENID)) {
        return { accessToken, accessTokenExpiresIn: client.accessTokenTTL, refreshToken };
    }

    const idToken = await signJwt(
        settings.signer,
        buildIdTokenClaims(code, accessToken, settings.issuer, now, settings.idTokenTtl)
    );
    return { accessToken, accessTokenExpiresIn: client.accessTokenTTL, refreshToken, idToken };
}
