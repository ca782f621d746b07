/**
 * AuthGate - Authorization Code Entity Types
 *
 * Security:
 * - Codes are single-use (used flag flips exactly once, under a condition)
 * - Codes are stored under their SHA-256 hash, never in plaintext
 * - Expiry is enforced at redemption; TTL deletion only bounds growth
 *
 * @see RFC 6749 Section 4.1 - Authorization Code Grant
 * @see RFC 7636 - Proof Key for Code Exchange (PKCE)
 */

import type { BaseItem } from './base';

export type CodeChallengeMethod = 'S256' | 'plain';

// =============================================================================
// Authorization Code
// =============================================================================

/**
 * A minted authorization code. Times are Unix epoch seconds.
 */
export interface AuthorizationCode {
    code: string;
    clientId: string;
    userId: string;
    username: string;
    /** redirect_uri from the originating /authorize request */
    redirectUri: string;
    /** Granted scopes (space-delimited) */
    scope: string;
    codeChallenge?: string;
    codeChallengeMethod?: CodeChallengeMethod;
    /** OIDC nonce echoed into the ID token */
    nonce?: string;
    issuedAt: number;
    expiresAt: number;
    used: boolean;
    usedAt?: number;
}

// =============================================================================
// Authorization Code Entity
// PK: CODE#<sha256(code)>  SK: METADATA
// GSI1PK: CLIENT#<client_id>  GSI1SK: CODE#<issuedAt>
// =============================================================================

export interface AuthCodeItem extends BaseItem {
    PK: `CODE#${string}`;
    SK: 'METADATA';
    GSI1PK: `CLIENT#${string}`;
    entityType: 'AUTH_CODE';

    clientId: string;
    userId: string;
    username: string;
    redirectUri: string;
    scope: string;
    codeChallenge?: string;
    codeChallengeMethod?: CodeChallengeMethod;
    nonce?: string;
    issuedAt: number;
    expiresAt: number;
    used: boolean;
    usedAt?: number;
}
