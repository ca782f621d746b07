/**
 * AuthGate - Client Entity Types
 *
 * OAuth 2.0 client registrations.
 *
 * Key Pattern:
 *   PK: CLIENT#<client_id>
 *   SK: CONFIG
 *   GSI1PK: CLIENTS
 *   GSI1SK: <client_id> (for listing all clients)
 *
 * Policy invariants:
 * - Public clients (no secret) MUST require PKCE
 * - Redirect URIs are matched exactly
 * - Only `enabled` and the policy fields change after registration
 *
 * @see RFC 6749 Section 2 - Client Registration
 * @see RFC 7636 - Proof Key for Code Exchange
 */

import type { BaseItem, GrantType } from './base';

// =============================================================================
// Client Record
// =============================================================================

/**
 * A registered OAuth client as the services see it.
 */
export interface OAuthClient {
    /** Stable client identifier */
    clientId: string;

    /** Display name */
    clientName: string;

    /** Whether the client authenticates with a secret */
    confidential: boolean;

    /** SHA-256 hex of the client secret; absent for public clients */
    secretHash?: string;

    /** Registered redirect URIs (exact match) */
    redirectUris: readonly string[];

    /** Scopes the client may request */
    allowedScopes: readonly string[];

    /** Grant types the client is registered for */
    allowedGrantTypes: readonly GrantType[];

    /** Whether /authorize must carry a code_challenge */
    requirePkce: boolean;

    /** Access token lifetime in seconds */
    accessTokenTTL: number;

    /** Refresh token lifetime in seconds */
    refreshTokenTTL: number;

    /** Disabled clients fail both /authorize and /token */
    enabled: boolean;
}

/**
 * Fields an administrator may change after registration.
 */
export type ClientPolicyUpdate = Partial<Pick<OAuthClient,
    | 'clientName'
    | 'redirectUris'
    | 'allowedScopes'
    | 'allowedGrantTypes'
    | 'requirePkce'
    | 'accessTokenTTL'
    | 'refreshTokenTTL'
    | 'enabled'
>>;

// =============================================================================
// Client Entity
// =============================================================================

export interface ClientItem extends BaseItem, OAuthClient {
    /** PK pattern: CLIENT#<client_id> */
    PK: `CLIENT#${string}`;
    SK: 'CONFIG';
    GSI1PK: 'CLIENTS';
    entityType: 'CLIENT';
}
