/**
 * AuthGate - Authorization Endpoint Types
 *
 * @module oauth2_authorize/types
 * @see RFC 6749 Section 4.1.1 - Authorization Request
 * @see https://openid.net/specs/openid-connect-core-1_0.html#AuthRequest
 */

import type {
    AuthorizationCodeStore,
    AuthorizationRequestStore,
    ClientRegistry,
    CredentialSettings,
    OAuthError,
} from '@authgate/shared';
import type { AuditSink } from '../../../shared_types/audit';
import type { OAuthClient } from '../../../shared_types/client';
import type { CodeChallengeMethod } from '../../../shared_types/token';

// =============================================================================
// Requests
// =============================================================================

/**
 * Raw /authorize query parameters. Every field is untrusted until
 * `validateRequest` accepts it.
 */
export interface AuthorizeRequest {
    readonly responseType?: string;
    readonly clientId?: string;
    readonly redirectUri?: string;
    readonly scope?: string;
    readonly state?: string;
    readonly codeChallenge?: string;
    readonly codeChallengeMethod?: string;
    readonly nonce?: string;
}

/**
 * A request that passed validation. `scope` is the granted scope string,
 * defaulted from the client when the request named none.
 */
export interface ValidatedAuthorization {
    readonly client: OAuthClient;
    readonly redirectUri: string;
    readonly scope: string;
    readonly state?: string;
    readonly nonce?: string;
    readonly codeChallenge?: string;
    readonly codeChallengeMethod?: CodeChallengeMethod;
}

// =============================================================================
// Failures
// =============================================================================

/**
 * Where an authorization error goes. Errors found before the redirect URI
 * is trusted are answered directly; later ones go back to the client.
 */
export type AuthorizeFailure =
    | { readonly delivery: 'direct'; readonly error: OAuthError; readonly clientId?: string }
    | {
        readonly delivery: 'redirect';
        readonly error: OAuthError;
        readonly clientId: string;
        readonly redirectUri: string;
        readonly state?: string;
    };

// =============================================================================
// Dependencies
// =============================================================================

export interface AuthorizeDeps {
    readonly clients: ClientRegistry;
    readonly codes: AuthorizationCodeStore;
    readonly pendingRequests: AuthorizationRequestStore;
    readonly credentials: Pick<CredentialSettings, 'issuer' | 'signer' | 'clock'>;
    /** Where callers without a session are sent */
    readonly loginUrl: string;
    readonly auditSink?: AuditSink;
}
