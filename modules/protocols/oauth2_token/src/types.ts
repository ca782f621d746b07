/**
 * AuthGate - Token Endpoint Types
 *
 * @module oauth2_token/types
 * @see RFC 6749 Section 4.1.3 - Access Token Request
 * @see RFC 6749 Section 5.1 - Successful Response
 */

import type {
    AuthorizationCodeStore,
    ClientCredentials,
    ClientRegistry,
    Clock,
    JwtSigner,
} from '@authgate/shared';
import type { AuditSink } from '../../../shared_types/audit';

// =============================================================================
// Request
// =============================================================================

/**
 * Parsed POST /token parameters. `credentials.clientId` is the requesting
 * client, whether it came from the Basic header or the body.
 */
export interface TokenRequest {
    readonly grantType?: string;
    readonly code?: string;
    readonly redirectUri?: string;
    readonly codeVerifier?: string;
    readonly credentials: ClientCredentials;
}

// =============================================================================
// Response
// =============================================================================

export interface TokenResponseBody {
    access_token: string;
    token_type: 'Bearer';
    /** Access token lifetime, seconds */
    expires_in: number;
    /** Opaque; the refresh_token grant is not served */
    refresh_token: string;
    scope: string;
    /** Only when `openid` was granted */
    id_token?: string;
}

// =============================================================================
// Dependencies
// =============================================================================

export interface TokenSettings {
    /** `iss` of every token */
    readonly issuer: string;
    readonly signer: JwtSigner;
    /** ID token lifetime, seconds */
    readonly idTokenTtl: number;
}

export interface TokenDeps extends TokenSettings {
    readonly clients: ClientRegistry;
    readonly codes: AuthorizationCodeStore;
    readonly clock: Clock;
    /**
     * Origins allowed to call /token from a browser. Exact matches and
     * wildcard patterns (https://*.example.com); empty allows any origin.
     */
    readonly allowedOrigins: readonly string[];
    readonly auditSink?: AuditSink;
}
