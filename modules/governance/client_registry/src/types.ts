/**
 * AuthGate - Client Administration Types
 *
 * Request and response bodies use RFC 7591 metadata names.
 *
 * @see RFC 7591 Section 2 - Client Metadata
 */

import type {
    AuthorizationCodeStore,
    Clock,
    CredentialSettings,
    ManagedClientRegistry,
} from '@authgate/shared';
import type { AuditSink } from '../../../shared_types/audit';

export type TokenEndpointAuthMethod = 'client_secret_basic' | 'client_secret_post' | 'none';

// =============================================================================
// Request Bodies
// =============================================================================

/** POST /clients, field names as in RFC 7591 */
export interface ClientRegistrationRequest {
    client_name?: string;
    redirect_uris?: string[];
    grant_types?: string[];
    scope?: string;
    token_endpoint_auth_method?: TokenEndpointAuthMethod;
    require_pkce?: boolean;
    access_token_ttl?: number;
    refresh_token_ttl?: number;
}

// =============================================================================
// Responses
// =============================================================================

export interface ClientView {
    client_id: string;
    client_name: string;
    redirect_uris: string[];
    grant_types: string[];
    scope: string;
    token_endpoint_auth_method: TokenEndpointAuthMethod;
    require_pkce: boolean;
    access_token_ttl: number;
    refresh_token_ttl: number;
    enabled: boolean;
}

/** The plaintext secret appears here and nowhere else */
export interface ClientRegistrationResponse extends ClientView {
    client_id_issued_at: number;
    client_secret?: string;
    client_secret_expires_at?: number;
}

export interface ClientMetadataError {
    readonly code: 'invalid_client_metadata' | 'invalid_redirect_uri';
    readonly description: string;
}

// =============================================================================
// Dependencies
// =============================================================================

export interface ClientAdminDeps {
    readonly registry: ManagedClientRegistry;
    readonly codes: AuthorizationCodeStore;
    readonly clock: Clock;
    readonly credentials: CredentialSettings;
    readonly auditSink?: AuditSink;
}
