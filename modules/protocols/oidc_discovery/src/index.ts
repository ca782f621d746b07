/**
 * AuthGate - OIDC Discovery Endpoint - Lambda Handler
 *
 * Implements GET /.well-known/openid-configuration per OpenID Connect
 * Discovery 1.0. The document is derived from the issuer alone and is the
 * same for every request.
 *
 * Caching Strategy:
 *   - Cache-Control: public, max-age=3600 (1 hour)
 *   - Metadata is static per deployment
 *
 * @module oidc_discovery
 * @see https://openid.net/specs/openid-connect-discovery-1_0.html
 * @see RFC 8414 - OAuth 2.0 Authorization Server Metadata
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    GrantTypes,
    JwtAlgorithm,
    ResponseTypes,
    StandardScopes,
    SUPPORTED_CHALLENGE_METHODS,
    cacheableJson,
    createLogger,
    getMethod,
    lazyHandler,
    methodNotAllowed,
} from '@authgate/shared';
import type { HttpResponse, LambdaHandler } from '@authgate/shared';

export { createJwksHandler, jwksHandler } from './jwks';
export type { JwksDeps } from './jwks';

/** Seconds clients may cache discovery documents */
export const DISCOVERY_MAX_AGE = 3600;

// =============================================================================
// Types
// =============================================================================

/**
 * OpenID Provider Metadata, limited to what this server supports.
 * @see https://openid.net/specs/openid-connect-discovery-1_0.html#ProviderMetadata
 */
export interface OpenIDProviderMetadata {
    issuer: string;
    authorization_endpoint: string;
    token_endpoint: string;
    userinfo_endpoint: string;
    jwks_uri: string;
    scopes_supported: string[];
    response_types_supported: string[];
    response_modes_supported: string[];
    grant_types_supported: string[];
    subject_types_supported: string[];
    id_token_signing_alg_values_supported: string[];
    token_endpoint_auth_methods_supported: string[];
    claims_supported: string[];
    code_challenge_methods_supported: string[];
    claims_parameter_supported: boolean;
    request_parameter_supported: boolean;
    request_uri_parameter_supported: boolean;
}

export interface DiscoveryDeps {
    readonly issuer: string;
}

// =============================================================================
// Metadata
// =============================================================================

export function buildProviderMetadata(issuer: string): OpenIDProviderMetadata {
    return {
        issuer,
        authorization_endpoint: `${issuer}/oauth2/authorize`,
        token_endpoint: `${issuer}/oauth2/token`,
        userinfo_endpoint: `${issuer}/oauth2/userinfo`,
        jwks_uri: `${issuer}/.well-known/jwks.json`,

        scopes_supported: [StandardScopes.OPENID, StandardScopes.PROFILE, StandardScopes.EMAIL],
        response_types_supported: [ResponseTypes.CODE],
        response_modes_supported: ['query'],
        grant_types_supported: [GrantTypes.AUTHORIZATION_CODE],
        subject_types_supported: ['public'],
        id_token_signing_alg_values_supported: [JwtAlgorithm.RS256],

        token_endpoint_auth_methods_supported: [
            'client_secret_basic',
            'client_secret_post',
            'none', // Public clients
        ],

        claims_supported: [
            'sub',
            'iss',
            'aud',
            'exp',
            'iat',
            'auth_time',
            'nonce',
            'at_hash',
            'preferred_username',
            'updated_at',
            'email',
            'email_verified',
        ],

        code_challenge_methods_supported: [...SUPPORTED_CHALLENGE_METHODS],

        claims_parameter_supported: false,
        request_parameter_supported: false,
        request_uri_parameter_supported: false,
    };
}

// =============================================================================
// Handler Factory
// =============================================================================

export function createDiscoveryHandler(deps: DiscoveryDeps): LambdaHandler {
    const metadata = buildProviderMetadata(deps.issuer);

    return async (event: APIGatewayProxyEventV2, context?: Context): Promise<HttpResponse> => {
        const logger = createLogger(event, context);

        if (getMethod(event) !== 'GET') {
            return methodNotAllowed('GET');
        }

        logger.info('OIDC Discovery request received', { issuer: deps.issuer });
        return cacheableJson(metadata, DISCOVERY_MAX_AGE);
    };
}

// =============================================================================
// Lambda Entry Points
// =============================================================================

export const handler = lazyHandler((runtime) => createDiscoveryHandler({ issuer: runtime.config.issuer }));
