/**
 * AuthGate - Client Metadata Validation
 *
 * Enforces client policy on registration and on every update:
 * - redirect URIs are absolute, fragment-free, https except for localhost
 * - public clients require PKCE
 * - grant types are authorization_code or refresh_token
 * - scopes are non-empty tokens
 *
 * @see RFC 7591 Section 3.2.2 - Client Registration Error Response
 */

import { DefaultLifetimes, fail, isValidRedirectUri, isValidScopeToken, ok, parseScopes } from '@authgate/shared';
import type { Result } from '@authgate/shared';
import type { GrantType } from '../../../shared_types/base';
import type { ClientPolicyUpdate, OAuthClient } from '../../../shared_types/client';
import type { ClientMetadataError, TokenEndpointAuthMethod } from './types';

const GRANT_TYPES: readonly GrantType[] = ['authorization_code', 'refresh_token'];
const AUTH_METHODS: readonly TokenEndpointAuthMethod[] = ['client_secret_basic', 'client_secret_post', 'none'];

/** Registration metadata before an id and secret are assigned */
export type ClientDraft = Omit<OAuthClient, 'clientId' | 'secretHash'>;

type Validated<T> = Result<T, ClientMetadataError>;

function metadataError(description: string): Validated<never> {
    return fail<ClientMetadataError>({ code: 'invalid_client_metadata', description });
}

// =============================================================================
// Field Parsers
// =============================================================================

function isGrantType(value: unknown): value is GrantType {
    return GRANT_TYPES.some((grant) => grant === value);
}

function isAuthMethod(value: unknown): value is TokenEndpointAuthMethod {
    return AUTH_METHODS.some((method) => method === value);
}

function parseRedirectUris(value: unknown): Validated<string[]> {
    if (!Array.isArray(value) || value.length === 0) {
        return metadataError('redirect_uris must be a non-empty array');
    }
    const uris: string[] = [];
    for (const uri of value) {
        if (typeof uri !== 'string' || !isValidRedirectUri(uri)) {
            return fail<ClientMetadataError>({
                code: 'invalid_redirect_uri',
                description: 'redirect_uris must be absolute https URIs without a fragment (http allowed for localhost)',
            });
        }
        uris.push(uri);
    }
    return ok(uris);
}

function parseGrantTypes(value: unknown): Validated<GrantType[]> {
    if (!Array.isArray(value) || value.length === 0) {
        return metadataError('grant_types must be a non-empty array');
    }
    const grants: GrantType[] = [];
    for (const grant of value) {
        if (!isGrantType(grant)) {
            return metadataError(`Unsupported grant type: ${String(grant)}`);
        }
        if (!grants.includes(grant)) {
            grants.push(grant);
        }
    }
    return ok(grants);
}

function parseScope(value: unknown): Validated<string[]> {
    if (typeof value !== 'string') {
        return metadataError('scope must be a space-delimited string');
    }
    const scopes = parseScopes(value);
    if (scopes.length === 0 || !scopes.every(isValidScopeToken)) {
        return metadataError('scope must contain at least one valid scope token');
    }
    return ok(scopes);
}

function parseTtl(value: unknown, name: string): Validated<number> {
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
        return metadataError(`${name} must be a positive integer`);
    }
    return ok(value);
}

function parseName(value: unknown): Validated<string> {
    if (typeof value !== 'string' || value.trim().length === 0) {
        return metadataError('client_name must be a non-empty string');
    }
    return ok(value.trim());
}

// =============================================================================
// Registration
// =============================================================================

export function validateRegistration(body: Record<string, unknown>): Validated<ClientDraft> {
    const authMethod = body.token_endpoint_auth_method ?? 'client_secret_basic';
    if (!isAuthMethod(authMethod)) {
        return metadataError('token_endpoint_auth_method must be client_secret_basic, client_secret_post or none');
    }
    const confidential = authMethod !== 'none';

    const redirectUris = parseRedirectUris(body.redirect_uris);
    if (!redirectUris.ok) {
        return redirectUris;
    }
    const grants = body.grant_types === undefined ? ok<GrantType[]>(['authorization_code']) : parseGrantTypes(body.grant_types);
    if (!grants.ok) {
        return grants;
    }
    const scopes = body.scope === undefined ? ok(['openid']) : parseScope(body.scope);
    if (!scopes.ok) {
        return scopes;
    }
    const name = body.client_name === undefined ? ok('Unnamed client') : parseName(body.client_name);
    if (!name.ok) {
        return name;
    }

    const pkceInput = body.require_pkce;
    if (pkceInput !== undefined && typeof pkceInput !== 'boolean') {
        return metadataError('require_pkce must be a boolean');
    }
    const requirePkce = pkceInput ?? true;
    if (!confidential && !requirePkce) {
        return metadataError('Public clients must require PKCE');
    }

    const accessTtl = body.access_token_ttl === undefined
        ? ok<number>(DefaultLifetimes.ACCESS_TOKEN)
        : parseTtl(body.access_token_ttl, 'access_token_ttl');
    if (!accessTtl.ok) {
        return accessTtl;
    }
    const refreshTtl = body.refresh_token_ttl === undefined
        ? ok<number>(DefaultLifetimes.REFRESH_TOKEN)
        : parseTtl(body.refresh_token_ttl, 'refresh_token_ttl');
    if (!refreshTtl.ok) {
        return refreshTtl;
    }

    return ok<ClientDraft>({
        clientName: name.value,
        confidential,
        redirectUris: redirectUris.value,
        allowedScopes: scopes.value,
        allowedGrantTypes: grants.value,
        requirePkce,
        accessTokenTTL: accessTtl.value,
        refreshTokenTTL: refreshTtl.value,
        enabled: true,
    });
}

// =============================================================================
// Policy Update
// =============================================================================

/** Fields that identify a client or its credentials, fixed after registration */
const IMMUTABLE_FIELDS = ['client_id', 'client_secret', 'token_endpoint_auth_method'];

/**
 * Validate a PATCH body against the client it would change.
 */
export function validatePolicyUpdate(
    body: Record<string, unknown>,
    existing: OAuthClient
): Validated<ClientPolicyUpdate> {
    const fixed = IMMUTABLE_FIELDS.filter((field) => body[field] !== undefined);
    if (fixed.length > 0) {
        return metadataError(`Cannot change ${fixed.join(', ')}`);
    }

    const update: ClientPolicyUpdate = {};

    if (body.client_name !== undefined) {
        const name = parseName(body.client_name);
        if (!name.ok) {
            return name;
        }
        update.clientName = name.value;
    }
    if (body.redirect_uris !== undefined) {
        const uris = parseRedirectUris(body.redirect_uris);
        if (!uris.ok) {
            return uris;
        }
        update.redirectUris = uris.value;
    }
    if (body.grant_types !== undefined) {
        const grants = parseGrantTypes(body.grant_types);
        if (!grants.ok) {
            return grants;
        }
        update.allowedGrantTypes = grants.value;
    }
    if (body.scope !== undefined) {
        const scopes = parseScope(body.scope);
        if (!scopes.ok) {
            return scopes;
        }
        update.allowedScopes = scopes.value;
    }
    const pkceInput = body.require_pkce;
    if (pkceInput !== undefined) {
        if (typeof pkceInput !== 'boolean') {
            return metadataError('require_pkce must be a boolean');
        }
        if (!existing.confidential && !pkceInput) {
            return metadataError('Public clients must require PKCE');
        }
        update.requirePkce = pkceInput;
    }
    if (body.access_token_ttl !== undefined) {
        const ttl = parseTtl(body.access_token_ttl, 'access_token_ttl');
        if (!ttl.ok) {
            return ttl;
        }
        update.accessTokenTTL = ttl.value;
    }
    if (body.refresh_token_ttl !== undefined) {
        const ttl = parseTtl(body.refresh_token_ttl, 'refresh_token_ttl');
        if (!ttl.ok) {
            return ttl;
        }
        update.refreshTokenTTL = ttl.value;
    }
    const enabledInput = body.enabled;
    if (enabledInput !== undefined) {
        if (typeof enabledInput !== 'boolean') {
            return metadataError('enabled must be a boolean');
        }
        update.enabled = enabledInput;
    }

    if (Object.keys(update).length === 0) {
        return metadataError('No updatable fields in request');
    }
    return ok(update);
}
