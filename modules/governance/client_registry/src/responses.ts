/**
 * AuthGate - Client Administration Responses
 *
 * Client records rendered with RFC 7591 metadata names. The secret hash
 * never leaves the server.
 */

import { error } from '@authgate/shared';
import type { HttpResponse } from '@authgate/shared';
import type { OAuthClient } from '../../../shared_types/client';
import type { ClientAdminError } from './service';
import type { ClientView } from './types';

export function toClientView(client: OAuthClient): ClientView {
    return {
        client_id: client.clientId,
        client_name: client.clientName,
        redirect_uris: [...client.redirectUris],
        grant_types: [...client.allowedGrantTypes],
        scope: client.allowedScopes.join(' '),
        token_endpoint_auth_method: client.confidential ? 'client_secret_basic' : 'none',
        require_pkce: client.requirePkce,
        access_token_ttl: client.accessTokenTTL,
        refresh_token_ttl: client.refreshTokenTTL,
        enabled: client.enabled,
    };
}

export function adminErrorResponse(err: ClientAdminError): HttpResponse {
    switch (err.kind) {
        case 'NOT_FOUND':
            return error(404, 'invalid_request', 'Client not found');
        case 'CONFLICT':
            return error(409, 'invalid_request', 'Client already exists');
        case 'INVALID_METADATA':
            return error(400, err.error.code, err.error.description);
    }
}
