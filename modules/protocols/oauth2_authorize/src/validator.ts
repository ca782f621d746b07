/**
 * AuthGate - Authorization Request Validator
 *
 * Checks an /authorize request against the Client Registry, in order:
 *
 *   1. response_type is "code"
 *   2. client_id names an enabled client      (direct error)
 *   3. redirect_uri exactly matches a registered URI (direct error)
 *   4. requested scopes are allowed            (redirected)
 *   5. PKCE challenge present when required    (redirected)
 *   6. challenge method and shape              (redirected)
 *
 * Until step 3 passes the redirect URI is untrusted, so nothing before it
 * is ever delivered by redirect.
 *
 * @module oauth2_authorize/validator
 * @see RFC 6749 Section 4.1.2.1 - Error Response
 * @see RFC 7636 Section 4.3 - Client Sends the Code Challenge
 */

import {
    ErrorMessages,
    HttpStatus,
    OAuthErrors,
    disallowedScopes,
    fail,
    isChallengeMethod,
    isValidChallenge,
    isValidClientId,
    isValidNonce,
    isValidScopeToken,
    isValidState,
    ok,
    parseScopes,
} from '@authgate/shared';
import type { ClientRegistry, OAuthError, Result } from '@authgate/shared';
import type { OAuthClient } from '../../../shared_types/client';
import type { AuthorizeFailure, AuthorizeRequest, ValidatedAuthorization } from './types';

// =============================================================================
// Failure Builders
// =============================================================================

function direct(error: OAuthError, clientId?: string): Result<ValidatedAuthorization, AuthorizeFailure> {
    return fail<AuthorizeFailure>({ delivery: 'direct', error, clientId });
}

function redirected(
    error: OAuthError,
    client: OAuthClient,
    request: AuthorizeRequest,
    redirectUri: string
): Result<ValidatedAuthorization, AuthorizeFailure> {
    return fail<AuthorizeFailure>({
        delivery: 'redirect',
        error,
        clientId: client.clientId,
        redirectUri,
        state: request.state,
    });
}

/**
 * invalid_client on /authorize is a pre-redirect failure: 400, never 401,
 * since there is no client authentication here to challenge.
 */
function unknownClient(): OAuthError {
    return { ...OAuthErrors.invalidClient(ErrorMessages.UNKNOWN_CLIENT), status: HttpStatus.BAD_REQUEST };
}

// =============================================================================
// Validation
// =============================================================================

export async function validateRequest(
    request: AuthorizeRequest,
    registry: ClientRegistry
): Promise<Result<ValidatedAuthorization, AuthorizeFailure>> {
    const client = isValidClientId(request.clientId) ? await registry.findClient(request.clientId) : null;
    const trustedClient = client && client.enabled ? client : null;
    const trustedRedirect = trustedClient && request.redirectUri
        && trustedClient.redirectUris.includes(request.redirectUri)
        ? request.redirectUri
        : undefined;

    // Step 1: response_type; redirected only when the target is already trusted
    if (request.responseType !== 'code') {
        const error = OAuthErrors.unsupportedResponseType(ErrorMessages.INVALID_RESPONSE_TYPE);
        return trustedClient && trustedRedirect && isValidState(request.state)
            ? redirected(error, trustedClient, request, trustedRedirect)
            : direct(error, request.clientId);
    }

    // Step 2: client
    if (!request.clientId) {
        return direct(OAuthErrors.invalidRequest(ErrorMessages.MISSING_CLIENT_ID));
    }
    if (!trustedClient) {
        return direct(unknownClient(), request.clientId);
    }

    // Step 3: redirect_uri, exact string match
    if (!request.redirectUri) {
        return direct(OAuthErrors.invalidRequest(ErrorMessages.MISSING_REDIRECT_URI), trustedClient.clientId);
    }
    if (!trustedRedirect) {
        return direct(OAuthErrors.invalidRequest(ErrorMessages.REDIRECT_URI_MISMATCH), trustedClient.clientId);
    }

    // state is echoed back, so a bad one cannot ride a redirect
    if (!isValidState(request.state)) {
        return direct(OAuthErrors.invalidRequest('state is too long'), trustedClient.clientId);
    }
    if (!isValidNonce(request.nonce)) {
        return redirected(OAuthErrors.invalidRequest('nonce is too long'), trustedClient, request, trustedRedirect);
    }

    // Step 4: scope; absent means everything the client may have
    const requested = request.scope === undefined
        ? [...trustedClient.allowedScopes]
        : parseScopes(request.scope);
    if (requested.length === 0 || !requested.every(isValidScopeToken)
        || disallowedScopes(requested, trustedClient.allowedScopes).length > 0) {
        return redirected(OAuthErrors.invalidScope(ErrorMessages.SCOPE_NOT_ALLOWED), trustedClient, request, trustedRedirect);
    }

    // Step 5: PKCE presence
    if (trustedClient.requirePkce && !request.codeChallenge) {
        return redirected(OAuthErrors.invalidRequest(ErrorMessages.PKCE_REQUIRED), trustedClient, request, trustedRedirect);
    }

    // Step 6: PKCE method and shape; the method defaults to S256
    if (request.codeChallenge) {
        const method = request.codeChallengeMethod ?? 'S256';
        if (!isChallengeMethod(method)) {
            return redirected(
                OAuthErrors.invalidRequest(ErrorMessages.INVALID_CODE_CHALLENGE_METHOD),
                trustedClient, request, trustedRedirect);
        }
        if (!isValidChallenge(request.codeChallenge)) {
            return redirected(
                OAuthErrors.invalidRequest(ErrorMessages.INVALID_CODE_CHALLENGE),
                trustedClient, request, trustedRedirect);
        }

        return ok({
            client: trustedClient,
            redirectUri: trustedRedirect,
            scope: requested.join(' '),
            state: request.state,
            nonce: request.nonce,
            codeChallenge: request.codeChallenge,
            codeChallengeMethod: method,
        });
    }

    return ok({
        client: trustedClient,
        redirectUri: trustedRedirect,
        scope: requested.join(' '),
        state: request.state,
        nonce: request.nonce,
    });
}
