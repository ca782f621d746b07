/**
 * AuthGate - Authorization Service
 *
 * Request state machine:
 *
 *   received -> validated -> awaiting_auth | consented
 *            -> code_issued | error_redirect | error_direct
 *
 * A validated request from a caller without a completed session is parked
 * in the pending request store and the caller is sent to the login page.
 * Consent is implicit once the user is authenticated.
 *
 * @module oauth2_authorize/service
 * @see RFC 6749 Section 4.1.2 - Authorization Response
 */

import { ErrorMessages, HttpStatus, OAuthErrors, fail, ok } from '@authgate/shared';
import type {
    AuditLogger,
    AuthorizationCodeStore,
    AuthorizationRequestStore,
    ClientRegistry,
    OAuthError,
    Result,
} from '@authgate/shared';
import type { PendingAuthorization } from '../../../shared_types/session';
import type { AuthorizationCode } from '../../../shared_types/token';
import type { AuthorizeRequest, AuthorizeFailure, ValidatedAuthorization } from './types';
import { validateRequest } from './validator';

// =============================================================================
// Redirect Builders
// =============================================================================

/**
 * Append parameters to a redirect URI, leaving any existing query string
 * exactly as registered.
 */
function appendQuery(redirectUri: string, params: Record<string, string | undefined>): string {
    const query = new URLSearchParams();
    for (const [name, value] of Object.entries(params)) {
        if (value !== undefined) {
            query.append(name, value);
        }
    }

    if (!redirectUri.includes('?')) {
        return `${redirectUri}?${query.toString()}`;
    }
    const separator = redirectUri.endsWith('?') || redirectUri.endsWith('&') ? '' : '&';
    return `${redirectUri}${separator}${query.toString()}`;
}

export function buildSuccessRedirect(redirectUri: string, code: string, state?: string): string {
    return appendQuery(redirectUri, { code, state });
}

export function buildErrorRedirect(
    redirectUri: string,
    error: string,
    description: string,
    state?: string
): string {
    return appendQuery(redirectUri, { error, error_description: description, state });
}

// =============================================================================
// Service
// =============================================================================

export interface AuthenticatedUser {
    readonly userId: string;
    readonly username: string;
}

export interface ResumedAuthorization {
    readonly authorization: ValidatedAuthorization;
    readonly code: AuthorizationCode;
}

export class AuthorizationService {
    constructor(
        private readonly clients: ClientRegistry,
        private readonly codes: AuthorizationCodeStore,
        private readonly pendingRequests: AuthorizationRequestStore
    ) {}

    validateRequest(request: AuthorizeRequest): Promise<Result<ValidatedAuthorization, AuthorizeFailure>> {
        return validateRequest(request, this.clients);
    }

    async issueCode(
        authorization: ValidatedAuthorization,
        user: AuthenticatedUser,
        audit: AuditLogger
    ): Promise<AuthorizationCode> {
        const code = await this.codes.create(
            authorization.client,
            {
                redirectUri: authorization.redirectUri,
                scope: authorization.scope,
                codeChallenge: authorization.codeChallenge,
                codeChallengeMethod: authorization.codeChallengeMethod,
                nonce: authorization.nonce,
            },
            user.userId,
            user.username
        );

        audit.authCodeIssued(
            { type: 'USER', sub: user.userId, username: user.username },
            {
                clientId: code.clientId,
                scopes: code.scope.split(' '),
                expiresAt: code.expiresAt,
                pkceMethod: code.codeChallengeMethod,
            }
        );

        return code;
    }

    /**
     * Park a validated request until the user has signed in.
     */
    async suspend(authorization: ValidatedAuthorization, audit: AuditLogger): Promise<PendingAuthorization> {
        const pending = await this.pendingRequests.save({
            clientId: authorization.client.clientId,
            redirectUri: authorization.redirectUri,
            scope: authorization.scope,
            state: authorization.state,
            nonce: authorization.nonce,
            codeChallenge: authorization.codeChallenge,
            codeChallengeMethod: authorization.codeChallengeMethod,
        });

        audit.success('AUTH_REQUEST_SUSPENDED', { type: 'CLIENT', clientId: pending.clientId }, {
            requestId: pending.requestId,
            scope: pending.scope,
            expiresAt: pending.expiresAt,
        });

        return pending;
    }

    /**
     * Take a parked request and issue its code. The client is looked up
     * again: it may have been disabled, or lost the redirect URI, while the
     * user was signing in.
     */
    async resume(
        requestId: string,
        user: AuthenticatedUser,
        now: number,
        audit: AuditLogger
    ): Promise<Result<ResumedAuthorization, OAuthError>> {
        const pending = await this.pendingRequests.take(requestId, now);
        if (!pending) {
            return fail(OAuthErrors.invalidRequest(ErrorMessages.PENDING_REQUEST_NOT_FOUND));
        }

        const client = await this.clients.findClient(pending.clientId);
        if (!client || !client.enabled) {
            return fail({ ...OAuthErrors.invalidClient(ErrorMessages.UNKNOWN_CLIENT), status: HttpStatus.BAD_REQUEST });
        }
        if (!client.redirectUris.includes(pending.redirectUri)) {
            return fail(OAuthErrors.invalidRequest(ErrorMessages.REDIRECT_URI_MISMATCH));
        }

        const authorization: ValidatedAuthorization = {
            client,
            redirectUri: pending.redirectUri,
            scope: pending.scope,
            state: pending.state,
            nonce: pending.nonce,
            codeChallenge: pending.codeChallenge,
            codeChallengeMethod: pending.codeChallengeMethod,
        };

        return ok({ authorization, code: await this.issueCode(authorization, user, audit) });
    }
}
