/**
 * AuthGate - Authorization Endpoint - Lambda Handler
 *
 * Implements GET /oauth2/authorize (RFC 6749 Section 4.1.1).
 *
 * Flow:
 * 1. Reject duplicate parameters (RFC 6749 Section 3.1)
 * 2. Validate the request against the Client Registry
 * 3. Without a completed session: park the request, redirect to login
 * 4. With one: issue a code and redirect back to the client
 *
 * Security:
 * - Errors found before the redirect URI is trusted are answered directly,
 *   never redirected (no open redirector)
 * - redirect_uri must exactly match a registered URI
 * - MFA-pending credentials do not count as a session
 *
 * @module oauth2_authorize
 * @see RFC 6749 Section 4.1 - Authorization Code Grant
 * @see RFC 7636 - Proof Key for Code Exchange
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    OAuthErrors,
    createLogger,
    describeError,
    findDuplicateParams,
    fromOAuthError,
    getMethod,
    lazyHandler,
    methodNotAllowed,
    param,
    queryParams,
    redirect,
    resolveCaller,
    serverError,
    withContext,
} from '@authgate/shared';
import type { AuditLogger, HttpResponse, LambdaHandler, Runtime } from '@authgate/shared';
import { AuthorizationService, buildErrorRedirect, buildSuccessRedirect } from './service';
import type { AuthorizeDeps, AuthorizeFailure, AuthorizeRequest } from './types';
import { createResumeHandler } from './callback';

export { AuthorizationService, buildErrorRedirect, buildSuccessRedirect } from './service';
export { validateRequest } from './validator';
export { createResumeHandler } from './callback';
export type {
    AuthorizeDeps,
    AuthorizeFailure,
    AuthorizeRequest,
    ValidatedAuthorization,
} from './types';

// =============================================================================
// Request Parsing
// =============================================================================

function parseRequest(params: URLSearchParams): AuthorizeRequest {
    return {
        responseType: param(params, 'response_type'),
        clientId: param(params, 'client_id'),
        redirectUri: param(params, 'redirect_uri'),
        // An empty scope is still a scope request, and an invalid one
        scope: params.has('scope') ? params.get('scope') ?? '' : undefined,
        state: param(params, 'state'),
        codeChallenge: param(params, 'code_challenge'),
        codeChallengeMethod: param(params, 'code_challenge_method'),
        nonce: param(params, 'nonce'),
    };
}

// =============================================================================
// Error Delivery
// =============================================================================

export function renderFailure(failure: AuthorizeFailure): HttpResponse {
    if (failure.delivery === 'direct') {
        return fromOAuthError(failure.error);
    }
    return redirect(buildErrorRedirect(
        failure.redirectUri,
        failure.error.code,
        failure.error.description,
        failure.state
    ));
}

function auditRejection(audit: AuditLogger, failure: AuthorizeFailure): void {
    audit.authCodeRejected({
        clientId: failure.clientId,
        error: failure.error.code,
        reason: failure.error.description,
    });
}

/**
 * Where the login page sends the user back once signed in.
 */
export function loginRedirect(loginUrl: string, requestId: string): string {
    const url = new URL(loginUrl);
    url.searchParams.set('request_id', requestId);
    return url.toString();
}

// =============================================================================
// Handler Factory
// =============================================================================

export function createAuthorizeHandler(deps: AuthorizeDeps): LambdaHandler {
    const service = new AuthorizationService(deps.clients, deps.codes, deps.pendingRequests);

    return async (event: APIGatewayProxyEventV2, context?: Context): Promise<HttpResponse> => {
        const logger = createLogger(event, context);
        const audit = withContext(event, context, deps.auditSink);

        if (getMethod(event) !== 'GET') {
            return methodNotAllowed('GET');
        }

        // Set once the redirect URI is trusted; later failures go there
        let trusted: { redirectUri: string; state?: string } | null = null;

        try {
            const params = queryParams(event);
            const duplicates = findDuplicateParams(params);
            if (duplicates.length > 0) {
                logger.warn('Duplicate authorization parameters', { duplicates });
                const failure: AuthorizeFailure = {
                    delivery: 'direct',
                    error: OAuthErrors.invalidRequest(`${ErrorMessages.DUPLICATE_PARAMETER}: ${duplicates.join(', ')}`),
                };
                auditRejection(audit, failure);
                return renderFailure(failure);
            }

            const validation = await service.validateRequest(parseRequest(params));
            if (!validation.ok) {
                logger.warn('Authorization request rejected', {
                    error: validation.error.error.code,
                    delivery: validation.error.delivery,
                });
                auditRejection(audit, validation.error);
                return renderFailure(validation.error);
            }

            const authorization = validation.value;
            trusted = { redirectUri: authorization.redirectUri, state: authorization.state };

            const caller = await resolveCaller(event, deps.credentials, { allowPending: false });
            if (!caller.ok) {
                const pending = await service.suspend(authorization, audit);
                logger.info('Authorization request awaiting login', {
                    clientId: pending.clientId,
                    requestId: pending.requestId,
                });
                return redirect(loginRedirect(deps.loginUrl, pending.requestId));
            }

            const code = await service.issueCode(authorization, caller.value, audit);
            logger.info('Authorization code issued', { clientId: code.clientId });
            return redirect(buildSuccessRedirect(authorization.redirectUri, code.code, authorization.state));
        } catch (err) {
            logger.error('Authorization endpoint error', { error: describeError(err) });
            if (trusted) {
                return redirect(buildErrorRedirect(
                    trusted.redirectUri,
                    'server_error',
                    ErrorMessages.INTERNAL_ERROR,
                    trusted.state
                ));
            }
            return serverError(ErrorMessages.INTERNAL_ERROR);
        }
    };
}

// =============================================================================
// Lambda Entry Points
// =============================================================================

function depsFromRuntime(runtime: Runtime): AuthorizeDeps {
    return {
        clients: runtime.clients,
        codes: runtime.codes,
        pendingRequests: runtime.pendingRequests,
        credentials: runtime.credentials,
        loginUrl: runtime.config.loginUrl,
    };
}

export const handler = lazyHandler((runtime) => createAuthorizeHandler(depsFromRuntime(runtime)));

export const resumeHandler = lazyHandler((runtime) => createResumeHandler(depsFromRuntime(runtime)));
