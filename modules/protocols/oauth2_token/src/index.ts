/**
 * AuthGate - Token Endpoint - Lambda Handler
 *
 * Implements POST /oauth2/token (RFC 6749 Section 3.2).
 *
 * Supported Grant Types:
 * - authorization_code, with PKCE when the code carries a challenge
 * - refresh_token is registered in client policy but answered with
 *   unsupported_grant_type
 *
 * Request Format:
 * - Method: POST (or OPTIONS for CORS preflight)
 * - Content-Type: application/x-www-form-urlencoded or application/json
 * - Authentication: HTTP Basic or client_id/client_secret in the body
 *
 * @module oauth2_token
 * @see RFC 6749 Section 4.1.3 - Access Token Request
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    corsPreflight,
    createLogger,
    describeError,
    extractClientCredentials,
    findDuplicateParams,
    getHeader,
    getMethod,
    invalidRequest,
    isFormRequest,
    isJsonRequest,
    lazyHandler,
    methodNotAllowed,
    noContent,
    param,
    parseParams,
    serverError,
    withContext,
} from '@authgate/shared';
import type { HttpResponse, LambdaHandler } from '@authgate/shared';
import { applyCors, getAllowedOrigin, tokenError, tokenResponse } from './response';
import { TokenService } from './service';
import type { TokenDeps, TokenRequest } from './types';

export { TokenService } from './service';
export { buildAccessTokenClaims, buildIdTokenClaims, computeAtHash, mintTokens } from './tokens';
export { getAllowedOrigin } from './response';
export { createSweepHandler, sweepHandler } from './sweeper';
export type { SweepHandler, SweepResult, SweeperDeps } from './sweeper';
export type { TokenDeps, TokenRequest, TokenResponseBody, TokenSettings } from './types';

// =============================================================================
// Request Parsing
// =============================================================================

function parseTokenRequest(params: URLSearchParams, authHeader: string | undefined): TokenRequest {
    return {
        grantType: param(params, 'grant_type'),
        code: param(params, 'code'),
        redirectUri: param(params, 'redirect_uri'),
        codeVerifier: param(params, 'code_verifier'),
        credentials: extractClientCredentials(params, authHeader),
    };
}

// =============================================================================
// Handler Factory
// =============================================================================

export function createTokenHandler(deps: TokenDeps): LambdaHandler {
    const service = new TokenService(deps.clients, deps.codes, deps.clock, {
        issuer: deps.issuer,
        signer: deps.signer,
        idTokenTtl: deps.idTokenTtl,
    });

    return async (event: APIGatewayProxyEventV2, context?: Context): Promise<HttpResponse> => {
        const logger = createLogger(event, context);
        const allowedOrigin = getAllowedOrigin(getHeader(event, 'origin'), deps.allowedOrigins);
        const method = getMethod(event);

        if (method === 'OPTIONS') {
            logger.info('CORS preflight request received');
            return allowedOrigin ? corsPreflight(allowedOrigin) : noContent();
        }
        if (method !== 'POST') {
            return applyCors(methodNotAllowed('POST, OPTIONS'), allowedOrigin);
        }

        try {
            if (!isFormRequest(event) && !isJsonRequest(event)) {
                return applyCors(invalidRequest(ErrorMessages.INVALID_CONTENT_TYPE), allowedOrigin);
            }

            const params = parseParams(event);
            if (!params) {
                return applyCors(invalidRequest(ErrorMessages.INVALID_BODY), allowedOrigin);
            }

            const duplicates = findDuplicateParams(params);
            if (duplicates.length > 0) {
                logger.warn('Duplicate parameters detected', { duplicates });
                return applyCors(
                    invalidRequest(`${ErrorMessages.DUPLICATE_PARAMETER}: ${duplicates.join(', ')}`),
                    allowedOrigin
                );
            }

            const request = parseTokenRequest(params, getHeader(event, 'authorization'));
            logger.info('Token request received', {
                grantType: request.grantType,
                clientId: request.credentials.clientId,
                authMethod: request.credentials.method,
            });

            const result = await service.exchange(request, withContext(event, context, deps.auditSink));
            if (!result.ok) {
                logger.warn('Token request rejected', { error: result.error.code, reason: result.error.description });
                return applyCors(tokenError(result.error), allowedOrigin);
            }

            logger.info('Tokens issued', { clientId: request.credentials.clientId });
            return applyCors(tokenResponse(result.value), allowedOrigin);
        } catch (err) {
            logger.error('Token endpoint error', { error: describeError(err) });
            return applyCors(serverError(ErrorMessages.INTERNAL_ERROR), allowedOrigin);
        }
    };
}

// =============================================================================
// Lambda Entry Point
// =============================================================================

export const handler = lazyHandler((runtime) => createTokenHandler({
    clients: runtime.clients,
    codes: runtime.codes,
    clock: runtime.clock,
    issuer: runtime.config.issuer,
    signer: runtime.signer,
    idTokenTtl: runtime.config.lifetimes.idToken,
    allowedOrigins: runtime.config.allowedOrigins,
}));
