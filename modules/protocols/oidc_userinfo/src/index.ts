/**
 * AuthGate - OIDC UserInfo Endpoint - Lambda Handler
 *
 * Implements GET/POST /oauth2/userinfo per OpenID Connect Core 1.0
 * Section 5.3. Returns claims about the token's subject based on the
 * granted scopes.
 *
 * Authentication (RFC 6750):
 *   - Authorization header "Bearer <token>"
 *   - Form body access_token parameter on POST
 *
 * Security Controls:
 *   - RS256 signature, issuer and expiry checks
 *   - Only access tokens (`token_use: access`) are accepted
 *   - User status verification (must be ACTIVE)
 *   - Cache-Control: no-store prevents caching of user data
 *
 * @module oidc_userinfo
 * @see https://openid.net/specs/openid-connect-core-1_0.html#UserInfo
 * @see RFC 6750 - Bearer Token Usage
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    OAuthErrors,
    StandardScopes,
    bearerToken,
    createLogger,
    describeError,
    error,
    fromOAuthError,
    getMethod,
    isFormRequest,
    lazyHandler,
    methodNotAllowed,
    readBody,
    serverError,
    success,
} from '@authgate/shared';
import type { Clock, HttpResponse, JwtSigner, LambdaHandler, UserDirectory } from '@authgate/shared';
import { buildUserInfoResponse, verifyAccessToken } from './claims';

export { buildUserInfoResponse, verifyAccessToken } from './claims';
export type { UserInfoResponse, VerifiedAccessToken } from './claims';

export interface UserInfoDeps {
    readonly issuer: string;
    readonly signer: JwtSigner;
    readonly clock: Clock;
    readonly users: UserDirectory;
}

// =============================================================================
// Token Extraction
// =============================================================================

/**
 * Read the access token from the Authorization header, or from a
 * form-encoded POST body (RFC 6750 Section 2.2).
 */
function extractAccessToken(event: APIGatewayProxyEventV2): string | undefined {
    const fromHeader = bearerToken(event);
    if (fromHeader) {
        return fromHeader;
    }
    if (getMethod(event) === 'POST' && isFormRequest(event)) {
        return new URLSearchParams(readBody(event)).get('access_token') || undefined;
    }
    return undefined;
}

function invalidToken(description: string): HttpResponse {
    return fromOAuthError(OAuthErrors.invalidToken(description), 'Bearer');
}

// =============================================================================
// Handler Factory
// =============================================================================

export function createUserInfoHandler(deps: UserInfoDeps): LambdaHandler {
    return async (event: APIGatewayProxyEventV2, context?: Context): Promise<HttpResponse> => {
        const logger = createLogger(event, context);
        const method = getMethod(event);

        // OIDC Core Section 5.3.1: Only GET and POST are allowed
        if (method !== 'GET' && method !== 'POST') {
            return methodNotAllowed('GET, POST');
        }

        try {
            const token = extractAccessToken(event);
            if (!token) {
                return invalidToken(ErrorMessages.MISSING_TOKEN);
            }

            const verified = verifyAccessToken(token, await deps.signer.getPublicKey(), deps.issuer, deps.clock());
            if (!verified) {
                logger.warn('Access token verification failed');
                return invalidToken(ErrorMessages.INVALID_TOKEN);
            }

            if (!verified.scopes.includes(StandardScopes.OPENID)) {
                logger.warn('Access token missing openid scope', { sub: verified.sub });
                return error(403, 'insufficient_scope', ErrorMessages.OPENID_SCOPE_REQUIRED, {
                    'WWW-Authenticate': 'Bearer error="insufficient_scope", scope="openid"',
                });
            }

            const user = await deps.users.findById(verified.sub);
            if (!user) {
                logger.warn('User not found', { sub: verified.sub });
                return invalidToken(ErrorMessages.USER_NOT_FOUND);
            }
            if (user.status !== 'ACTIVE') {
                logger.warn('User not active', { sub: verified.sub, status: user.status });
                return invalidToken('User account is not active');
            }

            logger.info('UserInfo response sent', { sub: user.userId, scopes: verified.scopes });
            return success(buildUserInfoResponse(user, verified.scopes));
        } catch (err) {
            logger.error('UserInfo endpoint error', { error: describeError(err) });
            return serverError(ErrorMessages.INTERNAL_ERROR);
        }
    };
}

// =============================================================================
// Lambda Entry Point
// =============================================================================

export const handler = lazyHandler((runtime) => createUserInfoHandler({
    issuer: runtime.config.issuer,
    signer: runtime.signer,
    clock: runtime.clock,
    users: runtime.users,
}));
