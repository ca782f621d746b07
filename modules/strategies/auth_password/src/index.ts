/**
 * AuthGate - Password Login - Lambda Handler
 *
 * Implements POST /auth/login with `{username, password}` as JSON or a
 * form body.
 *
 * Outcomes:
 *   - No MFA enrolled: a full session credential, also set as the
 *     `session` cookie
 *   - MFA enrolled: a short-lived MFA-pending credential to present to
 *     /mfa/verify or /mfa/backup
 *   - Any failure: 401 invalid_grant with one fixed description
 *
 * @module auth_password
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    createLogger,
    describeError,
    fromOAuthError,
    getMethod,
    invalidRequest,
    lazyHandler,
    methodNotAllowed,
    parseFields,
    serverError,
    sessionCookie,
    stringField,
    success,
    withContext,
} from '@authgate/shared';
import type { HttpResponse, LambdaHandler } from '@authgate/shared';
import { PasswordLoginService } from './service';
import type { LoginDeps, LoginResponse } from './types';

export { PasswordLoginService, INVALID_CREDENTIALS, argon2PasswordVerifier } from './service';
export type {
    LoginCredentials,
    LoginDeps,
    LoginFailureReason,
    LoginResponse,
    MfaChallengeResponse,
    PasswordVerifier,
    SessionLoginResponse,
} from './types';

function loginSucceeded(body: LoginResponse): HttpResponse {
    if (body.mfaRequired) {
        return success(body);
    }
    return {
        ...success(body),
        cookies: [sessionCookie({ token: body.token, expiresIn: body.expiresIn })],
    };
}

export function createLoginHandler(deps: LoginDeps): LambdaHandler {
    const service = new PasswordLoginService(deps.users, deps.credentials, deps.verifyPassword);

    return async (event: APIGatewayProxyEventV2, context?: Context): Promise<HttpResponse> => {
        const logger = createLogger(event, context);

        if (getMethod(event) !== 'POST') {
            return methodNotAllowed('POST');
        }

        try {
            const body = parseFields(event);
            if (!body) {
                return invalidRequest(ErrorMessages.INVALID_BODY);
            }

            const username = stringField(body, 'username');
            const password = stringField(body, 'password');
            if (!username || !password) {
                return invalidRequest('username and password are required');
            }

            logger.info('Login attempt', { username });
            const result = await service.login(
                { username, password },
                withContext(event, context, deps.auditSink),
                logger
            );
            if (!result.ok) {
                return fromOAuthError(result.error);
            }
            return loginSucceeded(result.value);
        } catch (err) {
            logger.error('Login handler error', { error: describeError(err) });
            return serverError(ErrorMessages.INTERNAL_ERROR);
        }
    };
}

// =============================================================================
// Lambda Entry Point
// =============================================================================

export const handler = lazyHandler((runtime) => createLoginHandler({
    users: runtime.users,
    credentials: runtime.credentials,
}));
