/**
 * AuthGate - Authorization Resume - Lambda Handler
 *
 * Implements GET /oauth2/authorize/resume?request_id=<id>, where the login
 * page sends the user once signed in.
 *
 * Flow:
 *   1. Require a completed (not MFA-pending) session
 *   2. Take the parked request; it is deleted in the same operation
 *   3. Re-check the client and redirect URI
 *   4. Issue the code and redirect to the client
 *
 * The caller is checked before the request is taken, so an unauthenticated
 * hit cannot burn someone else's pending request.
 *
 * @module oauth2_authorize/callback
 * @see RFC 6749 Section 4.1.2 - Authorization Response
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    OAuthErrors,
    createLogger,
    describeError,
    fromOAuthError,
    getMethod,
    methodNotAllowed,
    param,
    queryParams,
    redirect,
    resolveCaller,
    serverError,
    withContext,
} from '@authgate/shared';
import type { HttpResponse, LambdaHandler } from '@authgate/shared';
import { AuthorizationService, buildSuccessRedirect } from './service';
import type { AuthorizeDeps } from './types';

export function createResumeHandler(deps: AuthorizeDeps): LambdaHandler {
    const service = new AuthorizationService(deps.clients, deps.codes, deps.pendingRequests);

    return async (event: APIGatewayProxyEventV2, context?: Context): Promise<HttpResponse> => {
        const logger = createLogger(event, context);
        const audit = withContext(event, context, deps.auditSink);

        if (getMethod(event) !== 'GET') {
            return methodNotAllowed('GET');
        }

        try {
            const requestId = param(queryParams(event), 'request_id');
            if (!requestId) {
                return fromOAuthError(OAuthErrors.invalidRequest('Missing required parameter: request_id'));
            }

            const caller = await resolveCaller(event, deps.credentials, { allowPending: false });
            if (!caller.ok) {
                logger.warn('Resume without a completed session', { reason: caller.error.description });
                return fromOAuthError(caller.error, 'Bearer');
            }

            const resumed = await service.resume(requestId, caller.value, deps.credentials.clock(), audit);
            if (!resumed.ok) {
                logger.warn('Pending authorization could not be resumed', { error: resumed.error.code });
                audit.authCodeRejected({ error: resumed.error.code, reason: resumed.error.description });
                return fromOAuthError(resumed.error);
            }

            const { authorization, code } = resumed.value;
            logger.info('Authorization code issued after login', { clientId: code.clientId });
            return redirect(buildSuccessRedirect(authorization.redirectUri, code.code, authorization.state));
        } catch (err) {
            logger.error('Authorization resume error', { error: describeError(err) });
            return serverError(ErrorMessages.INTERNAL_ERROR);
        }
    };
}
