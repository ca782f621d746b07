/**
 * AuthGate - Client Administration - Lambda Handler
 *
 * Administrative management of dynamic OAuth clients:
 * - POST   /clients             Register (secret returned once)
 * - GET    /clients/{clientId}  Read
 * - PATCH  /clients/{clientId}  Update policy fields
 * - DELETE /clients/{clientId}  Disable, revoke codes, delete
 *
 * Security:
 * - Every route needs a full session credential carrying the ADMIN role
 * - Audit entries name the acting administrator
 *
 * @module governance/client_registry
 * @see RFC 7591 - OAuth 2.0 Dynamic Client Registration Protocol
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    OAuthErrors,
    Roles,
    created,
    createLogger,
    describeError,
    fail,
    fromOAuthError,
    getMethod,
    hasRole,
    invalidRequest,
    isJsonRequest,
    lazyHandler,
    methodNotAllowed,
    noContent,
    ok,
    parseJsonObject,
    readBody,
    resolveCaller,
    serverError,
    success,
    withContext,
} from '@authgate/shared';
import type { HttpResponse, LambdaHandler, Result } from '@authgate/shared';
import type { AuditActor } from '../../../shared_types/audit';
import { adminErrorResponse, toClientView } from './responses';
import { ClientAdminService } from './service';
import type { ClientAdminDeps, ClientRegistrationResponse } from './types';

export { ClientAdminService } from './service';
export type { ClientAdminError, RegisteredClient } from './service';
export { validatePolicyUpdate, validateRegistration } from './validation';
export type { ClientDraft } from './validation';
export { toClientView } from './responses';
export type {
    ClientAdminDeps,
    ClientMetadataError,
    ClientRegistrationRequest,
    ClientRegistrationResponse,
    ClientView,
    TokenEndpointAuthMethod,
} from './types';

function readJsonBody(event: APIGatewayProxyEventV2): Result<Record<string, unknown>, HttpResponse> {
    if (!isJsonRequest(event)) {
        return fail(invalidRequest('Content-Type must be application/json'));
    }
    const body = parseJsonObject(readBody(event));
    return body ? ok(body) : fail(invalidRequest(ErrorMessages.INVALID_BODY));
}

export function createClientRegistryHandler(deps: ClientAdminDeps): LambdaHandler {
    const service = new ClientAdminService(deps.registry, deps.codes);

    return async (event: APIGatewayProxyEventV2, context?: Context): Promise<HttpResponse> => {
        const logger = createLogger(event, context);
        const method = getMethod(event);
        const clientId = event.pathParameters?.clientId;

        try {
            logger.info('Client registry request received', { method, clientId });

            const caller = await resolveCaller(event, deps.credentials, { allowPending: false });
            if (!caller.ok) {
                return fromOAuthError(caller.error, 'Bearer');
            }
            if (!hasRole(caller.value, Roles.ADMIN)) {
                logger.warn('Client registry access denied', { sub: caller.value.userId });
                return fromOAuthError(OAuthErrors.accessDenied(ErrorMessages.ADMIN_REQUIRED));
            }

            const actor: AuditActor = { type: 'USER', sub: caller.value.userId, username: caller.value.username };
            const audit = withContext(event, context, deps.auditSink);

            if (!clientId) {
                if (method !== 'POST') {
                    return methodNotAllowed('POST');
                }
                const body = readJsonBody(event);
                if (!body.ok) {
                    return body.error;
                }

                const result = await service.register(body.value, actor, audit);
                if (!result.ok) {
                    return adminErrorResponse(result.error);
                }

                const { client, clientSecret } = result.value;
                logger.info('Client registered', { clientId: client.clientId, confidential: client.confidential });
                const response: ClientRegistrationResponse = {
                    ...toClientView(client),
                    client_id_issued_at: deps.clock(),
                    ...(clientSecret !== undefined && {
                        client_secret: clientSecret,
                        client_secret_expires_at: 0,
                    }),
                };
                return created(response);
            }

            switch (method) {
                case 'GET': {
                    const result = await service.get(clientId);
                    return result.ok ? success(toClientView(result.value)) : adminErrorResponse(result.error);
                }
                case 'PATCH': {
                    const body = readJsonBody(event);
                    if (!body.ok) {
                        return body.error;
                    }
                    const result = await service.update(clientId, body.value, actor, audit);
                    if (!result.ok) {
                        return adminErrorResponse(result.error);
                    }
                    logger.info('Client updated', { clientId });
                    return success(toClientView(result.value));
                }
                case 'DELETE': {
                    const result = await service.remove(clientId, actor, audit);
                    if (!result.ok) {
                        return adminErrorResponse(result.error);
                    }
                    logger.info('Client deleted', { clientId, revokedCodes: result.value.revokedCodes });
                    return noContent();
                }
                default:
                    return methodNotAllowed('GET, PATCH, DELETE');
            }
        } catch (err) {
            logger.error('Client registry error', { error: describeError(err) });
            return serverError(ErrorMessages.INTERNAL_ERROR);
        }
    };
}

// =============================================================================
// Lambda Entry Point
// =============================================================================

export const handler = lazyHandler((runtime) => createClientRegistryHandler({
    registry: runtime.managedClients,
    codes: runtime.codes,
    clock: runtime.clock,
    credentials: runtime.credentials,
}));
