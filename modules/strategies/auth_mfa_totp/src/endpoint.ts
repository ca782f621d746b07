/**
 * AuthGate - TOTP MFA Endpoint Scaffolding
 *
 * Shared request handling for the /mfa endpoints: method check, caller
 * resolution from the session credential, body parsing and the catch-all
 * 500. Each endpoint supplies only its own step.
 *
 * @module auth_mfa_totp/endpoint
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    createLogger,
    describeError,
    getMethod,
    invalidRequest,
    methodNotAllowed,
    parseFields,
    resolveCaller,
    serverError,
    withContext,
} from '@authgate/shared';
import type {
    AuditLogger,
    HttpResponse,
    LambdaHandler,
    Logger,
    SessionPrincipal,
} from '@authgate/shared';
import { callerErrorResponse } from './responses';
import { MfaService } from './service';
import type { MfaDeps } from './types';

export interface MfaRequest {
    readonly caller: SessionPrincipal;
    readonly body: Record<string, unknown>;
    readonly audit: AuditLogger;
    readonly logger: Logger;
}

export interface EndpointOptions {
    readonly name: string;
    readonly method: 'GET' | 'POST';
    /** Accept an MFA-pending credential (login second factor only) */
    readonly allowPending: boolean;
}

export function createMfaService(deps: MfaDeps): MfaService {
    return new MfaService(deps.store, deps.users, deps.clock, deps.totp, deps.credentials);
}

export function mfaEndpoint(
    deps: MfaDeps,
    options: EndpointOptions,
    handle: (request: MfaRequest) => Promise<HttpResponse>
): LambdaHandler {
    return async (event: APIGatewayProxyEventV2, context?: Context): Promise<HttpResponse> => {
        const logger = createLogger(event, context);

        if (getMethod(event) !== options.method) {
            return methodNotAllowed(options.method);
        }

        try {
            logger.info(`${options.name} request received`);

            const caller = await resolveCaller(event, deps.credentials, { allowPending: options.allowPending });
            if (!caller.ok) {
                logger.warn(`${options.name} rejected caller`, { error: caller.error.code });
                return callerErrorResponse(caller.error);
            }

            const body = options.method === 'POST' ? parseFields(event) : {};
            if (!body) {
                return invalidRequest(ErrorMessages.INVALID_BODY);
            }

            return await handle({
                caller: caller.value,
                body,
                audit: withContext(event, context, deps.auditSink),
                logger,
            });
        } catch (err) {
            logger.error(`${options.name} error`, { error: describeError(err) });
            return serverError(ErrorMessages.INTERNAL_ERROR);
        }
    };
}
