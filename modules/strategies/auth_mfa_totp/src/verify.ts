/**
 * AuthGate - MFA Login Verification Handlers
 *
 * POST /mfa/verify   Second factor by TOTP code
 * POST /mfa/backup   Second factor by single-use backup code
 *
 * Both accept the short-lived MFA-pending credential from password login
 * and answer with a full session credential. A wrong code is 401.
 *
 * @module auth_mfa_totp/verify
 */

import { TotpDefaults, invalidRequest, sessionCookie, stringField, success } from '@authgate/shared';
import type { HttpResponse, LambdaHandler } from '@authgate/shared';
import { createMfaService, mfaEndpoint } from './endpoint';
import { lowBackupCodesWarning, mfaErrorResponse } from './responses';
import type { LoginResponse, MfaDeps } from './types';

/** The full session also goes out as a cookie for the browser flow */
function loginResponse(body: LoginResponse): HttpResponse {
    return {
        ...success(body),
        cookies: [sessionCookie({ token: body.token, expiresIn: body.expiresIn })],
    };
}

export function createVerifyHandler(deps: MfaDeps): LambdaHandler {
    const service = createMfaService(deps);

    return mfaEndpoint(deps, { name: 'MFA verify', method: 'POST', allowPending: true },
        async ({ caller, body, audit, logger }) => {
            const code = stringField(body, 'code');
            if (!code) {
                return invalidRequest('code is required');
            }

            const result = await service.verifyLoginCode(caller, code, audit);
            if (!result.ok) {
                logger.warn('MFA verification failed', { sub: caller.userId, error: result.error.kind });
                return mfaErrorResponse(result.error, 'login');
            }

            logger.info('MFA verification successful', { sub: caller.userId });
            return loginResponse({ ...result.value, backupCodeUsed: false });
        });
}

export function createBackupHandler(deps: MfaDeps): LambdaHandler {
    const service = createMfaService(deps);

    return mfaEndpoint(deps, { name: 'MFA backup code', method: 'POST', allowPending: true },
        async ({ caller, body, audit, logger }) => {
            const backupCode = stringField(body, 'backupCode');
            if (!backupCode) {
                return invalidRequest('backupCode is required');
            }

            const result = await service.verifyLoginBackupCode(caller, backupCode, audit);
            if (!result.ok) {
                logger.warn('Backup code rejected', { sub: caller.userId, error: result.error.kind });
                return mfaErrorResponse(result.error, 'login');
            }

            const remaining = result.value.remainingBackupCodes;
            logger.info('Backup code verified', { sub: caller.userId, remaining });

            return loginResponse({
                ...result.value,
                backupCodeUsed: true,
                ...(remaining <= TotpDefaults.LOW_BACKUP_CODES_THRESHOLD && {
                    warning: lowBackupCodesWarning(remaining),
                }),
            });
        });
}
