/**
 * AuthGate - MFA Management Handlers
 *
 * POST /mfa/disable        Turn MFA off (TOTP or backup code)
 * POST /mfa/backup-codes   Replace all backup codes (TOTP only)
 * GET  /mfa/status         Enrollment summary
 *
 * All three require a full session; an MFA-pending credential is refused.
 *
 * @module auth_mfa_totp/disable
 */

import { invalidRequest, stringField, success } from '@authgate/shared';
import type { LambdaHandler } from '@authgate/shared';
import { createMfaService, mfaEndpoint } from './endpoint';
import { MfaMessages, mfaErrorResponse } from './responses';
import type { BackupCodesResponse, DisabledResponse, MfaDeps } from './types';

export function createDisableHandler(deps: MfaDeps): LambdaHandler {
    const service = createMfaService(deps);

    return mfaEndpoint(deps, { name: 'MFA disable', method: 'POST', allowPending: false },
        async ({ caller, body, audit, logger }) => {
            const code = stringField(body, 'code');
            if (!code) {
                return invalidRequest('code is required');
            }

            const result = await service.disable(caller, code, audit);
            if (!result.ok) {
                logger.warn('MFA disable rejected', { sub: caller.userId, error: result.error.kind });
                return mfaErrorResponse(result.error, 'manage');
            }

            logger.info('MFA disabled', { sub: caller.userId });
            const response: DisabledResponse = { mfaEnabled: false, message: MfaMessages.DISABLED };
            return success(response);
        });
}

export function createRegenerateBackupCodesHandler(deps: MfaDeps): LambdaHandler {
    const service = createMfaService(deps);

    return mfaEndpoint(deps, { name: 'Backup code regeneration', method: 'POST', allowPending: false },
        async ({ caller, body, audit, logger }) => {
            const code = stringField(body, 'code');
            if (!code) {
                return invalidRequest('code is required');
            }

            const result = await service.regenerateBackupCodes(caller, code, audit);
            if (!result.ok) {
                logger.warn('Backup code regeneration rejected', { sub: caller.userId, error: result.error.kind });
                return mfaErrorResponse(result.error, 'manage');
            }

            logger.info('Backup codes regenerated', { sub: caller.userId });
            const response: BackupCodesResponse = {
                backupCodes: result.value,
                message: MfaMessages.CODES_REGENERATED,
            };
            return success(response);
        });
}

export function createStatusHandler(deps: MfaDeps): LambdaHandler {
    const service = createMfaService(deps);

    return mfaEndpoint(deps, { name: 'MFA status', method: 'GET', allowPending: false },
        async ({ caller }) => {
            const result = await service.status(caller.userId);
            if (!result.ok) {
                return mfaErrorResponse(result.error, 'manage');
            }
            return success(result.value);
        });
}
