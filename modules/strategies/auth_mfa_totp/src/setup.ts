/**
 * AuthGate - MFA Enrollment Handlers
 *
 * POST /mfa/setup          Generate a secret and QR code
 * POST /mfa/setup/verify   Prove the authenticator has the secret; enable MFA
 *
 * Flow:
 * 1. Setup returns the secret without storing it
 * 2. The client echoes the secret back with a current code
 * 3. On a match the secret and hashed backup codes are saved, and the
 *    plaintext backup codes are returned once
 *
 * @module auth_mfa_totp/setup
 */

import { invalidRequest, stringField, success } from '@authgate/shared';
import type { LambdaHandler } from '@authgate/shared';
import { createMfaService, mfaEndpoint } from './endpoint';
import { MfaMessages, mfaErrorResponse } from './responses';
import type { EnabledResponse, MfaDeps } from './types';

export function createSetupHandler(deps: MfaDeps): LambdaHandler {
    const service = createMfaService(deps);

    return mfaEndpoint(deps, { name: 'MFA setup', method: 'POST', allowPending: false },
        async ({ caller, audit, logger }) => {
            const result = await service.initiateSetup(caller, audit);
            if (!result.ok) {
                logger.warn('MFA setup rejected', { sub: caller.userId, error: result.error.kind });
                return mfaErrorResponse(result.error, 'manage');
            }

            logger.info('MFA setup initiated', { sub: caller.userId });
            return success(result.value);
        });
}

export function createSetupVerifyHandler(deps: MfaDeps): LambdaHandler {
    const service = createMfaService(deps);

    return mfaEndpoint(deps, { name: 'MFA setup verify', method: 'POST', allowPending: false },
        async ({ caller, body, audit, logger }) => {
            const secret = stringField(body, 'secret');
            const code = stringField(body, 'code');
            if (!secret || !code) {
                return invalidRequest('secret and code are required');
            }

            const result = await service.completeSetup(caller, secret, code, audit);
            if (!result.ok) {
                logger.warn('MFA enrollment failed', { sub: caller.userId, error: result.error.kind });
                return mfaErrorResponse(result.error, 'manage');
            }

            logger.info('MFA enabled', { sub: caller.userId });
            const response: EnabledResponse = {
                mfaEnabled: true,
                backupCodes: result.value,
                message: MfaMessages.ENABLED,
            };
            return success(response);
        });
}
