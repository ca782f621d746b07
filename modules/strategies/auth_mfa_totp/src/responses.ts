/**
 * AuthGate - TOTP MFA Response Helpers
 *
 * Maps service failures onto `{error, error_description}` bodies. A wrong
 * code during the login second factor is an authentication failure (401);
 * everywhere else it is a bad request (400).
 */

import { HttpStatus, MfaErrors, TokenErrors, error, fromOAuthError } from '@authgate/shared';
import type { HttpResponse, OAuthError } from '@authgate/shared';
import type { MfaError, MfaErrorKind } from './types';

export type MfaPhase = 'login' | 'manage';

export const MfaMessages = {
    ENABLED: 'MFA enabled successfully. Save your backup codes in a safe place.',
    DISABLED: 'MFA has been disabled for your account.',
    CODES_REGENERATED: 'New backup codes generated. Previous codes are now invalid.',
} as const;

export function lowBackupCodesWarning(remaining: number): string {
    return `You have only ${remaining} backup codes remaining. Consider generating new ones.`;
}

const WIRE_CODES: Record<MfaErrorKind, string> = {
    ALREADY_ENABLED: MfaErrors.MFA_ALREADY_ENABLED,
    NOT_ENABLED: MfaErrors.MFA_NOT_ENABLED,
    INVALID_CODE: MfaErrors.INVALID_CODE,
    INVALID_SECRET: TokenErrors.INVALID_REQUEST,
    USER_NOT_FOUND: MfaErrors.USER_NOT_FOUND,
};

function statusOf(kind: MfaErrorKind, phase: MfaPhase): number {
    switch (kind) {
        case 'USER_NOT_FOUND':
            return HttpStatus.NOT_FOUND;
        case 'INVALID_CODE':
            return phase === 'login' ? HttpStatus.UNAUTHORIZED : HttpStatus.BAD_REQUEST;
        default:
            return HttpStatus.BAD_REQUEST;
    }
}

export function mfaErrorResponse(err: MfaError, phase: MfaPhase): HttpResponse {
    return error(statusOf(err.kind, phase), WIRE_CODES[err.kind], err.description);
}

/** Caller resolution failures carry a Bearer challenge */
export function callerErrorResponse(err: OAuthError): HttpResponse {
    return fromOAuthError(err, 'Bearer');
}
