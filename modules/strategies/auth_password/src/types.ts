/**
 * AuthGate - Password Login Types
 */

import type { CredentialSettings, UserDirectory } from '@authgate/shared';
import type { AuditSink } from '../../../shared_types/audit';

/** Checks a plaintext password against a stored argon2 hash */
export type PasswordVerifier = (password: string, hash: string) => Promise<boolean>;

export type LoginFailureReason =
    | 'user_not_found'
    | 'account_inactive'
    | 'no_password_set'
    | 'invalid_password';

export interface LoginCredentials {
    username: string;
    password: string;
}

/** Full session: no second factor enrolled */
export interface SessionLoginResponse {
    token: string;
    tokenType: 'Bearer';
    expiresIn: number;
    username: string;
    roles: readonly string[];
    mfaRequired: false;
}

/** Second factor outstanding: the token only opens /mfa/verify and /mfa/backup */
export interface MfaChallengeResponse {
    mfaRequired: true;
    mfaToken: string;
    expiresIn: number;
}

export type LoginResponse = SessionLoginResponse | MfaChallengeResponse;

export interface LoginDeps {
    readonly users: UserDirectory;
    readonly credentials: CredentialSettings;
    readonly verifyPassword?: PasswordVerifier;
    readonly auditSink?: AuditSink;
}
