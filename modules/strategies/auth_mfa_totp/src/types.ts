/**
 * AuthGate - TOTP MFA Types
 */

import type {
    Clock,
    CredentialSettings,
    TotpConfig,
    UserDirectory,
} from '@authgate/shared';
import type { AuditSink } from '../../../shared_types/audit';
import type { MfaStore } from './db';

// =============================================================================
// Errors
// =============================================================================

export type MfaErrorKind =
    | 'ALREADY_ENABLED'
    | 'NOT_ENABLED'
    | 'INVALID_CODE'
    | 'INVALID_SECRET'
    | 'USER_NOT_FOUND';

export interface MfaError {
    readonly kind: MfaErrorKind;
    readonly description: string;
}

// =============================================================================
// Service Results
// =============================================================================

export interface SetupChallenge {
    secret: string;
    qrCodeUri: string;
    qrCodeDataUrl: string;
    issuer: string;
    accountName: string;
}

export interface LoginCompletion {
    token: string;
    tokenType: 'Bearer';
    expiresIn: number;
    username: string;
    roles: readonly string[];
}

export interface BackupLoginCompletion extends LoginCompletion {
    remainingBackupCodes: number;
}

export interface MfaStatus {
    mfaEnabled: boolean;
    mfaEnabledAt?: string;
    backupCodesRemaining?: number;
}

// =============================================================================
// Response Bodies
// =============================================================================

export interface EnabledResponse {
    mfaEnabled: true;
    backupCodes: string[];
    message: string;
}

export interface LoginResponse extends LoginCompletion {
    backupCodeUsed: boolean;
    remainingBackupCodes?: number;
    warning?: string;
}

export interface DisabledResponse {
    mfaEnabled: false;
    message: string;
}

export interface BackupCodesResponse {
    backupCodes: string[];
    message: string;
}

// =============================================================================
// Handler Dependencies
// =============================================================================

export interface MfaDeps {
    readonly store: MfaStore;
    readonly users: UserDirectory;
    readonly clock: Clock;
    readonly totp: TotpConfig;
    readonly credentials: CredentialSettings;
    readonly auditSink?: AuditSink;
}
