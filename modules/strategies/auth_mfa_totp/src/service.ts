/**
 * AuthGate - TOTP MFA Service
 *
 * Enrollment lifecycle and second-factor verification. Every operation
 * writes an audit entry naming the user, the enrollment and the outcome;
 * handlers only parse requests and render results.
 *
 * Lifecycle:
 *   initiateSetup -> completeSetup -> (verifyLoginCode | verifyLoginBackupCode)*
 *   -> regenerateBackupCodes* -> disable
 *
 * @module auth_mfa_totp/service
 */

import {
    ErrorMessages,
    TokenTypes,
    fail,
    issueSessionCredential,
    ok,
    toIsoString,
} from '@authgate/shared';
import type {
    AuditLogger,
    Clock,
    CredentialSettings,
    Result,
    SessionSubject,
    TotpConfig,
    UserDirectory,
} from '@authgate/shared';
import type { AuditActor, AuditResource } from '../../../shared_types/audit';
import type { TotpEnrollment } from '../../../shared_types/user';
import type { MfaStore } from './db';
import {
    findBackupCodeHash,
    generateBackupCodes,
    generateSecret,
    hashBackupCode,
    isValidSecret,
    renderQrCode,
    totpUri,
    verifyTotp,
} from './totp';
import type {
    BackupLoginCompletion,
    LoginCompletion,
    MfaError,
    MfaErrorKind,
    MfaStatus,
    SetupChallenge,
} from './types';

/** An enabled enrollment, narrowed */
interface ActiveEnrollment extends TotpEnrollment {
    mfaEnabled: true;
    mfaSecret: string;
}

function mfaError(kind: MfaErrorKind, description: string): MfaError {
    return { kind, description };
}

function actorOf(user: SessionSubject): AuditActor {
    return { type: 'USER', sub: user.userId, username: user.username };
}

function enrollmentOf(user: SessionSubject): AuditResource {
    return { type: 'MFA_ENROLLMENT', id: user.userId };
}

function isActive(enrollment: TotpEnrollment): enrollment is ActiveEnrollment {
    return enrollment.mfaEnabled && enrollment.mfaSecret !== undefined;
}

export class MfaService {
    constructor(
        private readonly store: MfaStore,
        private readonly users: UserDirectory,
        private readonly clock: Clock,
        private readonly settings: TotpConfig,
        private readonly credentials: CredentialSettings
    ) {}

    // =========================================================================
    // Enrollment
    // =========================================================================

    /**
     * Generate a secret for the caller to load into an authenticator app.
     * Nothing is persisted until `completeSetup` proves the app has it.
     */
    async initiateSetup(user: SessionSubject, audit: AuditLogger): Promise<Result<SetupChallenge, MfaError>> {
        const record = await this.users.findById(user.userId);
        const enrollment = await this.store.getEnrollment(user.userId);
        if (!record || !enrollment) {
            return fail(mfaError('USER_NOT_FOUND', ErrorMessages.USER_NOT_FOUND));
        }
        if (enrollment.mfaEnabled) {
            audit.failure('MFA_SETUP_FAILED', actorOf(user), { reason: 'already_enabled' }, enrollmentOf(user));
            return fail(mfaError('ALREADY_ENABLED', ErrorMessages.MFA_ALREADY_ENABLED));
        }

        const secret = generateSecret();
        const accountName = record.email ?? record.username;
        const qrCodeUri = totpUri(secret, this.settings.issuer, accountName, this.settings.period);
        const qrCodeDataUrl = await renderQrCode(qrCodeUri);

        audit.success('MFA_SETUP_INITIATED', actorOf(user), { method: 'totp' }, enrollmentOf(user));

        return ok<SetupChallenge>({
            secret,
            qrCodeUri,
            qrCodeDataUrl,
            issuer: this.settings.issuer,
            accountName,
        });
    }

    /**
     * Enable MFA once a code generated from `secret` checks out.
     * Returns the plaintext backup codes; only their hashes are stored.
     */
    async completeSetup(
        user: SessionSubject,
        secret: string,
        code: string,
        audit: AuditLogger
    ): Promise<Result<string[], MfaError>> {
        if (!isValidSecret(secret)) {
            return fail(mfaError('INVALID_SECRET', ErrorMessages.INVALID_TOTP_SECRET));
        }

        const enrollment = await this.store.getEnrollment(user.userId);
        if (!enrollment) {
            return fail(mfaError('USER_NOT_FOUND', ErrorMessages.USER_NOT_FOUND));
        }
        if (enrollment.mfaEnabled) {
            audit.failure('MFA_SETUP_FAILED', actorOf(user), { reason: 'already_enabled' }, enrollmentOf(user));
            return fail(mfaError('ALREADY_ENABLED', ErrorMessages.MFA_ALREADY_ENABLED));
        }

        if (!this.checkCode(secret, code)) {
            audit.failure('MFA_SETUP_FAILED', actorOf(user), { reason: 'invalid_code' }, enrollmentOf(user));
            return fail(mfaError('INVALID_CODE', ErrorMessages.INVALID_MFA_CODE));
        }

        const backupCodes = generateBackupCodes(this.settings.backupCodesCount);
        const enabled = await this.store.enable(
            user.userId,
            secret,
            backupCodes.map(hashBackupCode),
            toIsoString(this.clock())
        );
        if (!enabled) {
            // Another request enabled MFA first
            audit.failure('MFA_SETUP_FAILED', actorOf(user), { reason: 'already_enabled' }, enrollmentOf(user));
            return fail(mfaError('ALREADY_ENABLED', ErrorMessages.MFA_ALREADY_ENABLED));
        }

        audit.success('MFA_ENABLED', actorOf(user), {
            method: 'totp',
            backupCodesIssued: backupCodes.length,
        }, enrollmentOf(user));

        return ok(backupCodes);
    }

    // =========================================================================
    // Second Factor at Login
    // =========================================================================

    /**
     * Verify a TOTP code for an MFA-pending caller and issue a full session.
     */
    async verifyLoginCode(
        user: SessionSubject,
        code: string,
        audit: AuditLogger
    ): Promise<Result<LoginCompletion, MfaError>> {
        const enrollment = await this.loadActive(user);
        if (!enrollment.ok) {
            return enrollment;
        }

        if (!this.checkCode(enrollment.value.mfaSecret, code)) {
            audit.failure('MFA_VERIFY_FAILED', actorOf(user), { reason: 'invalid_code' }, enrollmentOf(user));
            return fail(mfaError('INVALID_CODE', ErrorMessages.INVALID_MFA_CODE));
        }

        audit.success('MFA_VERIFY_SUCCESS', actorOf(user), { method: 'totp' }, enrollmentOf(user));
        return ok(await this.completeLogin(user));
    }

    /**
     * Consume a backup code for an MFA-pending caller and issue a full
     * session. A code is accepted at most once.
     */
    async verifyLoginBackupCode(
        user: SessionSubject,
        backupCode: string,
        audit: AuditLogger
    ): Promise<Result<BackupLoginCompletion, MfaError>> {
        const enrollment = await this.loadActive(user);
        if (!enrollment.ok) {
            return enrollment;
        }

        const hash = findBackupCodeHash(backupCode, enrollment.value.mfaBackupCodes);
        const remaining = hash === null
            ? null
            : await this.store.consumeBackupCode(user.userId, hash, toIsoString(this.clock()));
        if (remaining === null) {
            audit.failure('MFA_BACKUP_CODE_FAILED', actorOf(user), { reason: 'invalid_code' }, enrollmentOf(user));
            return fail(mfaError('INVALID_CODE', ErrorMessages.INVALID_BACKUP_CODE));
        }

        audit.success('MFA_BACKUP_CODE_USED', actorOf(user), { remainingBackupCodes: remaining }, enrollmentOf(user));
        return ok<BackupLoginCompletion>({ ...(await this.completeLogin(user)), remainingBackupCodes: remaining });
    }

    // =========================================================================
    // Management
    // =========================================================================

    /**
     * Turn MFA off. Either a current TOTP code or an unused backup code
     * proves possession; a backup code used here is not consumed separately
     * since the whole set is removed.
     */
    async disable(user: SessionSubject, code: string, audit: AuditLogger): Promise<Result<void, MfaError>> {
        const enrollment = await this.loadActive(user);
        if (!enrollment.ok) {
            return enrollment;
        }

        const viaTotp = this.checkCode(enrollment.value.mfaSecret, code);
        const viaBackup = !viaTotp && findBackupCodeHash(code, enrollment.value.mfaBackupCodes) !== null;
        if (!viaTotp && !viaBackup) {
            audit.failure('MFA_DISABLE_FAILED', actorOf(user), { reason: 'invalid_code' }, enrollmentOf(user));
            return fail(mfaError('INVALID_CODE', ErrorMessages.INVALID_MFA_CODE));
        }

        if (!await this.store.disable(user.userId, toIsoString(this.clock()))) {
            audit.failure('MFA_DISABLE_FAILED', actorOf(user), { reason: 'not_enabled' }, enrollmentOf(user));
            return fail(mfaError('NOT_ENABLED', ErrorMessages.MFA_NOT_ENABLED));
        }

        audit.success('MFA_DISABLED', actorOf(user), { method: viaTotp ? 'totp' : 'backup_code' }, enrollmentOf(user));
        return ok(undefined);
    }

    /**
     * Replace every backup code after a TOTP check. Previous codes stop
     * working immediately.
     */
    async regenerateBackupCodes(
        user: SessionSubject,
        code: string,
        audit: AuditLogger
    ): Promise<Result<string[], MfaError>> {
        const enrollment = await this.loadActive(user);
        if (!enrollment.ok) {
            return enrollment;
        }

        if (!this.checkCode(enrollment.value.mfaSecret, code)) {
            audit.failure('MFA_BACKUP_REGEN_FAILED', actorOf(user), { reason: 'invalid_code' }, enrollmentOf(user));
            return fail(mfaError('INVALID_CODE', ErrorMessages.INVALID_MFA_CODE));
        }

        const backupCodes = generateBackupCodes(this.settings.backupCodesCount);
        const replaced = await this.store.replaceBackupCodes(
            user.userId,
            backupCodes.map(hashBackupCode),
            toIsoString(this.clock())
        );
        if (!replaced) {
            audit.failure('MFA_BACKUP_REGEN_FAILED', actorOf(user), { reason: 'not_enabled' }, enrollmentOf(user));
            return fail(mfaError('NOT_ENABLED', ErrorMessages.MFA_NOT_ENABLED));
        }

        audit.success('MFA_BACKUP_CODES_REGENERATED', actorOf(user), {
            backupCodesIssued: backupCodes.length,
        }, enrollmentOf(user));
        return ok(backupCodes);
    }

    async status(userId: string): Promise<Result<MfaStatus, MfaError>> {
        const enrollment = await this.store.getEnrollment(userId);
        if (!enrollment) {
            return fail(mfaError('USER_NOT_FOUND', ErrorMessages.USER_NOT_FOUND));
        }
        if (!enrollment.mfaEnabled) {
            return ok<MfaStatus>({ mfaEnabled: false });
        }
        return ok<MfaStatus>({
            mfaEnabled: true,
            ...(enrollment.mfaEnabledAt !== undefined && { mfaEnabledAt: enrollment.mfaEnabledAt }),
            backupCodesRemaining: enrollment.mfaBackupCodes.length,
        });
    }

    // =========================================================================
    // Internals
    // =========================================================================

    private checkCode(secret: string, code: string): boolean {
        return verifyTotp(secret, code, this.clock(), {
            window: this.settings.window,
            period: this.settings.period,
        });
    }

    private async loadActive(user: SessionSubject): Promise<Result<ActiveEnrollment, MfaError>> {
        const enrollment = await this.store.getEnrollment(user.userId);
        if (!enrollment) {
            return fail(mfaError('USER_NOT_FOUND', ErrorMessages.USER_NOT_FOUND));
        }
        if (!isActive(enrollment)) {
            return fail(mfaError('NOT_ENABLED', ErrorMessages.MFA_NOT_ENABLED));
        }
        return ok(enrollment);
    }

    private async completeLogin(user: SessionSubject): Promise<LoginCompletion> {
        const credential = await issueSessionCredential(this.credentials, user, false);
        return {
            token: credential.token,
            tokenType: TokenTypes.BEARER,
            expiresIn: credential.expiresIn,
            username: user.username,
            roles: user.roles,
        };
    }
}
