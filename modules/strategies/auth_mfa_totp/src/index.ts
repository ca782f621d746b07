/**
 * AuthGate - TOTP Multi-Factor Authentication
 *
 * RFC 6238 TOTP enrollment, login second factor with backup codes, and
 * enrollment management. One Lambda entry point per route.
 *
 * @module auth_mfa_totp
 */

import { lazyHandler } from '@authgate/shared';
import type { Runtime } from '@authgate/shared';
import { DynamoMfaStore } from './db';
import { createDisableHandler, createRegenerateBackupCodesHandler, createStatusHandler } from './disable';
import { createSetupHandler, createSetupVerifyHandler } from './setup';
import type { MfaDeps } from './types';
import { createBackupHandler, createVerifyHandler } from './verify';

export { MfaService } from './service';
export { DynamoMfaStore, ENABLE_CONDITION, toEnrollment } from './db';
export type { MfaStore } from './db';
export { mfaErrorResponse, MfaMessages, lowBackupCodesWarning } from './responses';
export * from './totp';
export { createSetupHandler, createSetupVerifyHandler } from './setup';
export { createVerifyHandler, createBackupHandler } from './verify';
export { createDisableHandler, createRegenerateBackupCodesHandler, createStatusHandler } from './disable';
export type {
    BackupCodesResponse,
    BackupLoginCompletion,
    DisabledResponse,
    EnabledResponse,
    LoginCompletion,
    LoginResponse,
    MfaDeps,
    MfaError,
    MfaErrorKind,
    MfaStatus,
    SetupChallenge,
} from './types';

// =============================================================================
// Lambda Entry Points
// =============================================================================

function depsFrom(runtime: Runtime): MfaDeps {
    return {
        store: new DynamoMfaStore(runtime.docClient, runtime.config.tableName),
        users: runtime.users,
        clock: runtime.clock,
        totp: runtime.config.totp,
        credentials: runtime.credentials,
    };
}

export const setupHandler = lazyHandler((runtime) => createSetupHandler(depsFrom(runtime)));
export const setupVerifyHandler = lazyHandler((runtime) => createSetupVerifyHandler(depsFrom(runtime)));
export const verifyHandler = lazyHandler((runtime) => createVerifyHandler(depsFrom(runtime)));
export const backupHandler = lazyHandler((runtime) => createBackupHandler(depsFrom(runtime)));
export const disableHandler = lazyHandler((runtime) => createDisableHandler(depsFrom(runtime)));
export const backupCodesHandler = lazyHandler((runtime) => createRegenerateBackupCodesHandler(depsFrom(runtime)));
export const statusHandler = lazyHandler((runtime) => createStatusHandler(depsFrom(runtime)));
