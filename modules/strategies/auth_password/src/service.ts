/**
 * AuthGate - Password Login Service
 *
 * Checks username and password against the user directory. Every failure
 * produces the same client-facing error so the response does not reveal
 * whether the username exists; the audit entry records the real reason.
 *
 * @module auth_password/service
 */

import { argon2Verify } from 'hash-wasm';
import {
    HttpStatus,
    OAuthErrors,
    TokenTypes,
    describeError,
    fail,
    issueSessionCredential,
    ok,
} from '@authgate/shared';
import type {
    AuditLogger,
    CredentialSettings,
    Logger,
    OAuthError,
    Result,
    SessionSubject,
    UserDirectory,
} from '@authgate/shared';
import type {
    LoginCredentials,
    LoginFailureReason,
    LoginResponse,
    PasswordVerifier,
} from './types';

export const INVALID_CREDENTIALS = 'Invalid username or password';

export const argon2PasswordVerifier: PasswordVerifier = (password, hash) =>
    argon2Verify({ password, hash });

export class PasswordLoginService {
    constructor(
        private readonly users: UserDirectory,
        private readonly credentials: CredentialSettings,
        private readonly verifyPassword: PasswordVerifier = argon2PasswordVerifier
    ) {}

    async login(
        input: LoginCredentials,
        audit: AuditLogger,
        logger: Logger
    ): Promise<Result<LoginResponse, OAuthError>> {
        const rejected = (reason: LoginFailureReason): Result<LoginResponse, OAuthError> => {
            audit.loginFailure({ method: 'password', username: input.username, reason });
            logger.warn('Login failed', { username: input.username, reason });
            return fail({ ...OAuthErrors.invalidGrant(INVALID_CREDENTIALS), status: HttpStatus.UNAUTHORIZED });
        };

        const user = await this.users.findByUsername(input.username);
        if (!user) {
            return rejected('user_not_found');
        }
        if (user.status !== 'ACTIVE') {
            return rejected('account_inactive');
        }
        if (!user.passwordHash) {
            return rejected('no_password_set');
        }

        let passwordValid = false;
        try {
            passwordValid = await this.verifyPassword(input.password, user.passwordHash);
        } catch (err) {
            // A malformed stored hash counts as a mismatch
            logger.error('Argon2 verification error', { sub: user.userId, error: describeError(err) });
        }
        if (!passwordValid) {
            return rejected('invalid_password');
        }

        const subject: SessionSubject = { userId: user.userId, username: user.username, roles: user.roles };
        const credential = await issueSessionCredential(this.credentials, subject, user.mfaEnabled);
        audit.loginSuccess(
            { type: 'USER', sub: user.userId, username: user.username },
            { method: 'password', mfaPending: user.mfaEnabled }
        );

        if (user.mfaEnabled) {
            logger.info('Password verified, MFA required', { sub: user.userId });
            return ok<LoginResponse>({
                mfaRequired: true,
                mfaToken: credential.token,
                expiresIn: credential.expiresIn,
            });
        }

        logger.info('Login successful', { sub: user.userId });
        return ok<LoginResponse>({
            token: credential.token,
            tokenType: TokenTypes.BEARER,
            expiresIn: credential.expiresIn,
            username: user.username,
            roles: user.roles,
            mfaRequired: false,
        });
    }
}
