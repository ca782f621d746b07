/**
 * AuthGate - Session Credentials
 *
 * Password login issues a signed session credential. When the account has
 * MFA enabled the credential is marked `mfaPending` and carries a short
 * lifetime; only the MFA verification endpoints accept it, and a
 * successful second factor exchanges it for a full session.
 *
 * Credentials are RS256 JWTs with `token_use: 'session'`, so an access
 * token issued to a client can never stand in for one (and vice versa).
 *
 * @module shared/auth/credential
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';
import type { Clock } from '../clock';
import { TokenUse } from '../constants';
import { ErrorMessages, OAuthErrors, fail, ok } from '../errors';
import type { OAuthError, Result } from '../errors';
import { signJwt, stringArrayClaim, stringClaim, numberClaim, verifyJwt } from '../jwt';
import type { JwtSigner } from '../jwt';
import { getCookie, getHeader } from '../request';

export const SESSION_COOKIE = 'session';

// =============================================================================
// Types
// =============================================================================

export interface SessionSubject {
    userId: string;
    username: string;
    roles: readonly string[];
}

export interface SessionPrincipal extends SessionSubject {
    mfaPending: boolean;
    issuedAt: number;
    expiresAt: number;
}

export interface CredentialSettings {
    issuer: string;
    signer: JwtSigner;
    clock: Clock;
    /** Lifetime of a full session, seconds */
    sessionTtl: number;
    /** Lifetime of an MFA-pending credential, seconds */
    mfaPendingTtl: number;
}

export interface IssuedCredential {
    token: string;
    expiresIn: number;
}

interface SessionClaims {
    iss: string;
    sub: string;
    username: string;
    roles: readonly string[];
    mfaPending: boolean;
    iat: number;
    exp: number;
    token_use: typeof TokenUse.SESSION;
}

// =============================================================================
// Issue and Verify
// =============================================================================

export async function issueSessionCredential(
    settings: CredentialSettings,
    subject: SessionSubject,
    mfaPending: boolean
): Promise<IssuedCredential> {
    const now = settings.clock();
    const expiresIn = mfaPending ? settings.mfaPendingTtl : settings.sessionTtl;

    const claims: SessionClaims = {
        iss: settings.issuer,
        sub: subject.userId,
        username: subject.username,
        roles: subject.roles,
        mfaPending,
        iat: now,
        exp: now + expiresIn,
        token_use: TokenUse.SESSION,
    };

    return { token: await signJwt(settings.signer, claims), expiresIn };
}

/**
 * Verify a session credential. Returns null for anything that is not an
 * unexpired session credential from this issuer.
 */
export async function verifySessionCredential(
    token: string,
    settings: Pick<CredentialSettings, 'issuer' | 'signer' | 'clock'>
): Promise<SessionPrincipal | null> {
    const claims = verifyJwt(token, await settings.signer.getPublicKey(), {
        issuer: settings.issuer,
        now: settings.clock(),
    });
    if (!claims || claims.token_use !== TokenUse.SESSION) {
        return null;
    }

    const userId = stringClaim(claims, 'sub');
    const username = stringClaim(claims, 'username');
    const issuedAt = numberClaim(claims, 'iat');
    const expiresAt = numberClaim(claims, 'exp');
    if (!userId || !username || issuedAt === undefined || expiresAt === undefined
        || typeof claims.mfaPending !== 'boolean') {
        return null;
    }

    return {
        userId,
        username,
        roles: stringArrayClaim(claims, 'roles'),
        mfaPending: claims.mfaPending,
        issuedAt,
        expiresAt,
    };
}

/**
 * Set-Cookie value carrying a full session credential, for browsers that
 * continue to /oauth2/authorize after signing in.
 */
export function sessionCookie(credential: IssuedCredential): string {
    return `${SESSION_COOKIE}=${credential.token}; Path=/; Max-Age=${credential.expiresIn}; HttpOnly; Secure; SameSite=Lax`;
}

// =============================================================================
// Caller Resolution
// =============================================================================

/** The token from an `Authorization: Bearer` header */
export function bearerToken(event: APIGatewayProxyEventV2): string | undefined {
    const header = getHeader(event, 'authorization');
    if (!header || !/^Bearer\s+/i.test(header)) {
        return undefined;
    }
    const token = header.replace(/^Bearer\s+/i, '').trim();
    return token || undefined;
}

export interface CallerOptions {
    /** Accept an MFA-pending credential */
    allowPending: boolean;
}

/**
 * Resolve the signed-in caller from the Bearer header or the session cookie.
 */
export async function resolveCaller(
    event: APIGatewayProxyEventV2,
    settings: Pick<CredentialSettings, 'issuer' | 'signer' | 'clock'>,
    options: CallerOptions
): Promise<Result<SessionPrincipal, OAuthError>> {
    const token = bearerToken(event) ?? getCookie(event, SESSION_COOKIE);
    if (!token) {
        return fail(OAuthErrors.invalidToken(ErrorMessages.AUTHENTICATION_REQUIRED));
    }

    const principal = await verifySessionCredential(token, settings);
    if (!principal) {
        return fail(OAuthErrors.invalidToken(ErrorMessages.INVALID_TOKEN));
    }
    if (principal.mfaPending && !options.allowPending) {
        return fail(OAuthErrors.accessDenied(ErrorMessages.MFA_VERIFICATION_REQUIRED));
    }

    return ok(principal);
}

export function hasRole(principal: SessionSubject, role: string): boolean {
    return principal.roles.includes(role);
}
