/**
 * AuthGate - Authentication Utilities
 *
 * Client authentication for the token endpoint and session credentials
 * for the login, MFA and admin endpoints.
 *
 * @module shared/auth
 */

export {
    authenticateClient,
    extractClientCredentials,
    verifyClientSecret,
} from './client-auth';

export type {
    AuthenticatedClient,
    ClientAuthFailure,
    ClientAuthMethod,
    ClientCredentials,
} from './client-auth';

export {
    SESSION_COOKIE,
    bearerToken,
    hasRole,
    issueSessionCredential,
    resolveCaller,
    sessionCookie,
    verifySessionCredential,
} from './credential';

export type {
    CallerOptions,
    CredentialSettings,
    IssuedCredential,
    SessionPrincipal,
    SessionSubject,
} from './credential';
