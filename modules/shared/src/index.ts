/**
 * AuthGate - Shared Utilities
 *
 * Central export for the modules used across Lambda functions.
 *
 * Architecture:
 * - Shared dependency of every protocol, strategy and governance module
 * - Configuration comes from environment variables, loaded once per container
 * - Storage is reached through ports; DynamoDB adapters implement them
 *
 * Modules:
 * - Config and Runtime: `ServerConfig` and collaborator wiring
 * - Audit Logger: structured JSON audit and operational logging
 * - Response Helpers: OAuth error bodies, redirects, security headers
 * - Request Parsing: bodies, parameters, headers and cookies
 * - Validation: redirect URI, client id and scope checks
 * - Crypto and PKCE: hashing, random values, challenge verification
 * - JWT: RS256 signing by KMS or a local key, verification, JWK export
 * - Auth: client authentication and session credentials
 * - Storage: code store, client registry, user directory, pending requests
 *
 * @see RFC 6749 - OAuth 2.0 Authorization Framework
 * @see RFC 7636 - Proof Key for Code Exchange (PKCE)
 * @see OpenID Connect Core 1.0
 */

// =============================================================================
// Configuration and Runtime
// =============================================================================

export {
    loadServerConfig,
    requireEnv,
    optionalEnv,
    optionalNumericEnv,
} from './config';

export type {
    ServerConfig,
    SigningConfig,
    LifetimeConfig,
    TotpConfig,
    Env,
} from './config';

export { createRuntime, lazyHandler } from './runtime';

export type { Runtime, LambdaHandler } from './runtime';

export { systemClock, toIsoString } from './clock';

export type { Clock } from './clock';

// =============================================================================
// Storage
// =============================================================================

export * from './storage';

// =============================================================================
// Audit Logger
// =============================================================================

export {
    AuditLogger,
    Logger,
    consoleAuditSink,
    withContext,
    createSystemLogger,
    createLogger,
} from './audit-logger';

export type { AuditContext, LogLevel } from './audit-logger';

// =============================================================================
// HTTP Request and Response Helpers
// =============================================================================

export {
    success,
    created,
    noContent,
    cacheableJson,
    error,
    fromOAuthError,
    invalidRequest,
    methodNotAllowed,
    serverError,
    redirect,
    withCors,
    corsPreflight,
} from './response';

export type { HttpResponse, OAuthErrorBody } from './response';

export {
    getHeader,
    getCookie,
    getMethod,
    readBody,
    isJsonRequest,
    isFormRequest,
    parseJsonObject,
    parseParams,
    parseFields,
    stringField,
    findDuplicateParams,
    queryParams,
    param,
} from './request';

// =============================================================================
// Errors
// =============================================================================

export {
    AuthorizationErrors,
    TokenErrors,
    ResourceErrors,
    MfaErrors,
    HttpStatus,
    ErrorMessages,
    OAuthErrors,
    ok,
    fail,
    describeError,
} from './errors';

export type {
    AuthorizationErrorCode,
    TokenErrorCode,
    ResourceErrorCode,
    MfaErrorCode,
    OAuthErrorCode,
    ErrorCode,
    HttpStatusCode,
    OAuthError,
    Result,
} from './errors';

// =============================================================================
// Validation
// =============================================================================

export {
    isValidClientId,
    isValidRedirectUri,
    isValidState,
    isValidNonce,
    isValidScopeToken,
    parseScopes,
    disallowedScopes,
} from './validation';

// =============================================================================
// Cryptography and PKCE
// =============================================================================

export {
    hashToken,
    sha256,
    base64UrlEncode,
    base64UrlDecode,
    generateSecureRandom,
    randomString,
    constantTimeEqual,
} from './crypto';

export {
    VERIFIER_MIN_LENGTH,
    VERIFIER_MAX_LENGTH,
    SUPPORTED_CHALLENGE_METHODS,
    generateCodeVerifier,
    computeChallenge,
    verifyChallenge,
    validateVerifierShape,
    isValidChallenge,
    isChallengeMethod,
} from './pkce';

export type { PkceError, PkceErrorKind } from './pkce';

// =============================================================================
// JWT
// =============================================================================

export * from './jwt';

// =============================================================================
// Authentication
// =============================================================================

export * from './auth';

// =============================================================================
// Constants and Type Guards
// =============================================================================

export {
    GrantTypes,
    ResponseTypes,
    TokenTypes,
    TokenUse,
    UserStatus,
    KeyPrefixes,
    StandardScopes,
    Roles,
    DefaultLifetimes,
    TotpDefaults,
    JwtAlgorithm,
} from './constants';

export type { TokenUseValue } from './constants';

export {
    isClientItem,
    isUserItem,
    isAuthCodeItem,
    isPendingAuthorizationItem,
} from './type-guards';
