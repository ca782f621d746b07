/**
 * AuthGate - Protocol Constants
 *
 * Values that do not change between environments. Runtime settings
 * (issuer, lifetimes, TOTP policy) live in `ServerConfig`.
 *
 * @see RFC 6749 - OAuth 2.0 Authorization Framework
 * @see OpenID Connect Core 1.0
 */

// =============================================================================
// Grant and Response Types
// =============================================================================

export const GrantTypes = {
    AUTHORIZATION_CODE: 'authorization_code',
    /** Registered in client policy; the token endpoint answers unsupported_grant_type */
    REFRESH_TOKEN: 'refresh_token',
} as const;

export const ResponseTypes = {
    CODE: 'code',
} as const;

export const TokenTypes = {
    BEARER: 'Bearer',
} as const;

// =============================================================================
// Credential Kinds
// =============================================================================

/**
 * Value of the `token_use` claim. Resource endpoints accept `access`
 * tokens only; the MFA and admin endpoints accept `session` credentials.
 */
export const TokenUse = {
    ACCESS: 'access',
    ID: 'id',
    SESSION: 'session',
} as const;

export type TokenUseValue = typeof TokenUse[keyof typeof TokenUse];

// =============================================================================
// User Status
// =============================================================================

export const UserStatus = {
    ACTIVE: 'ACTIVE',
    SUSPENDED: 'SUSPENDED',
    PENDING_VERIFICATION: 'PENDING_VERIFICATION',
} as const;

// =============================================================================
// DynamoDB Key Prefixes
// =============================================================================

export const KeyPrefixes = {
    CLIENT: 'CLIENT#',
    USER: 'USER#',
    CODE: 'CODE#',
    SESSION: 'SESSION#',
    USERNAME: 'USERNAME#',
} as const;

// =============================================================================
// Scopes and Roles
// =============================================================================

/**
 * @see OpenID Connect Core 1.0 Section 5.4 - Requesting Claims using Scope Values
 */
export const StandardScopes = {
    OPENID: 'openid',
    PROFILE: 'profile',
    EMAIL: 'email',
} as const;

export const Roles = {
    ADMIN: 'ADMIN',
    USER: 'USER',
} as const;

// =============================================================================
// Default Lifetimes (seconds)
// =============================================================================

export const DefaultLifetimes = {
    /** Authorization codes expire exactly this long after issuance */
    AUTHORIZATION_CODE: 600,
    ID_TOKEN: 3600,
    ACCESS_TOKEN: 3600,
    REFRESH_TOKEN: 86400,
    SESSION: 86400,
    MFA_PENDING: 300,
} as const;

// =============================================================================
// TOTP Defaults
// =============================================================================

export const TotpDefaults = {
    ISSUER: 'AuthGate',
    /** Codes are always six digits; not configurable */
    DIGITS: 6,
    PERIOD: 30,
    WINDOW: 1,
    BACKUP_CODES_COUNT: 10,
    /** Remaining backup codes at or below which the caller is warned */
    LOW_BACKUP_CODES_THRESHOLD: 2,
} as const;

// =============================================================================
// JWT
// =============================================================================

export const JwtAlgorithm = {
    RS256: 'RS256',
} as const;
