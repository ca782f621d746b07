/**
 * AuthGate - OAuth 2.0 Error Codes
 *
 * @see RFC 6749 Section 4.1.2.1 - Authorization Error Response
 * @see RFC 6749 Section 5.2 - Token Error Response
 * @see RFC 6750 Section 3.1 - Bearer Token Error Codes
 */

// =============================================================================
// Authorization Endpoint Error Codes
// =============================================================================

export const AuthorizationErrors = {
    INVALID_REQUEST: 'invalid_request',
    /** Unknown or disabled client; never redirected */
    INVALID_CLIENT: 'invalid_client',
    ACCESS_DENIED: 'access_denied',
    UNSUPPORTED_RESPONSE_TYPE: 'unsupported_response_type',
    INVALID_SCOPE: 'invalid_scope',
    SERVER_ERROR: 'server_error',
} as const;

export type AuthorizationErrorCode = typeof AuthorizationErrors[keyof typeof AuthorizationErrors];

// =============================================================================
// Token Endpoint Error Codes
// =============================================================================

export const TokenErrors = {
    INVALID_REQUEST: 'invalid_request',
    INVALID_CLIENT: 'invalid_client',
    /** Invalid, expired, reused or mismatched code, or failed PKCE */
    INVALID_GRANT: 'invalid_grant',
    UNAUTHORIZED_CLIENT: 'unauthorized_client',
    UNSUPPORTED_GRANT_TYPE: 'unsupported_grant_type',
    SERVER_ERROR: 'server_error',
} as const;

export type TokenErrorCode = typeof TokenErrors[keyof typeof TokenErrors];

// =============================================================================
// Resource Server Error Codes
// =============================================================================

export const ResourceErrors = {
    INVALID_TOKEN: 'invalid_token',
    INSUFFICIENT_SCOPE: 'insufficient_scope',
} as const;

export type ResourceErrorCode = typeof ResourceErrors[keyof typeof ResourceErrors];

// =============================================================================
// MFA Error Codes
// =============================================================================

/**
 * Wire codes for MFA lifecycle failures. Not part of the OAuth vocabulary,
 * but rendered in the same `{error, error_description}` body.
 */
export const MfaErrors = {
    MFA_ALREADY_ENABLED: 'mfa_already_enabled',
    MFA_NOT_ENABLED: 'mfa_not_enabled',
    INVALID_CODE: 'invalid_code',
    USER_NOT_FOUND: 'user_not_found',
} as const;

export type MfaErrorCode = typeof MfaErrors[keyof typeof MfaErrors];

// =============================================================================
// Union Type
// =============================================================================

export type OAuthErrorCode = AuthorizationErrorCode | TokenErrorCode | ResourceErrorCode;

export type ErrorCode = OAuthErrorCode | MfaErrorCode;
