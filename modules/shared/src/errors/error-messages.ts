/**
 * AuthGate - Error Messages
 *
 * Human-readable text for error_description fields.
 */

export const ErrorMessages = {
    // -------------------------------------------------------------------------
    // Request shape
    // -------------------------------------------------------------------------

    DUPLICATE_PARAMETER: 'Duplicate parameter in request',
    MISSING_CLIENT_ID: 'Missing required parameter: client_id',
    MISSING_REDIRECT_URI: 'Missing required parameter: redirect_uri',
    MISSING_GRANT_TYPE: 'Missing required parameter: grant_type',
    MISSING_CODE: 'Missing required parameter: code',
    INVALID_BODY: 'Request body could not be parsed',
    INVALID_CONTENT_TYPE: 'Content-Type must be application/x-www-form-urlencoded or application/json',

    // -------------------------------------------------------------------------
    // Authorization Endpoint
    // -------------------------------------------------------------------------

    INVALID_RESPONSE_TYPE: 'response_type must be "code"',
    UNKNOWN_CLIENT: 'Unknown or disabled client',
    REDIRECT_URI_MISMATCH: 'Invalid redirect_uri. The redirect URI must exactly match a registered URI.',
    SCOPE_NOT_ALLOWED: 'One or more requested scopes are not allowed for this client',
    PKCE_REQUIRED: 'PKCE is required for this client. Please include code_challenge and code_challenge_method parameters.',
    INVALID_CODE_CHALLENGE_METHOD: 'code_challenge_method must be "S256" or "plain"',
    INVALID_CODE_CHALLENGE: 'code_challenge must be 43-128 characters from [A-Za-z0-9-._~]',
    PENDING_REQUEST_NOT_FOUND: 'Authorization request not found or expired',

    // -------------------------------------------------------------------------
    // Token Endpoint
    // -------------------------------------------------------------------------

    UNSUPPORTED_GRANT_TYPE: 'Only the authorization_code grant is supported',
    INVALID_CODE: 'Authorization code is invalid, expired, or has already been used',
    CLIENT_MISMATCH: 'Authorization code was not issued to this client',
    REDIRECT_URI_CHANGED: 'redirect_uri does not match the authorization request',
    MISSING_CODE_VERIFIER: 'code_verifier is required because code_challenge was used in authorization',
    PKCE_VERIFICATION_FAILED: 'PKCE verification failed',
    CLIENT_AUTH_FAILED: 'Client authentication failed',
    GRANT_NOT_ALLOWED: 'Client is not allowed to use the authorization_code grant',

    // -------------------------------------------------------------------------
    // Resource Server / Credentials
    // -------------------------------------------------------------------------

    MISSING_TOKEN: 'Missing bearer token',
    INVALID_TOKEN: 'Token is invalid or expired',
    OPENID_SCOPE_REQUIRED: 'The openid scope is required',
    AUTHENTICATION_REQUIRED: 'Authentication required',
    MFA_VERIFICATION_REQUIRED: 'MFA verification is required',
    ADMIN_REQUIRED: 'Administrator role required',

    // -------------------------------------------------------------------------
    // MFA
    // -------------------------------------------------------------------------

    MFA_ALREADY_ENABLED: 'MFA is already enabled for this account',
    MFA_NOT_ENABLED: 'MFA is not enabled for this account',
    INVALID_MFA_CODE: 'Invalid verification code',
    INVALID_BACKUP_CODE: 'Invalid backup code',
    INVALID_TOTP_SECRET: 'secret must be a 32-character Base32 string',
    USER_NOT_FOUND: 'User not found',

    // -------------------------------------------------------------------------
    // Server
    // -------------------------------------------------------------------------

    INTERNAL_ERROR: 'An unexpected error occurred',
} as const;
