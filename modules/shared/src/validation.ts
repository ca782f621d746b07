/**
 * AuthGate - Request Parameter Validation
 *
 * Shape checks for OAuth parameters and scope handling. All checks fail
 * closed: anything not explicitly valid is rejected.
 *
 * @see RFC 6749 Section 3.1.2 - Redirection Endpoint
 * @see RFC 6749 Section 3.3 - Access Token Scope
 */

// =============================================================================
// Constants
// =============================================================================

const MAX_CLIENT_ID_LENGTH = 256;
const MAX_STATE_LENGTH = 512;
const MAX_NONCE_LENGTH = 512;
const MAX_REDIRECT_URI_LENGTH = 2048;

/** Alphanumeric, hyphens, underscores, and periods (RFC 8252 reverse-domain ids) */
const CLIENT_ID_PATTERN = /^[a-zA-Z0-9._-]+$/;

/** RFC 6749 Appendix A.4 scope-token characters */
const SCOPE_TOKEN_PATTERN = /^[\x21\x23-\x5B\x5D-\x7E]+$/;

// =============================================================================
// Identifiers
// =============================================================================

export function isValidClientId(clientId: string | undefined): clientId is string {
    if (clientId === undefined || clientId.length < 1 || clientId.length > MAX_CLIENT_ID_LENGTH) {
        return false;
    }
    return CLIENT_ID_PATTERN.test(clientId);
}

/**
 * A redirect URI suitable for registration: absolute, no fragment, and
 * https unless it points at the local machine.
 */
export function isValidRedirectUri(uri: string | undefined): uri is string {
    if (uri === undefined || uri.length > MAX_REDIRECT_URI_LENGTH) {
        return false;
    }

    let parsed: URL;
    try {
        parsed = new URL(uri);
    } catch {
        return false;
    }

    if (parsed.hash || uri.includes('#')) {
        return false;
    }

    if (parsed.protocol === 'https:') {
        return true;
    }
    if (parsed.protocol === 'http:') {
        return parsed.hostname === 'localhost' || parsed.hostname === '127.0.0.1';
    }
    return false;
}

/** Optional opaque values echoed back to the client */
export function isValidState(state: string | undefined): boolean {
    return state === undefined || (state.length > 0 && state.length <= MAX_STATE_LENGTH);
}

export function isValidNonce(nonce: string | undefined): boolean {
    return nonce === undefined || (nonce.length > 0 && nonce.length <= MAX_NONCE_LENGTH);
}

// =============================================================================
// Scopes
// =============================================================================

/**
 * Split a space-delimited scope string into distinct tokens, keeping
 * first-seen order.
 */
export function parseScopes(scope: string | undefined): string[] {
    if (!scope) {
        return [];
    }
    return [...new Set(scope.split(' ').filter((token) => token.length > 0))];
}

export function isValidScopeToken(token: string): boolean {
    return SCOPE_TOKEN_PATTERN.test(token);
}

/**
 * Requested scopes that the client is not allowed.
 */
export function disallowedScopes(requested: readonly string[], allowed: readonly string[]): string[] {
    const allowedSet = new Set(allowed);
    return requested.filter((scope) => !allowedSet.has(scope));
}
