/**
 * AuthGate - Token Endpoint Responses
 *
 * Token and error bodies come from the shared helpers, which set
 * Cache-Control: no-store (RFC 6749 Section 5.1). This module adds the
 * CORS handling for browser-based public clients.
 *
 * @module oauth2_token/response
 * @see RFC 6749 Section 5.1 - Successful Response
 * @see RFC 6749 Section 5.2 - Error Response
 */

import { fromOAuthError, success, withCors } from '@authgate/shared';
import type { HttpResponse, OAuthError } from '@authgate/shared';
import type { TokenResponseBody } from './types';

// =============================================================================
// CORS
// =============================================================================

/**
 * Escape special regex characters except asterisk.
 */
function escapeRegexExceptWildcard(value: string): string {
    return value.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * The origin to echo in Access-Control-Allow-Origin, or undefined when the
 * request origin is not allowed.
 */
export function getAllowedOrigin(
    origin: string | undefined,
    allowedOrigins: readonly string[]
): string | undefined {
    if (!origin) {
        return undefined;
    }
    if (allowedOrigins.length === 0 || allowedOrigins.includes(origin)) {
        return origin;
    }

    for (const allowed of allowedOrigins) {
        if (!allowed.includes('*')) {
            continue;
        }
        const pattern = new RegExp('^' + escapeRegexExceptWildcard(allowed).replace(/\*/g, '[^/]*') + '$');
        if (pattern.test(origin)) {
            return origin;
        }
    }

    return undefined;
}

export function applyCors(response: HttpResponse, allowedOrigin: string | undefined): HttpResponse {
    return allowedOrigin ? withCors(response, allowedOrigin) : response;
}

// =============================================================================
// Bodies
// =============================================================================

export function tokenResponse(body: TokenResponseBody): HttpResponse {
    return success(body);
}

/**
 * A 401 from /token is always a client authentication failure, answered
 * with a Basic challenge (RFC 6749 Section 5.2).
 */
export function tokenError(err: OAuthError): HttpResponse {
    return fromOAuthError(err, 'Basic');
}
