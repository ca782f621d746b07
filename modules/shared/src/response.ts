/**
 * AuthGate - Standardized HTTP Response Helpers
 *
 * Consistent response formatting for all Lambda functions.
 *
 * Key Requirements:
 * - Token and credential responses carry Cache-Control: no-store (RFC 6749 Section 5.1)
 * - Error bodies are always `{error, error_description?, error_uri?}`
 * - Authorization responses redirect with 302 Found
 * - All responses include security headers
 *
 * HTTP API Gateway v2 cannot add response headers at the gateway, so
 * security headers are set here, at the Lambda response level.
 *
 * @see RFC 6749 Section 4.1.2 - Authorization Response
 * @see RFC 6749 Section 5.2 - Error Response
 * @see RFC 6797 - HTTP Strict Transport Security (HSTS)
 */

import type { APIGatewayProxyStructuredResultV2 } from 'aws-lambda';
import type { OAuthError } from './errors';

// =============================================================================
// Types
// =============================================================================

/** Structured API Gateway response (never the string shorthand) */
export type HttpResponse = APIGatewayProxyStructuredResultV2;

// =============================================================================
// Response Headers
// =============================================================================

const SECURITY_HEADERS = {
    'Strict-Transport-Security': 'max-age=63072000; includeSubDomains; preload',
    'X-Content-Type-Options': 'nosniff',
    'X-Frame-Options': 'DENY',
    'Referrer-Policy': 'strict-origin-when-cross-origin',
} as const;

const JSON_HEADERS = {
    'Content-Type': 'application/json',
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    'Content-Security-Policy': "default-src 'none'; frame-ancestors 'none'",
    ...SECURITY_HEADERS,
} as const;

const REDIRECT_HEADERS = {
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    ...SECURITY_HEADERS,
} as const;

// =============================================================================
// Success Responses
// =============================================================================

/**
 * Return a successful JSON response.
 *
 * @example
 * ```typescript
 * return success({ mfaEnabled: false });
 * ```
 */
export function success<T>(body: T, statusCode = 200): HttpResponse {
    return {
        statusCode,
        headers: { ...JSON_HEADERS },
        body: JSON.stringify(body),
    };
}

export function created<T>(body: T): HttpResponse {
    return success(body, 201);
}

export function noContent(): HttpResponse {
    return {
        statusCode: 204,
        headers: {
            'Cache-Control': 'no-store',
            ...SECURITY_HEADERS,
        },
        body: '',
    };
}

/**
 * Return a JSON document that clients may cache, such as discovery metadata.
 */
export function cacheableJson<T>(body: T, maxAgeSeconds: number): HttpResponse {
    return {
        statusCode: 200,
        headers: {
            ...SECURITY_HEADERS,
            'Content-Type': 'application/json',
            'Cache-Control': `public, max-age=${maxAgeSeconds}`,
            'Access-Control-Allow-Origin': '*',
        },
        body: JSON.stringify(body),
    };
}

// =============================================================================
// Error Responses
// =============================================================================

/**
 * Error response body.
 */
export interface OAuthErrorBody {
    error: string;
    error_description?: string;
    error_uri?: string;
}

/**
 * Return an error response.
 *
 * @example
 * ```typescript
 * return error(400, 'invalid_request', 'Missing required parameter: client_id');
 * ```
 */
export function error(
    statusCode: number,
    errorCode: string,
    description?: string,
    extraHeaders: Record<string, string> = {}
): HttpResponse {
    const body: OAuthErrorBody = {
        error: errorCode,
    };

    if (description) {
        body.error_description = description;
    }

    return {
        statusCode,
        headers: { ...JSON_HEADERS, ...extraHeaders },
        body: JSON.stringify(body),
    };
}

/**
 * Render a typed OAuth error. A 401 carries a WWW-Authenticate challenge
 * for the given scheme.
 */
export function fromOAuthError(err: OAuthError, challengeScheme?: 'Basic' | 'Bearer'): HttpResponse {
    const headers: Record<string, string> = {};
    if (err.status === 401 && challengeScheme === 'Basic') {
        headers['WWW-Authenticate'] = 'Basic realm="oauth"';
    } else if (err.status === 401 && challengeScheme === 'Bearer') {
        headers['WWW-Authenticate'] = `Bearer error="${err.code}"`;
    }
    return error(err.status, err.code, err.description, headers);
}

export function invalidRequest(description: string): HttpResponse {
    return error(400, 'invalid_request', description);
}

export function methodNotAllowed(allowed: string): HttpResponse {
    return error(405, 'invalid_request', 'Method not allowed', { Allow: allowed });
}

export function serverError(description?: string): HttpResponse {
    return error(500, 'server_error', description || 'An unexpected error occurred');
}

// =============================================================================
// Redirect Responses
// =============================================================================

/**
 * Return an HTTP 302 Found redirect response.
 *
 * @example
 * ```typescript
 * return redirect('https://client.example.com/callback?code=xyz&state=abc');
 * ```
 */
export function redirect(url: string): HttpResponse {
    return {
        statusCode: 302,
        headers: {
            ...REDIRECT_HEADERS,
            Location: url,
        },
        body: '',
    };
}

// =============================================================================
// CORS Support
// =============================================================================

/**
 * Add CORS headers to a response, keeping its security headers.
 */
export function withCors(response: HttpResponse, origin = '*'): HttpResponse {
    return {
        ...response,
        headers: {
            ...SECURITY_HEADERS,
            ...response.headers,
            'Access-Control-Allow-Origin': origin,
            'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
            'Access-Control-Allow-Headers': 'Content-Type, Authorization',
        },
    };
}

/**
 * Return a CORS preflight response cached by the browser for 24 hours.
 */
export function corsPreflight(origin = '*'): HttpResponse {
    return {
        statusCode: 204,
        headers: {
            ...SECURITY_HEADERS,
            'Access-Control-Allow-Origin': origin,
            'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
            'Access-Control-Allow-Headers': 'Content-Type, Authorization',
            'Access-Control-Max-Age': '86400',
        },
        body: '',
    };
}
