/**
 * AuthGate - Request Parsing
 *
 * Body, header, cookie and parameter extraction for HTTP API v2 events.
 * Bodies may arrive base64-encoded; header names are lowercase in v2.
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';

// =============================================================================
// Headers and Cookies
// =============================================================================

export function getHeader(event: APIGatewayProxyEventV2, name: string): string | undefined {
    return event.headers?.[name.toLowerCase()];
}

/**
 * Read a cookie from the v2 `cookies` array, falling back to the raw
 * Cookie header. A value that is not valid percent-encoding is treated
 * as absent.
 */
export function getCookie(event: APIGatewayProxyEventV2, name: string): string | undefined {
    const cookies = event.cookies ?? (getHeader(event, 'cookie')?.split(';') ?? []);
    for (const cookie of cookies) {
        const separator = cookie.indexOf('=');
        if (separator > 0 && cookie.slice(0, separator).trim() === name) {
            try {
                return decodeURIComponent(cookie.slice(separator + 1).trim());
            } catch (err) {
                if (err instanceof URIError) {
                    return undefined;
                }
                throw err;
            }
        }
    }
    return undefined;
}

export function getMethod(event: APIGatewayProxyEventV2): string {
    return event.requestContext?.http?.method?.toUpperCase() ?? 'GET';
}

// =============================================================================
// Bodies
// =============================================================================

export function readBody(event: APIGatewayProxyEventV2): string {
    if (!event.body) {
        return '';
    }
    return event.isBase64Encoded
        ? Buffer.from(event.body, 'base64').toString('utf-8')
        : event.body;
}

export function isJsonRequest(event: APIGatewayProxyEventV2): boolean {
    return (getHeader(event, 'content-type') ?? '').toLowerCase().includes('application/json');
}

export function isFormRequest(event: APIGatewayProxyEventV2): boolean {
    return (getHeader(event, 'content-type') ?? '').toLowerCase().includes('application/x-www-form-urlencoded');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON object body. Anything other than an object is rejected.
 */
export function parseJsonObject(raw: string): Record<string, unknown> | null {
    if (!raw) {
        return {};
    }
    try {
        const parsed: unknown = JSON.parse(raw);
        return isRecord(parsed) ? parsed : null;
    } catch {
        return null;
    }
}

/**
 * Parse a form or JSON body into URLSearchParams. JSON values must be
 * strings; other value types make the body invalid.
 */
export function parseParams(event: APIGatewayProxyEventV2): URLSearchParams | null {
    const raw = readBody(event);

    if (isJsonRequest(event)) {
        const body = parseJsonObject(raw);
        if (body === null) {
            return null;
        }
        const params = new URLSearchParams();
        for (const [key, value] of Object.entries(body)) {
            if (typeof value !== 'string') {
                return null;
            }
            params.set(key, value);
        }
        return params;
    }

    return new URLSearchParams(raw);
}

/**
 * Body fields for the small JSON/form endpoints (login, MFA).
 */
export function parseFields(event: APIGatewayProxyEventV2): Record<string, unknown> | null {
    if (isFormRequest(event)) {
        return Object.fromEntries(new URLSearchParams(readBody(event)));
    }
    return parseJsonObject(readBody(event));
}

export function stringField(body: Record<string, unknown>, key: string): string | undefined {
    const value = body[key];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

// =============================================================================
// Parameters
// =============================================================================

/**
 * Names of parameters that appear more than once (RFC 6749 Section 3.1).
 */
export function findDuplicateParams(params: URLSearchParams): string[] {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const key of params.keys()) {
        if (seen.has(key)) {
            duplicates.add(key);
        }
        seen.add(key);
    }
    return [...duplicates];
}

/**
 * Query parameters, read from the raw query string so duplicates survive.
 */
export function queryParams(event: APIGatewayProxyEventV2): URLSearchParams {
    if (event.rawQueryString) {
        return new URLSearchParams(event.rawQueryString);
    }
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(event.queryStringParameters ?? {})) {
        if (value !== undefined) {
            params.set(key, value);
        }
    }
    return params;
}

/** A parameter value, treating an empty string as absent */
export function param(params: URLSearchParams, name: string): string | undefined {
    const value = params.get(name);
    return value ? value : undefined;
}
