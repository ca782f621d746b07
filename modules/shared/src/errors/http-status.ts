/**
 * AuthGate - HTTP Status Codes
 *
 * @see RFC 9110 - HTTP Semantics
 */

export const HttpStatus = {
    OK: 200,
    CREATED: 201,
    NO_CONTENT: 204,
    /** Authorization responses */
    FOUND: 302,
    BAD_REQUEST: 400,
    UNAUTHORIZED: 401,
    FORBIDDEN: 403,
    NOT_FOUND: 404,
    METHOD_NOT_ALLOWED: 405,
    CONFLICT: 409,
    UNSUPPORTED_MEDIA_TYPE: 415,
    INTERNAL_SERVER_ERROR: 500,
} as const;

/** Type representing valid HTTP status code values */
export type HttpStatusCode = typeof HttpStatus[keyof typeof HttpStatus];
