/**
 * AuthGate - Typed Error Results
 *
 * Services return `Result` values instead of throwing for expected
 * failures. Handlers turn the error half into an HTTP response.
 *
 * @module errors/oauth-error
 */

import { AuthorizationErrors, ResourceErrors, TokenErrors } from './oauth-error-codes';
import type { OAuthErrorCode } from './oauth-error-codes';
import { HttpStatus } from './http-status';
import type { HttpStatusCode } from './http-status';

// =============================================================================
// Result
// =============================================================================

export type Result<T, E = OAuthError> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
    return { ok: true, value };
}

export function fail<E>(error: E): { readonly ok: false; readonly error: E } {
    return { ok: false, error };
}

// =============================================================================
// OAuth Error
// =============================================================================

export interface OAuthError {
    readonly code: OAuthErrorCode;
    readonly description: string;
    readonly status: HttpStatusCode;
}

/**
 * Constructors for the OAuth error taxonomy with their default statuses.
 */
export const OAuthErrors = {
    invalidRequest: (description: string): OAuthError => ({
        code: TokenErrors.INVALID_REQUEST,
        description,
        status: HttpStatus.BAD_REQUEST,
    }),
    invalidClient: (description: string): OAuthError => ({
        code: TokenErrors.INVALID_CLIENT,
        description,
        status: HttpStatus.UNAUTHORIZED,
    }),
    invalidGrant: (description: string): OAuthError => ({
        code: TokenErrors.INVALID_GRANT,
        description,
        status: HttpStatus.BAD_REQUEST,
    }),
    unauthorizedClient: (description: string): OAuthError => ({
        code: TokenErrors.UNAUTHORIZED_CLIENT,
        description,
        status: HttpStatus.BAD_REQUEST,
    }),
    unsupportedGrantType: (description: string): OAuthError => ({
        code: TokenErrors.UNSUPPORTED_GRANT_TYPE,
        description,
        status: HttpStatus.BAD_REQUEST,
    }),
    unsupportedResponseType: (description: string): OAuthError => ({
        code: AuthorizationErrors.UNSUPPORTED_RESPONSE_TYPE,
        description,
        status: HttpStatus.BAD_REQUEST,
    }),
    invalidScope: (description: string): OAuthError => ({
        code: AuthorizationErrors.INVALID_SCOPE,
        description,
        status: HttpStatus.BAD_REQUEST,
    }),
    accessDenied: (description: string): OAuthError => ({
        code: AuthorizationErrors.ACCESS_DENIED,
        description,
        status: HttpStatus.FORBIDDEN,
    }),
    invalidToken: (description: string): OAuthError => ({
        code: ResourceErrors.INVALID_TOKEN,
        description,
        status: HttpStatus.UNAUTHORIZED,
    }),
    insufficientScope: (description: string): OAuthError => ({
        code: ResourceErrors.INSUFFICIENT_SCOPE,
        description,
        status: HttpStatus.FORBIDDEN,
    }),
    serverError: (description: string): OAuthError => ({
        code: TokenErrors.SERVER_ERROR,
        description,
        status: HttpStatus.INTERNAL_SERVER_ERROR,
    }),
} as const;

/**
 * Message of an unknown thrown value, for logging.
 */
export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
