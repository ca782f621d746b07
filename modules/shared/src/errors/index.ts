/**
 * AuthGate - Error Module
 *
 * Standardized error codes, statuses, messages and typed results.
 *
 * @module errors
 */

export {
    AuthorizationErrors,
    TokenErrors,
    ResourceErrors,
    MfaErrors,
} from './oauth-error-codes';

export type {
    AuthorizationErrorCode,
    TokenErrorCode,
    ResourceErrorCode,
    MfaErrorCode,
    OAuthErrorCode,
    ErrorCode,
} from './oauth-error-codes';

export { HttpStatus } from './http-status';

export type { HttpStatusCode } from './http-status';

export { ErrorMessages } from './error-messages';

export { ok, fail, OAuthErrors, describeError } from './oauth-error';

export type { Result, OAuthError } from './oauth-error';
