/**
 * AuthGate - Storage Module
 *
 * Storage ports and their DynamoDB adapters for the single-table design.
 *
 * @module storage
 */

export { createDocumentClient } from './dynamo-client';

export {
    withRetry,
    isRetryableError,
    isConditionalCheckFailed,
    calculateDelay,
    sleep,
    DEFAULT_RETRY_CONFIG,
} from './retry';

export type { RetryConfig } from './retry';

export {
    DynamoAuthorizationCodeStore,
    mintAuthorizationCode,
} from './auth-code-store';

export type { AuthorizationCodeStore, CodeRequest } from './auth-code-store';

export {
    DynamoClientRegistry,
    StaticClientRegistry,
    parseStaticClient,
} from './client-registry';

export type { ClientRegistry, ManagedClientRegistry } from './client-registry';

export { DynamoUserDirectory, toUserRecord } from './user-directory';

export type { UserDirectory } from './user-directory';

export { DynamoAuthorizationRequestStore } from './authorization-request-store';

export type { AuthorizationRequestStore, PendingAuthorizationInput } from './authorization-request-store';
