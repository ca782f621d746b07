/**
 * AuthGate - DynamoDB Retry Policy
 *
 * Throttling and transient service faults are retried with exponential
 * backoff and full jitter. A failed condition expression is never
 * retried: code redemption, pending-request takes and enrollment writes
 * rely on it as the answer to "did I win".
 *
 * @see https://aws.amazon.com/blogs/architecture/exponential-backoff-and-jitter/
 *
 * @module storage/retry
 */

export interface RetryConfig {
    /** Attempts after the first */
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxRetries: 3,
    baseDelayMs: 50,
    maxDelayMs: 1000,
};

const TRANSIENT_ERROR_NAMES: ReadonlySet<string> = new Set([
    'ProvisionedThroughputExceededException',
    'ThrottlingException',
    'RequestLimitExceeded',
    'InternalServerError',
    'ServiceUnavailable',
    'TransactionConflictException',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function httpStatusOf(error: Record<string, unknown>): number | undefined {
    const metadata = error.$metadata;
    if (isRecord(metadata) && typeof metadata.httpStatusCode === 'number') {
        return metadata.httpStatusCode;
    }
    return undefined;
}

// =============================================================================
// Classification
// =============================================================================

export function isConditionalCheckFailed(error: unknown): boolean {
    return isRecord(error) && error.name === 'ConditionalCheckFailedException';
}

export function isRetryableError(error: unknown): boolean {
    if (!isRecord(error) || isConditionalCheckFailed(error)) {
        return false;
    }
    if (typeof error.name === 'string' && TRANSIENT_ERROR_NAMES.has(error.name)) {
        return true;
    }
    const status = httpStatusOf(error);
    if (status !== undefined && (status === 429 || status >= 500)) {
        return true;
    }
    return error.$retryable !== undefined && error.$retryable !== false;
}

// =============================================================================
// Backoff
// =============================================================================

/**
 * Full jitter: a uniform draw below min(maxDelay, baseDelay * 2^attempt).
 */
export function calculateDelay(
    attempt: number,
    config: RetryConfig = DEFAULT_RETRY_CONFIG,
    random: () => number = Math.random
): number {
    const ceiling = Math.min(config.maxDelayMs, config.baseDelayMs * 2 ** attempt);
    return Math.floor(random() * ceiling);
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run one DynamoDB call under the retry policy. The last error is
 * rethrown once the budget is spent or the error is not transient.
 *
 * @example
 * ```typescript
 * const result = await withRetry(() => docClient.send(new GetCommand({ ... })));
 * ```
 */
export async function withRetry<T>(
    operation: () => Promise<T>,
    config: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<T> {
    let attempt = 0;
    for (;;) {
        try {
            return await operation();
        } catch (error) {
            if (attempt >= config.maxRetries || !isRetryableError(error)) {
                throw error;
            }
            await sleep(calculateDelay(attempt, config));
            attempt++;
        }
    }
}
