/**
 * Account Service - DynamoDB Retry Policy
 *
 * Directory calls sit on the sign-in path, inside a Lambda invocation with a
 * deadline, so the budget is small: three retries, capped at one second each.
 * Delays use full jitter over an exponential ceiling (50, 100, 200 ms).
 *
 * Only throttling and server-side faults are retried. A failed condition or a
 * cancelled transaction is an answer, not a fault, and surfaces at once.
 *
 * @see https://aws.amazon.com/blogs/architecture/exponential-backoff-and-jitter/
 */

// =============================================================================
// Policy
// =============================================================================

export interface RetryConfig {
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
    /** Called before each wait; the directory logs these */
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxRetries: 3,
    baseDelayMs: 50,
    maxDelayMs: 1000,
};

/** Error names the SDK uses for throttling and transient service faults */
const TRANSIENT_ERROR_NAMES: ReadonlySet<string> = new Set([
    'ProvisionedThroughputExceededException',
    'ThrottlingException',
    'RequestLimitExceeded',
    'InternalServerError',
    'ServiceUnavailable',
    'TransactionConflictException',
]);

const TRANSIENT_STATUS_CODES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

// =============================================================================
// Classification
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function statusCodeOf(error: Record<string, unknown>): number | undefined {
    const metadata = error.$metadata;
    if (isRecord(metadata) && typeof metadata.httpStatusCode === 'number') {
        return metadata.httpStatusCode;
    }
    return undefined;
}

/**
 * Whether an AWS SDK v3 error is transient. SDK errors carry `name`,
 * `$metadata.httpStatusCode` and sometimes `$retryable`.
 */
export function isRetryableError(error: unknown): boolean {
    if (!isRecord(error)) {
        return false;
    }
    if (typeof error.name === 'string' && TRANSIENT_ERROR_NAMES.has(error.name)) {
        return true;
    }

    const status = statusCodeOf(error);
    if (status !== undefined && TRANSIENT_STATUS_CODES.has(status)) {
        return true;
    }

    return isRecord(error.$retryable) || error.$retryable === true;
}

/**
 * Wait before retry `attempt` (0-indexed), uniform in
 * [0, min(base * 2^attempt, max)).
 */
export function calculateDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
    const ceiling = Math.min(config.baseDelayMs * 2 ** attempt, config.maxDelayMs);
    return Math.floor(Math.random() * ceiling);
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

// =============================================================================
// Wrapper
// =============================================================================

/**
 * Run `operation`, retrying transient failures within the policy.
 *
 * @throws The first non-transient error, or the last error once retries run out
 *
 * @example
 * ```typescript
 * const page = await withRetry(() => client.send(new ScanCommand({ TableName })));
 * ```
 */
export async function withRetry<T>(
    operation: () => Promise<T>,
    config: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<T> {
    for (let attempt = 0; ; attempt++) {
        try {
            return await operation();
        } catch (error) {
            if (attempt >= config.maxRetries || !isRetryableError(error)) {
                throw error;
            }
            const delayMs = calculateDelay(attempt, config);
            config.onRetry?.(error, attempt + 1, delayMs);
            await sleep(delayMs);
        }
    }
}
