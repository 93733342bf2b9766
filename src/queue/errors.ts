/** A batch failure worth retrying: the same job may succeed later. */
export class TransientBatchError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TransientBatchError';
    }
}

export class BatchTimeoutError extends TransientBatchError {
    constructor(
        readonly executionId: string,
        readonly sequence: number,
        readonly timeoutMs: number,
    ) {
        super(
            `batch ${sequence} of execution ${executionId} exceeded ` +
            `${timeoutMs}ms`,
        );
        this.name = 'BatchTimeoutError';
    }
}

export function isTransientBatchError(error: unknown): boolean {
    return error instanceof TransientBatchError;
}

// serialization_failure, deadlock_detected, lock_not_available and
// query_canceled (statement_timeout lands here).
const RETRYABLE_SQLSTATES = new Set([
    '40001',
    '40P01',
    '55P03',
    '57014',
]);

const RETRYABLE_SOCKET_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'EPIPE',
    'ETIMEDOUT',
]);

export function readErrorCode(error: unknown): string | null {
    if (
        typeof error === 'object' &&
        error !== null &&
        'code' in error &&
        typeof error.code === 'string'
    ) {
        return error.code;
    }

    return null;
}

/**
 * Lock contention, timeouts and dropped connections from the database or
 * its driver. SQLSTATE class 08 covers connection exceptions.
 */
export function isRetryableInfrastructureError(error: unknown): boolean {
    const code = readErrorCode(error);

    if (code === null) {
        return false;
    }

    return RETRYABLE_SQLSTATES.has(code) ||
        RETRYABLE_SOCKET_CODES.has(code) ||
        /^08[0-9A-Z]{3}$/.test(code);
}

export function isRetryableBatchError(error: unknown): boolean {
    return isTransientBatchError(error) || isRetryableInfrastructureError(error);
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
