/**
 * History Engine Error Types
 *
 * Every failure that leaves the query façade is one of these, so callers can
 * tell "no data in range" (an empty series) apart from "query failed".
 *
 * @module server/history/errors
 */

// ============================================================================
// ERROR CODES
// ============================================================================

export type HistoryErrorCode =
    | 'UNKNOWN_METRIC'          // Requested metric id is not in the catalog
    | 'INVALID_RANGE'           // rangeStart >= rangeEnd or a non-finite instant
    | 'DATA_SOURCE_UNAVAILABLE' // Sample store scan failed or timed out
    | 'INVALID_CONFIG';         // Engine or catalog configuration rejected

// ============================================================================
// ERROR CLASSES
// ============================================================================

/**
 * Base class for typed engine errors.
 *
 * Consumers switch on `error.code`:
 * - UNKNOWN_METRIC / INVALID_RANGE → caller mistake, fix the request
 * - DATA_SOURCE_UNAVAILABLE → safe to retry, nothing was cached
 */
export class HistoryError extends Error {
    constructor(
        public readonly code: HistoryErrorCode,
        message: string,
        public readonly context?: Record<string, unknown>,
        cause?: unknown
    ) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'HistoryError';
    }
}

export class UnknownMetricError extends HistoryError {
    constructor(public readonly metricId: string) {
        super('UNKNOWN_METRIC', `Unknown metric: ${metricId}`, { metricId });
        this.name = 'UnknownMetricError';
    }
}

export class InvalidRangeError extends HistoryError {
    constructor(message: string, context?: Record<string, unknown>) {
        super('INVALID_RANGE', message, context);
        this.name = 'InvalidRangeError';
    }
}

export class DataSourceUnavailableError extends HistoryError {
    constructor(cause: unknown, context?: Record<string, unknown>) {
        super(
            'DATA_SOURCE_UNAVAILABLE',
            `Sample store unavailable: ${extractHistoryErrorMessage(cause)}`,
            context,
            cause
        );
        this.name = 'DataSourceUnavailableError';
    }
}

export class HistoryConfigError extends HistoryError {
    constructor(message: string, context?: Record<string, unknown>) {
        super('INVALID_CONFIG', message, context);
        this.name = 'HistoryConfigError';
    }
}

/**
 * Raised when a sample store yields timestamps out of ascending order.
 * Never leaves the engine: the façade reports it as DataSourceUnavailableError.
 */
export class SampleOrderError extends Error {
    constructor(
        public readonly metricId: string,
        public readonly previousTimestamp: number,
        public readonly timestamp: number
    ) {
        super(`Samples for ${metricId} out of order: ${timestamp} after ${previousTimestamp}`);
        this.name = 'SampleOrderError';
    }
}

/**
 * Raised when a scan does not finish within the configured deadline.
 */
export class ScanTimeoutError extends Error {
    constructor(public readonly timeoutMs: number) {
        super(`Sample scan timed out after ${timeoutMs}ms`);
        this.name = 'ScanTimeoutError';
    }
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Extract a human-readable error message from any error type.
 */
export function extractHistoryErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
