/**
 * Bucketing Engine
 *
 * Partitions a requested [start, end) range into contiguous, fixed-width
 * buckets. The width (the query's resolution) is derived from the range
 * length and a point budget:
 *
 *   width = max(minimumBucketWidth, ceil((end - start) / pointBudget))
 *
 * Buckets are generated by walking forward from `start`; the final bucket is
 * clipped to `end`, so there are exactly ceil((end - start) / width) buckets
 * and together they cover the range with no gaps or overlaps. The same inputs
 * always produce the same boundaries, which the result cache relies on.
 *
 * @module server/history/bucketing
 */

import { HistoryConfigError, InvalidRangeError } from './errors';
import type { Instant, TimeBucket, TimeRange } from './types';

/**
 * Convert a Date or epoch-ms value to epoch milliseconds.
 */
export function toEpochMs(instant: Instant): number {
    return instant instanceof Date ? instant.getTime() : instant;
}

/**
 * Build a validated range from two instants.
 * Throws InvalidRangeError for invalid instants or when start >= end.
 */
export function toTimeRange(rangeStart: Instant, rangeEnd: Instant): TimeRange {
    const range = { start: toEpochMs(rangeStart), end: toEpochMs(rangeEnd) };
    assertValidRange(range);
    return range;
}

/** Largest magnitude a Date can hold, in ms from the epoch */
const MAX_INSTANT_MS = 8.64e15;

function isValidInstant(ms: number): boolean {
    return Number.isSafeInteger(ms) && Math.abs(ms) <= MAX_INSTANT_MS;
}

/**
 * Bounds must be whole milliseconds inside the Date range, so bucket
 * arithmetic stays exact.
 */
export function assertValidRange(range: TimeRange): void {
    if (!isValidInstant(range.start) || !isValidInstant(range.end)) {
        throw new InvalidRangeError('Range bounds must be valid instants', { ...range });
    }
    if (range.start >= range.end) {
        throw new InvalidRangeError(
            `Range start must be before range end (start=${range.start}, end=${range.end})`,
            { ...range }
        );
    }
}

/**
 * Bucket width in milliseconds for a range and point budget.
 */
export function resolveBucketWidth(
    range: TimeRange,
    pointBudget: number,
    minimumBucketWidthMs: number
): number {
    assertValidRange(range);
    if (!Number.isInteger(pointBudget) || pointBudget < 1) {
        throw new HistoryConfigError(`Point budget must be a positive integer, got ${pointBudget}`, { pointBudget });
    }
    return Math.max(minimumBucketWidthMs, Math.ceil((range.end - range.start) / pointBudget));
}

/**
 * Plan the ordered bucket sequence for a range.
 */
export function plan(
    range: TimeRange,
    pointBudget: number,
    minimumBucketWidthMs: number
): TimeBucket[] {
    const width = resolveBucketWidth(range, pointBudget, minimumBucketWidthMs);
    const count = Math.ceil((range.end - range.start) / width);

    const buckets: TimeBucket[] = [];
    for (let index = 0; index < count; index++) {
        const start = range.start + index * width;
        buckets.push({ index, start, end: Math.min(start + width, range.end) });
    }
    return buckets;
}
