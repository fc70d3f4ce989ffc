/**
 * History Engine Types
 *
 * Data model shared by the resolver, bucketing, aggregation and cache layers.
 * All instants are epoch milliseconds (UTC).
 *
 * @module server/history/types
 */

// ============================================================================
// METRICS
// ============================================================================

export type MetricId = string;

/** How all samples in one bucket collapse into a single chart point */
export type Reduction = 'mean' | 'lastValue' | 'sum' | 'min' | 'max';

export interface MetricDefinition {
    id: MetricId;
    displayName: string;
    displayUnit: string;
    reduction: Reduction;
    /** Inclusive [low, high] domain; samples outside it are dropped */
    validRange: readonly [number, number];
}

// ============================================================================
// SAMPLES
// ============================================================================

export interface RawSample {
    readonly metric: MetricId;
    readonly timestamp: number;
    readonly value: number;
}

/** Anything a caller may pass as a point in time */
export type Instant = Date | number;

// ============================================================================
// BUCKETS & SERIES
// ============================================================================

/** Half-open interval [start, end) */
export interface TimeRange {
    start: number;
    end: number;
}

export interface TimeBucket extends TimeRange {
    index: number;
}

export interface AggregatedPoint {
    readonly bucketStart: number;
    /** null when no in-domain sample landed in the bucket */
    readonly value: number | null;
    readonly sampleCount: number;
}

export type SeriesResult = readonly AggregatedPoint[];

export type SeriesResultMap = Readonly<Record<MetricId, SeriesResult>>;

export interface QueryOptions {
    /** Maximum number of points per series; overrides the engine default */
    pointBudget?: number;
}
