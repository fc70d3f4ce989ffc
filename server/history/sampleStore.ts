/**
 * Sample Store Contract
 *
 * What the history engine needs from a raw-sample repository. Stores are
 * append-only; the engine never mutates or deletes samples.
 *
 * @module server/history/sampleStore
 */

import logger from '../utils/logger';
import { extractHistoryErrorMessage } from './errors';
import type { MetricId, RawSample } from './types';

/**
 * Announced once per metric per batch write. `from` and `to` are the smallest
 * and largest timestamps written for `metric` in that batch (inclusive).
 */
export interface IngestionEvent {
    metric: MetricId;
    from: number;
    to: number;
    /** Sample version after the batch was written */
    version: number;
}

export type IngestionListener = (event: IngestionEvent) => void;

export interface SampleStore {
    /**
     * Samples of `metric` with rangeStart <= timestamp < rangeEnd, in
     * non-decreasing timestamp order. May reject while iterating on I/O failure.
     */
    scan(metric: MetricId, rangeStart: number, rangeEnd: number): AsyncIterable<RawSample>;

    /** Monotonic counter bumped on every batch write */
    currentSampleVersion(): number;

    /** Returns an unsubscribe function */
    subscribeToIngestion(listener: IngestionListener): () => void;
}

/**
 * Smallest and largest timestamp per metric in a batch.
 * Shared by the store implementations to build their ingestion events.
 */
export function summarizeBatch(batch: readonly RawSample[]): Map<MetricId, { from: number; to: number }> {
    const spans = new Map<MetricId, { from: number; to: number }>();
    for (const sample of batch) {
        const span = spans.get(sample.metric);
        if (!span) {
            spans.set(sample.metric, { from: sample.timestamp, to: sample.timestamp });
            continue;
        }
        if (sample.timestamp < span.from) span.from = sample.timestamp;
        if (sample.timestamp > span.to) span.to = sample.timestamp;
    }
    return spans;
}

/**
 * Wrap a subscriber so a throw is logged instead of propagating into the
 * store's emit loop. Every subscriber still sees every event of a batch.
 */
export function guardIngestionListener(listener: IngestionListener, source: string): IngestionListener {
    return event => {
        try {
            listener(event);
        } catch (error) {
            logger.error(
                `[${source}] Ingestion listener failed for ${event.metric} ` +
                `(version=${event.version}): ${extractHistoryErrorMessage(error)}`
            );
        }
    };
}
