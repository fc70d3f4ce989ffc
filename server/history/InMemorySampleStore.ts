/**
 * In-Memory Sample Store
 *
 * Append-only SampleStore kept as one timestamp-sorted array per metric.
 * Suitable for embedding the engine without a database and for tests.
 *
 * @module server/history/InMemorySampleStore
 */

import { EventEmitter } from 'events';
import logger from '../utils/logger';
import { guardIngestionListener, summarizeBatch, type IngestionListener, type SampleStore } from './sampleStore';
import type { MetricId, RawSample } from './types';

const INGEST_EVENT = 'ingest';

/** First index whose timestamp is >= `timestamp` (or > when `strict`) */
function bisect(samples: readonly RawSample[], timestamp: number, strict: boolean): number {
    let lo = 0;
    let hi = samples.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        const t = samples[mid].timestamp;
        if (t < timestamp || (strict && t === timestamp)) {
            lo = mid + 1;
        } else {
            hi = mid;
        }
    }
    return lo;
}

export class InMemorySampleStore implements SampleStore {
    private readonly samples = new Map<MetricId, RawSample[]>();
    private readonly emitter = new EventEmitter();
    private version = 0;

    /**
     * Append a batch. Bumps the sample version once, then notifies ingestion
     * subscribers once per metric in the batch. Returns the new version.
     */
    append(batch: readonly RawSample[]): number {
        if (batch.length === 0) return this.version;

        for (const sample of batch) {
            if (!Number.isFinite(sample.timestamp)) {
                throw new RangeError(`Sample timestamp must be finite (metric=${sample.metric})`);
            }
        }

        for (const sample of batch) {
            let list = this.samples.get(sample.metric);
            if (!list) {
                list = [];
                this.samples.set(sample.metric, list);
            }
            // Equal timestamps keep arrival order
            list.splice(bisect(list, sample.timestamp, true), 0, Object.freeze({ ...sample }));
        }

        this.version++;
        for (const [metric, span] of summarizeBatch(batch)) {
            this.emitter.emit(INGEST_EVENT, { metric, from: span.from, to: span.to, version: this.version });
        }
        logger.debug(`[InMemorySampleStore] Appended ${batch.length} samples (version=${this.version})`);
        return this.version;
    }

    /**
     * Snapshot of the matching samples is taken when iteration starts, so
     * concurrent appends do not shift a scan in progress.
     */
    async *scan(metric: MetricId, rangeStart: number, rangeEnd: number): AsyncGenerator<RawSample> {
        const list = this.samples.get(metric) ?? [];
        const snapshot = list.slice(bisect(list, rangeStart, false), bisect(list, rangeEnd, false));
        for (const sample of snapshot) {
            yield sample;
        }
    }

    currentSampleVersion(): number {
        return this.version;
    }

    subscribeToIngestion(listener: IngestionListener): () => void {
        const guarded = guardIngestionListener(listener, 'InMemorySampleStore');
        this.emitter.on(INGEST_EVENT, guarded);
        return () => {
            this.emitter.off(INGEST_EVENT, guarded);
        };
    }

    /** Number of stored samples, optionally for one metric */
    count(metric?: MetricId): number {
        if (metric !== undefined) {
            return this.samples.get(metric)?.length ?? 0;
        }
        let total = 0;
        for (const list of this.samples.values()) total += list.length;
        return total;
    }
}
