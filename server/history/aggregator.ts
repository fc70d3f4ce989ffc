/**
 * Aggregator
 *
 * Reduces raw samples into one point per bucket. Samples are consumed once,
 * in ascending timestamp order, with a bucket cursor moving in lock-step.
 *
 * @module server/history/aggregator
 */

import { SampleOrderError } from './errors';
import type {
    AggregatedPoint,
    MetricDefinition,
    MetricId,
    RawSample,
    Reduction,
    SeriesResult,
    SeriesResultMap,
    TimeBucket,
} from './types';

export type SampleSource = AsyncIterable<RawSample> | Iterable<RawSample>;

interface BucketAccumulator {
    count: number;
    sum: number;
    min: number;
    max: number;
    last: number;
    lastTimestamp: number;
}

function emptyAccumulator(): BucketAccumulator {
    return {
        count: 0,
        sum: 0,
        min: Infinity,
        max: -Infinity,
        last: 0,
        lastTimestamp: -Infinity,
    };
}

function accumulate(acc: BucketAccumulator, sample: RawSample): void {
    acc.count++;
    acc.sum += sample.value;
    if (sample.value < acc.min) acc.min = sample.value;
    if (sample.value > acc.max) acc.max = sample.value;
    // >= so that of two samples sharing a timestamp the later-yielded one wins
    if (sample.timestamp >= acc.lastTimestamp) {
        acc.last = sample.value;
        acc.lastTimestamp = sample.timestamp;
    }
}

function reduce(acc: BucketAccumulator, reduction: Reduction): number {
    switch (reduction) {
        case 'mean':
            return acc.sum / acc.count;
        case 'sum':
            return acc.sum;
        case 'min':
            return acc.min;
        case 'max':
            return acc.max;
        case 'lastValue':
            return acc.last;
    }
}

function isInDomain(value: number, definition: MetricDefinition): boolean {
    const [low, high] = definition.validRange;
    return Number.isFinite(value) && value >= low && value <= high;
}

/**
 * Aggregate one metric's samples into a series aligned with `buckets`.
 *
 * Out-of-domain values are dropped without error and do not count toward
 * `sampleCount`. Empty buckets are kept with `value: null`. Samples outside
 * the planned range are skipped. Throws SampleOrderError if timestamps go
 * backwards.
 */
export async function aggregateSeries(
    buckets: readonly TimeBucket[],
    samples: SampleSource,
    definition: MetricDefinition
): Promise<AggregatedPoint[]> {
    const points: AggregatedPoint[] = buckets.map(bucket => ({
        bucketStart: bucket.start,
        value: null,
        sampleCount: 0,
    }));
    if (buckets.length === 0) return points;

    const rangeStart = buckets[0].start;
    const rangeEnd = buckets[buckets.length - 1].end;

    let cursor = 0;
    let acc = emptyAccumulator();
    let previousTimestamp = -Infinity;

    const closeBucket = (): void => {
        if (acc.count > 0) {
            points[cursor] = {
                bucketStart: buckets[cursor].start,
                value: reduce(acc, definition.reduction),
                sampleCount: acc.count,
            };
            acc = emptyAccumulator();
        }
    };

    for await (const sample of samples) {
        if (sample.timestamp < previousTimestamp) {
            throw new SampleOrderError(definition.id, previousTimestamp, sample.timestamp);
        }
        previousTimestamp = sample.timestamp;

        if (sample.timestamp < rangeStart) continue;
        if (sample.timestamp >= rangeEnd) break;

        while (sample.timestamp >= buckets[cursor].end) {
            closeBucket();
            cursor++;
        }

        if (!isInDomain(sample.value, definition)) continue;
        accumulate(acc, sample);
    }
    closeBucket();

    return points;
}

/**
 * Aggregate several metrics over the same buckets. Every series in the
 * result has exactly one point per bucket, so they overlay on one time axis.
 */
export async function aggregate(
    buckets: readonly TimeBucket[],
    samplesByMetric: ReadonlyMap<MetricId, SampleSource>,
    definitions: ReadonlyMap<MetricId, MetricDefinition>
): Promise<SeriesResultMap> {
    const entries = await Promise.all(
        [...samplesByMetric].map(async ([metricId, samples]): Promise<[MetricId, SeriesResult]> => {
            const definition = definitions.get(metricId);
            if (!definition) {
                throw new Error(`No definition for metric ${metricId}`);
            }
            return [metricId, await aggregateSeries(buckets, samples, definition)];
        })
    );
    return Object.fromEntries(entries);
}
