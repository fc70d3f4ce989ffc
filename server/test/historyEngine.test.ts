/**
 * History Engine Tests
 *
 * Query façade over an in-memory store: bucketing, caching, invalidation on
 * ingestion and store failure reporting.
 */

import { describe, it, expect, expectTypeOf, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../utils/logger', () => ({
    default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { createHistoryEngine, type HistoryEngine } from '../history/HistoryEngine';
import { InMemorySampleStore } from '../history/InMemorySampleStore';
import { DataSourceUnavailableError, InvalidRangeError, UnknownMetricError } from '../history/errors';
import type { SampleStore } from '../history/sampleStore';
import type { MetricId, RawSample } from '../history/types';

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;
const T0 = Date.UTC(2024, 0, 1);
const T1 = T0 + 24 * HOUR;

function seedHeartRate(store: InMemorySampleStore): void {
    store.append([
        { metric: 'heartRate', timestamp: T0 + 5 * MINUTE, value: 60 },
        { metric: 'heartRate', timestamp: T0 + 40 * MINUTE, value: 64 },
        { metric: 'heartRate', timestamp: T0 + 70 * MINUTE, value: 58 },
    ]);
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>(r => {
        resolve = r;
    });
    return { promise, resolve };
}

describe('HistoryEngine', () => {
    let store: InMemorySampleStore;
    let engine: HistoryEngine;

    beforeEach(() => {
        store = new InMemorySampleStore();
        seedHeartRate(store);
        engine = createHistoryEngine({ store, config: { pointBudget: 24 }, env: {} });
    });

    afterEach(() => {
        engine.close();
    });

    // ========================================================================
    // QUERIES
    // ========================================================================

    describe('aggregateHistoricalData', () => {
        it('should downsample a day into hourly buckets', async () => {
            const result = await engine.aggregateHistoricalData(['heartRate'], T0, T1);
            const points = result.heartRate;

            expect(points).toHaveLength(24);
            expect(points[0]).toEqual({ bucketStart: T0, value: 62, sampleCount: 2 });
            expect(points[1]).toEqual({ bucketStart: T0 + HOUR, value: 58, sampleCount: 1 });
            for (let i = 2; i < 24; i++) {
                expect(points[i]).toEqual({ bucketStart: T0 + i * HOUR, value: null, sampleCount: 0 });
            }
            expect(engine.resolutionFor(T0, T1)).toBe(HOUR);
        });

        it('should align every requested metric on the same buckets', async () => {
            store.append([{ metric: 'steps', timestamp: T0 + 3 * HOUR, value: 500 }]);

            const result = await engine.aggregateHistoricalData(['steps', 'heartRate'], T0, T1);

            expect(Object.keys(result).sort()).toEqual(['heartRate', 'steps']);
            expect(result.steps).toHaveLength(24);
            expect(result.steps[3]).toEqual({ bucketStart: T0 + 3 * HOUR, value: 500, sampleCount: 1 });
            expect(result.steps.map(p => p.bucketStart)).toEqual(result.heartRate.map(p => p.bucketStart));
        });

        it('should accept metric ids as a Set but not as a bare string', async () => {
            type MetricIdsParam = Parameters<HistoryEngine['aggregateHistoricalData']>[0];
            expectTypeOf<string>().not.toMatchTypeOf<MetricIdsParam>();

            const fromSet = await engine.aggregateHistoricalData(new Set(['heartRate']), T0, T1);
            const fromArray = await engine.aggregateHistoricalData(['heartRate'], T0, T1);
            expect(fromArray).toBe(fromSet);
        });

        it('should accept Date instants', async () => {
            const result = await engine.aggregateHistoricalData(['heartRate'], new Date(T0), new Date(T1));
            expect(result.heartRate[0].value).toBe(62);
        });

        it('should honour a per-call point budget', async () => {
            const result = await engine.aggregateHistoricalData(['heartRate'], T0, T1, { pointBudget: 4 });

            expect(result.heartRate).toHaveLength(4);
            expect(result.heartRate[0]).toEqual({ bucketStart: T0, value: (60 + 64 + 58) / 3, sampleCount: 3 });
            expect(engine.resolutionFor(T0, T1, { pointBudget: 4 })).toBe(6 * HOUR);
        });

        it('should return frozen results', async () => {
            const result = await engine.aggregateHistoricalData(['heartRate'], T0, T1);
            expect(Object.isFrozen(result)).toBe(true);
            expect(Object.isFrozen(result.heartRate)).toBe(true);
            expect(Object.isFrozen(result.heartRate[0])).toBe(true);
        });
    });

    // ========================================================================
    // VALIDATION
    // ========================================================================

    describe('validation', () => {
        it('should reject an unknown metric without touching the store', async () => {
            const scanSpy = vi.spyOn(store, 'scan');

            await expect(engine.aggregateHistoricalData(['bogusMetric'], T0, T1))
                .rejects.toThrow(UnknownMetricError);
            await expect(engine.aggregateHistoricalData(['heartRate', 'bogusMetric'], T0, T1))
                .rejects.toMatchObject({ code: 'UNKNOWN_METRIC', metricId: 'bogusMetric' });
            expect(scanSpy).not.toHaveBeenCalled();
        });

        it('should reject an empty range', async () => {
            await expect(engine.aggregateHistoricalData(['heartRate'], T0, T0))
                .rejects.toThrow(InvalidRangeError);
        });

        it('should reject an inverted range', async () => {
            await expect(engine.aggregateHistoricalData(['heartRate'], T1, T0))
                .rejects.toMatchObject({ code: 'INVALID_RANGE' });
        });

        it('should reject an invalid Date', async () => {
            await expect(engine.aggregateHistoricalData(['heartRate'], new Date('nope'), T1))
                .rejects.toThrow(InvalidRangeError);
        });
    });

    // ========================================================================
    // CACHING
    // ========================================================================

    describe('caching', () => {
        it('should serve an identical query from cache', async () => {
            const first = await engine.aggregateHistoricalData(['heartRate'], T0, T1);
            const second = await engine.aggregateHistoricalData(['heartRate'], T0, T1);

            expect(second).toBe(first);
            expect(engine.getCacheStats()).toMatchObject({ hits: 1, misses: 1, size: 1 });
        });

        it('should treat reordered and repeated metric ids as the same query', async () => {
            const first = await engine.aggregateHistoricalData(['steps', 'heartRate'], T0, T1);
            const second = await engine.aggregateHistoricalData(['heartRate', 'steps', 'heartRate'], new Date(T0), T1);

            expect(second).toBe(first);
            expect(engine.getCacheStats().hits).toBe(1);
        });

        it('should recompute after ingestion inside the cached range', async () => {
            await engine.aggregateHistoricalData(['heartRate'], T0, T1);
            store.append([{ metric: 'heartRate', timestamp: T0 + 2 * HOUR, value: 70 }]);

            const result = await engine.aggregateHistoricalData(['heartRate'], T0, T1);

            expect(result.heartRate[2]).toEqual({ bucketStart: T0 + 2 * HOUR, value: 70, sampleCount: 1 });
            expect(engine.getCacheStats()).toMatchObject({ hits: 0, misses: 2, invalidations: 1, size: 1 });
        });

        it('should keep serving a cached range that ingestion did not touch', async () => {
            const first = await engine.aggregateHistoricalData(['heartRate'], T0, T1);
            store.append([{ metric: 'heartRate', timestamp: T1 + 24 * HOUR, value: 70 }]);

            const second = await engine.aggregateHistoricalData(['heartRate'], T0, T1);

            expect(second).toBe(first);
            expect(engine.getCacheStats()).toMatchObject({ hits: 1, misses: 1, invalidations: 0 });
        });

        it('should not cache a result computed before a newer ingestion', async () => {
            const entered = deferred();
            const gate = deferred();

            class GatedStore extends InMemorySampleStore {
                async *scan(metric: MetricId, rangeStart: number, rangeEnd: number): AsyncGenerator<RawSample> {
                    entered.resolve();
                    await gate.promise;
                    yield* super.scan(metric, rangeStart, rangeEnd);
                }
            }

            const gated = new GatedStore();
            seedHeartRate(gated);
            const gatedEngine = createHistoryEngine({ store: gated, config: { pointBudget: 24 }, env: {} });

            const pending = gatedEngine.aggregateHistoricalData(['heartRate'], T0, T1);
            await entered.promise;
            gated.append([{ metric: 'steps', timestamp: T1 + HOUR, value: 100 }]);
            gate.resolve();

            const result = await pending;
            expect(result.heartRate[0].value).toBe(62);
            expect(gatedEngine.getCacheStats()).toMatchObject({ size: 0, rejectedPuts: 1 });
            gatedEngine.close();
        });

        it('should drop everything on invalidateAll', async () => {
            await engine.aggregateHistoricalData(['heartRate'], T0, T1);
            await engine.aggregateHistoricalData(['steps'], T0, T1);

            expect(await engine.invalidateAll()).toBe(2);
            expect(engine.getCacheStats().size).toBe(0);
        });
    });

    // ========================================================================
    // STORE FAILURES
    // ========================================================================

    describe('store failures', () => {
        function fakeStore(scan: SampleStore['scan']): SampleStore {
            return {
                scan,
                currentSampleVersion: () => 0,
                subscribeToIngestion: () => () => undefined,
            };
        }

        it('should report a throwing scan as DataSourceUnavailableError and cache nothing', async () => {
            const failing = createHistoryEngine({
                store: fakeStore(() => {
                    throw new Error('disk unplugged');
                }),
                env: {},
            });

            await expect(failing.aggregateHistoricalData(['heartRate'], T0, T1))
                .rejects.toThrow(DataSourceUnavailableError);
            await expect(failing.aggregateHistoricalData(['heartRate'], T0, T1))
                .rejects.toThrow('Sample store unavailable: disk unplugged');
            expect(failing.getCacheStats().size).toBe(0);
        });

        it('should report a scan that fails mid-iteration', async () => {
            let calls = 0;
            const flaky = createHistoryEngine({
                store: fakeStore(async function* () {
                    calls++;
                    yield { metric: 'heartRate', timestamp: T0, value: 60 };
                    if (calls === 1) throw new Error('read error');
                }),
                config: { pointBudget: 24 },
                env: {},
            });

            await expect(flaky.aggregateHistoricalData(['heartRate'], T0, T1))
                .rejects.toMatchObject({ code: 'DATA_SOURCE_UNAVAILABLE' });

            const retried = await flaky.aggregateHistoricalData(['heartRate'], T0, T1);
            expect(retried.heartRate[0]).toEqual({ bucketStart: T0, value: 60, sampleCount: 1 });
            expect(flaky.getCacheStats()).toMatchObject({ size: 1, misses: 2 });
        });

        it('should time out a scan that never finishes', async () => {
            const stuck = createHistoryEngine({
                store: fakeStore(async function* () {
                    await new Promise<never>(() => undefined);
                }),
                config: { scanTimeoutMs: 20 },
                env: {},
            });

            await expect(stuck.aggregateHistoricalData(['heartRate'], T0, T1))
                .rejects.toThrow('Sample store unavailable: Sample scan timed out after 20ms');
        });

        it('should report out-of-order samples', async () => {
            const unordered = createHistoryEngine({
                store: fakeStore(async function* (metric) {
                    yield { metric, timestamp: T0 + HOUR, value: 60 };
                    yield { metric, timestamp: T0, value: 61 };
                }),
                env: {},
            });

            await expect(unordered.aggregateHistoricalData(['heartRate'], T0, T1))
                .rejects.toThrow(DataSourceUnavailableError);
        });

        it('should report a failing version read', async () => {
            const broken = createHistoryEngine({
                store: {
                    scan: async function* () {
                        // never reached
                    },
                    currentSampleVersion: () => {
                        throw new Error('closed');
                    },
                    subscribeToIngestion: () => () => undefined,
                },
                env: {},
            });

            await expect(broken.aggregateHistoricalData(['heartRate'], T0, T1))
                .rejects.toThrow('Sample store unavailable: closed');
        });
    });

    // ========================================================================
    // LIFECYCLE
    // ========================================================================

    describe('lifecycle', () => {
        it('should list the catalog sorted by id', () => {
            const ids = engine.describeMetrics().map(definition => definition.id);
            expect(ids).toHaveLength(14);
            expect(ids).toEqual([...ids].sort());
            expect(ids).toContain('heartRate');
        });

        it('should unsubscribe from ingestion on close', () => {
            const unsubscribe = vi.fn();
            const subscribeToIngestion = vi.fn(() => unsubscribe);
            const closing = createHistoryEngine({
                store: {
                    scan: async function* () {
                        // empty
                    },
                    currentSampleVersion: () => 0,
                    subscribeToIngestion,
                },
                env: {},
            });

            expect(subscribeToIngestion).toHaveBeenCalledTimes(1);
            closing.close();
            closing.close();
            expect(unsubscribe).toHaveBeenCalledTimes(1);
        });

        it('should use configuration overrides', () => {
            expect(engine.getConfig()).toEqual({
                pointBudget: 24,
                minimumBucketWidthMs: 60_000,
                cacheCapacity: 50,
                scanTimeoutMs: 10_000,
            });
        });
    });
});
