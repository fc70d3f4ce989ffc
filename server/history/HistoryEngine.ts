/**
 * History Engine
 *
 * Query façade for historical health-metric charts. A request flows through
 * metric resolution → bucket planning → (cache hit: return) → store scan →
 * aggregation → cache store → return.
 *
 * Engines are constructed explicitly and handed to their callers; there is no
 * shared instance. Configuration is fixed at construction.
 *
 * Many queries may run at once. Bucketing and aggregation touch no shared
 * state; only the result cache is shared, and it serializes its own access.
 * A query returns results consistent with the sample version it observed when
 * it started, even if an ingestion lands while it is running.
 *
 * @module server/history/HistoryEngine
 */

import logger from '../utils/logger';
import { loadHistoryConfig, type HistoryConfig } from '../config/historyConfig';
import { aggregate, type SampleSource } from './aggregator';
import { plan, resolveBucketWidth, toTimeRange } from './bucketing';
import { DataSourceUnavailableError, ScanTimeoutError, extractHistoryErrorMessage } from './errors';
import { createMetricCatalog, DEFAULT_METRIC_CATALOG } from './metricCatalog';
import { MetricResolver } from './MetricResolver';
import { ResultCache, buildCacheKey, type CacheStats } from './ResultCache';
import type { IngestionEvent, SampleStore } from './sampleStore';
import type {
    Instant,
    MetricDefinition,
    MetricId,
    QueryOptions,
    SeriesResultMap,
    TimeBucket,
    TimeRange,
} from './types';

// ============================================================================
// TYPES
// ============================================================================

export interface HistoryEngineOptions {
    store: SampleStore;
    /** Metric definitions; defaults to the built-in catalog */
    catalog?: readonly MetricDefinition[];
    /** Explicit overrides, applied on top of environment and defaults */
    config?: Partial<HistoryConfig>;
    env?: NodeJS.ProcessEnv;
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Race `work` against a deadline. Work that loses the race keeps running
 * (there is no cancellation); its late failure is only logged.
 */
async function withDeadline<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new ScanTimeoutError(timeoutMs)), timeoutMs);
    });

    work.catch(error => {
        logger.debug(`[HistoryEngine] Scan settled with error: ${extractHistoryErrorMessage(error)}`);
    });

    try {
        return await Promise.race([work, deadline]);
    } finally {
        clearTimeout(timer);
    }
}

function freezeSeries(series: SeriesResultMap): SeriesResultMap {
    for (const points of Object.values(series)) {
        for (const point of points) Object.freeze(point);
        Object.freeze(points);
    }
    return Object.freeze(series);
}

// ============================================================================
// HISTORY ENGINE
// ============================================================================

export class HistoryEngine {
    private readonly resolver: MetricResolver;
    private readonly cache: ResultCache;
    private unsubscribe: (() => void) | null;

    constructor(
        private readonly store: SampleStore,
        private readonly catalog: ReadonlyMap<MetricId, MetricDefinition>,
        private readonly config: HistoryConfig
    ) {
        this.resolver = new MetricResolver(catalog);
        this.cache = new ResultCache(config.cacheCapacity);
        this.unsubscribe = store.subscribeToIngestion(event => this.onIngestion(event));
    }

    // ========================================================================
    // QUERY
    // ========================================================================

    /**
     * One series per requested metric over [rangeStart, rangeEnd), with one
     * point per bucket in ascending time order.
     *
     * @throws UnknownMetricError before the store is touched
     * @throws InvalidRangeError when rangeStart >= rangeEnd
     * @throws DataSourceUnavailableError when the store fails; nothing is cached
     */
    async aggregateHistoricalData(
        metricIds: readonly string[] | ReadonlySet<string>,
        rangeStart: Instant,
        rangeEnd: Instant,
        options: QueryOptions = {}
    ): Promise<SeriesResultMap> {
        const metrics = this.resolver.resolve(metricIds);
        const range = toTimeRange(rangeStart, rangeEnd);
        const pointBudget = options.pointBudget ?? this.config.pointBudget;
        const resolution = resolveBucketWidth(range, pointBudget, this.config.minimumBucketWidthMs);
        const key = buildCacheKey(metrics, range, resolution);

        let version: number;
        try {
            version = this.store.currentSampleVersion();
        } catch (error) {
            logger.warn(`[HistoryEngine] Sample version unavailable: ${extractHistoryErrorMessage(error)}`);
            throw new DataSourceUnavailableError(error, { metrics });
        }

        const cached = await this.cache.get(key, version);
        if (cached) {
            logger.debug(`[HistoryEngine] Cache hit: ${key}`);
            return cached;
        }

        const buckets = plan(range, pointBudget, this.config.minimumBucketWidthMs);

        let series: SeriesResultMap;
        try {
            series = await withDeadline(this.computeSeries(metrics, buckets, range), this.config.scanTimeoutMs);
        } catch (error) {
            logger.warn(`[HistoryEngine] Query failed for ${key}: ${extractHistoryErrorMessage(error)}`);
            throw new DataSourceUnavailableError(error, { metrics, start: range.start, end: range.end });
        }

        const frozen = freezeSeries(series);
        const stored = await this.cache.put(key, { metrics, range, resolution, series: frozen }, version);
        logger.debug(
            `[HistoryEngine] Computed ${key}: ${buckets.length} buckets x ${metrics.length} metrics` +
            (stored ? '' : ' (not cached, newer samples landed)')
        );
        return frozen;
    }

    /**
     * Bucket width (ms) a query over this range would use.
     */
    resolutionFor(rangeStart: Instant, rangeEnd: Instant, options: QueryOptions = {}): number {
        return resolveBucketWidth(
            toTimeRange(rangeStart, rangeEnd),
            options.pointBudget ?? this.config.pointBudget,
            this.config.minimumBucketWidthMs
        );
    }

    describeMetrics(): MetricDefinition[] {
        return this.resolver.list();
    }

    getCacheStats(): CacheStats {
        return this.cache.stats();
    }

    getConfig(): Readonly<HistoryConfig> {
        return this.config;
    }

    /**
     * Drop every cached result. Returns the number of entries removed.
     */
    async invalidateAll(): Promise<number> {
        const removed = await this.cache.clear();
        logger.info(`[HistoryEngine] Cache cleared (${removed} entries)`);
        return removed;
    }

    /**
     * Stop listening for ingestion. Safe to call more than once.
     */
    close(): void {
        if (this.unsubscribe) {
            this.unsubscribe();
            this.unsubscribe = null;
        }
    }

    // ========================================================================
    // INTERNALS
    // ========================================================================

    private async computeSeries(
        metrics: readonly MetricId[],
        buckets: readonly TimeBucket[],
        range: TimeRange
    ): Promise<SeriesResultMap> {
        const samplesByMetric = new Map<MetricId, SampleSource>();
        for (const metric of metrics) {
            samplesByMetric.set(metric, this.store.scan(metric, range.start, range.end));
        }
        return aggregate(buckets, samplesByMetric, this.catalog);
    }

    private onIngestion(event: IngestionEvent): void {
        this.cache.invalidate(event)
            .then(dropped => {
                if (dropped > 0) {
                    logger.debug(
                        `[HistoryEngine] Ingestion for ${event.metric} [${event.from}, ${event.to}] ` +
                        `invalidated ${dropped} cached results (version=${event.version})`
                    );
                }
            })
            .catch(error => {
                logger.error(`[HistoryEngine] Cache invalidation failed: ${extractHistoryErrorMessage(error)}`);
            });
    }
}

/**
 * Build an engine from a store, an optional catalog and optional config overrides.
 */
export function createHistoryEngine(options: HistoryEngineOptions): HistoryEngine {
    const config = loadHistoryConfig(options.config, options.env);
    const catalog = createMetricCatalog(options.catalog ?? DEFAULT_METRIC_CATALOG);
    logger.info(
        `[HistoryEngine] Initialized: ${catalog.size} metrics, pointBudget=${config.pointBudget}, ` +
        `minBucket=${config.minimumBucketWidthMs}ms, cacheCapacity=${config.cacheCapacity}`
    );
    return new HistoryEngine(options.store, catalog, config);
}
