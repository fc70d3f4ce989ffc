/**
 * Vitals History
 *
 * Historical health-metric aggregation for time-series charts.
 *
 * @example
 * const db = openDatabase();
 * const store = new SqliteSampleStore(db);
 * const engine = createHistoryEngine({ store, config: { pointBudget: 120 } });
 *
 * const series = await engine.aggregateHistoricalData(
 *     ['heartRate', 'steps'],
 *     new Date('2024-01-01T00:00:00Z'),
 *     new Date('2024-01-02T00:00:00Z')
 * );
 *
 * @module server
 */

export { HistoryEngine, createHistoryEngine, type HistoryEngineOptions } from './history/HistoryEngine';
export { InMemorySampleStore } from './history/InMemorySampleStore';
export { SqliteSampleStore } from './services/SqliteSampleStore';
export { openDatabase, resolveDatabasePath, type DatabaseInstance } from './database/db';
export { createHistoryRouter } from './routes/history';
export { DEFAULT_METRIC_CATALOG, createMetricCatalog } from './history/metricCatalog';
export { MetricResolver } from './history/MetricResolver';
export { plan, resolveBucketWidth, toTimeRange } from './history/bucketing';
export { aggregate, aggregateSeries } from './history/aggregator';
export { ResultCache, buildCacheKey, type CacheStats } from './history/ResultCache';
export { DEFAULT_HISTORY_CONFIG, loadHistoryConfig, type HistoryConfig } from './config/historyConfig';
export {
    HistoryError,
    UnknownMetricError,
    InvalidRangeError,
    DataSourceUnavailableError,
    HistoryConfigError,
    type HistoryErrorCode,
} from './history/errors';
export type { SampleStore, IngestionEvent, IngestionListener } from './history/sampleStore';
export type {
    MetricId,
    Reduction,
    MetricDefinition,
    RawSample,
    Instant,
    TimeRange,
    TimeBucket,
    AggregatedPoint,
    SeriesResult,
    SeriesResultMap,
    QueryOptions,
} from './history/types';
