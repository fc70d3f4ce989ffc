/**
 * Health Samples Database Functions
 *
 * Raw SQL operations for the health_samples table.
 * Used by SqliteSampleStore for ingestion and range scans.
 *
 * @module server/db/healthSamples
 */

import type { DatabaseInstance } from '../database/db';
import type { MetricId, RawSample } from '../history/types';

// ============================================================================
// TYPES
// ============================================================================

export interface HealthSampleRow {
    id: number;
    metric: string;
    timestamp: number;
    /** NULL when a NaN was written */
    value: number | null;
}

/** Position after the last row read; rows are ordered by (timestamp, id) */
export interface ScanCursor {
    timestamp: number;
    id: number;
}

export interface SampleStats {
    totalRows: number;
    metrics: Array<{
        metric: string;
        rowCount: number;
        oldestTimestamp: number | null;
        newestTimestamp: number | null;
    }>;
}

// ============================================================================
// INSERT OPERATIONS
// ============================================================================

/**
 * Insert a batch of samples in one transaction. Returns the number of rows written.
 */
export function insertSamples(db: DatabaseInstance, samples: readonly RawSample[]): number {
    const insert = db.prepare<[string, number, number]>(`
        INSERT INTO health_samples (metric, timestamp, value)
        VALUES (?, ?, ?)
    `);

    const insertAll = db.transaction((batch: readonly RawSample[]) => {
        let written = 0;
        for (const sample of batch) {
            written += insert.run(sample.metric, sample.timestamp, sample.value).changes;
        }
        return written;
    });

    return insertAll(samples);
}

// ============================================================================
// QUERY OPERATIONS
// ============================================================================

/**
 * Highest row id currently stored (0 when empty).
 * Scans capture this up front so rows appended mid-scan are not picked up.
 */
export function getMaxId(db: DatabaseInstance): number {
    const row = db.prepare<[], { maxId: number | null }>(
        'SELECT MAX(id) AS maxId FROM health_samples'
    ).get();
    return row?.maxId ?? 0;
}

/**
 * Read one page of a metric's samples in [startTs, endTs), ordered by
 * timestamp then id, strictly after `after` and with id <= maxId.
 */
export function queryPage(
    db: DatabaseInstance,
    metric: MetricId,
    startTs: number,
    endTs: number,
    after: ScanCursor,
    maxId: number,
    limit: number
): HealthSampleRow[] {
    return db.prepare<[string, number, number, number, number, number, number, number], HealthSampleRow>(`
        SELECT id, metric, timestamp, value FROM health_samples
        WHERE metric = ?
          AND timestamp >= ?
          AND timestamp < ?
          AND (timestamp > ? OR (timestamp = ? AND id > ?))
          AND id <= ?
        ORDER BY timestamp ASC, id ASC
        LIMIT ?
    `).all(metric, startTs, endTs, after.timestamp, after.timestamp, after.id, maxId, limit);
}

// ============================================================================
// STATS
// ============================================================================

/**
 * Row counts and time bounds per metric.
 */
export function getSampleStats(db: DatabaseInstance): SampleStats {
    const totalRow = db.prepare<[], { count: number }>(
        'SELECT COUNT(*) AS count FROM health_samples'
    ).get();

    const metricRows = db.prepare<[], SampleStats['metrics'][number]>(`
        SELECT
            metric,
            COUNT(*) AS rowCount,
            MIN(timestamp) AS oldestTimestamp,
            MAX(timestamp) AS newestTimestamp
        FROM health_samples
        GROUP BY metric
        ORDER BY metric ASC
    `).all();

    return {
        totalRows: totalRow?.count ?? 0,
        metrics: metricRows,
    };
}
