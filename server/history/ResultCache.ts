/**
 * Result Cache
 *
 * Memoizes aggregation results keyed by (sorted metric ids, range, resolution).
 * Bounded LRU: a read refreshes recency, and inserting into a full cache evicts
 * the least-recently-read entry.
 *
 * Coherence rules:
 * - An entry is served only while its `coveredThroughSampleVersion` equals the
 *   sample version the caller observed; a stale entry is removed on `get`.
 * - `invalidate` drops every entry whose [rangeStart, rangeEnd) intersects the
 *   ingested timestamps and carries the untouched entries forward to the new
 *   version.
 * - `put` for a version older than the newest invalidation seen is ignored, so a
 *   query that read data before an ingestion never re-populates the cache.
 *
 * get/put/invalidate/clear all run under one mutex. The critical section is
 * the map work only; aggregation happens outside it.
 *
 * @module server/history/ResultCache
 */

import { Mutex } from '../utils/mutex';
import type { MetricId, SeriesResultMap, TimeRange } from './types';
import type { IngestionEvent } from './sampleStore';

// ============================================================================
// TYPES
// ============================================================================

export interface CacheEntry {
    metrics: readonly MetricId[];
    range: TimeRange;
    resolution: number;
    series: SeriesResultMap;
    insertedAt: number;
    coveredThroughSampleVersion: number;
}

export interface CacheStats {
    size: number;
    capacity: number;
    hits: number;
    misses: number;
    /** Entries found but discarded because their sample version was behind */
    stale: number;
    evictions: number;
    /** Entries dropped by ingestion events or clear() */
    invalidations: number;
    /** Results refused by put() because newer samples had already landed */
    rejectedPuts: number;
}

export type CachePutInput = Omit<CacheEntry, 'insertedAt' | 'coveredThroughSampleVersion'>;

/**
 * Stable key for a query. `metrics` must already be in canonical order.
 */
export function buildCacheKey(metrics: readonly MetricId[], range: TimeRange, resolution: number): string {
    return `${metrics.join(',')}|${range.start}|${range.end}|${resolution}`;
}

// ============================================================================
// RESULT CACHE
// ============================================================================

export class ResultCache {
    /** Map iteration order doubles as recency order: first = least recent */
    private readonly entries = new Map<string, CacheEntry>();
    private readonly lock = new Mutex();

    /** Newest sample version announced through invalidate() */
    private latestVersion = 0;

    private hits = 0;
    private misses = 0;
    private stale = 0;
    private evictions = 0;
    private invalidations = 0;
    private rejectedPuts = 0;

    constructor(
        private readonly capacity: number,
        private readonly now: () => number = Date.now
    ) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
        }
    }

    /**
     * Look up an entry valid at `currentVersion`, marking it most recently used.
     */
    async get(key: string, currentVersion: number): Promise<SeriesResultMap | undefined> {
        return this.lock.runExclusive(() => {
            const entry = this.entries.get(key);
            if (!entry) {
                this.misses++;
                return undefined;
            }

            this.entries.delete(key);
            if (entry.coveredThroughSampleVersion !== currentVersion) {
                this.stale++;
                this.misses++;
                return undefined;
            }

            this.entries.set(key, entry);
            this.hits++;
            return entry.series;
        });
    }

    /**
     * Store a result computed from samples at `version`.
     * Returns false when the result was refused as already outdated.
     */
    async put(key: string, value: CachePutInput, version: number): Promise<boolean> {
        return this.lock.runExclusive(() => {
            if (version < this.latestVersion) {
                this.rejectedPuts++;
                return false;
            }

            this.entries.delete(key);
            while (this.entries.size >= this.capacity) {
                const oldest = this.entries.keys().next();
                if (oldest.done) break;
                this.entries.delete(oldest.value);
                this.evictions++;
            }

            this.entries.set(key, {
                ...value,
                insertedAt: this.now(),
                coveredThroughSampleVersion: version,
            });
            return true;
        });
    }

    /**
     * Apply an ingestion event. Returns the number of entries dropped.
     */
    async invalidate(event: IngestionEvent): Promise<number> {
        return this.lock.runExclusive(() => {
            if (event.version > this.latestVersion) {
                this.latestVersion = event.version;
            }

            let dropped = 0;
            for (const [key, entry] of this.entries) {
                if (entry.range.start <= event.to && event.from < entry.range.end) {
                    this.entries.delete(key);
                    dropped++;
                    continue;
                }
                if (entry.coveredThroughSampleVersion < event.version) {
                    entry.coveredThroughSampleVersion = event.version;
                }
            }

            this.invalidations += dropped;
            return dropped;
        });
    }

    /**
     * Drop every entry. Returns the number of entries removed.
     */
    async clear(): Promise<number> {
        return this.lock.runExclusive(() => {
            const removed = this.entries.size;
            this.entries.clear();
            this.invalidations += removed;
            return removed;
        });
    }

    /**
     * Keys from least to most recently used
     */
    keys(): string[] {
        return [...this.entries.keys()];
    }

    stats(): CacheStats {
        return {
            size: this.entries.size,
            capacity: this.capacity,
            hits: this.hits,
            misses: this.misses,
            stale: this.stale,
            evictions: this.evictions,
            invalidations: this.invalidations,
            rejectedPuts: this.rejectedPuts,
        };
    }
}
