/**
 * SQLite Sample Store
 *
 * SampleStore backed by the health_samples table. Scans read in keyset pages
 * so a long range never materializes all rows at once, and each scan is pinned
 * to the rows that existed when it started.
 *
 * @module server/services/SqliteSampleStore
 */

import { EventEmitter } from 'events';
import * as healthSamplesDb from '../db/healthSamples';
import type { DatabaseInstance } from '../database/db';
import { guardIngestionListener, summarizeBatch, type IngestionListener, type SampleStore } from '../history/sampleStore';
import type { MetricId, RawSample } from '../history/types';
import logger from '../utils/logger';

/** Rows fetched per round trip during a scan */
const SCAN_PAGE_SIZE = 500;

const INGEST_EVENT = 'ingest';

export class SqliteSampleStore implements SampleStore {
    private readonly emitter = new EventEmitter();
    private version = 0;

    constructor(
        private readonly db: DatabaseInstance,
        private readonly pageSize: number = SCAN_PAGE_SIZE
    ) {}

    /**
     * Persist a batch in one transaction, bump the sample version and notify
     * subscribers once per metric. Returns the new version.
     */
    append(batch: readonly RawSample[]): number {
        if (batch.length === 0) return this.version;

        for (const sample of batch) {
            if (!Number.isFinite(sample.timestamp)) {
                throw new RangeError(`Sample timestamp must be finite (metric=${sample.metric})`);
            }
        }

        const written = healthSamplesDb.insertSamples(this.db, batch);
        this.version++;

        for (const [metric, span] of summarizeBatch(batch)) {
            this.emitter.emit(INGEST_EVENT, { metric, from: span.from, to: span.to, version: this.version });
        }
        logger.debug(`[SqliteSampleStore] Stored ${written} samples (version=${this.version})`);
        return this.version;
    }

    async *scan(metric: MetricId, rangeStart: number, rangeEnd: number): AsyncGenerator<RawSample> {
        const maxId = healthSamplesDb.getMaxId(this.db);
        let cursor: healthSamplesDb.ScanCursor = { timestamp: rangeStart, id: 0 };

        for (;;) {
            const rows = healthSamplesDb.queryPage(
                this.db, metric, rangeStart, rangeEnd, cursor, maxId, this.pageSize
            );
            for (const row of rows) {
                yield { metric: row.metric, timestamp: row.timestamp, value: row.value ?? Number.NaN };
            }
            if (rows.length < this.pageSize) return;

            const last = rows[rows.length - 1];
            cursor = { timestamp: last.timestamp, id: last.id };
        }
    }

    currentSampleVersion(): number {
        return this.version;
    }

    subscribeToIngestion(listener: IngestionListener): () => void {
        const guarded = guardIngestionListener(listener, 'SqliteSampleStore');
        this.emitter.on(INGEST_EVENT, guarded);
        return () => {
            this.emitter.off(INGEST_EVENT, guarded);
        };
    }

    getStats(): healthSamplesDb.SampleStats {
        return healthSamplesDb.getSampleStats(this.db);
    }
}
