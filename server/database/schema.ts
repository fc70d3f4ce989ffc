/**
 * Sample Store Schema
 *
 * Applied by initializeSchema(); versioned through PRAGMA user_version.
 * `value` is nullable: SQLite stores a NaN as NULL, and such rows are kept
 * so the aggregator can drop them the same way it drops any noisy value.
 */

export const SCHEMA_VERSION = 1;

export const SCHEMA_SQL = `
    CREATE TABLE IF NOT EXISTS health_samples (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        metric TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        value REAL
    );
    CREATE INDEX IF NOT EXISTS idx_health_samples_lookup
        ON health_samples(metric, timestamp, id);
`;
