/**
 * SQLite Database Connection Module
 *
 * Opens better-sqlite3 connections for the SQLite sample store and applies
 * the schema. Connections are created explicitly and passed to whoever
 * needs them.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import logger from '../utils/logger';
import { extractHistoryErrorMessage } from '../history/errors';
import { SCHEMA_SQL, SCHEMA_VERSION } from './schema';

export type DatabaseInstance = Database.Database;

export const IN_MEMORY = ':memory:';

/**
 * Resolve the database file location.
 * VITALS_DB_PATH: direct path to the database file
 * DATA_DIR: directory containing vitals.db (default: server/data)
 */
export function resolveDatabasePath(env: NodeJS.ProcessEnv = process.env): string {
    if (env.VITALS_DB_PATH) return env.VITALS_DB_PATH;
    const dataDir = env.DATA_DIR || path.join(__dirname, '..', 'data');
    return path.join(dataDir, 'vitals.db');
}

/**
 * Get current schema version from database
 */
export function getCurrentVersion(db: DatabaseInstance): number {
    const result = db.pragma('user_version', { simple: true });
    return typeof result === 'number' ? result : 0;
}

/**
 * Create tables and indexes if the database is behind SCHEMA_VERSION.
 * Runs in a single transaction; a no-op on an up-to-date database.
 */
export function initializeSchema(db: DatabaseInstance): void {
    const currentVersion = getCurrentVersion(db);
    if (currentVersion >= SCHEMA_VERSION) return;

    db.transaction(() => {
        db.exec(SCHEMA_SQL);
        db.pragma(`user_version = ${SCHEMA_VERSION}`);
    })();
    logger.info(`[DB] Schema initialized (v${currentVersion} → v${SCHEMA_VERSION})`);
}

/**
 * Open a connection and make sure the schema is in place.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string = resolveDatabasePath()): DatabaseInstance {
    if (dbPath !== IN_MEMORY) {
        const dbDir = path.dirname(dbPath);
        if (!fs.existsSync(dbDir)) {
            fs.mkdirSync(dbDir, { recursive: true });
        }
    }

    try {
        const db = new Database(dbPath);
        if (dbPath !== IN_MEMORY) {
            // WAL: scans read while an append batch commits
            db.pragma('journal_mode = WAL');
        }
        initializeSchema(db);
        logger.info(`[DB] Connected to SQLite database: ${dbPath}`);
        return db;
    } catch (error) {
        logger.error(`[DB] Failed to open database ${dbPath}: ${extractHistoryErrorMessage(error)}`);
        throw error;
    }
}
