import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import {
    AnnotationStoreError,
    cacheKeyPath,
    validateCacheKey,
    type AnnotationCacheKey,
    type AnnotationStore,
    type AnnotationStoreStats,
} from '../cache/annotation-store.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Annotated tables: one write-once row per (dataset, generator, table)
CREATE TABLE IF NOT EXISTS annotations (
  dataset_id TEXT NOT NULL,
  generator_id TEXT NOT NULL,
  table_id TEXT NOT NULL,
  artifact TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (dataset_id, generator_id, table_id)
);

CREATE INDEX IF NOT EXISTS idx_annotations_generator ON annotations(dataset_id, generator_id);
`;

interface ArtifactRow {
    artifact: string;
}

interface StatsRow {
    entries: number;
    bytes: number | null;
}

function isArtifactRow(row: unknown): row is ArtifactRow {
    return typeof row === 'object' && row !== null && 'artifact' in row && typeof row.artifact === 'string';
}

function isStatsRow(row: unknown): row is StatsRow {
    return (
        typeof row === 'object' && row !== null &&
        'entries' in row && typeof row.entries === 'number' &&
        'bytes' in row && (row.bytes === null || typeof row.bytes === 'number')
    );
}

/**
 * Annotation store in a single SQLite file (better-sqlite3, WAL mode).
 *
 * `INSERT OR IGNORE` on the key's primary key makes `putIfAbsent` atomic,
 * including across processes sharing the file.
 */
export class SqliteAnnotationStore implements AnnotationStore {
    private db: Database.Database;

    constructor(private readonly dbPath: string) {
        if (dbPath !== ':memory:') {
            mkdirSync(dirname(dbPath), { recursive: true });
        }
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('busy_timeout = 5000');

        // Run migrations
        this.migrate();

        getLogger().debug({ dbPath }, 'SQLite annotation store initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().debug('Annotation store migrated to v1');
        }
    }

    get(key: AnnotationCacheKey): string | null {
        validateCacheKey(key);
        const row: unknown = this.db
            .prepare('SELECT artifact FROM annotations WHERE dataset_id = ? AND generator_id = ? AND table_id = ?')
            .get(key.datasetId, key.generatorId, key.tableId);

        if (row === undefined) return null;
        if (!isArtifactRow(row)) {
            throw new AnnotationStoreError(`Unexpected row shape for ${cacheKeyPath(key)}`);
        }

        getLogger().debug({ ...key }, 'Annotation cache hit');
        return row.artifact;
    }

    has(key: AnnotationCacheKey): boolean {
        validateCacheKey(key);
        const row: unknown = this.db
            .prepare('SELECT 1 AS present FROM annotations WHERE dataset_id = ? AND generator_id = ? AND table_id = ?')
            .get(key.datasetId, key.generatorId, key.tableId);
        return row !== undefined;
    }

    putIfAbsent(key: AnnotationCacheKey, blob: string): boolean {
        validateCacheKey(key);
        const result = this.db
            .prepare(
                `INSERT OR IGNORE INTO annotations (dataset_id, generator_id, table_id, artifact)
                 VALUES (@datasetId, @generatorId, @tableId, @artifact)`
            )
            .run({ ...key, artifact: blob });

        const committed = result.changes > 0;
        getLogger().debug({ ...key, committed }, committed ? 'Annotations stored' : 'Annotations already stored');
        return committed;
    }

    stats(): AnnotationStoreStats {
        const row: unknown = this.db
            .prepare('SELECT COUNT(*) AS entries, SUM(LENGTH(CAST(artifact AS BLOB))) AS bytes FROM annotations')
            .get();

        if (!isStatsRow(row)) {
            throw new AnnotationStoreError('Unexpected stats row shape');
        }
        return { backend: 'sqlite', location: this.dbPath, entries: row.entries, bytes: row.bytes ?? 0 };
    }

    clear(): void {
        this.db.exec('DELETE FROM annotations');
        getLogger().info({ dbPath: this.dbPath }, 'SQLite annotation store cleared');
    }

    close(): void {
        this.db.close();
    }

    /**
     * Get raw database instance (for tests).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
