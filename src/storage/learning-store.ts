import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { Logger } from '../types/logger.js';
import { EngineError, StorageUnavailableError } from '../core/errors.js';

/**
 * Schema version this build writes.
 * Increment only for additive changes; older columns are never dropped.
 */
export const SCHEMA_VERSION = 2;

export const IN_MEMORY = ':memory:';

export interface LearningStoreConfig {
  /** SQLite file, or ':memory:' */
  path: string;
  /** How long a write waits on another process's lock (ms, default 5000) */
  busyTimeoutMs?: number;
  logger?: Logger;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS schema_meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS patterns (
    signature TEXT PRIMARY KEY,
    shape_key TEXT NOT NULL,
    sample_urgency_sum REAL NOT NULL,
    sample_count REAL NOT NULL,
    confidence REAL NOT NULL,
    last_updated TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_patterns_shape ON patterns(shape_key);

  CREATE TABLE IF NOT EXISTS keyword_weights (
    term TEXT PRIMARY KEY,
    weight REAL NOT NULL,
    sample_count REAL NOT NULL,
    last_updated TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS source_reliability (
    source TEXT NOT NULL,
    content_type TEXT NOT NULL,
    reliability REAL NOT NULL,
    sample_count INTEGER NOT NULL,
    last_updated TEXT NOT NULL,
    PRIMARY KEY (source, content_type)
  );

  CREATE TABLE IF NOT EXISTS feedback_records (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    kind TEXT NOT NULL CHECK (kind IN ('digest', 'article')),
    feedback_key TEXT NOT NULL,
    headline TEXT,
    source TEXT,
    content_type TEXT,
    rating REAL,
    irrelevant INTEGER NOT NULL DEFAULT 0,
    comment TEXT NOT NULL DEFAULT '',
    feedback_type TEXT NOT NULL,
    insight TEXT,
    created_at TEXT NOT NULL,
    UNIQUE (kind, feedback_key)
  );
  CREATE INDEX IF NOT EXISTS idx_feedback_created ON feedback_records(created_at);

  CREATE TABLE IF NOT EXISTS prediction_tracking (
    prediction_id TEXT PRIMARY KEY,
    headline TEXT NOT NULL,
    source TEXT NOT NULL,
    content_type TEXT NOT NULL,
    inputs_snapshot TEXT NOT NULL,
    predicted_score REAL NOT NULL,
    urgency_level TEXT NOT NULL,
    predicted_at TEXT NOT NULL,
    realized_score REAL,
    error REAL,
    resolved_at TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_prediction_lookup
    ON prediction_tracking(source, headline, predicted_at);

  CREATE TABLE IF NOT EXISTS digest_entries (
    digest_id TEXT NOT NULL,
    position INTEGER NOT NULL,
    article_id TEXT,
    headline TEXT NOT NULL,
    source TEXT NOT NULL,
    content_type TEXT NOT NULL,
    prediction_id TEXT,
    predicted_score REAL,
    PRIMARY KEY (digest_id, position)
  );

  CREATE TABLE IF NOT EXISTS false_positive_reports (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    report_key TEXT NOT NULL UNIQUE,
    headline TEXT NOT NULL,
    reason TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS missed_signal_reports (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    report_key TEXT NOT NULL UNIQUE,
    event TEXT NOT NULL,
    details TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL
  );
`;

/**
 * LearningStore - the single SQLite database holding all tracker state.
 *
 * Several processes (a scheduled collection, a manual run, a feedback
 * session) may open the same file. WAL mode lets readers proceed during a
 * write, and every mutation runs inside transaction(), which takes the write
 * lock up front so a killed process leaves nothing half-applied.
 */
export class LearningStore {
  readonly db: Database.Database;
  readonly path: string;
  private readonly logger: Logger | undefined;

  constructor(config: LearningStoreConfig) {
    this.path = config.path;
    this.logger = config.logger?.child({ component: 'learning-store' });

    try {
      if (config.path !== IN_MEMORY) {
        mkdirSync(dirname(config.path), { recursive: true });
      }
      this.db = new Database(config.path, { timeout: config.busyTimeoutMs ?? 5_000 });
      if (config.path !== IN_MEMORY) {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.exec(SCHEMA);
    } catch (error) {
      throw new StorageUnavailableError('open', error);
    }

    this.checkSchemaVersion();
  }

  /**
   * Run fn atomically. Either every write inside commits or none does.
   *
   * Engine errors thrown by fn pass through unchanged (after rollback);
   * anything else is reported as StorageUnavailableError.
   */
  transaction<T>(operation: string, fn: () => T): T {
    if (this.db.inTransaction) {
      return fn();
    }

    const run = this.db.transaction(fn);
    try {
      return run.immediate();
    } catch (error) {
      if (error instanceof EngineError) {
        throw error;
      }
      throw new StorageUnavailableError(operation, error);
    }
  }

  /**
   * Run a read against one snapshot of the store, translating driver
   * failures into StorageUnavailableError. Writes committed by other
   * connections while fn runs are not seen.
   */
  read<T>(operation: string, fn: () => T): T {
    try {
      return this.db.inTransaction ? fn() : this.db.transaction(fn).deferred();
    } catch (error) {
      if (error instanceof EngineError) {
        throw error;
      }
      throw new StorageUnavailableError(operation, error);
    }
  }

  getSchemaVersion(): number {
    const row = this.db
      .prepare<[string], { value: string }>('SELECT value FROM schema_meta WHERE key = ?')
      .get('schema_version');
    return row ? Number(row.value) : 0;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private checkSchemaVersion(): void {
    const version = this.read('schema-version', () => this.getSchemaVersion());

    if (version < SCHEMA_VERSION) {
      this.transaction('schema-version', () => {
        this.db
          .prepare<[string, string]>('INSERT OR REPLACE INTO schema_meta (key, value) VALUES (?, ?)')
          .run('schema_version', String(SCHEMA_VERSION));
      });
      return;
    }

    if (version > SCHEMA_VERSION) {
      this.logger?.warn(
        { storedVersion: version, supportedVersion: SCHEMA_VERSION },
        'Store schema is newer than this build; continuing with known columns'
      );
    }
  }
}

export function createLearningStore(
  path: string,
  options: Omit<LearningStoreConfig, 'path'> = {}
): LearningStore {
  return new LearningStore({ path, ...options });
}
