import type Database from 'better-sqlite3';
import type { SourceRepo } from '../ports/repositories.js';
import type { SourceReliability } from '../learning/types.js';

interface SourceRow {
  source: string;
  content_type: string;
  reliability: number;
  sample_count: number;
  last_updated: string;
}

const COLUMNS = 'source, content_type, reliability, sample_count, last_updated';

function toSource(row: SourceRow): SourceReliability {
  return {
    source: row.source,
    contentType: row.content_type,
    reliability: row.reliability,
    sampleCount: row.sample_count,
    lastUpdated: new Date(row.last_updated),
  };
}

/**
 * SQLite-backed source reliability repository.
 */
export class SqliteSourceRepo implements SourceRepo {
  private readonly qGet: Database.Statement<[string, string], SourceRow>;
  private readonly qSave: Database.Statement<[SourceRow]>;
  private readonly qAll: Database.Statement<[], SourceRow>;

  constructor(db: Database.Database) {
    this.qGet = db.prepare<[string, string], SourceRow>(
      `SELECT ${COLUMNS} FROM source_reliability WHERE source = ? AND content_type = ?`
    );
    this.qSave = db.prepare<[SourceRow]>(`INSERT INTO source_reliability (${COLUMNS})
      VALUES (@source, @content_type, @reliability, @sample_count, @last_updated)
      ON CONFLICT(source, content_type) DO UPDATE SET
        reliability = excluded.reliability,
        sample_count = excluded.sample_count,
        last_updated = excluded.last_updated`);
    this.qAll = db.prepare<[], SourceRow>(
      `SELECT ${COLUMNS} FROM source_reliability ORDER BY source, content_type`
    );
  }

  get(source: string, contentType: string): SourceReliability | null {
    const row = this.qGet.get(source, contentType);
    return row ? toSource(row) : null;
  }

  save(record: SourceReliability): void {
    this.qSave.run({
      source: record.source,
      content_type: record.contentType,
      reliability: record.reliability,
      sample_count: record.sampleCount,
      last_updated: record.lastUpdated.toISOString(),
    });
  }

  all(): SourceReliability[] {
    return this.qAll.all().map(toSource);
  }
}
