import type Database from 'better-sqlite3';
import type { PatternRepo } from '../ports/repositories.js';
import type { Pattern } from '../learning/types.js';

interface PatternRow {
  signature: string;
  shape_key: string;
  sample_urgency_sum: number;
  sample_count: number;
  confidence: number;
  last_updated: string;
}

const COLUMNS = 'signature, shape_key, sample_urgency_sum, sample_count, confidence, last_updated';

function toPattern(row: PatternRow): Pattern {
  return {
    signature: row.signature,
    shapeKey: row.shape_key,
    sampleUrgencySum: row.sample_urgency_sum,
    sampleCount: row.sample_count,
    confidence: row.confidence,
    lastUpdated: new Date(row.last_updated),
  };
}

/**
 * SQLite-backed pattern repository.
 */
export class SqlitePatternRepo implements PatternRepo {
  private readonly qGet: Database.Statement<[string], PatternRow>;
  private readonly qByShape: Database.Statement<[string], PatternRow>;
  private readonly qSave: Database.Statement<[PatternRow]>;
  private readonly qSetConfidence: Database.Statement<[number, string]>;
  private readonly qAll: Database.Statement<[], PatternRow>;
  private readonly qCount: Database.Statement<[], { n: number }>;

  constructor(db: Database.Database) {
    this.qGet = db.prepare<[string], PatternRow>(`SELECT ${COLUMNS} FROM patterns WHERE signature = ?`);
    this.qByShape = db.prepare<[string], PatternRow>(
      `SELECT ${COLUMNS} FROM patterns WHERE shape_key = ? ORDER BY signature`
    );
    this.qSave = db.prepare<[PatternRow]>(`INSERT INTO patterns (${COLUMNS})
      VALUES (@signature, @shape_key, @sample_urgency_sum, @sample_count, @confidence, @last_updated)
      ON CONFLICT(signature) DO UPDATE SET
        shape_key = excluded.shape_key,
        sample_urgency_sum = excluded.sample_urgency_sum,
        sample_count = excluded.sample_count,
        confidence = excluded.confidence,
        last_updated = excluded.last_updated`);
    this.qSetConfidence = db.prepare<[number, string]>(
      'UPDATE patterns SET confidence = ? WHERE signature = ?'
    );
    this.qAll = db.prepare<[], PatternRow>(`SELECT ${COLUMNS} FROM patterns ORDER BY signature`);
    this.qCount = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM patterns');
  }

  get(signature: string): Pattern | null {
    const row = this.qGet.get(signature);
    return row ? toPattern(row) : null;
  }

  findByShape(shapeKey: string): Pattern[] {
    return this.qByShape.all(shapeKey).map(toPattern);
  }

  save(pattern: Pattern): void {
    this.qSave.run({
      signature: pattern.signature,
      shape_key: pattern.shapeKey,
      sample_urgency_sum: pattern.sampleUrgencySum,
      sample_count: pattern.sampleCount,
      confidence: pattern.confidence,
      last_updated: pattern.lastUpdated.toISOString(),
    });
  }

  setConfidence(signature: string, confidence: number): void {
    this.qSetConfidence.run(confidence, signature);
  }

  all(): Pattern[] {
    return this.qAll.all().map(toPattern);
  }

  count(): number {
    return this.qCount.get()?.n ?? 0;
  }
}
