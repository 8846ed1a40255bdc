import type Database from 'better-sqlite3';
import type { KeywordRepo } from '../ports/repositories.js';
import type { KeywordWeight } from '../learning/types.js';

interface KeywordRow {
  term: string;
  weight: number;
  sample_count: number;
  last_updated: string;
}

const COLUMNS = 'term, weight, sample_count, last_updated';

function toKeyword(row: KeywordRow): KeywordWeight {
  return {
    term: row.term,
    weight: row.weight,
    sampleCount: row.sample_count,
    lastUpdated: new Date(row.last_updated),
  };
}

/**
 * SQLite-backed keyword weight repository.
 */
export class SqliteKeywordRepo implements KeywordRepo {
  private readonly db: Database.Database;
  private readonly qGet: Database.Statement<[string], KeywordRow>;
  private readonly qSave: Database.Statement<[KeywordRow]>;
  private readonly qAll: Database.Statement<[], KeywordRow>;
  private readonly qCount: Database.Statement<[], { n: number }>;

  constructor(db: Database.Database) {
    this.db = db;
    this.qGet = db.prepare<[string], KeywordRow>(`SELECT ${COLUMNS} FROM keyword_weights WHERE term = ?`);
    this.qSave = db.prepare<[KeywordRow]>(`INSERT INTO keyword_weights (${COLUMNS})
      VALUES (@term, @weight, @sample_count, @last_updated)
      ON CONFLICT(term) DO UPDATE SET
        weight = excluded.weight,
        sample_count = excluded.sample_count,
        last_updated = excluded.last_updated`);
    this.qAll = db.prepare<[], KeywordRow>(`SELECT ${COLUMNS} FROM keyword_weights ORDER BY term`);
    this.qCount = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM keyword_weights');
  }

  get(term: string): KeywordWeight | null {
    const row = this.qGet.get(term);
    return row ? toKeyword(row) : null;
  }

  getMany(terms: readonly string[]): KeywordWeight[] {
    if (terms.length === 0) {
      return [];
    }
    const placeholders = terms.map(() => '?').join(', ');
    return this.db
      .prepare<string[], KeywordRow>(
        `SELECT ${COLUMNS} FROM keyword_weights WHERE term IN (${placeholders}) ORDER BY term`
      )
      .all(...terms)
      .map(toKeyword);
  }

  save(keyword: KeywordWeight): void {
    this.qSave.run({
      term: keyword.term,
      weight: keyword.weight,
      sample_count: keyword.sampleCount,
      last_updated: keyword.lastUpdated.toISOString(),
    });
  }

  all(): KeywordWeight[] {
    return this.qAll.all().map(toKeyword);
  }

  count(): number {
    return this.qCount.get()?.n ?? 0;
  }
}
