import type Database from 'better-sqlite3';
import type { DigestRepo } from '../ports/repositories.js';
import type { DigestEntry } from '../learning/types.js';

interface DigestEntryRow {
  digest_id: string;
  position: number;
  article_id: string | null;
  headline: string;
  source: string;
  content_type: string;
  prediction_id: string | null;
  predicted_score: number | null;
}

const COLUMNS =
  'digest_id, position, article_id, headline, source, content_type, prediction_id, predicted_score';

function toEntry(row: DigestEntryRow): DigestEntry {
  return {
    digestId: row.digest_id,
    position: row.position,
    articleId: row.article_id,
    headline: row.headline,
    source: row.source,
    contentType: row.content_type,
    predictionId: row.prediction_id,
    predictedScore: row.predicted_score,
  };
}

/**
 * SQLite-backed record of which headlines made up each digest.
 */
export class SqliteDigestRepo implements DigestRepo {
  private readonly qExists: Database.Statement<[string], { found: number }>;
  private readonly qInsert: Database.Statement<[DigestEntryRow]>;
  private readonly qEntries: Database.Statement<[string], DigestEntryRow>;

  constructor(db: Database.Database) {
    this.qExists = db.prepare<[string], { found: number }>(
      'SELECT 1 AS found FROM digest_entries WHERE digest_id = ? LIMIT 1'
    );
    this.qInsert = db.prepare<[DigestEntryRow]>(`INSERT INTO digest_entries (${COLUMNS})
      VALUES (@digest_id, @position, @article_id, @headline, @source, @content_type,
              @prediction_id, @predicted_score)`);
    this.qEntries = db.prepare<[string], DigestEntryRow>(
      `SELECT ${COLUMNS} FROM digest_entries WHERE digest_id = ? ORDER BY position`
    );
  }

  exists(digestId: string): boolean {
    return this.qExists.get(digestId) !== undefined;
  }

  insertEntries(entries: readonly DigestEntry[]): void {
    for (const entry of entries) {
      this.qInsert.run({
        digest_id: entry.digestId,
        position: entry.position,
        article_id: entry.articleId,
        headline: entry.headline,
        source: entry.source,
        content_type: entry.contentType,
        prediction_id: entry.predictionId,
        predicted_score: entry.predictedScore,
      });
    }
  }

  entries(digestId: string): DigestEntry[] {
    return this.qEntries.all(digestId).map(toEntry);
  }
}
