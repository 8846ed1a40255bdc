import type Database from 'better-sqlite3';
import type { FeedbackRepo } from '../ports/repositories.js';
import type {
  ArticleFeedback,
  ArticleVerdict,
  DigestFeedback,
  FalsePositiveReport,
  FeedbackKind,
  FeedbackRecord,
  MissedSignalReport,
} from '../types/feedback.js';
import { isRatedVerdict, reportKey } from '../types/feedback.js';
import { toArticleFeedbackType, toDigestFeedbackType } from './row-guards.js';

interface ReportRow {
  report_key: string;
  text: string;
  note: string;
  created_at: string;
}

interface FeedbackRow {
  kind: string;
  feedback_key: string;
  headline: string | null;
  source: string | null;
  content_type: string | null;
  rating: number | null;
  irrelevant: number;
  comment: string;
  feedback_type: string;
  insight: string | null;
  created_at: string;
}

const COLUMNS =
  'kind, feedback_key, headline, source, content_type, rating, irrelevant, comment, feedback_type, insight, created_at';

function toRow(record: DigestFeedback | ArticleFeedback): FeedbackRow {
  switch (record.kind) {
    case 'digest':
      return {
        kind: 'digest',
        feedback_key: record.digestId,
        headline: null,
        source: null,
        content_type: null,
        rating: record.rating,
        irrelevant: 0,
        comment: record.comment,
        feedback_type: record.feedbackType,
        insight: record.insight,
        created_at: record.createdAt.toISOString(),
      };
    case 'article':
      return {
        kind: 'article',
        feedback_key: record.articleId,
        headline: record.headline,
        source: record.source,
        content_type: record.contentType,
        rating: isRatedVerdict(record.verdict) ? record.verdict.rating : null,
        irrelevant: isRatedVerdict(record.verdict) ? 0 : 1,
        comment: record.comment,
        feedback_type: record.feedbackType,
        insight: record.insight,
        created_at: record.createdAt.toISOString(),
      };
  }
}

function toRecord(row: FeedbackRow): FeedbackRecord | null {
  const createdAt = new Date(row.created_at);

  if (row.kind === 'digest') {
    if (row.rating === null) return null;
    return {
      kind: 'digest',
      digestId: row.feedback_key,
      rating: row.rating,
      comment: row.comment,
      createdAt,
      feedbackType: toDigestFeedbackType(row.feedback_type),
      insight: row.insight,
    };
  }

  if (row.kind === 'article') {
    let verdict: ArticleVerdict;
    if (row.irrelevant) {
      verdict = { irrelevant: true };
    } else if (row.rating !== null) {
      verdict = { rating: row.rating };
    } else {
      return null;
    }
    return {
      kind: 'article',
      articleId: row.feedback_key,
      headline: row.headline ?? '',
      source: row.source ?? '',
      contentType: row.content_type ?? '',
      verdict,
      comment: row.comment,
      createdAt,
      feedbackType: toArticleFeedbackType(row.feedback_type),
      insight: row.insight,
    };
  }

  return null;
}

function byCreatedAt(a: FeedbackRecord, b: FeedbackRecord): number {
  return a.createdAt.getTime() - b.createdAt.getTime();
}

/**
 * SQLite-backed feedback log. UNIQUE(kind, feedback_key) is the last line of
 * defence against double-counting. False positive and missed signal reports
 * live in their own tables, keyed by their normalized text.
 */
export class SqliteFeedbackRepo implements FeedbackRepo {
  private readonly qExists: Database.Statement<[string, string], { found: number }>;
  private readonly qInsert: Database.Statement<[FeedbackRow]>;
  private readonly qSince: Database.Statement<[string], FeedbackRow>;
  private readonly qFalsePositiveExists: Database.Statement<[string], { found: number }>;
  private readonly qFalsePositiveInsert: Database.Statement<[ReportRow]>;
  private readonly qFalsePositiveSince: Database.Statement<[string], ReportRow>;
  private readonly qMissedSignalExists: Database.Statement<[string], { found: number }>;
  private readonly qMissedSignalInsert: Database.Statement<[ReportRow]>;
  private readonly qMissedSignalSince: Database.Statement<[string], ReportRow>;

  constructor(db: Database.Database) {
    this.qExists = db.prepare<[string, string], { found: number }>(
      'SELECT 1 AS found FROM feedback_records WHERE kind = ? AND feedback_key = ?'
    );
    this.qInsert = db.prepare<[FeedbackRow]>(`INSERT INTO feedback_records (${COLUMNS})
      VALUES (@kind, @feedback_key, @headline, @source, @content_type, @rating, @irrelevant,
              @comment, @feedback_type, @insight, @created_at)`);
    this.qSince = db.prepare<[string], FeedbackRow>(
      `SELECT ${COLUMNS} FROM feedback_records WHERE created_at >= ? ORDER BY created_at, id`
    );

    this.qFalsePositiveExists = db.prepare<[string], { found: number }>(
      'SELECT 1 AS found FROM false_positive_reports WHERE report_key = ?'
    );
    this.qFalsePositiveInsert = db.prepare<[ReportRow]>(
      `INSERT INTO false_positive_reports (report_key, headline, reason, created_at)
       VALUES (@report_key, @text, @note, @created_at)`
    );
    this.qFalsePositiveSince = db.prepare<[string], ReportRow>(
      `SELECT report_key, headline AS text, reason AS note, created_at
       FROM false_positive_reports WHERE created_at >= ? ORDER BY created_at, id`
    );

    this.qMissedSignalExists = db.prepare<[string], { found: number }>(
      'SELECT 1 AS found FROM missed_signal_reports WHERE report_key = ?'
    );
    this.qMissedSignalInsert = db.prepare<[ReportRow]>(
      `INSERT INTO missed_signal_reports (report_key, event, details, created_at)
       VALUES (@report_key, @text, @note, @created_at)`
    );
    this.qMissedSignalSince = db.prepare<[string], ReportRow>(
      `SELECT report_key, event AS text, details AS note, created_at
       FROM missed_signal_reports WHERE created_at >= ? ORDER BY created_at, id`
    );
  }

  exists(kind: FeedbackKind, key: string): boolean {
    switch (kind) {
      case 'false_positive':
        return this.qFalsePositiveExists.get(key) !== undefined;
      case 'missed_signal':
        return this.qMissedSignalExists.get(key) !== undefined;
      default:
        return this.qExists.get(kind, key) !== undefined;
    }
  }

  insert(record: FeedbackRecord): void {
    switch (record.kind) {
      case 'false_positive':
        this.qFalsePositiveInsert.run({
          report_key: reportKey(record.headline),
          text: record.headline,
          note: record.reason,
          created_at: record.createdAt.toISOString(),
        });
        return;
      case 'missed_signal':
        this.qMissedSignalInsert.run({
          report_key: reportKey(record.event),
          text: record.event,
          note: record.details,
          created_at: record.createdAt.toISOString(),
        });
        return;
      default:
        this.qInsert.run(toRow(record));
    }
  }

  since(since: Date): FeedbackRecord[] {
    const from = since.toISOString();
    const ratings = this.qSince
      .all(from)
      .map(toRecord)
      .filter((record): record is FeedbackRecord => record !== null);

    const falsePositives = this.qFalsePositiveSince.all(from).map(
      (row): FalsePositiveReport => ({
        kind: 'false_positive',
        headline: row.text,
        reason: row.note,
        createdAt: new Date(row.created_at),
      })
    );
    const missedSignals = this.qMissedSignalSince.all(from).map(
      (row): MissedSignalReport => ({
        kind: 'missed_signal',
        event: row.text,
        details: row.note,
        createdAt: new Date(row.created_at),
      })
    );

    // Stable sort: equal times keep table order.
    return [...ratings, ...falsePositives, ...missedSignals].sort(byCreatedAt);
  }
}
