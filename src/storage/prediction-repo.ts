import type Database from 'better-sqlite3';
import type { PredictionRepo } from '../ports/repositories.js';
import type { PredictionRecord } from '../learning/types.js';
import { parseJsonObject, toUrgencyLevel } from './row-guards.js';

interface PredictionRow {
  prediction_id: string;
  headline: string;
  source: string;
  content_type: string;
  inputs_snapshot: string;
  predicted_score: number;
  urgency_level: string;
  predicted_at: string;
  realized_score: number | null;
  error: number | null;
  resolved_at: string | null;
}

const COLUMNS = `prediction_id, headline, source, content_type, inputs_snapshot, predicted_score,
  urgency_level, predicted_at, realized_score, error, resolved_at`;

function toPrediction(row: PredictionRow): PredictionRecord {
  return {
    predictionId: row.prediction_id,
    headline: row.headline,
    source: row.source,
    contentType: row.content_type,
    inputsSnapshot: parseJsonObject(row.inputs_snapshot),
    predictedScore: row.predicted_score,
    urgencyLevel: toUrgencyLevel(row.urgency_level),
    predictedAt: new Date(row.predicted_at),
    realizedScore: row.realized_score,
    error: row.error,
    resolvedAt: row.resolved_at === null ? null : new Date(row.resolved_at),
  };
}

/**
 * SQLite-backed prediction log (the prediction_tracking table).
 */
export class SqlitePredictionRepo implements PredictionRepo {
  private readonly qInsert: Database.Statement<[PredictionRow]>;
  private readonly qGet: Database.Statement<[string], PredictionRow>;
  private readonly qUnresolved: Database.Statement<[string, string, string, string], PredictionRow>;
  private readonly qResolve: Database.Statement<[number, number, string, string]>;
  private readonly qResolvedBetween: Database.Statement<[string, string], PredictionRow>;

  constructor(db: Database.Database) {
    this.qInsert = db.prepare<[PredictionRow]>(`INSERT INTO prediction_tracking (${COLUMNS})
      VALUES (@prediction_id, @headline, @source, @content_type, @inputs_snapshot, @predicted_score,
              @urgency_level, @predicted_at, @realized_score, @error, @resolved_at)`);
    this.qGet = db.prepare<[string], PredictionRow>(
      `SELECT ${COLUMNS} FROM prediction_tracking WHERE prediction_id = ?`
    );
    this.qUnresolved = db.prepare<[string, string, string, string], PredictionRow>(
      `SELECT ${COLUMNS} FROM prediction_tracking
       WHERE headline = ? AND source = ? AND predicted_at >= ? AND predicted_at <= ?
         AND realized_score IS NULL
       ORDER BY predicted_at DESC, prediction_id`
    );
    this.qResolve = db.prepare<[number, number, string, string]>(
      `UPDATE prediction_tracking SET realized_score = ?, error = ?, resolved_at = ?
       WHERE prediction_id = ? AND realized_score IS NULL`
    );
    this.qResolvedBetween = db.prepare<[string, string], PredictionRow>(
      `SELECT ${COLUMNS} FROM prediction_tracking
       WHERE realized_score IS NOT NULL AND predicted_at >= ? AND predicted_at <= ?
       ORDER BY predicted_at, prediction_id`
    );
  }

  insert(record: PredictionRecord): void {
    this.qInsert.run({
      prediction_id: record.predictionId,
      headline: record.headline,
      source: record.source,
      content_type: record.contentType,
      inputs_snapshot: JSON.stringify(record.inputsSnapshot),
      predicted_score: record.predictedScore,
      urgency_level: record.urgencyLevel,
      predicted_at: record.predictedAt.toISOString(),
      realized_score: record.realizedScore,
      error: record.error,
      resolved_at: record.resolvedAt?.toISOString() ?? null,
    });
  }

  get(predictionId: string): PredictionRecord | null {
    const row = this.qGet.get(predictionId);
    return row ? toPrediction(row) : null;
  }

  findUnresolved(headline: string, source: string, from: Date, to: Date): PredictionRecord[] {
    return this.qUnresolved
      .all(headline, source, from.toISOString(), to.toISOString())
      .map(toPrediction);
  }

  resolve(predictionId: string, realizedScore: number, error: number, resolvedAt: Date): void {
    this.qResolve.run(realizedScore, error, resolvedAt.toISOString(), predictionId);
  }

  resolvedBetween(since: Date, until: Date): PredictionRecord[] {
    return this.qResolvedBetween.all(since.toISOString(), until.toISOString()).map(toPrediction);
  }
}
