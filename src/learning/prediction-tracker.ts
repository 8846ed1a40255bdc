import { randomUUID } from 'node:crypto';
import type { Logger } from '../types/logger.js';
import type { UrgencyLevel } from '../types/headline.js';
import { urgencyLevel } from '../types/headline.js';
import type { PredictionRepo } from '../ports/repositories.js';
import type { Clock, PredictionRecord } from './types.js';
import { DEFAULT_LEARNING_CONFIG, clamp, systemClock } from './types.js';

export interface NewPrediction {
  headline: string;
  source: string;
  contentType: string;
  predictedScore: number;
  inputsSnapshot: Record<string, unknown>;
}

/**
 * Which prediction an outcome belongs to: an id, or a best-effort lookup of
 * the newest unresolved prediction for the headline within windowMs before at.
 */
export type OutcomeRef =
  | { predictionId: string }
  | { headline: string; source: string; at: Date; windowMs?: number };

export interface AccuracyBucket {
  count: number;
  /** null when count is 0 */
  meanAbsoluteError: number | null;
  /** 1 - MAE / 10, null when count is 0 */
  accuracy: number | null;
}

export interface AccuracyReport extends AccuracyBucket {
  byBand: Record<'low' | 'medium' | 'high', AccuracyBucket>;
  bySource: ({ source: string } & AccuracyBucket)[];
}

const BAND_OF: Record<UrgencyLevel, 'low' | 'medium' | 'high'> = {
  LOW: 'low',
  MEDIUM: 'medium',
  HIGH: 'high',
};

function bucket(errors: readonly number[]): AccuracyBucket {
  if (errors.length === 0) {
    return { count: 0, meanAbsoluteError: null, accuracy: null };
  }
  const mae = errors.reduce((sum, e) => sum + Math.abs(e), 0) / errors.length;
  return {
    count: errors.length,
    meanAbsoluteError: mae,
    accuracy: clamp(1 - mae / 10, 0, 1),
  };
}

/**
 * PredictionTracker - the prediction log and its realized outcomes.
 */
export class PredictionTracker {
  private readonly repo: PredictionRepo;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly outcomeWindowMs: number;

  constructor(
    repo: PredictionRepo,
    logger: Logger,
    options: { clock?: Clock; outcomeWindowMs?: number } = {}
  ) {
    this.repo = repo;
    this.logger = logger.child({ component: 'prediction-tracker' });
    this.clock = options.clock ?? systemClock;
    this.outcomeWindowMs = options.outcomeWindowMs ?? DEFAULT_LEARNING_CONFIG.feedback.outcomeWindowMs;
  }

  recordPrediction(prediction: NewPrediction): PredictionRecord {
    const record: PredictionRecord = {
      predictionId: `pred_${randomUUID()}`,
      headline: prediction.headline,
      source: prediction.source,
      contentType: prediction.contentType,
      inputsSnapshot: prediction.inputsSnapshot,
      predictedScore: prediction.predictedScore,
      urgencyLevel: urgencyLevel(prediction.predictedScore),
      predictedAt: this.clock(),
      realizedScore: null,
      error: null,
      resolvedAt: null,
    };
    this.repo.insert(record);
    return record;
  }

  get(predictionId: string): PredictionRecord | null {
    return this.repo.get(predictionId);
  }

  /**
   * Newest unresolved prediction for a headline, or null.
   */
  find(headline: string, source: string, at: Date, windowMs = this.outcomeWindowMs): PredictionRecord | null {
    const from = new Date(at.getTime() - windowMs);
    const [newest] = this.repo.findUnresolved(headline, source, from, at);
    return newest ?? null;
  }

  /**
   * Attach a realized score. Already-resolved and unknown predictions are left
   * alone and yield null.
   */
  attachOutcome(ref: OutcomeRef, realizedScore: number): PredictionRecord | null {
    const record =
      'predictionId' in ref ? this.repo.get(ref.predictionId) : this.find(ref.headline, ref.source, ref.at, ref.windowMs);

    if (!record) {
      this.logger.debug({ ref }, 'No prediction to attach outcome to');
      return null;
    }
    if (record.realizedScore !== null) {
      this.logger.debug({ predictionId: record.predictionId }, 'Prediction already resolved');
      return null;
    }

    const resolvedAt = this.clock();
    const error = record.predictedScore - realizedScore;
    this.repo.resolve(record.predictionId, realizedScore, error, resolvedAt);

    return { ...record, realizedScore, error, resolvedAt };
  }

  /**
   * Error statistics over resolved predictions made in [since, until].
   */
  accuracyReport(window: { since?: Date; until?: Date } = {}): AccuracyReport {
    const since = window.since ?? new Date(0);
    const until = window.until ?? this.clock();
    const resolved = this.repo.resolvedBetween(since, until);

    const errors: number[] = [];
    const bands: Record<'low' | 'medium' | 'high', number[]> = { low: [], medium: [], high: [] };
    const sources = new Map<string, number[]>();

    for (const record of resolved) {
      if (record.error === null) continue;
      errors.push(record.error);
      bands[BAND_OF[record.urgencyLevel]].push(record.error);
      const list = sources.get(record.source) ?? [];
      list.push(record.error);
      sources.set(record.source, list);
    }

    return {
      ...bucket(errors),
      byBand: {
        low: bucket(bands.low),
        medium: bucket(bands.medium),
        high: bucket(bands.high),
      },
      bySource: [...sources.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([source, list]) => ({ source, ...bucket(list) })),
    };
  }
}
