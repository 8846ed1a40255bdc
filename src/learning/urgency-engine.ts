import type { Logger } from '../types/logger.js';
import type { UrgencyLevel } from '../types/headline.js';
import type { IngestResult } from '../types/feedback.js';
import type { LearningRepositories } from '../ports/repositories.js';
import { StorageUnavailableError, ValidationError } from '../core/errors.js';
import type { Clock, DigestEntry, LearningConfig } from './types.js';
import { DEFAULT_LEARNING_CONFIG, systemClock } from './types.js';
import { PatternStore } from './pattern-store.js';
import { KeywordWeightTracker } from './keyword-weight-tracker.js';
import { SourceReliabilityTracker, normalizeContentType, normalizeSource } from './source-reliability-tracker.js';
import type { AccuracyReport } from './prediction-tracker.js';
import { PredictionTracker } from './prediction-tracker.js';
import type { FeedbackSummary } from './feedback-ingester.js';
import { FeedbackIngester } from './feedback-ingester.js';
import type { PredictionExplanation, ScoreResult } from './prediction-engine.js';
import { PredictionEngine } from './prediction-engine.js';
import { QuarantineLog } from './quarantine.js';
import type {
  ArticleFeedbackInput,
  DigestFeedbackInput,
  DigestRegistration,
  FalsePositiveInput,
  MissedSignalInput,
  PredictionInput,
} from './schemas.js';
import { digestRegistrationSchema, parseInput, predictionInputSchema } from './schemas.js';

const TOP_KEYWORDS = 10;
const REPORT_PRECISION = 4;

function round(value: number): number {
  const factor = 10 ** REPORT_PRECISION;
  return Math.round(value * factor) / factor;
}

export interface Prediction {
  /** null when the prediction could not be recorded */
  predictionId: string | null;
  score: number;
  urgencyLevel: UrgencyLevel;
  explanation: PredictionExplanation;
  recorded: boolean;
}

export interface IntelligenceReport {
  patternCount: number;
  keywordCount: number;
  topKeywords: { term: string; weight: number; sampleCount: number }[];
  sourceScores: {
    source: string;
    contentType: string;
    reliability: number;
    sampleCount: number;
  }[];
  accuracySummary: AccuracyReport;
  /** Corrupt records skipped, by entity */
  quarantined: { patterns: number; keywords: number; sources: number };
}

export interface DecayResult {
  patternsDecayed: number;
}

export interface UrgencyEngineOptions {
  repos: LearningRepositories;
  logger: Logger;
  config?: LearningConfig;
  clock?: Clock;
}

/**
 * UrgencyEngine - the learning engine's public surface.
 *
 * Wires the trackers over one set of repositories and exposes prediction,
 * digest registration, feedback ingestion and reporting.
 */
export class UrgencyEngine {
  readonly patterns: PatternStore;
  readonly keywords: KeywordWeightTracker;
  readonly sources: SourceReliabilityTracker;
  readonly predictions: PredictionTracker;
  readonly ingester: FeedbackIngester;
  readonly predictor: PredictionEngine;

  private readonly repos: LearningRepositories;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: UrgencyEngineOptions) {
    const config = options.config ?? DEFAULT_LEARNING_CONFIG;
    const clock = options.clock ?? systemClock;

    this.repos = options.repos;
    this.logger = options.logger.child({ component: 'urgency-engine' });
    this.clock = clock;

    const quarantine = new QuarantineLog(this.logger);
    this.patterns = new PatternStore(this.repos.patterns, options.logger, config.patterns, {
      clock,
      minKeywordLength: config.keywords.minKeywordLength,
      quarantine,
    });
    this.keywords = new KeywordWeightTracker(this.repos.keywords, options.logger, config.keywords, {
      clock,
      neutralUrgency: config.prediction.neutralUrgency,
      quarantine,
    });
    this.sources = new SourceReliabilityTracker(this.repos.sources, options.logger, config.sources, {
      clock,
      quarantine,
    });
    this.predictions = new PredictionTracker(this.repos.predictions, options.logger, {
      clock,
      outcomeWindowMs: config.feedback.outcomeWindowMs,
    });
    this.predictor = new PredictionEngine(
      { patterns: this.patterns, keywords: this.keywords, sources: this.sources },
      options.logger,
      config.prediction
    );
    this.ingester = new FeedbackIngester(
      {
        repos: this.repos,
        patterns: this.patterns,
        keywords: this.keywords,
        sources: this.sources,
        predictions: this.predictions,
      },
      options.logger,
      config.feedback,
      { clock }
    );
  }

  /**
   * Score a headline and log the prediction.
   *
   * Throws ValidationError for malformed input. When the learned state cannot
   * be read the fallback score is returned unrecorded; a failure to record is
   * logged and reported through `recorded` as well.
   */
  predict(input: PredictionInput): Prediction {
    const request = parseInput(predictionInputSchema, input);

    let result: ScoreResult;
    try {
      result = this.repos.read('predict', () => this.predictor.score(request));
    } catch (error) {
      if (!(error instanceof StorageUnavailableError)) throw error;
      this.logger.error({ error: error.message }, 'Learned state unreadable, using fallback score');
      const fallback = this.predictor.fallbackOnly(request, 'storage_unavailable');
      return { predictionId: null, ...fallback, recorded: false };
    }

    try {
      const record = this.repos.transaction('record-prediction', () =>
        this.predictions.recordPrediction({
          headline: request.headline,
          source: normalizeSource(request.source),
          contentType: normalizeContentType(request.contentType),
          predictedScore: result.score,
          inputsSnapshot: {
            input: {
              headline: request.headline,
              source: request.source,
              contentType: request.contentType,
              economic: request.economic ?? null,
              fallbackScore: request.fallbackScore ?? null,
            },
            explanation: result.explanation,
          },
        })
      );
      return { predictionId: record.predictionId, ...result, recorded: true };
    } catch (error) {
      if (!(error instanceof StorageUnavailableError)) throw error;
      this.logger.error({ error: error.message }, 'Prediction not recorded');
      return { predictionId: null, ...result, recorded: false };
    }
  }

  /**
   * Remember which headlines went out in a digest, so digest feedback can be
   * applied to each of them. Returns the number of entries stored.
   */
  registerDigest(registration: DigestRegistration): number {
    const { digestId, entries } = parseInput(digestRegistrationSchema, registration);

    return this.repos.transaction('register-digest', () => {
      if (this.repos.digests.exists(digestId)) {
        throw new ValidationError('digestId', `digestId: digest "${digestId}" is already registered`);
      }

      const rows: DigestEntry[] = entries.map((entry, position) => {
        let predictedScore = entry.predictedScore ?? null;
        if (predictedScore === null && entry.predictionId !== undefined) {
          predictedScore = this.predictions.get(entry.predictionId)?.predictedScore ?? null;
        }
        return {
          digestId,
          position,
          articleId: entry.articleId ?? null,
          headline: entry.headline,
          source: normalizeSource(entry.source),
          contentType: normalizeContentType(entry.contentType),
          predictionId: entry.predictionId ?? null,
          predictedScore,
        };
      });
      this.repos.digests.insertEntries(rows);

      this.logger.info({ digestId, entries: rows.length }, 'Digest registered');
      return rows.length;
    });
  }

  ingestDigestFeedback(input: DigestFeedbackInput): IngestResult {
    return this.ingester.ingestDigestFeedback(input);
  }

  ingestArticleFeedback(input: ArticleFeedbackInput): IngestResult {
    return this.ingester.ingestArticleFeedback(input);
  }

  reportFalsePositive(input: FalsePositiveInput): IngestResult {
    return this.ingester.reportFalsePositive(input);
  }

  reportMissedSignal(input: MissedSignalInput): IngestResult {
    return this.ingester.reportMissedSignal(input);
  }

  feedbackSummary(days: number): FeedbackSummary {
    return this.ingester.summary(days);
  }

  /**
   * Snapshot of what has been learned. Reads only: calling it twice without
   * writes in between gives the same result.
   */
  intelligenceReport(): IntelligenceReport {
    return this.repos.read('intelligence-report', () => {
      const patterns = this.patterns.snapshot();
      const keywords = this.keywords.snapshot();
      const sources = this.sources.readAll();

      const topKeywords = [...keywords.healthy]
        .sort((a, b) => b.weight - a.weight || a.term.localeCompare(b.term))
        .slice(0, TOP_KEYWORDS)
        .map((k) => ({ term: k.term, weight: round(k.weight), sampleCount: k.sampleCount }));

      return {
        patternCount: this.patterns.count(),
        keywordCount: this.keywords.count(),
        topKeywords,
        sourceScores: sources.readings.map((r) => ({
          source: r.source,
          contentType: r.contentType,
          reliability: round(r.reliability),
          sampleCount: r.sampleCount,
        })),
        accuracySummary: this.predictions.accuracyReport(),
        quarantined: {
          patterns: patterns.quarantined,
          keywords: keywords.quarantined,
          sources: sources.quarantined,
        },
      };
    });
  }

  /**
   * Run one pattern confidence decay pass as a single transaction.
   */
  decay(now: Date = this.clock()): DecayResult {
    const patternsDecayed = this.repos.transaction('decay', () => this.patterns.decay(now));
    this.logger.info({ patternsDecayed }, 'Decay pass complete');
    return { patternsDecayed };
  }
}

export function createUrgencyEngine(options: UrgencyEngineOptions): UrgencyEngine {
  return new UrgencyEngine(options);
}
