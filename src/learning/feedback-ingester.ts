import type { Logger } from '../types/logger.js';
import type {
  ArticleFeedback,
  ArticleFeedbackType,
  DigestFeedback,
  DigestFeedbackType,
  FalsePositiveReport,
  FeedbackKind,
  IngestResult,
  MissedSignalReport,
} from '../types/feedback.js';
import { isRatedVerdict, reportKey } from '../types/feedback.js';
import type { LearningRepositories } from '../ports/repositories.js';
import { DuplicateFeedbackError, ValidationError } from '../core/errors.js';
import type { Clock, FeedbackLearningConfig } from './types.js';
import { DEFAULT_LEARNING_CONFIG, systemClock } from './types.js';
import type { PatternStore } from './pattern-store.js';
import type { KeywordWeightTracker } from './keyword-weight-tracker.js';
import type { SourceReliabilityTracker } from './source-reliability-tracker.js';
import { normalizeContentType, normalizeSource } from './source-reliability-tracker.js';
import type { PredictionTracker } from './prediction-tracker.js';
import { classifyArticleFeedback, classifyDigestFeedback, findInsight } from './feedback-classification.js';
import type { ArticleFeedbackInput, DigestFeedbackInput, FalsePositiveInput, MissedSignalInput } from './schemas.js';
import {
  articleFeedbackSchema,
  digestFeedbackSchema,
  falsePositiveSchema,
  missedSignalSchema,
  parseInput,
} from './schemas.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface FeedbackIngesterDeps {
  repos: LearningRepositories;
  patterns: PatternStore;
  keywords: KeywordWeightTracker;
  sources: SourceReliabilityTracker;
  predictions: PredictionTracker;
}

export interface SourceFeedbackSummary {
  source: string;
  rated: number;
  irrelevant: number;
  averageRating: number | null;
}

/**
 * Aggregate of the feedback received over a recent window.
 */
export interface FeedbackSummary {
  days: number;
  digest: {
    count: number;
    averageRating: number | null;
    byType: Record<DigestFeedbackType, number>;
  };
  articles: {
    count: number;
    rated: number;
    irrelevant: number;
    averageRating: number | null;
    byType: Record<ArticleFeedbackType, number>;
    bySource: SourceFeedbackSummary[];
  };
  reports: {
    falsePositives: number;
    missedSignals: number;
  };
  insights: { phrase: string; count: number }[];
}

function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * FeedbackIngester - turns user ratings into learning.
 *
 * Each feedback item is validated, checked for duplicates and applied to
 * every tracker inside one store transaction, so either all of its updates
 * land together with the feedback record or none do. Rejections come back
 * as a status; only storage failures throw.
 */
export class FeedbackIngester {
  private readonly deps: FeedbackIngesterDeps;
  private readonly logger: Logger;
  private readonly config: FeedbackLearningConfig;
  private readonly clock: Clock;

  constructor(
    deps: FeedbackIngesterDeps,
    logger: Logger,
    config: FeedbackLearningConfig = DEFAULT_LEARNING_CONFIG.feedback,
    options: { clock?: Clock } = {}
  ) {
    this.deps = deps;
    this.logger = logger.child({ component: 'feedback-ingester' });
    this.config = config;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Rating for a whole digest, applied to each of its headlines at digest
   * weight.
   */
  ingestDigestFeedback(input: DigestFeedbackInput): IngestResult {
    return this.ingest('digest', () => {
      const feedback = parseInput(digestFeedbackSchema, input);
      const { repos, patterns, keywords, sources, predictions } = this.deps;

      const entries = repos.digests.entries(feedback.digestId);
      if (entries.length === 0) {
        throw new ValidationError('digestId', `digestId: unknown digest "${feedback.digestId}"`);
      }
      if (repos.feedback.exists('digest', feedback.digestId)) {
        throw new DuplicateFeedbackError('digest', feedback.digestId);
      }

      const weight = this.config.digestWeight;
      const predicted: number[] = [];

      for (const entry of entries) {
        patterns.learn(entry.headline, feedback.rating, weight);
        keywords.learn(entry.headline, feedback.rating, weight);

        if (entry.predictedScore !== null) {
          predicted.push(entry.predictedScore);
          sources.recordOutcome(entry.source, entry.contentType, entry.predictedScore, feedback.rating, weight);
        }
        if (entry.predictionId !== null) {
          predictions.attachOutcome({ predictionId: entry.predictionId }, feedback.rating);
        }
      }

      const record: DigestFeedback = {
        kind: 'digest',
        digestId: feedback.digestId,
        rating: feedback.rating,
        comment: feedback.comment,
        createdAt: this.clock(),
        feedbackType: classifyDigestFeedback(feedback.rating, mean(predicted)),
        insight: findInsight(feedback.comment),
      };
      repos.feedback.insert(record);

      this.logger.info(
        {
          digestId: record.digestId,
          rating: record.rating,
          headlines: entries.length,
          feedbackType: record.feedbackType,
        },
        'Digest feedback applied'
      );
      return { status: 'applied', headlinesApplied: entries.length };
    });
  }

  /**
   * Rating (or irrelevant mark) for one article, applied at article weight.
   */
  ingestArticleFeedback(input: ArticleFeedbackInput): IngestResult {
    return this.ingest('article', () => {
      const feedback = parseInput(articleFeedbackSchema, input);
      const { repos, patterns, keywords, sources, predictions } = this.deps;

      const source = normalizeSource(feedback.source);
      const contentType = normalizeContentType(feedback.contentType);
      if (!source || !sources.isKnown(source)) {
        throw new ValidationError('source', `source: unknown source "${feedback.source}"`);
      }
      if (repos.feedback.exists('article', feedback.articleId)) {
        throw new DuplicateFeedbackError('article', feedback.articleId);
      }

      const weight = this.config.articleWeight;
      const createdAt = this.clock();
      let record: ArticleFeedback;

      if (feedback.rating !== undefined) {
        const rating = feedback.rating;
        const prediction = predictions.find(feedback.headline, source, createdAt, this.config.outcomeWindowMs);

        patterns.learn(feedback.headline, rating, weight);
        keywords.learn(feedback.headline, rating, weight);
        if (prediction) {
          sources.recordOutcome(source, contentType, prediction.predictedScore, rating, weight);
          predictions.attachOutcome({ predictionId: prediction.predictionId }, rating);
        }

        record = {
          kind: 'article',
          articleId: feedback.articleId,
          headline: feedback.headline,
          source,
          contentType,
          verdict: { rating },
          comment: feedback.comment,
          createdAt,
          feedbackType: classifyArticleFeedback(rating, prediction?.predictedScore ?? null),
          insight: findInsight(feedback.comment),
        };
      } else {
        // Source reliability is untouched.
        this.trainNotUrgent(feedback.headline);

        record = {
          kind: 'article',
          articleId: feedback.articleId,
          headline: feedback.headline,
          source,
          contentType,
          verdict: { irrelevant: true },
          comment: feedback.comment,
          createdAt,
          feedbackType: 'irrelevant',
          insight: findInsight(feedback.comment),
        };
      }

      repos.feedback.insert(record);

      this.logger.info(
        {
          articleId: record.articleId,
          source,
          feedbackType: record.feedbackType,
        },
        'Article feedback applied'
      );
      return { status: 'applied', headlinesApplied: 1 };
    });
  }

  /**
   * A headline that was flagged urgent but should not have been. Trained
   * toward "not urgent" like an irrelevant article; the same headline is only
   * counted once.
   */
  reportFalsePositive(input: FalsePositiveInput): IngestResult {
    return this.ingest('false_positive', () => {
      const report = parseInput(falsePositiveSchema, input);
      const { repos } = this.deps;

      const key = reportKey(report.headline);
      if (repos.feedback.exists('false_positive', key)) {
        throw new DuplicateFeedbackError('false_positive', key);
      }

      this.trainNotUrgent(report.headline);

      const record: FalsePositiveReport = {
        kind: 'false_positive',
        headline: report.headline,
        reason: report.reason,
        createdAt: this.clock(),
      };
      repos.feedback.insert(record);

      this.logger.info({ headline: record.headline, reason: record.reason }, 'False positive recorded');
      return { status: 'applied', headlinesApplied: 1 };
    });
  }

  /**
   * An event the engine should have flagged. There is no headline to learn
   * from, so the report is only recorded and counted in the summary.
   */
  reportMissedSignal(input: MissedSignalInput): IngestResult {
    return this.ingest('missed_signal', () => {
      const report = parseInput(missedSignalSchema, input);
      const { repos } = this.deps;

      const key = reportKey(report.event);
      if (repos.feedback.exists('missed_signal', key)) {
        throw new DuplicateFeedbackError('missed_signal', key);
      }

      const record: MissedSignalReport = {
        kind: 'missed_signal',
        event: report.event,
        details: report.details,
        createdAt: this.clock(),
      };
      repos.feedback.insert(record);

      this.logger.info({ event: record.event }, 'Missed signal recorded');
      return { status: 'applied', headlinesApplied: 0 };
    });
  }

  /**
   * Feedback received over the last `days` days.
   */
  summary(days: number): FeedbackSummary {
    if (!Number.isFinite(days) || days <= 0) {
      throw new ValidationError('days', 'days: must be a positive number');
    }

    const since = new Date(this.clock().getTime() - days * DAY_MS);
    const records = this.deps.repos.read('feedback-summary', () => this.deps.repos.feedback.since(since));

    const digestRatings: number[] = [];
    const digestTypes: Record<DigestFeedbackType, number> = { accurate: 0, inaccurate: 0, unscored: 0 };
    const articleRatings: number[] = [];
    const articleTypes: Record<ArticleFeedbackType, number> = {
      ai_overrated: 0,
      ai_underrated: 0,
      reasonable_match: 0,
      significant_difference: 0,
      unscored: 0,
      irrelevant: 0,
    };
    const bySource = new Map<string, { ratings: number[]; irrelevant: number }>();
    const insights = new Map<string, number>();
    let articleCount = 0;
    let irrelevantCount = 0;
    let falsePositives = 0;
    let missedSignals = 0;

    for (const record of records) {
      if (record.kind === 'false_positive') {
        falsePositives++;
        continue;
      }
      if (record.kind === 'missed_signal') {
        missedSignals++;
        continue;
      }

      if (record.insight) {
        insights.set(record.insight, (insights.get(record.insight) ?? 0) + 1);
      }

      if (record.kind === 'digest') {
        digestRatings.push(record.rating);
        digestTypes[record.feedbackType]++;
        continue;
      }

      articleCount++;
      articleTypes[record.feedbackType]++;
      const entry = bySource.get(record.source) ?? { ratings: [], irrelevant: 0 };
      if (isRatedVerdict(record.verdict)) {
        articleRatings.push(record.verdict.rating);
        entry.ratings.push(record.verdict.rating);
      } else {
        irrelevantCount++;
        entry.irrelevant++;
      }
      bySource.set(record.source, entry);
    }

    return {
      days,
      digest: {
        count: digestRatings.length,
        averageRating: mean(digestRatings),
        byType: digestTypes,
      },
      articles: {
        count: articleCount,
        rated: articleRatings.length,
        irrelevant: irrelevantCount,
        averageRating: mean(articleRatings),
        byType: articleTypes,
        bySource: [...bySource.entries()]
          .sort(([a], [b]) => a.localeCompare(b))
          .map(([source, entry]) => ({
            source,
            rated: entry.ratings.length,
            irrelevant: entry.irrelevant,
            averageRating: mean(entry.ratings),
          })),
      },
      reports: { falsePositives, missedSignals },
      insights: [...insights.entries()]
        .sort(([a, countA], [b, countB]) => countB - countA || a.localeCompare(b))
        .map(([phrase, count]) => ({ phrase, count })),
    };
  }

  /**
   * Train a headline toward "not urgent". When its score came from a near
   * match, that pattern is trained as well.
   */
  private trainNotUrgent(headline: string): void {
    const { patterns, keywords } = this.deps;
    const { irrelevantUrgency, articleWeight } = this.config;

    const matched = patterns.match(headline);
    patterns.learn(headline, irrelevantUrgency, articleWeight);
    if (matched && !matched.exact) {
      patterns.reinforce(matched.pattern, irrelevantUrgency, articleWeight);
    }
    keywords.learn(headline, irrelevantUrgency, articleWeight);
  }

  private ingest(kind: FeedbackKind, apply: () => IngestResult): IngestResult {
    try {
      return this.deps.repos.transaction(`ingest-${kind}-feedback`, apply);
    } catch (error) {
      if (error instanceof DuplicateFeedbackError) {
        this.logger.info({ kind, key: error.key }, 'Duplicate feedback rejected');
        return { status: 'rejected_duplicate', reason: error.message };
      }
      if (error instanceof ValidationError) {
        this.logger.warn({ kind, field: error.field, reason: error.message }, 'Invalid feedback rejected');
        return { status: 'rejected_invalid', reason: error.message };
      }
      throw error;
    }
  }
}
