import { z } from 'zod';
import type { Logger } from '../types/logger.js';
import type { IngestResult } from '../types/feedback.js';
import type { HeadlineInput, UrgencyLevel } from '../types/headline.js';
import { ValidationError } from '../core/errors.js';
import type { UrgencyEngine } from '../learning/urgency-engine.js';
import {
  articleFeedbackSchema,
  digestFeedbackSchema,
  falsePositiveSchema,
  missedSignalSchema,
  parseInput,
  predictionInputSchema,
} from '../learning/schemas.js';

export const scoreBatchSchema = z.array(z.unknown()).min(1, 'at least one headline is required');

export const feedbackBatchSchema = z.object({
  digests: z.array(z.unknown()).default([]),
  articles: z.array(z.unknown()).default([]),
  falsePositives: z.array(z.unknown()).default([]),
  missedSignals: z.array(z.unknown()).default([]),
});

function isCollectorItem(item: unknown): item is Pick<HeadlineInput, 'title'> {
  return typeof item === 'object' && item !== null && !('headline' in item) && 'title' in item;
}

/**
 * Collector output names the headline `title`; map it onto `headline`.
 */
function fromCollector(item: unknown): unknown {
  return isCollectorItem(item) ? { ...item, headline: item.title } : item;
}

export type ScoredItem =
  | {
      index: number;
      predictionId: string | null;
      headline: string;
      score: number;
      urgencyLevel: UrgencyLevel;
      insufficientData: boolean;
    }
  | { index: number; error: string };

/**
 * Score a batch of headlines, given either as prediction inputs or as
 * collector items. Invalid items are reported in place and do not stop the
 * rest of the batch.
 */
export function scoreHeadlines(engine: UrgencyEngine, items: readonly unknown[], logger: Logger): ScoredItem[] {
  const results: ScoredItem[] = [];

  items.forEach((item, index) => {
    try {
      const input = parseInput(predictionInputSchema, fromCollector(item));
      const prediction = engine.predict(input);
      results.push({
        index,
        predictionId: prediction.predictionId,
        headline: input.headline,
        score: prediction.score,
        urgencyLevel: prediction.urgencyLevel,
        insufficientData: prediction.explanation.insufficientData,
      });
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      results.push({ index, error: error.message });
    }
  });

  const failed = results.filter((r) => 'error' in r).length;
  logger.info({ scored: results.length - failed, failed }, 'Headline batch scored');
  return results;
}

export interface FeedbackBatchResult {
  digests: IngestResult[];
  articles: IngestResult[];
  falsePositives: IngestResult[];
  missedSignals: IngestResult[];
  applied: number;
  rejected: number;
}

/**
 * Ingest a feedback session's digest and article ratings and its false
 * positive and missed signal reports, one transaction per item.
 */
export function applyFeedbackBatch(
  engine: UrgencyEngine,
  batch: z.output<typeof feedbackBatchSchema>,
  logger: Logger
): FeedbackBatchResult {
  const ingest = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, item: unknown, apply: (input: T) => IngestResult) => {
    try {
      return apply(parseInput(schema, item));
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      const result: IngestResult = { status: 'rejected_invalid', reason: error.message };
      return result;
    }
  };

  const digests = batch.digests.map((item) =>
    ingest(digestFeedbackSchema, item, (input) => engine.ingestDigestFeedback(input))
  );
  const articles = batch.articles.map((item) =>
    ingest(articleFeedbackSchema, item, (input) => engine.ingestArticleFeedback(input))
  );

  const falsePositives = batch.falsePositives.map((item) =>
    ingest(falsePositiveSchema, item, (input) => engine.reportFalsePositive(input))
  );
  const missedSignals = batch.missedSignals.map((item) =>
    ingest(missedSignalSchema, item, (input) => engine.reportMissedSignal(input))
  );

  const all = [...digests, ...articles, ...falsePositives, ...missedSignals];
  const applied = all.filter((r) => r.status === 'applied').length;
  const result = { digests, articles, falsePositives, missedSignals, applied, rejected: all.length - applied };

  logger.info({ applied: result.applied, rejected: result.rejected }, 'Feedback session ingested');
  return result;
}
