/**
 * Learning module exports.
 */

export type {
  Pattern,
  KeywordWeight,
  SourceReliability,
  PredictionRecord,
  DigestEntry,
  LearningConfig,
  PatternLearningConfig,
  KeywordLearningConfig,
  SourceLearningConfig,
  FeedbackLearningConfig,
  PredictionConfig,
  Clock,
} from './types.js';
export { DEFAULT_LEARNING_CONFIG, NEUTRAL_RELIABILITY, systemClock } from './types.js';

export type { HeadlineSignature } from './headline-features.js';
export { extractKeywords, headlineSignature, tokenize } from './headline-features.js';

export type { PatternMatch } from './pattern-store.js';
export { PatternStore } from './pattern-store.js';
export type { KeywordScore } from './keyword-weight-tracker.js';
export { KeywordWeightTracker } from './keyword-weight-tracker.js';
export type { SourceReading } from './source-reliability-tracker.js';
export { SourceReliabilityTracker, normalizeSource } from './source-reliability-tracker.js';
export type { AccuracyReport, OutcomeRef } from './prediction-tracker.js';
export { PredictionTracker } from './prediction-tracker.js';
export type { FeedbackSummary } from './feedback-ingester.js';
export { FeedbackIngester } from './feedback-ingester.js';
export type { PredictionExplanation, ScoreResult } from './prediction-engine.js';
export { PredictionEngine } from './prediction-engine.js';
export type {
  ArticleFeedbackInput,
  DigestFeedbackInput,
  DigestRegistration,
  DigestEntryInput,
  FalsePositiveInput,
  MissedSignalInput,
  PredictionInput,
} from './schemas.js';
export type { Prediction, IntelligenceReport, DecayResult, UrgencyEngineOptions } from './urgency-engine.js';
export { UrgencyEngine, createUrgencyEngine } from './urgency-engine.js';
