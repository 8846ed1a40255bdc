import type { UrgencyLevel } from '../types/headline.js';

/**
 * A learned structural fingerprint of a headline.
 */
export interface Pattern {
  signature: string;
  /** Marker and shape part of the signature, used for near matching */
  shapeKey: string;
  sampleUrgencySum: number;
  sampleCount: number;
  confidence: number;
  lastUpdated: Date;
}

export interface KeywordWeight {
  term: string;
  /** Running weighted average of observed urgency, 0-10 */
  weight: number;
  sampleCount: number;
  lastUpdated: Date;
}

export interface SourceReliability {
  source: string;
  contentType: string;
  /** 0-1; 0.5 is neutral */
  reliability: number;
  sampleCount: number;
  lastUpdated: Date;
}

export interface PredictionRecord {
  predictionId: string;
  headline: string;
  source: string;
  contentType: string;
  inputsSnapshot: Record<string, unknown>;
  predictedScore: number;
  urgencyLevel: UrgencyLevel;
  predictedAt: Date;
  realizedScore: number | null;
  /** predicted - realized */
  error: number | null;
  resolvedAt: Date | null;
}

/**
 * One headline of a delivered digest.
 */
export interface DigestEntry {
  digestId: string;
  position: number;
  articleId: string | null;
  headline: string;
  source: string;
  contentType: string;
  predictionId: string | null;
  predictedScore: number | null;
}

export interface PatternLearningConfig {
  /** Upper bound on pattern confidence */
  confidenceCeiling: number;
  /** Samples needed to reach ~63% of the ceiling */
  confidenceScale: number;
  /** Patterns with fewer samples never match */
  minMatchSamples: number;
  /** Minimum term similarity for a near match (0-1) */
  nearMatchSimilarity: number;
  /** Untouched for longer than this, confidence starts to decay (ms) */
  decayWindowMs: number;
  /** Confidence multiplier per elapsed window */
  decayFactor: number;
  /** Decay never takes confidence below this */
  confidenceFloor: number;
}

export interface KeywordLearningConfig {
  /** EMA learning rate (alpha) for weight 1 feedback */
  learningRate: number;
  /** Sample count at which a keyword counts half as confident */
  confidenceK: number;
  /** Shorter tokens are ignored */
  minKeywordLength: number;
}

export interface SourceLearningConfig {
  /** EMA learning rate for weight 1 feedback */
  learningRate: number;
  /** Fewer samples report neutral reliability */
  minSamples: number;
  /** Exponential decay toward neutral per idle day */
  decayRatePerDay: number;
  /** Reported reliability never drops below this */
  reliabilityFloor: number;
  /** When non-empty, feedback from other sources is rejected */
  knownSources: string[];
}

export interface FeedbackLearningConfig {
  /** Training weight of per-article feedback */
  articleWeight: number;
  /** Training weight of whole-digest feedback */
  digestWeight: number;
  /** Urgency an irrelevant article is trained toward */
  irrelevantUrgency: number;
  /** Best-effort prediction lookup window for article feedback (ms) */
  outcomeWindowMs: number;
}

export interface PredictionConfig {
  /** Weight of the pattern signal in the blend */
  patternWeight: number;
  /** Weight of the keyword signal in the blend */
  keywordWeight: number;
  /** Pattern match confidence needed to fire */
  patternConfidenceThreshold: number;
  /** Keyword signal confidence needed to fire */
  keywordConfidenceThreshold: number;
  /** Lowest trust factor a poor source can get */
  minTrustFactor: number;
  /** Neutral urgency that low trust dampens toward */
  neutralUrgency: number;
  /** Used when nothing fires and no external score is given */
  defaultFallbackScore: number;
  /** Scale of the economic snapshot contribution */
  economicWeight: number;
  /** Cap on the economic contribution, either direction */
  maxEconomicBoost: number;
}

/**
 * Every tunable of the learning engine.
 */
export interface LearningConfig {
  patterns: PatternLearningConfig;
  keywords: KeywordLearningConfig;
  sources: SourceLearningConfig;
  feedback: FeedbackLearningConfig;
  prediction: PredictionConfig;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_LEARNING_CONFIG: LearningConfig = {
  patterns: {
    confidenceCeiling: 0.95,
    confidenceScale: 3,
    minMatchSamples: 2,
    nearMatchSimilarity: 0.6,
    decayWindowMs: 14 * DAY_MS,
    decayFactor: 0.9,
    confidenceFloor: 0.05,
  },
  keywords: {
    learningRate: 0.1,
    confidenceK: 5,
    minKeywordLength: 3,
  },
  sources: {
    learningRate: 0.2,
    minSamples: 3,
    decayRatePerDay: 0.02,
    reliabilityFloor: 0.1,
    knownSources: [],
  },
  feedback: {
    articleWeight: 2,
    digestWeight: 1,
    irrelevantUrgency: 0,
    outcomeWindowMs: 7 * DAY_MS,
  },
  prediction: {
    patternWeight: 0.5,
    keywordWeight: 0.3,
    patternConfidenceThreshold: 0.6,
    keywordConfidenceThreshold: 0.3,
    minTrustFactor: 0.5,
    neutralUrgency: 5,
    defaultFallbackScore: 5,
    economicWeight: 1,
    maxEconomicBoost: 1.5,
  },
};

export const NEUTRAL_RELIABILITY = 0.5;

/**
 * Clock injected into trackers so decay and staleness are testable.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
