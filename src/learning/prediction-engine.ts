import type { Logger } from '../types/logger.js';
import type { EconomicSnapshot, UrgencyLevel } from '../types/headline.js';
import { urgencyLevel } from '../types/headline.js';
import type { PredictionConfig } from './types.js';
import { DEFAULT_LEARNING_CONFIG, NEUTRAL_RELIABILITY, clamp } from './types.js';
import type { PatternStore } from './pattern-store.js';
import type { KeywordWeightTracker } from './keyword-weight-tracker.js';
import type { SourceReliabilityTracker } from './source-reliability-tracker.js';
import { normalizeContentType, normalizeSource } from './source-reliability-tracker.js';

/**
 * Headline to score, after validation.
 */
export interface ScoringRequest {
  headline: string;
  source: string;
  contentType: string;
  economic?: EconomicSnapshot | undefined;
  /** Score from an external scorer, used when learning has nothing to say */
  fallbackScore?: number | undefined;
}

/**
 * One signal's part in the score.
 */
export interface SignalTrace {
  fired: boolean;
  /** Signal's own urgency, 0-10 (null if it did not match) */
  score: number | null;
  confidence: number;
  /** Blend weight actually used */
  weight: number;
  /** Points added on top of the baseline */
  contribution: number;
}

export interface PatternTrace extends SignalTrace {
  signature: string | null;
  exact: boolean;
  similarity: number;
  sampleCount: number;
}

export interface KeywordTrace extends SignalTrace {
  terms: { term: string; weight: number; sampleCount: number }[];
}

export type FallbackReason = 'insufficient_data' | 'storage_unavailable';

/**
 * Everything that went into a score. baseline + the contributions of the
 * pattern, keyword and fallback signals + the economic boost equals the score
 * before it is clamped to 0-10.
 */
export interface PredictionExplanation {
  baseline: number;
  pattern: PatternTrace;
  keyword: KeywordTrace;
  source: {
    source: string;
    contentType: string;
    reliability: number;
    trustFactor: number;
  };
  economic: {
    boost: number;
    components: Required<EconomicSnapshot>;
  };
  fallback: {
    used: boolean;
    reason: FallbackReason | null;
    origin: 'external' | 'default' | null;
    score: number | null;
    weight: number;
    contribution: number;
  };
  insufficientData: boolean;
}

export interface ScoreResult {
  score: number;
  urgencyLevel: UrgencyLevel;
  explanation: PredictionExplanation;
}

export interface PredictionEngineDeps {
  patterns: PatternStore;
  keywords: KeywordWeightTracker;
  sources: SourceReliabilityTracker;
}

function finiteOrZero(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) ? value : 0;
}

/**
 * PredictionEngine - blends the learned signals into an urgency score.
 *
 * The pattern match is the primary signal, keyword weights the secondary one.
 * Source reliability becomes a trust factor that pulls the learned part
 * toward the neutral midpoint. When neither signal is confident enough the
 * fallback score is returned as is. Reads only; recording is the caller's job.
 */
export class PredictionEngine {
  private readonly deps: PredictionEngineDeps;
  private readonly logger: Logger;
  private readonly config: PredictionConfig;

  constructor(
    deps: PredictionEngineDeps,
    logger: Logger,
    config: PredictionConfig = DEFAULT_LEARNING_CONFIG.prediction
  ) {
    this.deps = deps;
    this.logger = logger.child({ component: 'prediction-engine' });
    this.config = config;
  }

  /**
   * clamp(reliability / 0.5, minTrustFactor, 1)
   */
  trustFactor(reliability: number): number {
    return clamp(reliability / NEUTRAL_RELIABILITY, this.config.minTrustFactor, 1);
  }

  /**
   * Economic snapshot contribution, capped at +/- maxEconomicBoost.
   */
  economicBoost(snapshot: EconomicSnapshot | undefined): PredictionExplanation['economic'] {
    const components = {
      vix: finiteOrZero(snapshot?.vix),
      goldDelta: finiteOrZero(snapshot?.goldDelta),
      usdIndexDelta: finiteOrZero(snapshot?.usdIndexDelta),
      btcTrend: finiteOrZero(snapshot?.btcTrend),
    };
    const { economicWeight, maxEconomicBoost } = this.config;
    const raw =
      economicWeight *
      (components.vix + components.goldDelta + Math.abs(components.usdIndexDelta) - components.btcTrend);

    return { boost: clamp(raw, -maxEconomicBoost, maxEconomicBoost), components };
  }

  /**
   * Score from the fallback alone, without reading any learned state. Used
   * when the store cannot be read.
   */
  fallbackOnly(request: ScoringRequest, reason: FallbackReason): ScoreResult {
    const external = request.fallbackScore;
    const fallbackScore = external ?? this.config.defaultFallbackScore;
    const economic = this.economicBoost(request.economic);
    const score = clamp(fallbackScore + economic.boost, 0, 10);
    const unmatched = { fired: false, score: null, confidence: 0, weight: 0, contribution: 0 };

    const explanation: PredictionExplanation = {
      baseline: 0,
      pattern: { ...unmatched, signature: null, exact: false, similarity: 0, sampleCount: 0 },
      keyword: { ...unmatched, terms: [] },
      source: {
        source: normalizeSource(request.source),
        contentType: normalizeContentType(request.contentType),
        reliability: NEUTRAL_RELIABILITY,
        trustFactor: this.trustFactor(NEUTRAL_RELIABILITY),
      },
      economic,
      fallback: {
        used: true,
        reason,
        origin: external === undefined ? 'default' : 'external',
        score: fallbackScore,
        weight: 1,
        contribution: fallbackScore,
      },
      insufficientData: true,
    };

    this.logger.debug({ reason, score: score.toFixed(2) }, 'Headline scored from fallback only');
    return { score, urgencyLevel: urgencyLevel(score), explanation };
  }

  score(request: ScoringRequest): ScoreResult {
    const config = this.config;
    const mid = config.neutralUrgency;
    const source = normalizeSource(request.source);
    const contentType = normalizeContentType(request.contentType);

    const match = this.deps.patterns.match(request.headline);
    const keywordScore = this.deps.keywords.score(request.headline);
    const reliability = this.deps.sources.reliability(source, contentType);
    const trust = this.trustFactor(reliability);
    const economic = this.economicBoost(request.economic);

    const patternFired = match !== null && match.confidence >= config.patternConfidenceThreshold;
    const keywordFired = keywordScore !== null && keywordScore.confidence >= config.keywordConfidenceThreshold;

    const external = request.fallbackScore;
    const fallbackScore = external ?? config.defaultFallbackScore;
    const internalWeight = config.patternWeight + config.keywordWeight;

    let patternWeight = 0;
    let keywordWeight = 0;
    if (patternFired && keywordFired) {
      patternWeight = config.patternWeight;
      keywordWeight = config.keywordWeight;
    } else if (patternFired) {
      patternWeight = internalWeight;
    } else if (keywordFired) {
      keywordWeight = internalWeight;
    }

    const insufficientData = internalWeight <= 0 || (!patternFired && !keywordFired);

    let baseline = 0;
    let patternContribution = 0;
    let keywordContribution = 0;
    let fallbackWeight = 0;
    let fallbackContribution = 0;

    if (insufficientData) {
      fallbackWeight = 1;
      fallbackContribution = fallbackScore;
    } else {
      // Without an external score the learned blend carries all the weight.
      const scale = external === undefined ? 1 / internalWeight : 1;
      baseline = internalWeight * mid * scale;
      if (match && patternFired) {
        patternContribution = trust * patternWeight * (match.urgency - mid) * scale;
      }
      if (keywordScore && keywordFired) {
        keywordContribution = trust * keywordWeight * (keywordScore.score - mid) * scale;
      }
      if (external !== undefined) {
        fallbackWeight = 1 - internalWeight;
        fallbackContribution = fallbackWeight * external;
      }
    }

    const fallbackInPlay = insufficientData || external !== undefined;
    let fallbackOrigin: PredictionExplanation['fallback']['origin'] = null;
    if (fallbackInPlay) {
      fallbackOrigin = external === undefined ? 'default' : 'external';
    }

    const raw = baseline + patternContribution + keywordContribution + fallbackContribution + economic.boost;
    const score = clamp(raw, 0, 10);

    const explanation: PredictionExplanation = {
      baseline,
      pattern: {
        fired: patternFired,
        score: match?.urgency ?? null,
        confidence: match?.confidence ?? 0,
        weight: patternWeight,
        contribution: patternContribution,
        signature: match?.pattern.signature ?? null,
        exact: match?.exact ?? false,
        similarity: match?.similarity ?? 0,
        sampleCount: match?.pattern.sampleCount ?? 0,
      },
      keyword: {
        fired: keywordFired,
        score: keywordScore?.score ?? null,
        confidence: keywordScore?.confidence ?? 0,
        weight: keywordWeight,
        contribution: keywordContribution,
        terms: (keywordScore?.terms ?? []).map(({ term, weight, sampleCount }) => ({ term, weight, sampleCount })),
      },
      source: { source, contentType, reliability, trustFactor: trust },
      economic,
      fallback: {
        used: fallbackInPlay,
        reason: insufficientData ? 'insufficient_data' : null,
        origin: fallbackOrigin,
        score: fallbackInPlay ? fallbackScore : null,
        weight: fallbackWeight,
        contribution: fallbackContribution,
      },
      insufficientData,
    };

    this.logger.debug(
      {
        source,
        score: score.toFixed(2),
        patternFired,
        keywordFired,
        trust: trust.toFixed(2),
        insufficientData,
      },
      'Headline scored'
    );

    return { score, urgencyLevel: urgencyLevel(score), explanation };
  }
}
