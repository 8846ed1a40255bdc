import type { Logger } from '../types/logger.js';
import type { KeywordRepo } from '../ports/repositories.js';
import type { Clock, KeywordLearningConfig, KeywordWeight } from './types.js';
import { DEFAULT_LEARNING_CONFIG, clamp, systemClock } from './types.js';
import { extractKeywords } from './headline-features.js';
import { QuarantineLog, isValidDate } from './quarantine.js';

export interface KeywordContribution {
  term: string;
  weight: number;
  sampleCount: number;
  /** n / (n + K) */
  confidence: number;
}

/**
 * Keyword signal for one headline.
 */
export interface KeywordScore {
  /** Confidence-weighted mean of the matched weights, 0-10 */
  score: number;
  /** N / (N + K) over the summed sample count */
  confidence: number;
  terms: KeywordContribution[];
}

export interface KeywordWeightTrackerOptions {
  clock?: Clock;
  /** Starting weight of a term never seen before */
  neutralUrgency?: number;
  quarantine?: QuarantineLog;
}

/**
 * KeywordWeightTracker - per-keyword urgency weights learned from feedback.
 *
 * A weight is an exponential moving average of the urgency observed on
 * headlines containing the keyword. The effective rate is alpha scaled by the
 * feedback's training weight, so article feedback moves a weight twice as far
 * as digest feedback. Rare keywords get low confidence and barely register.
 */
export class KeywordWeightTracker {
  private readonly repo: KeywordRepo;
  private readonly logger: Logger;
  private readonly config: KeywordLearningConfig;
  private readonly clock: Clock;
  private readonly neutralUrgency: number;
  private readonly quarantine: QuarantineLog;

  constructor(
    repo: KeywordRepo,
    logger: Logger,
    config: KeywordLearningConfig = DEFAULT_LEARNING_CONFIG.keywords,
    options: KeywordWeightTrackerOptions = {}
  ) {
    this.repo = repo;
    this.logger = logger.child({ component: 'keyword-tracker' });
    this.config = config;
    this.clock = options.clock ?? systemClock;
    this.neutralUrgency = options.neutralUrgency ?? DEFAULT_LEARNING_CONFIG.prediction.neutralUrgency;
    this.quarantine = options.quarantine ?? new QuarantineLog(this.logger);
  }

  extractKeywords(headline: string): Set<string> {
    return extractKeywords(headline, this.config.minKeywordLength);
  }

  inspect(keyword: KeywordWeight): string | null {
    if (!Number.isFinite(keyword.weight) || keyword.weight < 0 || keyword.weight > 10) {
      return 'weight outside 0-10';
    }
    if (!Number.isFinite(keyword.sampleCount) || keyword.sampleCount < 0) {
      return 'invalid sample count';
    }
    if (!isValidDate(keyword.lastUpdated)) {
      return 'unreadable last_updated';
    }
    return null;
  }

  /**
   * Move one keyword's weight toward an observed urgency.
   * Returns null when the stored keyword is quarantined.
   */
  update(term: string, observedUrgency: number, weightMultiplier: number): KeywordWeight | null {
    const existing = this.repo.get(term);
    if (existing && !this.isHealthy(existing)) {
      return null;
    }

    const rate = Math.min(1, this.config.learningRate * weightMultiplier);
    const previous = existing?.weight ?? this.neutralUrgency;
    const observed = clamp(observedUrgency, 0, 10);

    const keyword: KeywordWeight = {
      term,
      weight: clamp(previous * (1 - rate) + observed * rate, 0, 10),
      sampleCount: (existing?.sampleCount ?? 0) + weightMultiplier,
      lastUpdated: this.clock(),
    };
    this.repo.save(keyword);
    return keyword;
  }

  /**
   * Update every keyword of a headline. Returns how many were updated.
   */
  learn(headline: string, observedUrgency: number, weightMultiplier: number): number {
    let updated = 0;
    for (const term of this.extractKeywords(headline)) {
      if (this.update(term, observedUrgency, weightMultiplier)) {
        updated++;
      }
    }

    this.logger.debug({ updated, observedUrgency, weightMultiplier }, 'Keyword weights updated');
    return updated;
  }

  /**
   * Keyword signal for a headline, or null when no known keyword matches.
   */
  score(headline: string): KeywordScore | null {
    const terms = [...this.extractKeywords(headline)];
    if (terms.length === 0) return null;

    const { confidenceK } = this.config;
    const contributions: KeywordContribution[] = [];
    for (const keyword of this.repo.getMany(terms)) {
      if (!this.isHealthy(keyword) || keyword.sampleCount <= 0) continue;
      contributions.push({
        term: keyword.term,
        weight: keyword.weight,
        sampleCount: keyword.sampleCount,
        confidence: keyword.sampleCount / (keyword.sampleCount + confidenceK),
      });
    }

    if (contributions.length === 0) return null;

    let weighted = 0;
    let confidenceSum = 0;
    let samples = 0;
    for (const c of contributions) {
      weighted += c.weight * c.confidence;
      confidenceSum += c.confidence;
      samples += c.sampleCount;
    }

    contributions.sort((a, b) => a.term.localeCompare(b.term));
    return {
      score: clamp(weighted / confidenceSum, 0, 10),
      confidence: samples / (samples + confidenceK),
      terms: contributions,
    };
  }

  count(): number {
    return this.repo.count();
  }

  snapshot(): { healthy: KeywordWeight[]; quarantined: number } {
    let quarantined = 0;
    const healthy: KeywordWeight[] = [];
    for (const keyword of this.repo.all()) {
      if (this.isHealthy(keyword)) {
        healthy.push(keyword);
      } else {
        quarantined++;
      }
    }
    return { healthy, quarantined };
  }

  private isHealthy(keyword: KeywordWeight): boolean {
    const reason = this.inspect(keyword);
    if (reason === null) return true;
    this.quarantine.report('keyword', keyword.term, reason);
    return false;
  }
}
