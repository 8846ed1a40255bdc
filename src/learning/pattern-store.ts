import type { Logger } from '../types/logger.js';
import type { PatternRepo } from '../ports/repositories.js';
import type { Clock, Pattern, PatternLearningConfig } from './types.js';
import { DEFAULT_LEARNING_CONFIG, clamp, systemClock } from './types.js';
import type { HeadlineSignature } from './headline-features.js';
import { headlineSignature, signatureTerms, termSimilarity } from './headline-features.js';
import { QuarantineLog, isValidDate } from './quarantine.js';

/**
 * A stored pattern that matched an incoming headline.
 */
export interface PatternMatch {
  pattern: Pattern;
  /** Derived urgency of the pattern, 0-10 */
  urgency: number;
  /** Pattern confidence, scaled by similarity for near matches */
  confidence: number;
  /** Term similarity to the headline (1 for exact) */
  similarity: number;
  exact: boolean;
}

export interface PatternStoreOptions {
  clock?: Clock;
  minKeywordLength?: number;
  quarantine?: QuarantineLog;
}

/**
 * PatternStore - learned headline patterns and their urgency correlation.
 *
 * Each pattern accumulates weighted urgency samples. Its confidence is a
 * saturating function of the sample count, capped at confidenceCeiling, and
 * erodes while the pattern goes unused. Patterns are never deleted.
 */
export class PatternStore {
  private readonly repo: PatternRepo;
  private readonly logger: Logger;
  private readonly config: PatternLearningConfig;
  private readonly clock: Clock;
  private readonly minKeywordLength: number;
  private readonly quarantine: QuarantineLog;

  constructor(
    repo: PatternRepo,
    logger: Logger,
    config: PatternLearningConfig = DEFAULT_LEARNING_CONFIG.patterns,
    options: PatternStoreOptions = {}
  ) {
    this.repo = repo;
    this.logger = logger.child({ component: 'pattern-store' });
    this.config = config;
    this.clock = options.clock ?? systemClock;
    this.minKeywordLength = options.minKeywordLength ?? DEFAULT_LEARNING_CONFIG.keywords.minKeywordLength;
    this.quarantine = options.quarantine ?? new QuarantineLog(this.logger);
  }

  signatureOf(headline: string): HeadlineSignature {
    return headlineSignature(headline, this.minKeywordLength);
  }

  /**
   * Confidence for a sample count: ceiling * (1 - e^(-n/scale)).
   */
  confidenceFor(sampleCount: number): number {
    if (sampleCount <= 0) return 0;
    const { confidenceCeiling, confidenceScale } = this.config;
    return Math.min(confidenceCeiling, confidenceCeiling * (1 - Math.exp(-sampleCount / confidenceScale)));
  }

  /**
   * Mean observed urgency of a pattern, clamped to 0-10.
   */
  derivedUrgency(pattern: Pattern): number {
    if (pattern.sampleCount <= 0) return 0;
    return clamp(pattern.sampleUrgencySum / pattern.sampleCount, 0, 10);
  }

  /**
   * Why a stored pattern cannot be trusted, or null if it is sound.
   */
  inspect(pattern: Pattern): string | null {
    const { sampleUrgencySum, sampleCount, confidence } = pattern;
    if (!Number.isFinite(sampleUrgencySum) || !Number.isFinite(sampleCount)) {
      return 'non-finite sample totals';
    }
    if (sampleCount < 0) {
      return 'negative sample count';
    }
    if (sampleCount === 0 && sampleUrgencySum !== 0) {
      return 'zero sample count with non-zero urgency sum';
    }
    if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
      return 'confidence outside 0-1';
    }
    if (!isValidDate(pattern.lastUpdated)) {
      return 'unreadable last_updated';
    }
    return null;
  }

  /**
   * Fold one urgency observation into a pattern.
   *
   * weightMultiplier is the training weight of the feedback (2 for article,
   * 1 for digest): the sample counts that many times. Returns null when the
   * stored pattern is quarantined and was left untouched.
   */
  upsert(signature: HeadlineSignature, observedUrgency: number, weightMultiplier: number): Pattern | null {
    const observed = clamp(observedUrgency, 0, 10);
    const existing = this.repo.get(signature.signature);

    if (existing && !this.isHealthy(existing)) {
      return null;
    }

    const sampleUrgencySum = (existing?.sampleUrgencySum ?? 0) + observed * weightMultiplier;
    const sampleCount = (existing?.sampleCount ?? 0) + weightMultiplier;

    const pattern: Pattern = {
      signature: signature.signature,
      shapeKey: signature.shapeKey,
      sampleUrgencySum,
      sampleCount,
      confidence: this.confidenceFor(sampleCount),
      lastUpdated: this.clock(),
    };
    this.repo.save(pattern);

    this.logger.debug(
      {
        signature: pattern.signature,
        observed,
        weightMultiplier,
        sampleCount,
        confidence: pattern.confidence.toFixed(3),
      },
      existing ? 'Pattern updated' : 'Pattern created'
    );

    return pattern;
  }

  /**
   * Signature the headline and fold the observation in.
   */
  learn(headline: string, observedUrgency: number, weightMultiplier: number): Pattern | null {
    return this.upsert(this.signatureOf(headline), observedUrgency, weightMultiplier);
  }

  /**
   * Fold an observation into a stored pattern other than the headline's own,
   * such as the near match a negative verdict was aimed at.
   */
  reinforce(pattern: Pattern, observedUrgency: number, weightMultiplier: number): Pattern | null {
    return this.upsert(
      { signature: pattern.signature, shapeKey: pattern.shapeKey, terms: signatureTerms(pattern.signature) },
      observedUrgency,
      weightMultiplier
    );
  }

  /**
   * Find the stored pattern for a headline: the exact signature or the most
   * similar pattern with the same shape, whichever is more confident. A near
   * match's confidence is scaled by its similarity; on a tie the exact match
   * wins. Patterns with fewer than minMatchSamples samples never match.
   */
  match(headline: string): PatternMatch | null {
    const signature = this.signatureOf(headline);
    const { minMatchSamples, nearMatchSimilarity } = this.config;

    let best: PatternMatch | null = null;
    const exact = this.repo.get(signature.signature);
    if (exact && this.isHealthy(exact) && exact.sampleCount >= minMatchSamples) {
      best = {
        pattern: exact,
        urgency: this.derivedUrgency(exact),
        confidence: exact.confidence,
        similarity: 1,
        exact: true,
      };
    }

    for (const candidate of this.repo.findByShape(signature.shapeKey)) {
      if (candidate.signature === signature.signature) continue;
      if (!this.isHealthy(candidate) || candidate.sampleCount < minMatchSamples) continue;

      const similarity = termSimilarity(signature.terms, signatureTerms(candidate.signature));
      if (similarity < nearMatchSimilarity) continue;

      const confidence = candidate.confidence * similarity;
      if (!best || confidence > best.confidence) {
        best = {
          pattern: candidate,
          urgency: this.derivedUrgency(candidate),
          confidence,
          similarity,
          exact: false,
        };
      }
    }

    return best;
  }

  /**
   * Erode confidence of patterns idle for longer than decayWindowMs.
   *
   * Confidence becomes f(sampleCount) * decayFactor^windows, where windows is
   * the number of whole decay windows since the last update. It never rises
   * and never goes below confidenceFloor, and a second pass at the same time
   * changes nothing. Call inside a store transaction.
   */
  decay(now: Date = this.clock()): number {
    const { decayWindowMs, decayFactor, confidenceFloor } = this.config;
    let decayed = 0;

    for (const pattern of this.repo.all()) {
      if (!this.isHealthy(pattern)) continue;

      const idleMs = now.getTime() - pattern.lastUpdated.getTime();
      if (idleMs <= decayWindowMs) continue;

      const windows = Math.floor(idleMs / decayWindowMs);
      const target = Math.max(
        confidenceFloor,
        this.confidenceFor(pattern.sampleCount) * Math.pow(decayFactor, windows)
      );
      const next = Math.min(pattern.confidence, target);

      if (next < pattern.confidence) {
        this.repo.setConfidence(pattern.signature, next);
        decayed++;
      }
    }

    if (decayed > 0) {
      this.logger.info({ decayed }, 'Pattern confidence decayed');
    }
    return decayed;
  }

  count(): number {
    return this.repo.count();
  }

  /**
   * All patterns, split into sound and quarantined.
   */
  snapshot(): { healthy: Pattern[]; quarantined: number } {
    let quarantined = 0;
    const healthy: Pattern[] = [];
    for (const pattern of this.repo.all()) {
      if (this.isHealthy(pattern)) {
        healthy.push(pattern);
      } else {
        quarantined++;
      }
    }
    return { healthy, quarantined };
  }

  private isHealthy(pattern: Pattern): boolean {
    const reason = this.inspect(pattern);
    if (reason === null) return true;
    this.quarantine.report('pattern', pattern.signature, reason);
    return false;
  }
}
