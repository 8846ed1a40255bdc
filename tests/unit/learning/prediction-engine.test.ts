import { describe, it, expect, beforeEach } from 'vitest';
import type { PredictionExplanation } from '../../../src/learning/prediction-engine.js';
import { FIXED_NOW, createTestEngine, type TestEngine } from '../../helpers/factories.js';

const HEADLINE = 'Refinery fire halts output';
const SOURCE = 'reuters.com';

function explainedTotal(explanation: PredictionExplanation): number {
  return (
    explanation.baseline +
    explanation.pattern.contribution +
    explanation.keyword.contribution +
    explanation.fallback.contribution +
    explanation.economic.boost
  );
}

describe('PredictionEngine', () => {
  let t: TestEngine;

  const score = (overrides: { fallbackScore?: number; source?: string; headline?: string } = {}) =>
    t.engine.predictor.score({
      headline: overrides.headline ?? HEADLINE,
      source: overrides.source ?? SOURCE,
      contentType: 'news',
      fallbackScore: overrides.fallbackScore,
    });

  const learnPattern = (urgency: number) => {
    for (let i = 0; i < 5; i++) {
      t.engine.patterns.learn(HEADLINE, urgency, 2);
    }
  };

  beforeEach(() => {
    t = createTestEngine();
  });

  describe('insufficient data', () => {
    it('returns the default fallback when nothing has been learned', () => {
      const result = score();

      expect(result.score).toBe(5);
      expect(result.urgencyLevel).toBe('MEDIUM');
      expect(result.explanation.insufficientData).toBe(true);
      expect(result.explanation.fallback).toEqual({
        used: true,
        reason: 'insufficient_data',
        origin: 'default',
        score: 5,
        weight: 1,
        contribution: 5,
      });
    });

    it('returns the external fallback score as is', () => {
      const result = score({ fallbackScore: 7.2 });

      expect(result.score).toBe(7.2);
      expect(result.explanation.fallback.origin).toBe('external');
    });

    it('does not fire a pattern below the confidence threshold', () => {
      t.engine.patterns.learn(HEADLINE, 9, 2);

      const result = score();

      expect(result.explanation.pattern.fired).toBe(false);
      expect(result.explanation.pattern.score).toBe(9);
      expect(result.score).toBe(5);
    });
  });

  describe('learned signals', () => {
    it('gives a lone pattern the whole internal weight', () => {
      learnPattern(8);

      const result = score();

      expect(result.score).toBeCloseTo(8, 10);
      expect(result.urgencyLevel).toBe('HIGH');
      expect(result.explanation.pattern.fired).toBe(true);
      expect(result.explanation.pattern.weight).toBeCloseTo(0.8, 10);
      expect(result.explanation.keyword.fired).toBe(false);
      expect(result.explanation.fallback.used).toBe(false);
    });

    it('blends an external fallback at the remaining weight', () => {
      learnPattern(8);

      const result = score({ fallbackScore: 2 });

      expect(result.explanation.baseline).toBeCloseTo(4, 10);
      expect(result.explanation.pattern.contribution).toBeCloseTo(2.4, 10);
      expect(result.explanation.fallback.contribution).toBeCloseTo(0.4, 10);
      expect(result.score).toBeCloseTo(6.8, 10);
    });

    it('uses keywords alone when no pattern matches', () => {
      t.engine.keywords.learn('Oil prices surge', 9, 2);

      const result = score({ headline: 'Oil surge' });

      expect(result.explanation.keyword.fired).toBe(true);
      expect(result.explanation.keyword.confidence).toBeCloseTo(4 / 9, 10);
      expect(result.score).toBeCloseTo(5.8, 10);
    });

    it('combines pattern and keyword signals by their weights', () => {
      learnPattern(8);
      t.engine.keywords.learn(HEADLINE, 8, 2);

      const result = score();

      expect(result.explanation.keyword.score).toBeCloseTo(5.6, 10);
      expect(result.explanation.pattern.contribution).toBeCloseTo(1.875, 10);
      expect(result.explanation.keyword.contribution).toBeCloseTo(0.225, 10);
      expect(result.score).toBeCloseTo(7.1, 10);
      expect(explainedTotal(result.explanation)).toBeCloseTo(result.score, 10);
    });

    it('dampens an unreliable source toward the midpoint', () => {
      learnPattern(8);
      t.repos.sources.save({
        source: 'rumor.example',
        contentType: 'news',
        reliability: 0.25,
        sampleCount: 5,
        lastUpdated: FIXED_NOW,
      });

      const result = score({ source: 'rumor.example' });

      expect(result.explanation.source.reliability).toBe(0.25);
      expect(result.explanation.source.trustFactor).toBe(0.5);
      expect(result.score).toBeCloseTo(6.5, 10);
    });

    it('never lets trust zero out the signal', () => {
      expect(t.engine.predictor.trustFactor(0)).toBe(0.5);
      expect(t.engine.predictor.trustFactor(0.9)).toBe(1);
    });
  });

  describe('economic snapshot', () => {
    it('adds stress indicators to the score', () => {
      const result = t.engine.predictor.score({
        headline: HEADLINE,
        source: SOURCE,
        contentType: 'news',
        economic: { vix: 0.5, goldDelta: 0.3, usdIndexDelta: -0.4, btcTrend: -0.2 },
      });

      expect(result.explanation.economic.boost).toBeCloseTo(1.4, 10);
      expect(result.score).toBeCloseTo(6.4, 10);
    });

    it('caps the boost in both directions', () => {
      expect(t.engine.predictor.economicBoost({ vix: 2 }).boost).toBe(1.5);
      expect(t.engine.predictor.economicBoost({ btcTrend: 3 }).boost).toBe(-1.5);
    });

    it('treats missing fields as zero', () => {
      expect(t.engine.predictor.economicBoost(undefined)).toEqual({
        boost: 0,
        components: { vix: 0, goldDelta: 0, usdIndexDelta: 0, btcTrend: 0 },
      });
    });
  });

  it('clamps the final score to 0-10', () => {
    learnPattern(10);

    const result = t.engine.predictor.score({
      headline: HEADLINE,
      source: SOURCE,
      contentType: 'news',
      economic: { vix: 1 },
    });

    expect(result.score).toBe(10);
  });
});
