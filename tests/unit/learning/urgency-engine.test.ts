import { describe, it, expect, beforeEach } from 'vitest';
import type { PatternRepo } from '../../../src/ports/repositories.js';
import { UrgencyEngine } from '../../../src/learning/urgency-engine.js';
import { createTestEngine, type TestEngine } from '../../helpers/factories.js';

const INPUT = { headline: 'Refinery fire halts output', source: 'https://www.reuters.com', contentType: 'News' };

describe('UrgencyEngine', () => {
  let t: TestEngine;

  beforeEach(() => {
    t = createTestEngine();
  });

  describe('predict with unreadable learned state', () => {
    let engine: UrgencyEngine;

    beforeEach(() => {
      const unreadable: PatternRepo = {
        get: () => {
          throw new Error('disk I/O error');
        },
        findByShape: () => {
          throw new Error('disk I/O error');
        },
        save: (pattern) => t.repos.patterns.save(pattern),
        setConfidence: (signature, confidence) => t.repos.patterns.setConfidence(signature, confidence),
        all: () => t.repos.patterns.all(),
        count: () => t.repos.patterns.count(),
      };
      engine = new UrgencyEngine({
        repos: { ...t.repos, patterns: unreadable },
        logger: t.logger,
        config: t.config,
        clock: t.time.clock,
      });
    });

    it('returns the external fallback score unrecorded', () => {
      const prediction = engine.predict({ ...INPUT, fallbackScore: 6.5 });

      expect(prediction.predictionId).toBeNull();
      expect(prediction.recorded).toBe(false);
      expect(prediction.score).toBe(6.5);
      expect(prediction.urgencyLevel).toBe('MEDIUM');
      expect(prediction.explanation.insufficientData).toBe(true);
      expect(prediction.explanation.fallback).toEqual({
        used: true,
        reason: 'storage_unavailable',
        origin: 'external',
        score: 6.5,
        weight: 1,
        contribution: 6.5,
      });
      expect(prediction.explanation.pattern.fired).toBe(false);
      expect(t.logger.messages('error')).toEqual(['Learned state unreadable, using fallback score']);
    });

    it('uses the default fallback and the economic boost without an external score', () => {
      const prediction = engine.predict({ ...INPUT, economic: { vix: 0.5 } });

      // default 5 plus economicWeight 1 * vix 0.5
      expect(prediction.score).toBeCloseTo(5.5, 10);
      expect(prediction.explanation.fallback.origin).toBe('default');
      expect(prediction.explanation.source).toEqual({
        source: 'reuters.com',
        contentType: 'news',
        reliability: 0.5,
        trustFactor: 1,
      });
    });
  });
});
