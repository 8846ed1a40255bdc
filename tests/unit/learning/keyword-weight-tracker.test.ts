import { describe, it, expect, beforeEach } from 'vitest';
import { KeywordWeightTracker } from '../../../src/learning/keyword-weight-tracker.js';
import type { KeywordRepo } from '../../../src/ports/repositories.js';
import { LearningStore, IN_MEMORY } from '../../../src/storage/learning-store.js';
import { createSqliteRepositories } from '../../../src/storage/repositories.js';
import {
  FIXED_NOW,
  createLearningConfig,
  createMockLogger,
  createTestClock,
  type MockLogger,
} from '../../helpers/factories.js';

describe('KeywordWeightTracker', () => {
  let repo: KeywordRepo;
  let logger: MockLogger;
  let tracker: KeywordWeightTracker;

  const createTracker = (learningRate = 0.1) =>
    new KeywordWeightTracker(repo, logger, createLearningConfig({ keywords: { learningRate } }).keywords, {
      clock: createTestClock().clock,
      neutralUrgency: 5,
    });

  beforeEach(() => {
    repo = createSqliteRepositories(new LearningStore({ path: IN_MEMORY })).keywords;
    logger = createMockLogger();
    tracker = createTracker();
  });

  describe('update', () => {
    it('moves an unseen keyword from the neutral prior toward the observation', () => {
      const keyword = tracker.update('tariff', 8, 1);

      expect(keyword?.weight).toBeCloseTo(5.3, 10);
      expect(keyword?.sampleCount).toBe(1);
      expect(keyword?.lastUpdated).toEqual(FIXED_NOW);
    });

    it('moves twice as far at article weight as at digest weight', () => {
      const digest = tracker.update('tariff', 8, 1);
      const article = tracker.update('embargo', 8, 2);

      const digestDelta = (digest?.weight ?? 0) - 5;
      const articleDelta = (article?.weight ?? 0) - 5;
      expect(articleDelta).toBeCloseTo(2 * digestDelta, 10);
      expect(article?.sampleCount).toBe(2);
    });

    it('continues from the stored weight', () => {
      tracker.update('tariff', 8, 1);
      const keyword = tracker.update('tariff', 0, 1);

      expect(keyword?.weight).toBeCloseTo(5.3 * 0.9, 10);
      expect(keyword?.sampleCount).toBe(2);
    });

    it('caps the effective rate at 1', () => {
      tracker = createTracker(0.6);
      expect(tracker.update('tariff', 9, 2)?.weight).toBe(9);
    });
  });

  describe('learn', () => {
    it('updates every keyword of the headline', () => {
      expect(tracker.learn('Oil prices surge', 9, 2)).toBe(3);
      expect(repo.get('oil')?.weight).toBeCloseTo(5.8, 10);
      expect(repo.get('prices')?.weight).toBeCloseTo(5.8, 10);
      expect(repo.get('surge')?.weight).toBeCloseTo(5.8, 10);
      expect(repo.count()).toBe(3);
    });
  });

  describe('score', () => {
    it('returns null when no keyword is known', () => {
      expect(tracker.score('Oil prices surge')).toBeNull();
      expect(tracker.score('the and of')).toBeNull();
    });

    it('averages known weights by confidence', () => {
      tracker.learn('Oil prices surge', 9, 2);
      tracker.update('output', 1, 2);

      const score = tracker.score('Oil output falls');

      // oil: 5.8 with 2 samples, output: 4.2 with 2 samples, falls unknown
      expect(score?.score).toBeCloseTo(5, 10);
      expect(score?.confidence).toBeCloseTo(4 / 9, 10);
      expect(score?.terms.map((t) => t.term)).toEqual(['oil', 'output']);
      expect(score?.terms[0]?.confidence).toBeCloseTo(2 / 7, 10);
    });

    it('lets well-sampled keywords outweigh rare ones', () => {
      tracker.update('oil', 9, 2);
      for (let i = 0; i < 10; i++) {
        tracker.update('pipeline', 2, 2);
      }

      const score = tracker.score('Oil pipeline');
      const pipeline = repo.get('pipeline');

      expect(pipeline?.sampleCount).toBe(20);
      expect(score?.score).toBeLessThan(((pipeline?.weight ?? 0) + 5.8) / 2);
    });

    it('skips keywords with out-of-range weights and warns', () => {
      repo.save({ term: 'oil', weight: 42, sampleCount: 3, lastUpdated: FIXED_NOW });

      expect(tracker.score('Oil')).toBeNull();
      expect(tracker.snapshot().quarantined).toBe(1);
      expect(logger.messages('warn')).toEqual(['Quarantined corrupt record']);
    });
  });
});
