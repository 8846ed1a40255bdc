import { describe, it, expect, beforeEach } from 'vitest';
import { PatternStore } from '../../../src/learning/pattern-store.js';
import { QuarantineLog } from '../../../src/learning/quarantine.js';
import type { PatternRepo } from '../../../src/ports/repositories.js';
import { LearningStore, IN_MEMORY } from '../../../src/storage/learning-store.js';
import { createSqliteRepositories } from '../../../src/storage/repositories.js';
import {
  DAY_MS,
  FIXED_NOW,
  createLearningConfig,
  createMockLogger,
  createTestClock,
  type MockLogger,
  type TestClock,
} from '../../helpers/factories.js';

const HEADLINE = 'Fed raises interest rates sharply';

function confidence(samples: number): number {
  return 0.95 * (1 - Math.exp(-samples / 3));
}

describe('PatternStore', () => {
  let repo: PatternRepo;
  let logger: MockLogger;
  let time: TestClock;
  let store: PatternStore;

  const createStore = (overrides: Parameters<typeof createLearningConfig>[0] = {}) =>
    new PatternStore(repo, logger, createLearningConfig(overrides).patterns, { clock: time.clock });

  beforeEach(() => {
    const db = new LearningStore({ path: IN_MEMORY });
    repo = createSqliteRepositories(db).patterns;
    logger = createMockLogger();
    time = createTestClock();
    store = createStore();
  });

  describe('upsert', () => {
    it('creates a pattern whose urgency equals the first observation', () => {
      const pattern = store.learn(HEADLINE, 7, 2);

      expect(pattern).not.toBeNull();
      expect(pattern?.sampleCount).toBe(2);
      expect(pattern?.sampleUrgencySum).toBe(14);
      expect(pattern?.lastUpdated).toEqual(FIXED_NOW);
      expect(repo.count()).toBe(1);
    });

    it('accumulates weighted samples and recomputes confidence', () => {
      store.learn(HEADLINE, 8, 2);
      const pattern = store.learn(HEADLINE, 2, 1);

      expect(pattern?.sampleCount).toBe(3);
      expect(pattern?.sampleUrgencySum).toBe(18);
      expect(pattern?.confidence).toBeCloseTo(confidence(3), 10);
      expect(pattern && store.derivedUrgency(pattern)).toBe(6);
    });

    it('caps confidence at the ceiling', () => {
      expect(store.confidenceFor(1000)).toBeCloseTo(0.95, 10);
      expect(store.confidenceFor(0)).toBe(0);
    });

    it('clamps observations to 0-10', () => {
      const pattern = store.learn(HEADLINE, 14, 1);
      expect(pattern?.sampleUrgencySum).toBe(10);
    });
  });

  describe('match', () => {
    it('matches ten urgent samples exactly with high confidence', () => {
      for (let i = 0; i < 5; i++) {
        store.learn(HEADLINE, 8, 2);
      }

      const match = store.match(HEADLINE);

      expect(match?.exact).toBe(true);
      expect(match?.urgency).toBe(8);
      expect(match?.similarity).toBe(1);
      expect(match?.confidence).toBeCloseTo(confidence(10), 10);
      expect(match?.confidence).toBeGreaterThan(0.6);
    });

    it('ignores patterns with fewer than minMatchSamples samples', () => {
      store.learn(HEADLINE, 8, 1);
      expect(store.match(HEADLINE)).toBeNull();
    });

    it('falls back to the most similar pattern of the same shape', () => {
      store.learn(HEADLINE, 9, 2);
      store.learn(HEADLINE, 9, 2);

      const match = store.match('Fed raises interest rates slightly');

      expect(match?.exact).toBe(false);
      expect(match?.pattern.signature).toBe('m:-|f:-|t:fed,interest,raises,rates,sharply');
      expect(match?.similarity).toBeCloseTo(4 / 6, 10);
      expect(match?.confidence).toBeCloseTo(confidence(4) * (4 / 6), 10);
      expect(match?.urgency).toBe(9);
    });

    it('prefers a more confident near match over a thin exact one', () => {
      const near = 'Fed raises interest rates slightly';
      for (let i = 0; i < 10; i++) {
        store.learn(HEADLINE, 9, 2);
      }
      store.learn(near, 1, 2);

      const match = store.match(near);

      expect(match?.exact).toBe(false);
      expect(match?.pattern.signature).toBe('m:-|f:-|t:fed,interest,raises,rates,sharply');
      expect(match?.confidence).toBeCloseTo(confidence(20) * (4 / 6), 10);
      expect(match?.urgency).toBe(9);
    });

    it('keeps the exact match when it is the more confident one', () => {
      const near = 'Fed raises interest rates slightly';
      for (let i = 0; i < 10; i++) {
        store.learn(HEADLINE, 9, 2);
      }
      for (let i = 0; i < 5; i++) {
        store.learn(near, 1, 2);
      }

      const match = store.match(near);

      expect(match?.exact).toBe(true);
      expect(match?.confidence).toBeCloseTo(confidence(10), 10);
      expect(match?.urgency).toBe(1);
    });

    it('does not match dissimilar headlines', () => {
      store.learn(HEADLINE, 9, 2);
      store.learn(HEADLINE, 9, 2);

      expect(store.match('Tech earnings beat forecasts')).toBeNull();
    });

    it('does not near-match across shapes', () => {
      store.learn(HEADLINE, 9, 2);
      store.learn(HEADLINE, 9, 2);

      expect(store.match('BREAKING Fed raises interest rates sharply')).toBeNull();
    });
  });

  describe('reinforce', () => {
    it('folds an observation into a stored pattern', () => {
      const learned = store.learn(HEADLINE, 8, 2);
      if (!learned) throw new Error('pattern not stored');

      const pattern = store.reinforce(learned, 0, 2);

      expect(pattern?.signature).toBe(learned.signature);
      expect(pattern?.sampleUrgencySum).toBe(16);
      expect(pattern?.sampleCount).toBe(4);
      expect(repo.count()).toBe(1);
    });
  });

  describe('decay', () => {
    it('leaves patterns inside the decay window alone', () => {
      store.learn(HEADLINE, 8, 2);
      time.advance(10 * DAY_MS);

      expect(store.decay()).toBe(0);
      expect(repo.get(store.signatureOf(HEADLINE).signature)?.confidence).toBeCloseTo(confidence(2), 10);
    });

    it('multiplies confidence by the factor per elapsed window', () => {
      store.learn(HEADLINE, 8, 2);
      time.advance(29 * DAY_MS);

      expect(store.decay()).toBe(1);
      const stored = repo.get(store.signatureOf(HEADLINE).signature);
      expect(stored?.confidence).toBeCloseTo(confidence(2) * 0.81, 10);
    });

    it('is idempotent for the same time and never increases confidence', () => {
      store.learn(HEADLINE, 8, 2);
      const signature = store.signatureOf(HEADLINE).signature;

      time.advance(100 * DAY_MS);
      store.decay();
      const first = repo.get(signature)?.confidence ?? Number.NaN;

      expect(store.decay()).toBe(0);
      expect(repo.get(signature)?.confidence).toBe(first);

      // An earlier pass time would compute a higher target; it must not raise confidence.
      expect(store.decay(new Date(FIXED_NOW.getTime() + 20 * DAY_MS))).toBe(0);
      expect(repo.get(signature)?.confidence).toBe(first);
    });

    it('never goes below the floor', () => {
      store = createStore({ patterns: { decayFactor: 0.1 } });
      store.learn(HEADLINE, 8, 2);
      const signature = store.signatureOf(HEADLINE).signature;

      time.advance(29 * DAY_MS);
      store.decay();
      expect(repo.get(signature)?.confidence).toBe(0.05);

      time.advance(365 * DAY_MS);
      expect(store.decay()).toBe(0);
      expect(repo.get(signature)?.confidence).toBe(0.05);
    });

    it('restores confidence when the pattern is used again', () => {
      store.learn(HEADLINE, 8, 2);
      time.advance(100 * DAY_MS);
      store.decay();

      const pattern = store.learn(HEADLINE, 8, 2);
      expect(pattern?.confidence).toBeCloseTo(confidence(4), 10);
    });
  });

  describe('corrupt records', () => {
    const corrupt = () => {
      const { signature, shapeKey } = store.signatureOf(HEADLINE);
      repo.save({
        signature,
        shapeKey,
        sampleUrgencySum: 12,
        sampleCount: 0,
        confidence: 0.5,
        lastUpdated: FIXED_NOW,
      });
      return signature;
    };

    it('skips a corrupt pattern when matching and warns once', () => {
      corrupt();

      expect(store.match(HEADLINE)).toBeNull();
      expect(store.match(HEADLINE)).toBeNull();
      expect(logger.messages('warn')).toEqual(['Quarantined corrupt record']);
    });

    it('leaves a corrupt pattern untouched on upsert', () => {
      const signature = corrupt();

      expect(store.learn(HEADLINE, 8, 2)).toBeNull();
      expect(repo.get(signature)?.sampleUrgencySum).toBe(12);
      expect(repo.get(signature)?.sampleCount).toBe(0);
    });

    it('counts corrupt patterns in the snapshot', () => {
      corrupt();
      store.learn('Oil prices surge', 8, 2);

      const snapshot = store.snapshot();
      expect(snapshot.healthy.map((p) => p.signature)).toEqual(['m:-|f:-|t:oil,prices,surge']);
      expect(snapshot.quarantined).toBe(1);
    });

    it('shares a quarantine log between stores', () => {
      const quarantine = new QuarantineLog(logger);
      store = new PatternStore(repo, logger, createLearningConfig().patterns, { clock: time.clock, quarantine });
      corrupt();
      store.match(HEADLINE);

      expect(quarantine.list().map((e) => e.message)).toEqual([
        'Corrupt pattern record "m:-|f:-|t:fed,interest,raises,rates,sharply": zero sample count with non-zero urgency sum',
      ]);
    });
  });
});
