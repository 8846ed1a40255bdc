import { describe, it, expect, beforeEach } from 'vitest';
import { PredictionTracker } from '../../../src/learning/prediction-tracker.js';
import type { PredictionRepo } from '../../../src/ports/repositories.js';
import { LearningStore, IN_MEMORY } from '../../../src/storage/learning-store.js';
import { createSqliteRepositories } from '../../../src/storage/repositories.js';
import { DAY_MS, FIXED_NOW, createMockLogger, createTestClock, type TestClock } from '../../helpers/factories.js';

describe('PredictionTracker', () => {
  let repo: PredictionRepo;
  let time: TestClock;
  let tracker: PredictionTracker;

  const record = (headline: string, source: string, predictedScore: number) =>
    tracker.recordPrediction({
      headline,
      source,
      contentType: 'news',
      predictedScore,
      inputsSnapshot: { input: { headline } },
    });

  beforeEach(() => {
    repo = createSqliteRepositories(new LearningStore({ path: IN_MEMORY })).predictions;
    time = createTestClock();
    tracker = new PredictionTracker(repo, createMockLogger(), { clock: time.clock, outcomeWindowMs: 7 * DAY_MS });
  });

  it('records a prediction with its level and snapshot', () => {
    const prediction = record('Port strike halts shipments', 'reuters.com', 7.5);

    expect(prediction.predictionId).toMatch(/^pred_/);
    expect(tracker.get(prediction.predictionId)).toEqual({
      predictionId: prediction.predictionId,
      headline: 'Port strike halts shipments',
      source: 'reuters.com',
      contentType: 'news',
      inputsSnapshot: { input: { headline: 'Port strike halts shipments' } },
      predictedScore: 7.5,
      urgencyLevel: 'HIGH',
      predictedAt: FIXED_NOW,
      realizedScore: null,
      error: null,
      resolvedAt: null,
    });
  });

  it('attaches an outcome by id exactly once', () => {
    const prediction = record('Port strike halts shipments', 'reuters.com', 7.5);
    time.advance(60_000);

    const resolved = tracker.attachOutcome({ predictionId: prediction.predictionId }, 5);

    expect(resolved?.realizedScore).toBe(5);
    expect(resolved?.error).toBe(2.5);
    expect(resolved?.resolvedAt).toEqual(new Date(FIXED_NOW.getTime() + 60_000));
    expect(tracker.attachOutcome({ predictionId: prediction.predictionId }, 9)).toBeNull();
    expect(tracker.get(prediction.predictionId)?.realizedScore).toBe(5);
  });

  it('returns null for an unknown prediction', () => {
    expect(tracker.attachOutcome({ predictionId: 'pred_missing' }, 5)).toBeNull();
  });

  it('finds the newest unresolved prediction for a headline within the window', () => {
    record('Port strike halts shipments', 'reuters.com', 4);
    time.advance(DAY_MS);
    const newest = record('Port strike halts shipments', 'reuters.com', 6);
    time.advance(DAY_MS);

    const resolved = tracker.attachOutcome(
      { headline: 'Port strike halts shipments', source: 'reuters.com', at: time.clock() },
      7
    );

    expect(resolved?.predictionId).toBe(newest.predictionId);
    expect(resolved?.error).toBe(-1);
  });

  it('ignores predictions outside the lookup window', () => {
    record('Port strike halts shipments', 'reuters.com', 4);
    time.advance(8 * DAY_MS);

    expect(tracker.find('Port strike halts shipments', 'reuters.com', time.clock())).toBeNull();
  });

  describe('accuracyReport', () => {
    it('is empty before any outcome', () => {
      record('Port strike halts shipments', 'reuters.com', 4);

      expect(tracker.accuracyReport()).toEqual({
        count: 0,
        meanAbsoluteError: null,
        accuracy: null,
        byBand: {
          low: { count: 0, meanAbsoluteError: null, accuracy: null },
          medium: { count: 0, meanAbsoluteError: null, accuracy: null },
          high: { count: 0, meanAbsoluteError: null, accuracy: null },
        },
        bySource: [],
      });
    });

    it('summarizes absolute errors overall, per band and per source', () => {
      const high = record('Port strike halts shipments', 'reuters.com', 8);
      const low = record('Local fair opens', 'apnews.com', 2);
      tracker.attachOutcome({ predictionId: high.predictionId }, 6);
      tracker.attachOutcome({ predictionId: low.predictionId }, 3);

      const report = tracker.accuracyReport();

      expect(report.count).toBe(2);
      expect(report.meanAbsoluteError).toBe(1.5);
      expect(report.accuracy).toBeCloseTo(0.85, 10);
      expect(report.byBand.high).toEqual({ count: 1, meanAbsoluteError: 2, accuracy: 0.8 });
      expect(report.byBand.low).toEqual({ count: 1, meanAbsoluteError: 1, accuracy: 0.9 });
      expect(report.byBand.medium.count).toBe(0);
      expect(report.bySource.map((s) => s.source)).toEqual(['apnews.com', 'reuters.com']);
    });

    it('only counts predictions made inside the window', () => {
      const early = record('Port strike halts shipments', 'reuters.com', 8);
      time.advance(10 * DAY_MS);
      const late = record('Local fair opens', 'apnews.com', 2);
      tracker.attachOutcome({ predictionId: early.predictionId }, 6);
      tracker.attachOutcome({ predictionId: late.predictionId }, 3);

      const report = tracker.accuracyReport({ since: new Date(FIXED_NOW.getTime() + DAY_MS) });

      expect(report.count).toBe(1);
      expect(report.bySource).toEqual([{ source: 'apnews.com', count: 1, meanAbsoluteError: 1, accuracy: 0.9 }]);
    });
  });
});
