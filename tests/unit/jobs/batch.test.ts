import { describe, it, expect, beforeEach } from 'vitest';
import { applyFeedbackBatch, feedbackBatchSchema, scoreHeadlines } from '../../../src/jobs/batch.js';
import { createTestEngine, type TestEngine } from '../../helpers/factories.js';

describe('batch jobs', () => {
  let t: TestEngine;

  beforeEach(() => {
    t = createTestEngine();
  });

  describe('scoreHeadlines', () => {
    it('scores valid items and reports invalid ones in place', () => {
      const results = scoreHeadlines(
        t.engine,
        [
          { headline: 'Port strike halts shipments', source: 'reuters.com', contentType: 'news' },
          { headline: '', source: 'reuters.com', contentType: 'news' },
        ],
        t.logger
      );

      expect(results).toHaveLength(2);
      expect(results[0]).toMatchObject({
        index: 0,
        headline: 'Port strike halts shipments',
        score: 5,
        urgencyLevel: 'MEDIUM',
        insufficientData: true,
      });
      expect(results[1]).toEqual({ index: 1, error: 'headline: headline is required' });
      const first = results[0];
      const predictionId = first && 'predictionId' in first ? first.predictionId : null;
      expect(t.repos.predictions.get(predictionId ?? '')?.headline).toBe('Port strike halts shipments');
      expect(t.logger.messages('info')).toContain('Headline batch scored');
    });

    it('accepts collector items that carry the headline as title', () => {
      const results = scoreHeadlines(
        t.engine,
        [
          {
            title: 'Port strike halts shipments',
            source: 'reuters.com',
            contentType: 'news',
            url: 'https://example.com/port-strike',
          },
        ],
        t.logger
      );

      expect(results).toHaveLength(1);
      expect(results[0]).toMatchObject({ index: 0, headline: 'Port strike halts shipments', score: 5 });
    });
  });

  describe('applyFeedbackBatch', () => {
    it('applies each item on its own and counts rejections', () => {
      const batch = feedbackBatchSchema.parse({
        articles: [
          { articleId: 'a-1', headline: 'Oil prices surge', source: 'reuters.com', contentType: 'news', rating: 8 },
          { articleId: 'a-1', headline: 'Oil prices surge', source: 'reuters.com', contentType: 'news', rating: 3 },
          { articleId: 'a-2', headline: 'Oil prices surge', source: 'reuters.com', contentType: 'news', rating: 12 },
        ],
      });

      const result = applyFeedbackBatch(t.engine, batch, t.logger);

      expect(result.digests).toEqual([]);
      expect(result.articles.map((r) => r.status)).toEqual(['applied', 'rejected_duplicate', 'rejected_invalid']);
      expect(result.applied).toBe(1);
      expect(result.rejected).toBe(2);
      expect(t.repos.keywords.get('oil')?.sampleCount).toBe(2);
    });

    it('rejects digest feedback for digests never registered', () => {
      const batch = feedbackBatchSchema.parse({ digests: [{ digestId: 'd-9', rating: 4 }] });

      const result = applyFeedbackBatch(t.engine, batch, t.logger);

      expect(result.digests).toEqual([{ status: 'rejected_invalid', reason: 'digestId: unknown digest "d-9"' }]);
    });

    it('records false positive and missed signal reports', () => {
      const batch = feedbackBatchSchema.parse({
        falsePositives: [
          { headline: 'Celebrity wedding draws crowds', reason: 'gossip' },
          { headline: 'celebrity  wedding draws crowds' },
        ],
        missedSignals: [{ event: 'Central bank emergency cut' }, { event: '' }],
      });

      const result = applyFeedbackBatch(t.engine, batch, t.logger);

      expect(result.falsePositives).toEqual([
        { status: 'applied', headlinesApplied: 1 },
        {
          status: 'rejected_duplicate',
          reason: 'Feedback for false_positive "celebrity wedding draws crowds" was already recorded',
        },
      ]);
      expect(result.missedSignals).toEqual([
        { status: 'applied', headlinesApplied: 0 },
        { status: 'rejected_invalid', reason: 'event: event is required' },
      ]);
      expect(result.applied).toBe(2);
      expect(result.rejected).toBe(2);
    });
  });
});
