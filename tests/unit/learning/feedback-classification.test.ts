import { describe, it, expect } from 'vitest';
import {
  classifyArticleFeedback,
  classifyDigestFeedback,
  findInsight,
} from '../../../src/learning/feedback-classification.js';

describe('classifyArticleFeedback', () => {
  it.each<[number, number, string]>([
    [2, 8, 'ai_overrated'],
    [3, 7, 'ai_overrated'],
    [8, 2, 'ai_underrated'],
    [7, 3, 'ai_underrated'],
    [6, 4, 'reasonable_match'],
    [5, 5, 'reasonable_match'],
    [9, 5, 'significant_difference'],
    [4, 7, 'significant_difference'],
  ])('rating %d against prediction %d is %s', (rating, predicted, expected) => {
    expect(classifyArticleFeedback(rating, predicted)).toBe(expected);
  });

  it('is unscored without a prediction', () => {
    expect(classifyArticleFeedback(9, null)).toBe('unscored');
  });
});

describe('classifyDigestFeedback', () => {
  it('is accurate within one point of the mean prediction', () => {
    expect(classifyDigestFeedback(6, 5)).toBe('accurate');
    expect(classifyDigestFeedback(4, 5)).toBe('accurate');
    expect(classifyDigestFeedback(7, 5)).toBe('inaccurate');
  });

  it('is unscored without predictions', () => {
    expect(classifyDigestFeedback(7, null)).toBe('unscored');
  });
});

describe('findInsight', () => {
  it('returns the first phrase found', () => {
    expect(findInsight('This was a FALSE ALARM, not urgent at all')).toBe('not urgent');
  });

  it('ignores short comments', () => {
    expect(findInsight('missed')).toBeNull();
    expect(findInsight('   missed it   ')).toBeNull();
  });

  it('returns null when no phrase matches', () => {
    expect(findInsight('Nice selection this week')).toBeNull();
  });
});
