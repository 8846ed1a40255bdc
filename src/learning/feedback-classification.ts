import type { ArticleFeedbackType, DigestFeedbackType } from '../types/feedback.js';

/** Comment phrases worth surfacing in feedback summaries */
export const INSIGHT_PHRASES = [
  'should have noticed',
  'missed',
  'important',
  'critical',
  'overreacted',
  'not urgent',
  'false alarm',
] as const;

/** Shorter comments are not scanned for insights */
const MIN_INSIGHT_COMMENT_LENGTH = 10;

/**
 * First insight phrase found in a comment, or null.
 */
export function findInsight(comment: string): string | null {
  const text = comment.trim().toLowerCase();
  if (text.length <= MIN_INSIGHT_COMMENT_LENGTH) return null;
  return INSIGHT_PHRASES.find((phrase) => text.includes(phrase)) ?? null;
}

/**
 * How a user's article rating compares with what was predicted.
 */
export function classifyArticleFeedback(rating: number, predicted: number | null): ArticleFeedbackType {
  if (predicted === null) return 'unscored';
  if (rating <= 3 && predicted >= 7) return 'ai_overrated';
  if (rating >= 7 && predicted <= 3) return 'ai_underrated';
  if (Math.abs(rating - predicted) <= 2) return 'reasonable_match';
  return 'significant_difference';
}

/**
 * Digest feedback is accurate when the rating is within a point of the mean
 * predicted score of its headlines.
 */
export function classifyDigestFeedback(rating: number, predictedMean: number | null): DigestFeedbackType {
  if (predictedMean === null) return 'unscored';
  return Math.abs(rating - predictedMean) <= 1 ? 'accurate' : 'inaccurate';
}
