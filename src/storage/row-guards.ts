import type { ArticleFeedbackType, DigestFeedbackType } from '../types/feedback.js';
import type { UrgencyLevel } from '../types/headline.js';

const ARTICLE_FEEDBACK_TYPES: readonly ArticleFeedbackType[] = [
  'ai_overrated',
  'ai_underrated',
  'reasonable_match',
  'significant_difference',
  'unscored',
  'irrelevant',
];

const DIGEST_FEEDBACK_TYPES: readonly DigestFeedbackType[] = ['accurate', 'inaccurate', 'unscored'];

const URGENCY_LEVELS: readonly UrgencyLevel[] = ['LOW', 'MEDIUM', 'HIGH'];

export function toArticleFeedbackType(value: string): ArticleFeedbackType {
  return ARTICLE_FEEDBACK_TYPES.find((t) => t === value) ?? 'unscored';
}

export function toDigestFeedbackType(value: string): DigestFeedbackType {
  return DIGEST_FEEDBACK_TYPES.find((t) => t === value) ?? 'unscored';
}

export function toUrgencyLevel(value: string): UrgencyLevel {
  return URGENCY_LEVELS.find((l) => l === value) ?? 'LOW';
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON column, yielding an empty object for anything that is not a
 * JSON object.
 */
export function parseJsonObject(text: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}
