/**
 * Feedback records and ingestion results.
 */

export type FeedbackKind = 'digest' | 'article' | 'false_positive' | 'missed_signal';

/**
 * Classification of article feedback against what the engine predicted.
 */
export type ArticleFeedbackType =
  | 'ai_overrated'
  | 'ai_underrated'
  | 'reasonable_match'
  | 'significant_difference'
  | 'unscored'
  | 'irrelevant';

export type DigestFeedbackType = 'accurate' | 'inaccurate' | 'unscored';

export interface DigestFeedback {
  kind: 'digest';
  digestId: string;
  /** 0-10 */
  rating: number;
  comment: string;
  createdAt: Date;
  feedbackType: DigestFeedbackType;
  /** Insight phrase found in the comment, if any */
  insight: string | null;
}

/**
 * Either a rating or the irrelevant flag, never both.
 */
export type ArticleVerdict = { rating: number } | { irrelevant: true };

export interface ArticleFeedback {
  kind: 'article';
  articleId: string;
  headline: string;
  source: string;
  contentType: string;
  verdict: ArticleVerdict;
  comment: string;
  createdAt: Date;
  feedbackType: ArticleFeedbackType;
  insight: string | null;
}

/**
 * A headline that was flagged urgent but should not have been.
 */
export interface FalsePositiveReport {
  kind: 'false_positive';
  headline: string;
  reason: string;
  createdAt: Date;
}

/**
 * An important event the engine did not flag.
 */
export interface MissedSignalReport {
  kind: 'missed_signal';
  event: string;
  /** What should have been detected */
  details: string;
  createdAt: Date;
}

export type FeedbackRecord = DigestFeedback | ArticleFeedback | FalsePositiveReport | MissedSignalReport;

export type IngestStatus = 'applied' | 'rejected_duplicate' | 'rejected_invalid';

export interface IngestResult {
  status: IngestStatus;
  /** Why the feedback was rejected */
  reason?: string;
  /** Headlines the feedback was applied to */
  headlinesApplied?: number;
}

export function isRatedVerdict(verdict: ArticleVerdict): verdict is { rating: number } {
  return 'rating' in verdict;
}

/**
 * Duplicate key of a report: its text, case-folded with runs of whitespace
 * collapsed.
 */
export function reportKey(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}
