/**
 * Headline as delivered by the collector.
 */
export interface HeadlineInput {
  title: string;
  source: string;
  url?: string;
  contentType: string;
  publishedAt?: string;
}

/**
 * Market snapshot taken alongside a headline.
 *
 * Values are normalized floats roughly in [-1, 1]. Missing fields count as a
 * neutral 0.0 contribution.
 */
export interface EconomicSnapshot {
  /** Volatility index change; positive = more fear */
  vix?: number;
  /** Gold price change; positive = flight to safety */
  goldDelta?: number;
  /** Dollar index change; either direction is stress */
  usdIndexDelta?: number;
  /** Bitcoin trend; negative = risk-off */
  btcTrend?: number;
}

export type UrgencyLevel = 'LOW' | 'MEDIUM' | 'HIGH';

/**
 * Map a 0-10 score to a level: below 4 is LOW, below 7 MEDIUM, else HIGH.
 */
export function urgencyLevel(score: number): UrgencyLevel {
  if (score >= 7) return 'HIGH';
  if (score >= 4) return 'MEDIUM';
  return 'LOW';
}
