import { SENTIMENT_THRESHOLDS, SentimentLabel } from '@app/shared-types';

export interface SentimentScore {
  /** Compound polarity in [-1, 1] */
  score: number;
  label: SentimentLabel;
}

/**
 * Anything that can turn one review text into a compound score.
 * Implementations must be stateless per call.
 */
export interface SentimentScorer {
  score(text: string): SentimentScore;
}

/**
 * Injection token for the active SentimentScorer
 */
export const SENTIMENT_SCORER = 'SENTIMENT_SCORER';

export function labelForScore(score: number): SentimentLabel {
  if (score >= SENTIMENT_THRESHOLDS.POSITIVE) return SentimentLabel.POSITIVE;
  if (score <= SENTIMENT_THRESHOLDS.NEGATIVE) return SentimentLabel.NEGATIVE;
  return SentimentLabel.NEUTRAL;
}
