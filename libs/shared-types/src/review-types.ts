/**
 * Review Pipeline Types
 *
 * Type-safe definitions for the records flowing between pipeline stages
 */

/**
 * Sentiment Label enum
 */
export enum SentimentLabel {
  NEGATIVE = 'negative',
  NEUTRAL = 'neutral',
  POSITIVE = 'positive',
}

/**
 * Keyword bucket: one per sentiment label plus the whole corpus
 */
export enum KeywordBucket {
  POSITIVE = 'positive',
  NEUTRAL = 'neutral',
  NEGATIVE = 'negative',
  OVERALL = 'overall',
}

/**
 * Bucket processing order, fixed so outputs never depend on map iteration
 */
export const KEYWORD_BUCKETS: readonly KeywordBucket[] = [
  KeywordBucket.OVERALL,
  KeywordBucket.POSITIVE,
  KeywordBucket.NEUTRAL,
  KeywordBucket.NEGATIVE,
];

export type StarRating = 1 | 2 | 3 | 4 | 5;

export const STAR_RATINGS: readonly StarRating[] = [1, 2, 3, 4, 5];

/**
 * A raw record exactly as read from a review source
 */
export type RawReviewRecord = Record<string, unknown>;

/**
 * Static product reference data, loaded once per run
 */
export interface Product {
  productId: string;
  brand: string;
  productName: string;
  flavor: string | null;
  size: string | null;
  notes: string | null;
}

/**
 * Review after the cleaning stage
 */
export interface CleanedReview {
  reviewId: string;
  productId: string;
  rating: StarRating;
  text: string;
  verified: boolean;
  /** ISO calendar date (YYYY-MM-DD), null when the source date was unusable */
  date: string | null;
}

/**
 * Review after the sentiment stage
 */
export interface ScoredReview extends CleanedReview {
  sentimentScore: number;
  sentimentLabel: SentimentLabel;
}

export interface KeywordEntry {
  productId: string;
  bucket: KeywordBucket;
  term: string;
  score: number;
  rank: number;
}

export interface KeywordTerm {
  term: string;
  score: number;
}

export type BucketKeywords = Record<KeywordBucket, KeywordTerm[]>;

export type RatingDistribution = Record<StarRating, number>;

/**
 * One row of the final comparison table
 */
export interface ComparisonRecord {
  productId: string;
  displayName: string;
  brand: string;
  productName: string;
  flavor: string | null;
  size: string | null;
  notes: string | null;
  reviewCount: number;
  ratingDistribution: RatingDistribution;
  avgRating: number | null;
  avgLength: number | null;
  pctPositive: number | null;
  pctNeutral: number | null;
  pctNegative: number | null;
  pctVerified: number | null;
  score: number | null;
  keywords: BucketKeywords;
}
