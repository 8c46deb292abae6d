import {
  CleanedReview,
  ComparisonRecord,
  KEYWORD_BUCKETS,
  KeywordBucket,
  KeywordEntry,
  STAR_RATINGS,
  ScoredReview,
} from '@app/shared-types';
import { CsvRow } from './csv.util';

/**
 * Output serialization. In-memory records are camelCase; every file the
 * pipeline writes uses the snake_case field names of the external contract.
 */

export const KEYWORD_CSV_HEADERS = [
  'product_id',
  'bucket',
  'term',
  'score',
  'rank',
] as const;

export const COMPARISON_CSV_HEADERS = [
  'product_id',
  'display_name',
  'brand',
  'product_name',
  'flavor',
  'size',
  'notes',
  'review_count',
  'rating_1',
  'rating_2',
  'rating_3',
  'rating_4',
  'rating_5',
  'avg_rating',
  'avg_length',
  'pct_positive',
  'pct_neutral',
  'pct_negative',
  'pct_verified',
  'score',
  'top_positive_terms',
  'top_neutral_terms',
  'top_negative_terms',
  'top_overall_terms',
] as const;

function isScored(review: CleanedReview | ScoredReview): review is ScoredReview {
  return 'sentimentLabel' in review;
}

export function serializeReview(
  review: CleanedReview | ScoredReview,
): Record<string, unknown> {
  const row: Record<string, unknown> = {
    review_id: review.reviewId,
    product_id: review.productId,
    rating: review.rating,
    text: review.text,
    verified: review.verified,
    date: review.date,
  };
  if (isScored(review)) {
    row.sentiment_score = review.sentimentScore;
    row.sentiment_label = review.sentimentLabel;
  }
  return row;
}

export function serializeKeywordRow(entry: KeywordEntry): CsvRow {
  return {
    product_id: entry.productId,
    bucket: entry.bucket,
    term: entry.term,
    score: entry.score,
    rank: entry.rank,
  };
}

/**
 * Nested keyword document: product_id -> bucket -> ranked terms.
 * Products appear in the order given; buckets in fixed order.
 */
export function serializeKeywordDocument(
  entries: readonly KeywordEntry[],
): Record<string, Record<string, Array<{ term: string; score: number; rank: number }>>> {
  const document: Record<
    string,
    Record<string, Array<{ term: string; score: number; rank: number }>>
  > = {};

  for (const entry of entries) {
    const product = (document[entry.productId] ??= {});
    (product[entry.bucket] ??= []).push({
      term: entry.term,
      score: entry.score,
      rank: entry.rank,
    });
  }

  return document;
}

export function serializeComparisonRecord(
  record: ComparisonRecord,
): Record<string, unknown> {
  const ratingDistribution: Record<string, number> = {};
  for (const rating of STAR_RATINGS) {
    ratingDistribution[String(rating)] = record.ratingDistribution[rating];
  }

  const keywords: Record<string, Array<{ term: string; score: number }>> = {};
  for (const bucket of KEYWORD_BUCKETS) {
    keywords[bucket] = record.keywords[bucket].map(({ term, score }) => ({
      term,
      score,
    }));
  }

  return {
    product_id: record.productId,
    display_name: record.displayName,
    brand: record.brand,
    product_name: record.productName,
    flavor: record.flavor,
    size: record.size,
    notes: record.notes,
    review_count: record.reviewCount,
    rating_distribution: ratingDistribution,
    avg_rating: record.avgRating,
    avg_length: record.avgLength,
    pct_positive: record.pctPositive,
    pct_neutral: record.pctNeutral,
    pct_negative: record.pctNegative,
    pct_verified: record.pctVerified,
    score: record.score,
    keywords,
  };
}

function joinTerms(record: ComparisonRecord, bucket: KeywordBucket): string {
  return record.keywords[bucket].map(({ term }) => term).join(';');
}

export function serializeComparisonRow(record: ComparisonRecord): CsvRow {
  return {
    product_id: record.productId,
    display_name: record.displayName,
    brand: record.brand,
    product_name: record.productName,
    flavor: record.flavor,
    size: record.size,
    notes: record.notes,
    review_count: record.reviewCount,
    rating_1: record.ratingDistribution[1],
    rating_2: record.ratingDistribution[2],
    rating_3: record.ratingDistribution[3],
    rating_4: record.ratingDistribution[4],
    rating_5: record.ratingDistribution[5],
    avg_rating: record.avgRating,
    avg_length: record.avgLength,
    pct_positive: record.pctPositive,
    pct_neutral: record.pctNeutral,
    pct_negative: record.pctNegative,
    pct_verified: record.pctVerified,
    score: record.score,
    top_positive_terms: joinTerms(record, KeywordBucket.POSITIVE),
    top_neutral_terms: joinTerms(record, KeywordBucket.NEUTRAL),
    top_negative_terms: joinTerms(record, KeywordBucket.NEGATIVE),
    top_overall_terms: joinTerms(record, KeywordBucket.OVERALL),
  };
}
