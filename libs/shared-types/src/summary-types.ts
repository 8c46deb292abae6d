/**
 * Run Summary Types
 *
 * Every stage reports per-product counts so data-quality issues are visible
 * without re-deriving them from the outputs
 */

import type { KeywordBucket } from './review-types';

export interface CleaningCounts {
  input: number;
  kept: number;
  droppedMalformed: number;
  droppedShortText: number;
  droppedInvalidRating: number;
  droppedDuplicateId: number;
  droppedDuplicateText: number;
  nullDates: number;
}

export interface SentimentCounts {
  scored: number;
  positive: number;
  neutral: number;
  negative: number;
}

export interface KeywordBucketCounts {
  documents: number;
  entries: number;
}

export type KeywordCounts = Record<KeywordBucket, KeywordBucketCounts>;

export interface AggregationCounts {
  products: number;
  productsWithoutReviews: string[];
  orphanedReviews: Record<string, number>;
}

export interface FailedSource {
  source: string;
  productId: string | null;
  reason: string;
}

export interface FailedProduct {
  productId: string;
  stage: PipelineStage;
  reason: string;
}

export type PipelineStage =
  | 'load'
  | 'clean'
  | 'sentiment'
  | 'keywords'
  | 'aggregate';

export interface StageSummary<TCounts> {
  stage: PipelineStage;
  products: Record<string, TCounts>;
}

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  config: Record<string, unknown>;
  failedSources: FailedSource[];
  failedProducts: FailedProduct[];
  cleaning: StageSummary<CleaningCounts>;
  sentiment: StageSummary<SentimentCounts>;
  keywords: StageSummary<KeywordCounts>;
  aggregation: AggregationCounts;
}
