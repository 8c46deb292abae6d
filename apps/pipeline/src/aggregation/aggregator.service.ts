import { Injectable, Logger } from '@nestjs/common';
import { PipelineConfigService } from '@app/config';
import {
  AggregationCounts,
  BucketKeywords,
  ComparisonRecord,
  KeywordBucket,
  KeywordEntry,
  KeywordTerm,
  Product,
  RatingDistribution,
  ScoredReview,
  SentimentLabel,
} from '@app/shared-types';
import { percentage, roundHalfAwayFromZero } from './rounding.util';

/**
 * AggregatorService - One comparison record per catalog product
 *
 * Products without reviews still get a record, with null metrics and
 * empty keyword lists. Reviews for ids missing from the catalog never
 * reach a record; they are only counted.
 */
@Injectable()
export class AggregatorService {
  private readonly logger = new Logger(AggregatorService.name);

  constructor(private readonly pipelineConfig: PipelineConfigService) {}

  buildRecord(
    product: Product,
    reviews: readonly ScoredReview[],
    keywords: readonly KeywordEntry[],
  ): ComparisonRecord {
    const { percentDecimals, keywordsPerRecord } =
      this.pipelineConfig.get().aggregation;
    const total = reviews.length;

    const countWhere = (predicate: (review: ScoredReview) => boolean) =>
      reviews.filter(predicate).length;
    const mean = (values: number[]) =>
      total === 0
        ? null
        : roundHalfAwayFromZero(
            values.reduce((sum, value) => sum + value, 0) / total,
            percentDecimals,
          );

    const pctPositive = percentage(
      countWhere((r) => r.sentimentLabel === SentimentLabel.POSITIVE),
      total,
      percentDecimals,
    );
    const pctNegative = percentage(
      countWhere((r) => r.sentimentLabel === SentimentLabel.NEGATIVE),
      total,
      percentDecimals,
    );

    return {
      productId: product.productId,
      displayName: product.brand.trim() || product.productId,
      brand: product.brand,
      productName: product.productName,
      flavor: product.flavor,
      size: product.size,
      notes: product.notes,
      reviewCount: total,
      ratingDistribution: this.ratingDistribution(reviews),
      avgRating: mean(reviews.map((r) => r.rating)),
      avgLength: mean(reviews.map((r) => r.text.length)),
      pctPositive,
      pctNeutral: percentage(
        countWhere((r) => r.sentimentLabel === SentimentLabel.NEUTRAL),
        total,
        percentDecimals,
      ),
      pctNegative,
      pctVerified: percentage(
        countWhere((r) => r.verified),
        total,
        percentDecimals,
      ),
      score:
        pctPositive === null || pctNegative === null
          ? null
          : roundHalfAwayFromZero(pctPositive - pctNegative, percentDecimals),
      keywords: this.topKeywords(product.productId, keywords, keywordsPerRecord),
    };
  }

  /**
   * Reviews per product id that is not in the catalog
   */
  countOrphans(
    catalog: readonly Product[],
    reviewsByProduct: ReadonlyMap<string, readonly ScoredReview[]>,
  ): Record<string, number> {
    const known = new Set(catalog.map((product) => product.productId));
    const orphaned: Record<string, number> = {};

    for (const productId of [...reviewsByProduct.keys()].sort()) {
      const count = reviewsByProduct.get(productId)?.length ?? 0;
      if (!known.has(productId) && count > 0) {
        orphaned[productId] = count;
        this.logger.warn(
          `${count} reviews reference unknown product ${productId}; excluded`,
        );
      }
    }

    return orphaned;
  }

  /**
   * Score descending with null scores last, then product id ascending
   */
  sortRecords(records: readonly ComparisonRecord[]): ComparisonRecord[] {
    return [...records].sort((a, b) => {
      if (a.score !== b.score) {
        if (a.score === null) return 1;
        if (b.score === null) return -1;
        return b.score - a.score;
      }
      if (a.productId < b.productId) return -1;
      if (a.productId > b.productId) return 1;
      return 0;
    });
  }

  summarize(
    catalog: readonly Product[],
    records: readonly ComparisonRecord[],
    orphanedReviews: Record<string, number>,
  ): AggregationCounts {
    return {
      products: catalog.length,
      productsWithoutReviews: records
        .filter((record) => record.reviewCount === 0)
        .map((record) => record.productId)
        .sort(),
      orphanedReviews,
    };
  }

  private ratingDistribution(
    reviews: readonly ScoredReview[],
  ): RatingDistribution {
    const distribution: RatingDistribution = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
    for (const review of reviews) {
      distribution[review.rating]++;
    }
    return distribution;
  }

  private topKeywords(
    productId: string,
    entries: readonly KeywordEntry[],
    limit: number,
  ): BucketKeywords {
    const forBucket = (bucket: KeywordBucket): KeywordTerm[] =>
      entries
        .filter((entry) => entry.productId === productId && entry.bucket === bucket)
        .sort((a, b) => a.rank - b.rank)
        .slice(0, limit)
        .map(({ term, score }) => ({ term, score }));

    return {
      [KeywordBucket.POSITIVE]: forBucket(KeywordBucket.POSITIVE),
      [KeywordBucket.NEUTRAL]: forBucket(KeywordBucket.NEUTRAL),
      [KeywordBucket.NEGATIVE]: forBucket(KeywordBucket.NEGATIVE),
      [KeywordBucket.OVERALL]: forBucket(KeywordBucket.OVERALL),
    };
  }
}
