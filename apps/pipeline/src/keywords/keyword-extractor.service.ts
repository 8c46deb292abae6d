import { Injectable, Logger } from '@nestjs/common';
import { KeywordConfig, PipelineConfigService } from '@app/config';
import {
  KEYWORD_BUCKETS,
  KeywordBucket,
  KeywordCounts,
  KeywordEntry,
  KeywordTerm,
  Product,
  ScoredReview,
  SentimentLabel,
} from '@app/shared-types';
import { buildExclusionSet } from './keyword-exclusions';
import { buildNgrams, tokenizeTerms } from './term-tokenizer';
import { computeTfidf, rankTerms } from './tfidf';

interface BucketRanking {
  documents: number;
  terms: KeywordTerm[];
}

export interface KeywordResult {
  entries: KeywordEntry[];
  counts: KeywordCounts;
}

const BUCKET_LABELS: Record<KeywordBucket, SentimentLabel | null> = {
  [KeywordBucket.OVERALL]: null,
  [KeywordBucket.POSITIVE]: SentimentLabel.POSITIVE,
  [KeywordBucket.NEUTRAL]: SentimentLabel.NEUTRAL,
  [KeywordBucket.NEGATIVE]: SentimentLabel.NEGATIVE,
};

/**
 * KeywordExtractorService - Discriminative terms per product and bucket
 *
 * Each bucket (overall plus one per sentiment label) is its own corpus with
 * one document per review. Empty buckets simply yield no entries.
 */
@Injectable()
export class KeywordExtractorService {
  private readonly logger = new Logger(KeywordExtractorService.name);

  constructor(private readonly pipelineConfig: PipelineConfigService) {}

  extract(
    product: Product,
    reviews: readonly ScoredReview[],
    catalog: readonly Product[],
  ): KeywordResult {
    const config = this.pipelineConfig.get().keywords;
    const excluded = buildExclusionSet(product, catalog, config);

    const documents = reviews.map((review) =>
      buildNgrams(
        tokenizeTerms(review.text).filter((token) => !excluded.has(token)),
        config.ngramMax,
      ),
    );

    const rank = (bucket: KeywordBucket): BucketRanking =>
      this.rankBucket(bucket, reviews, documents, config);
    const rankings: Record<KeywordBucket, BucketRanking> = {
      [KeywordBucket.OVERALL]: rank(KeywordBucket.OVERALL),
      [KeywordBucket.POSITIVE]: rank(KeywordBucket.POSITIVE),
      [KeywordBucket.NEUTRAL]: rank(KeywordBucket.NEUTRAL),
      [KeywordBucket.NEGATIVE]: rank(KeywordBucket.NEGATIVE),
    };

    const entries: KeywordEntry[] = KEYWORD_BUCKETS.flatMap((bucket) =>
      rankings[bucket].terms.map(({ term, score }, index) => ({
        productId: product.productId,
        bucket,
        term,
        score,
        rank: index + 1,
      })),
    );

    const summarize = (ranking: BucketRanking) => ({
      documents: ranking.documents,
      entries: ranking.terms.length,
    });
    const counts: KeywordCounts = {
      [KeywordBucket.OVERALL]: summarize(rankings[KeywordBucket.OVERALL]),
      [KeywordBucket.POSITIVE]: summarize(rankings[KeywordBucket.POSITIVE]),
      [KeywordBucket.NEUTRAL]: summarize(rankings[KeywordBucket.NEUTRAL]),
      [KeywordBucket.NEGATIVE]: summarize(rankings[KeywordBucket.NEGATIVE]),
    };

    this.logger.debug(
      `Extracted ${entries.length} keywords for ${product.productId} ` +
        `from ${reviews.length} reviews`,
    );

    return { entries, counts };
  }

  private rankBucket(
    bucket: KeywordBucket,
    reviews: readonly ScoredReview[],
    documents: readonly string[][],
    config: KeywordConfig,
  ): BucketRanking {
    const label = BUCKET_LABELS[bucket];
    const bucketDocuments = documents.filter(
      (_terms, index) =>
        label === null || reviews[index].sentimentLabel === label,
    );

    if (bucketDocuments.length === 0) {
      return { documents: 0, terms: [] };
    }

    const weighted = computeTfidf(bucketDocuments, {
      minDf: config.minDf,
      maxFeatures: config.maxFeatures,
    });
    return {
      documents: bucketDocuments.length,
      terms: rankTerms(weighted, config.topK),
    };
  }
}
