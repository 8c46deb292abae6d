import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CleanedReview,
  ScoredReview,
  SentimentCounts,
  SentimentLabel,
} from '@app/shared-types';
import { SENTIMENT_SCORER, SentimentScorer } from './sentiment-scorer.interface';

export interface SentimentResult {
  reviews: ScoredReview[];
  counts: SentimentCounts;
}

/**
 * SentimentService - Attaches a compound score and label to every review
 *
 * Delegates the actual scoring to whichever SentimentScorer is bound to
 * SENTIMENT_SCORER. Reviews are scored independently, so input order
 * never changes a result.
 */
@Injectable()
export class SentimentService {
  private readonly logger = new Logger(SentimentService.name);

  constructor(
    @Inject(SENTIMENT_SCORER)
    private readonly scorer: SentimentScorer,
  ) {}

  scoreReviews(
    productId: string,
    reviews: readonly CleanedReview[],
  ): SentimentResult {
    const counts: SentimentCounts = {
      scored: 0,
      positive: 0,
      neutral: 0,
      negative: 0,
    };

    const scored = reviews.map((review): ScoredReview => {
      const { score, label } = this.scorer.score(review.text);
      counts.scored++;
      counts[this.countKey(label)]++;
      return { ...review, sentimentScore: score, sentimentLabel: label };
    });

    this.logger.debug(
      `Scored ${productId}: ${counts.positive} positive, ` +
        `${counts.neutral} neutral, ${counts.negative} negative`,
    );

    return { reviews: scored, counts };
  }

  private countKey(
    label: SentimentLabel,
  ): 'positive' | 'neutral' | 'negative' {
    switch (label) {
      case SentimentLabel.POSITIVE:
        return 'positive';
      case SentimentLabel.NEGATIVE:
        return 'negative';
      case SentimentLabel.NEUTRAL:
        return 'neutral';
    }
  }
}
