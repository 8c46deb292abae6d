import { Module } from '@nestjs/common';
import { LexiconSentimentScorer } from './lexicon-sentiment.scorer';
import { SENTIMENT_SCORER } from './sentiment-scorer.interface';
import { SentimentService } from './sentiment.service';

/**
 * Sentiment scoring. Bind a different SentimentScorer to SENTIMENT_SCORER
 * to swap the scoring strategy without touching the rest of the pipeline.
 */
@Module({
  providers: [
    LexiconSentimentScorer,
    { provide: SENTIMENT_SCORER, useExisting: LexiconSentimentScorer },
    SentimentService,
  ],
  exports: [SentimentService, SENTIMENT_SCORER],
})
export class SentimentModule {}
