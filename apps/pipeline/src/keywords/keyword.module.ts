import { Module } from '@nestjs/common';
import { KeywordExtractorService } from './keyword-extractor.service';

@Module({
  providers: [KeywordExtractorService],
  exports: [KeywordExtractorService],
})
export class KeywordModule {}
