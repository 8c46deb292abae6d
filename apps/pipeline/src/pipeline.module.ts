import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PipelineConfigModule, validatePipelineEnv } from '@app/config';
import { DatastoreModule } from '@app/datastore';
import { LoggerModule } from '@app/logger';
import { AggregationModule } from './aggregation/aggregation.module';
import { CleanerModule } from './cleaner/cleaner.module';
import { KeywordModule } from './keywords/keyword.module';
import { PipelineService } from './pipeline.service';
import { SentimentModule } from './sentiment/sentiment.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validatePipelineEnv }),
    LoggerModule,
    PipelineConfigModule,
    DatastoreModule,
    CleanerModule,
    SentimentModule,
    KeywordModule,
    AggregationModule,
  ],
  providers: [PipelineService],
})
export class PipelineModule {}
