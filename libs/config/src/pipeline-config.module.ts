import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PipelineConfigService } from './pipeline-config.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [PipelineConfigService],
  exports: [PipelineConfigService],
})
export class PipelineConfigModule {}
