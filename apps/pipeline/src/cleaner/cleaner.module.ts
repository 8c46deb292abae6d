import { Module } from '@nestjs/common';
import { CleanerService } from './cleaner.service';

@Module({
  providers: [CleanerService],
  exports: [CleanerService],
})
export class CleanerModule {}
