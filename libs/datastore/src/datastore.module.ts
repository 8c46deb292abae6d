import { Module, Global } from '@nestjs/common';
import { PipelineConfigModule } from '@app/config';
import { OutputWriterService } from './output-writer.service';
import { ProductCatalogRepository } from './product-catalog.repository';
import { ReviewSourceRepository } from './review-source.repository';

@Global()
@Module({
  imports: [PipelineConfigModule],
  providers: [
    OutputWriterService,
    ProductCatalogRepository,
    ReviewSourceRepository,
  ],
  exports: [
    OutputWriterService,
    ProductCatalogRepository,
    ReviewSourceRepository,
  ],
})
export class DatastoreModule {}
