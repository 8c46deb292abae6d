import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { Logger as PinoLogger } from 'nestjs-pino';
import { isTransientError } from '@app/shared-types';
import { PipelineModule } from './pipeline.module';
import { PipelineService } from './pipeline.service';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(PipelineModule, {
    bufferLogs: true,
  });
  app.useLogger(app.get(PinoLogger));

  try {
    const summary = await app.get(PipelineService).run();
    const logger = new Logger('PipelineBootstrap');
    logger.log(
      `Outputs written for ${summary.aggregation.products} products ` +
        `(${summary.failedProducts.length} failed)`,
    );
  } finally {
    await app.close();
  }
}

// EX_TEMPFAIL tells a scheduler the run may be retried
const EXIT_TEMPFAIL = 75;

bootstrap().catch((err) => {
  const logger = new Logger('PipelineBootstrap');
  logger.error(
    'Pipeline run failed',
    err instanceof Error ? err.stack : String(err),
  );
  process.exit(isTransientError(err) ? EXIT_TEMPFAIL : 1);
});
