/**
 * @fileoverview Structured logging module using nestjs-pino.
 *
 * Provides JSON logging for pipeline runs with environment-based
 * configuration. The pipeline boots as a Nest application context, so there
 * is no request scope: every log line goes through the root pino logger.
 *
 * @example Importing in the pipeline module:
 * ```typescript
 * import { LoggerModule } from '@app/logger';
 *
 * @Module({
 *   imports: [LoggerModule],
 * })
 * export class PipelineModule {}
 * ```
 *
 * @example Installing the logger in main.ts:
 * ```typescript
 * import { Logger } from 'nestjs-pino';
 *
 * async function bootstrap() {
 *   const app = await NestFactory.createApplicationContext(PipelineModule, {
 *     bufferLogs: true,
 *   });
 *   app.useLogger(app.get(Logger));
 * }
 * ```
 *
 * @module @app/logger
 */
import { Module, Global } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggerModule as PinoLoggerModule, Params } from 'nestjs-pino';

export const LOGGER_APP_NAME = 'review-pipeline';

/**
 * Creates logger configuration for nestjs-pino at runtime.
 *
 * This factory is called after ConfigModule loads .env values,
 * ensuring environment variables are properly resolved.
 *
 * Configuration options:
 * - `level`: Log level threshold (trace/debug/info/warn/error/fatal)
 *   - Default: 'warn' in test, 'info' in production, 'debug' otherwise
 *   - Override with LOG_LEVEL environment variable
 *
 * - `transport`: Log formatting
 *   - Production (NODE_ENV=production): JSON output for log aggregators
 *   - Development: Pretty-printed colorized output via pino-pretty
 *
 * - `renameContext`: Maps NestJS 'context' to 'service' in log output
 */
export function createLoggerConfig(configService: ConfigService): Params {
  const isProd = configService.get<string>('NODE_ENV') === 'production';
  const isTest = configService.get<string>('NODE_ENV') === 'test';
  const logLevel = configService.get<string>('LOG_LEVEL');

  return {
    pinoHttp: {
      level: logLevel || (isTest ? 'warn' : isProd ? 'info' : 'debug'),

      // JSON in production, no transport in test, pretty in development
      transport:
        isProd || isTest
          ? undefined
          : {
              target: 'pino-pretty',
              options: {
                colorize: true,
                translateTime: 'SYS:HH:MM:ss.l',
                ignore: 'pid,hostname',
                singleLine: false,
              },
            },

      base: { app: LOGGER_APP_NAME },
    },

    // Rename 'context' to 'service' in logs
    renameContext: 'service',
  };
}

/**
 * Global logging module providing structured JSON logging via nestjs-pino.
 *
 * Environment Variables:
 * - `NODE_ENV`: Set to 'production' for JSON output
 * - `LOG_LEVEL`: Override default log level (trace/debug/info/warn/error/fatal)
 *
 * Uses forRootAsync so environment variables from .env files are loaded by
 * ConfigModule before the logger configuration is created.
 *
 * @see https://github.com/iamolegga/nestjs-pino
 */
@Global()
@Module({
  imports: [
    ConfigModule,
    PinoLoggerModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: createLoggerConfig,
    }),
  ],
  exports: [PinoLoggerModule],
})
export class LoggerModule {}
