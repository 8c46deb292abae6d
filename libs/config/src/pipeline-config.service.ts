import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigValidationError, toError } from '@app/shared-types';
import {
  PIPELINE_ENV_KEYS,
  PipelineEnv,
  validatePipelineEnv,
} from './pipeline-env.schema';
import { PipelineConfig } from './pipeline-config.types';

const stopwordFileSchema = z.array(z.string());

/**
 * PipelineConfigService - Typed, frozen view of the pipeline configuration
 *
 * Values are read through ConfigService (so .env files and process.env both
 * apply), validated with the same schema used at bootstrap, and resolved
 * into one immutable object that every stage receives.
 */
@Injectable()
export class PipelineConfigService {
  private readonly logger = new Logger(PipelineConfigService.name);
  private readonly config: PipelineConfig;

  constructor(private readonly configService: ConfigService) {
    const env = this.readEnv();
    this.config = this.buildConfig(env);

    this.logger.debug(
      `Pipeline config: input=${this.config.inputDir} output=${this.config.outputDir} ` +
        `minLength=${this.config.cleaning.minLength} minDf=${this.config.keywords.minDf} ` +
        `topK=${this.config.keywords.topK}`,
    );
  }

  get(): PipelineConfig {
    return this.config;
  }

  /**
   * Plain snapshot for the run summary
   */
  toSummary(): Record<string, unknown> {
    return {
      inputDir: this.config.inputDir,
      outputDir: this.config.outputDir,
      productsFile: this.config.productsFile,
      minLength: this.config.cleaning.minLength,
      minDf: this.config.keywords.minDf,
      topK: this.config.keywords.topK,
      ngramMax: this.config.keywords.ngramMax,
      maxFeatures: this.config.keywords.maxFeatures,
      extraStopwords: this.config.keywords.extraStopwords.length,
      excludeAllBrands: this.config.keywords.excludeAllBrands,
      percentDecimals: this.config.aggregation.percentDecimals,
      keywordsPerRecord: this.config.aggregation.keywordsPerRecord,
    };
  }

  private readEnv(): PipelineEnv {
    const raw: Record<string, unknown> = {};
    for (const key of PIPELINE_ENV_KEYS) {
      const value = this.configService.get<unknown>(key);
      if (value !== undefined) {
        raw[key] = value;
      }
    }
    return validatePipelineEnv(raw);
  }

  private buildConfig(env: PipelineEnv): PipelineConfig {
    const extraStopwords = [
      ...this.parseStopwordList(env.EXTRA_STOPWORDS),
      ...(env.EXTRA_STOPWORDS_FILE
        ? this.loadStopwordFile(env.EXTRA_STOPWORDS_FILE)
        : []),
    ];

    return Object.freeze({
      inputDir: env.INPUT_DIR,
      outputDir: env.OUTPUT_DIR,
      productsFile: path.resolve(env.INPUT_DIR, env.PRODUCTS_FILE),
      cleaning: Object.freeze({ minLength: env.MIN_LENGTH }),
      keywords: Object.freeze({
        minDf: env.MIN_DF,
        topK: env.TOP_K,
        ngramMax: env.NGRAM_MAX,
        maxFeatures: env.MAX_FEATURES,
        extraStopwords: Object.freeze(
          [...new Set(extraStopwords)].sort(),
        ),
        excludeAllBrands: env.EXCLUDE_ALL_BRANDS,
      }),
      aggregation: Object.freeze({
        percentDecimals: env.PERCENT_DECIMALS,
        keywordsPerRecord: env.KEYWORDS_PER_RECORD,
      }),
    });
  }

  private parseStopwordList(value: string): string[] {
    return value
      .split(',')
      .map((word) => word.trim().toLowerCase())
      .filter((word) => word.length > 0);
  }

  private loadStopwordFile(filePath: string): string[] {
    try {
      const content = fs.readFileSync(path.resolve(filePath), 'utf8');
      return stopwordFileSchema
        .parse(JSON.parse(content))
        .map((word) => word.trim().toLowerCase())
        .filter((word) => word.length > 0);
    } catch (error) {
      const message = toError(error).message;
      throw new ConfigValidationError(
        `Cannot load EXTRA_STOPWORDS_FILE ${filePath}: ${message}`,
        [`EXTRA_STOPWORDS_FILE: ${message}`],
      );
    }
  }
}
