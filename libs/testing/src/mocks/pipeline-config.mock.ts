import {
  AggregationConfig,
  CleaningConfig,
  KeywordConfig,
  PipelineConfig,
} from '@app/config';
import { PIPELINE_DEFAULTS } from '@app/shared-types';

export interface PipelineConfigOverrides {
  inputDir?: string;
  outputDir?: string;
  productsFile?: string;
  cleaning?: Partial<CleaningConfig>;
  keywords?: Partial<KeywordConfig>;
  aggregation?: Partial<AggregationConfig>;
}

/**
 * Build a complete pipeline config from defaults plus overrides
 */
export function buildPipelineConfig(
  overrides: PipelineConfigOverrides = {},
): PipelineConfig {
  return {
    inputDir: overrides.inputDir ?? PIPELINE_DEFAULTS.INPUT_DIR,
    outputDir: overrides.outputDir ?? PIPELINE_DEFAULTS.OUTPUT_DIR,
    productsFile:
      overrides.productsFile ??
      `${PIPELINE_DEFAULTS.INPUT_DIR}/${PIPELINE_DEFAULTS.PRODUCTS_FILE}`,
    cleaning: {
      minLength: PIPELINE_DEFAULTS.MIN_LENGTH,
      ...overrides.cleaning,
    },
    keywords: {
      minDf: PIPELINE_DEFAULTS.MIN_DF,
      topK: PIPELINE_DEFAULTS.TOP_K,
      ngramMax: PIPELINE_DEFAULTS.NGRAM_MAX,
      maxFeatures: PIPELINE_DEFAULTS.MAX_FEATURES,
      extraStopwords: [],
      excludeAllBrands: false,
      ...overrides.keywords,
    },
    aggregation: {
      percentDecimals: PIPELINE_DEFAULTS.PERCENT_DECIMALS,
      keywordsPerRecord: PIPELINE_DEFAULTS.KEYWORDS_PER_RECORD,
      ...overrides.aggregation,
    },
  };
}

/**
 * Mock implementation of PipelineConfigService for testing
 */
export const createMockPipelineConfigService = (
  overrides: PipelineConfigOverrides = {},
) => {
  const config = buildPipelineConfig(overrides);
  return {
    get: jest.fn().mockReturnValue(config),
    toSummary: jest.fn().mockReturnValue({ outputDir: config.outputDir }),
  };
};
