/**
 * Settings for the cleaning stage
 */
export interface CleaningConfig {
  /** Minimum normalized review length, in characters */
  readonly minLength: number;
}

/**
 * Settings for keyword extraction. Built once and shared read-only
 * across products.
 */
export interface KeywordConfig {
  readonly minDf: number;
  readonly topK: number;
  readonly ngramMax: number;
  readonly maxFeatures: number;
  readonly extraStopwords: readonly string[];
  /** Also drop every catalog brand's tokens, not just the product's own */
  readonly excludeAllBrands: boolean;
}

/**
 * Settings for metric aggregation
 */
export interface AggregationConfig {
  readonly percentDecimals: number;
  /** Keywords per bucket denormalized onto each comparison record */
  readonly keywordsPerRecord: number;
}

export interface PipelineConfig {
  readonly inputDir: string;
  readonly outputDir: string;
  readonly productsFile: string;
  readonly cleaning: CleaningConfig;
  readonly keywords: KeywordConfig;
  readonly aggregation: AggregationConfig;
}
