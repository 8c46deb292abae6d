/**
 * Pipeline-wide constants
 */

/**
 * Compound-score cut-offs for sentiment labels.
 * Not configurable: comparison records across runs depend on these values.
 */
export const SENTIMENT_THRESHOLDS = {
  POSITIVE: 0.05,
  NEGATIVE: -0.05,
} as const;

/**
 * Default values for the pipeline configuration surface
 */
export const PIPELINE_DEFAULTS = {
  INPUT_DIR: 'data/raw',
  OUTPUT_DIR: 'data/outputs',
  PRODUCTS_FILE: 'products.json',
  MIN_LENGTH: 20,
  MIN_DF: 2,
  TOP_K: 20,
  NGRAM_MAX: 2,
  MAX_FEATURES: 2000,
  EXTRA_STOPWORDS_FILE: 'config/extra-stopwords.json',
  PERCENT_DECIMALS: 1,
  KEYWORDS_PER_RECORD: 10,
} as const;

/**
 * File names used for pipeline inputs and outputs
 */
export const PIPELINE_FILES = {
  REVIEW_SOURCE_PATTERN: /^reviews_(.+)\.(json|jsonl)$/,
  CLEANED_REVIEWS: 'cleaned_reviews.jsonl',
  SCORED_REVIEWS: 'scored_reviews.jsonl',
  KEYWORDS_CSV: 'keywords.csv',
  KEYWORDS_JSON: 'keywords.json',
  COMPARISON_CSV: 'comparison.csv',
  COMPARISON_JSON: 'comparison.json',
  RUN_SUMMARY: 'run-summary.json',
} as const;
