import { z } from 'zod';
import { ConfigValidationError, PIPELINE_DEFAULTS } from '@app/shared-types';

const TRUTHY_ENV_VALUES = new Set(['true', '1', 'yes', 'y', 'on']);

const booleanFromEnv = z
  .union([z.boolean(), z.string()])
  .transform((value) =>
    typeof value === 'boolean'
      ? value
      : TRUTHY_ENV_VALUES.has(value.trim().toLowerCase()),
  );

/**
 * Environment schema for the pipeline.
 *
 * Numeric values arrive as strings from process.env and are coerced here.
 * Unknown variables pass through so ConfigService still sees the rest of
 * the environment.
 */
export const pipelineEnvSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'production', 'test'])
      .default('development'),
    LOG_LEVEL: z
      .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
      .optional(),

    INPUT_DIR: z.string().min(1).default(PIPELINE_DEFAULTS.INPUT_DIR),
    OUTPUT_DIR: z.string().min(1).default(PIPELINE_DEFAULTS.OUTPUT_DIR),
    PRODUCTS_FILE: z.string().min(1).default(PIPELINE_DEFAULTS.PRODUCTS_FILE),

    MIN_LENGTH: z.coerce
      .number()
      .int()
      .min(0)
      .default(PIPELINE_DEFAULTS.MIN_LENGTH),
    MIN_DF: z.coerce.number().int().min(1).default(PIPELINE_DEFAULTS.MIN_DF),
    TOP_K: z.coerce.number().int().min(1).default(PIPELINE_DEFAULTS.TOP_K),
    NGRAM_MAX: z.coerce
      .number()
      .int()
      .min(1)
      .max(3)
      .default(PIPELINE_DEFAULTS.NGRAM_MAX),
    MAX_FEATURES: z.coerce
      .number()
      .int()
      .min(1)
      .default(PIPELINE_DEFAULTS.MAX_FEATURES),
    EXTRA_STOPWORDS: z.string().default(''),
    // empty disables the bundled list
    EXTRA_STOPWORDS_FILE: z
      .string()
      .default(PIPELINE_DEFAULTS.EXTRA_STOPWORDS_FILE),
    EXCLUDE_ALL_BRANDS: booleanFromEnv.default(false),

    PERCENT_DECIMALS: z.coerce
      .number()
      .int()
      .min(0)
      .max(6)
      .default(PIPELINE_DEFAULTS.PERCENT_DECIMALS),
    KEYWORDS_PER_RECORD: z.coerce
      .number()
      .int()
      .min(0)
      .default(PIPELINE_DEFAULTS.KEYWORDS_PER_RECORD),
  })
  .passthrough();

export type PipelineEnv = z.infer<typeof pipelineEnvSchema>;

export const PIPELINE_ENV_KEYS = Object.keys(pipelineEnvSchema.shape);

/**
 * Validate function for ConfigModule.forRoot().
 *
 * Throws ConfigValidationError listing every failing variable.
 */
export function validatePipelineEnv(
  config: Record<string, unknown>,
): PipelineEnv {
  const result = pipelineEnvSchema.safeParse(config);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigValidationError(
      `Invalid pipeline configuration: ${issues.join('; ')}`,
      issues,
    );
  }

  return result.data;
}
