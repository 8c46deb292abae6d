/**
 * Base class for application-specific errors
 * Provides a consistent error hierarchy for the review pipeline
 */
export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Transient errors indicate temporary failures that may succeed on a rerun.
 *
 * Use this for:
 * - File system contention (EBUSY, EAGAIN)
 * - Temporary resource exhaustion (EMFILE)
 */
export class TransientError extends AppError {
  constructor(message: string, originalError?: Error) {
    super(message, originalError);
  }
}

/**
 * Permanent errors indicate failures that will not succeed on retry.
 *
 * Use this for:
 * - Validation errors
 * - Invalid data/input
 * - Missing files
 * - Business logic violations
 */
export class PermanentError extends AppError {
  constructor(message: string, originalError?: Error) {
    super(message, originalError);
  }
}

/**
 * The product catalog could not be read or failed validation.
 * Fatal for a run: nothing can be aggregated without it.
 */
export class CatalogLoadError extends PermanentError {}

/**
 * A single raw review source could not be read.
 * Reported per source; other products keep going.
 */
export class SourceReadError extends PermanentError {
  constructor(
    message: string,
    public readonly sourcePath: string,
    originalError?: Error,
  ) {
    super(message, originalError);
  }
}

/**
 * Pipeline outputs could not be written. Fatal for a run.
 */
export class OutputWriteError extends PermanentError {
  constructor(
    message: string,
    public readonly targetPath: string,
    originalError?: Error,
  ) {
    super(message, originalError);
  }
}

/**
 * Environment configuration did not pass validation.
 */
export class ConfigValidationError extends PermanentError {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
  }
}

/**
 * Type guard to check if an error is a TransientError
 */
export function isTransientError(error: unknown): error is TransientError {
  return error instanceof TransientError;
}

const TRANSIENT_FS_CODES: ReadonlySet<string> = new Set([
  'EBUSY',
  'EAGAIN',
  'EMFILE',
  'ENFILE',
]);

/**
 * Whether a file system error is one a rerun is likely to get past
 */
export function isTransientFsError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const { code } = error;
  return typeof code === 'string' && TRANSIENT_FS_CODES.has(code);
}

/**
 * Normalize an unknown thrown value into an Error instance
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
