/**
 * Test Fixtures Barrel Export
 *
 * @example
 * import { PRODUCT_RECORDS, PRODUCT_X_REVIEWS } from '../fixtures';
 */

export * from './review-fixtures';
