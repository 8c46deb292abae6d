import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import utc from 'dayjs/plugin/utc';
import { RawReviewRecord, StarRating } from '@app/shared-types';

dayjs.extend(customParseFormat);
dayjs.extend(utc);

/**
 * Source field names accepted for each canonical review field, in priority
 * order. Covers the pipeline's own layout and the public review dumps the
 * fetch step produces.
 */
export const REVIEW_FIELD_ALIASES = {
  reviewId: ['review_id', 'reviewerID', 'id'],
  productId: ['product_id'],
  text: ['text', 'review_body', 'reviewText'],
  rating: ['rating', 'star_rating', 'overall'],
  verified: ['verified', 'verified_purchase'],
  date: ['date', 'review_date', 'reviewTime', 'unixReviewTime'],
} as const;

const MARKUP_TAG = /<[^>]*>/g;
const HTML_ENTITY = /&(amp|lt|gt|quot|apos|nbsp|#39);/g;
const HTML_ENTITY_VALUES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  '#39': "'",
};
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001F\u007F-\u009F\u200B-\u200D\uFEFF]/g;
const PUNCTUATION_FOLDS: ReadonlyArray<[RegExp, string]> = [
  [/[\u2018\u2019\u201A\u2032]/g, "'"],
  [/[\u201C\u201D\u201E\u2033]/g, '"'],
  [/[\u2010-\u2015\u2212]/g, '-'],
  [/\u2026/g, '...'],
];

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T/;
const EPOCH_DIGITS = /^\d{9,13}$/;
const DATE_FORMATS = [
  'YYYY-MM-DD',
  'MM DD, YYYY',
  'M D, YYYY',
  'MM/DD/YYYY',
  'M/D/YYYY',
  'YYYY/MM/DD',
  'MMMM D, YYYY',
  'MMM D, YYYY',
  'D MMMM YYYY',
];

const TRUTHY_FLAGS = new Set(['true', '1', 'yes', 'y']);

export function pickField(
  record: RawReviewRecord,
  aliases: readonly string[],
): unknown {
  for (const alias of aliases) {
    const value = record[alias];
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return undefined;
}

/**
 * Canonical review text: markup and control characters removed,
 * typographic punctuation folded to ASCII, lowercased, whitespace collapsed.
 * Sentence punctuation is kept for the sentiment rules.
 */
export function normalizeReviewText(value: unknown): string {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return '';
  }

  let text = String(value)
    .replace(HTML_ENTITY, (_match, name: string) => HTML_ENTITY_VALUES[name] ?? ' ')
    .replace(MARKUP_TAG, ' ')
    .replace(CONTROL_CHARS, ' ')
    .normalize('NFKC');

  for (const [pattern, replacement] of PUNCTUATION_FOLDS) {
    text = text.replace(pattern, replacement);
  }

  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

function isStarRating(value: number): value is StarRating {
  return value === 1 || value === 2 || value === 3 || value === 4 || value === 5;
}

/**
 * Star rating as an integer 1-5, or null when the value is unusable.
 * Fractional ratings inside the range are rounded to the nearest star.
 */
export function coerceRating(value: unknown): StarRating | null {
  let numeric: number;
  if (typeof value === 'number') {
    numeric = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    numeric = Number(value.trim());
  } else {
    return null;
  }

  if (!Number.isFinite(numeric) || numeric < 1 || numeric > 5) {
    return null;
  }

  const rounded = Math.round(numeric);
  return isStarRating(rounded) ? rounded : null;
}

export function coerceVerified(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value === 1;
  if (typeof value === 'string') {
    return TRUTHY_FLAGS.has(value.trim().toLowerCase());
  }
  return false;
}

/**
 * Calendar date as YYYY-MM-DD, or null when the value cannot be parsed.
 * Accepts ISO dates and timestamps, unix seconds or milliseconds, and the
 * common US spellings used by review exports ("09 13, 2016", "9/13/2016").
 */
export function parseReviewDate(value: unknown): string | null {
  if (typeof value === 'number' || (typeof value === 'string' && EPOCH_DIGITS.test(value.trim()))) {
    const epoch = Number(value);
    if (!Number.isFinite(epoch) || epoch <= 0) {
      return null;
    }
    // Values below 1e11 are seconds; larger ones are milliseconds
    const parsed = dayjs.utc(epoch < 1e11 ? epoch * 1000 : epoch);
    return parsed.isValid() ? parsed.format('YYYY-MM-DD') : null;
  }

  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim().replace(/\s+/g, ' ');
  if (text === '') {
    return null;
  }

  if (ISO_TIMESTAMP.test(text)) {
    const parsed = dayjs.utc(text);
    return parsed.isValid() ? parsed.format('YYYY-MM-DD') : null;
  }

  for (const format of DATE_FORMATS) {
    const parsed = dayjs(text, format, true);
    if (parsed.isValid()) {
      return parsed.format('YYYY-MM-DD');
    }
  }

  return null;
}

/**
 * Review id as a trimmed string, or null when absent
 */
export function coerceIdentifier(value: unknown): string | null {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  const id = String(value).trim();
  return id.length > 0 ? id : null;
}
