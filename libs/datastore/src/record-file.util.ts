import * as path from 'path';
import { RawReviewRecord } from '@app/shared-types';

/**
 * Parse a JSON or JSON Lines document into its top-level entries.
 *
 * `.jsonl` files are read line by line: a line that fails to parse becomes
 * `null` so that callers can count it as a malformed record while the rest
 * of the file is kept. Any other extension must hold a single JSON array.
 */
export function parseRecordFile(filePath: string, content: string): unknown[] {
  if (path.extname(filePath).toLowerCase() === '.jsonl') {
    return content
      .split(/\r?\n/)
      .filter((line) => line.trim().length > 0)
      .map((line) => parseLine(line));
  }

  const parsed: unknown = JSON.parse(content);
  if (!Array.isArray(parsed)) {
    throw new Error('expected a JSON array of records');
  }
  return parsed;
}

function parseLine(line: string): unknown {
  try {
    const parsed: unknown = JSON.parse(line);
    return parsed;
  } catch {
    return null;
  }
}

export function isRecord(value: unknown): value is RawReviewRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
