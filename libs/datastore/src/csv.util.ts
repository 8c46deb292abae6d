/**
 * Minimal CSV rendering for the tabular outputs.
 * Values containing a delimiter, quote or line break are quoted (RFC 4180).
 */

export type CsvRow = Record<string, unknown>;

export function toCsvCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  const raw = String(value);
  if (!/[",\r\n]/.test(raw)) return raw;
  return `"${raw.replaceAll('"', '""')}"`;
}

export function renderCsv(rows: readonly CsvRow[], headers: readonly string[]): string {
  const out: string[] = [headers.map(toCsvCell).join(',')];
  for (const row of rows) {
    out.push(headers.map((key) => toCsvCell(row[key])).join(','));
  }
  return out.join('\n') + '\n';
}
