import type { ResolutionResult } from '../resolution';

export const CSV_HEADER = ['Acronym', 'Definition', 'Confidence', 'Source', 'Note', 'FirstSeenExcerpt'];

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function row(fields: string[]): string {
  return fields.map(escapeCsvField).join(',');
}

/** One row per acronym with its chosen definition, CRLF line endings. */
export function toCsv(results: ResolutionResult[]): string {
  const lines = [row(CSV_HEADER)];
  for (const result of results) {
    lines.push(
      row([
        result.term,
        result.definition,
        String(result.confidence),
        result.source,
        result.note ?? '',
        result.excerpt ?? '',
      ])
    );
  }
  return `${lines.join('\r\n')}\r\n`;
}
