import type { ScanResult } from '../schemas/output.schema.js';

export const CSV_COLUMNS = [
  'product',
  'version',
  'status',
  'eol_date',
  'support_status',
  'message',
  'cycle',
  'latest_release',
  'original_package',
  'row_number',
  'raw_data',
] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];

function toCells(result: ScanResult): Record<CsvColumn, string | number | null> {
  return {
    product: result.product,
    version: result.version,
    status: result.status,
    eol_date: result.eolDate,
    support_status: result.supportStatus,
    message: result.message,
    cycle: result.cycle,
    latest_release: result.latestRelease,
    original_package: result.originalPackage,
    row_number: result.rowNumber,
    raw_data: JSON.stringify(result.rawData),
  };
}

export function escapeCsvField(value: string | number | null): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Render results as comma-separated text with a header row and CRLF line
 * endings. An empty result list still produces the header.
 */
export function resultsToCsv(results: readonly ScanResult[]): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const result of results) {
    const cells = toCells(result);
    lines.push(CSV_COLUMNS.map((column) => escapeCsvField(cells[column])).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}
