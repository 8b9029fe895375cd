import type { ScanResult, ScanSummary } from '../schemas/output.schema.js';

export interface SummaryMeta {
  sourceFile: string;
  scannedAt: Date;
}

/**
 * Count results by support status. `notFoundPackages` counts rows with no
 * catalog match; those rows are also part of `unknownPackages`.
 */
export function buildScanSummary(
  results: readonly ScanResult[],
  matchedProducts: readonly string[],
  skippedRows: number,
  meta: SummaryMeta,
): ScanSummary {
  return {
    scanTimestamp: meta.scannedAt.toISOString(),
    sourceFile: meta.sourceFile,
    totalPackages: results.length,
    matchedProducts: new Set(matchedProducts).size,
    eolPackages: results.filter((r) => r.supportStatus === 'eol').length,
    activePackages: results.filter((r) => r.supportStatus === 'active').length,
    unknownPackages: results.filter((r) => r.supportStatus === 'unknown').length,
    notFoundPackages: results.filter((r) => r.status === 'not_found').length,
    skippedRows,
  };
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Local-time `YYYYMMDD_HHMMSS_mmm`. Sorts lexically in time order and is
 * embedded in every artifact name.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}` +
    `_${pad(date.getMilliseconds(), 3)}`
  );
}
