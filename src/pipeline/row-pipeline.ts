/**
 * Row pipeline: turns inventory rows into ScanResults, one per row that
 * carries a package name, preserving input order.
 *
 * row → extract (name, version) → match product → load cycles → resolve
 */

import type { CatalogSnapshot, CycleLoader } from '../catalog/catalog-snapshot.js';
import type { InventoryRow } from '../input/inventory-reader.js';
import { explainMatch } from '../matcher/product-matcher.js';
import { resolveStatus } from '../resolver/status-resolver.js';
import type { ScanResult } from '../schemas/output.schema.js';
import { silentLogger, type Logger } from '../utils/logger.js';

// ---------------------------------------------------------------------------
// Column aliases (priority order)
// ---------------------------------------------------------------------------

export const NAME_COLUMNS = ['name', 'package_name', 'package', 'component', 'artifact'] as const;

export const VERSION_COLUMNS = ['version', 'package_version', 'ver', 'release'] as const;

export const NOT_FOUND_MESSAGE = 'Package not found in EOL database';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface PipelineContext {
  catalog: CatalogSnapshot;
  cycles: CycleLoader;
  logger?: Logger;
}

export interface RowPipelineResult {
  results: ScanResult[];
  /** Distinct matched product keys, in first-seen order */
  matchedProducts: string[];
  skippedRows: number;
}

export interface PackageFields {
  name: string | null;
  version: string | null;
}

// ---------------------------------------------------------------------------
// Field extraction
// ---------------------------------------------------------------------------

function pickFirst(columns: Map<string, string>, aliases: readonly string[]): string | null {
  for (const alias of aliases) {
    const value = columns.get(alias)?.trim();
    if (value) return value;
  }
  return null;
}

/**
 * Pull the package name and version out of a row. Header names are compared
 * trimmed and lowercased; the first alias with a non-blank value wins.
 */
export function extractPackageFields(data: Record<string, string>): PackageFields {
  const columns = new Map<string, string>();
  for (const [header, value] of Object.entries(data)) {
    const key = header.trim().toLowerCase();
    if (!columns.has(key)) columns.set(key, value);
  }

  return {
    name: pickFirst(columns, NAME_COLUMNS),
    version: pickFirst(columns, VERSION_COLUMNS),
  };
}

// ---------------------------------------------------------------------------
// processRows
// ---------------------------------------------------------------------------

export async function processRows(
  rows: readonly InventoryRow[],
  context: PipelineContext,
): Promise<RowPipelineResult> {
  const logger = context.logger ?? silentLogger;
  const results: ScanResult[] = [];
  const matched = new Set<string>();
  let skippedRows = 0;

  for (const row of rows) {
    const { name, version } = extractPackageFields(row.data);

    if (name === null) {
      logger.warn(`Row ${row.rowNumber}: No package name found`);
      skippedRows++;
      continue;
    }

    const bookkeeping = {
      originalPackage: name,
      rowNumber: row.rowNumber,
      rawData: { ...row.data },
    };

    const match = explainMatch(name, context.catalog);

    if (match === null) {
      results.push(
        Object.freeze({
          product: name,
          version,
          status: 'not_found' as const,
          eolDate: null,
          supportStatus: 'unknown' as const,
          message: NOT_FOUND_MESSAGE,
          cycle: null,
          latestRelease: null,
          ...bookkeeping,
        }),
      );
    } else {
      logger.debug(`Row ${row.rowNumber}: "${name}" matched ${match.product} (${match.rule})`);
      matched.add(match.product);
      const cycles = await context.cycles.load(match.product);
      results.push(Object.freeze({ ...resolveStatus(match.product, version, cycles), ...bookkeeping }));
    }

    logger.info(`Processed ${name} (row ${row.rowNumber})`);
  }

  return { results, matchedProducts: [...matched], skippedRows };
}
