/**
 * eol-scan: match inventory package names against a public end-of-life
 * lifecycle database and report the support status of each package.
 *
 * This is the orchestrator that wires the full pipeline:
 * resolve input files → load catalog snapshot (once) → per file:
 * read → match → resolve → summarize → write reports
 */

import type { Dirent } from 'node:fs';
import fsPromises from 'node:fs/promises';
import path from 'node:path';
import { createHttpCatalogClient, type CatalogClient } from './catalog/catalog-client.js';
import {
  createCycleLoader,
  loadCatalogSnapshot,
  type CatalogSnapshot,
} from './catalog/catalog-snapshot.js';
import { readInventory, type InventoryTable } from './input/inventory-reader.js';
import { processRows } from './pipeline/row-pipeline.js';
import { buildScanSummary, formatTimestamp } from './report/summary.js';
import { writeReports, type WrittenReports } from './report/report-writer.js';
import type { ScanConfig } from './schemas/config.schema.js';
import type { ScanResult, ScanSummary } from './schemas/output.schema.js';
import { InventoryReadError, type InventoryErrorCode } from './utils/errors.js';
import { describeError, silentLogger, type Logger } from './utils/logger.js';

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

export const VERSION = '1.0.0';

export const USER_AGENT = `eol-scan/${VERSION}`;

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

/**
 * Shared, read-only state for scanning any number of files in one run.
 */
export interface ScanContext {
  catalog: CatalogSnapshot;
  client: CatalogClient;
  logger?: Logger;
  /** Clock override so tests get stable artifact names */
  now?: () => Date;
}

export type FileScanResult =
  | {
      success: true;
      filePath: string;
      summary: ScanSummary;
      results: ScanResult[];
      files: WrittenReports;
    }
  | {
      success: false;
      filePath: string;
      code: InventoryErrorCode | 'WRITE_ERROR';
      error: string;
    };

/**
 * Which inventory files a run processes.
 * - `file`: one explicit path
 * - `first`: the first `.csv` (by name) in the input directory
 * - `all`: every `.csv` in the input directory, each into its own subdirectory
 */
export type InputSelection =
  | { mode: 'file'; filePath: string }
  | { mode: 'first' }
  | { mode: 'all' };

export interface RunScanOptions {
  config: ScanConfig;
  selection: InputSelection;
  /** Defaults to the HTTP client built from `config` */
  client?: CatalogClient;
  logger?: Logger;
  now?: () => Date;
}

export interface RunScanResult {
  /** 1 only for setup failures (missing input directory, no inventory files) */
  exitCode: 0 | 1;
  files: FileScanResult[];
}

// ---------------------------------------------------------------------------
// Re-exports for consumer convenience
// ---------------------------------------------------------------------------

export type { CatalogClient, FetchLike } from './catalog/catalog-client.js';
export type { CatalogSnapshot, CycleLoader } from './catalog/catalog-snapshot.js';
export type { Cycle } from './schemas/catalog.schema.js';
export type { ScanResult, ScanSummary, ScanStatus, SupportStatus } from './schemas/output.schema.js';
export type { ScanConfig } from './schemas/config.schema.js';
export type { Logger } from './utils/logger.js';
export type { WrittenReports } from './report/report-writer.js';
export { createHttpCatalogClient } from './catalog/catalog-client.js';
export { createCatalogSnapshot, createCycleLoader, loadCatalogSnapshot } from './catalog/catalog-snapshot.js';
export { matchProduct, explainMatch } from './matcher/product-matcher.js';
export { resolveStatus } from './resolver/status-resolver.js';
export { processRows, extractPackageFields } from './pipeline/row-pipeline.js';
export { readInventory } from './input/inventory-reader.js';
export { loadConfig } from './config/config.js';
export { createLogger, silentLogger } from './utils/logger.js';

// ---------------------------------------------------------------------------
// scanInventoryFile: one file end to end
// ---------------------------------------------------------------------------

/**
 * Scan one inventory file and write its artifacts into `outputDir`.
 *
 * Read and write failures are returned as `{ success: false }` so the caller
 * can move on to the next file. Cycle lookups are de-duplicated within this
 * file only.
 */
export async function scanInventoryFile(
  filePath: string,
  outputDir: string,
  context: ScanContext,
): Promise<FileScanResult> {
  const logger = context.logger ?? silentLogger;
  const now = context.now ?? (() => new Date());

  let table: InventoryTable;
  try {
    table = await readInventory(filePath);
  } catch (err) {
    if (err instanceof InventoryReadError) {
      logger.error(err.message);
      return { success: false, filePath, code: err.code, error: err.message };
    }
    throw err;
  }

  const pipeline = await processRows(table.rows, {
    catalog: context.catalog,
    cycles: createCycleLoader(context.client),
    logger,
  });

  const scannedAt = now();
  const timestamp = formatTimestamp(scannedAt);
  const summary = buildScanSummary(pipeline.results, pipeline.matchedProducts, pipeline.skippedRows, {
    sourceFile: path.basename(filePath),
    scannedAt,
  });

  let files: WrittenReports;
  try {
    files = await writeReports(pipeline.results, summary, outputDir, timestamp);
  } catch (err) {
    const error = `Failed to write reports to ${outputDir}: ${describeError(err)}`;
    logger.error(error);
    return { success: false, filePath, code: 'WRITE_ERROR', error };
  }

  logger.info('Generated reports:');
  for (const written of Object.values(files)) {
    if (written) logger.info(`  - ${path.basename(written)}`);
  }
  logger.info(`Processing complete. Results saved to ${outputDir}`);

  return { success: true, filePath, summary, results: pipeline.results, files };
}

// ---------------------------------------------------------------------------
// Input discovery
// ---------------------------------------------------------------------------

type InputResolution = { ok: true; files: string[] } | { ok: false; error: string };

/**
 * List `.csv` files (case-insensitive extension) directly inside `inputDir`,
 * sorted by name.
 */
export async function listInventoryFiles(inputDir: string): Promise<InputResolution> {
  let entries: Dirent[];
  try {
    entries = await fsPromises.readdir(inputDir, { withFileTypes: true });
  } catch {
    return { ok: false, error: `Input directory not found: ${inputDir}` };
  }

  const files = entries
    .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === '.csv')
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(inputDir, name));

  if (files.length === 0) {
    return { ok: false, error: `No CSV files found in ${inputDir}` };
  }
  return { ok: true, files };
}

/**
 * Output directories for `all` mode, one per file, named after the file
 * stem. Stems that collide ignoring case (`a.csv`, `a.CSV`) get `_2`, `_3`...
 * in input order.
 */
export function outputDirsFor(files: readonly string[], outputDir: string): string[] {
  const taken = new Set<string>();
  return files.map((filePath) => {
    const stem = path.parse(filePath).name;
    let name = stem;
    for (let n = 2; taken.has(name.toLowerCase()); n++) {
      name = `${stem}_${n}`;
    }
    taken.add(name.toLowerCase());
    return path.join(outputDir, name);
  });
}

// ---------------------------------------------------------------------------
// runScan: main orchestrator
// ---------------------------------------------------------------------------

/**
 * Run a full scan.
 *
 * Pipeline steps:
 * 1. Resolve the inventory files from the selection mode
 * 2. Load the catalog snapshot (exactly once per run)
 * 3. Scan each file in turn; a failing file does not stop the others
 */
export async function runScan(options: RunScanOptions): Promise<RunScanResult> {
  const { config, selection } = options;
  const logger = options.logger ?? silentLogger;

  // -------------------------------------------------------------------------
  // Step 1: Resolve input files
  // -------------------------------------------------------------------------
  let inputFiles: string[];
  if (selection.mode === 'file') {
    inputFiles = [selection.filePath];
  } else {
    const listed = await listInventoryFiles(config.inputDir);
    if (!listed.ok) {
      logger.error(listed.error);
      if (selection.mode === 'first') {
        logger.info(`Place an inventory CSV file in '${config.inputDir}'`);
      }
      return { exitCode: 1, files: [] };
    }

    if (selection.mode === 'all') {
      inputFiles = listed.files;
      logger.info(`Found ${inputFiles.length} CSV files to process`);
    } else {
      inputFiles = listed.files.slice(0, 1);
      if (listed.files.length > 1) {
        logger.warn(
          `Multiple CSV files found in ${config.inputDir}. Using ${path.basename(listed.files[0] ?? '')}`,
        );
        logger.info('Use --scan-all to process all CSV files');
      }
    }
  }

  // -------------------------------------------------------------------------
  // Step 2: Load catalog snapshot
  // -------------------------------------------------------------------------
  const client =
    options.client ??
    createHttpCatalogClient({
      baseUrl: config.apiBaseUrl,
      timeoutMs: config.timeoutMs,
      userAgent: USER_AGENT,
      logger,
    });
  const catalog = await loadCatalogSnapshot(client, logger);

  // -------------------------------------------------------------------------
  // Step 3: Scan files sequentially
  // -------------------------------------------------------------------------
  const context: ScanContext = { catalog, client, logger, now: options.now };
  const outcomes: FileScanResult[] = [];

  const outputDirs =
    selection.mode === 'all'
      ? outputDirsFor(inputFiles, config.outputDir)
      : inputFiles.map(() => config.outputDir);

  for (const [index, filePath] of inputFiles.entries()) {
    const outputDir = outputDirs[index] ?? config.outputDir;

    logger.info(`Processing ${path.basename(filePath)}...`);
    outcomes.push(await scanInventoryFile(filePath, outputDir, context));
  }

  return { exitCode: 0, files: outcomes };
}
