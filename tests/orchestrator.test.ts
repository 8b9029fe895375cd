/**
 * End-to-end tests for the scan orchestrator with an in-memory catalog
 * client and temporary input/output directories.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import {
  runScan,
  scanInventoryFile,
  listInventoryFiles,
  outputDirsFor,
  type InputSelection,
} from '../src/index.js';
import { createCatalogSnapshot } from '../src/catalog/catalog-snapshot.js';
import type { CatalogClient } from '../src/catalog/catalog-client.js';
import type { Cycle } from '../src/schemas/catalog.schema.js';
import type { ScanConfig } from '../src/schemas/config.schema.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const CYCLES: Record<string, Cycle[]> = {
  nginx: [
    { cycle: '1.25', eol: false, latest: '1.25.3', releaseDate: '2023-05-23', lts: null },
    { cycle: '1.24', eol: '2024-04-23', latest: '1.24.0', releaseDate: '2023-04-11', lts: null },
  ],
  python: [{ cycle: '3.8', eol: '2024-10-07', latest: '3.8.20', releaseDate: null, lts: null }],
};

interface CountingClient {
  client: CatalogClient;
  counts: { list: number; cycles: number };
}

function makeClient(): CountingClient {
  const counts = { list: 0, cycles: 0 };
  return {
    counts,
    client: {
      listProducts: async () => {
        counts.list++;
        return Object.keys(CYCLES);
      },
      getProductCycles: async (product) => {
        counts.cycles++;
        return CYCLES[product] ?? [];
      },
    },
  };
}

const fixedNow = (): Date => new Date(2026, 9, 19, 14, 30, 5, 7);
const STAMP = '20261019_143005_007';

let tmpDir: string;
let inputDir: string;
let outputDir: string;

function writeInput(name: string, content: string | Buffer): string {
  const fullPath = path.join(inputDir, name);
  fs.writeFileSync(fullPath, content);
  return fullPath;
}

function makeConfig(overrides?: Partial<ScanConfig>): ScanConfig {
  return {
    apiBaseUrl: 'https://eol.test/api',
    timeoutMs: 1000,
    inputDir,
    outputDir,
    logLevel: 'silent',
    ...overrides,
  };
}

function scan(selection: InputSelection, client: CatalogClient, config = makeConfig()) {
  return runScan({ config, selection, client, now: fixedNow });
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'orchestrator-test-'));
  inputDir = path.join(tmpDir, 'input');
  outputDir = path.join(tmpDir, 'output');
  fs.mkdirSync(inputDir);
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// scanInventoryFile
// ---------------------------------------------------------------------------

describe('scanInventoryFile', () => {
  it('scans a file and writes timestamped artifacts', async () => {
    const file = writeInput('inventory.csv', 'package_name,version\nnginx,1.24\npython,3.8\nleft-pad,1.3.0\n,2\n');
    const { client } = makeClient();

    const outcome = await scanInventoryFile(file, outputDir, {
      catalog: createCatalogSnapshot(Object.keys(CYCLES)),
      client,
      now: fixedNow,
    });

    expect(outcome.success).toBe(true);
    if (!outcome.success) return;

    expect(outcome.results.map((r) => [r.product, r.status, r.supportStatus])).toEqual([
      ['nginx', 'found', 'eol'],
      ['python', 'found', 'eol'],
      ['left-pad', 'not_found', 'unknown'],
    ]);
    expect(outcome.summary).toEqual({
      scanTimestamp: fixedNow().toISOString(),
      sourceFile: 'inventory.csv',
      totalPackages: 3,
      matchedProducts: 2,
      eolPackages: 2,
      activePackages: 0,
      unknownPackages: 1,
      notFoundPackages: 1,
      skippedRows: 1,
    });
    expect(outcome.files.summary).toBe(path.join(outputDir, `summary_${STAMP}.json`));
    expect(outcome.files.eolOnly).toBe(path.join(outputDir, `eol_packages_${STAMP}.csv`));
    expect(fs.existsSync(outcome.files.html)).toBe(true);
  });

  it('returns a failure for an unreadable file without throwing', async () => {
    const file = writeInput('broken.csv', Buffer.from([0xff, 0xfe, 0x00]));
    const { client, counts } = makeClient();

    const outcome = await scanInventoryFile(file, outputDir, {
      catalog: createCatalogSnapshot(Object.keys(CYCLES)),
      client,
    });

    expect(outcome).toMatchObject({ success: false, code: 'DECODE_ERROR', filePath: file });
    expect(counts.cycles).toBe(0);
    expect(fs.existsSync(outputDir)).toBe(false);
  });

  it('returns identical results on repeated runs', async () => {
    const file = writeInput('inventory.csv', 'name,version\nnginx,1.25\npython\nunknown,1\n');
    const { client } = makeClient();
    const context = { catalog: createCatalogSnapshot(Object.keys(CYCLES)), client, now: fixedNow };

    const first = await scanInventoryFile(file, path.join(outputDir, 'a'), context);
    const second = await scanInventoryFile(file, path.join(outputDir, 'b'), context);

    expect(first.success && second.success).toBe(true);
    if (first.success && second.success) {
      expect(second.results).toEqual(first.results);
      expect(second.summary).toEqual(first.summary);
    }
  });
});

// ---------------------------------------------------------------------------
// runScan
// ---------------------------------------------------------------------------

describe('runScan', () => {
  it('scans every CSV into its own subdirectory and loads the catalog once', async () => {
    writeInput('b.csv', 'name,version\npython,3.8\n');
    writeInput('a.csv', 'name,version\nnginx,1.25\n');
    writeInput('notes.txt', 'ignored');
    const { client, counts } = makeClient();

    const result = await scan({ mode: 'all' }, client);

    expect(result.exitCode).toBe(0);
    expect(result.files.map((f) => path.basename(f.filePath))).toEqual(['a.csv', 'b.csv']);
    expect(result.files.every((f) => f.success)).toBe(true);
    expect(counts.list).toBe(1);
    expect(fs.existsSync(path.join(outputDir, 'a', `summary_${STAMP}.json`))).toBe(true);
    expect(fs.existsSync(path.join(outputDir, 'b', `summary_${STAMP}.json`))).toBe(true);
  });

  it('gives files whose stems differ only by case separate subdirectories', async () => {
    writeInput('a.csv', 'name,version\npython,3.8\n');
    writeInput('a.CSV', 'name,version\nnginx,1.25\n');
    const { client } = makeClient();

    const result = await scan({ mode: 'all' }, client);

    expect(result.files.map((f) => path.basename(f.filePath))).toEqual(['a.CSV', 'a.csv']);
    const detailed = (dir: string): unknown =>
      JSON.parse(fs.readFileSync(path.join(outputDir, dir, `detailed_results_${STAMP}.json`), 'utf-8'));
    expect(detailed('a')).toMatchObject([{ product: 'nginx' }]);
    expect(detailed('a_2')).toMatchObject([{ product: 'python' }]);
  });

  it('keeps going after a file fails', async () => {
    writeInput('a.csv', Buffer.from([0xc3, 0x28]));
    writeInput('b.csv', 'name\nnginx\n');
    const { client } = makeClient();

    const result = await scan({ mode: 'all' }, client);

    expect(result.exitCode).toBe(0);
    expect(result.files.map((f) => f.success)).toEqual([false, true]);
  });

  it('uses only the first CSV in "first" mode', async () => {
    writeInput('b.csv', 'name\npython\n');
    writeInput('a.csv', 'name\nnginx\n');
    const { client } = makeClient();

    const result = await scan({ mode: 'first' }, client);

    expect(result.files).toHaveLength(1);
    expect(path.basename(result.files[0]?.filePath ?? '')).toBe('a.csv');
    expect(fs.existsSync(path.join(outputDir, `summary_${STAMP}.json`))).toBe(true);
  });

  it('scans an explicit file even outside the input directory', async () => {
    const elsewhere = path.join(tmpDir, 'elsewhere.csv');
    fs.writeFileSync(elsewhere, 'component,release\nnginx,1.24\n');
    const { client } = makeClient();

    const result = await scan({ mode: 'file', filePath: elsewhere }, client);

    expect(result.exitCode).toBe(0);
    const [outcome] = result.files;
    expect(outcome?.success).toBe(true);
    if (outcome?.success) {
      expect(outcome.results[0]?.eolDate).toBe('2024-04-23');
    }
  });

  it('reports a missing explicit file as a file failure, not a setup failure', async () => {
    const { client } = makeClient();
    const result = await scan({ mode: 'file', filePath: path.join(tmpDir, 'absent.csv') }, client);

    expect(result.exitCode).toBe(0);
    expect(result.files).toEqual([
      {
        success: false,
        filePath: path.join(tmpDir, 'absent.csv'),
        code: 'FILE_NOT_FOUND',
        error: `CSV file not found: ${path.join(tmpDir, 'absent.csv')}`,
      },
    ]);
  });

  it('fails setup when the input directory is missing, before any request', async () => {
    const { client, counts } = makeClient();
    const result = await scan({ mode: 'all' }, client, makeConfig({ inputDir: path.join(tmpDir, 'nope') }));

    expect(result).toEqual({ exitCode: 1, files: [] });
    expect(counts.list).toBe(0);
  });

  it('fails setup when the input directory has no CSV files', async () => {
    writeInput('readme.md', '# nothing');
    const { client } = makeClient();
    const result = await scan({ mode: 'first' }, client);
    expect(result.exitCode).toBe(1);
  });
});

describe('listInventoryFiles', () => {
  it('lists CSV files by name, ignoring case of the extension', async () => {
    writeInput('z.CSV', 'name\n');
    writeInput('m.csv', 'name\n');
    fs.mkdirSync(path.join(inputDir, 'dir.csv'));

    expect(await listInventoryFiles(inputDir)).toEqual({
      ok: true,
      files: [path.join(inputDir, 'm.csv'), path.join(inputDir, 'z.CSV')],
    });
  });
});

describe('outputDirsFor', () => {
  it('suffixes colliding stems in input order', () => {
    expect(outputDirsFor(['in/a.CSV', 'in/a.csv', 'in/a_2.csv', 'in/b.csv'], 'out')).toEqual([
      path.join('out', 'a'),
      path.join('out', 'a_2'),
      path.join('out', 'a_2_2'),
      path.join('out', 'b'),
    ]);
  });
});
