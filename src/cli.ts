#!/usr/bin/env node
/**
 * eol-scan command line entry.
 *
 * Usage:
 *   eol-scan                       first CSV in ./input, reports in ./output
 *   eol-scan inventory.csv         one explicit file
 *   eol-scan --scan-all -i exports every CSV in ./exports, one subdirectory each
 *
 * Exit codes:
 *   0  scan ran (individual files may still have failed; see the log)
 *   1  setup failure (bad configuration, missing input directory)
 *   2  usage error
 */

import fs from 'node:fs';
import { pathToFileURL } from 'node:url';
import { loadConfig, type ConfigOverrides } from './config/config.js';
import { runScan, VERSION, type InputSelection } from './index.js';
import type { ScanConfig } from './schemas/config.schema.js';
import { createLogger } from './utils/logger.js';

// ── CLI arg parsing ─────────────────────────────────────────────────────────

export interface CliArgs {
  csvFile: string | null;
  scanAll: boolean;
  help: boolean;
  version: boolean;
  overrides: ConfigOverrides;
}

export type ParseArgsResult = { ok: true; args: CliArgs } | { ok: false; error: string };

export const USAGE = `Usage: eol-scan [csvFile] [options]

Scan software packages for end-of-life status.

Arguments:
  csvFile                 CSV file to scan (optional when using the input directory)

Options:
  -i, --input <dir>       Input directory containing CSV files (default: input)
  -o, --output <dir>      Output directory for results (default: output)
      --api-url <url>     Lifecycle API base URL (default: https://endoflife.date/api)
      --timeout <ms>      Per-request timeout in milliseconds (default: 30000)
      --scan-all          Scan every CSV file in the input directory
      --log-level <lvl>   debug | info | warn | error | silent (default: info)
  -h, --help              Show this help
  -v, --version           Show the version`;

const VALUE_FLAGS = new Map<string, keyof ScanConfig>([
  ['-i', 'inputDir'],
  ['--input', 'inputDir'],
  ['-o', 'outputDir'],
  ['--output', 'outputDir'],
  ['--api-url', 'apiBaseUrl'],
  ['--timeout', 'timeoutMs'],
  ['--log-level', 'logLevel'],
]);

export function parseCliArgs(argv: readonly string[]): ParseArgsResult {
  const args: CliArgs = {
    csvFile: null,
    scanAll: false,
    help: false,
    version: false,
    overrides: {},
  };
  const overrides: ConfigOverrides = {};

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? '';
    const eq = token.startsWith('--') ? token.indexOf('=') : -1;
    const flag = eq === -1 ? token : token.slice(0, eq);

    if (flag === '-h' || flag === '--help') {
      args.help = true;
    } else if (flag === '-v' || flag === '--version') {
      args.version = true;
    } else if (flag === '--scan-all') {
      args.scanAll = true;
    } else if (VALUE_FLAGS.has(flag)) {
      const field = VALUE_FLAGS.get(flag);
      const value = eq === -1 ? argv[++i] : token.slice(eq + 1);
      if (field === undefined || value === undefined || value === '') {
        return { ok: false, error: `Missing value for ${flag}` };
      }
      overrides[field] = value;
    } else if (token.startsWith('-')) {
      return { ok: false, error: `Unknown option: ${token}` };
    } else if (args.csvFile === null) {
      args.csvFile = token;
    } else {
      return { ok: false, error: `Unexpected argument: ${token}` };
    }
  }

  args.overrides = overrides;
  return { ok: true, args };
}

// ── Main ────────────────────────────────────────────────────────────────────

export async function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    console.error(`[eol-scan] ${parsed.error}`);
    console.error(USAGE);
    return 2;
  }

  const { args } = parsed;
  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.version) {
    console.log(VERSION);
    return 0;
  }

  const loaded = loadConfig(args.overrides, env);
  if (!loaded.success) {
    console.error(`[eol-scan] ${loaded.error}`);
    return 1;
  }

  const { config } = loaded;
  const logger = createLogger({ level: config.logLevel });

  let selection: InputSelection;
  if (args.csvFile !== null) {
    selection = { mode: 'file', filePath: args.csvFile };
  } else {
    selection = args.scanAll ? { mode: 'all' } : { mode: 'first' };
  }

  const result = await runScan({ config, selection, logger });
  return result.exitCode;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error('[eol-scan] Fatal error:', err);
      process.exitCode = 1;
    },
  );
}
