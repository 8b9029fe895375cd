import fsPromises from 'node:fs/promises';
import path from 'node:path';
import { InventoryReadError } from '../utils/errors.js';

// ---------------------------------------------------------------------------
// Data models
// ---------------------------------------------------------------------------

export interface InventoryRow {
  /** 1-based, header excluded, blank lines not counted */
  rowNumber: number;
  /** Cell values keyed by (trimmed) header name */
  data: Record<string, string>;
}

export interface InventoryTable {
  filePath: string;
  delimiter: string;
  headers: string[];
  rows: InventoryRow[];
}

// ---------------------------------------------------------------------------
// Delimiter sniffing
// ---------------------------------------------------------------------------

export const SNIFF_LENGTH = 1024;

/** Checked in this order; the first one present in the sample wins. */
export const CANDIDATE_DELIMITERS = [',', ';', '\t'] as const;

export function detectDelimiter(text: string): string {
  const sample = text.slice(0, SNIFF_LENGTH);
  for (const delimiter of CANDIDATE_DELIMITERS) {
    if (sample.includes(delimiter)) return delimiter;
  }
  return ',';
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Split delimited text into records. Handles quoted fields with doubled
 * quotes and embedded delimiters or line breaks, and both LF and CRLF.
 * Empty lines produce no record.
 */
export function parseDelimited(text: string, delimiter: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (inQuotes) {
      if (ch === '"') {
        if (text.charAt(i + 1) === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field.length === 0) {
      inQuotes = true;
    } else if (ch === delimiter) {
      record.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      record.push(field);
      records.push(record);
      record = [];
      field = '';
      if (ch === '\r' && text.charAt(i + 1) === '\n') i++;
    } else {
      field += ch;
    }
    i++;
  }

  if (field.length > 0 || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  return records.filter((r) => !(r.length === 1 && r[0] === ''));
}

/**
 * Turn parsed records into header-keyed rows. Short rows leave trailing
 * columns absent; surplus cells are dropped.
 */
export function toInventoryRows(records: string[][]): { headers: string[]; rows: InventoryRow[] } {
  const [headerRecord, ...body] = records;
  if (!headerRecord) return { headers: [], rows: [] };

  const headers = headerRecord.map((h) => h.trim());
  const rows = body.map((cells, index) => {
    const data: Record<string, string> = {};
    const width = Math.min(headers.length, cells.length);
    for (let col = 0; col < width; col++) {
      const header = headers[col];
      const cell = cells[col];
      if (header && cell !== undefined) data[header] = cell;
    }
    return { rowNumber: index + 1, data };
  });

  return { headers, rows };
}

// ---------------------------------------------------------------------------
// File loading
// ---------------------------------------------------------------------------

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Load an inventory export from disk.
 *
 * @throws InventoryReadError when the file is missing, is not a `.csv`,
 * is not valid UTF-8, or cannot be read.
 */
export async function readInventory(filePath: string): Promise<InventoryTable> {
  let buffer: Buffer;
  try {
    const stat = await fsPromises.stat(filePath);
    if (!stat.isFile()) {
      throw new InventoryReadError('READ_ERROR', filePath, `Not a regular file: ${filePath}`);
    }
    if (path.extname(filePath).toLowerCase() !== '.csv') {
      throw new InventoryReadError('NOT_CSV', filePath, `File is not a CSV file: ${filePath}`);
    }
    buffer = await fsPromises.readFile(filePath);
  } catch (err) {
    if (err instanceof InventoryReadError) throw err;
    if (errorCode(err) === 'ENOENT') {
      throw new InventoryReadError('FILE_NOT_FOUND', filePath, `CSV file not found: ${filePath}`);
    }
    throw new InventoryReadError(
      'READ_ERROR',
      filePath,
      `Error reading CSV file ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  let text: string;
  try {
    // A leading UTF-8 BOM is dropped by the decoder.
    text = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    throw new InventoryReadError(
      'DECODE_ERROR',
      filePath,
      `CSV file encoding error, save it as UTF-8: ${filePath}`,
    );
  }

  const delimiter = detectDelimiter(text);
  const { headers, rows } = toInventoryRows(parseDelimited(text, delimiter));

  return { filePath, delimiter, headers, rows };
}
