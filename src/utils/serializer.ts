import { z } from 'zod';
import { ScanResult, ScanSummary } from '../schemas/output.schema.js';

const DetailedResults = z.array(ScanResult);

/**
 * Pretty-print scan output as human-readable JSON with consistent 2-space
 * indentation.
 */
export function prettyPrint(output: ScanSummary | readonly ScanResult[]): string {
  return JSON.stringify(output, null, 2);
}

/**
 * Parse a detailed-results JSON document back into validated ScanResults.
 * Throws a ZodError if the JSON does not conform to the schema.
 */
export function deserializeResults(json: string): ScanResult[] {
  const parsed: unknown = JSON.parse(json);
  return DetailedResults.parse(parsed);
}

/**
 * Parse a summary JSON document. Throws a ZodError on schema mismatch.
 */
export function deserializeSummary(json: string): ScanSummary {
  const parsed: unknown = JSON.parse(json);
  return ScanSummary.parse(parsed);
}
