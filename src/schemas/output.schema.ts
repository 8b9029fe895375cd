import { z } from 'zod';

export const ScanStatus = z.enum(['found', 'version_not_found', 'not_found', 'unknown']);

export type ScanStatus = z.infer<typeof ScanStatus>;

export const SupportStatus = z.enum(['active', 'eol', 'unknown']);

export type SupportStatus = z.infer<typeof SupportStatus>;

/**
 * One row of an inventory export after matching and status resolution.
 */
export const ScanResult = z.object({
  /** Matched catalog key, or the original package name when nothing matched */
  product: z.string(),
  /** Version from the row, `'latest'` when the row had none and a cycle was found */
  version: z.string().nullable(),
  status: ScanStatus,
  eolDate: z.string().nullable(),
  supportStatus: SupportStatus,
  message: z.string(),
  /** Label of the cycle the status was derived from */
  cycle: z.string().nullable(),
  /** Latest release published in that cycle */
  latestRelease: z.string().nullable(),
  originalPackage: z.string(),
  /** 1-based data row number (header excluded) */
  rowNumber: z.number().int().positive(),
  rawData: z.record(z.string(), z.string()),
});

export type ScanResult = z.infer<typeof ScanResult>;

export const ScanSummary = z.object({
  scanTimestamp: z.string(),
  sourceFile: z.string(),
  totalPackages: z.number().int().nonnegative(),
  matchedProducts: z.number().int().nonnegative(),
  eolPackages: z.number().int().nonnegative(),
  activePackages: z.number().int().nonnegative(),
  unknownPackages: z.number().int().nonnegative(),
  notFoundPackages: z.number().int().nonnegative(),
  skippedRows: z.number().int().nonnegative(),
});

export type ScanSummary = z.infer<typeof ScanSummary>;
