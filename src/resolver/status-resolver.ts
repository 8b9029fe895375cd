/**
 * Status resolver: derives a support status for a matched product from its
 * lifecycle cycles. Pure: no I/O, inputs are never mutated.
 */

import type { Cycle } from '../schemas/catalog.schema.js';
import type { ScanResult } from '../schemas/output.schema.js';

export type ResolvedStatus = Pick<
  ScanResult,
  | 'product'
  | 'version'
  | 'status'
  | 'eolDate'
  | 'supportStatus'
  | 'message'
  | 'cycle'
  | 'latestRelease'
>;

export const PRODUCT_NOT_IN_DATABASE = 'product not in database';

/**
 * A cycle is end-of-life when its `eol` is `true` or a non-empty date.
 * `false`, `null` and `''` mean still supported.
 */
export function isEndOfLife(eol: Cycle['eol']): boolean {
  if (typeof eol === 'string') return eol.length > 0;
  return eol === true;
}

function eolDateOf(eol: Cycle['eol']): string | null {
  return typeof eol === 'string' && eol.length > 0 ? eol : null;
}

function fromCycle(
  productKey: string,
  version: string,
  cycle: Cycle,
  message: string,
): ResolvedStatus {
  return {
    product: productKey,
    version,
    status: 'found',
    eolDate: eolDateOf(cycle.eol),
    supportStatus: isEndOfLife(cycle.eol) ? 'eol' : 'active',
    message,
    cycle: cycle.cycle,
    latestRelease: cycle.latest,
  };
}

/**
 * Resolve the status of `version` of `productKey`.
 *
 * - no cycles → `unknown`
 * - no version → the first cycle is treated as the latest release line
 * - otherwise the first cycle whose label equals `version` exactly
 * - no such cycle → `version_not_found`
 */
export function resolveStatus(
  productKey: string,
  version: string | null,
  cycles: readonly Cycle[],
): ResolvedStatus {
  const latest = cycles[0];
  if (latest === undefined) {
    return {
      product: productKey,
      version,
      status: 'unknown',
      eolDate: null,
      supportStatus: 'unknown',
      message: PRODUCT_NOT_IN_DATABASE,
      cycle: null,
      latestRelease: null,
    };
  }

  if (version === null || version.length === 0) {
    return fromCycle(
      productKey,
      'latest',
      latest,
      `Found ${cycles.length} cycles, latest is ${latest.cycle}`,
    );
  }

  const match = cycles.find((c) => c.cycle === version);
  if (match) {
    const eolDate = eolDateOf(match.eol);
    let message = 'Still supported';
    if (isEndOfLife(match.eol)) {
      message = eolDate ? `EOL date: ${eolDate}` : 'End of life';
    }
    return fromCycle(productKey, version, match, message);
  }

  return {
    product: productKey,
    version,
    status: 'version_not_found',
    eolDate: null,
    supportStatus: 'unknown',
    message: `Version ${version} not found for ${productKey}`,
    cycle: null,
    latestRelease: null,
  };
}
