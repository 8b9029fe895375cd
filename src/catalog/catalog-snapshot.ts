import { normalizeProductList, type Cycle } from '../schemas/catalog.schema.js';
import type { CatalogClient } from './catalog-client.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Immutable view of the product universe for one process run.
 *
 * `keys` keeps the order the service returned, which is the order the
 * matcher walks when several keys satisfy a substring rule.
 */
export interface CatalogSnapshot {
  readonly keys: readonly string[];
  readonly size: number;
  has(key: string): boolean;
}

export function createCatalogSnapshot(keys: Iterable<string>): CatalogSnapshot {
  const ordered = Object.freeze(normalizeProductList([...keys]));
  const lookup = new Set(ordered);

  return Object.freeze({
    keys: ordered,
    size: ordered.length,
    has: (key: string) => lookup.has(key),
  });
}

/**
 * Fetch the product list once and freeze it. An unreachable service yields
 * an empty snapshot, so every row later resolves to `not_found`.
 */
export async function loadCatalogSnapshot(
  client: CatalogClient,
  logger: Logger = silentLogger,
): Promise<CatalogSnapshot> {
  logger.info('Fetching product list from lifecycle API...');
  const snapshot = createCatalogSnapshot(await client.listProducts());
  logger.info(`Found ${snapshot.size} products in EOL database`);
  return snapshot;
}

// ---------------------------------------------------------------------------
// Per-run cycle lookups
// ---------------------------------------------------------------------------

export interface CycleLoader {
  load(product: string): Promise<readonly Cycle[]>;
  /** Number of distinct products requested from the client so far */
  readonly requestCount: number;
}

/**
 * Wrap a client so each distinct product is requested at most once per run.
 * The memo lives only as long as the loader; nothing is persisted.
 */
export function createCycleLoader(client: CatalogClient): CycleLoader {
  const loaded = new Map<string, readonly Cycle[]>();

  return {
    async load(product: string): Promise<readonly Cycle[]> {
      const cached = loaded.get(product);
      if (cached) return cached;
      const cycles = Object.freeze(await client.getProductCycles(product));
      loaded.set(product, cycles);
      return cycles;
    },
    get requestCount(): number {
      return loaded.size;
    },
  };
}
