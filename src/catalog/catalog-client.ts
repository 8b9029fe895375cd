/**
 * Lifecycle catalog client interface and the HTTP implementation backed by
 * the endoflife.date JSON API.
 *
 * The interface is what the pipeline depends on, so tests swap in an
 * in-memory client. Both operations resolve to empty data on any transport,
 * HTTP or shape error: a failed lookup never aborts a run.
 */

import {
  CyclesResponse,
  ProductListResponse,
  normalizeCycles,
  normalizeProductList,
  type Cycle,
} from '../schemas/catalog.schema.js';
import { DEFAULT_API_BASE_URL, DEFAULT_TIMEOUT_MS } from '../schemas/config.schema.js';
import { CatalogRequestError } from '../utils/errors.js';
import { describeError, silentLogger, type Logger } from '../utils/logger.js';

// ---------------------------------------------------------------------------
// Client interface
// ---------------------------------------------------------------------------

export interface CatalogClient {
  /** Lowercase product keys in service order; `[]` when unavailable. */
  listProducts(): Promise<string[]>;
  /** Cycles for one product, newest first as served; `[]` when unavailable. */
  getProductCycles(product: string): Promise<Cycle[]>;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpCatalogClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
  /** Defaults to the global `fetch` */
  fetchImpl?: FetchLike;
}

// ---------------------------------------------------------------------------
// HTTP implementation
// ---------------------------------------------------------------------------

export function createHttpCatalogClient(options: HttpCatalogClientOptions = {}): CatalogClient {
  const baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const logger = options.logger ?? silentLogger;
  const fetchImpl: FetchLike = options.fetchImpl ?? ((url, init) => fetch(url, init));
  const headers: Record<string, string> = { Accept: 'application/json' };
  if (options.userAgent) headers['User-Agent'] = options.userAgent;

  async function fetchJson(url: string): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetchImpl(url, { headers, signal: controller.signal });
      if (!response.ok) {
        throw new CatalogRequestError(`HTTP ${response.status} from ${url}`);
      }
      const body: unknown = await response.json();
      return body;
    } finally {
      clearTimeout(timer);
    }
  }

  return {
    async listProducts(): Promise<string[]> {
      const url = `${baseUrl}/all.json`;
      try {
        const parsed = ProductListResponse.safeParse(await fetchJson(url));
        if (!parsed.success) {
          logger.error(`Unexpected product list shape from ${url}`);
          return [];
        }
        return normalizeProductList(parsed.data);
      } catch (err) {
        logger.error(`Failed to fetch products from API: ${describeError(err)}`);
        return [];
      }
    },

    async getProductCycles(product: string): Promise<Cycle[]> {
      const url = `${baseUrl}/${encodeURIComponent(product)}.json`;
      try {
        const parsed = CyclesResponse.safeParse(await fetchJson(url));
        if (!parsed.success) {
          logger.warn(`Unexpected cycle list shape for ${product}`);
          return [];
        }
        return normalizeCycles(parsed.data);
      } catch (err) {
        logger.warn(`Failed to fetch cycles for ${product}: ${describeError(err)}`);
        return [];
      }
    },
  };
}
