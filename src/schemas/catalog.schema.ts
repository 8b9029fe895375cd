import { z } from 'zod';

/**
 * Wire shapes served by the lifecycle database, normalized at the boundary.
 *
 * `GET /all.json` has been served both as a plain array of product
 * identifiers and as an object keyed by identifier. Internal code only ever
 * sees the normalized key list produced by `normalizeProductList`.
 */
export const ProductListResponse = z.union([
  z.array(z.unknown()),
  z.record(z.string(), z.unknown()),
]);

export type ProductListResponse = z.infer<typeof ProductListResponse>;

/** Some products publish numeric labels (e.g. `8`); labels are compared as strings. */
const CycleLabel = z
  .union([z.string(), z.number()])
  .transform((value) => String(value));

const OptionalLabel = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)))
  .catch(null);

export const Cycle = z.object({
  cycle: CycleLabel,
  /** ISO date string, `true` (EOL with no date), `false`/absent (supported) */
  eol: z
    .union([z.string(), z.boolean()])
    .nullish()
    .transform((value) => value ?? null),
  // Informational fields: a malformed value reads as null instead of
  // rejecting the cycle.
  latest: OptionalLabel,
  releaseDate: z
    .string()
    .nullish()
    .transform((value) => value ?? null)
    .catch(null),
  lts: z
    .union([z.boolean(), z.string()])
    .nullish()
    .transform((value) => value ?? null)
    .catch(null),
});

export type Cycle = z.infer<typeof Cycle>;

export const CyclesResponse = z.array(z.unknown());

// ---------------------------------------------------------------------------
// Normalizers
// ---------------------------------------------------------------------------

/**
 * Collapse either product-list shape into lowercase, de-duplicated,
 * non-empty keys in the order the service returned them.
 */
export function normalizeProductList(data: ProductListResponse): string[] {
  const raw = Array.isArray(data) ? data : Object.keys(data);
  const keys: string[] = [];
  const seen = new Set<string>();

  for (const entry of raw) {
    if (typeof entry !== 'string') continue;
    const key = entry.trim().toLowerCase();
    if (key.length === 0 || seen.has(key)) continue;
    seen.add(key);
    keys.push(key);
  }

  return keys;
}

/**
 * Validate each cycle entry independently. Entries without a usable
 * `cycle` label or `eol` value are dropped rather than failing the whole
 * product.
 */
export function normalizeCycles(data: unknown[]): Cycle[] {
  const cycles: Cycle[] = [];
  for (const entry of data) {
    const parsed = Cycle.safeParse(entry);
    if (parsed.success) {
      cycles.push(parsed.data);
    }
  }
  return cycles;
}
