import type { CatalogSnapshot } from '../catalog/catalog-snapshot.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export type MatchRule = 'exact' | 'substring' | 'variant-exact' | 'variant-substring';

export interface ProductMatch {
  product: string;
  rule: MatchRule;
  /** The lowercased name or variant that produced the hit */
  term: string;
}

// ---------------------------------------------------------------------------
// Variants
// ---------------------------------------------------------------------------

/**
 * Alternate spellings tried after the lowercased name itself, in this order:
 * dashes removed, underscores removed, dots removed, first whitespace token.
 */
export function normalizedVariants(lowerName: string): string[] {
  return [
    lowerName.replaceAll('-', ''),
    lowerName.replaceAll('_', ''),
    lowerName.replaceAll('.', ''),
    lowerName.split(/\s+/)[0] ?? lowerName,
  ];
}

/**
 * First key in catalog order that contains `term` or is contained by it.
 * When several keys qualify the winner is whichever the service listed first.
 */
function findBySubstring(term: string, keys: readonly string[]): string | null {
  for (const key of keys) {
    if (key.includes(term) || term.includes(key)) {
      return key;
    }
  }
  return null;
}

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

/**
 * Map a free-text package name to a catalog product key, reporting which
 * rule produced the hit. Rules are tried in strict priority order and the
 * first hit wins. Blank names, and variants that reduce to an empty string,
 * never match.
 */
export function explainMatch(packageName: string, catalog: CatalogSnapshot): ProductMatch | null {
  const lower = packageName.trim().toLowerCase();
  if (lower.length === 0) return null;

  if (catalog.has(lower)) {
    return { product: lower, rule: 'exact', term: lower };
  }

  const bySubstring = findBySubstring(lower, catalog.keys);
  if (bySubstring !== null) {
    return { product: bySubstring, rule: 'substring', term: lower };
  }

  for (const variant of normalizedVariants(lower)) {
    if (variant.length === 0) continue;

    if (catalog.has(variant)) {
      return { product: variant, rule: 'variant-exact', term: variant };
    }

    const variantHit = findBySubstring(variant, catalog.keys);
    if (variantHit !== null) {
      return { product: variantHit, rule: 'variant-substring', term: variant };
    }
  }

  return null;
}

export function matchProduct(packageName: string, catalog: CatalogSnapshot): string | null {
  return explainMatch(packageName, catalog)?.product ?? null;
}
