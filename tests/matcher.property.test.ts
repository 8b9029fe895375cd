import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { matchProduct } from '../src/matcher/product-matcher.js';
import { createCatalogSnapshot } from '../src/catalog/catalog-snapshot.js';

// ---------------------------------------------------------------------------
// Arbitraries
// ---------------------------------------------------------------------------

const keyArb = fc.stringMatching(/^[a-z0-9][a-z0-9.-]{0,15}$/);

const catalogKeysArb = fc.uniqueArray(keyArb, { minLength: 1, maxLength: 15 });

const packageNameArb = fc.oneof(
  keyArb,
  fc.stringMatching(/^[A-Za-z0-9 ._-]{0,25}$/),
);

// ---------------------------------------------------------------------------
// Properties
// ---------------------------------------------------------------------------

describe('Matcher properties', () => {
  it('every catalog key matches itself regardless of case', () => {
    fc.assert(
      fc.property(catalogKeysArb, (keys) => {
        const catalog = createCatalogSnapshot(keys);
        for (const key of keys) {
          expect(matchProduct(key.toUpperCase(), catalog)).toBe(key);
        }
      }),
    );
  });

  it('a match is always a key of the catalog', () => {
    fc.assert(
      fc.property(catalogKeysArb, packageNameArb, (keys, name) => {
        const catalog = createCatalogSnapshot(keys);
        const product = matchProduct(name, catalog);
        if (product !== null) {
          expect(catalog.has(product)).toBe(true);
        }
      }),
    );
  });

  it('is deterministic and leaves the snapshot untouched', () => {
    fc.assert(
      fc.property(catalogKeysArb, packageNameArb, (keys, name) => {
        const catalog = createCatalogSnapshot(keys);
        const before = [...catalog.keys];
        const first = matchProduct(name, catalog);
        const second = matchProduct(name, catalog);
        expect(second).toBe(first);
        expect(catalog.keys).toEqual(before);
      }),
    );
  });
});
