/**
 * Symbol helpers.
 *
 * Symbols are compared case-insensitively everywhere; the lowercase form is
 * the canonical key for lookups and metric names.
 */

import type { Holding } from "./portfolio.js";

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toLowerCase();
}

export function sameSymbol(a: string, b: string): boolean {
  return normalizeSymbol(a) === normalizeSymbol(b);
}

/**
 * Index holdings by normalized symbol. Later duplicates do not replace
 * earlier ones; duplicate detection is the caller's job.
 */
export function holdingsBySymbol(
  holdings: readonly Holding[],
): ReadonlyMap<string, number> {
  const index = new Map<string, number>();
  for (const holding of holdings) {
    const key = normalizeSymbol(holding.symbol);
    if (!index.has(key)) {
      index.set(key, holding.amount);
    }
  }
  return index;
}
