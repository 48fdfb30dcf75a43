/**
 * Pricing Types
 *
 * Shape of a decoded multi-symbol price lookup.
 */

import type { AssetSymbol, Currency } from "./portfolio.js";

/**
 * Quote currency → price of one unit of the base asset.
 */
export type QuoteTable = Readonly<Record<Currency, number>>;

/**
 * Base asset → quotes. Produced fresh on every fetch and never mutated.
 *
 * @example
 * { BTC: { USD: 50000 }, ETH: { USD: 3000 } }
 */
export type PriceTable = Readonly<Record<AssetSymbol, QuoteTable>>;

/**
 * What to ask the pricing API for.
 */
export interface PriceQuery {
  readonly symbols: readonly AssetSymbol[];
  readonly currency: Currency;
}
