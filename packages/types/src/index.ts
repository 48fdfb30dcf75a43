/**
 * @coinmeter/types — Shared domain types for the Coinmeter stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

// Portfolio types
export type {
  AssetSymbol,
  Currency,
  Holding,
  PortfolioConfig,
} from "./portfolio.js";

// Pricing types
export type { PriceTable, QuoteTable, PriceQuery } from "./pricing.js";

// Symbol helpers
export {
  normalizeSymbol,
  sameSymbol,
  holdingsBySymbol,
} from "./symbols.js";

// Runtime guards
export { isQuoteTable, isPriceTable } from "./guards.js";
