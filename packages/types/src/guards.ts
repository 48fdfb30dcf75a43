/**
 * Runtime Type Guards
 *
 * Narrowing functions for data crossing the process boundary
 * (pricing API responses).
 */

import type { PriceTable, QuoteTable } from "./pricing.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isQuoteTable(value: unknown): value is QuoteTable {
  if (!isPlainObject(value)) return false;
  return Object.values(value).every(
    (price) => typeof price === "number" && Number.isFinite(price),
  );
}

export function isPriceTable(value: unknown): value is PriceTable {
  if (!isPlainObject(value)) return false;
  return Object.values(value).every(isQuoteTable);
}
