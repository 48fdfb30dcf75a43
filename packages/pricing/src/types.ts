/**
 * @coinmeter/pricing — Client types.
 *
 * Domain types are imported from @coinmeter/types.
 */

import type { PriceQuery, PriceTable } from "@coinmeter/types";

// =============================================================================
// Client Configuration
// =============================================================================

/** Multi-symbol price endpoint of the default upstream. */
export const DEFAULT_PRICE_API_URL =
  "https://min-api.cryptocompare.com/data/pricemulti";

export interface PriceClientConfig {
  /** Price endpoint (default: DEFAULT_PRICE_API_URL) */
  readonly endpoint?: string | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

// =============================================================================
// Price Source
// =============================================================================

/**
 * Anything that can turn a query into a price table.
 * Rejects with PriceFetchError on failure.
 */
export interface PriceSource {
  fetchPrices(query: PriceQuery): Promise<PriceTable>;
}

// =============================================================================
// Error Types
// =============================================================================

export type PriceFetchErrorCode =
  | "NETWORK_ERROR"
  | "BAD_STATUS"
  | "DECODE_ERROR"
  | "UPSTREAM_ERROR";

/**
 * Structured error from a price fetch. One failed attempt, no retries.
 */
export class PriceFetchError extends Error {
  readonly code: PriceFetchErrorCode;
  /** HTTP status, when a response was received */
  readonly status?: number | undefined;

  constructor(
    code: PriceFetchErrorCode,
    message: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "PriceFetchError";
    this.code = code;
    this.status = options?.status;
  }
}
