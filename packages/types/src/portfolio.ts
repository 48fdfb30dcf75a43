/**
 * Portfolio Types
 *
 * The configured holdings and how they are reported.
 *
 * Rules:
 * - Holdings are ordered as configured
 * - Symbols are expected to be unique, case-insensitively
 * - Amounts are plain floats; zero and negative amounts are allowed
 */

/**
 * Asset symbol as the pricing API knows it (e.g., "BTC", "ETH").
 */
export type AssetSymbol = string;

/**
 * Currency the whole portfolio is valued in (e.g., "USD", "EUR").
 */
export type Currency = string;

/**
 * A single configured position.
 */
export interface Holding {
  /** Asset symbol, as written in the configuration */
  readonly symbol: AssetSymbol;

  /** Units of the asset held */
  readonly amount: number;
}

/**
 * Typed portfolio configuration.
 */
export interface PortfolioConfig {
  /** Address the HTTP surface binds to, e.g. ":8080" or "127.0.0.1:8080" */
  readonly bindAddress: string;

  /** Reporting currency */
  readonly currency: Currency;

  /** Holdings in configuration order */
  readonly holdings: readonly Holding[];
}
