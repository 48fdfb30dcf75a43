/**
 * Portfolio valuator.
 *
 * One update cycle: fetch prices for every held symbol, value the holdings
 * in the reporting currency, then publish per-asset prices to the ticker
 * gauges and the sum to the shared total.
 *
 * Rules:
 * - A failed fetch changes nothing; gauges and total keep the last good cycle
 * - All writes happen after the whole price table has been evaluated
 * - update() never rejects
 */

import type { Logger } from "pino";
import { holdingsBySymbol, normalizeSymbol, sameSymbol } from "@coinmeter/types";
import type { Currency, Holding, PriceTable } from "@coinmeter/types";
import { PriceFetchError } from "@coinmeter/pricing";
import type { PriceSource } from "@coinmeter/pricing";
import type { Gauge, GaugeSet } from "./gauge-registry.js";
import type { PortfolioTotal } from "./portfolio-total.js";
import type { MetricsCollector } from "../middleware/metrics.js";

// =============================================================================
// Valuation
// =============================================================================

/**
 * Price and value of one asset in the reporting currency.
 */
export interface AssetQuote {
  /** Lowercase base symbol */
  readonly symbol: string;
  readonly price: number;
  /** price × held amount */
  readonly value: number;
}

export interface Valuation {
  readonly quotes: readonly AssetQuote[];
  readonly total: number;
}

/**
 * Value holdings against a price table.
 *
 * Only quotes whose currency matches `currency` case-insensitively count.
 * Symbols priced but not held contribute 0.
 */
export function valuePortfolio(
  prices: PriceTable,
  holdings: readonly Holding[],
  currency: Currency,
): Valuation {
  const amounts = holdingsBySymbol(holdings);
  const quotes: AssetQuote[] = [];
  let total = 0;

  for (const [base, quoteTable] of Object.entries(prices)) {
    const symbol = normalizeSymbol(base);
    const amount = amounts.get(symbol) ?? 0;
    for (const [quoteCurrency, price] of Object.entries(quoteTable)) {
      if (!sameSymbol(quoteCurrency, currency)) continue;
      const value = price * amount;
      quotes.push({ symbol, price, value });
      total += value;
    }
  }

  return { quotes, total };
}

// =============================================================================
// Cycle Results
// =============================================================================

export type CycleResult =
  | { readonly ok: true; readonly total: number; readonly priced: number }
  | { readonly ok: false; readonly error: Error };

export interface CycleStatus {
  readonly cycles: number;
  readonly failures: number;
  readonly consecutiveFailures: number;
  readonly lastSuccessAt?: string | undefined;
  readonly lastError?: string | undefined;
}

export const UPDATES_COUNTER = "portfolio_updates_total";

// =============================================================================
// Valuator
// =============================================================================

export interface ValuatorOptions {
  readonly holdings: readonly Holding[];
  readonly currency: Currency;
  readonly gauges: GaugeSet;
  readonly total: PortfolioTotal;
  readonly priceSource: PriceSource;
  readonly logger: Logger;
  /** Gauge mirroring the total, when exported */
  readonly totalGauge?: Gauge | undefined;
  /** Receives portfolio_updates_total{result} */
  readonly metrics?: MetricsCollector | undefined;
  readonly now?: (() => Date) | undefined;
}

export class PortfolioValuator {
  private readonly options: ValuatorOptions;
  private readonly symbols: readonly string[];
  private readonly now: () => Date;

  private _cycles = 0;
  private _failures = 0;
  private _consecutiveFailures = 0;
  private _lastSuccessAt: string | undefined;
  private _lastError: string | undefined;

  constructor(options: ValuatorOptions) {
    this.options = options;
    this.symbols = options.holdings.map((h) => h.symbol);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run one cycle. Failures are logged and reported in the result.
   */
  async update(): Promise<CycleResult> {
    const { currency, logger, priceSource } = this.options;
    this._cycles++;
    logger.debug({ symbols: this.symbols, currency }, "Updating portfolio");

    try {
      const prices = await priceSource.fetchPrices({
        symbols: this.symbols,
        currency,
      });
      const valuation = valuePortfolio(prices, this.options.holdings, currency);
      this.publish(valuation);

      this._consecutiveFailures = 0;
      this._lastSuccessAt = this.now().toISOString();
      this.options.metrics?.incrementCounter(
        UPDATES_COUNTER,
        { result: "success" },
        "Portfolio update cycles by result",
      );
      logger.info(
        { total: valuation.total, priced: valuation.quotes.length, currency },
        "Portfolio updated",
      );
      return { ok: true, total: valuation.total, priced: valuation.quotes.length };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      const code = error instanceof PriceFetchError ? error.code : "UNEXPECTED";

      this._failures++;
      this._consecutiveFailures++;
      this._lastError = error.message;
      this.options.metrics?.incrementCounter(
        UPDATES_COUNTER,
        { result: "failure" },
        "Portfolio update cycles by result",
      );
      logger.error(
        { err: error, code, consecutiveFailures: this._consecutiveFailures },
        "Portfolio update failed; keeping previous values",
      );
      return { ok: false, error };
    }
  }

  status(): CycleStatus {
    return {
      cycles: this._cycles,
      failures: this._failures,
      consecutiveFailures: this._consecutiveFailures,
      lastSuccessAt: this._lastSuccessAt,
      lastError: this._lastError,
    };
  }

  private publish(valuation: Valuation): void {
    const { gauges, total, totalGauge } = this.options;
    for (const quote of valuation.quotes) {
      gauges.get(quote.symbol)?.set(quote.price);
    }
    totalGauge?.set(valuation.total);
    total.store(valuation.total, this.now());
  }
}
