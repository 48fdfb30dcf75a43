/**
 * Gauge registry.
 *
 * Hand-rolled Prometheus gauges, written through the same exposition
 * helpers as the HTTP metrics of MetricsCollector. Gauges are registered once
 * at startup; a second registration under the same name is an error.
 */

import { normalizeSymbol } from "@coinmeter/types";
import type { AssetSymbol, Currency } from "@coinmeter/types";
import { renderFamilies } from "./exposition.js";

// =============================================================================
// Errors
// =============================================================================

export type GaugeRegistryErrorCode = "DUPLICATE_GAUGE";

export class GaugeRegistryError extends Error {
  public readonly code: GaugeRegistryErrorCode;

  constructor(code: GaugeRegistryErrorCode, message: string) {
    super(message);
    this.name = "GaugeRegistryError";
    this.code = code;
  }
}

// =============================================================================
// Gauge
// =============================================================================

export interface GaugeOptions {
  readonly name: string;
  readonly help: string;
}

/**
 * A named numeric value that can go up and down. Starts at 0.
 */
export class Gauge {
  readonly name: string;
  readonly help: string;
  private _value = 0;

  constructor(options: GaugeOptions) {
    this.name = options.name;
    this.help = options.help;
  }

  set(value: number): void {
    this._value = value;
  }

  get(): number {
    return this._value;
  }
}

/** Lowercase symbol → gauge. Built once, never rebuilt. */
export type GaugeSet = ReadonlyMap<string, Gauge>;

/**
 * Build a fully-qualified metric name from namespace, subsystem and name.
 * Non-alphanumeric characters become underscores.
 */
export function gaugeName(
  namespace: string,
  subsystem: string,
  name: string,
): string {
  return [namespace, subsystem, name]
    .filter((part) => part !== "")
    .map((part) => part.toLowerCase().replace(/[^a-z0-9_]/g, "_"))
    .join("_");
}

// =============================================================================
// Registry
// =============================================================================

export class GaugeRegistry {
  private readonly _gauges = new Map<string, Gauge>();

  /**
   * Create and register a gauge.
   *
   * @throws {GaugeRegistryError} if a gauge with this name already exists
   */
  register(options: GaugeOptions): Gauge {
    if (this._gauges.has(options.name)) {
      throw new GaugeRegistryError(
        "DUPLICATE_GAUGE",
        `Gauge "${options.name}" is already registered`,
      );
    }
    const gauge = new Gauge(options);
    this._gauges.set(options.name, gauge);
    return gauge;
  }

  names(): readonly string[] {
    return [...this._gauges.keys()];
  }

  /**
   * Render every gauge in Prometheus text exposition format,
   * in registration order.
   */
  render(): string {
    return renderFamilies(
      [...this._gauges.values()].map((gauge) => ({
        name: gauge.name,
        help: gauge.help,
        type: "gauge" as const,
        samples: [{ value: gauge.get() }],
      })),
    );
  }
}

// =============================================================================
// Portfolio Gauges
// =============================================================================

export const DEFAULT_NAMESPACE = "portfolio_metrics";

/**
 * Register one ticker gauge per symbol, keyed by lowercase symbol.
 *
 * Duplicate symbols (including ones differing only in case) map to the same
 * gauge name and make registration throw.
 *
 * @throws {GaugeRegistryError}
 */
export function prepareGauges(
  registry: GaugeRegistry,
  symbols: readonly AssetSymbol[],
  currency: Currency,
  namespace: string = DEFAULT_NAMESPACE,
): GaugeSet {
  const gauges = new Map<string, Gauge>();
  for (const symbol of symbols) {
    const key = normalizeSymbol(symbol);
    const gauge = registry.register({
      name: gaugeName(namespace, key, currency),
      help: "Ticker for a specific crypto",
    });
    gauges.set(key, gauge);
  }
  return gauges;
}

/**
 * Subsystem of the total gauge. Coin symbols are alphanumeric, so no
 * ticker gauge can take this name.
 */
export const TOTAL_SUBSYSTEM = "portfolio_total";

/**
 * Register the gauge carrying the portfolio total.
 *
 * @throws {GaugeRegistryError}
 */
export function prepareTotalGauge(
  registry: GaugeRegistry,
  currency: Currency,
  namespace: string = DEFAULT_NAMESPACE,
): Gauge {
  return registry.register({
    name: gaugeName(namespace, TOTAL_SUBSYSTEM, currency),
    help: "Total value of the portfolio",
  });
}
