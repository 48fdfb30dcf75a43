/**
 * PortfolioService — wires one portfolio's moving parts.
 *
 * Owns the gauge registry, the shared total, the valuator and the
 * scheduler. Gauges are registered in the constructor, so a bad
 * configuration (duplicate coins) fails before anything starts.
 */

import type { Logger } from "pino";
import type { PortfolioConfig } from "@coinmeter/types";
import type { PriceSource } from "@coinmeter/pricing";
import {
  GaugeRegistry,
  DEFAULT_NAMESPACE,
  prepareGauges,
  prepareTotalGauge,
} from "./gauge-registry.js";
import type { GaugeSet } from "./gauge-registry.js";
import { PortfolioTotal } from "./portfolio-total.js";
import { PortfolioValuator } from "./valuator.js";
import type { CycleStatus } from "./valuator.js";
import { UpdateScheduler } from "./scheduler.js";
import { MetricsCollector } from "../middleware/metrics.js";
import { symbolsOf } from "../portfolio-config.js";

export interface PortfolioServiceConfig {
  readonly portfolio: PortfolioConfig;
  readonly priceSource: PriceSource;
  readonly logger: Logger;
  /** Metric namespace (default: portfolio_metrics) */
  readonly namespace?: string | undefined;
  /** Milliseconds between update cycles (default: one minute) */
  readonly intervalMs?: number | undefined;
}

export class PortfolioService {
  readonly registry: GaugeRegistry;
  readonly gauges: GaugeSet;
  readonly total: PortfolioTotal;
  readonly metrics: MetricsCollector;
  readonly valuator: PortfolioValuator;
  readonly scheduler: UpdateScheduler;
  readonly currency: string;

  /**
   * @throws {GaugeRegistryError} on duplicate coin symbols
   */
  constructor(config: PortfolioServiceConfig) {
    const { portfolio, logger } = config;
    const namespace = config.namespace ?? DEFAULT_NAMESPACE;

    this.currency = portfolio.currency;
    this.registry = new GaugeRegistry();
    this.gauges = prepareGauges(
      this.registry,
      symbolsOf(portfolio),
      portfolio.currency,
      namespace,
    );
    const totalGauge = prepareTotalGauge(this.registry, portfolio.currency, namespace);

    this.total = new PortfolioTotal();
    this.metrics = new MetricsCollector();
    this.valuator = new PortfolioValuator({
      holdings: portfolio.holdings,
      currency: portfolio.currency,
      gauges: this.gauges,
      total: this.total,
      priceSource: config.priceSource,
      logger,
      totalGauge,
      metrics: this.metrics,
    });
    this.scheduler = new UpdateScheduler(this.valuator, {
      logger,
      intervalMs: config.intervalMs,
    });
  }

  /** First cycle, then the schedule. */
  start(): Promise<void> {
    return this.scheduler.start();
  }

  stop(): Promise<void> {
    return this.scheduler.stop();
  }

  status(): CycleStatus {
    return this.valuator.status();
  }

  /** True once a cycle has succeeded. */
  isReady(): boolean {
    return this.valuator.status().lastSuccessAt !== undefined;
  }

  /** Portfolio gauges followed by HTTP and cycle metrics. */
  renderMetrics(): string {
    return this.registry.render() + this.metrics.render();
  }
}
