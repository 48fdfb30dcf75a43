/**
 * @coinmeter/node — Package public API.
 *
 * The runnable entry point is main.ts.
 */

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export {
  loadPortfolioConfig,
  parsePortfolioConfig,
  parseBindAddress,
  symbolsOf,
  PortfolioConfigError,
  PortfolioFileSchema,
} from "./portfolio-config.js";
export type {
  PortfolioConfigErrorCode,
  PortfolioFile,
  BindTarget,
} from "./portfolio-config.js";
export {
  Gauge,
  GaugeRegistry,
  GaugeRegistryError,
  gaugeName,
  prepareGauges,
  prepareTotalGauge,
  DEFAULT_NAMESPACE,
} from "./services/gauge-registry.js";
export type { GaugeSet, GaugeOptions } from "./services/gauge-registry.js";
export { PortfolioTotal, formatTotal } from "./services/portfolio-total.js";
export { PortfolioValuator, valuePortfolio, UPDATES_COUNTER } from "./services/valuator.js";
export type {
  AssetQuote,
  Valuation,
  CycleResult,
  CycleStatus,
  ValuatorOptions,
} from "./services/valuator.js";
export { UpdateScheduler, DEFAULT_INTERVAL_MS } from "./services/scheduler.js";
export type { Updatable, SchedulerOptions } from "./services/scheduler.js";
export { PortfolioService } from "./services/portfolio-service.js";
export type { PortfolioServiceConfig } from "./services/portfolio-service.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
