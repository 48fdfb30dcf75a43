/**
 * Tests for PortfolioService wiring.
 */

import { describe, it, expect } from "vitest";
import { PortfolioService } from "../src/services/portfolio-service.js";
import { GaugeRegistryError } from "../src/services/gauge-registry.js";
import {
  SAMPLE_PRICES,
  StubPriceSource,
  createTestService,
  silentLogger,
} from "./setup.js";

describe("PortfolioService", () => {
  it("registers ticker gauges and the total gauge", () => {
    const service = createTestService();
    expect(service.registry.names()).toEqual([
      "portfolio_metrics_btc_usd",
      "portfolio_metrics_eth_usd",
      "portfolio_metrics_portfolio_total_usd",
    ]);
  });

  it("fails construction on a duplicate coin", () => {
    expect(
      () =>
        new PortfolioService({
          portfolio: {
            bindAddress: ":8080",
            currency: "USD",
            holdings: [
              { symbol: "BTC", amount: 1 },
              { symbol: "BTC", amount: 2 },
            ],
          },
          priceSource: new StubPriceSource(SAMPLE_PRICES),
          logger: silentLogger(),
        }),
    ).toThrow(GaugeRegistryError);
  });

  it("accepts a coin named TOTAL next to the total gauge", async () => {
    const service = createTestService(
      new StubPriceSource({ BTC: { USD: 100 }, TOTAL: { USD: 2 } }),
      [
        { symbol: "BTC", amount: 1 },
        { symbol: "TOTAL", amount: 5 },
      ],
    );
    await service.valuator.update();

    const lines = service.renderMetrics().split("\n");
    expect(lines).toContain("portfolio_metrics_total_usd 2");
    expect(lines).toContain("portfolio_metrics_portfolio_total_usd 110");
  });

  it("uses the configured namespace", () => {
    const service = new PortfolioService({
      portfolio: {
        bindAddress: ":8080",
        currency: "EUR",
        holdings: [{ symbol: "ETH", amount: 1 }],
      },
      priceSource: new StubPriceSource({ ETH: { EUR: 2800 } }),
      logger: silentLogger(),
      namespace: "wallet",
    });
    expect(service.registry.names()).toEqual(["wallet_eth_eur", "wallet_portfolio_total_eur"]);
  });

  it("is ready after the first cycle of start()", async () => {
    const source = new StubPriceSource(SAMPLE_PRICES);
    const service = createTestService(source);
    expect(service.isReady()).toBe(false);

    await service.start();

    expect(source.calls).toHaveLength(1);
    expect(service.isReady()).toBe(true);
    expect(service.total.load()).toBe(130000);
    await service.stop();
  });

  it("renders gauges ahead of HTTP metrics", async () => {
    const service = createTestService();
    await service.valuator.update();

    const lines = service.renderMetrics().split("\n");

    expect(lines[0]).toBe(
      "# HELP portfolio_metrics_btc_usd Ticker for a specific crypto",
    );
    expect(lines).toContain("portfolio_metrics_btc_usd 50000");
    expect(lines).toContain("portfolio_metrics_eth_usd 3000");
    expect(lines).toContain("portfolio_metrics_portfolio_total_usd 130000");
    expect(lines).toContain('portfolio_updates_total{result="success"} 1');
  });
});
