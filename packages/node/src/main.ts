/**
 * @coinmeter/node — Entry point.
 *
 * Loads config, registers gauges, runs the first update cycle, starts the
 * HTTP server, and handles graceful shutdown. Config, registration and bind
 * failures exit with status 1.
 */

import type { Server } from "node:net";
import { serve } from "@hono/node-server";
import pino from "pino";
import { PriceClient } from "@coinmeter/pricing";
import { loadConfig } from "./config.js";
import { loadPortfolioConfig, parseBindAddress } from "./portfolio-config.js";
import { PortfolioService } from "./services/portfolio-service.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const portfolio = await loadPortfolioConfig(config.PORTFOLIO_CONFIG);
  const bind = parseBindAddress(portfolio.bindAddress);
  logger.info(
    {
      path: config.PORTFOLIO_CONFIG,
      currency: portfolio.currency,
      coins: portfolio.holdings.length,
    },
    "Portfolio config loaded",
  );

  const service = new PortfolioService({
    portfolio,
    priceSource: new PriceClient({ endpoint: config.PRICE_API_URL }),
    logger,
    namespace: config.METRICS_NAMESPACE,
    intervalMs: config.REFRESH_INTERVAL_MS,
  });

  // First cycle completes before the server accepts requests.
  await service.start();

  const { app } = createApp({
    service,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onError: (err) => {
      logger.error({ err }, "Unhandled route error");
    },
  });

  const server: Server = serve(
    { fetch: app.fetch, port: bind.port, hostname: bind.hostname },
    (info) => {
      logger.info({ address: info.address, port: info.port }, "Coinmeter started");
    },
  );

  server.on("error", (err) => {
    logger.fatal({ err, bindAddress: portfolio.bindAddress }, "HTTP server failed to bind");
    void service.stop().finally(() => process.exit(1));
  });

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await service.stop();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
