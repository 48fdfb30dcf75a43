/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can drive the app through
 * app.request() without an HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import type { PortfolioService } from "./services/portfolio-service.js";
import {
  handleError,
  handleNotFound,
  requestIdMiddleware,
  loggerMiddleware,
  metricsMiddleware,
} from "./middleware/index.js";
import type { RequestLogEntry } from "./middleware/index.js";
import {
  createPortfolioRoutes,
  createHealthRoutes,
  createMetricsRoute,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: PortfolioService;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Called with every error a route throws, before the envelope is sent */
  readonly onError?: ((err: Error) => void) | undefined;
  /** Record HTTP request metrics. Default: true */
  readonly enableMetrics?: boolean | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: PortfolioService;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  if (options.enableMetrics !== false) {
    app.use("*", metricsMiddleware(service.metrics));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError((err, c) => {
    options.onError?.(err);
    return handleError(err, c);
  });
  app.notFound(handleNotFound);

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createPortfolioRoutes(service.total));
  app.route("/", createHealthRoutes(service));
  app.route("/", createMetricsRoute(() => service.renderMetrics()));

  return { app, service };
}
