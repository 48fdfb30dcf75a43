/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (200 once an update cycle has succeeded)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { PortfolioService } from "../services/portfolio-service.js";

export function createHealthRoutes(service: PortfolioService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = service.isReady();
    const body = {
      status: ready ? "ready" : "not_ready",
      currency: service.currency,
      cycles: service.status(),
      updatedAt: service.total.updatedAt() ?? null,
      timestamp: new Date().toISOString(),
    };
    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
