/**
 * Metrics route.
 *
 * GET /metrics — Prometheus text exposition format.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createMetricsRoute(render: () => string): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/metrics", (c) => {
    return c.text(render(), 200, {
      "Content-Type": "text/plain; version=0.0.4; charset=utf-8",
    });
  });

  return routes;
}
