/**
 * Portfolio route.
 *
 * GET / — last computed total, two fraction digits, plain text.
 * Reads the stored value; never triggers a fetch.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { PortfolioTotal } from "../services/portfolio-total.js";
import { formatTotal } from "../services/portfolio-total.js";

export function createPortfolioRoutes(total: PortfolioTotal): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => c.text(formatTotal(total.load())));

  return routes;
}
