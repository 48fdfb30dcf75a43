/**
 * Route barrel — re-exports all route modules.
 */

export { createPortfolioRoutes } from "./portfolio.js";
export { createHealthRoutes } from "./health.js";
export { createMetricsRoute } from "./metrics.js";
