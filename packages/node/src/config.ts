/**
 * @coinmeter/node — Service configuration.
 *
 * Loads and validates process settings from environment variables using Zod.
 * The portfolio itself (bind address, currency, holdings) comes from the
 * file named by PORTFOLIO_CONFIG; see portfolio-config.ts.
 */

import { z } from "zod";
import { DEFAULT_PRICE_API_URL } from "@coinmeter/pricing";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Portfolio file
  PORTFOLIO_CONFIG: z.string().min(1).default("config.json"),

  // Pricing
  PRICE_API_URL: z.string().url().default(DEFAULT_PRICE_API_URL),
  REFRESH_INTERVAL_MS: z.coerce.number().int().min(1000).default(60_000),

  // Metrics
  METRICS_NAMESPACE: z
    .string()
    .regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, "must be a valid Prometheus name")
    .default("portfolio_metrics"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
