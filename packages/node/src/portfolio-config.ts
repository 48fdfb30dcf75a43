/**
 * @coinmeter/node — Portfolio configuration file.
 *
 * The file is JSON with PascalCase keys:
 *
 * {
 *   "BindAddress": ":8080",
 *   "Currency": "USD",
 *   "Coins": [{ "Name": "BTC", "Amount": 2 }, { "Name": "ETH", "Amount": 10 }]
 * }
 *
 * Duplicate coins are not rejected here; gauge registration fails on them.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { AssetSymbol, PortfolioConfig } from "@coinmeter/types";

// =============================================================================
// Errors
// =============================================================================

export type PortfolioConfigErrorCode = "CONFIG_NOT_FOUND" | "CONFIG_INVALID";

export class PortfolioConfigError extends Error {
  public readonly code: PortfolioConfigErrorCode;

  constructor(code: PortfolioConfigErrorCode, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "PortfolioConfigError";
    this.code = code;
  }
}

// =============================================================================
// Schema
// =============================================================================

const CoinSchema = z.object({
  Name: z
    .string()
    .regex(/^[A-Za-z0-9]+$/, "coin names are alphanumeric symbols"),
  Amount: z.number().finite(),
});

export const PortfolioFileSchema = z.object({
  BindAddress: z.string().min(1),
  Currency: z
    .string()
    .regex(/^[A-Za-z0-9]+$/, "currency is an alphanumeric symbol"),
  Coins: z.array(CoinSchema).min(1),
});

export type PortfolioFile = z.infer<typeof PortfolioFileSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Validate an already-decoded portfolio file and map it to the typed model.
 *
 * @throws {PortfolioConfigError} with code CONFIG_INVALID
 */
export function parsePortfolioConfig(raw: unknown): PortfolioConfig {
  const result = PortfolioFileSchema.safeParse(raw);
  if (!result.success) {
    throw new PortfolioConfigError(
      "CONFIG_INVALID",
      `Invalid portfolio config: ${formatIssues(result.error)}`,
      result.error,
    );
  }

  const file = result.data;
  return {
    bindAddress: file.BindAddress,
    currency: file.Currency,
    holdings: file.Coins.map((coin) => ({
      symbol: coin.Name,
      amount: coin.Amount,
    })),
  };
}

/**
 * Read and validate the portfolio file at `path`.
 *
 * @throws {PortfolioConfigError}
 */
export async function loadPortfolioConfig(
  path: string,
): Promise<PortfolioConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    const missing =
      error instanceof Error && "code" in error && error.code === "ENOENT";
    throw new PortfolioConfigError(
      missing ? "CONFIG_NOT_FOUND" : "CONFIG_INVALID",
      missing
        ? `Portfolio config not found: ${path}`
        : `Portfolio config unreadable: ${path}`,
      error,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new PortfolioConfigError(
      "CONFIG_INVALID",
      `Portfolio config is not valid JSON: ${path}`,
      error,
    );
  }

  return parsePortfolioConfig(raw);
}

/**
 * Configured symbols, in configuration order.
 */
export function symbolsOf(config: PortfolioConfig): readonly AssetSymbol[] {
  return config.holdings.map((holding) => holding.symbol);
}

// =============================================================================
// Bind Address
// =============================================================================

export interface BindTarget {
  readonly hostname: string;
  readonly port: number;
}

/**
 * Split a bind address into hostname and port.
 *
 * Accepts "host:port", ":port" (all interfaces) and "[v6addr]:port".
 *
 * @throws {PortfolioConfigError} with code CONFIG_INVALID
 */
export function parseBindAddress(address: string): BindTarget {
  const match = /^(?:\[([^\]]+)\]|([^:]*)):(\d+)$/.exec(address.trim());
  if (match === null) {
    throw new PortfolioConfigError(
      "CONFIG_INVALID",
      `Invalid bind address "${address}". Expected host:port or :port`,
    );
  }

  const [, v6Host, host, portText] = match;
  const port = Number(portText);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new PortfolioConfigError(
      "CONFIG_INVALID",
      `Invalid port in bind address "${address}"`,
    );
  }

  const hostname = v6Host ?? (host === undefined || host === "" ? "0.0.0.0" : host);
  return { hostname, port };
}
