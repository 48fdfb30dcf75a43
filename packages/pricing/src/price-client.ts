/**
 * @coinmeter/pricing — Price client.
 *
 * Wraps native fetch() with:
 * - Query building (fsyms / tsyms)
 * - Status checking (anything >= 300 fails)
 * - Body decoding into a PriceTable
 * - Error normalization to PriceFetchError
 *
 * Design:
 * - Zero external dependencies (uses native fetch)
 * - Single attempt per call; the caller decides what a failure means
 * - Custom fetch function for testing
 */

import { isPriceTable } from "@coinmeter/types";
import type { PriceQuery, PriceTable } from "@coinmeter/types";
import type { PriceClientConfig, PriceSource } from "./types.js";
import { DEFAULT_PRICE_API_URL, PriceFetchError } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The upstream answers some bad queries with 200 and an error envelope:
 * { "Response": "Error", "Message": "..." }
 */
function upstreamErrorMessage(body: unknown): string | undefined {
  if (body === null || typeof body !== "object") return undefined;
  const envelope = body as Record<string, unknown>;
  if (envelope.Response !== "Error") return undefined;
  return typeof envelope.Message === "string"
    ? envelope.Message
    : "Upstream reported an error";
}

/**
 * Build the request URL for a price query.
 *
 * Existing query parameters on the endpoint are kept.
 */
export function buildPriceUrl(endpoint: string, query: PriceQuery): string {
  const url = new URL(endpoint);
  url.searchParams.set("fsyms", query.symbols.join(","));
  url.searchParams.set("tsyms", query.currency);
  return url.toString();
}

// =============================================================================
// Price Client
// =============================================================================

export class PriceClient implements PriceSource {
  private readonly endpoint: string;
  private readonly fetchFn: typeof fetch;

  constructor(config: PriceClientConfig = {}) {
    this.endpoint = config.endpoint ?? DEFAULT_PRICE_API_URL;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  /**
   * Fetch prices of every queried symbol in the query currency.
   *
   * @throws {PriceFetchError}
   */
  async fetchPrices(query: PriceQuery): Promise<PriceTable> {
    const url = buildPriceUrl(this.endpoint, query);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: "GET",
        headers: { Accept: "application/json" },
      });
    } catch (error) {
      throw new PriceFetchError(
        "NETWORK_ERROR",
        `Price request failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (response.status >= 300) {
      const status = `${response.status} ${response.statusText}`.trim();
      throw new PriceFetchError("BAD_STATUS", `Bad status: ${status}`, {
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = JSON.parse(await response.text());
    } catch (error) {
      throw new PriceFetchError(
        "DECODE_ERROR",
        `Malformed price response: ${describeError(error)}`,
        { status: response.status, cause: error },
      );
    }

    const upstreamError = upstreamErrorMessage(body);
    if (upstreamError !== undefined) {
      throw new PriceFetchError("UPSTREAM_ERROR", upstreamError, {
        status: response.status,
      });
    }

    if (!isPriceTable(body)) {
      throw new PriceFetchError(
        "DECODE_ERROR",
        "Malformed price response: expected { symbol: { currency: price } }",
        { status: response.status },
      );
    }

    return body;
  }
}
