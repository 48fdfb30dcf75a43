/**
 * Price Client Tests
 *
 * Verifies:
 * - Query building (fsyms / tsyms)
 * - Decoding of the nested price table
 * - Status >= 300 rejected with the status text
 * - Malformed bodies rejected as decode errors
 * - Upstream error envelope surfaced
 * - Network errors normalized
 * - Exactly one attempt per call
 */

import { describe, it, expect, vi } from "vitest";
import { PriceClient, buildPriceUrl } from "../src/price-client.js";
import { PriceFetchError } from "../src/types.js";

const ENDPOINT = "https://prices.test/data/pricemulti";

// =============================================================================
// Mock Fetch Helper
// =============================================================================

function mockFetch(
  status: number,
  body: string,
  statusText?: string,
) {
  return vi.fn<typeof fetch>(
    async () =>
      new Response(body, {
        status,
        ...(statusText !== undefined ? { statusText } : {}),
      }),
  );
}

async function captureError(promise: Promise<unknown>): Promise<PriceFetchError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof PriceFetchError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected the promise to reject");
}

// =============================================================================
// buildPriceUrl
// =============================================================================

describe("buildPriceUrl", () => {
  it("joins symbols with commas and sets the currency", () => {
    const url = buildPriceUrl(ENDPOINT, {
      symbols: ["BTC", "ETH"],
      currency: "USD",
    });
    expect(url).toBe(`${ENDPOINT}?fsyms=BTC%2CETH&tsyms=USD`);
  });

  it("keeps existing query parameters", () => {
    const url = buildPriceUrl(`${ENDPOINT}?api_key=test-key`, {
      symbols: ["BTC"],
      currency: "EUR",
    });
    expect(url).toBe(`${ENDPOINT}?api_key=test-key&fsyms=BTC&tsyms=EUR`);
  });
});

// =============================================================================
// fetchPrices
// =============================================================================

describe("PriceClient.fetchPrices", () => {
  it("requests the built URL and returns the decoded table", async () => {
    const fetchFn = mockFetch(
      200,
      JSON.stringify({ BTC: { USD: 50000 }, ETH: { USD: 3000 } }),
    );
    const client = new PriceClient({ endpoint: ENDPOINT, fetchFn });

    const table = await client.fetchPrices({
      symbols: ["BTC", "ETH"],
      currency: "USD",
    });

    expect(table).toEqual({ BTC: { USD: 50000 }, ETH: { USD: 3000 } });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0]?.[0]).toBe(
      `${ENDPOINT}?fsyms=BTC%2CETH&tsyms=USD`,
    );
  });

  it("accepts an empty table", async () => {
    const client = new PriceClient({
      endpoint: ENDPOINT,
      fetchFn: mockFetch(200, "{}"),
    });

    await expect(
      client.fetchPrices({ symbols: ["BTC"], currency: "USD" }),
    ).resolves.toEqual({});
  });

  it("rejects status 500 with the status text", async () => {
    const client = new PriceClient({
      endpoint: ENDPOINT,
      fetchFn: mockFetch(500, "oops", "Internal Server Error"),
    });

    const error = await captureError(
      client.fetchPrices({ symbols: ["BTC"], currency: "USD" }),
    );

    expect(error.code).toBe("BAD_STATUS");
    expect(error.status).toBe(500);
    expect(error.message).toBe("Bad status: 500 Internal Server Error");
  });

  it("treats redirects (3xx) as failures", async () => {
    const client = new PriceClient({
      endpoint: ENDPOINT,
      fetchFn: mockFetch(302, ""),
    });

    const error = await captureError(
      client.fetchPrices({ symbols: ["BTC"], currency: "USD" }),
    );

    expect(error.code).toBe("BAD_STATUS");
    expect(error.message).toBe("Bad status: 302");
  });

  it("does not retry after a failure", async () => {
    const fetchFn = mockFetch(503, "", "Service Unavailable");
    const client = new PriceClient({ endpoint: ENDPOINT, fetchFn });

    await expect(
      client.fetchPrices({ symbols: ["BTC"], currency: "USD" }),
    ).rejects.toThrow(PriceFetchError);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("rejects malformed JSON as a decode error", async () => {
    const client = new PriceClient({
      endpoint: ENDPOINT,
      fetchFn: mockFetch(200, "{not json"),
    });

    const error = await captureError(
      client.fetchPrices({ symbols: ["BTC"], currency: "USD" }),
    );

    expect(error.code).toBe("DECODE_ERROR");
    expect(error.message.startsWith("Malformed price response:")).toBe(true);
  });

  it("rejects a body of the wrong shape as a decode error", async () => {
    const client = new PriceClient({
      endpoint: ENDPOINT,
      fetchFn: mockFetch(200, JSON.stringify({ BTC: { USD: "50000" } })),
    });

    const error = await captureError(
      client.fetchPrices({ symbols: ["BTC"], currency: "USD" }),
    );

    expect(error.code).toBe("DECODE_ERROR");
  });

  it("surfaces the upstream error envelope", async () => {
    const client = new PriceClient({
      endpoint: ENDPOINT,
      fetchFn: mockFetch(
        200,
        JSON.stringify({
          Response: "Error",
          Message: "There is no data for any of the toSymbols XYZ .",
        }),
      ),
    });

    const error = await captureError(
      client.fetchPrices({ symbols: ["BTC"], currency: "XYZ" }),
    );

    expect(error.code).toBe("UPSTREAM_ERROR");
    expect(error.message).toBe(
      "There is no data for any of the toSymbols XYZ .",
    );
  });

  it("normalizes transport failures", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => {
      throw new TypeError("fetch failed");
    });
    const client = new PriceClient({ endpoint: ENDPOINT, fetchFn });

    const error = await captureError(
      client.fetchPrices({ symbols: ["BTC"], currency: "USD" }),
    );

    expect(error.code).toBe("NETWORK_ERROR");
    expect(error.message).toBe("Price request failed: fetch failed");
    expect(error.status).toBeUndefined();
    expect(error.cause).toBeInstanceOf(TypeError);
  });
});
