/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - GET /ready is 503 until a cycle succeeds, then 200
 * - X-Request-Id is set on responses
 */

import { describe, it, expect } from "vitest";
import { PriceFetchError } from "@coinmeter/pricing";
import {
  SAMPLE_PRICES,
  StubPriceSource,
  createTestApp,
  createTestService,
} from "../setup.js";

interface ReadyBody {
  status: string;
  currency: string;
  cycles: { cycles: number; failures: number; consecutiveFailures: number };
  updatedAt: string | null;
}

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(typeof body.timestamp).toBe("string");
  });

  it("generates an X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  it("preserves an incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health", {
      headers: { "X-Request-Id": "test-req-123" },
    });

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });
});

describe("GET /ready", () => {
  it("returns 503 before any cycle succeeded", async () => {
    const service = createTestService(
      new StubPriceSource(new PriceFetchError("NETWORK_ERROR", "Price request failed: fetch failed")),
    );
    const { app } = createTestApp(service);
    await service.valuator.update();

    const res = await app.request("/ready");

    expect(res.status).toBe(503);
    const body = (await res.json()) as ReadyBody;
    expect(body.status).toBe("not_ready");
    expect(body.updatedAt).toBeNull();
    expect(body.cycles.failures).toBe(1);
  });

  it("returns 200 after a successful cycle", async () => {
    const { app, service } = createTestApp(
      createTestService(new StubPriceSource(SAMPLE_PRICES)),
    );
    await service.valuator.update();

    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    const body = (await res.json()) as ReadyBody;
    expect(body.status).toBe("ready");
    expect(body.currency).toBe("USD");
    expect(body.cycles.cycles).toBe(1);
    expect(body.cycles.consecutiveFailures).toBe(0);
    expect(typeof body.updatedAt).toBe("string");
  });
});
