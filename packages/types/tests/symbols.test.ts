import { describe, it, expect } from "vitest";
import {
  normalizeSymbol,
  sameSymbol,
  holdingsBySymbol,
} from "../src/symbols.js";

describe("normalizeSymbol", () => {
  it("lowercases and trims", () => {
    expect(normalizeSymbol(" BTC ")).toBe("btc");
  });
});

describe("sameSymbol", () => {
  it("compares case-insensitively", () => {
    expect(sameSymbol("usd", "USD")).toBe(true);
    expect(sameSymbol("USD", "USDT")).toBe(false);
  });
});

describe("holdingsBySymbol", () => {
  it("keys amounts by lowercase symbol", () => {
    const index = holdingsBySymbol([
      { symbol: "BTC", amount: 2 },
      { symbol: "Eth", amount: 10 },
    ]);
    expect(index.get("btc")).toBe(2);
    expect(index.get("eth")).toBe(10);
    expect(index.get("BTC")).toBeUndefined();
  });

  it("keeps the first amount for a repeated symbol", () => {
    const index = holdingsBySymbol([
      { symbol: "BTC", amount: 1 },
      { symbol: "btc", amount: 5 },
    ]);
    expect(index.get("btc")).toBe(1);
  });
});
