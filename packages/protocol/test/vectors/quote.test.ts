/**
 * Oracle quote validation: sign and exponent checks.
 */

import { describe, it, expect } from "vitest";
import { quoteFromRaw, OracleError } from "../../src/index.js";

const FEED = "ab".repeat(32);

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected a throw");
}

describe("quoteFromRaw", () => {
  it("accepts positive price with negative exponent", () => {
    expect(quoteFromRaw(FEED, { price: 1_000_000_000n, expo: -8, publishTime: 1 })).toEqual({
      magnitude: 1_000_000_000n,
      negExponent: 8n,
    });
  });

  it("rejects zero price as negative_price", () => {
    expect(thrown(() => quoteFromRaw(FEED, { price: 0n, expo: -8, publishTime: 1 }))).toMatchObject({ code: "oracle_error", reason: "negative_price" });
  });

  it("rejects negative price", () => {
    expect(() => quoteFromRaw(FEED, { price: -5n, expo: -8, publishTime: 1 })).toThrow(
      OracleError,
    );
  });

  it("rejects zero exponent as positive_exponent", () => {
    expect(thrown(() => quoteFromRaw(FEED, { price: 100n, expo: 0, publishTime: 1 }))).toMatchObject({ reason: "positive_exponent" });
  });

  it("rejects positive exponent", () => {
    expect(thrown(() => quoteFromRaw(FEED, { price: 100n, expo: 3, publishTime: 1 }))).toMatchObject({ reason: "positive_exponent" });
  });

  it("checks the price sign before the exponent", () => {
    expect(thrown(() => quoteFromRaw(FEED, { price: -1n, expo: 2, publishTime: 1 }))).toMatchObject({ reason: "negative_price" });
  });
});
