/**
 * Mock price feed for testing and dev mode.
 *
 * Quotes are whatever setQuote() last stored, including invalid ones,
 * so tests can drive the adapter's rejection paths.
 */

import type { RawPriceQuote } from "@kycbound/protocol";
import type { PriceFeedClient } from "./types.js";

export class MockPriceFeedClient implements PriceFeedClient {
  private readonly quotes = new Map<string, RawPriceQuote>();
  /** Number of latestQuote() calls served, per feed. */
  readonly calls = new Map<string, number>();

  async latestQuote(feedId: string): Promise<RawPriceQuote> {
    this.calls.set(feedId, (this.calls.get(feedId) ?? 0) + 1);
    const quote = this.quotes.get(feedId);
    if (!quote) throw new Error(`MockPriceFeedClient: unknown feed ${feedId}`);
    return { ...quote };
  }

  /** Test helper: publish a quote for a feed. */
  setQuote(feedId: string, price: bigint, expo: number, publishTime: number = 0): void {
    this.quotes.set(feedId, { price, expo, publishTime });
  }

  /** Test helper: total calls across all feeds. */
  totalCalls(): number {
    let total = 0;
    for (const n of this.calls.values()) total += n;
    return total;
  }
}
