/**
 * Price oracle adapter: one validated quote per fee computation.
 *
 * price_of(feed) → (magnitude, neg_exponent), or OracleError when the
 * price is not positive, the exponent is not negative, or the client
 * fails. No caching and no staleness policy: every call hits the client.
 */

import { OracleError, quoteFromRaw, type PriceQuote } from "@kycbound/protocol";
import type { PriceFeedClient } from "./types.js";

export class PriceOracleAdapter {
  constructor(private readonly client: PriceFeedClient) {}

  async priceOf(feedId: string): Promise<PriceQuote> {
    const raw = await this.client.latestQuote(feedId).catch((err: unknown) => {
      const msg = err instanceof Error ? err.message : String(err);
      throw new OracleError("unavailable", msg);
    });
    return quoteFromRaw(feedId, raw);
  }
}
