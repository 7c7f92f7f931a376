/**
 * Price feed client interface: abstraction over oracle transports.
 *
 * The issuer uses latestQuote() through PriceOracleAdapter, which owns
 * sign/exponent validation. Clients report quotes verbatim.
 */

import type { RawPriceQuote } from "@kycbound/protocol";

export interface PriceFeedClient {
  /**
   * Latest quote for a feed, unchecked.
   * Rejects when the feed is unknown or the oracle is unreachable.
   */
  latestQuote(feedId: string): Promise<RawPriceQuote>;
}

export interface HermesClientOptions {
  /** Hermes base URL (e.g. "https://hermes.pyth.network"). */
  baseUrl: string;
  /** Request timeout in ms. Default: 5000. */
  timeoutMs?: number;
}
