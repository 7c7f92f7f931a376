/**
 * Price quote validation.
 *
 * Oracles publish price × 10^expo with a signed price and a signed
 * exponent. The fee calculator only accepts quotes of the form
 * magnitude × 10^(−neg_exponent) with magnitude > 0 and neg_exponent > 0.
 */

import { OracleError } from "./errors.js";

/** Quote exactly as the oracle reports it. */
export interface RawPriceQuote {
  price: bigint;
  expo: number;
  /** Unix seconds; informational only, staleness is the oracle's concern. */
  publishTime: number;
}

/** Validated quote: value = magnitude × 10^(−negExponent). */
export interface PriceQuote {
  magnitude: bigint;
  negExponent: bigint;
}

export function quoteFromRaw(feedId: string, raw: RawPriceQuote): PriceQuote {
  if (raw.price <= 0n) {
    throw new OracleError("negative_price", `feed ${feedId} reported price ${raw.price}`);
  }
  if (!Number.isInteger(raw.expo) || raw.expo >= 0) {
    throw new OracleError("positive_exponent", `feed ${feedId} reported expo ${raw.expo}`);
  }
  return { magnitude: raw.price, negExponent: BigInt(-raw.expo) };
}
