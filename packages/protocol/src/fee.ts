/**
 * Fee calculator: validity duration × annual USD rate → asset base units.
 *
 *   cost_usd             = duration × fee_per_year / SECONDS_PER_YEAR
 *   asset_per_usd_scaled = BASE_UNITS_PER_ASSET × 10^neg_exponent / magnitude
 *   fee                  = cost_usd × asset_per_usd_scaled / FEE_RATE_SCALE
 *
 * Unsigned 64-bit semantics: every intermediate must fit in u64, every
 * division truncates. Overflow throws, it never wraps.
 */

import {
  BASE_UNITS_PER_ASSET,
  FEE_RATE_SCALE,
  SECONDS_PER_YEAR,
  U64_MAX,
} from "./constants.js";
import { ArithmeticOverflowError } from "./errors.js";
import type { PriceQuote } from "./quote.js";

function u64(value: bigint, operation: string): bigint {
  if (value < 0n || value > U64_MAX) throw new ArithmeticOverflowError(operation);
  return value;
}

function mul(a: bigint, b: bigint, operation: string): bigint {
  return u64(u64(a, operation) * u64(b, operation), operation);
}

function div(a: bigint, b: bigint, operation: string): bigint {
  if (b === 0n) throw new ArithmeticOverflowError(`${operation} (division by zero)`);
  return u64(a, operation) / u64(b, operation);
}

function pow10(exp: bigint): bigint {
  let result = 1n;
  for (let i = 0n; i < u64(exp, "10^neg_exponent"); i++) {
    result = mul(result, 10n, "10^neg_exponent");
  }
  return result;
}

/**
 * Required payment in asset base units.
 *
 * @param durationSeconds - requested validity in seconds
 * @param feePerYear - micro-USD per year of validity
 * @param quote - validated oracle quote (USD per whole asset)
 */
export function requiredFee(
  durationSeconds: bigint,
  feePerYear: bigint,
  quote: PriceQuote,
): bigint {
  const costUsd = div(
    mul(durationSeconds, feePerYear, "duration × fee_per_year"),
    SECONDS_PER_YEAR,
    "cost_usd",
  );
  const assetPerUsdScaled = div(
    mul(BASE_UNITS_PER_ASSET, pow10(quote.negExponent), "base_units × 10^neg_exponent"),
    quote.magnitude,
    "asset_per_usd_scaled",
  );
  return div(
    mul(costUsd, assetPerUsdScaled, "cost_usd × asset_per_usd_scaled"),
    FEE_RATE_SCALE,
    "fee",
  );
}
