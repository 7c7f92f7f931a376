/**
 * Issuer configuration.
 * Keys and ids are 64 lowercase hex chars; fee_per_year is micro-USD.
 */

import { REQUEST_MAX_SKEW_MS_DEFAULT } from "@kycbound/protocol";

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

export const config = {
  port: parseInt(env("ISSUER_PORT", "3110"), 10),
  host: env("ISSUER_HOST", "0.0.0.0"),
  /** Identity allowed to call admin operations. */
  admin: env("ISSUER_ADMIN", ""),
  /** Issuer identity: credential key namespace, bound into every challenge. Defaults to admin. */
  namespace: env("ISSUER_NAMESPACE", process.env["ISSUER_ADMIN"] ?? ""),
  /** Ed25519 public key of the KYC authority. */
  publicKey: env("ISSUER_PUBLIC_KEY", ""),
  feePerYear: env("ISSUER_FEE_PER_YEAR", "0"),
  priceFeedId: env("ISSUER_PRICE_FEED_ID", ""),
  /** Receives mint fees. Defaults to admin. */
  beneficiary: env("ISSUER_BENEFICIARY", process.env["ISSUER_ADMIN"] ?? ""),
  hermesUrl: env("HERMES_URL", "https://hermes.pyth.network"),
  hermesTimeoutMs: parseInt(env("HERMES_TIMEOUT_MS", "5000"), 10),
  /** Records retained by the in-memory event log. */
  eventLogMaxEvents: parseInt(env("EVENT_LOG_MAX_EVENTS", "10000"), 10),
  /** Accepted clock difference on signed requests (ms). */
  requestMaxSkewMs: parseInt(
    env("REQUEST_MAX_SKEW_MS", String(REQUEST_MAX_SKEW_MS_DEFAULT)),
    10,
  ),
} as const;
