/**
 * Frozen protocol constants.
 *
 * FROZEN constants never change: changing one invalidates every
 * outstanding challenge signature or every derived credential key.
 * TUNABLE values (fee rate, feed id, public key) live in IssuerConfig
 * and change only through admin operations.
 */

// ── Frozen (never change) ──────────────────────────────────────────

/** Domain tag bound into every mint challenge. */
export const MINT_CHALLENGE_DOMAIN = "kycbound::issuer::MintChallenge";

/** Prefix hashed in front of namespace ‖ identity when deriving a credential key. */
export const CREDENTIAL_KEY_TAG = "kycbound/credential/v1";

/** Human-readable collision domain appended to the credential key preimage. */
export const CREDENTIAL_KEY_DOMAIN = "kyc_credential";

export const ED25519_SIGNATURE_BYTES = 64;
export const ED25519_PUBLIC_KEY_BYTES = 32;

// ── Fee arithmetic ─────────────────────────────────────────────────
// fee = (duration × fee_per_year / SECONDS_PER_YEAR)
//       × (BASE_UNITS_PER_ASSET × 10^neg_exponent / price)
//       / FEE_RATE_SCALE

export const SECONDS_PER_YEAR = 31_536_000n; // 365 days
export const BASE_UNITS_PER_ASSET = 100_000_000n; // 8 decimals
export const FEE_RATE_SCALE = 1_000_000n; // fee_per_year is micro-USD
export const U64_MAX = 2n ** 64n - 1n;

// ── Request authentication ─────────────────────────────────────────

/** Max clock difference accepted on a signed request's timestamp_ms. */
export const REQUEST_MAX_SKEW_MS_DEFAULT = 5 * 60_000;
