/**
 * Event log schemas: append-only audit trail of issuer mutations.
 *
 * One event per committed mint or admin change. Failed operations emit
 * nothing. Amounts and timestamps in payloads are decimal strings.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Hex32String } from "@kycbound/protocol";

export const EventEnvelope = Type.Object({
  /** Event type discriminator. */
  type: Type.String(),
  /** Monotonic sequence number within the log. */
  seq: Type.Integer({ minimum: 0 }),
  /** Event timestamp (ms since epoch). */
  timestamp: Type.Integer({ minimum: 0 }),
  /** Caller that authorized the mutation. */
  signer: Hex32String,
  payload: Type.Record(Type.String(), Type.Union([Type.String(), Type.Boolean()])),
});

export type EventEnvelope = Static<typeof EventEnvelope>;

// ── Event types ────────────────────────────────────────────────────

export const CREDENTIAL_MINT_EVENT = "credential.mint.v1" as const;
export const CREDENTIAL_VERIFIED_EVENT = "credential.verified.v1" as const;
export const CREDENTIAL_EXPIRY_EVENT = "credential.expiry.v1" as const;
export const CREDENTIAL_METADATA_EVENT = "credential.metadata.v1" as const;
export const ISSUER_PUBLIC_KEY_EVENT = "issuer.public_key.v1" as const;
export const ISSUER_FEE_RATE_EVENT = "issuer.fee_rate.v1" as const;
export const ISSUER_PRICE_FEED_EVENT = "issuer.price_feed.v1" as const;
