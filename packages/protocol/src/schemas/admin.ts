/**
 * Admin request payloads. Each travels inside SignedRequest and is
 * accepted only when `caller` is the configured admin identity.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Hex32String, SignedRequest, Text, U64String } from "./common.js";
import { MAX_METADATA_LENGTH } from "./mint.js";

const Timestamp = Type.Integer({ minimum: 0 });

export const SetPublicKeyV1 = SignedRequest(
  Type.Object(
    { public_key: Hex32String, timestamp_ms: Timestamp },
    { additionalProperties: false },
  ),
);
export type SetPublicKeyV1 = Static<typeof SetPublicKeyV1>;

export const SetFeeRateV1 = SignedRequest(
  Type.Object(
    { fee_per_year: U64String, timestamp_ms: Timestamp },
    { additionalProperties: false },
  ),
);
export type SetFeeRateV1 = Static<typeof SetFeeRateV1>;

export const SetPriceFeedV1 = SignedRequest(
  Type.Object(
    { price_feed_id: Hex32String, timestamp_ms: Timestamp },
    { additionalProperties: false },
  ),
);
export type SetPriceFeedV1 = Static<typeof SetPriceFeedV1>;

export const SetVerifiedV1 = SignedRequest(
  Type.Object(
    { identity: Hex32String, verified: Type.Boolean(), timestamp_ms: Timestamp },
    { additionalProperties: false },
  ),
);
export type SetVerifiedV1 = Static<typeof SetVerifiedV1>;

export const SetExpiryV1 = SignedRequest(
  Type.Object(
    { identity: Hex32String, expiry: U64String, timestamp_ms: Timestamp },
    { additionalProperties: false },
  ),
);
export type SetExpiryV1 = Static<typeof SetExpiryV1>;

export const SetMetadataV1 = SignedRequest(
  Type.Object(
    { identity: Hex32String, metadata: Text(MAX_METADATA_LENGTH), timestamp_ms: Timestamp },
    { additionalProperties: false },
  ),
);
export type SetMetadataV1 = Static<typeof SetMetadataV1>;

export const ADMIN_OPS = {
  setPublicKey: "set_public_key",
  setFeeRate: "set_fee_rate",
  setPriceFeed: "set_price_feed",
  setVerified: "set_verified",
  setExpiry: "set_expiry",
  setMetadata: "set_metadata",
} as const;

export type AdminOp = (typeof ADMIN_OPS)[keyof typeof ADMIN_OPS];
