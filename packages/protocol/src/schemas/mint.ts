/**
 * MintRequestV1: receiver's request to redeem an authority signature.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Base64Signature, Hex32String, SignedRequest, Text, U64String } from "./common.js";

export const MAX_TIER_LENGTH = 64;
export const MAX_METADATA_LENGTH = 512;

export const MintPayloadV1 = Type.Object(
  {
    receiver: Hex32String,
    metadata: Text(MAX_METADATA_LENGTH),
    /** Unix seconds. */
    expiry: U64String,
    /** Seconds of validity paid for; "0" skips fee collection. */
    duration: U64String,
    tier: Text(MAX_TIER_LENGTH),
    /** Authority signature over the mint challenge (base64). */
    signature: Base64Signature,
    timestamp_ms: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type MintPayloadV1 = Static<typeof MintPayloadV1>;

export const MintRequestV1 = SignedRequest(MintPayloadV1);

export type MintRequestV1 = Static<typeof MintRequestV1>;

export const MINT_OP = "mint" as const;
