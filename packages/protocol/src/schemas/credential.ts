/**
 * CredentialV1: the soulbound record, as served by read-only queries.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Hex32String, U64String } from "./common.js";

export const CredentialV1 = Type.Object(
  {
    key: Hex32String,
    owner: Hex32String,
    verified: Type.Boolean(),
    /** Unix seconds; valid while now < expiry. */
    expiry: U64String,
    tier: Type.String(),
    metadata: Type.String(),
    /** Always false. */
    transferable: Type.Literal(false),
    created_at: U64String,
  },
  { additionalProperties: false },
);

export type CredentialV1 = Static<typeof CredentialV1>;

export const IssuerInfoV1 = Type.Object(
  {
    namespace: Hex32String,
    admin: Hex32String,
    public_key: Hex32String,
    fee_per_year: U64String,
    price_feed_id: Hex32String,
    beneficiary: Hex32String,
  },
  { additionalProperties: false },
);

export type IssuerInfoV1 = Static<typeof IssuerInfoV1>;
