/**
 * Domain records → wire views. bigint fields become decimal strings.
 */

import type { CredentialV1, IssuerInfoV1 } from "@kycbound/protocol";
import type { IssuerConfig } from "./authority/issuer-authority.js";
import type { Credential } from "./registry/credential-registry.js";

export function credentialView(c: Readonly<Credential>): CredentialV1 {
  return {
    key: c.key,
    owner: c.owner,
    verified: c.verified,
    expiry: c.expiry.toString(),
    tier: c.tier,
    metadata: c.metadata,
    transferable: c.transferable,
    created_at: c.createdAt.toString(),
  };
}

export function issuerView(config: Readonly<IssuerConfig>): IssuerInfoV1 {
  return {
    namespace: config.namespace,
    admin: config.admin,
    public_key: config.publicKey,
    fee_per_year: config.feePerYear.toString(),
    price_feed_id: config.priceFeedId,
    beneficiary: config.beneficiary,
  };
}
