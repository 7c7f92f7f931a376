/**
 * Issuer authority: the single IssuerConfig and its admin gate.
 *
 * Created once at startup. public_key, fee_per_year and price_feed_id
 * change only through the setters below, and only for the admin.
 */

import {
  InvalidInputError,
  U64_MAX,
  UnauthorizedError,
  isHex32,
  type Hex32,
  type Identity,
} from "@kycbound/protocol";

export interface IssuerConfig {
  admin: Identity;
  /** Issuer identity; namespace for credential keys. */
  namespace: Hex32;
  /** Authority key that signs mint challenges. */
  publicKey: Hex32;
  /** Micro-USD per year of validity. */
  feePerYear: bigint;
  priceFeedId: Hex32;
  beneficiary: Identity;
}

function requireHex32(field: string, value: string): void {
  if (!isHex32(value)) throw new InvalidInputError(field, "must be 64 lowercase hex chars");
}

function requireU64(field: string, value: bigint): void {
  if (value < 0n || value > U64_MAX) throw new InvalidInputError(field, "must fit in u64");
}

export class IssuerAuthority {
  private config: IssuerConfig;

  constructor(initial: IssuerConfig) {
    requireHex32("admin", initial.admin);
    requireHex32("namespace", initial.namespace);
    requireHex32("public_key", initial.publicKey);
    requireU64("fee_per_year", initial.feePerYear);
    requireHex32("price_feed_id", initial.priceFeedId);
    requireHex32("beneficiary", initial.beneficiary);
    this.config = { ...initial };
  }

  snapshot(): Readonly<IssuerConfig> {
    return Object.freeze({ ...this.config });
  }

  assertAdmin(caller: Identity): void {
    if (caller !== this.config.admin) throw new UnauthorizedError(caller);
  }

  setPublicKey(caller: Identity, publicKey: Hex32): void {
    this.assertAdmin(caller);
    requireHex32("public_key", publicKey);
    this.config = { ...this.config, publicKey };
  }

  setFeeRate(caller: Identity, feePerYear: bigint): void {
    this.assertAdmin(caller);
    requireU64("fee_per_year", feePerYear);
    this.config = { ...this.config, feePerYear };
  }

  setPriceFeed(caller: Identity, priceFeedId: Hex32): void {
    this.assertAdmin(caller);
    requireHex32("price_feed_id", priceFeedId);
    this.config = { ...this.config, priceFeedId };
  }
}
