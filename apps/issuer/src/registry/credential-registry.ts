/**
 * Credential registry: soulbound records keyed by derived credential key.
 *
 * At most one credential per identity: the key is a pure function of
 * (namespace, identity), so a second create collides. Records never move
 * and are never deleted; only the admin flips `verified`, moves `expiry`
 * or rewrites `metadata`.
 */

import {
  DuplicateCredentialError,
  NonTransferableError,
  NotFoundError,
  deriveCredentialKey,
  isHex32,
  type CredentialKey,
  type Identity,
} from "@kycbound/protocol";
import type { IssuerAuthority } from "../authority/issuer-authority.js";

export interface Credential {
  key: CredentialKey;
  owner: Identity;
  verified: boolean;
  /** Unix seconds; valid while now < expiry. */
  expiry: bigint;
  tier: string;
  metadata: string;
  transferable: false;
  /** Unix seconds. */
  createdAt: bigint;
}

export interface NewCredential {
  tier: string;
  expiry: bigint;
  metadata: string;
  createdAt: bigint;
}

export class CredentialRegistry {
  private readonly credentials = new Map<CredentialKey, Credential>();

  constructor(private readonly authority: IssuerAuthority) {}

  deriveKey(identity: Identity): CredentialKey {
    return deriveCredentialKey(this.authority.snapshot().namespace, identity);
  }

  exists(key: CredentialKey): boolean {
    return this.credentials.has(key);
  }

  get(key: CredentialKey): Readonly<Credential> | undefined {
    const credential = this.credentials.get(key);
    return credential ? Object.freeze({ ...credential }) : undefined;
  }

  size(): number {
    return this.credentials.size;
  }

  create(key: CredentialKey, owner: Identity, init: NewCredential): Readonly<Credential> {
    if (this.credentials.has(key)) throw new DuplicateCredentialError(key);
    const credential: Credential = {
      key,
      owner,
      verified: true,
      expiry: init.expiry,
      tier: init.tier,
      metadata: init.metadata,
      transferable: false,
      createdAt: init.createdAt,
    };
    this.credentials.set(key, credential);
    return Object.freeze({ ...credential });
  }

  setVerified(caller: Identity, identity: Identity, verified: boolean): Readonly<Credential> {
    return this.update(caller, identity, (c) => {
      c.verified = verified;
    });
  }

  setExpiry(caller: Identity, identity: Identity, expiry: bigint): Readonly<Credential> {
    return this.update(caller, identity, (c) => {
      c.expiry = expiry;
    });
  }

  setMetadata(caller: Identity, identity: Identity, metadata: string): Readonly<Credential> {
    return this.update(caller, identity, (c) => {
      c.metadata = metadata;
    });
  }

  /** Credentials are soulbound. Always throws. */
  transfer(key: CredentialKey, _to: Identity): never {
    throw new NonTransferableError(key);
  }

  /** verified ∧ now < expiry. Total: false for unknown or malformed identities. */
  isValid(identity: string, nowSeconds: bigint): boolean {
    if (!isHex32(identity)) return false;
    const credential = this.credentials.get(this.deriveKey(identity));
    if (!credential) return false;
    return credential.verified && nowSeconds < credential.expiry;
  }

  credentialKeyOf(identity: Identity): CredentialKey {
    const key = this.deriveKey(identity);
    if (!this.credentials.has(key)) throw new NotFoundError(`identity ${identity}`);
    return key;
  }

  tierOf(key: CredentialKey): string {
    return this.require(key).tier;
  }

  expiryOf(key: CredentialKey): bigint {
    return this.require(key).expiry;
  }

  private require(key: CredentialKey): Credential {
    const credential = this.credentials.get(key);
    if (!credential) throw new NotFoundError(`key ${key}`);
    return credential;
  }

  private update(
    caller: Identity,
    identity: Identity,
    apply: (credential: Credential) => void,
  ): Readonly<Credential> {
    this.authority.assertAdmin(caller);
    const credential = this.credentials.get(this.deriveKey(identity));
    if (!credential) throw new NotFoundError(`identity ${identity}`);
    apply(credential);
    return Object.freeze({ ...credential });
  }
}
