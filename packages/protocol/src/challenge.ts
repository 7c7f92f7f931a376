/**
 * Mint challenge: what the issuing authority signs to approve one mint.
 *
 * challenge = canonical({ domain, issuer, receiver, freshness,
 *                         content_id, expiry, duration_paid, tier })
 * signature = Ed25519_sign(authority_sk, challenge)
 *
 * `freshness` is the receiver's ledger sequence number at redemption
 * time. The caller never supplies it: the verifier reads it, so a
 * signature only redeems while the receiver's counter still matches the
 * value the authority signed for.
 */

import { canonicalEncode } from "./canonical.js";
import { MINT_CHALLENGE_DOMAIN } from "./constants.js";
import {
  ed25519Sign,
  ed25519Verify,
  signatureFromBase64,
  signatureToBase64,
} from "./ed25519.js";
import { AuthFailedError } from "./errors.js";
import { fromHex, isHex32, type Hex32, type Identity } from "./hex.js";

export interface MintChallenge {
  domain: typeof MINT_CHALLENGE_DOMAIN;
  /** Issuer namespace: binds the signature to one issuer deployment. */
  issuer: Hex32;
  receiver: Identity;
  freshness: bigint;
  content_id: string;
  expiry: bigint;
  duration_paid: bigint;
  tier: string;
}

/** Mint parameters as the receiver presents them. */
export interface MintTerms {
  receiver: Identity;
  metadata: string;
  expiry: bigint;
  duration: bigint;
  tier: string;
}

export function buildMintChallenge(
  issuer: Hex32,
  terms: MintTerms,
  freshness: bigint,
): MintChallenge {
  return {
    domain: MINT_CHALLENGE_DOMAIN,
    issuer,
    receiver: terms.receiver,
    freshness,
    content_id: terms.metadata,
    expiry: terms.expiry,
    duration_paid: terms.duration,
    tier: terms.tier,
  };
}

/** The exact bytes signed by the authority. */
export function encodeMintChallenge(challenge: MintChallenge): Uint8Array {
  return canonicalEncode(challenge);
}

/**
 * Sign a mint challenge with the authority's 32-byte seed.
 * @returns base64-encoded signature, as carried in mint requests
 */
export async function signMintChallenge(
  privateKey: Uint8Array,
  challenge: MintChallenge,
): Promise<string> {
  const sig = await ed25519Sign(privateKey, encodeMintChallenge(challenge));
  return signatureToBase64(sig);
}

/**
 * Pass/fail gate over a mint challenge.
 * Throws AuthFailedError("malformed_signature") for undecodable signature
 * bytes, AuthFailedError("invalid_proof") for anything that does not verify.
 */
export async function verifyMintChallenge(
  challenge: MintChallenge,
  signatureB64: string,
  trustedPublicKey: Hex32,
): Promise<void> {
  const sig = signatureFromBase64(signatureB64);
  if (!sig) throw new AuthFailedError("malformed_signature");

  // A misconfigured key can never authorize anything.
  if (!isHex32(trustedPublicKey)) throw new AuthFailedError("invalid_proof");

  const ok = await ed25519Verify(
    fromHex(trustedPublicKey),
    sig,
    encodeMintChallenge(challenge),
  );
  if (!ok) throw new AuthFailedError("invalid_proof");
}
