/**
 * Ed25519 sign + verify.
 *
 * Used for:
 *   - Mint challenge signatures (issuing authority)
 *   - Signed API requests (admin, receiver)
 *   - Test helpers (generate keypairs)
 *
 * Verification is strict RFC 8032 (zip215: false): non-canonical point
 * encodings, small-order keys and S ≥ L are rejected, so a valid
 * signature cannot be re-encoded into a second valid one.
 */

import {
  getPublicKeyAsync,
  signAsync,
  utils,
  verifyAsync,
} from "@noble/ed25519";
import { ED25519_SIGNATURE_BYTES } from "./constants.js";

// ── Key Generation (test/client helper) ────────────────────────────

/**
 * Generate an Ed25519 keypair.
 * Returns raw bytes: { publicKey: 32 bytes, privateKey: 32 bytes (seed) }.
 */
export async function generateKeypair(): Promise<{
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}> {
  const privateKey = utils.randomPrivateKey();
  const publicKey = await getPublicKeyAsync(privateKey);
  return { publicKey, privateKey };
}

export async function publicKeyOf(privateKey: Uint8Array): Promise<Uint8Array> {
  return getPublicKeyAsync(privateKey);
}

// ── Signing ────────────────────────────────────────────────────────

/** Sign a message with a 32-byte seed. Returns a 64-byte signature. */
export async function ed25519Sign(
  privateKey: Uint8Array,
  message: Uint8Array,
): Promise<Uint8Array> {
  return signAsync(message, privateKey);
}

// ── Verification ───────────────────────────────────────────────────

/**
 * Strict Ed25519 verification.
 * Returns false for any signature of the wrong length or any key that
 * does not decode; never throws.
 */
export async function ed25519Verify(
  publicKey: Uint8Array,
  signature: Uint8Array,
  message: Uint8Array,
): Promise<boolean> {
  if (signature.length !== ED25519_SIGNATURE_BYTES) return false;
  try {
    return await verifyAsync(signature, message, publicKey, { zip215: false });
  } catch {
    return false;
  }
}

// ── Base64 signature codec ─────────────────────────────────────────

const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function signatureToBase64(signature: Uint8Array): string {
  return Buffer.from(signature).toString("base64");
}

/**
 * Decode a base64 Ed25519 signature.
 * Returns null unless the input is padded base64 of exactly 64 bytes.
 */
export function signatureFromBase64(encoded: string): Uint8Array | null {
  if (!BASE64_RE.test(encoded)) return null;
  const bytes = new Uint8Array(Buffer.from(encoded, "base64"));
  return bytes.length === ED25519_SIGNATURE_BYTES ? bytes : null;
}
