/**
 * Request signature: authenticate the caller of a mutating operation.
 *
 *   sig = Ed25519_sign(caller_sk, canonical({ op, ...payload }))
 *
 * `op` is mixed into the signed bytes so a signature for one operation
 * can never be replayed against another with the same payload shape.
 */

import { canonicalEncode } from "./canonical.js";
import {
  ed25519Sign,
  ed25519Verify,
  signatureFromBase64,
  signatureToBase64,
} from "./ed25519.js";
import { fromHex, isHex32 } from "./hex.js";

function requestMessage(op: string, payload: Record<string, unknown>): Uint8Array {
  return canonicalEncode({ ...payload, op });
}

/**
 * Sign a request payload.
 * @returns Base64-encoded Ed25519 signature
 */
export async function signRequest(
  privateKey: Uint8Array,
  op: string,
  payload: Record<string, unknown>,
): Promise<string> {
  const sig = await ed25519Sign(privateKey, requestMessage(op, payload));
  return signatureToBase64(sig);
}

/**
 * Verify a request signature against the claimed caller.
 * Returns false for malformed keys or signatures; never throws.
 */
export async function verifyRequestSignature(
  callerHex: string,
  sigBase64: string,
  op: string,
  payload: Record<string, unknown>,
): Promise<boolean> {
  if (!isHex32(callerHex)) return false;
  const sig = signatureFromBase64(sigBase64);
  if (!sig) return false;
  try {
    return await ed25519Verify(fromHex(callerHex), sig, requestMessage(op, payload));
  } catch {
    return false;
  }
}
