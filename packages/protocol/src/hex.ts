/**
 * Hex + hash helpers.
 *
 * Identities, public keys, feed ids and credential keys are all 32-byte
 * values represented as 64 lowercase hex characters.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, hexToBytes, utf8ToBytes } from "@noble/hashes/utils";

/** 32-byte hex string (identity, public key, credential key). */
export type Hex32 = string;

/** An identity is its Ed25519 public key. */
export type Identity = Hex32;

export const HEX32_PATTERN = "^[0-9a-f]{64}$";
const HEX32_RE = new RegExp(HEX32_PATTERN);

export function isHex32(value: unknown): value is Hex32 {
  return typeof value === "string" && HEX32_RE.test(value);
}

/** Convert hex string to bytes. */
export function fromHex(hex: string): Uint8Array {
  return hexToBytes(hex);
}

/** Convert bytes to hex string. */
export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

export function utf8(text: string): Uint8Array {
  return utf8ToBytes(text);
}

/** Raw SHA256 hash of bytes → Uint8Array (32 bytes). */
export function hashBytes(bytes: Uint8Array): Uint8Array {
  return sha256(bytes);
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const totalLen = parts.reduce((sum, p) => sum + p.length, 0);
  const result = new Uint8Array(totalLen);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}
