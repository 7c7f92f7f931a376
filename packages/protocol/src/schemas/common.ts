/**
 * Shared wire primitives.
 * u64 quantities travel as decimal strings; JSON numbers cannot hold them.
 */

import { Type, type TSchema } from "@sinclair/typebox";
import { U64_MAX } from "../constants.js";
import { InvalidInputError } from "../errors.js";
import { HEX32_PATTERN } from "../hex.js";

export const Hex32String = Type.String({ pattern: HEX32_PATTERN });

export const U64String = Type.String({ pattern: "^(0|[1-9][0-9]{0,19})$" });

export const Base64Signature = Type.String({ minLength: 1, maxLength: 128 });

/** Free-form text field (tier, metadata). */
export const Text = (maxLength: number) => Type.String({ minLength: 1, maxLength });

/** Parse a decimal u64 string; rejects values above 2^64 − 1. */
export function parseU64(field: string, value: string): bigint {
  if (!/^(0|[1-9][0-9]*)$/.test(value)) {
    throw new InvalidInputError(field, "must be a decimal unsigned integer");
  }
  const parsed = BigInt(value);
  if (parsed > U64_MAX) throw new InvalidInputError(field, "exceeds u64");
  return parsed;
}

/**
 * Authenticated request envelope.
 * sig = Ed25519_sign(caller_sk, canonical({ op, ...payload }))
 */
export const SignedRequest = <T extends TSchema>(payload: T) =>
  Type.Object(
    {
      caller: Hex32String,
      sig: Base64Signature,
      payload,
    },
    { additionalProperties: false },
  );
