/**
 * Credential key derivation.
 *
 * key = SHA256(CREDENTIAL_KEY_TAG ‖ namespace ‖ identity ‖ CREDENTIAL_KEY_DOMAIN)
 *
 * The key is the only way to address a credential: lookup needs no
 * index, and a second create for the same identity collides on the key.
 */

import { CREDENTIAL_KEY_DOMAIN, CREDENTIAL_KEY_TAG } from "./constants.js";
import { InvalidInputError } from "./errors.js";
import {
  concatBytes,
  fromHex,
  hashBytes,
  isHex32,
  toHex,
  utf8,
  type Hex32,
  type Identity,
} from "./hex.js";

export type CredentialKey = Hex32;

export function deriveCredentialKey(
  namespace: Hex32,
  identity: Identity,
): CredentialKey {
  if (!isHex32(namespace)) {
    throw new InvalidInputError("namespace", "must be 64 lowercase hex chars");
  }
  if (!isHex32(identity)) {
    throw new InvalidInputError("identity", "must be 64 lowercase hex chars");
  }
  const preimage = concatBytes(
    utf8(CREDENTIAL_KEY_TAG),
    fromHex(namespace),
    fromHex(identity),
    utf8(CREDENTIAL_KEY_DOMAIN),
  );
  return toHex(hashBytes(preimage));
}
