/**
 * @kycbound/protocol: Frozen issuance primitives.
 *
 * This package contains ONLY frozen primitives and versioned schemas.
 * It has no I/O and no state.
 * The price feed, ledger client and issuer service import from here,
 * never the reverse.
 */

// Frozen primitives
export { canonicalEncode, canonicalDecode } from "./canonical.js";
export {
  fromHex,
  toHex,
  utf8,
  hashBytes,
  concatBytes,
  isHex32,
  HEX32_PATTERN,
  type Hex32,
  type Identity,
} from "./hex.js";

// Ed25519 sign/verify (challenge signatures, request signatures, key generation)
export {
  generateKeypair,
  publicKeyOf,
  ed25519Sign,
  ed25519Verify,
  signatureToBase64,
  signatureFromBase64,
} from "./ed25519.js";

// Mint challenge construction + authority signature gate
export {
  buildMintChallenge,
  encodeMintChallenge,
  signMintChallenge,
  verifyMintChallenge,
  type MintChallenge,
  type MintTerms,
} from "./challenge.js";

// Signed request envelope (caller authentication)
export { signRequest, verifyRequestSignature } from "./request-signature.js";

// Credential key derivation
export { deriveCredentialKey, type CredentialKey } from "./credential-key.js";

// Oracle quote validation + fee computation
export { quoteFromRaw, type RawPriceQuote, type PriceQuote } from "./quote.js";
export { requiredFee } from "./fee.js";

// Error taxonomy
export {
  KycError,
  UnauthorizedError,
  AuthFailedError,
  OracleError,
  ArithmeticOverflowError,
  DuplicateCredentialError,
  NotFoundError,
  NonTransferableError,
  InvalidInputError,
  type KycErrorCode,
  type AuthFailureReason,
  type OracleFailureReason,
} from "./errors.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
