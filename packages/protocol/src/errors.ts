/**
 * Issuance error taxonomy.
 *
 * Every failure aborts the enclosing operation and reaches the caller
 * verbatim. `code` is the stable wire identifier; HTTP handlers map it
 * to a status code.
 */

export type KycErrorCode =
  | "unauthorized"
  | "auth_failed"
  | "oracle_error"
  | "arithmetic_overflow"
  | "duplicate_credential"
  | "not_found"
  | "non_transferable"
  | "invalid_input";

export class KycError extends Error {
  constructor(
    public readonly code: KycErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "KycError";
  }
}

/** Caller identity does not match the configured admin (or the receiver, for mint). */
export class UnauthorizedError extends KycError {
  constructor(public readonly caller: string) {
    super("unauthorized", `caller ${caller} is not permitted to perform this operation`);
    this.name = "UnauthorizedError";
  }
}

export type AuthFailureReason = "malformed_signature" | "invalid_proof";

/** Mint challenge signature is malformed or does not verify. */
export class AuthFailedError extends KycError {
  constructor(public readonly reason: AuthFailureReason) {
    super(
      "auth_failed",
      reason === "malformed_signature"
        ? "challenge signature is not a 64-byte base64 Ed25519 signature"
        : "challenge signature does not verify against the issuer public key",
    );
    this.name = "AuthFailedError";
  }
}

export type OracleFailureReason = "negative_price" | "positive_exponent" | "unavailable";

export class OracleError extends KycError {
  constructor(
    public readonly reason: OracleFailureReason,
    detail: string,
  ) {
    super("oracle_error", `oracle ${reason}: ${detail}`);
    this.name = "OracleError";
  }
}

export class ArithmeticOverflowError extends KycError {
  constructor(operation: string) {
    super("arithmetic_overflow", `u64 overflow in ${operation}`);
    this.name = "ArithmeticOverflowError";
  }
}

export class DuplicateCredentialError extends KycError {
  constructor(public readonly key: string) {
    super("duplicate_credential", `credential ${key} already exists`);
    this.name = "DuplicateCredentialError";
  }
}

export class NotFoundError extends KycError {
  constructor(what: string) {
    super("not_found", `no credential for ${what}`);
    this.name = "NotFoundError";
  }
}

export class NonTransferableError extends KycError {
  constructor(public readonly key: string) {
    super("non_transferable", `credential ${key} is soulbound and cannot be transferred`);
    this.name = "NonTransferableError";
  }
}

export class InvalidInputError extends KycError {
  constructor(
    public readonly field: string,
    detail: string,
  ) {
    super("invalid_input", `${field}: ${detail}`);
    this.name = "InvalidInputError";
  }
}
