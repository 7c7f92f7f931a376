/**
 * Ledger client interface: the identity ledger the issuer runs against.
 *
 * The issuer uses it for two things: the receiver's sequence number
 * (challenge freshness) and the fee transfer. Both happen inside one
 * transaction so a failed mint leaves balances and sequence numbers
 * untouched.
 */

import type { Identity } from "@kycbound/protocol";

export interface TransferParams {
  from: Identity;
  to: Identity;
  /** Asset base units. */
  amount: bigint;
}

export interface TransferReceipt {
  from: Identity;
  to: Identity;
  amount: bigint;
}

/** Work done inside a transaction. Staged until the transaction commits. */
export interface LedgerTransaction {
  /** Account that submitted the transaction. */
  readonly sender: Identity;
  /** Committed sequence number (the value before this transaction). */
  sequenceOf(account: Identity): Promise<bigint>;
  transfer(params: TransferParams): Promise<TransferReceipt>;
}

export interface LedgerClient {
  sequenceOf(account: Identity): Promise<bigint>;
  balanceOf(account: Identity): Promise<bigint>;
  /**
   * Run `work` as one atomic transaction submitted by `sender`.
   * Resolves → staged transfers apply and the sender's sequence number
   * advances by one. Rejects → nothing applies; the rejection is rethrown.
   */
  transact<T>(sender: Identity, work: (tx: LedgerTransaction) => Promise<T>): Promise<T>;
}

export type LedgerErrorCode = "insufficient_funds" | "invalid_amount";

export class LedgerError extends Error {
  constructor(
    public readonly code: LedgerErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "LedgerError";
  }
}
