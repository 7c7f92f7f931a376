/**
 * @kycbound/ledger-client: identity ledger abstraction.
 *
 * The issuer depends on LedgerClient only. MemoryLedger backs tests and
 * dev mode.
 */

export type {
  LedgerClient,
  LedgerTransaction,
  TransferParams,
  TransferReceipt,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
export { MemoryLedger } from "./memory-ledger.js";
