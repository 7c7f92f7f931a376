/**
 * In-memory ledger for testing and dev mode.
 *
 * Transactions run one at a time (a promise chain gives the total
 * order). Transfers are journaled against a staged balance view and
 * applied only when the work function resolves.
 */

import type { Identity } from "@kycbound/protocol";
import {
  LedgerError,
  type LedgerClient,
  type LedgerTransaction,
  type TransferParams,
  type TransferReceipt,
} from "./types.js";

export class MemoryLedger implements LedgerClient {
  private readonly balances = new Map<Identity, bigint>();
  private readonly sequences = new Map<Identity, bigint>();
  private tail: Promise<unknown> = Promise.resolve();

  async sequenceOf(account: Identity): Promise<bigint> {
    return this.sequences.get(account) ?? 0n;
  }

  async balanceOf(account: Identity): Promise<bigint> {
    return this.balances.get(account) ?? 0n;
  }

  transact<T>(sender: Identity, work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.execute(sender, work));
    // Keep the chain alive past failures; the caller still sees the rejection.
    this.tail = run.catch(() => undefined);
    return run;
  }

  /** Test helper: credit an account outside any transaction. */
  fund(account: Identity, amount: bigint): void {
    if (amount < 0n) throw new LedgerError("invalid_amount", "fund amount must be >= 0");
    this.balances.set(account, (this.balances.get(account) ?? 0n) + amount);
  }

  /**
   * Test helper: record unrelated activity by `account` (an empty
   * committed transaction), advancing its sequence number.
   */
  async touch(account: Identity): Promise<void> {
    await this.transact(account, async () => undefined);
  }

  private async execute<T>(
    sender: Identity,
    work: (tx: LedgerTransaction) => Promise<T>,
  ): Promise<T> {
    const staged = new Map<Identity, bigint>();
    const committed = this.balances;
    const sequences = this.sequences;

    const balance = (account: Identity): bigint =>
      staged.get(account) ?? committed.get(account) ?? 0n;

    const tx: LedgerTransaction = {
      sender,
      async sequenceOf(account: Identity): Promise<bigint> {
        return sequences.get(account) ?? 0n;
      },
      async transfer(params: TransferParams): Promise<TransferReceipt> {
        if (params.amount <= 0n) {
          throw new LedgerError("invalid_amount", `transfer amount must be > 0, got ${params.amount}`);
        }
        const available = balance(params.from);
        if (available < params.amount) {
          throw new LedgerError(
            "insufficient_funds",
            `${params.from} holds ${available}, needs ${params.amount}`,
          );
        }
        staged.set(params.from, available - params.amount);
        staged.set(params.to, balance(params.to) + params.amount);
        return { from: params.from, to: params.to, amount: params.amount };
      },
    };

    const result = await work(tx);

    for (const [account, value] of staged) committed.set(account, value);
    sequences.set(sender, (sequences.get(sender) ?? 0n) + 1n);
    return result;
  }
}
