/**
 * @tally/store — In-memory LedgerStore implementation.
 *
 * Keeps all state in Maps. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 *
 * Not durable (all state lost on process exit). Subclasses add
 * durability by overriding `persist`.
 */

import type { Account, AccountId, Movement } from "@tally/types";
import { LedgerState } from "./state.js";
import { StagedTransaction } from "./transaction.js";
import type { Commit, LedgerStore, NewAccount, StoreTransaction } from "./types.js";
import { StoreError } from "./types.js";

/**
 * Options for creating an InMemoryLedgerStore.
 */
export interface InMemoryLedgerStoreOptions {
  /** Clock used to stamp commits. Default: system time */
  readonly now?: (() => Date) | undefined;
}

export class InMemoryLedgerStore implements LedgerStore {
  protected _state = new LedgerState();

  /** Sequence number of the last applied commit */
  protected _seq = 0;

  private readonly _now: () => Date;
  private _active: StagedTransaction | undefined;
  private _closed = false;

  constructor(options: InMemoryLedgerStoreOptions = {}) {
    this._now = options.now ?? (() => new Date());
  }

  // ─── Transactions ───────────────────────────────────────────────────

  transaction<T>(fn: (tx: StoreTransaction) => T): T {
    this.assertWritable();

    const tx = new StagedTransaction(this._state, this._now().toISOString());
    this._active = tx;

    try {
      const result = fn(tx);
      tx.end();

      const ops = tx.ops;
      if (ops.length > 0) {
        const commit: Commit = { seq: this._seq + 1, committedAt: tx.timestamp, ops };
        this._state.validate(ops);
        this.persist(commit);
        // Only reached once the commit is durable
        this._state.apply(ops);
        this._seq = commit.seq;
      }

      return result;
    } finally {
      tx.end();
      this._active = undefined;
    }
  }

  createAccount(input: NewAccount): Account {
    return this.transaction((tx) => tx.createAccount(input));
  }

  deleteAccount(id: AccountId): boolean {
    return this.transaction((tx) => tx.deleteAccount(id));
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  getAccount(id: AccountId): Account | undefined {
    this.assertOpen();
    return this._state.getAccount(id);
  }

  listAccounts(): readonly Account[] {
    this.assertOpen();
    return this._state.listAccounts();
  }

  countAccounts(): number {
    this.assertOpen();
    return this._state.countAccounts();
  }

  listMovements(accountId: AccountId): readonly Movement[] {
    this.assertOpen();
    return this._state.listMovements(accountId);
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  close(): void {
    this._closed = true;
  }

  get closed(): boolean {
    return this._closed;
  }

  // ─── Extension points ───────────────────────────────────────────────

  /**
   * Make a commit durable before it is applied.
   * Throwing here rolls the transaction back.
   */
  protected persist(_commit: Commit): void {
    // Nothing to persist in memory
  }

  protected assertOpen(): void {
    if (this._closed) {
      throw new StoreError("STORE_CLOSED", "Ledger store is closed");
    }
  }

  /** Open and not inside a transaction. */
  protected assertWritable(): void {
    this.assertOpen();
    if (this._active !== undefined) {
      throw new StoreError("NESTED_TRANSACTION", "A transaction is already in progress");
    }
  }
}
