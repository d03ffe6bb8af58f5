/**
 * @tally/store — Staged transaction.
 *
 * Buffers operations over a read-only view of committed state.
 * Nothing reaches the committed state until the owning store
 * persists and applies `ops`.
 */

import type { Account, AccountId, Amount, Movement } from "@tally/types";
import type { LedgerState } from "./state.js";
import type { NewAccount, NewMovement, StoreOp, StoreTransaction } from "./types.js";
import { StoreError } from "./types.js";

export class StagedTransaction implements StoreTransaction {
  private readonly _ops: StoreOp[] = [];

  /** Accounts touched by this transaction; null marks a staged deletion */
  private readonly _accounts = new Map<AccountId, Account | null>();

  /** Movements appended by this transaction, per account */
  private readonly _movements = new Map<AccountId, Movement[]>();

  private _nextAccountId: number;
  private _nextMovementId: number;
  private _open = true;

  constructor(
    private readonly _base: LedgerState,
    readonly timestamp: string,
  ) {
    this._nextAccountId = _base.nextAccountId;
    this._nextMovementId = _base.nextMovementId;
  }

  get ops(): readonly StoreOp[] {
    return [...this._ops];
  }

  /** End the scope. Later calls on the handle throw. */
  end(): void {
    this._open = false;
  }

  getAccount(id: AccountId): Account | undefined {
    this._assertOpen();
    const staged = this._accounts.get(id);
    if (staged !== undefined) {
      return staged ?? undefined;
    }
    return this._base.getAccount(id);
  }

  listMovements(accountId: AccountId): readonly Movement[] {
    if (this.getAccount(accountId) === undefined) {
      return [];
    }
    return [...this._base.listMovements(accountId), ...(this._movements.get(accountId) ?? [])];
  }

  createAccount(input: NewAccount): Account {
    this._assertOpen();
    const account: Account = {
      id: this._nextAccountId++,
      name: input.name,
      balance: input.balance,
      occupation: input.occupation,
      createdAt: this.timestamp,
    };
    this._accounts.set(account.id, account);
    this._ops.push({ op: "account.created", account });
    return account;
  }

  deleteAccount(id: AccountId): boolean {
    if (this.getAccount(id) === undefined) {
      return false;
    }
    this._accounts.set(id, null);
    this._movements.delete(id);
    this._ops.push({ op: "account.deleted", accountId: id });
    return true;
  }

  updateBalance(id: AccountId, balance: Amount): Account {
    const current = this._require(id);
    const updated: Account = { ...current, balance };
    this._accounts.set(id, updated);
    this._ops.push({ op: "balance.updated", accountId: id, balance });
    return updated;
  }

  appendMovement(input: NewMovement): Movement {
    this._require(input.accountId);
    const movement: Movement = {
      id: this._nextMovementId++,
      accountId: input.accountId,
      kind: input.kind,
      amount: input.amount,
      counterpartyId: input.counterpartyId,
      createdAt: this.timestamp,
    };

    let staged = this._movements.get(input.accountId);
    if (staged === undefined) {
      staged = [];
      this._movements.set(input.accountId, staged);
    }
    staged.push(movement);
    this._ops.push({ op: "movement.appended", movement });
    return movement;
  }

  private _require(id: AccountId): Account {
    const account = this.getAccount(id);
    if (account === undefined) {
      throw new StoreError("UNKNOWN_ACCOUNT", `Unknown account: ${id}`);
    }
    return account;
  }

  private _assertOpen(): void {
    if (!this._open) {
      throw new StoreError("TRANSACTION_CLOSED", "Transaction scope has already ended");
    }
  }
}
