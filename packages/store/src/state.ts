/**
 * @tally/store — Materialized ledger state.
 *
 * The committed tables, derived by applying commits in order.
 * Shared by the in-memory and journal-backed stores.
 */

import type { Account, AccountId, Movement } from "@tally/types";
import type { StoreOp } from "./types.js";
import { StoreError } from "./types.js";

/**
 * Full copy of the state, including identifier counters so that
 * ids stay unique after compaction.
 */
export interface LedgerCheckpoint {
  readonly accounts: readonly Account[];
  readonly movements: readonly Movement[];
  readonly nextAccountId: number;
  readonly nextMovementId: number;
}

export class LedgerState {
  private readonly _accounts = new Map<AccountId, Account>();
  private readonly _movements = new Map<AccountId, Movement[]>();
  private _nextAccountId = 1;
  private _nextMovementId = 1;

  get nextAccountId(): number {
    return this._nextAccountId;
  }

  get nextMovementId(): number {
    return this._nextMovementId;
  }

  getAccount(id: AccountId): Account | undefined {
    return this._accounts.get(id);
  }

  listAccounts(): readonly Account[] {
    return [...this._accounts.values()];
  }

  countAccounts(): number {
    return this._accounts.size;
  }

  listMovements(accountId: AccountId): readonly Movement[] {
    const movements = this._movements.get(accountId);
    return movements !== undefined ? [...movements] : [];
  }

  /**
   * Check that a batch of operations applies cleanly, without touching state.
   *
   * @throws StoreError if any operation references a missing account
   *   or reuses an identifier
   */
  validate(ops: readonly StoreOp[]): void {
    const live = new Set(this._accounts.keys());
    let nextAccountId = this._nextAccountId;
    let nextMovementId = this._nextMovementId;

    for (const op of ops) {
      switch (op.op) {
        case "account.created":
          if (op.account.id < nextAccountId) {
            throw new StoreError("INVALID_COMMIT", `Account id ${op.account.id} was already assigned`);
          }
          nextAccountId = op.account.id + 1;
          live.add(op.account.id);
          break;
        case "account.deleted":
          if (!live.delete(op.accountId)) {
            throw new StoreError("UNKNOWN_ACCOUNT", `Unknown account: ${op.accountId}`);
          }
          break;
        case "balance.updated":
          if (!live.has(op.accountId)) {
            throw new StoreError("UNKNOWN_ACCOUNT", `Unknown account: ${op.accountId}`);
          }
          break;
        case "movement.appended":
          if (!live.has(op.movement.accountId)) {
            throw new StoreError("UNKNOWN_ACCOUNT", `Unknown account: ${op.movement.accountId}`);
          }
          if (op.movement.id < nextMovementId) {
            throw new StoreError("INVALID_COMMIT", `Movement id ${op.movement.id} was already assigned`);
          }
          nextMovementId = op.movement.id + 1;
          break;
      }
    }
  }

  /**
   * Apply a batch of operations. All or nothing.
   */
  apply(ops: readonly StoreOp[]): void {
    this.validate(ops);

    for (const op of ops) {
      switch (op.op) {
        case "account.created":
          this._accounts.set(op.account.id, Object.freeze({ ...op.account }));
          this._movements.set(op.account.id, []);
          this._nextAccountId = op.account.id + 1;
          break;
        case "account.deleted":
          this._accounts.delete(op.accountId);
          this._movements.delete(op.accountId);
          break;
        case "balance.updated": {
          const current = this._accounts.get(op.accountId);
          if (current !== undefined) {
            this._accounts.set(op.accountId, Object.freeze({ ...current, balance: op.balance }));
          }
          break;
        }
        case "movement.appended":
          this._movements.get(op.movement.accountId)?.push(Object.freeze({ ...op.movement }));
          this._nextMovementId = op.movement.id + 1;
          break;
      }
    }
  }

  checkpoint(): LedgerCheckpoint {
    const movements: Movement[] = [];
    for (const list of this._movements.values()) {
      movements.push(...list);
    }
    return {
      accounts: this.listAccounts(),
      movements,
      nextAccountId: this._nextAccountId,
      nextMovementId: this._nextMovementId,
    };
  }

  /**
   * Rebuild state from a checkpoint.
   *
   * @throws StoreError INVALID_COMMIT if the checkpoint is inconsistent
   */
  static fromCheckpoint(checkpoint: LedgerCheckpoint): LedgerState {
    const state = new LedgerState();

    if (checkpoint.nextAccountId < 1 || checkpoint.nextMovementId < 1) {
      throw new StoreError("INVALID_COMMIT", "Checkpoint identifier counters must start at 1");
    }

    for (const account of checkpoint.accounts) {
      if (account.id >= checkpoint.nextAccountId || state._accounts.has(account.id)) {
        throw new StoreError("INVALID_COMMIT", `Checkpoint has inconsistent account id ${account.id}`);
      }
      state._accounts.set(account.id, Object.freeze({ ...account }));
      state._movements.set(account.id, []);
    }

    for (const movement of checkpoint.movements) {
      const list = state._movements.get(movement.accountId);
      if (list === undefined || movement.id >= checkpoint.nextMovementId) {
        throw new StoreError("INVALID_COMMIT", `Checkpoint has inconsistent movement id ${movement.id}`);
      }
      list.push(Object.freeze({ ...movement }));
    }

    state._nextAccountId = checkpoint.nextAccountId;
    state._nextMovementId = checkpoint.nextMovementId;
    return state;
  }
}
