/**
 * @tally/ledger — Account registry.
 *
 * Opens, closes and looks up client accounts on top of a LedgerStore.
 *
 * Rules:
 * - Names are required (blank after trimming is rejected)
 * - New accounts start at a zero balance
 * - Closing an account removes its whole movement history
 * - Callers receive frozen snapshots, never live handles
 * - The configured scale must match the scale of every stored amount
 */

import type { Account, AccountId } from "@tally/types";
import type { LedgerStore } from "@tally/store";
import { amountScale, formatAmount } from "./money-math.js";
import type { ClosedAccount, LedgerResult, OperationLogEntry, OperationLogFn } from "./types.js";
import { LedgerError, fail, succeed } from "./types.js";

export interface AccountRegistryOptions {
  /** Fractional digits of the ledger currency. Default: 2 */
  readonly decimals?: number | undefined;
  readonly onOperation?: OperationLogFn | undefined;
}

export const DEFAULT_DECIMALS = 2;

export class AccountRegistry {
  private readonly _store: LedgerStore;
  private readonly _decimals: number;
  private readonly _onOperation: OperationLogFn | undefined;

  constructor(store: LedgerStore, options: AccountRegistryOptions = {}) {
    const decimals = options.decimals ?? DEFAULT_DECIMALS;
    if (!Number.isInteger(decimals) || decimals < 0) {
      throw new LedgerError("INVALID_SCALE", `Decimals must be a non-negative integer, got: ${String(decimals)}`);
    }
    assertStoredScale(store, decimals);

    this._store = store;
    this._decimals = decimals;
    this._onOperation = options.onOperation;
  }

  /** Fractional digits every amount in this ledger carries. */
  get decimals(): number {
    return this._decimals;
  }

  /**
   * Open a new account with a zero balance.
   */
  open(name: string, occupation?: string | null): LedgerResult<Account> {
    const trimmedName = name.trim();
    if (trimmedName.length === 0) {
      const failure = fail("INVALID_INPUT", "Account name is required");
      this._log({ operation: "open", outcome: failure.code, message: failure.message });
      return failure;
    }

    const trimmedOccupation = occupation?.trim() ?? "";
    const account = this._store.createAccount({
      name: trimmedName,
      occupation: trimmedOccupation.length > 0 ? trimmedOccupation : null,
      balance: formatAmount(0n, this._decimals),
    });

    this._log({
      operation: "open",
      outcome: "ok",
      message: `Created account for ${account.name} with occupation ${account.occupation ?? "none"}`,
      accountId: account.id,
      balance: account.balance,
    });
    return succeed(snapshot(account));
  }

  /**
   * Close an account, deleting it together with all of its movements.
   */
  close(id: AccountId): LedgerResult<ClosedAccount> {
    const closed = this._store.transaction((tx): ClosedAccount | undefined => {
      const account = tx.getAccount(id);
      if (account === undefined) {
        return undefined;
      }
      const movementsRemoved = tx.listMovements(id).length;
      tx.deleteAccount(id);
      return { account: snapshot(account), movementsRemoved };
    });

    if (closed === undefined) {
      const failure = fail("NOT_FOUND", `Account ${id} not found`);
      this._log({ operation: "close", outcome: failure.code, message: failure.message, accountId: id });
      return failure;
    }

    this._log({
      operation: "close",
      outcome: "ok",
      message: `Closed account with client ID ${id}`,
      accountId: id,
      balance: closed.account.balance,
    });
    return succeed(closed);
  }

  /**
   * Look up an account.
   */
  get(id: AccountId): LedgerResult<Account> {
    const account = this.find(id);
    return account !== undefined ? succeed(account) : fail("NOT_FOUND", `Account ${id} not found`);
  }

  /**
   * Look up an account. Returns undefined if not found.
   */
  find(id: AccountId): Account | undefined {
    const account = this._store.getAccount(id);
    return account !== undefined ? snapshot(account) : undefined;
  }

  /**
   * Check if an account exists.
   */
  has(id: AccountId): boolean {
    return this._store.getAccount(id) !== undefined;
  }

  /**
   * All accounts, oldest first.
   */
  list(): readonly Account[] {
    return this._store.listAccounts().map(snapshot);
  }

  count(): number {
    return this._store.countAccounts();
  }

  private _log(entry: OperationLogEntry): void {
    this._onOperation?.(entry);
  }
}

/**
 * Stored amounts are always written with exactly `decimals` fractional
 * digits; any other scale means the ledger was written under a
 * different currency configuration.
 *
 * @throws LedgerError INVALID_SCALE on the first mismatch
 */
function assertStoredScale(store: LedgerStore, decimals: number): void {
  for (const account of store.listAccounts()) {
    const amounts = [account.balance, ...store.listMovements(account.id).map((m) => m.amount)];
    const mismatch = amounts.find((amount) => amountScale(amount) !== decimals);
    if (mismatch !== undefined) {
      throw new LedgerError(
        "INVALID_SCALE",
        `Account ${String(account.id)} holds amount "${mismatch}", which does not match the configured scale of ${String(decimals)} decimal places`,
      );
    }
  }
}

/**
 * Detach a stored account into an immutable value.
 */
export function snapshot(account: Account): Account {
  return Object.freeze({ ...account });
}
