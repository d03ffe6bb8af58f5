/**
 * @tally/ledger — Transaction engine.
 *
 * Moves money into, out of and between accounts. Every operation is
 * one scoped store transaction: the balance write(s) and the movement
 * append(s) are committed together or not at all.
 *
 * API surface:
 * - deposit() — Credit an account
 * - withdraw() — Debit an account, never below zero
 * - transfer() — Debit one account and credit another atomically
 * - checkBalance() — Read the stored balance
 * - showMovements() — Read the movement history in creation order
 *
 * Account arguments are snapshots; each operation re-reads the current
 * row inside its transaction, so a stale snapshot cannot make the
 * balance drift from the movement log.
 */

import type { Account, AccountId, Movement } from "@tally/types";
import type { LedgerStore } from "@tally/store";
import type { AccountRegistry } from "./accounts.js";
import { snapshot } from "./accounts.js";
import { formatAmount, parseAmount, tryParseAmount } from "./money-math.js";
import type {
  LedgerOperation,
  LedgerResult,
  MovementReceipt,
  OperationLogEntry,
  OperationLogFn,
  TransferReceipt,
} from "./types.js";
import { LedgerError, fail, succeed } from "./types.js";

export interface TransactionEngineOptions {
  /** Upper bound for a single amount, as a decimal string. Default: none */
  readonly maxAmount?: string | undefined;
  readonly onOperation?: OperationLogFn | undefined;
}

export class TransactionEngine {
  private readonly _store: LedgerStore;
  private readonly _registry: AccountRegistry;
  private readonly _decimals: number;
  private readonly _maxAmount: bigint | undefined;
  private readonly _onOperation: OperationLogFn | undefined;

  constructor(store: LedgerStore, registry: AccountRegistry, options: TransactionEngineOptions = {}) {
    this._store = store;
    this._registry = registry;
    this._decimals = registry.decimals;
    this._onOperation = options.onOperation;

    if (options.maxAmount !== undefined) {
      const max = tryParseAmount(options.maxAmount, this._decimals);
      if (max === undefined || max <= 0n) {
        throw new LedgerError("INVALID_AMOUNT", `Invalid maximum amount: "${options.maxAmount}"`);
      }
      this._maxAmount = max;
    }
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  deposit(account: Account, amount: string): LedgerResult<MovementReceipt> {
    const parsed = this._validateAmount(amount);
    if (!parsed.ok) {
      return this._report("deposit", parsed, { accountId: account.id, amount });
    }

    const result = this._store.transaction((tx): LedgerResult<MovementReceipt> => {
      const current = tx.getAccount(account.id);
      if (current === undefined) {
        return fail("NOT_FOUND", `Account ${account.id} not found`);
      }

      const balance = parseAmount(current.balance, this._decimals) + parsed.value;
      const updated = tx.updateBalance(current.id, this._format(balance));
      const movement = tx.appendMovement({
        accountId: current.id,
        kind: "deposit",
        amount: this._format(parsed.value),
        counterpartyId: null,
      });
      return succeed({ account: snapshot(updated), movement });
    });

    return this._report("deposit", result, {
      accountId: account.id,
      amount: this._format(parsed.value),
      balance: result.ok ? result.value.account.balance : undefined,
      message: `Deposited ${this._format(parsed.value)} to client ID ${account.id}`,
    });
  }

  withdraw(account: Account, amount: string): LedgerResult<MovementReceipt> {
    const parsed = this._validateAmount(amount);
    if (!parsed.ok) {
      return this._report("withdraw", parsed, { accountId: account.id, amount });
    }

    const result = this._store.transaction((tx): LedgerResult<MovementReceipt> => {
      const current = tx.getAccount(account.id);
      if (current === undefined) {
        return fail("NOT_FOUND", `Account ${account.id} not found`);
      }

      const available = parseAmount(current.balance, this._decimals);
      if (parsed.value > available) {
        return fail(
          "INSUFFICIENT_FUNDS",
          `Insufficient funds: balance ${current.balance}, requested ${this._format(parsed.value)}`,
        );
      }

      const updated = tx.updateBalance(current.id, this._format(available - parsed.value));
      const movement = tx.appendMovement({
        accountId: current.id,
        kind: "withdraw",
        amount: this._format(-parsed.value),
        counterpartyId: null,
      });
      return succeed({ account: snapshot(updated), movement });
    });

    return this._report("withdraw", result, {
      accountId: account.id,
      amount: this._format(parsed.value),
      balance: result.ok ? result.value.account.balance : undefined,
      message: `Withdrawn ${this._format(parsed.value)} from client ID ${account.id}`,
    });
  }

  /**
   * Move `amount` from `source` to the account `destinationId`.
   *
   * Produces exactly one transfer-out and one transfer-in movement,
   * or none at all.
   */
  transfer(source: Account, destinationId: AccountId, amount: string): LedgerResult<TransferReceipt> {
    const details = { accountId: source.id, counterpartyId: destinationId, amount };

    if (!this._registry.has(destinationId)) {
      return this._report(
        "transfer",
        fail("DESTINATION_NOT_FOUND", `Client to transfer to (ID: ${destinationId}) not found`),
        details,
      );
    }
    if (destinationId === source.id) {
      return this._report(
        "transfer",
        fail("INVALID_INPUT", "Source and destination must be different accounts"),
        details,
      );
    }

    const parsed = this._validateAmount(amount);
    if (!parsed.ok) {
      return this._report("transfer", parsed, details);
    }

    const result = this._store.transaction((tx): LedgerResult<TransferReceipt> => {
      const from = tx.getAccount(source.id);
      if (from === undefined) {
        return fail("NOT_FOUND", `Account ${source.id} not found`);
      }
      const to = tx.getAccount(destinationId);
      if (to === undefined) {
        return fail("DESTINATION_NOT_FOUND", `Client to transfer to (ID: ${destinationId}) not found`);
      }

      const available = parseAmount(from.balance, this._decimals);
      if (parsed.value > available) {
        return fail(
          "INSUFFICIENT_FUNDS",
          `Insufficient funds: balance ${from.balance}, requested ${this._format(parsed.value)}`,
        );
      }

      const received = parseAmount(to.balance, this._decimals) + parsed.value;
      const updatedFrom = tx.updateBalance(from.id, this._format(available - parsed.value));
      const updatedTo = tx.updateBalance(to.id, this._format(received));
      const outgoing = tx.appendMovement({
        accountId: from.id,
        kind: "transfer-out",
        amount: this._format(-parsed.value),
        counterpartyId: to.id,
      });
      const incoming = tx.appendMovement({
        accountId: to.id,
        kind: "transfer-in",
        amount: this._format(parsed.value),
        counterpartyId: from.id,
      });

      return succeed({
        source: snapshot(updatedFrom),
        destination: snapshot(updatedTo),
        outgoing,
        incoming,
      });
    });

    return this._report("transfer", result, {
      ...details,
      amount: this._format(parsed.value),
      balance: result.ok ? result.value.source.balance : undefined,
      message: `Transferred ${this._format(parsed.value)} from client ID ${source.id} to client ID ${destinationId}`,
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  checkBalance(account: Account): LedgerResult<string> {
    const current = this._registry.get(account.id);
    return current.ok ? succeed(current.value.balance) : current;
  }

  showMovements(account: Account): LedgerResult<readonly Movement[]> {
    if (!this._registry.has(account.id)) {
      return fail("NOT_FOUND", `Account ${account.id} not found`);
    }
    return succeed(this._store.listMovements(account.id));
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _validateAmount(amount: string): LedgerResult<bigint> {
    const value = tryParseAmount(amount, this._decimals);
    if (value === undefined) {
      return fail(
        "INVALID_AMOUNT",
        `Amount must be a decimal number with at most ${String(this._decimals)} decimal places, got "${amount}"`,
      );
    }
    if (value <= 0n) {
      return fail("INVALID_AMOUNT", `Amount must be greater than zero, got "${amount}"`);
    }
    if (this._maxAmount !== undefined && value > this._maxAmount) {
      return fail("INVALID_AMOUNT", `Amount exceeds the maximum of ${this._format(this._maxAmount)}`);
    }
    return succeed(value);
  }

  private _format(scaled: bigint): string {
    return formatAmount(scaled, this._decimals);
  }

  /**
   * Emit the operation log entry for `result` and pass it through.
   * Failures are logged with their own message.
   */
  private _report<R extends LedgerResult<unknown>>(
    operation: LedgerOperation,
    result: R,
    details: Omit<OperationLogEntry, "operation" | "outcome" | "message"> & { readonly message?: string },
  ): R {
    if (this._onOperation !== undefined) {
      const outcome: LedgerResult<unknown> = result;
      const { message, ...rest } = details;
      this._onOperation({
        ...rest,
        operation,
        outcome: outcome.ok ? "ok" : outcome.code,
        message: outcome.ok ? message ?? operation : outcome.message,
      });
    }
    return result;
  }
}
