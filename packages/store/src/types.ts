/**
 * @tally/store — Core types.
 *
 * Defines the interfaces for durable account and movement persistence.
 *
 * Design principles:
 * - Accounts are a keyed table, movements an append-only relation
 * - Identifiers are assigned by the store and only ever increase
 * - Every mutation happens inside a scoped transaction
 * - A transaction commits all of its operations or none of them
 */

import type { Account, AccountId, Amount, Movement, MovementKind } from "@tally/types";

// =============================================================================
// Inputs
// =============================================================================

/**
 * Fields supplied when inserting an account.
 * The identifier and creation timestamp are assigned by the store.
 */
export interface NewAccount {
  readonly name: string;
  readonly occupation: string | null;
  readonly balance: Amount;
}

/**
 * Fields supplied when appending a movement.
 */
export interface NewMovement {
  readonly accountId: AccountId;
  readonly kind: MovementKind;
  readonly amount: Amount;
  readonly counterpartyId: AccountId | null;
}

// =============================================================================
// Commit
// =============================================================================

/**
 * A single state change inside a commit.
 *
 * `account.deleted` also removes every movement of that account.
 */
export type StoreOp =
  | { readonly op: "account.created"; readonly account: Account }
  | { readonly op: "account.deleted"; readonly accountId: AccountId }
  | { readonly op: "balance.updated"; readonly accountId: AccountId; readonly balance: Amount }
  | { readonly op: "movement.appended"; readonly movement: Movement };

/**
 * The operations of one transaction, applied as a unit.
 */
export interface Commit {
  /** Commit sequence number (1-based, monotonically increasing) */
  readonly seq: number;

  /** When the transaction began (ISO 8601) */
  readonly committedAt: string;

  readonly ops: readonly StoreOp[];
}

// =============================================================================
// Transaction
// =============================================================================

/**
 * Handle passed to a scoped transaction.
 *
 * Writes are staged on the handle and become visible to its own reads
 * immediately; the rest of the store sees them only after commit.
 * The handle is unusable once its scope ends.
 */
export interface StoreTransaction {
  getAccount(id: AccountId): Account | undefined;

  listMovements(accountId: AccountId): readonly Movement[];

  createAccount(input: NewAccount): Account;

  /**
   * Stage removal of an account and all of its movements.
   *
   * @returns false if the account does not exist
   */
  deleteAccount(id: AccountId): boolean;

  /**
   * @throws StoreError UNKNOWN_ACCOUNT if the account does not exist
   */
  updateBalance(id: AccountId, balance: Amount): Account;

  /**
   * @throws StoreError UNKNOWN_ACCOUNT if the account does not exist
   */
  appendMovement(input: NewMovement): Movement;
}

// =============================================================================
// Ledger Store Interface
// =============================================================================

/**
 * Durable table of accounts plus append-only table of movements.
 *
 * Invariants:
 * - Account and movement identifiers are never reused
 * - Movements always reference an existing account
 * - Accounts and per-account movements are returned in insertion order
 * - A failed commit leaves the store exactly as it was
 *
 * Errors (StoreError codes):
 * - STORAGE_FAILURE: the commit could not be made durable
 * - NESTED_TRANSACTION: transaction() called inside an open transaction
 * - TRANSACTION_CLOSED: a transaction handle used after its callback returned
 * - UNKNOWN_ACCOUNT: a staged write names an account that does not exist
 * - INVALID_COMMIT: a commit or checkpoint that does not fit the current
 *   state, such as a reused id; replay skips such journal lines
 * - STORE_CLOSED: any call after close()
 */
export interface LedgerStore {
  /**
   * Run `fn` as one atomic unit.
   *
   * Staged operations are committed when `fn` returns. If `fn` throws,
   * or the commit cannot be persisted, nothing is applied and the
   * error propagates.
   *
   * @throws StoreError NESTED_TRANSACTION if a transaction is already open
   */
  transaction<T>(fn: (tx: StoreTransaction) => T): T;

  /** Insert an account in its own transaction. */
  createAccount(input: NewAccount): Account;

  /**
   * Remove an account and its movements in one transaction.
   *
   * @returns false (and writes nothing) if the account does not exist
   */
  deleteAccount(id: AccountId): boolean;

  getAccount(id: AccountId): Account | undefined;

  listAccounts(): readonly Account[];

  countAccounts(): number;

  listMovements(accountId: AccountId): readonly Movement[];

  /** Release the store. Further calls throw STORE_CLOSED. */
  close(): void;

  readonly closed: boolean;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for LedgerStore operations.
 */
export type StoreErrorCode =
  | "STORAGE_FAILURE"
  | "NESTED_TRANSACTION"
  | "TRANSACTION_CLOSED"
  | "UNKNOWN_ACCOUNT"
  | "INVALID_COMMIT"
  | "STORE_CLOSED";

/**
 * Error thrown by LedgerStore operations.
 */
export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "StoreError";
  }
}
