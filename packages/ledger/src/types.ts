/**
 * @tally/ledger — Types for the ledger engine.
 *
 * Rules:
 * - All types are readonly
 * - Expected domain failures are returned as LedgerResult values
 * - Broken invariants (corrupt stored data) throw LedgerError
 */

import type { Account, AccountId, Movement } from "@tally/types";

// ─── Results ─────────────────────────────────────────────────────────────

/** Domain failures reported back to the caller. */
export type LedgerFailureCode =
  | "NOT_FOUND"
  | "DESTINATION_NOT_FOUND"
  | "INSUFFICIENT_FUNDS"
  | "INVALID_AMOUNT"
  | "INVALID_INPUT";

export interface LedgerSuccess<T> {
  readonly ok: true;
  readonly value: T;
}

export interface LedgerFailure {
  readonly ok: false;
  readonly code: LedgerFailureCode;
  readonly message: string;
}

/**
 * Outcome of a registry or engine operation.
 * A failure guarantees that nothing was written.
 */
export type LedgerResult<T> = LedgerSuccess<T> | LedgerFailure;

export function succeed<T>(value: T): LedgerSuccess<T> {
  return { ok: true, value };
}

export function fail(code: LedgerFailureCode, message: string): LedgerFailure {
  return { ok: false, code, message };
}

// ─── Receipts ────────────────────────────────────────────────────────────

/**
 * Result of a deposit or withdrawal.
 */
export interface MovementReceipt {
  /** The account after the operation */
  readonly account: Account;
  readonly movement: Movement;
}

/**
 * Result of a transfer. Both legs were committed together.
 */
export interface TransferReceipt {
  readonly source: Account;
  readonly destination: Account;
  readonly outgoing: Movement;
  readonly incoming: Movement;
}

/**
 * Result of closing an account.
 */
export interface ClosedAccount {
  /** The account as it was just before closure */
  readonly account: Account;
  readonly movementsRemoved: number;
}

// ─── Operation Log ───────────────────────────────────────────────────────

export type LedgerOperation = "open" | "close" | "deposit" | "withdraw" | "transfer";

/**
 * Emitted once per registry or engine operation, successful or not.
 */
export interface OperationLogEntry {
  readonly operation: LedgerOperation;
  readonly outcome: "ok" | LedgerFailureCode;
  readonly message: string;
  readonly accountId?: AccountId | undefined;
  readonly counterpartyId?: AccountId | undefined;
  readonly amount?: string | undefined;
  readonly balance?: string | undefined;
}

export type OperationLogFn = (entry: OperationLogEntry) => void;

// ─── Reconciliation ──────────────────────────────────────────────────────

/**
 * Stored balance compared with the sum of the account's movements.
 */
export interface ReconciliationLine {
  readonly accountId: AccountId;
  readonly balance: string;
  readonly movementTotal: string;
  readonly movementCount: number;
  readonly balanced: boolean;
}

export interface ReconciliationReport {
  readonly lines: readonly ReconciliationLine[];
  readonly generatedAt: string;
  /** Whether every account reconciles */
  readonly balanced: boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for broken ledger invariants. */
export type LedgerErrorCode = "INVALID_AMOUNT" | "INVALID_SCALE";

/**
 * Structured error from the ledger engine.
 * Thrown only when stored data or configuration is unusable.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
