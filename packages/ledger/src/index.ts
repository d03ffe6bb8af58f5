/**
 * @tally/ledger — Client ledger engine.
 *
 * Enforces the ledger invariants on top of a LedgerStore:
 * - An account's balance always equals the sum of its movements
 * - Withdrawals and transfers never take a balance below zero
 * - A transfer writes both legs or neither
 * - All monetary arithmetic uses bigint (no floating point)
 *
 * Expected failures come back as LedgerResult values; storage failures
 * are thrown as StoreError after the transaction has rolled back.
 */

// Account registry
export { AccountRegistry, DEFAULT_DECIMALS, snapshot } from "./accounts.js";
export type { AccountRegistryOptions } from "./accounts.js";

// Transaction engine
export { TransactionEngine } from "./engine.js";
export type { TransactionEngineOptions } from "./engine.js";

// Reconciliation
export { reconcileAccount, reconcileLedger } from "./reconcile.js";

// Money arithmetic
export {
  parseAmount,
  tryParseAmount,
  amountScale,
  formatAmount,
  sumAmounts,
  formatSigned,
} from "./money-math.js";

// Types
export type {
  LedgerFailureCode,
  LedgerSuccess,
  LedgerFailure,
  LedgerResult,
  MovementReceipt,
  TransferReceipt,
  ClosedAccount,
  LedgerOperation,
  OperationLogEntry,
  OperationLogFn,
  ReconciliationLine,
  ReconciliationReport,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError, succeed, fail } from "./types.js";
