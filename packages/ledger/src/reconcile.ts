/**
 * @tally/ledger — Reconciliation.
 *
 * Compares every stored balance with the sum of its movements.
 * All calculations are deterministic using bigint arithmetic.
 *
 * Rules:
 * - An account reconciles when balance == sum(movement amounts)
 * - The ledger reconciles when every account does
 */

import type { Account } from "@tally/types";
import type { LedgerStore } from "@tally/store";
import { formatAmount, parseAmount, sumAmounts } from "./money-math.js";
import type { ReconciliationLine, ReconciliationReport } from "./types.js";

/**
 * Reconcile a single account against its movement history.
 */
export function reconcileAccount(
  store: LedgerStore,
  account: Account,
  decimals: number,
): ReconciliationLine {
  const movements = store.listMovements(account.id);
  const total = sumAmounts(
    movements.map((m) => m.amount),
    decimals,
  );
  const balance = parseAmount(account.balance, decimals);

  return {
    accountId: account.id,
    balance: formatAmount(balance, decimals),
    movementTotal: formatAmount(total, decimals),
    movementCount: movements.length,
    balanced: balance === total,
  };
}

/**
 * Reconcile every account in the store.
 */
export function reconcileLedger(
  store: LedgerStore,
  decimals: number,
  timestamp?: string,
): ReconciliationReport {
  const lines = store.listAccounts().map((account) => reconcileAccount(store, account, decimals));

  return {
    lines,
    generatedAt: timestamp ?? new Date().toISOString(),
    balanced: lines.every((line) => line.balanced),
  };
}
