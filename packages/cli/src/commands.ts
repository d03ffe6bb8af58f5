/**
 * @tally/cli — Command model.
 *
 * Menu choices and prompt answers are turned into tagged commands
 * before anything touches the ledger. Parsing never throws.
 */

import type { AccountId } from "@tally/types";

// =============================================================================
// Commands
// =============================================================================

export type BankCommand =
  | { readonly kind: "create-account"; readonly name: string; readonly occupation: string | null }
  | { readonly kind: "close-account"; readonly accountId: AccountId }
  | { readonly kind: "show-all-clients" }
  | { readonly kind: "count-clients" }
  | { readonly kind: "client-actions"; readonly accountId: AccountId }
  | { readonly kind: "reconcile" }
  | { readonly kind: "exit" };

export type ClientCommand =
  | { readonly kind: "withdraw"; readonly amount: string }
  | { readonly kind: "deposit"; readonly amount: string }
  | { readonly kind: "transfer"; readonly destinationId: AccountId; readonly amount: string }
  | { readonly kind: "check-balance" }
  | { readonly kind: "show-movements" }
  | { readonly kind: "back" };

// =============================================================================
// Menus
// =============================================================================

export interface MenuEntry<A extends string> {
  readonly choice: number;
  readonly label: string;
  readonly action: A;
}

export const MAIN_MENU = [
  { choice: 1, label: "Create Account", action: "create-account" },
  { choice: 2, label: "Close Account", action: "close-account" },
  { choice: 3, label: "Show All Clients", action: "show-all-clients" },
  { choice: 4, label: "Count Clients", action: "count-clients" },
  { choice: 5, label: "Client Actions", action: "client-actions" },
  { choice: 6, label: "Reconcile Ledger", action: "reconcile" },
  { choice: 7, label: "Exit", action: "exit" },
] as const satisfies readonly MenuEntry<BankCommand["kind"]>[];

export const CLIENT_MENU = [
  { choice: 1, label: "Withdraw", action: "withdraw" },
  { choice: 2, label: "Deposit", action: "deposit" },
  { choice: 3, label: "Transfer", action: "transfer" },
  { choice: 4, label: "Check Balance", action: "check-balance" },
  { choice: 5, label: "Show Movements", action: "show-movements" },
  { choice: 6, label: "Back", action: "back" },
] as const satisfies readonly MenuEntry<ClientCommand["kind"]>[];

export type BankAction = (typeof MAIN_MENU)[number]["action"];
export type ClientAction = (typeof CLIENT_MENU)[number]["action"];

// =============================================================================
// Parsing
// =============================================================================

export type Parsed<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly message: string };

const ID_PATTERN = /^\d+$/;
const AMOUNT_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Resolve a menu answer to the action of the matching entry.
 */
export function parseMenuChoice<A extends string>(
  input: string,
  menu: readonly MenuEntry<A>[],
): Parsed<A> {
  const trimmed = input.trim();
  const entry = ID_PATTERN.test(trimmed)
    ? menu.find((e) => e.choice === Number(trimmed))
    : undefined;

  if (entry === undefined) {
    return {
      ok: false,
      message: `Invalid option "${trimmed}": choose a number from 1 to ${String(menu.length)}`,
    };
  }
  return { ok: true, value: entry.action };
}

/**
 * Client IDs are positive integers.
 */
export function parseAccountId(input: string): Parsed<AccountId> {
  const trimmed = input.trim();
  const id = ID_PATTERN.test(trimmed) ? Number(trimmed) : NaN;

  if (!Number.isSafeInteger(id) || id < 1) {
    return { ok: false, message: `Client ID must be a positive integer, got "${trimmed}"` };
  }
  return { ok: true, value: id };
}

/**
 * Amounts are plain decimals ("25", "25.50"). Scale, sign and limits
 * are checked by the engine.
 */
export function parseAmountInput(input: string): Parsed<string> {
  const trimmed = input.trim();
  if (!AMOUNT_PATTERN.test(trimmed)) {
    return { ok: false, message: `Amount must be a plain decimal number, got "${trimmed}"` };
  }
  return { ok: true, value: trimmed };
}
