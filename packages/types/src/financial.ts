/**
 * Financial Types
 *
 * Core records of the single-currency client ledger.
 *
 * Rules:
 * - All amounts are fixed-point decimal strings (e.g. "70.00"), never floats
 * - Identifiers are assigned by storage and never reused
 * - Movements are append-only by contract
 */

/**
 * A fixed-point decimal amount.
 * String representation to avoid IEEE 754 floating-point issues.
 * Arithmetic happens on bigint minor units.
 */
export type Amount = string;

/** Storage-assigned account identifier. */
export type AccountId = number;

/**
 * A client account.
 * Values handed out by the ledger are snapshots, not live handles.
 */
export interface Account {
  /** Unique identifier, assigned by storage */
  readonly id: AccountId;

  /** Display name (never blank) */
  readonly name: string;

  /** Current balance, never negative */
  readonly balance: Amount;

  /** Optional occupation label */
  readonly occupation: string | null;

  /** ISO 8601 timestamp of the commit that created the account */
  readonly createdAt: string;
}

/**
 * Kind of movement recorded against an account.
 */
export type MovementKind = "withdraw" | "deposit" | "transfer-out" | "transfer-in";

/**
 * A single signed entry in an account's history.
 * Negative amounts are outflows, positive amounts are inflows.
 */
export interface Movement {
  /** Unique identifier, assigned by storage */
  readonly id: number;

  /** Account this movement belongs to */
  readonly accountId: AccountId;

  readonly kind: MovementKind;

  /** Signed amount */
  readonly amount: Amount;

  /** The other side of a transfer leg, null otherwise */
  readonly counterpartyId: AccountId | null;

  /** ISO 8601 timestamp of the commit that appended the movement */
  readonly createdAt: string;
}
