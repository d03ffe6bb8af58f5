/**
 * @tally/types — Shared domain types for the Tally ledger.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type {
  Amount,
  AccountId,
  Account,
  Movement,
  MovementKind,
} from "./financial.js";

// Runtime type guards
export {
  isAmount,
  isMovementKind,
  isAccount,
  isMovement,
} from "./guards.js";
