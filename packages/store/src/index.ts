/**
 * @tally/store — Durable account and movement persistence.
 *
 * Provides:
 * - LedgerStore interface with scoped, all-or-nothing transactions
 * - InMemoryLedgerStore for tests and development
 * - JsonlLedgerStore for durable journal-backed persistence
 *
 * @packageDocumentation
 */

// Core types
export type {
  NewAccount,
  NewMovement,
  StoreOp,
  Commit,
  StoreTransaction,
  LedgerStore,
  StoreErrorCode,
} from "./types.js";
export { StoreError } from "./types.js";

// State
export type { LedgerCheckpoint } from "./state.js";

// Implementations
export { InMemoryLedgerStore } from "./in-memory-store.js";
export type { InMemoryLedgerStoreOptions } from "./in-memory-store.js";
export { JsonlLedgerStore } from "./jsonl-store.js";
export type { JsonlLedgerStoreOptions, RecoveryReport } from "./jsonl-store.js";
