/**
 * Runtime Type Guards
 *
 * Narrowing functions for Tally domain types.
 * These enable safe runtime validation at system boundaries
 * (deserialized journal lines, external input).
 */

import type { Account, Movement, MovementKind } from "./financial.js";

const MOVEMENT_KINDS = new Set<string>(["withdraw", "deposit", "transfer-out", "transfer-in"]);

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

function isIdentifier(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

export function isAmount(value: unknown): value is string {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

export function isMovementKind(value: unknown): value is MovementKind {
  return typeof value === "string" && MOVEMENT_KINDS.has(value);
}

export function isAccount(value: unknown): value is Account {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isIdentifier(v.id) &&
    typeof v.name === "string" &&
    v.name.trim().length > 0 &&
    isAmount(v.balance) &&
    !v.balance.startsWith("-") &&
    (v.occupation === null || typeof v.occupation === "string") &&
    typeof v.createdAt === "string"
  );
}

export function isMovement(value: unknown): value is Movement {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isIdentifier(v.id) &&
    isIdentifier(v.accountId) &&
    isMovementKind(v.kind) &&
    isAmount(v.amount) &&
    (v.counterpartyId === null || isIdentifier(v.counterpartyId)) &&
    typeof v.createdAt === "string"
  );
}
