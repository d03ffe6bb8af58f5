/**
 * @tally/store — Journal line codec.
 *
 * Each line of the journal is one JSON object:
 * - {"type":"commit","seq":n,"committedAt":"...","ops":[...]}
 * - {"type":"checkpoint","seq":n,"accounts":[...],"movements":[...],
 *    "nextAccountId":n,"nextMovementId":n}
 *
 * Lines that do not decode are reported as undefined so the loader
 * can skip them.
 */

import { isAccount, isAmount, isMovement } from "@tally/types";
import type { Account, Movement } from "@tally/types";
import type { LedgerCheckpoint } from "./state.js";
import type { Commit, StoreOp } from "./types.js";

export interface CommitRecord extends Commit {
  readonly type: "commit";
}

export interface CheckpointRecord extends LedgerCheckpoint {
  readonly type: "checkpoint";
  readonly seq: number;
}

export type JournalRecord = CommitRecord | CheckpointRecord;

export function encodeRecord(record: JournalRecord): string {
  return JSON.stringify(record) + "\n";
}

function isCounter(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

function decodeOp(value: unknown): StoreOp | undefined {
  if (value === null || typeof value !== "object") return undefined;
  const v = value as Record<string, unknown>;

  switch (v.op) {
    case "account.created":
      return isAccount(v.account) ? { op: "account.created", account: v.account } : undefined;
    case "account.deleted":
      return isCounter(v.accountId) ? { op: "account.deleted", accountId: v.accountId } : undefined;
    case "balance.updated":
      return isCounter(v.accountId) && isAmount(v.balance) && !v.balance.startsWith("-")
        ? { op: "balance.updated", accountId: v.accountId, balance: v.balance }
        : undefined;
    case "movement.appended":
      return isMovement(v.movement) ? { op: "movement.appended", movement: v.movement } : undefined;
    default:
      return undefined;
  }
}

/**
 * Decode a single journal line.
 *
 * @returns the record, or undefined if the line is torn or malformed
 */
export function decodeRecord(line: string): JournalRecord | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }

  if (parsed === null || typeof parsed !== "object") return undefined;
  const v = parsed as Record<string, unknown>;
  if (!isCounter(v.seq)) return undefined;

  if (v.type === "commit") {
    if (typeof v.committedAt !== "string" || !Array.isArray(v.ops)) return undefined;
    const rawOps: readonly unknown[] = v.ops;
    const ops: StoreOp[] = [];
    for (const raw of rawOps) {
      const op = decodeOp(raw);
      if (op === undefined) return undefined;
      ops.push(op);
    }
    return { type: "commit", seq: v.seq, committedAt: v.committedAt, ops };
  }

  if (v.type === "checkpoint") {
    if (
      !Array.isArray(v.accounts) ||
      !Array.isArray(v.movements) ||
      !isCounter(v.nextAccountId) ||
      !isCounter(v.nextMovementId)
    ) {
      return undefined;
    }
    const rawAccounts: readonly unknown[] = v.accounts;
    const rawMovements: readonly unknown[] = v.movements;
    const accounts: Account[] = rawAccounts.filter(isAccount);
    const movements: Movement[] = rawMovements.filter(isMovement);
    if (accounts.length !== rawAccounts.length || movements.length !== rawMovements.length) {
      return undefined;
    }
    return {
      type: "checkpoint",
      seq: v.seq,
      accounts,
      movements,
      nextAccountId: v.nextAccountId,
      nextMovementId: v.nextMovementId,
    };
  }

  return undefined;
}
