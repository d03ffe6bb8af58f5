/**
 * Tests for JsonlLedgerStore.
 *
 * Verifies:
 * - Persistence: accounts and movements survive store recreation
 * - One journal line per committed transaction
 * - Identifier counters survive reload and compaction
 * - Write failures surface as STORAGE_FAILURE and change nothing
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readFileSync, rmSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { JsonlLedgerStore } from "../src/jsonl-store.js";
import { StoreError } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

const TS = "2024-01-15T10:00:00.000Z";
const clock = (): Date => new Date(TS);

let testDir: string;
let testFile: string;

function open(filePath = testFile): JsonlLedgerStore {
  return new JsonlLedgerStore({ filePath, now: clock });
}

function deposit(store: JsonlLedgerStore, accountId: number, balance: string, amount: string): void {
  store.transaction((tx) => {
    tx.updateBalance(accountId, balance);
    tx.appendMovement({ accountId, kind: "deposit", amount, counterpartyId: null });
  });
}

beforeEach(() => {
  testDir = join(tmpdir(), `tally-jsonl-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
  mkdirSync(testDir, { recursive: true });
  testFile = join(testDir, "ledger.jsonl");
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

// =============================================================================
// File Creation
// =============================================================================

describe("file creation", () => {
  it("creates the file on first commit", () => {
    const store = open();
    expect(existsSync(testFile)).toBe(false);

    store.createAccount({ name: "Alice", occupation: null, balance: "0.00" });

    expect(existsSync(testFile)).toBe(true);
  });

  it("creates nested directories", () => {
    const nested = join(testDir, "deep", "nested", "ledger.jsonl");
    const store = open(nested);

    store.createAccount({ name: "Alice", occupation: null, balance: "0.00" });

    expect(existsSync(nested)).toBe(true);
  });

  it("reports an empty recovery for a new journal", () => {
    expect(open().recovery).toEqual({ commits: 0, checkpoints: 0, skipped: 0 });
  });
});

// =============================================================================
// Persistence
// =============================================================================

describe("persistence", () => {
  it("accounts and movements survive store recreation", () => {
    const first = open();
    const alice = first.createAccount({ name: "Alice", occupation: "Pilot", balance: "0.00" });
    deposit(first, alice.id, "100.00", "100.00");
    first.close();

    const second = open();

    expect(second.getAccount(alice.id)).toEqual({
      id: 1,
      name: "Alice",
      balance: "100.00",
      occupation: "Pilot",
      createdAt: TS,
    });
    expect(second.listMovements(alice.id)).toEqual([
      { id: 1, accountId: 1, kind: "deposit", amount: "100.00", counterpartyId: null, createdAt: TS },
    ]);
    expect(second.recovery).toEqual({ commits: 2, checkpoints: 0, skipped: 0 });
  });

  it("writes one line per transaction", () => {
    const store = open();
    const alice = store.createAccount({ name: "Alice", occupation: null, balance: "0.00" });
    deposit(store, alice.id, "10.00", "10.00");

    const lines = readFileSync(testFile, "utf-8").trim().split("\n");

    expect(lines).toHaveLength(2);
    const commit = JSON.parse(lines[1] ?? "") as { type: string; seq: number; ops: { op: string }[] };
    expect(commit.type).toBe("commit");
    expect(commit.seq).toBe(2);
    expect(commit.ops.map((o) => o.op)).toEqual(["balance.updated", "movement.appended"]);
  });

  it("replays deletions", () => {
    const first = open();
    const alice = first.createAccount({ name: "Alice", occupation: null, balance: "0.00" });
    deposit(first, alice.id, "5.00", "5.00");
    first.deleteAccount(alice.id);

    const second = open();

    expect(second.countAccounts()).toBe(0);
    expect(second.listMovements(alice.id)).toEqual([]);
  });

  it("does not reuse ids after reload", () => {
    const first = open();
    first.createAccount({ name: "Alice", occupation: null, balance: "0.00" });
    const bob = first.createAccount({ name: "Bob", occupation: null, balance: "0.00" });
    first.deleteAccount(bob.id);

    const second = open();
    const carol = second.createAccount({ name: "Carol", occupation: null, balance: "0.00" });

    expect(carol.id).toBe(3);
  });

  it("does not touch the file for a rolled-back transaction", () => {
    const store = open();
    const alice = store.createAccount({ name: "Alice", occupation: null, balance: "0.00" });
    const before = readFileSync(testFile, "utf-8");

    expect(() =>
      store.transaction((tx) => {
        tx.updateBalance(alice.id, "1.00");
        throw new Error("abort");
      }),
    ).toThrow("abort");

    expect(readFileSync(testFile, "utf-8")).toBe(before);
  });
});

// =============================================================================
// Compaction
// =============================================================================

describe("compaction", () => {
  it("rewrites the journal as a single checkpoint", () => {
    const store = open();
    const alice = store.createAccount({ name: "Alice", occupation: null, balance: "0.00" });
    deposit(store, alice.id, "10.00", "10.00");
    deposit(store, alice.id, "15.00", "5.00");

    store.compact();

    const lines = readFileSync(testFile, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(existsSync(`${testFile}.tmp`)).toBe(false);

    const reopened = open();
    expect(reopened.recovery).toEqual({ commits: 0, checkpoints: 1, skipped: 0 });
    expect(reopened.getAccount(alice.id)?.balance).toBe("15.00");
    expect(reopened.listMovements(alice.id).map((m) => m.amount)).toEqual(["10.00", "5.00"]);
  });

  it("keeps identifier counters across compaction", () => {
    const store = open();
    const alice = store.createAccount({ name: "Alice", occupation: null, balance: "0.00" });
    deposit(store, alice.id, "1.00", "1.00");
    store.deleteAccount(alice.id);
    store.compact();

    const reopened = open();
    const bob = reopened.createAccount({ name: "Bob", occupation: null, balance: "0.00" });
    const movement = reopened.transaction((tx) => {
      tx.updateBalance(bob.id, "2.00");
      return tx.appendMovement({ accountId: bob.id, kind: "deposit", amount: "2.00", counterpartyId: null });
    });

    expect(bob.id).toBe(2);
    expect(movement.id).toBe(2);
  });

  it("appends commits after a checkpoint", () => {
    const store = open();
    const alice = store.createAccount({ name: "Alice", occupation: null, balance: "0.00" });
    store.compact();
    deposit(store, alice.id, "3.00", "3.00");

    const reopened = open();
    expect(reopened.recovery).toEqual({ commits: 1, checkpoints: 1, skipped: 0 });
    expect(reopened.getAccount(alice.id)?.balance).toBe("3.00");
  });
});

// =============================================================================
// Write Failures
// =============================================================================

describe("write failures", () => {
  it("surfaces STORAGE_FAILURE and applies nothing", () => {
    const store = open();
    // A directory where the journal should be makes every write fail
    mkdirSync(testFile);

    try {
      store.createAccount({ name: "Alice", occupation: null, balance: "0.00" });
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(StoreError);
      expect((err as StoreError).code).toBe("STORAGE_FAILURE");
    }

    expect(store.countAccounts()).toBe(0);
  });
});
