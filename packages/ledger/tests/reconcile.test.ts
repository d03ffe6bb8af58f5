/**
 * Tests for balance reconciliation.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Account } from "@tally/types";
import { InMemoryLedgerStore } from "@tally/store";
import { AccountRegistry } from "../src/accounts.js";
import { TransactionEngine } from "../src/engine.js";
import { reconcileAccount, reconcileLedger } from "../src/reconcile.js";
import type { LedgerResult } from "../src/types.js";

const TS = "2024-01-15T10:00:00.000Z";

function unwrap<T>(result: LedgerResult<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.code}: ${result.message}`);
  }
  return result.value;
}

let store: InMemoryLedgerStore;
let engine: TransactionEngine;
let alice: Account;
let bob: Account;

beforeEach(() => {
  store = new InMemoryLedgerStore({ now: () => new Date(TS) });
  const registry = new AccountRegistry(store);
  engine = new TransactionEngine(store, registry);
  alice = unwrap(registry.open("Alice"));
  bob = unwrap(registry.open("Bob"));
});

describe("reconcileAccount", () => {
  it("balances an account with no movements", () => {
    expect(reconcileAccount(store, alice, 2)).toEqual({
      accountId: alice.id,
      balance: "0.00",
      movementTotal: "0.00",
      movementCount: 0,
      balanced: true,
    });
  });

  it("balances after engine operations", () => {
    unwrap(engine.deposit(alice, "100"));
    unwrap(engine.withdraw(alice, "30"));
    unwrap(engine.transfer(alice, bob.id, "20"));

    const current = store.getAccount(alice.id);
    expect(current).toBeDefined();
    expect(reconcileAccount(store, current!, 2)).toEqual({
      accountId: alice.id,
      balance: "50.00",
      movementTotal: "50.00",
      movementCount: 3,
      balanced: true,
    });
  });

  it("flags a balance written without a movement", () => {
    store.transaction((tx) => {
      tx.updateBalance(bob.id, "5.00");
    });

    const current = store.getAccount(bob.id);
    expect(reconcileAccount(store, current!, 2).balanced).toBe(false);
  });
});

describe("reconcileLedger", () => {
  it("reports every account and an overall verdict", () => {
    unwrap(engine.deposit(alice, "10"));
    unwrap(engine.transfer(alice, bob.id, "4"));

    const report = reconcileLedger(store, 2, TS);

    expect(report).toEqual({
      generatedAt: TS,
      balanced: true,
      lines: [
        { accountId: alice.id, balance: "6.00", movementTotal: "6.00", movementCount: 2, balanced: true },
        { accountId: bob.id, balance: "4.00", movementTotal: "4.00", movementCount: 1, balanced: true },
      ],
    });
  });

  it("is unbalanced when any account drifts", () => {
    store.transaction((tx) => {
      tx.updateBalance(alice.id, "1.00");
    });

    const report = reconcileLedger(store, 2, TS);
    expect(report.balanced).toBe(false);
    expect(report.lines.map((l) => l.balanced)).toEqual([false, true]);
  });

  it("balances an empty ledger", () => {
    const empty = new InMemoryLedgerStore();
    expect(reconcileLedger(empty, 2, TS)).toEqual({ lines: [], balanced: true, generatedAt: TS });
  });

  it("stamps the report with the current time by default", () => {
    const report = reconcileLedger(store, 2);
    expect(Number.isNaN(Date.parse(report.generatedAt))).toBe(false);
  });
});
