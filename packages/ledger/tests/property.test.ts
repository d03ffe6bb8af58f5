/**
 * Property-Based Tests for @tally/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY sequence
 * of operations:
 *
 * 1. Every balance equals the sum of its movements (ledger reconciles)
 * 2. No balance ever goes below zero
 * 3. No value from nothing (transfers conserve money)
 * 4. Bigint arithmetic roundtrip (format → parse = identity)
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { InMemoryLedgerStore } from "@tally/store";
import { AccountRegistry } from "../src/accounts.js";
import { TransactionEngine } from "../src/engine.js";
import { formatAmount, parseAmount, sumAmounts } from "../src/money-math.js";
import { reconcileLedger } from "../src/reconcile.js";

// =============================================================================
// Arbitraries
// =============================================================================

/** Positive amount in minor units, rendered at two decimals. */
const arbAmount = fc.integer({ min: 1, max: 500_000 }).map((cents) => formatAmount(BigInt(cents), 2));

/** Index into the three fixture accounts. */
const arbSlot = fc.integer({ min: 0, max: 2 });

type Op =
  | { readonly kind: "deposit"; readonly slot: number; readonly amount: string }
  | { readonly kind: "withdraw"; readonly slot: number; readonly amount: string }
  | { readonly kind: "transfer"; readonly slot: number; readonly to: number; readonly amount: string };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant("deposit" as const), slot: arbSlot, amount: arbAmount }),
  fc.record({ kind: fc.constant("withdraw" as const), slot: arbSlot, amount: arbAmount }),
  fc.record({ kind: fc.constant("transfer" as const), slot: arbSlot, to: arbSlot, amount: arbAmount }),
);

// =============================================================================
// Harness
// =============================================================================

interface Outcome {
  readonly store: InMemoryLedgerStore;
  readonly ids: readonly number[];
  /** Deposits minus successful withdrawals, in minor units */
  readonly netInflow: bigint;
}

function run(ops: readonly Op[]): Outcome {
  const store = new InMemoryLedgerStore({ now: () => new Date("2025-01-01T00:00:00Z") });
  const registry = new AccountRegistry(store);
  const engine = new TransactionEngine(store, registry);

  const ids: number[] = [];
  for (const name of ["Alice", "Bob", "Carol"]) {
    const opened = registry.open(name);
    if (!opened.ok) throw new Error(opened.message);
    ids.push(opened.value.id);
  }

  let netInflow = 0n;
  for (const op of ops) {
    const account = registry.find(ids[op.slot] ?? 0);
    if (account === undefined) throw new Error("fixture account missing");

    switch (op.kind) {
      case "deposit": {
        if (engine.deposit(account, op.amount).ok) netInflow += parseAmount(op.amount, 2);
        break;
      }
      case "withdraw": {
        if (engine.withdraw(account, op.amount).ok) netInflow -= parseAmount(op.amount, 2);
        break;
      }
      case "transfer": {
        engine.transfer(account, ids[op.to] ?? 0, op.amount);
        break;
      }
    }
  }

  return { store, ids, netInflow };
}

// =============================================================================
// Properties
// =============================================================================

describe("property: ledger invariants", () => {
  it("every balance equals the sum of its movements", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const { store } = run(ops);
        expect(reconcileLedger(store, 2, "2025-01-01T00:00:00Z").balanced).toBe(true);
      }),
      { numRuns: 200 },
    );
  });

  it("no balance ever goes below zero", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const { store } = run(ops);
        for (const account of store.listAccounts()) {
          expect(parseAmount(account.balance, 2) >= 0n).toBe(true);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("transfers neither create nor destroy money", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const { store, netInflow } = run(ops);
        const total = sumAmounts(
          store.listAccounts().map((a) => a.balance),
          2,
        );
        expect(total).toBe(netInflow);
      }),
      { numRuns: 200 },
    );
  });

  it("every transfer-out has a matching transfer-in", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const { store, ids } = run(ops);
        const movements = ids.flatMap((id) => store.listMovements(id));
        const outs = movements.filter((m) => m.kind === "transfer-out");
        const ins = movements.filter((m) => m.kind === "transfer-in");

        expect(outs.length).toBe(ins.length);
        for (const out of outs) {
          const match = ins.find((m) => m.id === out.id + 1);
          expect(match?.accountId).toBe(out.counterpartyId);
          expect(match?.amount).toBe(out.amount.slice(1));
        }
      }),
      { numRuns: 100 },
    );
  });
});

describe("property: amount roundtrip", () => {
  it("format → parse is the identity for any scaled value", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: -(10n ** 20n), max: 10n ** 20n }),
        fc.integer({ min: 0, max: 8 }),
        (scaled, decimals) => {
          expect(parseAmount(formatAmount(scaled, decimals), decimals)).toBe(scaled);
        },
      ),
      { numRuns: 500 },
    );
  });
});
