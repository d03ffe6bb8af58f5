/**
 * @tally/cli — Bank wiring.
 *
 * Builds the registry and engine over a store and routes their
 * operation log into pino. Kept separate from main.ts so tests can
 * run the whole front end against an in-memory store.
 */

import type { Logger } from "pino";
import type { LedgerStore } from "@tally/store";
import { AccountRegistry, TransactionEngine } from "@tally/ledger";
import type { OperationLogEntry } from "@tally/ledger";

export interface Bank {
  readonly store: LedgerStore;
  readonly registry: AccountRegistry;
  readonly engine: TransactionEngine;
  readonly decimals: number;
}

export interface CreateBankOptions {
  readonly store: LedgerStore;
  readonly logger: Logger;
  readonly decimals?: number | undefined;
  readonly maxAmount?: string | undefined;
}

export function createBank(options: CreateBankOptions): Bank {
  const { store, logger } = options;

  const onOperation = (entry: OperationLogEntry): void => {
    if (entry.outcome === "ok") {
      logger.info(entry, entry.message);
    } else {
      logger.warn(entry, entry.message);
    }
  };

  const registry = new AccountRegistry(store, { decimals: options.decimals, onOperation });
  const engine = new TransactionEngine(store, registry, {
    maxAmount: options.maxAmount,
    onOperation,
  });

  return { store, registry, engine, decimals: registry.decimals };
}
