/**
 * @tally/cli — Command dispatcher.
 *
 * Runs a tagged command against the bank and describes the outcome as
 * notices plus where the session goes next. Domain failures become
 * notices; StoreError is left to propagate.
 */

import type { Account } from "@tally/types";
import { reconcileLedger } from "@tally/ledger";
import type { LedgerFailure } from "@tally/ledger";
import type { Bank } from "./app.js";
import type { BankCommand, ClientCommand } from "./commands.js";
import { describeAccount, describeMovement } from "./format.js";

// =============================================================================
// Types
// =============================================================================

export type NoticeLevel = "ok" | "info" | "warn" | "error";

export interface Notice {
  readonly level: NoticeLevel;
  readonly text: string;
}

export type BankOutcome =
  | { readonly next: "menu"; readonly notices: readonly Notice[] }
  | { readonly next: "client"; readonly client: Account; readonly notices: readonly Notice[] }
  | { readonly next: "exit"; readonly notices: readonly Notice[] };

export interface ClientOutcome {
  readonly next: "client" | "menu";
  readonly notices: readonly Notice[];
}

// =============================================================================
// Helpers
// =============================================================================

const ok = (text: string): Notice => ({ level: "ok", text });
const info = (text: string): Notice => ({ level: "info", text });
const warn = (text: string): Notice => ({ level: "warn", text });
const error = (text: string): Notice => ({ level: "error", text });

/**
 * Lookups and balance shortfalls are warnings; bad input is an error.
 */
export function failureNotice(failure: LedgerFailure): Notice {
  switch (failure.code) {
    case "NOT_FOUND":
    case "DESTINATION_NOT_FOUND":
    case "INSUFFICIENT_FUNDS":
      return warn(failure.message);
    case "INVALID_AMOUNT":
    case "INVALID_INPUT":
      return error(failure.message);
  }
}

// =============================================================================
// Main menu
// =============================================================================

export function dispatchBank(bank: Bank, command: BankCommand): BankOutcome {
  switch (command.kind) {
    case "create-account": {
      const result = bank.registry.open(command.name, command.occupation);
      if (!result.ok) {
        return { next: "menu", notices: [failureNotice(result)] };
      }
      const account = result.value;
      return {
        next: "menu",
        notices: [
          ok(
            `Created account for ${account.name} with occupation ${account.occupation ?? "none"} (client ID ${String(account.id)})`,
          ),
        ],
      };
    }

    case "close-account": {
      const result = bank.registry.close(command.accountId);
      if (!result.ok) {
        return { next: "menu", notices: [failureNotice(result)] };
      }
      const { account, movementsRemoved } = result.value;
      return {
        next: "menu",
        notices: [
          ok(
            `Closed account with client ID ${String(account.id)} (${String(movementsRemoved)} movements removed)`,
          ),
        ],
      };
    }

    case "show-all-clients": {
      const accounts = bank.registry.list();
      if (accounts.length === 0) {
        return { next: "menu", notices: [info("No clients yet")] };
      }
      return { next: "menu", notices: accounts.map((a) => info(describeAccount(a))) };
    }

    case "count-clients":
      return { next: "menu", notices: [info(`Total clients: ${String(bank.registry.count())}`)] };

    case "client-actions": {
      const result = bank.registry.get(command.accountId);
      if (!result.ok) {
        return { next: "menu", notices: [failureNotice(result)] };
      }
      return {
        next: "client",
        client: result.value,
        notices: [info(`Client actions for ${result.value.name} (ID: ${String(result.value.id)})`)],
      };
    }

    case "reconcile": {
      const report = reconcileLedger(bank.store, bank.decimals);
      const notices = report.lines.map((line) =>
        line.balanced
          ? ok(
              `Client ${String(line.accountId)}: balance ${line.balance} matches ${String(line.movementCount)} movements`,
            )
          : warn(
              `Client ${String(line.accountId)}: balance ${line.balance} but movements sum to ${line.movementTotal}`,
            ),
      );
      const drifted = report.lines.filter((line) => !line.balanced).length;
      notices.push(
        report.balanced
          ? ok(`Ledger reconciled (${String(report.lines.length)} accounts)`)
          : error(
              `Ledger does not reconcile: ${String(drifted)} of ${String(report.lines.length)} accounts out of balance`,
            ),
      );
      return { next: "menu", notices };
    }

    case "exit":
      return { next: "exit", notices: [info("Goodbye")] };
  }
}

// =============================================================================
// Client menu
// =============================================================================

export function dispatchClient(bank: Bank, client: Account, command: ClientCommand): ClientOutcome {
  const { engine } = bank;

  switch (command.kind) {
    case "withdraw": {
      const result = engine.withdraw(client, command.amount);
      return {
        next: "client",
        notices: [
          result.ok
            ? ok(`Withdrawn ${result.value.movement.amount.slice(1)}. New balance: ${result.value.account.balance}`)
            : failureNotice(result),
        ],
      };
    }

    case "deposit": {
      const result = engine.deposit(client, command.amount);
      return {
        next: "client",
        notices: [
          result.ok
            ? ok(`Deposited ${result.value.movement.amount}. New balance: ${result.value.account.balance}`)
            : failureNotice(result),
        ],
      };
    }

    case "transfer": {
      const result = engine.transfer(client, command.destinationId, command.amount);
      return {
        next: "client",
        notices: [
          result.ok
            ? ok(
                `Transferred ${result.value.incoming.amount} to client ID ${String(command.destinationId)}. New balance: ${result.value.source.balance}`,
              )
            : failureNotice(result),
        ],
      };
    }

    case "check-balance": {
      const result = engine.checkBalance(client);
      return {
        next: "client",
        notices: [
          result.ok
            ? info(`Client ID ${String(client.id)} balance: ${result.value}`)
            : failureNotice(result),
        ],
      };
    }

    case "show-movements": {
      const result = engine.showMovements(client);
      if (!result.ok) {
        return { next: "client", notices: [failureNotice(result)] };
      }
      if (result.value.length === 0) {
        return { next: "client", notices: [info(`Client ID ${String(client.id)} has no movements`)] };
      }
      return {
        next: "client",
        notices: [
          info(`Client ID ${String(client.id)} movements:`),
          ...result.value.map((m) => info(describeMovement(m))),
        ],
      };
    }

    case "back":
      return { next: "menu", notices: [] };
  }
}
