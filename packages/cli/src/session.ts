/**
 * @tally/cli — Interactive session.
 *
 * Shows the main menu, collects the answers a choice needs, dispatches
 * the resulting command and prints its notices. Invalid input prints a
 * notice and shows the menu again. End of input ends the session at
 * any prompt.
 */

import type { Logger } from "pino";
import type { Account } from "@tally/types";
import type { Bank } from "./app.js";
import { CLIENT_MENU, MAIN_MENU, parseAccountId, parseAmountInput, parseMenuChoice } from "./commands.js";
import type { BankCommand, ClientCommand, Parsed } from "./commands.js";
import { dispatchBank, dispatchClient } from "./dispatch.js";
import type { Notice } from "./dispatch.js";
import { banner, renderMenu, renderNotice } from "./render.js";
import type { Terminal } from "./terminal.js";

/** Answer read from the terminal; undefined means input ended. */
type Read<T> = Parsed<T> | undefined;

export async function runSession(bank: Bank, terminal: Terminal, logger: Logger): Promise<void> {
  banner().forEach((line) => terminal.write(line));

  for (;;) {
    renderMenu("Main menu", MAIN_MENU).forEach((line) => terminal.write(line));

    const command = await readBankCommand(terminal);
    if (command === undefined) {
      return;
    }
    if (!command.ok) {
      print(terminal, [{ level: "error", text: command.message }]);
      continue;
    }

    logger.debug({ menu: "main", command: command.value.kind }, "Menu selection");
    const outcome = dispatchBank(bank, command.value);
    print(terminal, outcome.notices);

    if (outcome.next === "exit") {
      return;
    }
    if (outcome.next === "client") {
      const ended = await runClientMenu(bank, outcome.client, terminal, logger);
      if (ended) {
        return;
      }
    }
  }
}

/**
 * @returns true when input ended inside the client menu
 */
async function runClientMenu(
  bank: Bank,
  client: Account,
  terminal: Terminal,
  logger: Logger,
): Promise<boolean> {
  for (;;) {
    renderMenu(`Client ${String(client.id)}: ${client.name}`, CLIENT_MENU).forEach((line) =>
      terminal.write(line),
    );

    const command = await readClientCommand(terminal);
    if (command === undefined) {
      return true;
    }
    if (!command.ok) {
      print(terminal, [{ level: "error", text: command.message }]);
      continue;
    }

    logger.debug({ menu: "client", clientId: client.id, command: command.value.kind }, "Menu selection");
    const outcome = dispatchClient(bank, client, command.value);
    print(terminal, outcome.notices);

    if (outcome.next === "menu") {
      return false;
    }
  }
}

// =============================================================================
// Readers
// =============================================================================

async function readBankCommand(terminal: Terminal): Promise<Read<BankCommand>> {
  const answer = await terminal.ask("Select an option: ");
  if (answer === undefined) {
    return undefined;
  }
  const choice = parseMenuChoice(answer, MAIN_MENU);
  if (!choice.ok) {
    return choice;
  }

  switch (choice.value) {
    case "create-account": {
      const name = await terminal.ask("Enter first name: ");
      if (name === undefined) return undefined;
      const occupation = await terminal.ask("Enter occupation (optional): ");
      if (occupation === undefined) return undefined;
      return parsed<BankCommand>({ kind: "create-account", name, occupation });
    }
    case "close-account":
    case "client-actions": {
      const kind = choice.value;
      const answerId = await terminal.ask("Enter client ID: ");
      if (answerId === undefined) return undefined;
      const id = parseAccountId(answerId);
      return id.ok ? parsed<BankCommand>({ kind, accountId: id.value }) : id;
    }
    case "show-all-clients":
    case "count-clients":
    case "reconcile":
    case "exit":
      return parsed<BankCommand>({ kind: choice.value });
  }
}

async function readClientCommand(terminal: Terminal): Promise<Read<ClientCommand>> {
  const answer = await terminal.ask("Select an action: ");
  if (answer === undefined) {
    return undefined;
  }
  const choice = parseMenuChoice(answer, CLIENT_MENU);
  if (!choice.ok) {
    return choice;
  }

  switch (choice.value) {
    case "withdraw":
    case "deposit": {
      const kind = choice.value;
      const answerAmount = await terminal.ask(`Enter amount to ${kind}: `);
      if (answerAmount === undefined) return undefined;
      const amount = parseAmountInput(answerAmount);
      return amount.ok ? parsed<ClientCommand>({ kind, amount: amount.value }) : amount;
    }
    case "transfer": {
      const answerId = await terminal.ask("Enter client ID to transfer to: ");
      if (answerId === undefined) return undefined;
      const destination = parseAccountId(answerId);
      if (!destination.ok) return destination;

      const answerAmount = await terminal.ask("Enter amount to transfer: ");
      if (answerAmount === undefined) return undefined;
      const amount = parseAmountInput(answerAmount);
      return amount.ok
        ? parsed<ClientCommand>({ kind: "transfer", destinationId: destination.value, amount: amount.value })
        : amount;
    }
    case "check-balance":
    case "show-movements":
    case "back":
      return parsed<ClientCommand>({ kind: choice.value });
  }
}

// =============================================================================
// Helpers
// =============================================================================

function parsed<T>(value: T): Parsed<T> {
  return { ok: true, value };
}

function print(terminal: Terminal, notices: readonly Notice[]): void {
  for (const notice of notices) {
    terminal.write(renderNotice(notice));
  }
}
