/**
 * @tally/cli — Text front end for the client ledger.
 *
 * The process entry point lives in main.ts; everything it wires
 * together is exported here.
 */

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";

export { createBank } from "./app.js";
export type { Bank, CreateBankOptions } from "./app.js";

export {
  MAIN_MENU,
  CLIENT_MENU,
  parseMenuChoice,
  parseAccountId,
  parseAmountInput,
} from "./commands.js";
export type {
  BankCommand,
  ClientCommand,
  BankAction,
  ClientAction,
  MenuEntry,
  Parsed,
} from "./commands.js";

export { dispatchBank, dispatchClient, failureNotice } from "./dispatch.js";
export type { Notice, NoticeLevel, BankOutcome, ClientOutcome } from "./dispatch.js";

export { describeAccount, describeMovement } from "./format.js";
export { renderNotice, renderMenu, banner } from "./render.js";
export { runSession } from "./session.js";
export { createReadlineTerminal } from "./terminal.js";
export type { Terminal, ReadlineTerminal } from "./terminal.js";
