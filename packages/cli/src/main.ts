/**
 * @tally/cli — Entry point.
 *
 * Loads config, opens the ledger journal, runs the interactive session
 * and closes the store on exit or signal.
 */

import pino from "pino";
import { JsonlLedgerStore, StoreError } from "@tally/store";
import { LedgerError } from "@tally/ledger";
import { loadConfig } from "./config.js";
import { createBank } from "./app.js";
import type { Bank } from "./app.js";
import { runSession } from "./session.js";
import { createReadlineTerminal } from "./terminal.js";
import { renderNotice } from "./render.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino(
    { level: config.LOG_LEVEL },
    pino.destination({ dest: config.LOG_FILE, mkdir: true, sync: true }),
  );

  const store = new JsonlLedgerStore({ filePath: config.LEDGER_FILE });
  logger.info({ file: store.filePath, ...store.recovery }, "Ledger opened");
  if (store.recovery.skipped > 0) {
    logger.warn({ skipped: store.recovery.skipped }, "Skipped unreadable journal lines");
  }

  let bank: Bank;
  try {
    bank = createBank({
      store,
      logger,
      decimals: config.CURRENCY_DECIMALS,
      maxAmount: config.MAX_AMOUNT,
    });
  } catch (err: unknown) {
    if (!(err instanceof LedgerError)) {
      throw err;
    }
    // The journal was written under another CURRENCY_DECIMALS
    logger.fatal({ err, code: err.code }, "Ledger does not match configuration");
    process.stderr.write(`${renderNotice({ level: "error", text: err.message })}\n`);
    store.close();
    process.exitCode = 1;
    return;
  }

  const terminal = createReadlineTerminal();

  // Closing the input ends the session, which closes the store below
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    terminal.close();
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  try {
    await runSession(bank, terminal, logger);
  } catch (err: unknown) {
    if (!(err instanceof StoreError)) {
      throw err;
    }
    logger.fatal({ err, code: err.code }, "Storage failure");
    terminal.write(renderNotice({ level: "error", text: `Storage failure: ${err.message}` }));
    process.exitCode = 1;
  } finally {
    terminal.close();
    if (!store.closed) {
      if (config.COMPACT_ON_EXIT && process.exitCode !== 1) {
        try {
          store.compact();
          logger.info({ file: store.filePath }, "Journal compacted");
        } catch (err: unknown) {
          if (!(err instanceof StoreError)) {
            throw err;
          }
          logger.error({ err, code: err.code }, "Journal compaction failed");
          process.exitCode = 1;
        }
      }
      store.close();
    }
    logger.info("Shutdown complete");
  }
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
