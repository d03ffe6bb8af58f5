/**
 * @tally/cli — Terminal rendering with chalk.
 */

import chalk from "chalk";
import type { MenuEntry } from "./commands.js";
import type { Notice } from "./dispatch.js";

export function renderNotice(notice: Notice): string {
  switch (notice.level) {
    case "ok":
      return chalk.green("  ✓ ") + chalk.white(notice.text);
    case "info":
      return chalk.gray("  → ") + chalk.white(notice.text);
    case "warn":
      return chalk.yellow("  ! ") + chalk.yellow(notice.text);
    case "error":
      return chalk.red("  ✗ ") + chalk.red(notice.text);
  }
}

export function renderMenu(title: string, entries: readonly MenuEntry<string>[]): string[] {
  return [
    "",
    chalk.cyan.bold(`  ${title}`),
    ...entries.map((e) => chalk.gray(`  ${String(e.choice)}.`) + " " + chalk.white(e.label)),
  ];
}

export function banner(): string[] {
  return [
    "",
    chalk.cyan.bold("  ╔════════════════════════════════╗"),
    chalk.cyan.bold("  ║") + chalk.white.bold("             TALLY              ") + chalk.cyan.bold("║"),
    chalk.cyan.bold("  ║") + chalk.gray("     Client ledger manager      ") + chalk.cyan.bold("║"),
    chalk.cyan.bold("  ╚════════════════════════════════╝"),
  ];
}
