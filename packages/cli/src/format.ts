/**
 * @tally/cli — Plain-text descriptions of ledger values.
 */

import type { Account, Movement, MovementKind } from "@tally/types";
import { formatSigned } from "@tally/ledger";

const MOVEMENT_LABELS: Record<MovementKind, string> = {
  withdraw: "Withdraw",
  deposit: "Deposit",
  "transfer-out": "Transfer Out",
  "transfer-in": "Transfer In",
};

/** "Client 1: Alice (Engineer), balance 70.00" */
export function describeAccount(account: Account): string {
  const occupation = account.occupation !== null ? ` (${account.occupation})` : "";
  return `Client ${String(account.id)}: ${account.name}${occupation}, balance ${account.balance}`;
}

/** "Transfer Out -20.00 to client ID 2" */
export function describeMovement(movement: Movement): string {
  const base = `${MOVEMENT_LABELS[movement.kind]} ${formatSigned(movement.amount)}`;
  if (movement.counterpartyId === null) {
    return base;
  }
  const direction = movement.kind === "transfer-out" ? "to" : "from";
  return `${base} ${direction} client ID ${String(movement.counterpartyId)}`;
}
