/**
 * @tally/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint minor units internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be plain decimal strings (no exponent, NaN or Infinity)
 * - Fractional digits never exceed the configured scale
 */

import { LedgerError } from "./types.js";

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=2 → 10000n
 * "-30.5" with decimals=2 → -3050n
 *
 * @returns undefined if the amount is not a valid decimal at this scale
 */
export function tryParseAmount(amount: string, decimals: number): bigint | undefined {
  const trimmed = amount.trim();
  if (!AMOUNT_PATTERN.test(trimmed)) {
    return undefined;
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    return undefined;
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Number of fractional digits in a decimal string.
 *
 * "70.00" → 2, "70" → 0
 *
 * @returns undefined if the amount is not a decimal string
 */
export function amountScale(amount: string): number | undefined {
  const trimmed = amount.trim();
  if (!AMOUNT_PATTERN.test(trimmed)) {
    return undefined;
  }
  const dot = trimmed.indexOf(".");
  return dot === -1 ? 0 : trimmed.length - dot - 1;
}

/**
 * Parse an amount that is expected to be valid (e.g. a stored balance).
 *
 * @throws LedgerError INVALID_AMOUNT if it is not
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const value = tryParseAmount(amount, decimals);
  if (value === undefined) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Invalid amount "${amount}" for a scale of ${String(decimals)} decimal places`,
    );
  }
  return value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -3000n with decimals=2 → "-30.00"
 * 7n with decimals=0 → "7"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Sum a list of decimal amounts as minor units.
 */
export function sumAmounts(amounts: readonly string[], decimals: number): bigint {
  let total = 0n;
  for (const amount of amounts) {
    total += parseAmount(amount, decimals);
  }
  return total;
}

/**
 * Prefix non-negative amounts with "+" for display.
 *
 * "20.00" → "+20.00", "-20.00" → "-20.00"
 */
export function formatSigned(amount: string): string {
  return amount.startsWith("-") ? amount : `+${amount}`;
}
