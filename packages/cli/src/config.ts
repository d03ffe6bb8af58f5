/**
 * @tally/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  // Storage
  LEDGER_FILE: z.string().min(1).default("data/ledger.jsonl"),
  COMPACT_ON_EXIT: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .default("false"),

  // Logging
  LOG_FILE: z.string().min(1).default("debug.log"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("debug"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Domain
  CURRENCY_DECIMALS: z.coerce.number().int().min(0).max(8).default(2),
  MAX_AMOUNT: z
    .string()
    .regex(/^\d+(\.\d+)?$/, "MAX_AMOUNT must be a plain decimal number")
    .optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
