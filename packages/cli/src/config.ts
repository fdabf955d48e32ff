/**
 * @fundledger/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isValidDate } from "@fundledger/ledger";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  DATABASE_PATH: z.string().min(1).default("daily_accounting.db"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Ledger
  OTHER_TOTAL_EPOCH: z
    .string()
    .refine(isValidDate, { message: "OTHER_TOTAL_EPOCH must be a MM/DD/YYYY date" })
    .optional(),

  // Reconciliation
  PNL_CONVENTION: z.enum(["gross", "net"]).default("gross"),
  PNL_TOLERANCE: z.coerce.number().min(0).default(0.01),
  DISCREPANCY_TOLERANCE: z.coerce.number().min(0).default(0.1),
  MAX_CORRECTION_ITERATIONS: z.coerce.number().int().min(1).default(100),
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
