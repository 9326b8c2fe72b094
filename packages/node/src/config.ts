/**
 * @yieldmesh/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Amounts are decimal strings in whole settlement units ("0.001").
 */

import { z } from "zod";
import { parseAmount } from "@yieldmesh/ledger";
import { isAddress } from "@yieldmesh/types";

// =============================================================================
// Schema
// =============================================================================

const decimalAmount = z
  .string()
  .regex(/^\d+(\.\d{1,18})?$/, "Expected a non-negative decimal with at most 18 places")
  .transform((v) => parseAmount(v, 18));

const address = z.string().refine(isAddress, "Expected a 0x-prefixed 20-byte hex address");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Simulated deployment
  MIN_LOCKUP_SECONDS: z.coerce.number().int().min(0).default(86400),
  SIBLING_LOCKUP_SECONDS: z.coerce.number().int().min(0).default(86400),
  MIN_DEPOSIT: decimalAmount.default("0.001"),
  DEPOSIT_CEILING: decimalAmount.default("0"),
  GENESIS_TIME: z.coerce.number().int().min(0).default(1_700_000_000),
  OWNER_ADDRESS: address.optional(),
  MANAGER_ADDRESS: address.optional(),
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
