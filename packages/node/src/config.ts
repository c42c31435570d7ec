/**
 * @bridge-core/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Byte-valued settings are hex, with or without a 0x prefix, and are
 * decoded during validation.
 */

import { z } from "zod";
import { fromHex } from "@bridge-core/types";

// =============================================================================
// Schema
// =============================================================================

function hexBytes(length: number) {
  return z
    .string()
    .regex(
      new RegExp(`^(0[xX])?[0-9a-fA-F]{${length * 2}}$`),
      `Expected ${length} bytes of hex`,
    )
    .transform((value) => fromHex(value));
}

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Bridge identity
  BRIDGE_PROGRAM_ID: hexBytes(32).default("11".repeat(32)),
  BRIDGE_ADMIN_SEED: hexBytes(32).default("22".repeat(32)),
  COMMISSION_PROGRAM_ID: hexBytes(32).default("33".repeat(32)),
  ADDRESS_DERIVATION: z.enum(["program", "hash"]).default("program"),

  // When set, the admin record is initialized with this key at startup
  AUTHORITY_PUBLIC_KEY: hexBytes(64).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
