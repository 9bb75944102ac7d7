/**
 * @zoneledger/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Zone identity
  ZONE_NAME: z.string().min(1).default("Zone"),
  ZONE_DESCRIPTION: z.string().default(""),
  ZONE_KEY_ALGORITHM: z.enum(["ed25519", "secp256k1"]).default("ed25519"),
  ZONE_PRIVATE_KEY: z.string().optional(),
  ZONE_KEY_FILE: z.string().optional(),

  // Storage
  STORAGE: z.enum(["memory", "jsonl"]).default("memory"),
  DATA_DIR: z.string().default("./data"),

  // Citations
  CITATION_TIMEOUT_MS: z.coerce.number().int().min(1).default(10000),
  CITATION_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
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
