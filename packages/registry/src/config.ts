/**
 * @cardkeep/registry — Configuration.
 *
 * Loads and validates registry configuration from environment variables
 * using Zod. Limits are decimal strings coerced to unsigned 128-bit bigints.
 */

import { z } from "zod";
import { isUint128 } from "@cardkeep/types";
import type { LoggerOptions } from "./logger.js";
import type { RegistryOptions } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

const uint128 = z
  .string()
  .trim()
  .regex(/^(0|[1-9][0-9]*)$/, "must be a non-negative decimal integer")
  .transform((v) => BigInt(v))
  .refine(isUint128, "must fit in an unsigned 128-bit integer");

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Limits
  CARD_MAX_OWNS: uint128.default("0"),
  CARD_MAX_USES: uint128.default("0"),

  // Metadata
  CARD_BASE_URI: z.string().default(""),

  // Bootstrap admin
  CARD_ADMIN: z.string().min(1).optional(),
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

/**
 * Logger settings implied by a config. Pretty output in development only.
 */
export function loggerOptionsFromConfig(config: AppConfig): LoggerOptions {
  return {
    level: config.LOG_LEVEL,
    pretty: config.NODE_ENV === "development",
  };
}

/**
 * Registry construction options implied by a config.
 */
export function registryOptionsFromConfig(config: AppConfig): RegistryOptions {
  return {
    limits: { maxOwns: config.CARD_MAX_OWNS, maxUses: config.CARD_MAX_USES },
    baseUri: config.CARD_BASE_URI,
    admin: config.CARD_ADMIN,
  };
}
