/**
 * @actus-sm/contract: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Only the facade reads configuration; the engine takes explicit options.
 */

import { z } from "zod";
import pino from "pino";
import type { Logger } from "pino";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Upper bound on the dates of any single schedule
  MAX_SCHEDULE_EVENTS: z.coerce.number().int().min(1).default(10_000),
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

// =============================================================================
// Logging
// =============================================================================

/**
 * Build the pino logger for a configuration. Development output goes
 * through pino-pretty; everything else is JSON lines.
 */
export function createLogger(config: AppConfig): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/** Logger used when the host supplies none. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
