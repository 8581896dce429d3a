/**
 * @errmap/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_TOKENS: z.string().default(""),

  // Error handling
  EXPOSE_INTERNAL_ERRORS: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Token Parsing
// =============================================================================

/**
 * Parse the API_TOKENS env var.
 *
 * Format: "token1,token2"
 */
export function parseApiTokens(raw: string): readonly string[] {
  if (raw.trim() === "") {
    return [];
  }

  const tokens: string[] = [];

  for (const entry of raw.split(",")) {
    const token = entry.trim();
    if (token === "") {
      throw new Error("API token cannot be empty");
    }
    if (/\s/.test(token)) {
      throw new Error(`Invalid API_TOKENS entry: "${token}". Tokens cannot contain whitespace`);
    }
    tokens.push(token);
  }

  return tokens;
}

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
