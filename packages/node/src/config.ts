/**
 * @tidepool/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Role } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const commaList = z
  .string()
  .default("")
  .transform((v) =>
    v
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s !== ""),
  );

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Custody accounts
  VAULT_ADDRESS: z.string().min(1).default("vault"),
  FEE_RECIPIENT: z.string().min(1).default("fee-recipient"),

  // Fees
  SYSTEM_FEE_BPS: z.coerce.number().int().min(0).max(10000).default(1000),
  REFERRAL_PERCENTS: commaList.pipe(
    z.array(z.coerce.number().int().min(0).max(10000)),
  ),
  MAX_REFERRAL_LEVELS: z.coerce.number().int().min(0).max(16).default(3),

  // In-memory strategies registered at startup
  STRATEGIES: commaList,
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly principal: string;
}

const RoleSchema = z.enum(["admin", "registrar", "backend", "user"]);

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:principal1,key2:role2:principal2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const [key, role, principal, ...rest] = entry.trim().split(":");
    if (key === undefined || role === undefined || principal === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:principal`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    const parsedRole = RoleSchema.safeParse(role);
    if (!parsedRole.success) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, registrar, backend, or user`,
      );
    }
    if (principal === "") {
      throw new Error("Principal cannot be empty in API_KEYS");
    }

    keys.push({ key, role: parsedRole.data, principal });
  }

  return keys;
}

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
