/**
 * @lockbox/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const BooleanString = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

export const ConfigSchema = z
  .object({
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

    // Custody
    ADMIN_ID: z.string().min(1).default("admin"),
    CUSTODY_ID: z.string().min(1).default("lockbox"),
    BANK_SIGNING_SECRET: z.string().min(1).optional(),
    START_PAUSED: BooleanString,
  })
  .transform((config, ctx) => {
    let secret = config.BANK_SIGNING_SECRET;
    if (secret === undefined && config.NODE_ENV === "test") {
      secret = "test-secret";
    }
    if (secret === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BANK_SIGNING_SECRET"],
        message: "BANK_SIGNING_SECRET is required outside NODE_ENV=test",
      });
      return z.NEVER;
    }
    return { ...config, BANK_SIGNING_SECRET: secret };
  });

export type AppConfig = z.output<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: "admin" | "holder" | "viewer";
  /** Account (or operator) the key acts as */
  readonly subject: string;
}

const RoleSchema = z.enum(["admin", "holder", "viewer"]);

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:subject1,key2:role2:subject2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, subject] = parts;
    if (parts.length !== 3 || key === undefined || role === undefined || subject === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:subject`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    const parsedRole = RoleSchema.safeParse(role);
    if (!parsedRole.success) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, holder, or viewer`,
      );
    }
    if (subject === "") {
      throw new Error("Subject cannot be empty in API_KEYS");
    }

    keys.push({ key, role: parsedRole.data, subject });
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
