/**
 * @resonance/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Field types
// =============================================================================

const HEX_ADDRESS = /^0x[0-9a-fA-F]{40}$/;
const HEX_PRIVATE_KEY = /^0x[0-9a-fA-F]{64}$/;

const address = z.custom<`0x${string}`>(
  (v) => typeof v === "string" && HEX_ADDRESS.test(v),
  { message: "Expected a 0x-prefixed 20-byte hex address" },
);

const privateKey = z.custom<`0x${string}`>(
  (v) => typeof v === "string" && HEX_PRIVATE_KEY.test(v),
  { message: "Expected a 0x-prefixed 32-byte hex private key" },
);

const flag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

function tokenAmount(fallback: string) {
  return z
    .string()
    .regex(/^\d+$/, "Expected a non-negative integer")
    .default(fallback)
    .transform((v) => BigInt(v));
}

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Storage
    DATA_DIR: z.string().min(1).default("./resonance-data"),
    RECORD_KEY_FILE: z.string().min(1),

    // Confirmation feed
    RPC_URL: z.string().url(),
    CHAIN_ID: z.coerce.number().int().positive().default(1),
    TOKEN_ADDRESS: address,
    START_BLOCK: z.coerce.number().int().nonnegative().optional(),
    CONFIRMATIONS: z.coerce.number().int().nonnegative().default(0),
    MAX_BLOCK_SPAN: z.coerce.number().int().min(1).default(2000),
    POLL_INTERVAL_MS: z.coerce.number().int().min(100).default(10_000),
    COMMIT_INTERVAL_MS: z.coerce.number().int().min(100).default(60_000),

    // Anchoring
    ANCHOR_ENABLED: flag,
    REGISTRY_ADDRESS: address.optional(),
    ANCHOR_PRIVATE_KEY: privateKey.optional(),

    // External call policy
    RPC_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),
    RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
    RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(30_000),
    BREAKER_FAILURE_THRESHOLD: z.coerce.number().int().min(1).default(5),
    BREAKER_RESET_MS: z.coerce.number().int().min(0).default(30_000),

    // Supply bookkeeping
    TOTAL_SUPPLY: tokenAmount("1021000000"),
    BURN_TARGET: tokenAmount("1000000000"),

    // Auth
    API_KEYS: z.string().default(""),
  })
  .superRefine((config, ctx) => {
    if (!config.ANCHOR_ENABLED) return;
    if (config.REGISTRY_ADDRESS === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["REGISTRY_ADDRESS"],
        message: "REGISTRY_ADDRESS is required when ANCHOR_ENABLED=true",
      });
    }
    if (config.ANCHOR_PRIVATE_KEY === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ANCHOR_PRIVATE_KEY"],
        message: "ANCHOR_PRIVATE_KEY is required when ANCHOR_ENABLED=true",
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
}

function isRole(value: string): value is Role {
  return value === "admin" || value === "operator" || value === "viewer";
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1,key2:role2"; a key without a role is an operator.
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    if (parts.length > 2) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key[:role]`,
      );
    }

    const [key = "", role = "operator"] = parts;

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }

    keys.push({ key, role });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * A blank value (`START_BLOCK=` in a .env file) counts as unset.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const set = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );
  return ConfigSchema.parse(set);
}
