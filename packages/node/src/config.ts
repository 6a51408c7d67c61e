/**
 * @coffer/node - Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Every variable has a sandbox default, so the node starts with no env.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const BASE_UNITS = /^(0|[1-9]\d*)$/;

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
  API_KEYS: z.string().default(""),

  // Vault
  VAULT_NAME: z.string().trim().min(1).default("Coffer Sandbox Vault"),
  VAULT_ADDRESS: z.string().min(1).default("0xc0ffe00000000000000000000000000000000001"),
  VAULT_OWNER: z.string().min(1).default("0x0000000000000000000000000000000000000a11"),
  FEE_COLLECTOR: z.string().min(1).default("0x0000000000000000000000000000000000000fee"),
  FEE_PERCENTAGE: z.coerce.number().int().min(0).max(500).default(100),
  WITHDRAWAL_LIMIT: z
    .string()
    .regex(BASE_UNITS, "WITHDRAWAL_LIMIT must be an integer amount of base units")
    .transform((v) => BigInt(v))
    .default("10000000000000000000000"),
  WITHDRAWAL_TIMELOCK: z.coerce.number().int().min(0).default(86400),

  // Token
  TOKEN_SYMBOL: z.string().trim().min(1).default("CFR"),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(36).default(18),
  TOKEN_SEED_BALANCES: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  /** Account the key acts as */
  readonly address: string;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:address1,key2:address2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  return parsePairs(raw, "API_KEYS", "key:address").map(([key, address]) => {
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (address === "") {
      throw new Error(`Address cannot be empty for API key "${key}"`);
    }
    return { key, address };
  });
}

// =============================================================================
// Seed Balances
// =============================================================================

export interface SeedBalance {
  readonly address: string;
  readonly amount: bigint;
}

/**
 * Parse TOKEN_SEED_BALANCES, the sandbox ledger's opening balances.
 *
 * Format: "address1:amount1,address2:amount2" (amounts in base units)
 */
export function parseSeedBalances(raw: string): readonly SeedBalance[] {
  return parsePairs(raw, "TOKEN_SEED_BALANCES", "address:amount").map(([address, amount]) => {
    if (address === "") {
      throw new Error("Seed balance address cannot be empty");
    }
    if (!BASE_UNITS.test(amount)) {
      throw new Error(`Invalid seed amount "${amount}" for "${address}"`);
    }
    return { address, amount: BigInt(amount) };
  });
}

function parsePairs(raw: string, name: string, format: string): Array<[string, string]> {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const parts = entry.trim().split(":");
    const [first, second] = parts;
    if (parts.length !== 2 || first === undefined || second === undefined) {
      throw new Error(`Invalid ${name} entry: "${entry.trim()}". Expected format: ${format}`);
    }
    return [first, second];
  });
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
