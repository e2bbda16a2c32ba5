/**
 * @keelson/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * List-valued variables (API keys, asset tokens, oracle prices) are
 * comma-separated and parsed by the helpers below.
 */

import { z } from "zod";
import type { ApiKeyRecord, Role } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const DigitString = z.string().regex(/^\d+$/, "must be a base-10 digit string");

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
  ADMIN_ACCOUNTS: z.string().default(""),

  // Protocol
  CUSTODY_ACCOUNT: z.string().min(1).default("protocol"),
  FLASH_LOAN_FEE_WAD: DigitString.default("50000000000000000"),

  // In-process token ledgers
  GOVERNANCE_SYMBOL: z.string().min(1).default("GOV"),
  NATIVE_SYMBOL: z.string().min(1).default("NATIVE"),
  ASSET_TOKENS: z.string().default(""),
  CUSTODY_GOVERNANCE_BALANCE: DigitString.default("0"),
  CUSTODY_NATIVE_BALANCE: DigitString.default("0"),
  CUSTODY_ASSET_BALANCE: DigitString.default("0"),

  // Static oracle
  ORACLE_PRICES: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

function parseRole(role: string): Role {
  if (role === "admin" || role === "member") {
    return role;
  }
  throw new Error(`Invalid role "${role}" in API_KEYS. Must be: admin or member`);
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:account1,key2:role2:account2"
 */
export function parseApiKeys(raw: string): readonly ApiKeyRecord[] {
  const keys: ApiKeyRecord[] = [];

  for (const entry of splitList(raw)) {
    const parts = entry.split(":");
    const [key, role, account] = parts;
    if (parts.length !== 3 || key === undefined || role === undefined || account === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry}". Expected format: key:role:account`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (account === "") {
      throw new Error("Account cannot be empty in API_KEYS");
    }

    keys.push({ key, role: parseRole(role), account });
  }

  return keys;
}

// =============================================================================
// List Parsing
// =============================================================================

/**
 * Split a comma-separated variable, dropping blanks.
 */
export function splitList(raw: string): readonly string[] {
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "");
}

/**
 * Parse the ORACLE_PRICES env var.
 *
 * Format: "feed1:price1,feed2:price2". The price is split off the last
 * colon so feed names may contain colons themselves.
 */
export function parseOraclePrices(raw: string): ReadonlyMap<string, bigint> {
  const prices = new Map<string, bigint>();

  for (const entry of splitList(raw)) {
    const separator = entry.lastIndexOf(":");
    const feed = entry.slice(0, Math.max(separator, 0));
    const price = entry.slice(separator + 1);
    if (separator <= 0 || !/^\d+$/.test(price)) {
      throw new Error(
        `Invalid ORACLE_PRICES entry: "${entry}". Expected format: feed:price`,
      );
    }
    if (prices.has(feed)) {
      throw new Error(`Duplicate feed "${feed}" in ORACLE_PRICES`);
    }
    prices.set(feed, BigInt(price));
  }

  return prices;
}

/**
 * Accounts allowed to issue governance tokens: every admin key's account
 * plus ADMIN_ACCOUNTS.
 */
export function adminAccounts(config: AppConfig): readonly string[] {
  const admins = new Set(splitList(config.ADMIN_ACCOUNTS));
  for (const key of parseApiKeys(config.API_KEYS)) {
    if (key.role === "admin") {
      admins.add(key.account);
    }
  }
  return [...admins];
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
