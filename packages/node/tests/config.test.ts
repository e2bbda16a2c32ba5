/**
 * Tests for config.ts — env parsing helpers + loadConfig.
 */

import { describe, it, expect } from "vitest";
import {
  adminAccounts,
  loadConfig,
  parseApiKeys,
  parseOraclePrices,
  splitList,
} from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses a single key entry", () => {
    expect(parseApiKeys("abc123:admin:ops")).toEqual([
      { key: "abc123", role: "admin", account: "ops" },
    ]);
  });

  it("parses multiple comma-separated entries", () => {
    const keys = parseApiKeys("k1:admin:ops,k2:member:alice");
    expect(keys).toEqual([
      { key: "k1", role: "admin", account: "ops" },
      { key: "k2", role: "member", account: "alice" },
    ]);
  });

  it("trims whitespace around entries", () => {
    const keys = parseApiKeys("  k1:admin:ops , k2:member:bob  ");
    expect(keys.map((k) => k.key)).toEqual(["k1", "k2"]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:member")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:member:c:d")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key", () => {
    expect(() => parseApiKeys(":admin:ops")).toThrow("API key cannot be empty");
  });

  it("throws on invalid role", () => {
    expect(() => parseApiKeys("k1:operator:ops")).toThrow('Invalid role "operator"');
  });

  it("throws on empty account", () => {
    expect(() => parseApiKeys("k1:admin:")).toThrow("Account cannot be empty");
  });
});

// =============================================================================
// List helpers
// =============================================================================

describe("splitList", () => {
  it("drops blank entries", () => {
    expect(splitList(" 0xusdc, ,0xweth ,")).toEqual(["0xusdc", "0xweth"]);
    expect(splitList("")).toEqual([]);
  });
});

describe("parseOraclePrices", () => {
  it("parses feed:price pairs", () => {
    const prices = parseOraclePrices("feed:usdc:2,weth:3000");
    expect([...prices]).toEqual([
      ["feed:usdc", 2n],
      ["weth", 3000n],
    ]);
  });

  it("rejects entries without a price", () => {
    expect(() => parseOraclePrices("weth")).toThrow("Invalid ORACLE_PRICES entry");
    expect(() => parseOraclePrices(":5")).toThrow("Invalid ORACLE_PRICES entry");
    expect(() => parseOraclePrices("weth:-1")).toThrow("Invalid ORACLE_PRICES entry");
  });

  it("rejects duplicate feeds", () => {
    expect(() => parseOraclePrices("weth:1,weth:2")).toThrow('Duplicate feed "weth"');
  });
});

describe("adminAccounts", () => {
  it("merges admin keys with ADMIN_ACCOUNTS", () => {
    const config = loadConfig({
      API_KEYS: "k1:admin:ops,k2:member:alice,k3:admin:custodian",
      ADMIN_ACCOUNTS: "ops,auditor",
    });
    expect(adminAccounts(config)).toEqual(["ops", "auditor", "custodian"]);
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.CUSTODY_ACCOUNT).toBe("protocol");
    expect(config.FLASH_LOAN_FEE_WAD).toBe("50000000000000000");
    expect(config.GOVERNANCE_SYMBOL).toBe("GOV");
    expect(config.NATIVE_SYMBOL).toBe("NATIVE");
    expect(config.CUSTODY_GOVERNANCE_BALANCE).toBe("0");
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      CUSTODY_ACCOUNT: "vault",
      CUSTODY_NATIVE_BALANCE: "5000",
    });
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.CUSTODY_ACCOUNT).toBe("vault");
    expect(config.CUSTODY_NATIVE_BALANCE).toBe("5000");
  });

  it("rejects out-of-range port", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow();
  });

  it("rejects non-integer balances", () => {
    expect(() => loadConfig({ CUSTODY_GOVERNANCE_BALANCE: "1.5" })).toThrow();
    expect(() => loadConfig({ FLASH_LOAN_FEE_WAD: "-1" })).toThrow();
  });
});
