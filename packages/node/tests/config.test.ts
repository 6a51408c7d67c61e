/**
 * Tests for config.ts - parseApiKeys, parseSeedBalances and loadConfig.
 */

import { describe, it, expect } from "vitest";
import { loadConfig, parseApiKeys, parseSeedBalances } from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses a single key entry", () => {
    expect(parseApiKeys("test-key:0xowner")).toEqual([
      { key: "test-key", address: "0xowner" },
    ]);
  });

  it("parses comma-separated entries and trims whitespace", () => {
    expect(parseApiKeys("  k1:0xowner , k2:0xalice  ")).toEqual([
      { key: "k1", address: "0xowner" },
      { key: "k2", address: "0xalice" },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b:c")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key", () => {
    expect(() => parseApiKeys(":0xowner")).toThrow("API key cannot be empty");
  });

  it("throws on empty address", () => {
    expect(() => parseApiKeys("k1:")).toThrow('Address cannot be empty for API key "k1"');
  });
});

// =============================================================================
// parseSeedBalances
// =============================================================================

describe("parseSeedBalances", () => {
  it("returns empty array for empty string", () => {
    expect(parseSeedBalances("")).toEqual([]);
  });

  it("parses amounts as bigint base units", () => {
    expect(parseSeedBalances("0xalice:1000000000000000000000,0xbob:5")).toEqual([
      { address: "0xalice", amount: 1_000_000_000_000_000_000_000n },
      { address: "0xbob", amount: 5n },
    ]);
  });

  it("rejects decimal and negative amounts", () => {
    expect(() => parseSeedBalances("0xalice:1.5")).toThrow('Invalid seed amount "1.5"');
    expect(() => parseSeedBalances("0xalice:-1")).toThrow('Invalid seed amount "-1"');
  });

  it("rejects an empty address", () => {
    expect(() => parseSeedBalances(":10")).toThrow("Seed balance address cannot be empty");
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies sandbox defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(3000);
    expect(config.NODE_ENV).toBe("development");
    expect(config.FEE_PERCENTAGE).toBe(100);
    expect(config.WITHDRAWAL_LIMIT).toBe(10_000_000_000_000_000_000_000n);
    expect(config.WITHDRAWAL_TIMELOCK).toBe(86_400);
    expect(config.TOKEN_SYMBOL).toBe("CFR");
    expect(config.TOKEN_DECIMALS).toBe(18);
    expect(config.API_KEYS).toBe("");
  });

  it("coerces numeric and amount variables", () => {
    const config = loadConfig({
      PORT: "8080",
      FEE_PERCENTAGE: "250",
      WITHDRAWAL_LIMIT: "5000",
      WITHDRAWAL_TIMELOCK: "3600",
      TOKEN_DECIMALS: "6",
    });

    expect(config.PORT).toBe(8080);
    expect(config.FEE_PERCENTAGE).toBe(250);
    expect(config.WITHDRAWAL_LIMIT).toBe(5000n);
    expect(config.WITHDRAWAL_TIMELOCK).toBe(3600);
    expect(config.TOKEN_DECIMALS).toBe(6);
  });

  it("rejects a fee above the maximum", () => {
    expect(() => loadConfig({ FEE_PERCENTAGE: "501" })).toThrow();
  });

  it("rejects a withdrawal limit that is not an integer string", () => {
    expect(() => loadConfig({ WITHDRAWAL_LIMIT: "1e21" })).toThrow();
    expect(() => loadConfig({ WITHDRAWAL_LIMIT: "-5" })).toThrow();
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });
});
