/**
 * Tests for environment configuration.
 */

import { describe, it, expect } from "vitest";
import { loadConfig, parseApiKeys, toAuthConfig, toServiceConfig } from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses a single key entry", () => {
    expect(parseApiKeys("abc123:admin:alice")).toEqual([
      { key: "abc123", role: "admin", principal: "alice" },
    ]);
  });

  it("parses multiple comma-separated entries", () => {
    const keys = parseApiKeys("k1:admin:alice,k2:operator:bob,k3:viewer:carol");
    expect(keys).toEqual([
      { key: "k1", role: "admin", principal: "alice" },
      { key: "k2", role: "operator", principal: "bob" },
      { key: "k3", role: "viewer", principal: "carol" },
    ]);
  });

  it("keeps colons inside the principal", () => {
    expect(parseApiKeys("k1:operator:wallet:ops")).toEqual([
      { key: "k1", role: "operator", principal: "wallet:ops" },
    ]);
  });

  it("trims whitespace around entries", () => {
    const keys = parseApiKeys("  k1:admin:alice , k2:viewer:bob  ");
    expect(keys.map((k) => k.key)).toEqual(["k1", "k2"]);
  });

  it("throws on missing parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:admin")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key", () => {
    expect(() => parseApiKeys(":admin:alice")).toThrow("API key cannot be empty");
  });

  it("throws on invalid role", () => {
    expect(() => parseApiKeys("k1:root:alice")).toThrow('Invalid role "root"');
  });

  it("throws on empty principal", () => {
    expect(() => parseApiKeys("k1:admin:")).toThrow("Principal cannot be empty");
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NATIVE_CURRENCY).toBe("NATIVE");
    expect(config.NATIVE_DECIMALS).toBe(6);
    expect(config.FEE_BPS).toBe(250);
    expect(config.MAX_FEE_BPS).toBe(1000);
    expect(config.PLATFORM_ACCOUNT).toBe("platform:fees");
    expect(config.ARBITER).toBe("arbiter");
    expect(config.JWT_SECRET).toBeUndefined();
  });

  it("coerces numeric env vars", () => {
    const config = loadConfig({ PORT: "8080", FEE_BPS: "100", NATIVE_DECIMALS: "2" });
    expect(config.PORT).toBe(8080);
    expect(config.FEE_BPS).toBe(100);
    expect(config.NATIVE_DECIMALS).toBe(2);
  });

  it("rejects out-of-range values", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ FEE_BPS: "10001" })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow();
  });
});

// =============================================================================
// Derived settings
// =============================================================================

describe("toAuthConfig", () => {
  it("is undefined without keys or a JWT secret", () => {
    expect(toAuthConfig(loadConfig({}))).toBeUndefined();
  });

  it("indexes API keys by key", () => {
    const auth = toAuthConfig(loadConfig({ API_KEYS: "k1:admin:treasury,k2:viewer:auditor" }));
    expect(auth?.apiKeys.get("k2")).toEqual({ key: "k2", role: "viewer", principal: "auditor" });
    expect(auth?.jwtSecret).toBeUndefined();
    expect(auth?.jwtIssuer).toBe("ledgerline");
  });

  it("enables bearer tokens with only a secret", () => {
    const auth = toAuthConfig(loadConfig({ JWT_SECRET: "test-secret" }));
    expect(auth?.apiKeys.size).toBe(0);
    expect(auth?.jwtSecret).toBe("test-secret");
  });
});

describe("toServiceConfig", () => {
  it("maps settlement settings", () => {
    expect(toServiceConfig(loadConfig({ FEE_BPS: "100", NATIVE_CURRENCY: "COIN" }))).toEqual({
      nativeCurrency: "COIN",
      nativeDecimals: 6,
      feeBps: 100,
      maxFeeBps: 1000,
      platformAccount: "platform:fees",
      arbiter: "arbiter",
    });
  });
});
