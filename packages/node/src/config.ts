/**
 * @ledgerline/node — Configuration.
 *
 * Everything is read from environment variables and checked by one zod
 * schema; the derived shapes feed createApp().
 */

import { z } from "zod";
import type { AuthConfig } from "./middleware/auth.js";
import type { SettlementServiceConfig } from "./services/settlement-service.js";
import type { ApiKeyRecord, Role } from "./types/auth.js";

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
  JWT_SECRET: z.string().min(1).optional(),
  JWT_ISSUER: z.string().default("ledgerline"),

  // Settlement
  NATIVE_CURRENCY: z.string().min(1).default("NATIVE"),
  NATIVE_DECIMALS: z.coerce.number().int().min(0).max(18).default(6),
  FEE_BPS: z.coerce.number().int().min(0).max(10000).default(250),
  MAX_FEE_BPS: z.coerce.number().int().min(0).max(10000).default(1000),
  PLATFORM_ACCOUNT: z.string().min(1).default("platform:fees"),
  ARBITER: z.string().min(1).default("arbiter"),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export type ParsedApiKey = ApiKeyRecord;

const ROLES: readonly Role[] = ["admin", "operator", "viewer"];

function parseApiKeyEntry(entry: string): ParsedApiKey {
  const [key, roleName, ...principalParts] = entry.split(":");
  if (key === undefined || roleName === undefined || principalParts.length === 0) {
    throw new Error(`Invalid API_KEYS entry: "${entry}". Expected format: key:role:principal`);
  }
  if (key === "") {
    throw new Error("API key cannot be empty");
  }
  const role = ROLES.find((r) => r === roleName);
  if (role === undefined) {
    throw new Error(`Invalid role "${roleName}" in API_KEYS. Must be: ${ROLES.join(", ")}`);
  }
  // Principals may contain colons ("wallet:ops").
  const principal = principalParts.join(":");
  if (principal === "") {
    throw new Error("Principal cannot be empty in API_KEYS");
  }
  return { key, role, principal };
}

/** "key:role:principal" entries, comma separated. Blank means none. */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  return raw.trim() === "" ? [] : raw.split(",").map((entry) => parseApiKeyEntry(entry.trim()));
}

/** @throws {z.ZodError} on a malformed variable */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  return ConfigSchema.parse(env);
}

/** Undefined when neither API keys nor a JWT secret are configured. */
export function toAuthConfig(config: AppConfig): AuthConfig | undefined {
  const keys = parseApiKeys(config.API_KEYS);
  if (keys.length === 0 && config.JWT_SECRET === undefined) {
    return undefined;
  }
  return {
    apiKeys: new Map(keys.map((k) => [k.key, k])),
    jwtSecret: config.JWT_SECRET,
    jwtIssuer: config.JWT_ISSUER,
  };
}

export function toServiceConfig(config: AppConfig): SettlementServiceConfig {
  return {
    nativeCurrency: config.NATIVE_CURRENCY,
    nativeDecimals: config.NATIVE_DECIMALS,
    feeBps: config.FEE_BPS,
    maxFeeBps: config.MAX_FEE_BPS,
    platformAccount: config.PLATFORM_ACCOUNT,
    arbiter: config.ARBITER,
  };
}
