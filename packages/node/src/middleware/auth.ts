/**
 * Caller authentication.
 *
 * Settlement operations act as `auth.identity`, so every /api route runs
 * behind one of:
 * - authMiddleware: X-Api-Key (looked up in the key registry), then
 *   `Authorization: Bearer <HS256 JWT>`
 * - principalHeaderMiddleware: unsecured mode, the caller is whatever
 *   X-Principal names, with the admin role
 *
 * Either way the identity must be a participant id: custody, platform and
 * external ledger accounts are refused with 401.
 *
 * requirePermission() then gates a route on the caller's role.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { Context, MiddlewareHandler } from "hono";
import { classifyAccount, DEFAULT_PLATFORM_ACCOUNT } from "@ledgerline/ledger";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, JwtClaims, Permission, Role } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const PRINCIPAL_HEADER = "X-Principal";
const API_KEY_HEADER = "X-Api-Key";
const BEARER = "Bearer ";

export interface AuthConfig {
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
  /** Enables bearer tokens */
  readonly jwtSecret?: string | undefined;
  readonly jwtIssuer?: string | undefined;
  /** Whether an identity may act; defaults to the ledger's id classification. */
  readonly isPrincipal?: PrincipalCheck | undefined;
}

export type PrincipalCheck = (identity: string) => boolean;

const defaultPrincipalCheck: PrincipalCheck = (identity) =>
  classifyAccount(identity, DEFAULT_PLATFORM_ACCOUNT) === "principal";

function reservedIdentity(identity: string): string {
  return `"${identity}" is a reserved account and cannot authenticate`;
}

/** What a credential strategy made of the request. */
type Resolution =
  | { readonly kind: "absent" }
  | { readonly kind: "rejected"; readonly message: string }
  | { readonly kind: "accepted"; readonly auth: AuthContext };

type Strategy = (c: Context<AppEnv>, config: AuthConfig) => Resolution;

const fromApiKey: Strategy = (c, config) => {
  const key = c.req.header(API_KEY_HEADER);
  if (key === undefined) {
    return { kind: "absent" };
  }
  const record = config.apiKeys.get(key);
  return record === undefined
    ? { kind: "rejected", message: "Invalid API key" }
    : { kind: "accepted", auth: { type: "api-key", identity: record.principal, role: record.role } };
};

const fromBearer: Strategy = (c, config) => {
  const header = c.req.header("Authorization");
  if (header === undefined || !header.startsWith(BEARER)) {
    return { kind: "absent" };
  }
  if (config.jwtSecret === undefined) {
    return { kind: "rejected", message: "JWT authentication not configured" };
  }
  const claims = verifyJwt(header.slice(BEARER.length), config.jwtSecret, config.jwtIssuer);
  return claims === undefined
    ? { kind: "rejected", message: "Invalid or expired JWT" }
    : { kind: "accepted", auth: { type: "jwt", identity: claims.sub, role: claims.role } };
};

const STRATEGIES: readonly Strategy[] = [fromApiKey, fromBearer];

/** 401 unless one strategy accepts; the first strategy that applies decides. */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const isPrincipal = config.isPrincipal ?? defaultPrincipalCheck;
    for (const strategy of STRATEGIES) {
      const resolution = strategy(c, config);
      if (resolution.kind === "rejected") {
        return c.json(createErrorEnvelope("UNAUTHORIZED", resolution.message), 401);
      }
      if (resolution.kind === "accepted") {
        if (!isPrincipal(resolution.auth.identity)) {
          return c.json(createErrorEnvelope("UNAUTHORIZED", reservedIdentity(resolution.auth.identity)), 401);
        }
        c.set("auth", resolution.auth);
        return next();
      }
    }
    return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
  };
}

export function principalHeaderMiddleware(
  isPrincipal: PrincipalCheck = defaultPrincipalCheck,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const principal = c.req.header(PRINCIPAL_HEADER)?.trim() ?? "";
    if (principal === "") {
      return c.json(createErrorEnvelope("UNAUTHORIZED", `${PRINCIPAL_HEADER} header required`), 401);
    }
    if (!isPrincipal(principal)) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", reservedIdentity(principal)), 401);
    }
    c.set("auth", { type: "header", identity: principal, role: "admin" });
    return next();
  };
}

/** Runs after one of the authentication middlewares. */
export function requirePermission(permission: Permission): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const { role } = c.get("auth");
    if (!hasPermission(role, permission)) {
      return c.json(createErrorEnvelope("FORBIDDEN", `Role '${role}' lacks '${permission}' permission`), 403);
    }
    return next();
  };
}

// =============================================================================
// HS256 tokens
// =============================================================================

function hmac(secret: string, signingInput: string): Buffer {
  return createHmac("sha256", secret).update(signingInput).digest();
}

function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString("base64url");
}

function decodeSegment(segment: string): Record<string, unknown> | undefined {
  let value: unknown;
  try {
    value = JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}

function toRole(value: unknown): Role | undefined {
  return value === "admin" || value === "operator" || value === "viewer" ? value : undefined;
}

/**
 * Claims of an HS256 token, or undefined when the token is malformed,
 * badly signed, expired (`exp < nowSeconds`) or from another issuer.
 */
export function verifyJwt(
  token: string,
  secret: string,
  expectedIssuer?: string,
  nowSeconds: number = Math.floor(Date.now() / 1000),
): JwtClaims | undefined {
  const parts = token.split(".");
  const [headerSegment, payloadSegment, signatureSegment] = parts;
  if (parts.length !== 3 || headerSegment === undefined || payloadSegment === undefined || signatureSegment === undefined) {
    return undefined;
  }

  const expected = hmac(secret, `${headerSegment}.${payloadSegment}`);
  const given = Buffer.from(signatureSegment, "base64url");
  if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
    return undefined;
  }

  if (decodeSegment(headerSegment)?.["alg"] !== "HS256") {
    return undefined;
  }
  const payload = decodeSegment(payloadSegment);
  if (payload === undefined) {
    return undefined;
  }

  const { sub, exp, iat, iss } = payload;
  const role = toRole(payload["role"]);
  if (typeof sub !== "string" || sub === "" || role === undefined) {
    return undefined;
  }
  if (typeof exp !== "number" || typeof iat !== "number" || exp < nowSeconds) {
    return undefined;
  }
  if (expectedIssuer !== undefined && iss !== expectedIssuer) {
    return undefined;
  }

  return { sub, role, iss: typeof iss === "string" ? iss : "", exp, iat };
}

/** Sign claims as an HS256 token. `iat` defaults to now. */
export function signJwt(claims: Omit<JwtClaims, "iat"> & { iat?: number }, secret: string): string {
  const header = encodeSegment({ alg: "HS256", typ: "JWT" });
  const payload = encodeSegment({ ...claims, iat: claims.iat ?? Math.floor(Date.now() / 1000) });
  const signature = hmac(secret, `${header}.${payload}`).toString("base64url");
  return `${header}.${payload}.${signature}`;
}
