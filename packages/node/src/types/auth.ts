/**
 * Who is calling, and what they may do.
 *
 * Roles are ranked viewer < operator < admin; each permission names the
 * lowest role that holds it.
 */

import type { Principal } from "@ledgerline/types";

export type Role = "admin" | "operator" | "viewer";

/** read: queries, write: settlement operations, admin: deposits */
export type Permission = "read" | "write" | "admin";

const RANK: Readonly<Record<Role, number>> = { viewer: 0, operator: 1, admin: 2 };

const REQUIRED_ROLE: Readonly<Record<Permission, Role>> = {
  read: "viewer",
  write: "operator",
  admin: "admin",
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return RANK[role] >= RANK[REQUIRED_ROLE[permission]];
}

/** Set on the context by the auth middleware; operations run as `identity`. */
export interface AuthContext {
  readonly type: "api-key" | "jwt" | "header";
  readonly identity: Principal;
  readonly role: Role;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly principal: Principal;
}

/** HS256 token payload; `exp` and `iat` in epoch seconds. */
export interface JwtClaims {
  readonly sub: Principal;
  readonly role: Role;
  readonly iss: string;
  readonly exp: number;
  readonly iat: number;
}
