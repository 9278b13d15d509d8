/**
 * Escrow Types
 *
 * A buyer locks funds for a seller until release, refund, expiry
 * or an arbiter's resolution.
 *
 * Lifecycle:
 *
 *   create → FUNDED ─┬─ release (buyer) ────────→ RELEASED
 *                    ├─ refund (seller) ────────→ REFUNDED
 *                    ├─ claimExpired (buyer) ───→ REFUNDED
 *                    └─ dispute (buyer|seller) ─→ DISPUTED ── resolve (arbiter) → RESOLVED
 */

import type { EngineDeps } from "@ledgerline/ledger";
import type { Money, Principal } from "@ledgerline/types";

/**
 * CREATED is never observable: creation funds the escrow in the same step.
 */
export type EscrowStatus =
  | "CREATED"
  | "FUNDED"
  | "RELEASED"
  | "REFUNDED"
  | "DISPUTED"
  | "RESOLVED";

export type EscrowParty = "buyer" | "seller";

/** How the escrowed amount left custody. */
export interface EscrowSettlement {
  readonly recipient: Principal;
  readonly net: Money;
  readonly fee: Money;
}

export interface Escrow {
  readonly id: string;
  readonly buyer: Principal;
  readonly seller: Principal;
  readonly arbiter: Principal;
  readonly amount: Money;
  readonly feeBps: number;
  readonly status: EscrowStatus;
  readonly createdAt: string;
  readonly expiresAt: string;
  readonly disputedBy?: Principal;
  readonly resolution?: EscrowParty;
  readonly settlement?: EscrowSettlement;
  readonly settledAt?: string;
}

export interface CreateEscrowInput {
  readonly seller: Principal;
  readonly amount: Money;
  /** Absolute expiry (ISO 8601). Exactly one of expiresAt / ttlMs. */
  readonly expiresAt?: string | undefined;
  /** Expiry relative to now, in milliseconds. */
  readonly ttlMs?: number | undefined;
  /** Defaults to the engine's arbiter. */
  readonly arbiter?: Principal | undefined;
}

export interface EscrowFilter {
  /** Escrows where this principal is buyer, seller or arbiter. */
  readonly party?: Principal | undefined;
  readonly status?: EscrowStatus | undefined;
}

export interface EscrowEngineConfig extends EngineDeps {
  /** Arbiter for escrows that do not name one. Default "arbiter". */
  readonly arbiter?: Principal | undefined;
}
