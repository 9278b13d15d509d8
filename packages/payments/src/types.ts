/**
 * Payment Types
 *
 * Every payment is one or more fee-skimmed legs from a sender. Payments
 * that cannot settle at once hold their funds in `payment:<id>`.
 *
 * Lifecycle of a held payment:
 *
 *   PENDING ─┬─ execute (due) / fulfill ──→ COMPLETED
 *            ├─ cancel (sender) ──────────→ CANCELLED  (refunded)
 *            ├─ expire (after deadline) ──→ FAILED     (refunded)
 *            └─ reject (verifier) ────────→ REFUNDED
 */

import type { EngineDeps, SettlementErrorCode } from "@ledgerline/ledger";
import type { Money, Principal } from "@ledgerline/types";

export type PaymentKind = "DIRECT" | "SCHEDULED" | "CONDITIONAL" | "RECURRING" | "SPLIT" | "BATCH";

export type PaymentStatus = "PENDING" | "COMPLETED" | "CANCELLED" | "FAILED" | "REFUNDED";

export interface PaymentLeg {
  readonly recipient: Principal;
  readonly gross: Money;
  readonly fee: Money;
  readonly net: Money;
}

// =============================================================================
// Conditions
// =============================================================================

/** Met once the clock reaches `notBefore`. */
export interface TimeCondition {
  readonly type: "time";
  readonly notBefore: string;
}

/** Met when at least `required` of `signers` have signed. */
export interface SignaturesCondition {
  readonly type: "signatures";
  readonly signers: readonly Principal[];
  readonly required: number;
}

/** Met while the presence checker reports something at `address`. */
export interface ContractPresenceCondition {
  readonly type: "contract-presence";
  readonly address: string;
}

/** Left to the verifier's judgment. */
export interface CustomCondition {
  readonly type: "custom";
  readonly description: string;
}

export type PaymentCondition =
  | TimeCondition
  | SignaturesCondition
  | ContractPresenceCondition
  | CustomCondition;

/** Evidence the verifier submits with fulfill(). */
export interface FulfillmentProof {
  /** Principals whose signatures were verified upstream. */
  readonly signatures?: readonly Principal[] | undefined;
  /** The verifier's verdict on a custom condition. */
  readonly approved?: boolean | undefined;
}

/**
 * Answers whether something exists at an external address. Supplied by
 * the host; the core never looks itself.
 */
export interface PresenceChecker {
  isPresent(address: string): boolean;
}

// =============================================================================
// Records
// =============================================================================

export interface Payment {
  readonly id: string;
  readonly kind: PaymentKind;
  readonly sender: Principal;
  readonly legs: readonly PaymentLeg[];
  /** Sum of the legs' gross amounts. */
  readonly total: Money;
  readonly feeBps: number;
  readonly status: PaymentStatus;
  readonly createdAt: string;
  readonly releaseAt?: string;
  readonly condition?: PaymentCondition;
  readonly verifier?: Principal;
  readonly deadline?: string;
  /** Recurring plan this installment belongs to, and its 1-based position. */
  readonly planId?: string;
  readonly sequence?: number;
  readonly refunded?: Money;
  readonly settledAt?: string;
}

export type RecurringPlanStatus = "ACTIVE" | "COMPLETED" | "CANCELLED";

export interface RecurringPlan {
  readonly id: string;
  readonly sender: Principal;
  readonly recipient: Principal;
  readonly amount: Money;
  readonly intervalMs: number;
  readonly count: number;
  readonly paymentIds: readonly string[];
  readonly status: RecurringPlanStatus;
  readonly createdAt: string;
}

/** A due payment that could not settle; it stays PENDING. */
export interface DueFailure {
  readonly paymentId: string;
  /** INTERNAL_ERROR when the failure was not a settlement error. */
  readonly code: SettlementErrorCode | "INTERNAL_ERROR";
  readonly message: string;
}

export interface DueExecution {
  readonly executed: readonly Payment[];
  readonly failed: readonly DueFailure[];
}

export interface ConditionalPaymentInput {
  readonly recipient: Principal;
  readonly amount: Money;
  readonly verifier: Principal;
  readonly condition: PaymentCondition;
  /** ISO 8601. Without one the payment never expires. */
  readonly deadline?: string | undefined;
}

export interface PaymentFilter {
  readonly sender?: Principal | undefined;
  readonly recipient?: Principal | undefined;
  readonly kind?: PaymentKind | undefined;
  readonly status?: PaymentStatus | undefined;
  readonly planId?: string | undefined;
}

export interface PaymentSchedulerConfig extends EngineDeps {
  readonly presence?: PresenceChecker | undefined;
}
