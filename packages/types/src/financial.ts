/**
 * Financial Types
 *
 * Core financial primitives for deterministic settlement.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit (the native currency is just another symbol)
 * - Journal entries are append-only by contract
 */

/**
 * Asset identifier.
 * The configured native currency symbol, or any fungible token identifier.
 */
export type Currency = string;

/**
 * A verified caller identity: account owner, wallet owner, escrow party.
 * How the identity was authenticated is outside the core.
 */
export type Principal = string;

/**
 * Identifier of a ledger account. Principals use their own identity;
 * custody accounts use a `<kind>:<entityId>` form (e.g. `escrow:escrow-1`).
 */
export type AccountId = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 */
export interface Money {
  /** String representation of the amount (e.g., "100.50", "1000000") */
  readonly amount: string;

  /** Asset identifier (e.g., "NATIVE", "GEM", "USDC") */
  readonly currency: Currency;

  /** Number of decimal places for this asset. */
  readonly decimals: number;
}

/**
 * Type of journal entry (double-entry accounting).
 */
export type LedgerEntryType = "debit" | "credit";

/**
 * A single line in the ledger journal.
 * Always part of a balanced batch (debits = credits per currency).
 */
export interface LedgerEntry {
  /** Unique entry identifier */
  readonly id: string;

  /** Which account this entry affects */
  readonly accountId: AccountId;

  /** Debit (value leaves the account) or credit (value enters it) */
  readonly type: LedgerEntryType;

  /** The amount */
  readonly money: Money;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** The atomic batch this line was committed in */
  readonly batchId: string;

  /** Groups related batches (usually the settling entity's id) */
  readonly correlationId: string;

  /** Free-form label of what caused the batch */
  readonly memo?: string | undefined;
}
