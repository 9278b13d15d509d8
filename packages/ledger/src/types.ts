/**
 * @ledgerline/ledger — Internal types for the account ledger.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of committed entries
 * - Fail-closed: an invalid batch throws, nothing is applied
 */

import type {
  AccountId,
  Clock,
  Currency,
  DomainEventSink,
  IdGenerator,
  LedgerEntry,
  Money,
  Principal,
} from "@ledgerline/types";
import type { AccountLedger } from "./account-ledger.js";
import type { FeePolicy } from "./fee-policy.js";

// ─── Accounts ────────────────────────────────────────────────────────────

/**
 * What an account represents.
 *
 * - principal: a participant's own balances
 * - custody: value held by a settlement entity (escrow, wallet, auction, payment)
 * - platform: the fee account
 * - external: the world outside the ledger (deposit source, withdrawal sink)
 */
export type AccountKind = "principal" | "custody" | "platform" | "external";

/** Entity kinds that hold value in custody accounts. */
export type CustodyKind = "escrow" | "wallet" | "auction" | "payment";

export interface LedgerAccount {
  readonly id: AccountId;
  readonly kind: AccountKind;
  readonly createdAt: string;
}

/** A registered asset and its fixed number of decimals. */
export interface AssetDefinition {
  readonly currency: Currency;
  readonly decimals: number;
}

// ─── Batches ─────────────────────────────────────────────────────────────

/** One value movement inside an atomic batch. */
export interface Movement {
  readonly from: AccountId;
  readonly to: AccountId;
  readonly money: Money;
}

export interface BatchOptions {
  /** Principal whose call caused the batch. Defaults to "system". */
  readonly actor?: Principal | undefined;
  readonly memo?: string | undefined;
}

/** Result of a committed batch. */
export interface BatchResult {
  readonly batchId: string;
  readonly correlationId: string;
  readonly entries: readonly LedgerEntry[];
  readonly timestamp: string;
}

/**
 * How a fee-skimmed amount was split.
 * Invariant: net + fee = gross.
 */
export interface FeeSplit {
  readonly gross: Money;
  readonly fee: Money;
  readonly net: Money;
  readonly feeBps: number;
}

/** Movements of a fee-skimmed transfer, not yet applied. */
export interface PlannedFeeTransfer extends FeeSplit {
  readonly movements: readonly Movement[];
}

export interface FeeTransferResult extends FeeSplit {
  readonly batch: BatchResult;
}

// ─── Configuration ───────────────────────────────────────────────────────

export interface LedgerConfig {
  readonly clock: Clock;
  readonly ids: IdGenerator;
  /** Native currency symbol. Default "NATIVE". */
  readonly nativeCurrency?: Currency | undefined;
  /** Native currency decimals. Default 6. */
  readonly nativeDecimals?: number | undefined;
  /** Account that receives platform fees. Default "platform:fees". */
  readonly platformAccount?: AccountId | undefined;
  readonly fees?: FeePolicy | undefined;
  readonly events?: DomainEventSink | undefined;
}

// ─── Engines ─────────────────────────────────────────────────────────────

/** Default platform fee charged on settlements: 250 bps (2.5%). */
export const DEFAULT_FEE_BPS = 250;

/**
 * Collaborators shared by every settlement engine.
 */
export interface EngineDeps {
  readonly ledger: AccountLedger;
  readonly clock: Clock;
  readonly ids: IdGenerator;
  readonly events?: DomainEventSink | undefined;
  /** Fee rate for settlements that do not name one. Default 250. */
  readonly feeBps?: number | undefined;
}

// ─── Balances ────────────────────────────────────────────────────────────

export interface AccountBalances {
  readonly accountId: AccountId;
  readonly balances: readonly Money[];
}

/** A cached balance that disagrees with a replay of the journal. */
export interface BalanceDiscrepancy {
  readonly accountId: AccountId;
  readonly currency: Currency;
  readonly cached: string;
  readonly replayed: string;
}

export interface JournalVerification {
  readonly consistent: boolean;
  readonly discrepancies: readonly BalanceDiscrepancy[];
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the ledger.
 * Restoring replays every batch, preserving full validation.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly assets: readonly AssetDefinition[];
  readonly accounts: readonly LedgerAccount[];
  readonly entries: readonly LedgerEntry[];
  readonly createdAt: string;
}

// ─── Query Types ─────────────────────────────────────────────────────────

export interface EntryFilter {
  readonly accountId?: AccountId | undefined;
  readonly correlationId?: string | undefined;
  readonly batchId?: string | undefined;
  readonly currency?: Currency | undefined;
  readonly fromTimestamp?: string | undefined;
  readonly toTimestamp?: string | undefined;
}

// ─── Journal Replay ──────────────────────────────────────────────────────

/** Per-currency totals over a set of journal lines. */
export interface TrialBalanceLine {
  readonly currency: string;
  readonly decimals: number;
  readonly totalDebits: string;
  readonly totalCredits: string;
}

export interface TrialBalance {
  readonly lines: readonly TrialBalanceLine[];
  readonly generatedAt: string;
  /** True when debits equal credits in every currency. */
  readonly balanced: boolean;
}

/** Balances indexed by account, then currency, in base units. */
export type BalanceTable = Map<AccountId, Map<Currency, bigint>>;
