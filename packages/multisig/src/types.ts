/**
 * Multi-sig Types
 *
 * An N-of-M wallet holds funds in a `wallet:<id>` custody account.
 * Owners propose transactions, confirm them, and any owner executes one
 * once the confirmations of current owners reach the threshold.
 *
 * Transaction lifecycle:
 *
 *   propose → pending ─┬─ execute → executed (SUCCEEDED | CALL_FAILED)
 *                      └─ cancel  → cancelled
 */

import type { EngineDeps } from "@ledgerline/ledger";
import type { AccountId, Money, Principal } from "@ledgerline/types";
import type { CallTargetRegistry } from "./call-targets.js";

export type WalletStatus = "ACTIVE" | "DEACTIVATED";

export interface MultiSigWallet {
  readonly id: string;
  readonly owners: readonly Principal[];
  readonly threshold: number;
  readonly admin: Principal;
  readonly status: WalletStatus;
  /** Number of transactions ever proposed; the next id is txCount + 1. */
  readonly txCount: number;
  readonly createdAt: string;
}

// =============================================================================
// Commands
// =============================================================================

/** Pay `to` from custody, inside the ledger. */
export interface TransferCommand {
  readonly kind: "transfer";
  readonly to: AccountId;
}

export interface AddOwnerCommand {
  readonly kind: "add-owner";
  readonly owner: Principal;
}

export interface RemoveOwnerCommand {
  readonly kind: "remove-owner";
  readonly owner: Principal;
}

export interface ChangeThresholdCommand {
  readonly kind: "change-threshold";
  readonly threshold: number;
}

/**
 * Opaque pass-through. The value is credited to `target`, then the
 * registered call target is invoked with `data`.
 */
export interface ForwardCommand {
  readonly kind: "forward";
  readonly target: AccountId;
  readonly data: string;
}

export type WalletCommand =
  | TransferCommand
  | AddOwnerCommand
  | RemoveOwnerCommand
  | ChangeThresholdCommand
  | ForwardCommand;

export type GovernanceCommand = AddOwnerCommand | RemoveOwnerCommand | ChangeThresholdCommand;

// =============================================================================
// Transactions
// =============================================================================

export type TransactionOutcome = "SUCCEEDED" | "CALL_FAILED";

export type TransactionState = "pending" | "executed" | "cancelled";

export interface PendingTransaction {
  /** Sequence number within the wallet ("1", "2", ...). */
  readonly id: string;
  readonly walletId: string;
  readonly creator: Principal;
  readonly command: WalletCommand;
  /** Zero for governance commands. */
  readonly value: Money;
  readonly confirmations: readonly Principal[];
  readonly executed: boolean;
  readonly cancelled: boolean;
  readonly outcome?: TransactionOutcome;
  readonly failureReason?: string;
  readonly createdAt: string;
  readonly executedAt?: string;
}

export interface TransactionFilter {
  readonly state?: TransactionState | undefined;
}

// =============================================================================
// Call targets
// =============================================================================

export interface CallContext {
  readonly walletId: string;
  readonly txId: string;
  /** The owner who executed the transaction. */
  readonly caller: Principal;
}

/**
 * Handler for a forward destination. Throwing marks the transaction
 * CALL_FAILED; the custody debit stays.
 */
export type CallTarget = (data: string, value: Money, context: CallContext) => void;

export interface MultiSigConfig extends EngineDeps {
  readonly callTargets?: CallTargetRegistry | undefined;
}
