/**
 * Multi-sig Wallet Manager
 *
 * Rules:
 * - Owners are unique; 1 ≤ threshold ≤ owners
 * - Only owners propose, confirm, revoke and execute
 * - Only confirmations of CURRENT owners count towards the threshold
 * - A transaction executes at most once; the executed flag is set and
 *   custody debited before any call target runs
 * - A failing call target leaves the debit in place (CALL_FAILED)
 * - The admin manages owners directly; owners can do the same through
 *   governance commands
 */

import {
  AuthorizationError,
  custodyAccountId,
  EventRecorder,
  ExternalCallFailedError,
  formatAmount,
  fromBaseUnits,
  InsufficientFundsError,
  NotFoundError,
  StateError,
  ThresholdError,
  toBaseUnits,
  toIso,
  toPositiveBaseUnits,
  ValidationError,
  zeroMoney,
} from "@ledgerline/ledger";
import type { AccountLedger, Movement } from "@ledgerline/ledger";
import type { Currency, Money, Principal } from "@ledgerline/types";
import { CallTargetRegistry } from "./call-targets.js";
import type {
  GovernanceCommand,
  MultiSigConfig,
  MultiSigWallet,
  PendingTransaction,
  TransactionFilter,
  TransactionState,
  WalletCommand,
} from "./types.js";

// =============================================================================
// Helpers
// =============================================================================

function isGovernance(command: WalletCommand): command is GovernanceCommand {
  return command.kind === "add-owner" || command.kind === "remove-owner" || command.kind === "change-threshold";
}

function stateOf(tx: PendingTransaction): TransactionState {
  if (tx.executed) return "executed";
  if (tx.cancelled) return "cancelled";
  return "pending";
}

function describeFailure(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

// =============================================================================
// Manager
// =============================================================================

export class MultiSigWalletManager {
  private readonly wallets: Map<string, MultiSigWallet> = new Map();
  /** Keyed by `<walletId>/<txId>`. */
  private readonly transactions: Map<string, PendingTransaction> = new Map();
  private readonly ledger: AccountLedger;
  private readonly config: MultiSigConfig;
  private readonly events: EventRecorder;
  readonly callTargets: CallTargetRegistry;

  constructor(config: MultiSigConfig) {
    this.config = config;
    this.ledger = config.ledger;
    this.callTargets = config.callTargets ?? new CallTargetRegistry();
    this.events = new EventRecorder("multisig", {
      clock: config.clock,
      ids: config.ids,
      sink: config.events,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Wallets
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create a wallet. The caller becomes its admin but not an owner
   * unless listed.
   */
  createWallet(caller: Principal, owners: readonly Principal[], threshold: number): MultiSigWallet {
    this.ledger.assertPrincipal(caller, "Admin");
    if (owners.length === 0) {
      throw new ValidationError("INVALID_OWNER", "A wallet needs at least one owner");
    }
    const seen = new Set<Principal>();
    for (const owner of owners) {
      this.assertOwnerId(owner);
      if (seen.has(owner)) {
        throw new ValidationError("DUPLICATE_OWNER", `Owner "${owner}" is listed twice`, { owner });
      }
      seen.add(owner);
    }
    this.assertThreshold(threshold, owners.length);

    const id = this.config.ids.next("wallet");
    const wallet: MultiSigWallet = {
      id,
      owners: [...owners],
      threshold,
      admin: caller,
      status: "ACTIVE",
      txCount: 0,
      createdAt: toIso(this.config.clock.now()),
    };
    this.wallets.set(id, wallet);

    this.events.record("wallet", id, "created", caller, {
      owners: wallet.owners,
      threshold,
      admin: caller,
    });
    return wallet;
  }

  /** Move the caller's funds into the wallet's custody. */
  deposit(walletId: string, caller: Principal, money: Money): Money {
    const wallet = this.requireActive(walletId);
    this.ledger.assertPrincipal(caller, "Depositor");
    const custody = custodyAccountId("wallet", wallet.id);

    const batch = this.ledger.applyBatch(wallet.id, [{ from: caller, to: custody, money }], {
      actor: caller,
      memo: "wallet.deposit",
    });
    const credited = batch.entries[1]?.money ?? money;

    this.events.record("wallet", wallet.id, "deposited", caller, {
      from: caller,
      amount: credited.amount,
      currency: credited.currency,
    });
    return this.ledger.getBalance(custody, money.currency);
  }

  addOwner(walletId: string, caller: Principal, owner: Principal): MultiSigWallet {
    const wallet = this.requireActive(walletId);
    this.assertAdmin(wallet, caller, "add owners to");
    return this.applyGovernance(wallet, { kind: "add-owner", owner }, caller);
  }

  removeOwner(walletId: string, caller: Principal, owner: Principal): MultiSigWallet {
    const wallet = this.requireActive(walletId);
    this.assertAdmin(wallet, caller, "remove owners from");
    return this.applyGovernance(wallet, { kind: "remove-owner", owner }, caller);
  }

  changeThreshold(walletId: string, caller: Principal, threshold: number): MultiSigWallet {
    const wallet = this.requireActive(walletId);
    this.assertAdmin(wallet, caller, "change the threshold of");
    return this.applyGovernance(wallet, { kind: "change-threshold", threshold }, caller);
  }

  /**
   * Deactivate a wallet. Custody must be empty; open transactions are
   * cancelled.
   */
  deactivateWallet(walletId: string, caller: Principal): MultiSigWallet {
    const wallet = this.requireActive(walletId);
    this.assertAdmin(wallet, caller, "deactivate");

    const held = this.ledger
      .getBalances(custodyAccountId("wallet", wallet.id))
      .balances.filter((b) => toBaseUnits(b) > 0n);
    if (held.length > 0) {
      throw new StateError("INVALID_TRANSITION", `Wallet '${wallet.id}' still holds funds`, {
        walletId: wallet.id,
        balances: held.map((b) => `${b.amount} ${b.currency}`),
      });
    }

    for (const tx of this.listTransactions(wallet.id, { state: "pending" })) {
      this.storeTransaction({ ...tx, cancelled: true });
      this.recordTransaction(tx, "cancelled", caller, {});
    }

    const updated: MultiSigWallet = { ...wallet, status: "DEACTIVATED" };
    this.wallets.set(wallet.id, updated);
    this.events.record("wallet", wallet.id, "deactivated", caller, {});
    return updated;
  }

  getWallet(walletId: string): MultiSigWallet {
    const wallet = this.wallets.get(walletId);
    if (!wallet) {
      throw new NotFoundError(`Wallet '${walletId}' not found`, { walletId });
    }
    return wallet;
  }

  listWallets(owner?: Principal): readonly MultiSigWallet[] {
    const all = [...this.wallets.values()];
    return owner === undefined ? all : all.filter((w) => w.owners.includes(owner) || w.admin === owner);
  }

  getWalletBalance(walletId: string, currency?: Currency): Money {
    const wallet = this.getWallet(walletId);
    return this.ledger.getBalance(custodyAccountId("wallet", wallet.id), currency ?? this.ledger.nativeCurrency);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transactions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Propose a transaction. The creator's confirmation is recorded
   * immediately.
   */
  proposeTransaction(
    walletId: string,
    caller: Principal,
    command: WalletCommand,
    value?: Money,
  ): PendingTransaction {
    const wallet = this.requireActive(walletId);
    this.assertOwner(wallet, caller, "propose transactions for");
    const amount = this.checkCommand(wallet, command, value);

    const id = String(wallet.txCount + 1);
    this.wallets.set(wallet.id, { ...wallet, txCount: wallet.txCount + 1 });

    const tx: PendingTransaction = {
      id,
      walletId: wallet.id,
      creator: caller,
      command,
      value: amount,
      confirmations: [caller],
      executed: false,
      cancelled: false,
      createdAt: toIso(this.config.clock.now()),
    };
    this.storeTransaction(tx);

    this.recordTransaction(tx, "proposed", caller, {
      command: command.kind,
      value: amount.amount,
      currency: amount.currency,
    });
    return tx;
  }

  confirm(walletId: string, txId: string, caller: Principal): PendingTransaction {
    const wallet = this.requireActive(walletId);
    this.assertOwner(wallet, caller, "confirm transactions of");
    const tx = this.requirePending(wallet, txId, "confirm");
    if (tx.confirmations.includes(caller)) {
      throw new StateError("ALREADY_CONFIRMED", `Owner "${caller}" already confirmed transaction ${txId}`, {
        walletId,
        txId,
      });
    }

    const updated: PendingTransaction = { ...tx, confirmations: [...tx.confirmations, caller] };
    this.storeTransaction(updated);
    this.recordTransaction(updated, "confirmed", caller, { owner: caller });
    return updated;
  }

  revokeConfirmation(walletId: string, txId: string, caller: Principal): PendingTransaction {
    const wallet = this.requireActive(walletId);
    this.assertOwner(wallet, caller, "revoke confirmations of");
    const tx = this.requirePending(wallet, txId, "revoke a confirmation of");
    if (!tx.confirmations.includes(caller)) {
      throw new StateError("NOT_CONFIRMED", `Owner "${caller}" has not confirmed transaction ${txId}`, {
        walletId,
        txId,
      });
    }

    const updated: PendingTransaction = {
      ...tx,
      confirmations: tx.confirmations.filter((owner) => owner !== caller),
    };
    this.storeTransaction(updated);
    this.recordTransaction(updated, "revoked", caller, { owner: caller });
    return updated;
  }

  /**
   * Execute a confirmed transaction.
   *
   * The executed flag is stored and custody debited before a forward
   * target is invoked, so a re-entrant execute fails with
   * INVALID_TRANSITION and sees the debited balance.
   */
  execute(walletId: string, txId: string, caller: Principal): PendingTransaction {
    const wallet = this.requireActive(walletId);
    this.assertOwner(wallet, caller, "execute transactions of");
    const tx = this.requirePending(wallet, txId, "execute");

    const confirmed = this.confirmationCount(wallet, tx);
    if (confirmed < wallet.threshold) {
      throw new ThresholdError(
        "THRESHOLD_NOT_MET",
        `Transaction ${txId} has ${String(confirmed)} of ${String(wallet.threshold)} required confirmations`,
        { walletId, txId, confirmations: confirmed, threshold: wallet.threshold },
      );
    }

    const command = tx.command;
    if (isGovernance(command)) {
      this.checkGovernance(wallet, command);
      const executed = this.markExecuted(tx);
      this.applyGovernance(wallet, command, caller);
      this.recordTransaction(executed, "executed", caller, { outcome: "SUCCEEDED" });
      return executed;
    }

    const destination = command.kind === "transfer" ? command.to : command.target;
    const target = command.kind === "forward" ? this.callTargets.resolve(command.target) : undefined;
    const movement: Movement = { from: custodyAccountId("wallet", wallet.id), to: destination, money: tx.value };
    this.assertCustody(wallet, tx.value);
    this.ledger.validateBatch([movement]);

    // Effects before interaction.
    const executed = this.markExecuted(tx);
    this.ledger.applyBatch(`${wallet.id}:${tx.id}`, [movement], { actor: caller, memo: `wallet.${command.kind}` });

    if (target !== undefined && command.kind === "forward") {
      try {
        target(command.data, tx.value, { walletId: wallet.id, txId: tx.id, caller });
      } catch (cause) {
        const failureReason = describeFailure(cause);
        const failed: PendingTransaction = { ...executed, outcome: "CALL_FAILED", failureReason };
        this.storeTransaction(failed);
        this.recordTransaction(failed, "executed", caller, { outcome: "CALL_FAILED", failureReason });
        throw new ExternalCallFailedError(
          `Call to "${command.target}" failed for transaction ${txId}: ${failureReason}`,
          cause,
          { walletId, txId, target: command.target },
        );
      }
    }

    const final = this.getTransaction(wallet.id, tx.id);
    this.recordTransaction(final, "executed", caller, { outcome: "SUCCEEDED" });
    return final;
  }

  /** Creator or admin withdraws a transaction that has not executed. */
  cancel(walletId: string, txId: string, caller: Principal): PendingTransaction {
    const wallet = this.getWallet(walletId);
    const tx = this.requirePending(wallet, txId, "cancel");
    if (caller !== tx.creator && caller !== wallet.admin) {
      throw new AuthorizationError(`Only the creator or the admin can cancel transaction ${txId}`, {
        walletId,
        txId,
        caller,
      });
    }

    const updated: PendingTransaction = { ...tx, cancelled: true };
    this.storeTransaction(updated);
    this.recordTransaction(updated, "cancelled", caller, {});
    return updated;
  }

  getTransaction(walletId: string, txId: string): PendingTransaction {
    const tx = this.transactions.get(`${walletId}/${txId}`);
    if (!tx) {
      throw new NotFoundError(`Transaction ${txId} not found in wallet '${walletId}'`, { walletId, txId });
    }
    return tx;
  }

  listTransactions(walletId: string, filter?: TransactionFilter): readonly PendingTransaction[] {
    this.getWallet(walletId);
    return [...this.transactions.values()].filter(
      (tx) => tx.walletId === walletId && (filter?.state === undefined || stateOf(tx) === filter.state),
    );
  }

  /** Confirmations from principals who are owners right now. */
  confirmationCount(wallet: MultiSigWallet, tx: PendingTransaction): number {
    return tx.confirmations.filter((owner) => wallet.owners.includes(owner)).length;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Validate a command and its value at proposal time. Returns the value
   * to store: zero for governance commands.
   */
  private checkCommand(wallet: MultiSigWallet, command: WalletCommand, value: Money | undefined): Money {
    if (isGovernance(command)) {
      if (value !== undefined && toBaseUnits(value) !== 0n) {
        throw new ValidationError("INVALID_COMMAND", `A ${command.kind} command carries no value`);
      }
      this.checkGovernance(wallet, command);
      return value ?? zeroMoney(this.ledger.nativeCurrency, this.ledger.nativeDecimals);
    }

    switch (command.kind) {
      case "transfer":
        this.ledger.assertPrincipal(command.to, "Recipient");
        break;
      case "forward":
        this.ledger.assertPrincipal(command.target, "Call target");
        this.callTargets.resolve(command.target);
        break;
    }

    if (value === undefined) {
      throw new ValidationError("INVALID_COMMAND", `A ${command.kind} command needs a value`);
    }
    const units = toPositiveBaseUnits(value, "Transaction value");
    const normalized = fromBaseUnits(units, value.currency, value.decimals);
    this.assertCustody(wallet, normalized);
    return normalized;
  }

  private checkGovernance(wallet: MultiSigWallet, command: GovernanceCommand): void {
    switch (command.kind) {
      case "add-owner":
        this.assertOwnerId(command.owner);
        if (wallet.owners.includes(command.owner)) {
          throw new StateError("ALREADY_OWNER", `"${command.owner}" already owns wallet '${wallet.id}'`, {
            walletId: wallet.id,
            owner: command.owner,
          });
        }
        return;
      case "remove-owner":
        if (!wallet.owners.includes(command.owner)) {
          throw new ValidationError("INVALID_OWNER", `"${command.owner}" does not own wallet '${wallet.id}'`, {
            walletId: wallet.id,
            owner: command.owner,
          });
        }
        if (wallet.owners.length - 1 < wallet.threshold) {
          throw new ThresholdError(
            "THRESHOLD_EXCEEDS_OWNERS",
            `Removing "${command.owner}" would leave fewer owners than the threshold of ${String(wallet.threshold)}`,
            { walletId: wallet.id, owners: wallet.owners.length, threshold: wallet.threshold },
          );
        }
        return;
      case "change-threshold":
        this.assertThreshold(command.threshold, wallet.owners.length);
        return;
    }
  }

  private applyGovernance(wallet: MultiSigWallet, command: GovernanceCommand, actor: Principal): MultiSigWallet {
    this.checkGovernance(wallet, command);
    const current = this.getWallet(wallet.id);

    let updated: MultiSigWallet;
    switch (command.kind) {
      case "add-owner":
        updated = { ...current, owners: [...current.owners, command.owner] };
        this.wallets.set(wallet.id, updated);
        this.events.record("wallet", wallet.id, "owner-added", actor, { owner: command.owner });
        break;
      case "remove-owner":
        updated = { ...current, owners: current.owners.filter((o) => o !== command.owner) };
        this.wallets.set(wallet.id, updated);
        this.events.record("wallet", wallet.id, "owner-removed", actor, { owner: command.owner });
        break;
      case "change-threshold":
        updated = { ...current, threshold: command.threshold };
        this.wallets.set(wallet.id, updated);
        this.events.record("wallet", wallet.id, "threshold-changed", actor, { threshold: command.threshold });
        break;
    }
    return updated;
  }

  private markExecuted(tx: PendingTransaction): PendingTransaction {
    const executed: PendingTransaction = {
      ...tx,
      executed: true,
      outcome: "SUCCEEDED",
      executedAt: toIso(this.config.clock.now()),
    };
    this.storeTransaction(executed);
    return executed;
  }

  private assertCustody(wallet: MultiSigWallet, value: Money): void {
    const custody = custodyAccountId("wallet", wallet.id);
    const available = this.ledger.balanceUnits(custody, value.currency);
    const required = toBaseUnits(value);
    if (available < required) {
      throw new InsufficientFundsError(
        `Wallet '${wallet.id}' holds ${formatAmount(available, value.decimals)} ${value.currency}, needs ${value.amount}`,
        {
          accountId: custody,
          currency: value.currency,
          available: formatAmount(available, value.decimals),
          required: formatAmount(required, value.decimals),
        },
      );
    }
  }

  private assertThreshold(threshold: number, ownerCount: number): void {
    if (!Number.isInteger(threshold) || threshold < 1 || threshold > ownerCount) {
      throw new ValidationError(
        "INVALID_THRESHOLD",
        `Threshold must be an integer between 1 and ${String(ownerCount)}, got ${String(threshold)}`,
      );
    }
  }

  private assertOwnerId(owner: Principal): void {
    if (typeof owner !== "string" || owner.length === 0 || owner.trim() !== owner) {
      throw new ValidationError("INVALID_OWNER", `Invalid owner: "${String(owner)}"`);
    }
    this.ledger.assertPrincipal(owner, "Owner");
  }

  private requireActive(walletId: string): MultiSigWallet {
    const wallet = this.getWallet(walletId);
    if (wallet.status !== "ACTIVE") {
      throw new StateError("WALLET_INACTIVE", `Wallet '${walletId}' is deactivated`, { walletId });
    }
    return wallet;
  }

  private requirePending(wallet: MultiSigWallet, txId: string, action: string): PendingTransaction {
    const tx = this.getTransaction(wallet.id, txId);
    if (tx.executed || tx.cancelled) {
      throw new StateError(
        "INVALID_TRANSITION",
        `Cannot ${action} transaction ${txId}: it is already ${stateOf(tx)}`,
        { walletId: wallet.id, txId, state: stateOf(tx) },
      );
    }
    return tx;
  }

  private assertOwner(wallet: MultiSigWallet, caller: Principal, action: string): void {
    if (!wallet.owners.includes(caller)) {
      throw new AuthorizationError(`Only owners can ${action} wallet '${wallet.id}'`, {
        walletId: wallet.id,
        caller,
      });
    }
  }

  private assertAdmin(wallet: MultiSigWallet, caller: Principal, action: string): void {
    if (caller !== wallet.admin) {
      throw new AuthorizationError(`Only the admin can ${action} wallet '${wallet.id}'`, {
        walletId: wallet.id,
        caller,
      });
    }
  }

  private storeTransaction(tx: PendingTransaction): void {
    this.transactions.set(`${tx.walletId}/${tx.id}`, tx);
  }

  private recordTransaction(
    tx: PendingTransaction,
    action: string,
    actor: Principal,
    payload: Readonly<Record<string, unknown>>,
  ): void {
    this.events.record("transaction", `${tx.walletId}:${tx.id}`, action, actor, {
      walletId: tx.walletId,
      txId: tx.id,
      ...payload,
    });
  }
}
