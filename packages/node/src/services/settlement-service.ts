/**
 * SettlementService — Composition root for all domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. Every engine shares one ledger, clock and id
 * generator, and publishes its domain events into one event store.
 */

import {
  AccountLedger,
  AuthorizationError,
  DEFAULT_FEE_BPS,
  FeePolicy,
  SequentialIdGenerator,
  SystemClock,
} from "@ledgerline/ledger";
import type {
  AccountBalances,
  FeeTransferResult,
  JournalVerification,
} from "@ledgerline/ledger";
import { EscrowEngine } from "@ledgerline/escrow";
import type { CreateEscrowInput, Escrow, EscrowFilter, EscrowParty } from "@ledgerline/escrow";
import { CallTargetRegistry, MultiSigWalletManager } from "@ledgerline/multisig";
import type {
  MultiSigWallet,
  PendingTransaction,
  TransactionFilter,
  WalletCommand,
} from "@ledgerline/multisig";
import {
  DutchAuctionEngine,
  EnglishAuctionEngine,
  InMemoryItemRegistry,
} from "@ledgerline/auctions";
import type {
  AuctionFilter,
  Bid,
  CreateAuctionInput,
  CreateDutchAuctionInput,
  DutchAuction,
  DutchAuctionFilter,
  DutchPurchase,
  EnglishAuction,
} from "@ledgerline/auctions";
import { PaymentScheduler } from "@ledgerline/payments";
import type {
  ConditionalPaymentInput,
  DueExecution,
  FulfillmentProof,
  Payment,
  PaymentFilter,
  PresenceChecker,
  RecurringPlan,
} from "@ledgerline/payments";
import { createSettlementCatalog, InMemoryEventStore } from "@ledgerline/event-store";
import type {
  EventCatalog,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  ReadOptions,
} from "@ledgerline/event-store";
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
import type { Logger } from "pino";

// =============================================================================
// Configuration
// =============================================================================

export interface SettlementServiceConfig {
  readonly nativeCurrency?: Currency | undefined;
  readonly nativeDecimals?: number | undefined;
  /** Platform fee applied by every engine. Default 250 bps. */
  readonly feeBps?: number | undefined;
  readonly maxFeeBps?: number | undefined;
  readonly platformAccount?: AccountId | undefined;
  /** Arbiter for escrows that do not name one. */
  readonly arbiter?: Principal | undefined;
  readonly clock?: Clock | undefined;
  readonly ids?: IdGenerator | undefined;
  readonly logger?: Logger | undefined;
  readonly presence?: PresenceChecker | undefined;
  readonly callTargets?: CallTargetRegistry | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class SettlementService {
  readonly clock: Clock;
  readonly ledger: AccountLedger;
  readonly escrows: EscrowEngine;
  readonly wallets: MultiSigWalletManager;
  readonly auctions: EnglishAuctionEngine;
  readonly dutchAuctions: DutchAuctionEngine;
  readonly payments: PaymentScheduler;
  readonly items: InMemoryItemRegistry;
  readonly eventStore: InMemoryEventStore;
  readonly catalog: EventCatalog;
  readonly feeBps: number;

  private readonly _logger: Logger | undefined;
  private _ready = false;

  constructor(config: SettlementServiceConfig = {}) {
    this._logger = config.logger;
    this.clock = config.clock ?? new SystemClock();
    const ids = config.ids ?? new SequentialIdGenerator();

    this.eventStore = new InMemoryEventStore({
      clock: this.clock,
      onSubscriberError: (error, stored) => {
        this._logger?.warn(
          { err: error, type: stored.event.type, streamId: stored.streamId },
          "Event subscriber failed",
        );
      },
    });

    this.catalog = createSettlementCatalog();

    const sink: DomainEventSink = {
      publish: (streamId, event) => {
        const check = this.catalog.check(event.type, event.payload);
        if (!check.ok) {
          this._logger?.warn({ streamId, type: event.type, reason: check.reason }, "Event failed catalog check");
        }
        this.eventStore.append(streamId, [event]);
        this._logger?.debug(
          { streamId, type: event.type, eventId: event.metadata.eventId },
          "Domain event stored",
        );
      },
    };

    const fees = new FeePolicy(config.maxFeeBps);
    this.feeBps = fees.clamp(config.feeBps ?? DEFAULT_FEE_BPS);
    this.ledger = new AccountLedger({
      clock: this.clock,
      ids,
      nativeCurrency: config.nativeCurrency,
      nativeDecimals: config.nativeDecimals,
      platformAccount: config.platformAccount,
      fees,
      events: sink,
    });

    const deps = { ledger: this.ledger, clock: this.clock, ids, events: sink, feeBps: this.feeBps };
    this.items = new InMemoryItemRegistry();
    this.escrows = new EscrowEngine({ ...deps, arbiter: config.arbiter });
    this.wallets = new MultiSigWalletManager({ ...deps, callTargets: config.callTargets });
    this.auctions = new EnglishAuctionEngine({ ...deps, items: this.items });
    this.dutchAuctions = new DutchAuctionEngine({ ...deps, items: this.items });
    this.payments = new PaymentScheduler({ ...deps, presence: config.presence });

    this._ready = true;
  }

  // ─── Accounts ──────────────────────────────────────────────────────

  /** Credit value entering the platform. */
  deposit(caller: Principal, account: AccountId, amount: Money): AccountBalances {
    this.ledger.assertPrincipal(account, "Account");
    this.ledger.deposit(account, amount, { actor: caller });
    return this.ledger.getBalances(account);
  }

  /** The caller takes value out of their own account. */
  withdraw(caller: Principal, amount: Money): AccountBalances {
    this.ledger.assertPrincipal(caller, "Caller");
    this.ledger.withdraw(caller, amount, { actor: caller });
    return this.ledger.getBalances(caller);
  }

  getBalance(account: AccountId, currency?: Currency): AccountBalances {
    if (currency !== undefined) {
      return { accountId: account, balances: [this.ledger.getBalance(account, currency)] };
    }
    return this.ledger.getBalances(account);
  }

  transferWithFee(caller: Principal, to: AccountId, amount: Money): FeeTransferResult {
    this.ledger.assertPrincipal(caller, "Sender");
    this.ledger.assertPrincipal(to, "Recipient");
    return this.ledger.transferWithFee(caller, to, amount, this.feeBps, { actor: caller });
  }

  getEntries(account: AccountId, currency?: Currency): readonly LedgerEntry[] {
    return this.ledger.getEntries({ accountId: account, currency });
  }

  verifyJournal(): JournalVerification {
    return this.ledger.verifyJournal();
  }

  // ─── Items ─────────────────────────────────────────────────────────

  /** Claim an unowned item for the caller. An item held by a running auction cannot be re-registered. */
  registerItem(caller: Principal, itemRef: string): { itemRef: string; owner: Principal } {
    this.ledger.assertPrincipal(caller, "Owner");
    const owner = this.items.ownerOf(itemRef);
    if (owner !== undefined && owner !== caller) {
      throw new AuthorizationError(`Item '${itemRef}' is owned by "${owner}"`, { itemRef, owner });
    }
    this.items.register(itemRef, caller);
    return { itemRef, owner: caller };
  }

  itemsOf(owner: Principal): readonly string[] {
    return this.items.itemsOf(owner);
  }

  // ─── Escrow ────────────────────────────────────────────────────────

  createEscrow(caller: Principal, input: CreateEscrowInput): Escrow {
    return this.escrows.create(caller, input);
  }

  releaseEscrow(caller: Principal, id: string): Escrow {
    return this.escrows.release(id, caller);
  }

  refundEscrow(caller: Principal, id: string): Escrow {
    return this.escrows.refund(id, caller);
  }

  disputeEscrow(caller: Principal, id: string): Escrow {
    return this.escrows.dispute(id, caller);
  }

  resolveEscrow(caller: Principal, id: string, winner: EscrowParty): Escrow {
    return this.escrows.resolve(id, caller, winner);
  }

  claimExpiredEscrow(caller: Principal, id: string): Escrow {
    return this.escrows.claimExpired(id, caller);
  }

  getEscrow(id: string): Escrow {
    return this.escrows.get(id);
  }

  listEscrows(filter?: EscrowFilter): readonly Escrow[] {
    return this.escrows.list(filter);
  }

  // ─── Multi-sig wallets ─────────────────────────────────────────────

  createMultiSigWallet(caller: Principal, owners: readonly Principal[], threshold: number): MultiSigWallet {
    return this.wallets.createWallet(caller, owners, threshold);
  }

  depositToWallet(caller: Principal, walletId: string, amount: Money): Money {
    return this.wallets.deposit(walletId, caller, amount);
  }

  addWalletOwner(caller: Principal, walletId: string, owner: Principal): MultiSigWallet {
    return this.wallets.addOwner(walletId, caller, owner);
  }

  removeWalletOwner(caller: Principal, walletId: string, owner: Principal): MultiSigWallet {
    return this.wallets.removeOwner(walletId, caller, owner);
  }

  changeWalletThreshold(caller: Principal, walletId: string, threshold: number): MultiSigWallet {
    return this.wallets.changeThreshold(walletId, caller, threshold);
  }

  deactivateWallet(caller: Principal, walletId: string): MultiSigWallet {
    return this.wallets.deactivateWallet(walletId, caller);
  }

  getWallet(walletId: string): { wallet: MultiSigWallet; balance: Money } {
    return { wallet: this.wallets.getWallet(walletId), balance: this.wallets.getWalletBalance(walletId) };
  }

  listWallets(owner?: Principal): readonly MultiSigWallet[] {
    return this.wallets.listWallets(owner);
  }

  proposeTransaction(
    caller: Principal,
    walletId: string,
    command: WalletCommand,
    value?: Money,
  ): PendingTransaction {
    return this.wallets.proposeTransaction(walletId, caller, command, value);
  }

  confirmTransaction(caller: Principal, walletId: string, txId: string): PendingTransaction {
    return this.wallets.confirm(walletId, txId, caller);
  }

  revokeConfirmation(caller: Principal, walletId: string, txId: string): PendingTransaction {
    return this.wallets.revokeConfirmation(walletId, txId, caller);
  }

  executeTransaction(caller: Principal, walletId: string, txId: string): PendingTransaction {
    return this.wallets.execute(walletId, txId, caller);
  }

  cancelTransaction(caller: Principal, walletId: string, txId: string): PendingTransaction {
    return this.wallets.cancel(walletId, txId, caller);
  }

  getTransaction(walletId: string, txId: string): PendingTransaction {
    return this.wallets.getTransaction(walletId, txId);
  }

  listTransactions(walletId: string, filter?: TransactionFilter): readonly PendingTransaction[] {
    return this.wallets.listTransactions(walletId, filter);
  }

  // ─── English auctions ──────────────────────────────────────────────

  createAuction(caller: Principal, input: CreateAuctionInput): EnglishAuction {
    return this.auctions.create(caller, input);
  }

  placeBid(caller: Principal, id: string, amount: Money): EnglishAuction {
    return this.auctions.placeBid(id, caller, amount);
  }

  endAuction(caller: Principal, id: string): EnglishAuction {
    return this.auctions.end(id, caller);
  }

  cancelAuction(caller: Principal, id: string): EnglishAuction {
    return this.auctions.cancel(id, caller);
  }

  getAuction(id: string): { auction: EnglishAuction; bids: readonly Bid[] } {
    return { auction: this.auctions.get(id), bids: this.auctions.getBids(id) };
  }

  listAuctions(filter?: AuctionFilter): readonly EnglishAuction[] {
    return this.auctions.list(filter);
  }

  // ─── Dutch auctions ────────────────────────────────────────────────

  createDutchAuction(caller: Principal, input: CreateDutchAuctionInput): DutchAuction {
    return this.dutchAuctions.create(caller, input);
  }

  purchaseDutchAuctionItem(caller: Principal, id: string, payment: Money): DutchPurchase {
    return this.dutchAuctions.purchase(id, caller, payment);
  }

  refreshDutchPrice(caller: Principal, id: string): DutchAuction {
    return this.dutchAuctions.refreshPrice(id, caller);
  }

  endDutchAuction(caller: Principal, id: string): DutchAuction {
    return this.dutchAuctions.end(id, caller);
  }

  cancelDutchAuction(caller: Principal, id: string): DutchAuction {
    return this.dutchAuctions.cancel(id, caller);
  }

  getDutchAuction(id: string): { auction: DutchAuction; effectivePrice: Money } {
    return { auction: this.dutchAuctions.get(id), effectivePrice: this.dutchAuctions.effectivePrice(id) };
  }

  listDutchAuctions(filter?: DutchAuctionFilter): readonly DutchAuction[] {
    return this.dutchAuctions.list(filter);
  }

  // ─── Payments ──────────────────────────────────────────────────────

  createDirectPayment(caller: Principal, recipient: Principal, amount: Money): Payment {
    return this.payments.direct(caller, recipient, amount);
  }

  createScheduledPayment(caller: Principal, recipient: Principal, amount: Money, releaseAt: string): Payment {
    return this.payments.scheduled(caller, recipient, amount, releaseAt);
  }

  executeScheduledPayment(caller: Principal, id: string): Payment {
    return this.payments.execute(id, caller);
  }

  executeDuePayments(caller: Principal, limit?: number): DueExecution {
    const result = this.payments.executeDue(limit, caller);
    for (const failure of result.failed) {
      this._logger?.warn(failure, "Due payment could not settle");
    }
    return result;
  }

  cancelPayment(caller: Principal, id: string): Payment {
    return this.payments.cancel(id, caller);
  }

  createConditionalPayment(caller: Principal, input: ConditionalPaymentInput): Payment {
    return this.payments.conditional(caller, input);
  }

  fulfillConditionalPayment(caller: Principal, id: string, proof: FulfillmentProof): Payment {
    return this.payments.fulfill(id, caller, proof);
  }

  expireConditionalPayment(caller: Principal, id: string): Payment {
    return this.payments.expire(id, caller);
  }

  rejectConditionalPayment(caller: Principal, id: string): Payment {
    return this.payments.reject(id, caller);
  }

  createRecurringPayment(
    caller: Principal,
    recipient: Principal,
    amount: Money,
    intervalMs: number,
    count: number,
  ): RecurringPlan {
    return this.payments.recurring(caller, recipient, amount, intervalMs, count);
  }

  cancelRecurringPayment(caller: Principal, planId: string): RecurringPlan {
    return this.payments.cancelRecurring(planId, caller);
  }

  createSplitPayment(
    caller: Principal,
    recipients: readonly Principal[],
    percentages: readonly number[],
    amount: Money,
  ): Payment {
    return this.payments.split(caller, recipients, percentages, amount);
  }

  createBatchPayment(
    caller: Principal,
    recipients: readonly Principal[],
    amounts: readonly Money[],
    funded: Money,
  ): Payment {
    return this.payments.batch(caller, recipients, amounts, funded);
  }

  getPayment(id: string): Payment {
    return this.payments.get(id);
  }

  listPayments(filter?: PaymentFilter): readonly Payment[] {
    return this.payments.list(filter);
  }

  getPlan(planId: string): RecurringPlan {
    return this.payments.getPlan(planId);
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  // ─── Health ────────────────────────────────────────────────────────

  isReady(): boolean {
    return this._ready;
  }

  checkEventStore(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }
}
