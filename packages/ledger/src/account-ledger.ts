/**
 * @ledgerline/ledger — AccountLedger.
 *
 * Per-principal, per-currency balances with a double-entry journal.
 * Every engine in the settlement core moves value exclusively through
 * applyBatch(); all other write methods are shorthands for it.
 *
 * API surface:
 * - applyBatch() — Validate and commit a set of movements atomically
 * - credit() / debit() / transfer() — Single-movement batches
 * - transferWithFee() / planFeeTransfer() — Fee-skimmed transfers
 * - deposit() / withdraw() — Value entering or leaving the platform
 * - getBalance() / getBalances() / totalSupply() — Balance queries
 * - getEntries() / getTrialBalance() / verifyJournal() — Journal queries
 * - snapshot() / fromSnapshot() — Serialize and restore
 *
 * There is NO update() or delete() of journal lines.
 */

import type { AccountId, Currency, LedgerEntry, Money } from "@ledgerline/types";
import { isLedgerEntry } from "@ledgerline/types";
import {
  AccountRegistry,
  assertAccountId,
  DEFAULT_PLATFORM_ACCOUNT,
  EXTERNAL_ACCOUNT,
} from "./accounts.js";
import { computeTrialBalance, diffBalances, replayJournal } from "./balance-calculator.js";
import { InsufficientFundsError, ValidationError } from "./errors.js";
import { EventRecorder } from "./events.js";
import { FeePolicy } from "./fee-policy.js";
import {
  formatAmount,
  fromBaseUnits,
  MAX_BALANCE,
  parseAmount,
  toPositiveBaseUnits,
  zeroMoney,
} from "./money-math.js";
import { toIso } from "./runtime.js";
import type {
  AccountBalances,
  AccountKind,
  AssetDefinition,
  BalanceTable,
  BatchOptions,
  BatchResult,
  EntryFilter,
  FeeTransferResult,
  JournalVerification,
  LedgerAccount,
  LedgerConfig,
  LedgerSnapshot,
  Movement,
  PlannedFeeTransfer,
  TrialBalance,
} from "./types.js";

/** Options for the single-movement shorthands. */
export interface TransferOptions extends BatchOptions {
  /** Defaults to the operation name ("transfer", "deposit", ...). */
  readonly correlationId?: string | undefined;
}

const DEFAULT_NATIVE_CURRENCY = "NATIVE";
const DEFAULT_NATIVE_DECIMALS = 6;

interface ValidatedMovement {
  readonly movement: Movement;
  readonly units: bigint;
}

interface ValidatedBatch {
  readonly validated: readonly ValidatedMovement[];
  /** Post-batch balances of every tracked account the batch touches */
  readonly scratch: BalanceTable;
  readonly newAssets: ReadonlyMap<Currency, number>;
}

export class AccountLedger {
  private readonly _config: LedgerConfig;
  private readonly _accounts: AccountRegistry;
  private readonly _assets: Map<Currency, number> = new Map();
  private readonly _balances: BalanceTable = new Map();
  private readonly _entries: LedgerEntry[] = [];
  private readonly _events: EventRecorder;

  readonly fees: FeePolicy;
  readonly platformAccount: AccountId;
  readonly nativeCurrency: Currency;
  readonly nativeDecimals: number;

  constructor(config: LedgerConfig) {
    this._config = config;
    this.fees = config.fees ?? new FeePolicy();
    this.platformAccount = config.platformAccount ?? DEFAULT_PLATFORM_ACCOUNT;
    this.nativeCurrency = config.nativeCurrency ?? DEFAULT_NATIVE_CURRENCY;
    this.nativeDecimals = config.nativeDecimals ?? DEFAULT_NATIVE_DECIMALS;

    assertAccountId(this.platformAccount);
    if (this.platformAccount === EXTERNAL_ACCOUNT) {
      throw new ValidationError("INVALID_ACCOUNT", `"${EXTERNAL_ACCOUNT}" cannot be the platform account`);
    }

    this._accounts = new AccountRegistry(this.platformAccount);
    this._events = new EventRecorder("ledger", {
      clock: config.clock,
      ids: config.ids,
      sink: config.events,
    });
    this.registerAsset(this.nativeCurrency, this.nativeDecimals);
  }

  // ─── Assets ──────────────────────────────────────────────────────────

  /**
   * Fix the decimals of an asset. Re-registering with the same decimals
   * is a no-op; different decimals fail with CURRENCY_MISMATCH.
   */
  registerAsset(currency: Currency, decimals: number): AssetDefinition {
    if (typeof currency !== "string" || currency.trim() === "" || currency.trim() !== currency) {
      throw new ValidationError("INVALID_MONEY", `Invalid currency: "${String(currency)}"`);
    }
    if (!Number.isInteger(decimals) || decimals < 0) {
      throw new ValidationError("INVALID_MONEY", `Decimals must be a non-negative integer, got ${String(decimals)}`);
    }

    const existing = this._assets.get(currency);
    if (existing !== undefined && existing !== decimals) {
      throw new ValidationError(
        "CURRENCY_MISMATCH",
        `Asset "${currency}" uses ${String(existing)} decimals, got ${String(decimals)}`,
      );
    }
    this._assets.set(currency, decimals);
    return { currency, decimals };
  }

  /** Decimals of a known asset. */
  assetDecimals(currency: Currency): number | undefined {
    return this._assets.get(currency);
  }

  getAssets(): readonly AssetDefinition[] {
    return [...this._assets.entries()].map(([currency, decimals]) => ({ currency, decimals }));
  }

  /** A Money value of the native currency. */
  native(amount: string): Money {
    return { amount, currency: this.nativeCurrency, decimals: this.nativeDecimals };
  }

  // ─── Core Write (The Only Write Operation) ───────────────────────────

  /**
   * Apply a set of movements as one atomic batch.
   *
   * Validation rules (all must pass before anything is written):
   * 1. Movements array must not be empty
   * 2. Account ids must be valid; no movement to the same account
   * 3. Every amount must be a valid, strictly positive Money
   * 4. Every amount must use its asset's registered decimals
   * 5. Applied in order, no balance goes negative (InsufficientFundsError)
   * 6. Applied in order, no balance exceeds MAX_BALANCE
   *
   * Each movement is journaled as a debit line on `from` and a credit
   * line on `to`. Emits `ledger.batch.committed`.
   */
  applyBatch(
    correlationId: string,
    movements: readonly Movement[],
    options?: BatchOptions,
  ): BatchResult {
    if (typeof correlationId !== "string" || correlationId.length === 0) {
      throw new ValidationError("INVALID_ACCOUNT", "Batch correlationId must be a non-empty string");
    }
    const { validated, scratch, newAssets } = this._validate(movements);

    // Commit
    const timestamp = toIso(this._config.clock.now());
    const batchId = this._config.ids.next("batch");

    for (const [currency, decimals] of newAssets) {
      this._assets.set(currency, decimals);
    }
    for (const [accountId, perCurrency] of scratch) {
      this._accounts.ensure(accountId, timestamp);
      for (const [currency, units] of perCurrency) {
        setBalance(this._balances, accountId, currency, units);
      }
    }
    this._accounts.ensure(EXTERNAL_ACCOUNT, timestamp);

    const entries: LedgerEntry[] = [];
    for (const { movement, units } of validated) {
      const money = fromBaseUnits(units, movement.money.currency, movement.money.decimals);
      for (const [accountId, type] of [
        [movement.from, "debit"],
        [movement.to, "credit"],
      ] as const) {
        entries.push({
          id: this._config.ids.next("entry"),
          accountId,
          type,
          money,
          timestamp,
          batchId,
          correlationId,
          memo: options?.memo,
        });
      }
    }
    this._entries.push(...entries);

    this._events.record("batch", batchId, "committed", options?.actor ?? "system", {
      correlationId,
      memo: options?.memo,
      movements: validated.map(({ movement, units }) => ({
        from: movement.from,
        to: movement.to,
        amount: formatAmount(units, movement.money.decimals),
        currency: movement.money.currency,
      })),
    });

    return { batchId, correlationId, entries, timestamp };
  }

  /**
   * Run every applyBatch() check without committing anything.
   * Engines call this before allocating ids for a new entity.
   */
  validateBatch(movements: readonly Movement[]): void {
    this._validate(movements);
  }

  private _validate(movements: readonly Movement[]): ValidatedBatch {
    if (movements.length === 0) {
      throw new ValidationError("EMPTY_BATCH", "Cannot apply an empty batch");
    }

    const newAssets = new Map<Currency, number>();
    const scratch: BalanceTable = new Map();
    const validated: ValidatedMovement[] = [];

    for (const movement of movements) {
      assertAccountId(movement.from);
      assertAccountId(movement.to);
      if (movement.from === movement.to) {
        throw new ValidationError("INVALID_ACCOUNT", `Cannot move value from "${movement.from}" to itself`);
      }

      const units = toPositiveBaseUnits(movement.money);
      const { currency, decimals } = movement.money;
      const known = this._assets.get(currency) ?? newAssets.get(currency);
      if (known === undefined) {
        this._assertCurrencySymbol(currency);
        newAssets.set(currency, decimals);
      } else if (known !== decimals) {
        throw new ValidationError(
          "CURRENCY_MISMATCH",
          `Asset "${currency}" uses ${String(known)} decimals, got ${String(decimals)}`,
        );
      }

      if (movement.from !== EXTERNAL_ACCOUNT) {
        const available = this._scratchBalance(scratch, movement.from, currency);
        if (available < units) {
          throw new InsufficientFundsError(
            `Insufficient ${currency} in "${movement.from}": has ${formatAmount(available, decimals)}, needs ${formatAmount(units, decimals)}`,
            {
              accountId: movement.from,
              currency,
              available: formatAmount(available, decimals),
              required: formatAmount(units, decimals),
            },
          );
        }
        setBalance(scratch, movement.from, currency, available - units);
      }

      if (movement.to !== EXTERNAL_ACCOUNT) {
        const next = this._scratchBalance(scratch, movement.to, currency) + units;
        if (next > MAX_BALANCE) {
          throw new ValidationError(
            "BALANCE_OVERFLOW",
            `Crediting "${movement.to}" would exceed the maximum ${currency} balance`,
            { accountId: movement.to, currency },
          );
        }
        setBalance(scratch, movement.to, currency, next);
      }

      validated.push({ movement, units });
    }

    return { validated, scratch, newAssets };
  }

  // ─── Shorthands ──────────────────────────────────────────────────────

  /** Add value to an account from outside the ledger. */
  credit(account: AccountId, money: Money, options?: TransferOptions): BatchResult {
    return this.applyBatch(
      options?.correlationId ?? "credit",
      [{ from: EXTERNAL_ACCOUNT, to: account, money }],
      options,
    );
  }

  /** Remove value from an account to outside the ledger. */
  debit(account: AccountId, money: Money, options?: TransferOptions): BatchResult {
    return this.applyBatch(
      options?.correlationId ?? "debit",
      [{ from: account, to: EXTERNAL_ACCOUNT, money }],
      options,
    );
  }

  transfer(from: AccountId, to: AccountId, money: Money, options?: TransferOptions): BatchResult {
    return this.applyBatch(options?.correlationId ?? "transfer", [{ from, to, money }], options);
  }

  deposit(account: AccountId, money: Money, options?: TransferOptions): BatchResult {
    return this.credit(account, money, {
      ...options,
      correlationId: options?.correlationId ?? "deposit",
      memo: options?.memo ?? "deposit",
    });
  }

  withdraw(account: AccountId, money: Money, options?: TransferOptions): BatchResult {
    return this.debit(account, money, {
      ...options,
      correlationId: options?.correlationId ?? "withdraw",
      memo: options?.memo ?? "withdraw",
    });
  }

  /**
   * Compute the movements of a fee-skimmed transfer without applying them.
   * `to` receives gross - fee, the platform account receives fee.
   * Zero-valued legs are left out.
   */
  planFeeTransfer(from: AccountId, to: AccountId, money: Money, feeBps: number): PlannedFeeTransfer {
    const gross = toPositiveBaseUnits(money);
    const appliedBps = this.fees.clamp(feeBps);
    const fee = this.fees.compute(gross, appliedBps);
    const net = gross - fee;
    const { currency, decimals } = money;

    const movements: Movement[] = [];
    if (net > 0n) {
      movements.push({ from, to, money: fromBaseUnits(net, currency, decimals) });
    }
    if (fee > 0n) {
      movements.push({ from, to: this.platformAccount, money: fromBaseUnits(fee, currency, decimals) });
    }

    return {
      gross: fromBaseUnits(gross, currency, decimals),
      fee: fromBaseUnits(fee, currency, decimals),
      net: fromBaseUnits(net, currency, decimals),
      feeBps: appliedBps,
      movements,
    };
  }

  /**
   * Fee-skimmed transfer as one atomic batch.
   * Invariant: net + fee = gross.
   */
  transferWithFee(
    from: AccountId,
    to: AccountId,
    money: Money,
    feeBps: number,
    options?: TransferOptions,
  ): FeeTransferResult {
    const plan = this.planFeeTransfer(from, to, money, feeBps);
    const batch = this.applyBatch(options?.correlationId ?? "transfer", plan.movements, options);
    return { gross: plan.gross, fee: plan.fee, net: plan.net, feeBps: plan.feeBps, batch };
  }

  // ─── Balance Queries ─────────────────────────────────────────────────

  /** Balance in base units. Unknown accounts hold zero. */
  balanceUnits(account: AccountId, currency: Currency): bigint {
    return this._balances.get(account)?.get(currency) ?? 0n;
  }

  getBalance(account: AccountId, currency: Currency): Money {
    const decimals = this._assets.get(currency) ?? 0;
    return fromBaseUnits(this.balanceUnits(account, currency), currency, decimals);
  }

  /** Every currency the account has ever held, sorted by currency. */
  getBalances(account: AccountId): AccountBalances {
    const perCurrency = this._balances.get(account);
    const balances = perCurrency === undefined
      ? []
      : [...perCurrency.keys()].sort().map((currency) => this.getBalance(account, currency));
    return { accountId: account, balances };
  }

  /**
   * Sum of every tracked balance in a currency. Changes only through
   * deposits and withdrawals.
   */
  totalSupply(currency: Currency): Money {
    const decimals = this._assets.get(currency) ?? 0;
    let total = 0n;
    for (const perCurrency of this._balances.values()) {
      total += perCurrency.get(currency) ?? 0n;
    }
    return total === 0n ? zeroMoney(currency, decimals) : fromBaseUnits(total, currency, decimals);
  }

  getAccount(id: AccountId): LedgerAccount | undefined {
    return this._accounts.get(id);
  }

  getAccounts(): readonly LedgerAccount[] {
    return this._accounts.getAll();
  }

  /** Kind of an account id, whether or not value has reached it yet. */
  kindOf(id: AccountId): AccountKind {
    return this._accounts.kindOf(id);
  }

  /**
   * Fail unless `id` can act as a participant. Custody, platform and
   * external ids are ledger-internal: they are never a caller or a
   * counterparty.
   */
  assertPrincipal(id: AccountId, role = "Party"): void {
    assertAccountId(id);
    const kind = this._accounts.kindOf(id);
    if (kind !== "principal") {
      throw new ValidationError("RESERVED_ACCOUNT", `${role} "${id}" is a reserved ${kind} account`, {
        account: id,
        kind,
      });
    }
  }

  // ─── Journal Queries ─────────────────────────────────────────────────

  /**
   * Get journal lines, optionally filtered.
   */
  getEntries(filter?: EntryFilter): readonly LedgerEntry[] {
    if (filter === undefined) {
      return [...this._entries];
    }

    return this._entries.filter((entry) => {
      if (filter.accountId !== undefined && entry.accountId !== filter.accountId) {
        return false;
      }
      if (filter.correlationId !== undefined && entry.correlationId !== filter.correlationId) {
        return false;
      }
      if (filter.batchId !== undefined && entry.batchId !== filter.batchId) {
        return false;
      }
      if (filter.currency !== undefined && entry.money.currency !== filter.currency) {
        return false;
      }
      if (filter.fromTimestamp !== undefined && entry.timestamp < filter.fromTimestamp) {
        return false;
      }
      if (filter.toTimestamp !== undefined && entry.timestamp > filter.toTimestamp) {
        return false;
      }
      return true;
    });
  }

  get entryCount(): number {
    return this._entries.length;
  }

  getTrialBalance(): TrialBalance {
    return computeTrialBalance(this._entries, toIso(this._config.clock.now()));
  }

  /**
   * Replay the journal and compare the result with the cached balances.
   */
  verifyJournal(): JournalVerification {
    const replay = replayJournal(this._entries, EXTERNAL_ACCOUNT);
    const discrepancies = diffBalances(
      this._balances,
      replay.balances,
      (currency) => this._assets.get(currency) ?? 0,
    );
    return {
      consistent:
        discrepancies.length === 0
        && replay.unbalancedBatches.length === 0
        && replay.overdrafts.length === 0,
      discrepancies,
    };
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      assets: this.getAssets(),
      accounts: this._accounts.getAll(),
      entries: [...this._entries],
      createdAt: toIso(this._config.clock.now()),
    };
  }

  /**
   * Restore a ledger from a snapshot.
   * The journal is replayed; an unbalanced batch, an overdraft or a
   * malformed line rejects the whole snapshot.
   */
  static fromSnapshot(snapshot: LedgerSnapshot, config: LedgerConfig): AccountLedger {
    if (snapshot.version !== 1) {
      throw new ValidationError("INVALID_SNAPSHOT", `Unsupported snapshot version: ${String(snapshot.version)}`);
    }

    const ledger = new AccountLedger(config);
    for (const asset of snapshot.assets) {
      ledger.registerAsset(asset.currency, asset.decimals);
    }

    for (const entry of snapshot.entries) {
      if (!isLedgerEntry(entry)) {
        throw new ValidationError("INVALID_SNAPSHOT", "Snapshot contains a malformed journal line");
      }
      if (ledger._assets.get(entry.money.currency) !== entry.money.decimals) {
        throw new ValidationError(
          "INVALID_SNAPSHOT",
          `Journal line "${entry.id}" uses an unregistered asset or wrong decimals`,
        );
      }
      if (parseAmount(entry.money.amount, entry.money.decimals) <= 0n) {
        throw new ValidationError("INVALID_SNAPSHOT", `Journal line "${entry.id}" is not positive`);
      }
    }

    const replay = replayJournal(snapshot.entries, EXTERNAL_ACCOUNT);
    if (replay.unbalancedBatches.length > 0) {
      throw new ValidationError(
        "INVALID_SNAPSHOT",
        `Snapshot contains unbalanced batches: ${replay.unbalancedBatches.join(", ")}`,
      );
    }
    const overdraft = replay.overdrafts[0];
    if (overdraft !== undefined) {
      throw new ValidationError(
        "INVALID_SNAPSHOT",
        `Journal line "${overdraft.id}" overdraws "${overdraft.accountId}"`,
      );
    }

    for (const account of snapshot.accounts) {
      ledger._accounts.ensure(account.id, account.createdAt);
    }
    for (const [accountId, perCurrency] of replay.balances) {
      const firstSeen = snapshot.entries.find((e) => e.accountId === accountId)?.timestamp ?? snapshot.createdAt;
      ledger._accounts.ensure(accountId, firstSeen);
      for (const [currency, units] of perCurrency) {
        setBalance(ledger._balances, accountId, currency, units);
      }
    }
    ledger._entries.push(...snapshot.entries);

    return ledger;
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _scratchBalance(scratch: BalanceTable, account: AccountId, currency: Currency): bigint {
    return scratch.get(account)?.get(currency) ?? this.balanceUnits(account, currency);
  }

  private _assertCurrencySymbol(currency: Currency): void {
    if (currency.trim() !== currency) {
      throw new ValidationError("INVALID_MONEY", `Invalid currency: "${currency}"`);
    }
  }
}

function setBalance(table: BalanceTable, account: AccountId, currency: Currency, units: bigint): void {
  let perCurrency = table.get(account);
  if (perCurrency === undefined) {
    perCurrency = new Map();
    table.set(account, perCurrency);
  }
  perCurrency.set(currency, units);
}
