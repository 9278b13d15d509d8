/**
 * @ledgerline/ledger — Account ledger for the settlement core.
 *
 * Per-principal, per-currency balances with a double-entry journal.
 * Every engine moves value exclusively through AccountLedger.applyBatch().
 *
 * Design rules:
 * - All types are readonly
 * - No mutation of committed journal lines
 * - Fail-closed: invalid batches throw, nothing is applied
 * - All monetary arithmetic uses bigint (no floating point)
 */

// Core engine
export { AccountLedger } from "./account-ledger.js";
export type { TransferOptions } from "./account-ledger.js";

// Account registry
export {
  AccountRegistry,
  assertAccountId,
  classifyAccount,
  custodyAccountId,
  DEFAULT_PLATFORM_ACCOUNT,
  EXTERNAL_ACCOUNT,
} from "./accounts.js";

// Journal replay
export {
  computeTrialBalance,
  diffBalances,
  replayJournal,
} from "./balance-calculator.js";
export type { ReplayResult } from "./balance-calculator.js";

// Fees
export { BPS_DENOMINATOR, DEFAULT_MAX_FEE_BPS, FeePolicy } from "./fee-policy.js";

// Money arithmetic
export {
  MAX_BALANCE,
  parseAmount,
  formatAmount,
  validateMoney,
  toBaseUnits,
  toPositiveBaseUnits,
  fromBaseUnits,
  assertSameCurrency,
  zeroMoney,
} from "./money-math.js";

// Runtime
export {
  ManualClock,
  RandomIdGenerator,
  SequentialIdGenerator,
  SystemClock,
  toIso,
} from "./runtime.js";

// Events
export { EventRecorder } from "./events.js";
export type { EventRecorderDeps } from "./events.js";

// Errors
export {
  AuthorizationError,
  ExpiredError,
  ExternalCallFailedError,
  InsufficientFundsError,
  isSettlementError,
  NotFoundError,
  SettlementError,
  StateError,
  ThresholdError,
  ValidationError,
} from "./errors.js";
export type {
  SettlementErrorCategory,
  SettlementErrorCode,
  StateErrorCode,
  ThresholdErrorCode,
  ValidationErrorCode,
} from "./errors.js";

// Types
export { DEFAULT_FEE_BPS } from "./types.js";
export type {
  EngineDeps,
  AccountBalances,
  AccountKind,
  AssetDefinition,
  BalanceDiscrepancy,
  BalanceTable,
  BatchOptions,
  BatchResult,
  CustodyKind,
  EntryFilter,
  FeeSplit,
  FeeTransferResult,
  JournalVerification,
  LedgerAccount,
  LedgerConfig,
  LedgerSnapshot,
  Movement,
  PlannedFeeTransfer,
  TrialBalance,
  TrialBalanceLine,
} from "./types.js";
