/**
 * @ledgerline/ledger — Settlement error taxonomy.
 *
 * Every engine in the core throws one of these. They are always thrown
 * synchronously, before any balance mutation, so a caught error means the
 * state is exactly as it was before the call.
 *
 * The one exception is ExternalCallFailedError: the multi-sig debit has
 * already happened when the destination fails, and the error says so.
 */

/** Broad class of failure; the HTTP layer maps it to a status code. */
export type SettlementErrorCategory =
  | "validation"
  | "authorization"
  | "state"
  | "insufficient_funds"
  | "expired"
  | "threshold"
  | "external_call"
  | "not_found";

export type ValidationErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_MONEY"
  | "CURRENCY_MISMATCH"
  | "BALANCE_OVERFLOW"
  | "INVALID_FEE_BPS"
  | "INVALID_ACCOUNT"
  | "EMPTY_BATCH"
  | "INVALID_PARTIES"
  | "INVALID_EXPIRY"
  | "INVALID_DURATION"
  | "DUPLICATE_OWNER"
  | "INVALID_THRESHOLD"
  | "INVALID_OWNER"
  | "INVALID_COMMAND"
  | "UNKNOWN_CALL_TARGET"
  | "INVALID_PRICE_CURVE"
  | "LENGTH_MISMATCH"
  | "INVALID_PERCENTAGES"
  | "INVALID_SCHEDULE"
  | "INVALID_CONDITION"
  | "INVALID_PROOF"
  | "INVALID_TIME"
  | "INVALID_SNAPSHOT"
  | "RESERVED_ACCOUNT"
  | "TOO_MANY_INSTALLMENTS";

export type StateErrorCode =
  | "INVALID_TRANSITION"
  | "NOT_DUE"
  | "ALREADY_CONFIRMED"
  | "NOT_CONFIRMED"
  | "ALREADY_OWNER"
  | "WALLET_INACTIVE"
  | "AUCTION_CLOSED"
  | "AUCTION_RUNNING"
  | "BIDS_PLACED"
  | "ITEM_LOCKED"
  | "ITEM_UNAVAILABLE"
  | "CONDITION_NOT_MET";

export type ThresholdErrorCode =
  | "THRESHOLD_NOT_MET"
  | "THRESHOLD_EXCEEDS_OWNERS"
  | "BID_TOO_LOW"
  | "PAYMENT_TOO_LOW"
  | "SIGNATURES_NOT_MET"
  | "FUNDING_SHORTFALL";

export type SettlementErrorCode =
  | ValidationErrorCode
  | StateErrorCode
  | ThresholdErrorCode
  | "UNAUTHORIZED_CALLER"
  | "INSUFFICIENT_FUNDS"
  | "EXPIRED"
  | "EXTERNAL_CALL_FAILED"
  | "NOT_FOUND";

/**
 * Base class for every error the settlement core throws.
 */
export class SettlementError extends Error {
  public readonly category: SettlementErrorCategory;
  public readonly code: SettlementErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    category: SettlementErrorCategory,
    code: SettlementErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "SettlementError";
    this.category = category;
    this.code = code;
    this.details = details;
  }
}

/** Malformed input: zero amount, mismatched arrays, bad percentage sum. */
export class ValidationError extends SettlementError {
  constructor(code: ValidationErrorCode, message: string, details?: Readonly<Record<string, unknown>>) {
    super("validation", code, message, details);
    this.name = "ValidationError";
  }
}

/** The caller is not allowed to perform this action on this entity. */
export class AuthorizationError extends SettlementError {
  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super("authorization", "UNAUTHORIZED_CALLER", message, details);
    this.name = "AuthorizationError";
  }
}

/** The operation is not valid for the entity's current status. */
export class StateError extends SettlementError {
  constructor(code: StateErrorCode, message: string, details?: Readonly<Record<string, unknown>>) {
    super("state", code, message, details);
    this.name = "StateError";
  }
}

export class InsufficientFundsError extends SettlementError {
  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super("insufficient_funds", "INSUFFICIENT_FUNDS", message, details);
    this.name = "InsufficientFundsError";
  }
}

/** A deadline has passed. */
export class ExpiredError extends SettlementError {
  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super("expired", "EXPIRED", message, details);
    this.name = "ExpiredError";
  }
}

/** Confirmations, reserve, quorum or minimum price not met. */
export class ThresholdError extends SettlementError {
  constructor(code: ThresholdErrorCode, message: string, details?: Readonly<Record<string, unknown>>) {
    super("threshold", code, message, details);
    this.name = "ThresholdError";
  }
}

/**
 * The destination of a multi-sig transaction failed.
 * The wallet debit is NOT rolled back.
 */
export class ExternalCallFailedError extends SettlementError {
  public override readonly cause: unknown;

  constructor(message: string, cause: unknown, details?: Readonly<Record<string, unknown>>) {
    super("external_call", "EXTERNAL_CALL_FAILED", message, details);
    this.name = "ExternalCallFailedError";
    this.cause = cause;
  }
}

export class NotFoundError extends SettlementError {
  constructor(message: string, details?: Readonly<Record<string, unknown>>) {
    super("not_found", "NOT_FOUND", message, details);
    this.name = "NotFoundError";
  }
}

/**
 * Narrow an unknown thrown value to a SettlementError.
 */
export function isSettlementError(value: unknown): value is SettlementError {
  return value instanceof SettlementError;
}
