/**
 * @ledgerline/ledger — Money <-> base units.
 *
 * Amounts travel as decimal strings and are computed on as bigint base
 * units: "100.50" at 2 decimals is 10050n. Nothing here touches a float.
 */

import type { Currency, Money } from "@ledgerline/types";
import { ValidationError } from "./errors.js";

/** Largest balance a single account may hold, in base units (uint256 max). */
export const MAX_BALANCE = 2n ** 256n - 1n;

const DECIMAL = /^(-?)(\d+)(?:\.(\d+))?$/;

export function parseAmount(amount: string, decimals: number): bigint {
  const text = amount.trim();
  if (text === "") {
    throw new ValidationError("INVALID_AMOUNT", `Invalid amount: "${amount}"`);
  }
  const match = DECIMAL.exec(text);
  if (match === null) {
    throw new ValidationError("INVALID_AMOUNT", `Invalid amount format: "${text}"`);
  }

  const [, sign = "", whole = "0", fraction = ""] = match;
  if (fraction.length > decimals) {
    throw new ValidationError(
      "INVALID_AMOUNT",
      `Amount "${text}" has ${String(fraction.length)} decimal places, but the asset allows ${String(decimals)}`,
    );
  }
  const units = BigInt(whole + fraction.padEnd(decimals, "0"));
  return sign === "-" ? -units : units;
}

/** Always exactly `decimals` fractional digits; no point at 0 decimals. */
export function formatAmount(units: bigint, decimals: number): string {
  const sign = units < 0n ? "-" : "";
  const digits = (units < 0n ? -units : units).toString();
  if (decimals === 0) {
    return sign + digits;
  }
  const padded = digits.padStart(decimals + 1, "0");
  const cut = padded.length - decimals;
  return `${sign}${padded.slice(0, cut)}.${padded.slice(cut)}`;
}

export function validateMoney(money: Money): void {
  if (money.currency.trim() === "") {
    throw new ValidationError("INVALID_MONEY", "Money currency must be a non-empty string");
  }
  if (!Number.isInteger(money.decimals) || money.decimals < 0) {
    throw new ValidationError(
      "INVALID_MONEY",
      `Money decimals must be a non-negative integer, got: ${String(money.decimals)}`,
    );
  }
  parseAmount(money.amount, money.decimals);
}

export function toBaseUnits(money: Money): bigint {
  validateMoney(money);
  return parseAmount(money.amount, money.decimals);
}

/** `label` names the value in the error, e.g. "Bid must be positive". */
export function toPositiveBaseUnits(money: Money, label = "Amount"): bigint {
  const units = toBaseUnits(money);
  if (units <= 0n) {
    throw new ValidationError("INVALID_AMOUNT", `${label} must be positive, got "${money.amount}" ${money.currency}`);
  }
  return units;
}

export function fromBaseUnits(units: bigint, currency: Currency, decimals: number): Money {
  return { amount: formatAmount(units, decimals), currency, decimals };
}

export function zeroMoney(currency: Currency, decimals: number): Money {
  return fromBaseUnits(0n, currency, decimals);
}

/** Same currency code and the same decimals, or CURRENCY_MISMATCH. */
export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency) {
    throw new ValidationError(
      "CURRENCY_MISMATCH",
      `Cannot operate on different currencies: "${a.currency}" vs "${b.currency}"`,
    );
  }
  if (a.decimals !== b.decimals) {
    throw new ValidationError(
      "CURRENCY_MISMATCH",
      `Decimal mismatch for currency "${a.currency}": ${String(a.decimals)} vs ${String(b.decimals)}`,
    );
  }
}
