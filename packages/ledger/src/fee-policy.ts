/**
 * @ledgerline/ledger — Platform fee computation.
 *
 * fee = floor(amount * min(bps, maxBps) / 10000)
 *
 * Pure: no state beyond the configured cap, no side effects.
 */

import type { Money } from "@ledgerline/types";
import { ValidationError } from "./errors.js";
import { fromBaseUnits, toBaseUnits } from "./money-math.js";

/** 10000 basis points = 100%. */
export const BPS_DENOMINATOR = 10_000;

/** Default fee cap: 1000 bps (10%). */
export const DEFAULT_MAX_FEE_BPS = 1_000;

function assertBps(bps: number, label: string): void {
  if (!Number.isInteger(bps) || bps < 0 || bps > BPS_DENOMINATOR) {
    throw new ValidationError(
      "INVALID_FEE_BPS",
      `${label} must be an integer between 0 and ${String(BPS_DENOMINATOR)}, got ${String(bps)}`,
    );
  }
}

export class FeePolicy {
  readonly maxBps: number;

  constructor(maxBps: number = DEFAULT_MAX_FEE_BPS) {
    assertBps(maxBps, "Maximum fee rate");
    this.maxBps = maxBps;
  }

  /**
   * The rate actually applied for a requested rate.
   */
  clamp(bps: number): number {
    assertBps(bps, "Fee rate");
    return Math.min(bps, this.maxBps);
  }

  /**
   * Fee in base units for an amount in base units.
   */
  compute(amount: bigint, bps: number): bigint {
    if (amount < 0n) {
      throw new ValidationError("INVALID_AMOUNT", `Cannot compute a fee on a negative amount: ${amount.toString()}`);
    }
    return (amount * BigInt(this.clamp(bps))) / BigInt(BPS_DENOMINATOR);
  }

  /**
   * Fee for a Money amount, in the same currency.
   */
  computeMoney(money: Money, bps: number): Money {
    const fee = this.compute(toBaseUnits(money), bps);
    return fromBaseUnits(fee, money.currency, money.decimals);
  }
}
