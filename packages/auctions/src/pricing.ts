/**
 * Dutch auction price curve, in base units.
 *
 * price(t) = max(reserve, lastPrice - decrement * floor((t - lastUpdate) / interval))
 */

import { ValidationError } from "@ledgerline/ledger";

export interface PriceCurve {
  readonly startingPrice: bigint;
  readonly reservePrice: bigint;
  readonly decrement: bigint;
  readonly intervalMs: number;
}

/** Whole intervals elapsed since `since`; zero if `now` is earlier. */
export function elapsedSteps(since: number, now: number, intervalMs: number): number {
  return now <= since ? 0 : Math.floor((now - since) / intervalMs);
}

export function priceAfterSteps(lastPrice: bigint, reservePrice: bigint, decrement: bigint, steps: number): bigint {
  const price = lastPrice - decrement * BigInt(steps);
  return price > reservePrice ? price : reservePrice;
}

/** Intervals needed to fall from the starting price to the reserve (rounded up). */
export function stepsToReserve(curve: PriceCurve): bigint {
  const span = curve.startingPrice - curve.reservePrice;
  return (span + curve.decrement - 1n) / curve.decrement;
}

/**
 * Check the curve's shape and that the reserve is reachable within the
 * auction's duration.
 */
export function assertFeasibleCurve(curve: PriceCurve, durationMs: number): void {
  if (curve.reservePrice <= 0n || curve.reservePrice >= curve.startingPrice) {
    throw new ValidationError("INVALID_PRICE_CURVE", "Reserve price must be positive and below the starting price");
  }
  if (curve.decrement <= 0n) {
    throw new ValidationError("INVALID_PRICE_CURVE", "Price decrement must be positive");
  }
  if (!Number.isSafeInteger(curve.intervalMs) || curve.intervalMs <= 0) {
    throw new ValidationError("INVALID_PRICE_CURVE", `Interval must be a positive integer, got ${String(curve.intervalMs)}`);
  }
  if (!Number.isSafeInteger(durationMs) || durationMs <= 0) {
    throw new ValidationError("INVALID_DURATION", `Duration must be a positive integer, got ${String(durationMs)}`);
  }

  const needed = stepsToReserve(curve) * BigInt(curve.intervalMs);
  if (needed > BigInt(durationMs)) {
    throw new ValidationError(
      "INVALID_PRICE_CURVE",
      `The price needs ${needed.toString()}ms to reach the reserve but the auction lasts ${String(durationMs)}ms`,
      { neededMs: needed.toString(), durationMs },
    );
  }
}
