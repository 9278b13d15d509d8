/**
 * @ledgerline/ledger — Clock and id generator implementations.
 */

import { randomUUID } from "node:crypto";
import type { Clock, IdGenerator } from "@ledgerline/types";
import { ValidationError } from "./errors.js";

/** Wall-clock time. */
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }
}

/**
 * Clock that only moves when told to. Used by tests and replays.
 * Never moves backwards.
 */
export class ManualClock implements Clock {
  private _current: number;

  constructor(start: number | string = 0) {
    this._current = typeof start === "string" ? Date.parse(start) : start;
    if (!Number.isFinite(this._current)) {
      throw new ValidationError("INVALID_TIME", `Invalid clock start: ${String(start)}`);
    }
  }

  now(): number {
    return this._current;
  }

  advance(ms: number): number {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new ValidationError("INVALID_TIME", `Clock can only advance by a non-negative amount, got ${String(ms)}`);
    }
    this._current += ms;
    return this._current;
  }

  set(at: number | string): number {
    const next = typeof at === "string" ? Date.parse(at) : at;
    if (!Number.isFinite(next) || next < this._current) {
      throw new ValidationError("INVALID_TIME", `Clock cannot move to ${String(at)}`);
    }
    this._current = next;
    return this._current;
  }
}

/**
 * Deterministic ids: `<kind>-1`, `<kind>-2`, ... with one counter per kind.
 */
export class SequentialIdGenerator implements IdGenerator {
  private readonly _counters = new Map<string, number>();

  next(kind: string): string {
    const n = (this._counters.get(kind) ?? 0) + 1;
    this._counters.set(kind, n);
    return `${kind}-${String(n)}`;
  }
}

/** Globally unique ids: `<kind>-<uuid>`. */
export class RandomIdGenerator implements IdGenerator {
  next(kind: string): string {
    return `${kind}-${randomUUID()}`;
  }
}

/** ISO 8601 string for an epoch-millisecond instant. */
export function toIso(ms: number): string {
  return new Date(ms).toISOString();
}
