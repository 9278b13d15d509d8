/**
 * Shared fixtures for escrow tests.
 */

import { expect } from "vitest";
import { AccountLedger, ManualClock, SequentialIdGenerator } from "@ledgerline/ledger";
import type { DomainEvent, DomainEventSink, Money } from "@ledgerline/types";
import { EscrowEngine } from "../src/escrow.js";

export const START = "2024-01-15T10:00:00.000Z";
export const HOUR = 60 * 60 * 1000;

export function native(amount: string): Money {
  return { amount, currency: "NATIVE", decimals: 6 };
}

export class RecordingSink implements DomainEventSink {
  readonly events: { streamId: string; event: DomainEvent }[] = [];

  publish(streamId: string, event: DomainEvent): void {
    this.events.push({ streamId, event });
  }

  types(): string[] {
    return this.events.map((e) => e.event.type);
  }

  last(type: string): DomainEvent | undefined {
    return this.events.filter((e) => e.event.type === type).at(-1)?.event;
  }
}

export function createEscrowEngine(): {
  engine: EscrowEngine;
  ledger: AccountLedger;
  clock: ManualClock;
  sink: RecordingSink;
} {
  const clock = new ManualClock(START);
  const ids = new SequentialIdGenerator();
  const sink = new RecordingSink();
  const ledger = new AccountLedger({ clock, ids, events: sink });
  const engine = new EscrowEngine({ ledger, clock, ids, events: sink });
  return { engine, ledger, clock, sink };
}

/** Run `fn`, which must throw, and return what it threw. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return expect.fail("Should have thrown");
}
