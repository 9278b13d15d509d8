/**
 * Shared fixtures for ledger tests.
 */

import { expect } from "vitest";
import type { DomainEvent, DomainEventSink, Money } from "@ledgerline/types";
import { AccountLedger } from "../src/account-ledger.js";
import { ManualClock, SequentialIdGenerator } from "../src/runtime.js";

export const START = "2024-01-15T10:00:00.000Z";

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
}

export function createLedger(): {
  ledger: AccountLedger;
  clock: ManualClock;
  ids: SequentialIdGenerator;
  sink: RecordingSink;
} {
  const clock = new ManualClock(START);
  const ids = new SequentialIdGenerator();
  const sink = new RecordingSink();
  const ledger = new AccountLedger({ clock, ids, events: sink });
  return { ledger, clock, ids, sink };
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
