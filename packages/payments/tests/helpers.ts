/**
 * Shared fixtures for payment tests.
 */

import { expect } from "vitest";
import { AccountLedger, ManualClock, SequentialIdGenerator } from "@ledgerline/ledger";
import type { DomainEvent, DomainEventSink, Money } from "@ledgerline/types";
import { PaymentScheduler } from "../src/scheduler.js";
import type { PresenceChecker } from "../src/types.js";

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

  ofType(type: string): DomainEvent[] {
    return this.events.filter((e) => e.event.type === type).map((e) => e.event);
  }
}

/** Presence checker backed by a set the test controls. */
export class StaticPresence implements PresenceChecker {
  readonly present = new Set<string>();

  isPresent(address: string): boolean {
    return this.present.has(address);
  }
}

export function createScheduler(): {
  scheduler: PaymentScheduler;
  ledger: AccountLedger;
  clock: ManualClock;
  sink: RecordingSink;
  presence: StaticPresence;
} {
  const clock = new ManualClock(START);
  const ids = new SequentialIdGenerator();
  const sink = new RecordingSink();
  const presence = new StaticPresence();
  const ledger = new AccountLedger({ clock, ids, events: sink });
  const scheduler = new PaymentScheduler({ ledger, clock, ids, events: sink, presence });
  return { scheduler, ledger, clock, sink, presence };
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
