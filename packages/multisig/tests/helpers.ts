/**
 * Shared fixtures for multi-sig tests.
 */

import { expect } from "vitest";
import { AccountLedger, ManualClock, SequentialIdGenerator } from "@ledgerline/ledger";
import type { DomainEvent, DomainEventSink, Money } from "@ledgerline/types";
import { MultiSigWalletManager } from "../src/wallet.js";

export const START = "2024-01-15T10:00:00.000Z";

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

export function createManager(): {
  manager: MultiSigWalletManager;
  ledger: AccountLedger;
  clock: ManualClock;
  sink: RecordingSink;
} {
  const clock = new ManualClock(START);
  const ids = new SequentialIdGenerator();
  const sink = new RecordingSink();
  const ledger = new AccountLedger({ clock, ids, events: sink });
  const manager = new MultiSigWalletManager({ ledger, clock, ids, events: sink });
  return { manager, ledger, clock, sink };
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
