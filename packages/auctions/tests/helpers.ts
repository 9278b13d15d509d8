/**
 * Shared fixtures for auction tests.
 */

import { expect } from "vitest";
import { AccountLedger, ManualClock, SequentialIdGenerator } from "@ledgerline/ledger";
import type { DomainEvent, DomainEventSink, Money, Principal } from "@ledgerline/types";
import { DutchAuctionEngine } from "../src/dutch-auction.js";
import { EnglishAuctionEngine } from "../src/english-auction.js";
import { InMemoryItemRegistry } from "../src/item-registry.js";
import type { ItemRegistry } from "../src/types.js";

export const START = "2024-01-15T10:00:00.000Z";
export const MINUTE = 60_000;

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

/**
 * Ownership kept somewhere the engines do not control: nothing stops it
 * changing while an auction runs.
 */
export class UnmanagedRegistry implements ItemRegistry {
  readonly owners: Map<string, Principal> = new Map();

  ownerOf(itemRef: string): Principal | undefined {
    return this.owners.get(itemRef);
  }

  holderOf(): string | undefined {
    return undefined;
  }

  hold(itemRef: string, owner: Principal): void {
    this.owners.set(itemRef, owner);
  }

  release(): void {
    // holds are not tracked
  }

  transfer(itemRef: string, _from: Principal, to: Principal): void {
    this.owners.set(itemRef, to);
  }
}

export function createAuctionsOn<R extends ItemRegistry>(items: R): {
  english: EnglishAuctionEngine;
  dutch: DutchAuctionEngine;
  items: R;
  ledger: AccountLedger;
  clock: ManualClock;
  sink: RecordingSink;
} {
  const clock = new ManualClock(START);
  const ids = new SequentialIdGenerator();
  const sink = new RecordingSink();
  const ledger = new AccountLedger({ clock, ids, events: sink });
  const deps = { ledger, clock, ids, events: sink, items };
  return {
    english: new EnglishAuctionEngine(deps),
    dutch: new DutchAuctionEngine(deps),
    items,
    ledger,
    clock,
    sink,
  };
}

export function createAuctions(): ReturnType<typeof createAuctionsOn<InMemoryItemRegistry>> {
  return createAuctionsOn(new InMemoryItemRegistry());
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
