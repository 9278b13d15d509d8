/**
 * Tests for EnglishAuctionEngine.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  AuthorizationError,
  ExpiredError,
  InsufficientFundsError,
  ManualClock,
  NotFoundError,
  StateError,
  ThresholdError,
  ValidationError,
} from "@ledgerline/ledger";
import type { AccountLedger } from "@ledgerline/ledger";
import { EnglishAuctionEngine } from "../src/english-auction.js";
import { InMemoryItemRegistry } from "../src/item-registry.js";
import type { CreateAuctionInput } from "../src/types.js";
import { DutchAuctionEngine } from "../src/dutch-auction.js";
import { captureError, createAuctions, createAuctionsOn, MINUTE, native, RecordingSink, UnmanagedRegistry } from "./helpers.js";

describe("EnglishAuctionEngine", () => {
  let english: EnglishAuctionEngine;
  let dutch: DutchAuctionEngine;
  let items: InMemoryItemRegistry;
  let ledger: AccountLedger;
  let clock: ManualClock;
  let sink: RecordingSink;

  const base: CreateAuctionInput = {
    itemRef: "item-1",
    startingPrice: native("10"),
    durationMs: 60 * MINUTE,
    minIncrement: native("1"),
  };

  beforeEach(() => {
    ({ english, dutch, items, ledger, clock, sink } = createAuctions());
    items.register("item-1", "alice");
    ledger.deposit("bob", native("100"));
    ledger.deposit("carol", native("100"));
  });

  // ─── Creation ────────────────────────────────────────────────────────

  describe("create", () => {
    it("opens at the starting price", () => {
      const auction = english.create("alice", base);

      expect(auction).toMatchObject({
        id: "auction-1",
        seller: "alice",
        currentPrice: native("10.000000"),
        minIncrement: native("1.000000"),
        bidCount: 0,
        status: "ACTIVE",
        startsAt: "2024-01-15T10:00:00.000Z",
        endsAt: "2024-01-15T11:00:00.000Z",
      });
      expect(auction.highestBidder).toBeUndefined();
    });

    it("refuses an item the seller does not own", () => {
      items.register("item-2", "zed");
      const err = captureError(() => english.create("alice", { ...base, itemRef: "item-2" }));
      expect(err).toBeInstanceOf(AuthorizationError);
    });

    it("registers an untracked item to the seller and holds it", () => {
      const auction = english.create("alice", { ...base, itemRef: "untracked" });

      expect(auction.status).toBe("ACTIVE");
      expect(items.ownerOf("untracked")).toBe("alice");
      expect(items.holderOf("untracked")).toBe("auction-1");
    });

    it("a held item cannot be claimed, moved or put up again", () => {
      const auction = english.create("alice", { ...base, itemRef: "untracked" });
      english.placeBid(auction.id, "bob", native("11"));

      const claim = captureError(() => items.register("untracked", "mallory"));
      const move = captureError(() => items.transfer("untracked", "alice", "mallory"));
      const second = captureError(() => english.create("alice", { ...base, itemRef: "untracked" }));
      const dutchSale = captureError(() =>
        dutch.create("alice", {
          itemRef: "untracked",
          startingPrice: native("5"),
          reservePrice: native("1"),
          decrement: native("1"),
          intervalMs: MINUTE,
          durationMs: 10 * MINUTE,
        }),
      );

      for (const err of [claim, move, second, dutchSale]) {
        expect(err).toBeInstanceOf(StateError);
        expect((err as StateError).code).toBe("ITEM_LOCKED");
      }
      expect((claim as StateError).message).toBe("Item 'untracked' is held by auction 'auction-1'");

      const ended = english.end(auction.id, "alice");
      expect(ended.status).toBe("COMPLETED");
      expect(items.ownerOf("untracked")).toBe("bob");
      expect(items.holderOf("untracked")).toBeUndefined();
    });

    it("an auction that closes without a sale gives the item back", () => {
      const first = english.create("alice", base);
      english.cancel(first.id, "alice");
      expect(items.holderOf("item-1")).toBeUndefined();

      const second = english.create("alice", base);
      english.end(second.id, "alice");
      expect(items.holderOf("item-1")).toBeUndefined();
      expect(english.create("alice", base).id).toBe("auction-3");
    });

    it("refuses a ledger-reserved account as the seller", () => {
      const err = captureError(() => english.create("escrow:escrow-1", { ...base, itemRef: "untracked" }));
      expect((err as ValidationError).code).toBe("RESERVED_ACCOUNT");
      expect(items.ownerOf("untracked")).toBeUndefined();
    });

    it("rejects a non-positive duration", () => {
      const err = captureError(() => english.create("alice", { ...base, durationMs: 0 }));
      expect((err as ValidationError).code).toBe("INVALID_DURATION");
    });

    it("rejects an increment in another currency", () => {
      const err = captureError(() =>
        english.create("alice", { ...base, minIncrement: { amount: "1", currency: "GEM", decimals: 6 } }),
      );
      expect((err as ValidationError).code).toBe("CURRENCY_MISMATCH");
    });
  });

  // ─── Bidding ─────────────────────────────────────────────────────────

  describe("placeBid", () => {
    it("escrows the first bid", () => {
      const auction = english.create("alice", base);
      const updated = english.placeBid(auction.id, "bob", native("11"));

      expect(updated.currentPrice).toEqual(native("11.000000"));
      expect(updated.highestBidder).toBe("bob");
      expect(updated.bidCount).toBe(1);
      expect(ledger.getBalance("bob", "NATIVE").amount).toBe("89.000000");
      expect(ledger.getBalance("auction:auction-1", "NATIVE").amount).toBe("11.000000");
    });

    it("requires the current price plus the increment", () => {
      const auction = english.create("alice", base);
      const atStart = captureError(() => english.placeBid(auction.id, "bob", native("10")));
      expect((atStart as ThresholdError).code).toBe("BID_TOO_LOW");

      english.placeBid(auction.id, "bob", native("11"));
      const err = captureError(() => english.placeBid(auction.id, "carol", native("11.5")));
      expect(err).toBeInstanceOf(ThresholdError);
      expect((err as ThresholdError).details).toEqual({ auctionId: "auction-1", minimum: "12.000000" });
    });

    it("refunds the outbid bidder in the same batch", () => {
      const auction = english.create("alice", base);
      english.placeBid(auction.id, "bob", native("11"));
      english.placeBid(auction.id, "carol", native("12"));

      expect(ledger.getBalance("bob", "NATIVE").amount).toBe("100.000000");
      expect(ledger.getBalance("carol", "NATIVE").amount).toBe("88.000000");
      expect(ledger.getBalance("auction:auction-1", "NATIVE").amount).toBe("12.000000");
      expect(sink.ofType("auction.auction.bid-placed")[1]?.payload).toEqual({
        bidder: "carol",
        amount: "12.000000",
        currency: "NATIVE",
        previousBidder: "bob",
      });
    });

    it("the seller cannot bid", () => {
      const auction = english.create("alice", base);
      expect(captureError(() => english.placeBid(auction.id, "alice", native("11")))).toBeInstanceOf(
        AuthorizationError,
      );
    });

    it("refuses a bid from the external world", () => {
      const auction = english.create("alice", base);
      const err = captureError(() => english.placeBid(auction.id, "external:world", native("1000")));

      expect((err as ValidationError).code).toBe("RESERVED_ACCOUNT");
      expect(english.get(auction.id).bidCount).toBe(0);
      expect(ledger.getBalance("auction:auction-1", "NATIVE").amount).toBe("0.000000");
    });

    it("fails without funds and leaves the auction untouched", () => {
      const auction = english.create("alice", base);
      const err = captureError(() => english.placeBid(auction.id, "dave", native("11")));
      expect(err).toBeInstanceOf(InsufficientFundsError);
      expect(english.get(auction.id).bidCount).toBe(0);
      expect(english.getBids(auction.id)).toEqual([]);
    });

    it("refuses bids once the end time is reached", () => {
      const auction = english.create("alice", base);
      clock.advance(60 * MINUTE);
      expect(captureError(() => english.placeBid(auction.id, "bob", native("11")))).toBeInstanceOf(ExpiredError);
    });

    it("records the bid history", () => {
      const auction = english.create("alice", base);
      english.placeBid(auction.id, "bob", native("11"));
      clock.advance(MINUTE);
      english.placeBid(auction.id, "carol", native("13"));

      expect(english.getBids(auction.id)).toEqual([
        { bidder: "bob", amount: native("11.000000"), placedAt: "2024-01-15T10:00:00.000Z" },
        { bidder: "carol", amount: native("13.000000"), placedAt: "2024-01-15T10:01:00.000Z" },
      ]);
    });
  });

  // ─── Ending ──────────────────────────────────────────────────────────

  describe("end", () => {
    it("pays the seller net of the fee and hands the item over", () => {
      const auction = english.create("alice", base);
      english.placeBid(auction.id, "bob", native("11"));
      english.placeBid(auction.id, "carol", native("12"));
      const ended = english.end(auction.id, "alice");

      expect(ended.status).toBe("COMPLETED");
      expect(ledger.getBalance("alice", "NATIVE").amount).toBe("11.700000");
      expect(ledger.getBalance("platform:fees", "NATIVE").amount).toBe("0.300000");
      expect(ledger.getBalance("auction:auction-1", "NATIVE").amount).toBe("0.000000");
      expect(items.ownerOf("item-1")).toBe("carol");
      expect(sink.ofType("auction.auction.completed")[0]?.payload).toEqual({
        winner: "carol",
        price: "12.000000",
        net: "11.700000",
        fee: "0.300000",
        currency: "NATIVE",
      });
    });

    it("only the seller can end a running auction", () => {
      const auction = english.create("alice", base);
      const err = captureError(() => english.end(auction.id, "dave"));
      expect((err as StateError).code).toBe("AUCTION_RUNNING");

      clock.advance(60 * MINUTE);
      expect(english.end(auction.id, "dave").status).toBe("FAILED");
    });

    it("fails without bids", () => {
      const auction = english.create("alice", base);
      const ended = english.end(auction.id, "alice");
      expect(ended.failureReason).toBe("no-bids");
      expect(sink.ofType("auction.auction.failed")[0]?.payload).toEqual({ reason: "no-bids" });
    });

    it("refunds the highest bidder when the reserve is not met", () => {
      const auction = english.create("alice", { ...base, reservePrice: native("20") });
      english.placeBid(auction.id, "bob", native("15"));
      clock.advance(60 * MINUTE);
      const ended = english.end(auction.id, "carol");

      expect(ended.status).toBe("FAILED");
      expect(ended.failureReason).toBe("reserve-not-met");
      expect(ledger.getBalance("bob", "NATIVE").amount).toBe("100.000000");
      expect(ledger.getBalance("alice", "NATIVE").amount).toBe("0.000000");
      expect(items.ownerOf("item-1")).toBe("alice");
    });

    it("refunds the highest bidder when the seller no longer owns the item", () => {
      const unmanaged = createAuctionsOn(new UnmanagedRegistry());
      unmanaged.ledger.deposit("bob", native("100"));
      const auction = unmanaged.english.create("alice", base);
      unmanaged.english.placeBid(auction.id, "bob", native("11"));
      unmanaged.items.owners.set("item-1", "zed");

      const ended = unmanaged.english.end(auction.id, "alice");

      expect(ended.status).toBe("FAILED");
      expect(ended.failureReason).toBe("item-unavailable");
      expect(unmanaged.ledger.getBalance("bob", "NATIVE").amount).toBe("100.000000");
      expect(unmanaged.ledger.getBalance("alice", "NATIVE").amount).toBe("0.000000");
      expect(unmanaged.ledger.getBalance("auction:auction-1", "NATIVE").amount).toBe("0.000000");
      expect(unmanaged.items.ownerOf("item-1")).toBe("zed");
      expect(unmanaged.sink.ofType("auction.auction.failed")[0]?.payload).toEqual({ reason: "item-unavailable" });
    });

    it("settles when the reserve is met exactly", () => {
      const auction = english.create("alice", { ...base, reservePrice: native("20") });
      english.placeBid(auction.id, "bob", native("20"));
      expect(english.end(auction.id, "alice").status).toBe("COMPLETED");
    });

    it("cannot end twice", () => {
      const auction = english.create("alice", base);
      english.end(auction.id, "alice");
      const err = captureError(() => english.end(auction.id, "alice"));
      expect((err as StateError).code).toBe("AUCTION_CLOSED");
    });
  });

  // ─── Cancellation ────────────────────────────────────────────────────

  describe("cancel", () => {
    it("the seller cancels before any bid", () => {
      const auction = english.create("alice", base);
      expect(english.cancel(auction.id, "alice").status).toBe("CANCELLED");
    });

    it("refuses once a bid is placed", () => {
      const auction = english.create("alice", base);
      english.placeBid(auction.id, "bob", native("11"));
      const err = captureError(() => english.cancel(auction.id, "alice"));
      expect((err as StateError).code).toBe("BIDS_PLACED");
    });

    it("only the seller cancels", () => {
      const auction = english.create("alice", base);
      expect(captureError(() => english.cancel(auction.id, "bob"))).toBeInstanceOf(AuthorizationError);
    });
  });

  it("lists by seller and status, and rejects unknown ids", () => {
    const first = english.create("alice", base);
    english.create("alice", { ...base, itemRef: "untracked" });
    english.cancel(first.id, "alice");

    expect(english.list({ status: "ACTIVE" }).map((a) => a.id)).toEqual(["auction-2"]);
    expect(english.list({ seller: "alice" })).toHaveLength(2);
    expect(captureError(() => english.get("auction-9"))).toBeInstanceOf(NotFoundError);
  });
});
