/**
 * Tests for item and auction routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { DutchAuction, EnglishAuction } from "@ledgerline/auctions";
import type { Money } from "@ledgerline/types";
import { createTestApp, dataOf, errorOf, fund, HOUR, jsonRequest, native } from "../setup.js";
import type { TestApp } from "../setup.js";

const MINUTE = 60 * 1000;

describe("auction routes", () => {
  let t: TestApp;

  function post(path: string, principal: string, body?: unknown): Promise<Response> {
    return Promise.resolve(t.app.request(jsonRequest(path, "POST", body, principal)));
  }

  beforeEach(async () => {
    t = createTestApp();
    await fund(t.app, "alice", "100");
    await fund(t.app, "bob", "100");
    await fund(t.app, "carol", "1000");
  });

  describe("items", () => {
    it("registers an item to the caller", async () => {
      const res = await post("/api/v1/items", "sam", { itemRef: "painting" });
      expect(res.status).toBe(201);
      expect(await dataOf(res)).toEqual({ itemRef: "painting", owner: "sam" });

      const list = await t.app.request(jsonRequest("/api/v1/items", "GET", undefined, "sam"));
      expect(await dataOf(list)).toEqual(["painting"]);
    });

    it("refuses to take over someone else's item", async () => {
      await post("/api/v1/items", "sam", { itemRef: "painting" });
      const res = await post("/api/v1/items", "mallory", { itemRef: "painting" });
      expect(res.status).toBe(403);
    });
  });

  describe("English auctions", () => {
    async function open(): Promise<EnglishAuction> {
      await post("/api/v1/items", "sam", { itemRef: "painting" });
      const res = await post("/api/v1/auctions", "sam", {
        itemRef: "painting",
        startingPrice: native("10"),
        minIncrement: native("1"),
        durationMs: HOUR,
      });
      expect(res.status).toBe(201);
      return dataOf<EnglishAuction>(res);
    }

    it("refunds the outbid bidder and settles the winner", async () => {
      const auction = await open();
      expect(auction.id).toBe("auction-1");

      await post(`/api/v1/auctions/${auction.id}/bids`, "alice", { amount: native("20") });
      await post(`/api/v1/auctions/${auction.id}/bids`, "bob", { amount: native("25") });
      expect(t.service.ledger.getBalance("alice", "NATIVE").amount).toBe("100.000000");
      expect(t.service.ledger.getBalance("bob", "NATIVE").amount).toBe("75.000000");

      t.clock.advance(HOUR);
      const res = await post(`/api/v1/auctions/${auction.id}/end`, "alice");

      expect(res.status).toBe(200);
      expect(await dataOf(res)).toMatchObject({ status: "COMPLETED", highestBidder: "bob" });
      expect(t.service.ledger.getBalance("sam", "NATIVE").amount).toBe("24.375000");
      expect(t.service.ledger.getBalance("platform:fees", "NATIVE").amount).toBe("0.625000");
      expect(t.service.items.ownerOf("painting")).toBe("bob");
    });

    it("rejects a bid below the minimum increment", async () => {
      const auction = await open();
      await post(`/api/v1/auctions/${auction.id}/bids`, "alice", { amount: native("20") });

      const res = await post(`/api/v1/auctions/${auction.id}/bids`, "bob", { amount: native("20.5") });

      expect(res.status).toBe(409);
      expect(await errorOf(res)).toMatchObject({ code: "BID_TOO_LOW", details: { minimum: "21.000000" } });
    });

    it("returns the bid history with the auction", async () => {
      const auction = await open();
      await post(`/api/v1/auctions/${auction.id}/bids`, "alice", { amount: native("12") });

      const res = await t.app.request(jsonRequest(`/api/v1/auctions/${auction.id}`, "GET", undefined, "bob"));
      const body = await dataOf<{ auction: EnglishAuction; bids: { bidder: string; amount: Money }[] }>(res);
      expect(body.auction.bidCount).toBe(1);
      expect(body.bids).toEqual([
        { bidder: "alice", amount: native("12.000000"), placedAt: "2024-01-15T10:00:00.000Z" },
      ]);
    });

    it("keeps an auctioned item out of reach until the auction settles", async () => {
      const res = await post("/api/v1/auctions", "sam", {
        itemRef: "untracked",
        startingPrice: native("10"),
        minIncrement: native("1"),
        durationMs: HOUR,
      });
      const auction = await dataOf<EnglishAuction>(res);
      await post(`/api/v1/auctions/${auction.id}/bids`, "bob", { amount: native("20") });

      const claim = await post("/api/v1/items", "mallory", { itemRef: "untracked" });
      expect(claim.status).toBe(403);
      const reclaim = await post("/api/v1/items", "sam", { itemRef: "untracked" });
      expect(reclaim.status).toBe(409);
      expect((await errorOf(reclaim)).code).toBe("ITEM_LOCKED");
      const dutchSale = await post("/api/v1/dutch-auctions", "sam", {
        itemRef: "untracked",
        startingPrice: native("50"),
        reservePrice: native("10"),
        decrement: native("10"),
        intervalMs: MINUTE,
        durationMs: 10 * MINUTE,
      });
      expect(dutchSale.status).toBe(409);
      expect((await errorOf(dutchSale)).code).toBe("ITEM_LOCKED");

      t.clock.advance(HOUR);
      const ended = await post(`/api/v1/auctions/${auction.id}/end`, "bob");
      expect(await dataOf(ended)).toMatchObject({ status: "COMPLETED", highestBidder: "bob" });
      expect(t.service.ledger.getBalance("auction:auction-1", "NATIVE").amount).toBe("0.000000");
      expect(t.service.items.ownerOf("untracked")).toBe("bob");
    });

    it("stops the seller from cancelling once bids exist", async () => {
      const auction = await open();
      await post(`/api/v1/auctions/${auction.id}/bids`, "alice", { amount: native("12") });
      const res = await post(`/api/v1/auctions/${auction.id}/cancel`, "sam");
      expect(res.status).toBe(409);
      expect((await errorOf(res)).code).toBe("BIDS_PLACED");
    });
  });

  describe("Dutch auctions", () => {
    async function open(): Promise<DutchAuction> {
      await post("/api/v1/items", "sam", { itemRef: "sculpture" });
      const res = await post("/api/v1/dutch-auctions", "sam", {
        itemRef: "sculpture",
        startingPrice: native("1000"),
        reservePrice: native("200"),
        decrement: native("50"),
        intervalMs: MINUTE,
        durationMs: HOUR,
      });
      expect(res.status).toBe(201);
      return dataOf<DutchAuction>(res);
    }

    it("sells at the decayed price and refunds the excess", async () => {
      const auction = await open();
      t.clock.advance(5 * MINUTE);

      const view = await t.app.request(jsonRequest(`/api/v1/dutch-auctions/${auction.id}`, "GET", undefined, "carol"));
      expect((await dataOf<{ effectivePrice: Money }>(view)).effectivePrice).toEqual(native("750.000000"));

      const res = await post(`/api/v1/dutch-auctions/${auction.id}/purchase`, "carol", { payment: native("800") });

      expect(res.status).toBe(201);
      expect(await dataOf(res)).toMatchObject({
        price: native("750.000000"),
        fee: native("18.750000"),
        net: native("731.250000"),
        refunded: native("50.000000"),
      });
      expect(t.service.ledger.getBalance("carol", "NATIVE").amount).toBe("250.000000");
      expect(t.service.ledger.getBalance("sam", "NATIVE").amount).toBe("731.250000");
      expect(t.service.items.ownerOf("sculpture")).toBe("carol");
    });

    it("rejects a payment below the current price", async () => {
      const auction = await open();
      const res = await post(`/api/v1/dutch-auctions/${auction.id}/purchase`, "carol", { payment: native("999") });
      expect(res.status).toBe(409);
      expect((await errorOf(res)).code).toBe("PAYMENT_TOO_LOW");
    });

    it("records a refreshed price on whole intervals", async () => {
      const auction = await open();
      t.clock.advance(2 * MINUTE + 30_000);

      const res = await post(`/api/v1/dutch-auctions/${auction.id}/refresh`, "anyone");
      expect(await dataOf(res)).toMatchObject({
        lastPrice: native("900.000000"),
        lastPriceUpdateAt: "2024-01-15T10:02:00.000Z",
      });
    });

    it("refuses a curve that cannot reach the reserve in time", async () => {
      await post("/api/v1/items", "sam", { itemRef: "vase" });
      const res = await post("/api/v1/dutch-auctions", "sam", {
        itemRef: "vase",
        startingPrice: native("1000"),
        reservePrice: native("200"),
        decrement: native("50"),
        intervalMs: MINUTE,
        durationMs: 10 * MINUTE,
      });
      expect(res.status).toBe(400);
      expect((await errorOf(res)).code).toBe("INVALID_PRICE_CURVE");
    });
  });
});
