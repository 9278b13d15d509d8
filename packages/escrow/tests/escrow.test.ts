/**
 * Tests for EscrowEngine.
 *
 * Covers:
 * - Creation checks and funding into custody
 * - Release, refund, dispute, resolve, claimExpired
 * - Caller, status and expiry checks leave state untouched
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  AuthorizationError,
  ExpiredError,
  InsufficientFundsError,
  ManualClock,
  NotFoundError,
  SequentialIdGenerator,
  StateError,
  ValidationError,
} from "@ledgerline/ledger";
import type { AccountLedger } from "@ledgerline/ledger";
import { EscrowEngine } from "../src/escrow.js";
import { captureError, createEscrowEngine, HOUR, native, RecordingSink, START } from "./helpers.js";

describe("EscrowEngine", () => {
  let engine: EscrowEngine;
  let ledger: AccountLedger;
  let clock: ManualClock;
  let sink: RecordingSink;

  beforeEach(() => {
    ({ engine, ledger, clock, sink } = createEscrowEngine());
    ledger.deposit("alice", native("100"));
  });

  function open(ttlMs = HOUR) {
    return engine.create("alice", { seller: "bob", amount: native("40"), ttlMs });
  }

  // ─── Creation ────────────────────────────────────────────────────────

  describe("create", () => {
    it("moves the amount from the buyer into custody", () => {
      const escrow = open();

      expect(escrow).toEqual({
        id: "escrow-1",
        buyer: "alice",
        seller: "bob",
        arbiter: "arbiter",
        amount: native("40.000000"),
        feeBps: 250,
        status: "FUNDED",
        createdAt: START,
        expiresAt: "2024-01-15T11:00:00.000Z",
      });
      expect(ledger.getBalance("alice", "NATIVE").amount).toBe("60.000000");
      expect(ledger.getBalance("escrow:escrow-1", "NATIVE").amount).toBe("40.000000");
    });

    it("accepts an absolute expiry", () => {
      const escrow = engine.create("alice", {
        seller: "bob",
        amount: native("1"),
        expiresAt: "2024-01-16T10:00:00.000Z",
      });
      expect(escrow.expiresAt).toBe("2024-01-16T10:00:00.000Z");
    });

    it("records a created event on the escrow stream", () => {
      open();
      const created = sink.events.find((e) => e.event.type === "escrow.escrow.created");

      expect(created?.streamId).toBe("escrow:escrow-1");
      expect(created?.event.metadata.actor).toBe("alice");
      expect(created?.event.payload).toEqual({
        buyer: "alice",
        seller: "bob",
        arbiter: "arbiter",
        amount: "40.000000",
        currency: "NATIVE",
        expiresAt: "2024-01-15T11:00:00.000Z",
      });
    });

    it("clamps the configured fee rate to the ledger's maximum", () => {
      const greedy = new EscrowEngine({ ledger, clock, ids: new SequentialIdGenerator(), feeBps: 5000 });
      const escrow = greedy.create("alice", { seller: "bob", amount: native("1"), ttlMs: HOUR });
      expect(escrow.feeBps).toBe(1000);
    });

    it("rejects a buyer paying themselves", () => {
      const err = captureError(() => engine.create("alice", { seller: "alice", amount: native("1"), ttlMs: HOUR }));
      expect(err).toBeInstanceOf(ValidationError);
      expect((err as ValidationError).code).toBe("INVALID_PARTIES");
    });

    it("rejects an arbiter who is a party", () => {
      const err = captureError(() =>
        engine.create("alice", { seller: "bob", amount: native("1"), ttlMs: HOUR, arbiter: "bob" }),
      );
      expect((err as ValidationError).code).toBe("INVALID_PARTIES");
    });

    it("refuses ledger-reserved accounts as parties", () => {
      const first = open();
      const spendCustody = captureError(() =>
        engine.create(`escrow:${first.id}`, { seller: "mallory", amount: native("40"), ttlMs: HOUR }),
      );
      const seller = captureError(() =>
        engine.create("alice", { seller: "platform:fees", amount: native("1"), ttlMs: HOUR }),
      );
      const arbiter = captureError(() =>
        engine.create("alice", { seller: "bob", arbiter: "external:world", amount: native("1"), ttlMs: HOUR }),
      );

      expect((spendCustody as ValidationError).message).toBe('Buyer "escrow:escrow-1" is a reserved custody account');
      expect((seller as ValidationError).code).toBe("RESERVED_ACCOUNT");
      expect((arbiter as ValidationError).code).toBe("RESERVED_ACCOUNT");
      expect(ledger.getBalance("escrow:escrow-1", "NATIVE").amount).toBe("40.000000");
      expect(engine.list()).toHaveLength(1);
    });

    it("rejects a zero amount", () => {
      const err = captureError(() => engine.create("alice", { seller: "bob", amount: native("0"), ttlMs: HOUR }));
      expect((err as ValidationError).code).toBe("INVALID_AMOUNT");
    });

    it("requires exactly one form of expiry", () => {
      const neither = captureError(() => engine.create("alice", { seller: "bob", amount: native("1") }));
      const both = captureError(() =>
        engine.create("alice", { seller: "bob", amount: native("1"), ttlMs: HOUR, expiresAt: "2025-01-01T00:00:00.000Z" }),
      );
      expect((neither as ValidationError).code).toBe("INVALID_EXPIRY");
      expect((both as ValidationError).code).toBe("INVALID_EXPIRY");
    });

    it("rejects an expiry in the past", () => {
      const err = captureError(() =>
        engine.create("alice", { seller: "bob", amount: native("1"), expiresAt: START }),
      );
      expect((err as ValidationError).code).toBe("INVALID_EXPIRY");
    });

    it("fails without funds and allocates no id", () => {
      const err = captureError(() => engine.create("alice", { seller: "bob", amount: native("100.5"), ttlMs: HOUR }));
      expect(err).toBeInstanceOf(InsufficientFundsError);
      expect(engine.list()).toHaveLength(0);

      expect(open().id).toBe("escrow-1");
    });
  });

  // ─── Release ─────────────────────────────────────────────────────────

  describe("release", () => {
    it("pays the seller net of the fee", () => {
      const escrow = open();
      clock.advance(HOUR);
      const released = engine.release(escrow.id, "alice");

      expect(released.status).toBe("RELEASED");
      expect(released.settlement).toEqual({
        recipient: "bob",
        net: native("39.000000"),
        fee: native("1.000000"),
      });
      expect(released.settledAt).toBe("2024-01-15T11:00:00.000Z");
      expect(ledger.getBalance("bob", "NATIVE").amount).toBe("39.000000");
      expect(ledger.getBalance("platform:fees", "NATIVE").amount).toBe("1.000000");
      expect(ledger.getBalance("escrow:escrow-1", "NATIVE").amount).toBe("0.000000");
      expect(sink.last("escrow.escrow.released")?.payload).toEqual({
        seller: "bob",
        net: "39.000000",
        fee: "1.000000",
        currency: "NATIVE",
      });
    });

    it("only the buyer can release", () => {
      const escrow = open();
      const err = captureError(() => engine.release(escrow.id, "bob"));
      expect(err).toBeInstanceOf(AuthorizationError);
      expect(engine.get(escrow.id).status).toBe("FUNDED");
    });

    it("refuses after expiry", () => {
      const escrow = open();
      clock.advance(HOUR + 1);
      const err = captureError(() => engine.release(escrow.id, "alice"));
      expect(err).toBeInstanceOf(ExpiredError);
      expect(ledger.getBalance("escrow:escrow-1", "NATIVE").amount).toBe("40.000000");
    });

    it("cannot release twice", () => {
      const escrow = open();
      engine.release(escrow.id, "alice");
      const err = captureError(() => engine.release(escrow.id, "alice"));
      expect(err).toBeInstanceOf(StateError);
      expect((err as StateError).code).toBe("INVALID_TRANSITION");
    });
  });

  // ─── Refund ──────────────────────────────────────────────────────────

  describe("refund", () => {
    it("returns the full amount to the buyer", () => {
      const escrow = open();
      const refunded = engine.refund(escrow.id, "bob");

      expect(refunded.status).toBe("REFUNDED");
      expect(refunded.settlement?.fee).toEqual(native("0.000000"));
      expect(ledger.getBalance("alice", "NATIVE").amount).toBe("100.000000");
      expect(sink.last("escrow.escrow.refunded")?.payload).toEqual({
        buyer: "alice",
        amount: "40.000000",
        currency: "NATIVE",
        reason: "refunded",
      });
    });

    it("only the seller can refund", () => {
      const escrow = open();
      expect(captureError(() => engine.refund(escrow.id, "alice"))).toBeInstanceOf(AuthorizationError);
    });
  });

  // ─── Disputes ────────────────────────────────────────────────────────

  describe("dispute / resolve", () => {
    it("either party can dispute a funded escrow", () => {
      const escrow = open();
      const disputed = engine.dispute(escrow.id, "bob");
      expect(disputed.status).toBe("DISPUTED");
      expect(disputed.disputedBy).toBe("bob");
    });

    it("a stranger cannot dispute", () => {
      const escrow = open();
      expect(captureError(() => engine.dispute(escrow.id, "mallory"))).toBeInstanceOf(AuthorizationError);
    });

    it("a disputed escrow can no longer be released", () => {
      const escrow = open();
      engine.dispute(escrow.id, "alice");
      const err = captureError(() => engine.release(escrow.id, "alice"));
      expect((err as StateError).code).toBe("INVALID_TRANSITION");
    });

    it("the arbiter resolves for the seller with the fee skimmed", () => {
      const escrow = open();
      engine.dispute(escrow.id, "alice");
      const resolved = engine.resolve(escrow.id, "arbiter", "seller");

      expect(resolved.status).toBe("RESOLVED");
      expect(resolved.resolution).toBe("seller");
      expect(ledger.getBalance("bob", "NATIVE").amount).toBe("39.000000");
      expect(ledger.getBalance("platform:fees", "NATIVE").amount).toBe("1.000000");
    });

    it("the arbiter resolves for the buyer with a full refund", () => {
      const escrow = open();
      engine.dispute(escrow.id, "bob");
      engine.resolve(escrow.id, "arbiter", "buyer");

      expect(ledger.getBalance("alice", "NATIVE").amount).toBe("100.000000");
      expect(ledger.getBalance("platform:fees", "NATIVE").amount).toBe("0.000000");
      expect(sink.last("escrow.escrow.refunded")?.payload["reason"]).toBe("dispute");
    });

    it("only the arbiter can resolve", () => {
      const escrow = open();
      engine.dispute(escrow.id, "bob");
      expect(captureError(() => engine.resolve(escrow.id, "alice", "buyer"))).toBeInstanceOf(AuthorizationError);
    });

    it("cannot resolve an undisputed escrow", () => {
      const escrow = open();
      const err = captureError(() => engine.resolve(escrow.id, "arbiter", "seller"));
      expect((err as StateError).code).toBe("INVALID_TRANSITION");
    });
  });

  // ─── Expiry ──────────────────────────────────────────────────────────

  describe("claimExpired", () => {
    it("refunds the buyer once the escrow has expired", () => {
      const escrow = open();
      clock.advance(HOUR + 1);
      const claimed = engine.claimExpired(escrow.id, "alice");

      expect(claimed.status).toBe("REFUNDED");
      expect(ledger.getBalance("alice", "NATIVE").amount).toBe("100.000000");
      expect(sink.last("escrow.escrow.refunded")?.payload["reason"]).toBe("expired");
    });

    it("is not due at the expiry instant", () => {
      const escrow = open();
      clock.advance(HOUR);
      const err = captureError(() => engine.claimExpired(escrow.id, "alice"));
      expect(err).toBeInstanceOf(StateError);
      expect((err as StateError).code).toBe("NOT_DUE");
    });

    it("only the buyer can claim", () => {
      const escrow = open();
      clock.advance(HOUR + 1);
      expect(captureError(() => engine.claimExpired(escrow.id, "bob"))).toBeInstanceOf(AuthorizationError);
    });
  });

  // ─── Queries ─────────────────────────────────────────────────────────

  describe("get / list", () => {
    it("throws NotFoundError for an unknown id", () => {
      const err = captureError(() => engine.get("escrow-99"));
      expect(err).toBeInstanceOf(NotFoundError);
      expect((err as NotFoundError).message).toBe("Escrow 'escrow-99' not found");
    });

    it("filters by party and status", () => {
      const first = open();
      engine.create("alice", { seller: "carol", amount: native("5"), ttlMs: HOUR });
      engine.refund(first.id, "bob");

      expect(engine.list({ party: "carol" }).map((e) => e.id)).toEqual(["escrow-2"]);
      expect(engine.list({ status: "REFUNDED" }).map((e) => e.id)).toEqual(["escrow-1"]);
      expect(engine.list({ party: "arbiter" })).toHaveLength(2);
    });
  });

  // ─── Conservation ────────────────────────────────────────────────────

  it("keeps total supply constant through every outcome", () => {
    const a = open();
    const b = engine.create("alice", { seller: "bob", amount: native("20"), ttlMs: HOUR });
    engine.release(a.id, "alice");
    engine.dispute(b.id, "bob");
    engine.resolve(b.id, "arbiter", "seller");

    expect(ledger.totalSupply("NATIVE").amount).toBe("100.000000");
    expect(ledger.verifyJournal().consistent).toBe(true);
  });
});
