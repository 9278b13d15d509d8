/**
 * Tests for direct, split and batch payments.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  EXTERNAL_ACCOUNT,
  InsufficientFundsError,
  StateError,
  ThresholdError,
  ValidationError,
} from "@ledgerline/ledger";
import type { AccountLedger } from "@ledgerline/ledger";
import { PaymentScheduler } from "../src/scheduler.js";
import { captureError, createScheduler, native, RecordingSink } from "./helpers.js";

describe("PaymentScheduler — immediate payments", () => {
  let scheduler: PaymentScheduler;
  let ledger: AccountLedger;
  let sink: RecordingSink;

  beforeEach(() => {
    ({ scheduler, ledger, sink } = createScheduler());
    ledger.deposit("alice", native("100"));
  });

  // ─── Direct ──────────────────────────────────────────────────────────

  describe("direct", () => {
    it("settles net of the fee", () => {
      const payment = scheduler.direct("alice", "bob", native("100"));

      expect(payment).toMatchObject({
        id: "payment-1",
        kind: "DIRECT",
        status: "COMPLETED",
        total: native("100.000000"),
        feeBps: 250,
        settledAt: "2024-01-15T10:00:00.000Z",
      });
      expect(payment.legs).toEqual([
        { recipient: "bob", gross: native("100.000000"), fee: native("2.500000"), net: native("97.500000") },
      ]);
      expect(ledger.getBalance("alice", "NATIVE").amount).toBe("0.000000");
      expect(ledger.getBalance("bob", "NATIVE").amount).toBe("97.500000");
      expect(ledger.getBalance("platform:fees", "NATIVE").amount).toBe("2.500000");
    });

    it("records a created event", () => {
      scheduler.direct("alice", "bob", native("10"));
      expect(sink.ofType("payments.payment.created")[0]?.payload).toEqual({
        kind: "DIRECT",
        sender: "alice",
        total: "10.000000",
        currency: "NATIVE",
        status: "COMPLETED",
        recipients: ["bob"],
      });
    });

    it("writes nothing when the sender cannot pay", () => {
      const err = captureError(() => scheduler.direct("alice", "bob", native("100.000001")));
      expect(err).toBeInstanceOf(InsufficientFundsError);
      expect(scheduler.list()).toEqual([]);
      expect(scheduler.direct("alice", "bob", native("1")).id).toBe("payment-1");
    });

    it("rejects paying yourself", () => {
      const err = captureError(() => scheduler.direct("alice", "alice", native("1")));
      expect((err as ValidationError).code).toBe("INVALID_PARTIES");
    });

    it("rejects a non-positive amount", () => {
      const err = captureError(() => scheduler.direct("alice", "bob", native("0")));
      expect((err as ValidationError).code).toBe("INVALID_AMOUNT");
    });
  });

  // ─── Split ───────────────────────────────────────────────────────────

  describe("split", () => {
    it("divides by percentage and skims each share", () => {
      const payment = scheduler.split("alice", ["bob", "carol"], [60, 40], native("100"));

      expect(payment.legs.map((l) => [l.recipient, l.gross.amount, l.net.amount])).toEqual([
        ["bob", "60.000000", "58.500000"],
        ["carol", "40.000000", "39.000000"],
      ]);
      expect(ledger.getBalance("bob", "NATIVE").amount).toBe("58.500000");
      expect(ledger.getBalance("carol", "NATIVE").amount).toBe("39.000000");
      expect(ledger.getBalance("platform:fees", "NATIVE").amount).toBe("2.500000");
      expect(ledger.getBalance("alice", "NATIVE").amount).toBe("0.000000");
    });

    it("leaves rounding dust with the sender", () => {
      const payment = scheduler.split("alice", ["bob", "carol"], [50, 50], native("10.000001"));

      expect(payment.total.amount).toBe("10.000000");
      expect(payment.legs[0]?.fee.amount).toBe("0.125000");
      expect(payment.legs[0]?.net.amount).toBe("4.875000");
      expect(ledger.getBalance("alice", "NATIVE").amount).toBe("90.000000");
    });

    it("requires positive integer percentages summing to 100", () => {
      const short = captureError(() => scheduler.split("alice", ["bob", "carol"], [60, 30], native("10")));
      const fraction = captureError(() => scheduler.split("alice", ["bob", "carol"], [60.5, 39.5], native("10")));
      const zero = captureError(() => scheduler.split("alice", ["bob", "carol"], [100, 0], native("10")));
      expect((short as ValidationError).code).toBe("INVALID_PERCENTAGES");
      expect((fraction as ValidationError).code).toBe("INVALID_PERCENTAGES");
      expect((zero as ValidationError).code).toBe("INVALID_PERCENTAGES");
    });

    it("requires one percentage per recipient", () => {
      const err = captureError(() => scheduler.split("alice", ["bob", "carol"], [100], native("10")));
      expect((err as ValidationError).code).toBe("LENGTH_MISMATCH");
    });

    it("rejects a share that rounds to zero", () => {
      const err = captureError(() => scheduler.split("alice", ["bob", "carol"], [99, 1], native("0.000050")));
      expect((err as ValidationError).code).toBe("INVALID_AMOUNT");
    });
  });

  // ─── Batch ───────────────────────────────────────────────────────────

  describe("batch", () => {
    it("pays every recipient and refunds the unused funding", () => {
      const payment = scheduler.batch("alice", ["bob", "carol"], [native("10"), native("20")], native("50"));

      expect(payment.total.amount).toBe("30.000000");
      expect(payment.refunded?.amount).toBe("20.000000");
      expect(ledger.getBalance("alice", "NATIVE").amount).toBe("70.000000");
      expect(ledger.getBalance("bob", "NATIVE").amount).toBe("9.750000");
      expect(ledger.getBalance("carol", "NATIVE").amount).toBe("19.500000");
      expect(ledger.getBalance("platform:fees", "NATIVE").amount).toBe("0.750000");
      expect(ledger.getBalance("payment:payment-1", "NATIVE").amount).toBe("0.000000");
    });

    it("refuses when the amounts exceed the funding", () => {
      const err = captureError(() =>
        scheduler.batch("alice", ["bob", "carol"], [native("10"), native("20")], native("25")),
      );
      expect(err).toBeInstanceOf(ThresholdError);
      expect((err as ThresholdError).code).toBe("FUNDING_SHORTFALL");
      expect((err as ThresholdError).details).toEqual({ required: "30.000000", funded: "25.000000" });
      expect(ledger.getBalance("alice", "NATIVE").amount).toBe("100.000000");
    });

    it("requires one amount per recipient", () => {
      const err = captureError(() => scheduler.batch("alice", ["bob"], [native("1"), native("2")], native("5")));
      expect((err as ValidationError).code).toBe("LENGTH_MISMATCH");
    });

    it("rejects amounts in another currency", () => {
      const err = captureError(() =>
        scheduler.batch("alice", ["bob"], [{ amount: "1", currency: "GEM", decimals: 6 }], native("5")),
      );
      expect((err as ValidationError).code).toBe("CURRENCY_MISMATCH");
    });
  });

  it("immediate payments cannot be cancelled", () => {
    const payment = scheduler.direct("alice", "bob", native("1"));
    const err = captureError(() => scheduler.cancel(payment.id, "alice"));
    expect((err as StateError).code).toBe("INVALID_TRANSITION");
  });

  describe("reserved accounts", () => {
    it("cannot mint value by sending from the external world", () => {
      const err = captureError(() => scheduler.direct(EXTERNAL_ACCOUNT, "bob", native("1000000")));

      expect(err).toBeInstanceOf(ValidationError);
      expect((err as ValidationError).code).toBe("RESERVED_ACCOUNT");
      expect((err as ValidationError).message).toBe('Sender "external:world" is a reserved external account');
      expect(ledger.getBalance("bob", "NATIVE").amount).toBe("0.000000");
      expect(ledger.totalSupply("NATIVE").amount).toBe("100.000000");
    });

    it("cannot spend another engine's custody", () => {
      ledger.applyBatch("escrow-1", [{ from: "alice", to: "escrow:escrow-1", money: native("40") }], {
        actor: "alice",
      });

      const err = captureError(() => scheduler.direct("escrow:escrow-1", "mallory", native("40")));

      expect((err as ValidationError).code).toBe("RESERVED_ACCOUNT");
      expect(ledger.getBalance("escrow:escrow-1", "NATIVE").amount).toBe("40.000000");
      expect(ledger.getBalance("mallory", "NATIVE").amount).toBe("0.000000");
    });

    it("refuses reserved recipients in every fan-out", () => {
      const direct = captureError(() => scheduler.direct("alice", "platform:fees", native("1")));
      const split = captureError(() => scheduler.split("alice", ["bob", "wallet:wallet-1"], [50, 50], native("2")));
      const batch = captureError(() =>
        scheduler.batch("alice", ["auction:auction-1"], [native("1")], native("1")),
      );

      for (const err of [direct, split, batch]) {
        expect((err as ValidationError).code).toBe("RESERVED_ACCOUNT");
      }
      expect(ledger.getBalance("alice", "NATIVE").amount).toBe("100.000000");
    });
  });

  it("filters by recipient and kind", () => {
    scheduler.direct("alice", "bob", native("1"));
    scheduler.split("alice", ["carol", "bob"], [50, 50], native("2"));

    expect(scheduler.list({ recipient: "carol" }).map((p) => p.id)).toEqual(["payment-2"]);
    expect(scheduler.list({ recipient: "bob" })).toHaveLength(2);
    expect(scheduler.list({ kind: "DIRECT" }).map((p) => p.id)).toEqual(["payment-1"]);
  });
});
