/**
 * Runtime type guard tests for @ledgerline/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isMoney,
  isLedgerEntryType,
  isLedgerEntry,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";

// =============================================================================
// Financial guards
// =============================================================================

describe("isMoney", () => {
  it("accepts valid Money", () => {
    expect(isMoney({ amount: "100.50", currency: "NATIVE", decimals: 6 })).toBe(true);
  });

  it("accepts zero decimals", () => {
    expect(isMoney({ amount: "1", currency: "GEM", decimals: 0 })).toBe(true);
  });

  it("rejects null and non-objects", () => {
    expect(isMoney(null)).toBe(false);
    expect(isMoney("100")).toBe(false);
    expect(isMoney(undefined)).toBe(false);
  });

  it("rejects numeric amount (must be string)", () => {
    expect(isMoney({ amount: 100, currency: "NATIVE", decimals: 6 })).toBe(false);
  });

  it("rejects an empty currency", () => {
    expect(isMoney({ amount: "1", currency: "", decimals: 6 })).toBe(false);
  });

  it("rejects negative or fractional decimals", () => {
    expect(isMoney({ amount: "1", currency: "X", decimals: -1 })).toBe(false);
    expect(isMoney({ amount: "1", currency: "X", decimals: 1.5 })).toBe(false);
  });
});

describe("isLedgerEntryType", () => {
  it("accepts debit and credit", () => {
    expect(isLedgerEntryType("debit")).toBe(true);
    expect(isLedgerEntryType("credit")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isLedgerEntryType("transfer")).toBe(false);
    expect(isLedgerEntryType(1)).toBe(false);
  });
});

describe("isLedgerEntry", () => {
  const valid = {
    id: "batch-1:0",
    accountId: "alice",
    type: "debit",
    money: { amount: "10", currency: "NATIVE", decimals: 6 },
    timestamp: "2024-01-15T10:00:00.000Z",
    batchId: "batch-1",
    correlationId: "escrow-1",
  };

  it("accepts a valid entry", () => {
    expect(isLedgerEntry(valid)).toBe(true);
  });

  it("accepts an entry with a memo", () => {
    expect(isLedgerEntry({ ...valid, memo: "escrow.release" })).toBe(true);
  });

  it("rejects a non-string memo", () => {
    expect(isLedgerEntry({ ...valid, memo: 7 })).toBe(false);
  });

  it("rejects an entry without a batch id", () => {
    const { batchId: _batchId, ...rest } = valid;
    expect(isLedgerEntry(rest)).toBe(false);
  });

  it("rejects an invalid entry type", () => {
    expect(isLedgerEntry({ ...valid, type: "mint" })).toBe(false);
  });

  it("rejects malformed money", () => {
    expect(isLedgerEntry({ ...valid, money: { amount: "1" } })).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

describe("isEventSource", () => {
  it("accepts every settlement subsystem", () => {
    for (const source of ["ledger", "escrow", "multisig", "auction", "payments"]) {
      expect(isEventSource(source)).toBe(true);
    }
  });

  it("rejects unknown subsystems", () => {
    expect(isEventSource("marketplace")).toBe(false);
  });
});

describe("isEventMetadata / isDomainEvent", () => {
  const metadata = {
    eventId: "evt-1",
    timestamp: "2024-01-15T10:00:00.000Z",
    actor: "alice",
    correlationId: "escrow-1",
    source: "escrow",
  };

  it("accepts valid metadata", () => {
    expect(isEventMetadata(metadata)).toBe(true);
  });

  it("rejects metadata with an unknown source", () => {
    expect(isEventMetadata({ ...metadata, source: "oracle" })).toBe(false);
  });

  it("accepts a valid domain event", () => {
    expect(
      isDomainEvent({ type: "escrow.escrow.created", metadata, payload: { escrowId: "escrow-1" } }),
    ).toBe(true);
  });

  it("rejects an event with a null payload", () => {
    expect(isDomainEvent({ type: "escrow.escrow.created", metadata, payload: null })).toBe(false);
  });

  it("rejects an event with invalid metadata", () => {
    expect(isDomainEvent({ type: "x", metadata: {}, payload: {} })).toBe(false);
  });
});
