/**
 * Property-Based Tests for @ledgerline/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Conservation: transfers never change total supply
 * 2. No account ever goes negative, whatever operations are attempted
 * 3. Fee split: net + fee = gross, fee ≤ gross * maxBps / 10000
 * 4. Snapshot → restore reproduces every balance
 * 5. Bigint arithmetic roundtrip (parse → format → parse = identity)
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { AccountLedger } from "../src/account-ledger.js";
import { isSettlementError } from "../src/errors.js";
import { formatAmount, parseAmount } from "../src/money-math.js";
import { ManualClock, SequentialIdGenerator } from "../src/runtime.js";
import { createLedger, native, START } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

const PRINCIPALS = ["alice", "bob", "carol", "dave"] as const;

const arbPrincipal = fc.constantFrom(...PRINCIPALS);

/** Up to 1000 NATIVE, in base units. */
const arbUnits = fc.bigInt({ min: 1n, max: 1_000_000_000n });

const arbBps = fc.integer({ min: 0, max: 10_000 });

type Op =
  | { kind: "deposit"; to: string; units: bigint }
  | { kind: "withdraw"; from: string; units: bigint }
  | { kind: "transfer"; from: string; to: string; units: bigint; bps: number };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant("deposit" as const), to: arbPrincipal, units: arbUnits }),
  fc.record({ kind: fc.constant("withdraw" as const), from: arbPrincipal, units: arbUnits }),
  fc.record({
    kind: fc.constant("transfer" as const),
    from: arbPrincipal,
    to: arbPrincipal,
    units: arbUnits,
    bps: arbBps,
  }),
);

function units(n: bigint): ReturnType<typeof native> {
  return native(formatAmount(n, 6));
}

/** Apply an op, tracking the expected supply. Rejected ops must change nothing. */
function apply(ledger: AccountLedger, op: Op): bigint {
  try {
    switch (op.kind) {
      case "deposit":
        ledger.deposit(op.to, units(op.units));
        return op.units;
      case "withdraw":
        ledger.withdraw(op.from, units(op.units));
        return -op.units;
      case "transfer":
        ledger.transferWithFee(op.from, op.to, units(op.units), op.bps);
        return 0n;
    }
  } catch (err) {
    if (!isSettlementError(err)) throw err;
    return 0n;
  }
}

function trackedAccounts(ledger: AccountLedger): string[] {
  return [...PRINCIPALS, ledger.platformAccount];
}

// =============================================================================
// Properties
// =============================================================================

describe("ledger invariants", () => {
  it("conserves total supply and never goes negative", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const { ledger } = createLedger();
        let expected = 0n;

        for (const op of ops) {
          expected += apply(ledger, op);

          for (const account of trackedAccounts(ledger)) {
            expect(ledger.balanceUnits(account, "NATIVE") >= 0n).toBe(true);
          }
          expect(parseAmount(ledger.totalSupply("NATIVE").amount, 6)).toBe(expected);
        }

        expect(ledger.verifyJournal().consistent).toBe(true);
      }),
    );
  });

  it("splits fees exactly", () => {
    fc.assert(
      fc.property(arbUnits, arbBps, (gross, bps) => {
        const { ledger } = createLedger();
        const plan = ledger.planFeeTransfer("alice", "bob", units(gross), bps);
        const fee = parseAmount(plan.fee.amount, 6);
        const net = parseAmount(plan.net.amount, 6);

        expect(net + fee).toBe(gross);
        expect(fee * 10_000n <= gross * BigInt(ledger.fees.maxBps)).toBe(true);
      }),
    );
  });

  it("restores every balance from a snapshot", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 25 }), (ops) => {
        const { ledger } = createLedger();
        for (const op of ops) apply(ledger, op);

        const restored = AccountLedger.fromSnapshot(ledger.snapshot(), {
          clock: new ManualClock(START),
          ids: new SequentialIdGenerator(),
        });
        for (const account of trackedAccounts(ledger)) {
          expect(restored.getBalance(account, "NATIVE")).toEqual(ledger.getBalance(account, "NATIVE"));
        }
      }),
      { numRuns: 50 },
    );
  });

  it("roundtrips bigint amounts through strings", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: -(10n ** 30n), max: 10n ** 30n }), fc.integer({ min: 0, max: 18 }), (n, d) => {
        expect(parseAmount(formatAmount(n, d), d)).toBe(n);
      }),
    );
  });
});
