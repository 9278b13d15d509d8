/**
 * Escrow Engine
 *
 * Holds a buyer's funds in a custody account (`escrow:<id>`) until one
 * of the terminal transitions moves them out.
 *
 * Rules:
 * - Buyer and seller must differ; the arbiter is neither
 * - Only the buyer releases, and only before expiry
 * - Only the seller refunds
 * - Either party disputes; only the arbiter resolves
 * - After expiry only the buyer can reclaim an undisputed escrow
 * - Every check runs before the ledger is touched
 */

import {
  AuthorizationError,
  custodyAccountId,
  DEFAULT_FEE_BPS,
  EventRecorder,
  ExpiredError,
  fromBaseUnits,
  NotFoundError,
  StateError,
  toIso,
  toPositiveBaseUnits,
  ValidationError,
  zeroMoney,
} from "@ledgerline/ledger";
import type { AccountLedger, Movement } from "@ledgerline/ledger";
import type { Principal } from "@ledgerline/types";
import type {
  CreateEscrowInput,
  Escrow,
  EscrowEngineConfig,
  EscrowFilter,
  EscrowParty,
  EscrowSettlement,
  EscrowStatus,
} from "./types.js";

export const DEFAULT_ARBITER = "arbiter";

export class EscrowEngine {
  private readonly escrows: Map<string, Escrow> = new Map();
  private readonly ledger: AccountLedger;
  private readonly config: EscrowEngineConfig;
  private readonly events: EventRecorder;

  constructor(config: EscrowEngineConfig) {
    this.config = config;
    this.ledger = config.ledger;
    this.events = new EventRecorder("escrow", {
      clock: config.clock,
      ids: config.ids,
      sink: config.events,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Creation
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create an escrow and fund it from the caller (the buyer).
   */
  create(caller: Principal, input: CreateEscrowInput): Escrow {
    const arbiter = input.arbiter ?? this.config.arbiter ?? DEFAULT_ARBITER;
    if (!input.seller || caller === input.seller) {
      throw new ValidationError("INVALID_PARTIES", "Buyer and seller must be two different principals");
    }
    this.ledger.assertPrincipal(caller, "Buyer");
    this.ledger.assertPrincipal(input.seller, "Seller");
    this.ledger.assertPrincipal(arbiter, "Arbiter");
    if (arbiter === caller || arbiter === input.seller) {
      throw new ValidationError("INVALID_PARTIES", "The arbiter cannot be a party to the escrow");
    }

    const amount = fromBaseUnits(
      toPositiveBaseUnits(input.amount, "Escrow amount"),
      input.amount.currency,
      input.amount.decimals,
    );
    const feeBps = this.ledger.fees.clamp(this.config.feeBps ?? DEFAULT_FEE_BPS);
    const now = this.config.clock.now();
    const expiresAt = this.resolveExpiry(input, now);

    const funding: Movement = { from: caller, to: custodyAccountId("escrow", "pending"), money: amount };
    this.ledger.validateBatch([funding]);

    const id = this.config.ids.next("escrow");
    this.ledger.applyBatch(
      id,
      [{ from: caller, to: custodyAccountId("escrow", id), money: amount }],
      { actor: caller, memo: "escrow.create" },
    );

    const escrow: Escrow = {
      id,
      buyer: caller,
      seller: input.seller,
      arbiter,
      amount,
      feeBps,
      status: "FUNDED",
      createdAt: toIso(now),
      expiresAt: toIso(expiresAt),
    };
    this.escrows.set(id, escrow);

    this.events.record("escrow", id, "created", caller, {
      buyer: escrow.buyer,
      seller: escrow.seller,
      arbiter,
      amount: amount.amount,
      currency: amount.currency,
      expiresAt: escrow.expiresAt,
    });
    return escrow;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transitions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Buyer releases the funds to the seller, less the platform fee.
   */
  release(id: string, caller: Principal): Escrow {
    const escrow = this.get(id);
    this.assertCaller(escrow, caller, ["buyer"], "release");
    this.assertStatus(escrow, "FUNDED", "release");
    if (this.config.clock.now() > Date.parse(escrow.expiresAt)) {
      throw new ExpiredError(`Escrow '${id}' expired at ${escrow.expiresAt}`, { escrowId: id });
    }

    const settlement = this.payout(escrow, escrow.seller, caller, "escrow.release");
    const updated = this.settle(escrow, "RELEASED", settlement);

    this.events.record("escrow", id, "released", caller, {
      seller: escrow.seller,
      net: settlement.net.amount,
      fee: settlement.fee.amount,
      currency: escrow.amount.currency,
    });
    return updated;
  }

  /**
   * Seller gives the full amount back to the buyer.
   */
  refund(id: string, caller: Principal): Escrow {
    const escrow = this.get(id);
    this.assertCaller(escrow, caller, ["seller"], "refund");
    this.assertStatus(escrow, "FUNDED", "refund");

    const updated = this.settle(escrow, "REFUNDED", this.payout(escrow, escrow.buyer, caller, "escrow.refund"));
    this.recordRefund(escrow, caller, "refunded");
    return updated;
  }

  /**
   * Either party freezes the escrow until the arbiter decides.
   */
  dispute(id: string, caller: Principal): Escrow {
    const escrow = this.get(id);
    this.assertCaller(escrow, caller, ["buyer", "seller"], "dispute");
    this.assertStatus(escrow, "FUNDED", "dispute");

    const updated: Escrow = { ...escrow, status: "DISPUTED", disputedBy: caller };
    this.escrows.set(id, updated);

    this.events.record("escrow", id, "disputed", caller, { disputedBy: caller });
    return updated;
  }

  /**
   * Arbiter settles a dispute. A seller win is fee-skimmed; a buyer win
   * is a full refund.
   */
  resolve(id: string, caller: Principal, winner: EscrowParty): Escrow {
    const escrow = this.get(id);
    if (caller !== escrow.arbiter) {
      throw new AuthorizationError(`Only the arbiter can resolve escrow '${id}'`, { escrowId: id, caller });
    }
    if (winner !== "buyer" && winner !== "seller") {
      throw new ValidationError("INVALID_PARTIES", `Winner must be "buyer" or "seller", got "${String(winner)}"`);
    }
    this.assertStatus(escrow, "DISPUTED", "resolve");

    const recipient = winner === "seller" ? escrow.seller : escrow.buyer;
    const settlement = this.payout(escrow, recipient, caller, "escrow.resolve");
    const updated = this.settle({ ...escrow, resolution: winner }, "RESOLVED", settlement);

    this.events.record("escrow", id, "resolved", caller, {
      winner,
      recipient,
      net: settlement.net.amount,
      fee: settlement.fee.amount,
      currency: escrow.amount.currency,
    });
    if (winner === "buyer") {
      this.recordRefund(escrow, caller, "dispute");
    }
    return updated;
  }

  /**
   * Buyer reclaims the full amount of an escrow nobody settled in time.
   */
  claimExpired(id: string, caller: Principal): Escrow {
    const escrow = this.get(id);
    this.assertCaller(escrow, caller, ["buyer"], "reclaim");
    this.assertStatus(escrow, "FUNDED", "reclaim");
    if (this.config.clock.now() <= Date.parse(escrow.expiresAt)) {
      throw new StateError("NOT_DUE", `Escrow '${id}' does not expire until ${escrow.expiresAt}`, {
        escrowId: id,
        expiresAt: escrow.expiresAt,
      });
    }

    const updated = this.settle(escrow, "REFUNDED", this.payout(escrow, escrow.buyer, caller, "escrow.expire"));
    this.recordRefund(escrow, caller, "expired");
    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(id: string): Escrow {
    const escrow = this.escrows.get(id);
    if (!escrow) {
      throw new NotFoundError(`Escrow '${id}' not found`, { escrowId: id });
    }
    return escrow;
  }

  list(filter?: EscrowFilter): readonly Escrow[] {
    return [...this.escrows.values()].filter((e) => {
      if (filter?.status !== undefined && e.status !== filter.status) return false;
      if (filter?.party !== undefined) {
        const p = filter.party;
        if (e.buyer !== p && e.seller !== p && e.arbiter !== p) return false;
      }
      return true;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private resolveExpiry(input: CreateEscrowInput, now: number): number {
    if ((input.expiresAt === undefined) === (input.ttlMs === undefined)) {
      throw new ValidationError("INVALID_EXPIRY", "Provide exactly one of expiresAt or ttlMs");
    }
    if (input.ttlMs !== undefined) {
      if (!Number.isSafeInteger(input.ttlMs) || input.ttlMs <= 0) {
        throw new ValidationError("INVALID_EXPIRY", `ttlMs must be a positive integer, got ${String(input.ttlMs)}`);
      }
      return now + input.ttlMs;
    }

    const at = Date.parse(input.expiresAt ?? "");
    if (!Number.isFinite(at) || at <= now) {
      throw new ValidationError("INVALID_EXPIRY", `Expiry must be a future instant, got "${String(input.expiresAt)}"`);
    }
    return at;
  }

  /**
   * Move the escrowed amount out of custody. Sellers pay the fee,
   * buyers get everything back.
   */
  private payout(escrow: Escrow, recipient: Principal, actor: Principal, memo: string): EscrowSettlement {
    const custody = custodyAccountId("escrow", escrow.id);

    if (recipient === escrow.seller) {
      const plan = this.ledger.planFeeTransfer(custody, recipient, escrow.amount, escrow.feeBps);
      this.ledger.applyBatch(escrow.id, plan.movements, { actor, memo });
      return { recipient, net: plan.net, fee: plan.fee };
    }

    this.ledger.applyBatch(escrow.id, [{ from: custody, to: recipient, money: escrow.amount }], { actor, memo });
    return {
      recipient,
      net: escrow.amount,
      fee: zeroMoney(escrow.amount.currency, escrow.amount.decimals),
    };
  }

  private settle(escrow: Escrow, status: EscrowStatus, settlement: EscrowSettlement): Escrow {
    const updated: Escrow = {
      ...escrow,
      status,
      settlement,
      settledAt: toIso(this.config.clock.now()),
    };
    this.escrows.set(escrow.id, updated);
    return updated;
  }

  private recordRefund(escrow: Escrow, caller: Principal, reason: "refunded" | "expired" | "dispute"): void {
    this.events.record("escrow", escrow.id, "refunded", caller, {
      buyer: escrow.buyer,
      amount: escrow.amount.amount,
      currency: escrow.amount.currency,
      reason,
    });
  }

  private assertCaller(escrow: Escrow, caller: Principal, parties: readonly EscrowParty[], action: string): void {
    if (!parties.some((party) => escrow[party] === caller)) {
      throw new AuthorizationError(
        `Only the ${parties.join(" or ")} can ${action} escrow '${escrow.id}'`,
        { escrowId: escrow.id, caller },
      );
    }
  }

  private assertStatus(escrow: Escrow, expected: EscrowStatus, action: string): void {
    if (escrow.status !== expected) {
      throw new StateError(
        "INVALID_TRANSITION",
        `Cannot ${action} escrow '${escrow.id}' in status '${escrow.status}'`,
        { escrowId: escrow.id, status: escrow.status },
      );
    }
  }
}
