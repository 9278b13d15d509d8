/**
 * Dutch Auction Engine
 *
 * The price falls by `decrement` at each whole interval since the last
 * stored update, never below the reserve. The first buyer paying at least
 * the effective price wins; any excess is refunded in the same batch.
 */

import {
  assertSameCurrency,
  AuthorizationError,
  custodyAccountId,
  DEFAULT_FEE_BPS,
  EventRecorder,
  ExpiredError,
  fromBaseUnits,
  NotFoundError,
  StateError,
  ThresholdError,
  toBaseUnits,
  toIso,
  toPositiveBaseUnits,
} from "@ledgerline/ledger";
import type { AccountLedger, Movement } from "@ledgerline/ledger";
import type { Money, Principal } from "@ledgerline/types";
import { assertItemAvailable, canDeliver, deliverItem } from "./item-registry.js";
import { assertFeasibleCurve, elapsedSteps, priceAfterSteps } from "./pricing.js";
import type {
  AuctionEngineConfig,
  CreateDutchAuctionInput,
  DutchAuction,
  DutchAuctionFilter,
  DutchPurchase,
} from "./types.js";

export class DutchAuctionEngine {
  private readonly auctions: Map<string, DutchAuction> = new Map();
  private readonly ledger: AccountLedger;
  private readonly config: AuctionEngineConfig;
  private readonly events: EventRecorder;

  constructor(config: AuctionEngineConfig) {
    this.config = config;
    this.ledger = config.ledger;
    this.events = new EventRecorder("auction", {
      clock: config.clock,
      ids: config.ids,
      sink: config.events,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  create(caller: Principal, input: CreateDutchAuctionInput): DutchAuction {
    this.ledger.assertPrincipal(caller, "Seller");
    assertItemAvailable(this.config.items, input.itemRef, caller);

    const { currency, decimals } = input.startingPrice;
    const starting = toPositiveBaseUnits(input.startingPrice, "Starting price");
    assertSameCurrency(input.startingPrice, input.reservePrice);
    assertSameCurrency(input.startingPrice, input.decrement);
    const reserve = toBaseUnits(input.reservePrice);
    const decrement = toBaseUnits(input.decrement);
    assertFeasibleCurve(
      { startingPrice: starting, reservePrice: reserve, decrement, intervalMs: input.intervalMs },
      input.durationMs,
    );
    const feeBps = this.ledger.fees.clamp(this.config.feeBps ?? DEFAULT_FEE_BPS);

    const now = this.config.clock.now();
    const id = this.config.ids.next("dutch-auction");
    this.config.items?.hold(input.itemRef, caller, id);
    const startingPrice = fromBaseUnits(starting, currency, decimals);
    const auction: DutchAuction = {
      id,
      itemRef: input.itemRef,
      seller: caller,
      startingPrice,
      reservePrice: fromBaseUnits(reserve, currency, decimals),
      decrement: fromBaseUnits(decrement, currency, decimals),
      intervalMs: input.intervalMs,
      lastPrice: startingPrice,
      lastPriceUpdateAt: toIso(now),
      startsAt: toIso(now),
      endsAt: toIso(now + input.durationMs),
      feeBps,
      status: "ACTIVE",
    };
    this.auctions.set(id, auction);

    this.events.record("dutch-auction", id, "created", caller, {
      seller: caller,
      itemRef: input.itemRef,
      startingPrice: startingPrice.amount,
      reservePrice: auction.reservePrice.amount,
      currency,
      endsAt: auction.endsAt,
    });
    return auction;
  }

  /**
   * Price a buyer would pay right now. Pure: reading it changes nothing.
   */
  effectivePrice(id: string): Money {
    const auction = this.get(id);
    const { currency, decimals } = auction.startingPrice;
    return fromBaseUnits(this.currentUnits(auction), currency, decimals);
  }

  /**
   * Store the effective price. lastPriceUpdateAt advances by whole
   * intervals only, so effectivePrice() returns the same value before and
   * after.
   */
  refreshPrice(id: string, caller: Principal = "system"): DutchAuction {
    const auction = this.get(id);
    this.assertActive(auction, "refresh");

    const since = Date.parse(auction.lastPriceUpdateAt);
    const steps = elapsedSteps(since, this.config.clock.now(), auction.intervalMs);
    if (steps === 0) {
      return auction;
    }

    const { currency, decimals } = auction.startingPrice;
    const updated: DutchAuction = {
      ...auction,
      lastPrice: fromBaseUnits(this.currentUnits(auction), currency, decimals),
      lastPriceUpdateAt: toIso(since + steps * auction.intervalMs),
    };
    this.auctions.set(id, updated);

    this.events.record("dutch-auction", id, "price-refreshed", caller, {
      price: updated.lastPrice.amount,
      at: updated.lastPriceUpdateAt,
    });
    return updated;
  }

  /**
   * Buy at the effective price. The full payment is taken into custody
   * and split between seller, platform and (for any excess) the buyer.
   */
  purchase(id: string, caller: Principal, payment: Money): DutchPurchase {
    const auction = this.get(id);
    this.assertActive(auction, "purchase from");
    if (this.config.clock.now() >= Date.parse(auction.endsAt)) {
      throw new ExpiredError(`Dutch auction '${id}' ended at ${auction.endsAt}`, { auctionId: id });
    }
    if (caller === auction.seller) {
      throw new AuthorizationError(`The seller cannot buy from Dutch auction '${id}'`, { auctionId: id, caller });
    }
    this.ledger.assertPrincipal(caller, "Buyer");

    const paid = toPositiveBaseUnits(payment, "Payment");
    assertSameCurrency(payment, auction.startingPrice);
    const priceUnits = this.currentUnits(auction);
    const { currency, decimals } = auction.startingPrice;
    const price = fromBaseUnits(priceUnits, currency, decimals);
    if (paid < priceUnits) {
      throw new ThresholdError(
        "PAYMENT_TOO_LOW",
        `Payment of ${payment.amount} ${currency} is below the current price of ${price.amount}`,
        { auctionId: id, price: price.amount },
      );
    }
    if (!canDeliver(this.config.items, auction.itemRef, auction.seller)) {
      throw new StateError("ITEM_UNAVAILABLE", `The seller no longer owns item '${auction.itemRef}'`, {
        auctionId: id,
        itemRef: auction.itemRef,
      });
    }

    const custody = custodyAccountId("auction", id);
    const plan = this.ledger.planFeeTransfer(custody, auction.seller, price, auction.feeBps);
    const excess = paid - priceUnits;
    const refunded = fromBaseUnits(excess, currency, decimals);
    const movements: Movement[] = [
      { from: caller, to: custody, money: fromBaseUnits(paid, currency, decimals) },
      ...plan.movements,
    ];
    if (excess > 0n) {
      movements.push({ from: custody, to: caller, money: refunded });
    }
    this.ledger.applyBatch(id, movements, { actor: caller, memo: "auction.purchase" });
    deliverItem(this.config.items, auction.itemRef, id, auction.seller, caller);

    const completed: DutchAuction = {
      ...auction,
      status: "COMPLETED",
      buyer: caller,
      soldPrice: price,
      settledAt: toIso(this.config.clock.now()),
    };
    this.auctions.set(id, completed);

    this.events.record("dutch-auction", id, "purchased", caller, {
      buyer: caller,
      price: price.amount,
      refunded: refunded.amount,
      currency,
    });
    return { auction: completed, price, fee: plan.fee, net: plan.net, refunded };
  }

  /** Close an unsold auction: the seller at any time, anyone after endsAt. */
  end(id: string, caller: Principal): DutchAuction {
    const auction = this.get(id);
    this.assertActive(auction, "end");
    if (caller !== auction.seller && this.config.clock.now() < Date.parse(auction.endsAt)) {
      throw new StateError("AUCTION_RUNNING", `Dutch auction '${id}' runs until ${auction.endsAt}`, {
        auctionId: id,
        endsAt: auction.endsAt,
      });
    }
    return this.close(auction, "ENDED", "ended", caller);
  }

  /** Seller withdraws a running auction. */
  cancel(id: string, caller: Principal): DutchAuction {
    const auction = this.get(id);
    if (caller !== auction.seller) {
      throw new AuthorizationError(`Only the seller can cancel Dutch auction '${id}'`, { auctionId: id, caller });
    }
    this.assertActive(auction, "cancel");
    if (this.config.clock.now() >= Date.parse(auction.endsAt)) {
      throw new ExpiredError(`Dutch auction '${id}' ended at ${auction.endsAt}`, { auctionId: id });
    }
    return this.close(auction, "CANCELLED", "cancelled", caller);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(id: string): DutchAuction {
    const auction = this.auctions.get(id);
    if (!auction) {
      throw new NotFoundError(`Dutch auction '${id}' not found`, { auctionId: id });
    }
    return auction;
  }

  list(filter?: DutchAuctionFilter): readonly DutchAuction[] {
    return [...this.auctions.values()].filter(
      (a) =>
        (filter?.seller === undefined || a.seller === filter.seller) &&
        (filter?.status === undefined || a.status === filter.status),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private currentUnits(auction: DutchAuction): bigint {
    const steps = elapsedSteps(Date.parse(auction.lastPriceUpdateAt), this.config.clock.now(), auction.intervalMs);
    return priceAfterSteps(
      toBaseUnits(auction.lastPrice),
      toBaseUnits(auction.reservePrice),
      toBaseUnits(auction.decrement),
      steps,
    );
  }

  private close(
    auction: DutchAuction,
    status: "ENDED" | "CANCELLED",
    action: "ended" | "cancelled",
    caller: Principal,
  ): DutchAuction {
    const closed: DutchAuction = { ...auction, status, settledAt: toIso(this.config.clock.now()) };
    this.auctions.set(auction.id, closed);
    this.config.items?.release(auction.itemRef, auction.id);
    this.events.record("dutch-auction", auction.id, action, caller, {});
    return closed;
  }

  private assertActive(auction: DutchAuction, action: string): void {
    if (auction.status !== "ACTIVE") {
      throw new StateError(
        "AUCTION_CLOSED",
        `Cannot ${action} Dutch auction '${auction.id}': it is ${auction.status}`,
        { auctionId: auction.id, status: auction.status },
      );
    }
  }
}
