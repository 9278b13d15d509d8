/**
 * English Auction Engine
 *
 * Rules:
 * - A bid must reach currentPrice + minIncrement
 * - The new bid is escrowed and the previous highest bidder refunded in
 *   one batch
 * - The seller can end the auction at any time; anyone can once it is
 *   over
 * - Settlement pays the seller net of the fee and hands over the item;
 *   an unmet reserve refunds the highest bidder
 * - Cancellation is only possible before the first bid
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
  ValidationError,
} from "@ledgerline/ledger";
import type { AccountLedger, Movement } from "@ledgerline/ledger";
import type { Money, Principal } from "@ledgerline/types";
import { assertItemAvailable, canDeliver, deliverItem } from "./item-registry.js";
import type {
  AuctionEngineConfig,
  AuctionFailureReason,
  AuctionFilter,
  Bid,
  CreateAuctionInput,
  EnglishAuction,
} from "./types.js";

function normalize(money: Money, label: string): Money {
  return fromBaseUnits(toPositiveBaseUnits(money, label), money.currency, money.decimals);
}

export class EnglishAuctionEngine {
  private readonly auctions: Map<string, EnglishAuction> = new Map();
  private readonly bids: Map<string, Bid[]> = new Map();
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

  /** The item is held for the auction until it closes. */
  create(caller: Principal, input: CreateAuctionInput): EnglishAuction {
    this.ledger.assertPrincipal(caller, "Seller");
    assertItemAvailable(this.config.items, input.itemRef, caller);

    const startingPrice = normalize(input.startingPrice, "Starting price");
    const minIncrement = normalize(input.minIncrement, "Minimum increment");
    assertSameCurrency(startingPrice, minIncrement);
    let reservePrice: Money | undefined;
    if (input.reservePrice !== undefined) {
      reservePrice = normalize(input.reservePrice, "Reserve price");
      assertSameCurrency(startingPrice, reservePrice);
    }
    if (!Number.isSafeInteger(input.durationMs) || input.durationMs <= 0) {
      throw new ValidationError("INVALID_DURATION", `Duration must be a positive integer, got ${String(input.durationMs)}`);
    }
    const feeBps = this.ledger.fees.clamp(this.config.feeBps ?? DEFAULT_FEE_BPS);

    const now = this.config.clock.now();
    const id = this.config.ids.next("auction");
    this.config.items?.hold(input.itemRef, caller, id);
    const auction: EnglishAuction = {
      id,
      itemRef: input.itemRef,
      seller: caller,
      startingPrice,
      currentPrice: startingPrice,
      minIncrement,
      ...(reservePrice !== undefined ? { reservePrice } : {}),
      feeBps,
      bidCount: 0,
      startsAt: toIso(now),
      endsAt: toIso(now + input.durationMs),
      status: "ACTIVE",
    };
    this.auctions.set(id, auction);
    this.bids.set(id, []);

    this.events.record("auction", id, "created", caller, {
      seller: caller,
      itemRef: input.itemRef,
      startingPrice: startingPrice.amount,
      currency: startingPrice.currency,
      endsAt: auction.endsAt,
    });
    return auction;
  }

  /**
   * Place a bid. The bidder's funds move into custody and the previous
   * highest bid is returned in the same batch.
   */
  placeBid(id: string, caller: Principal, amount: Money): EnglishAuction {
    const auction = this.get(id);
    this.assertActive(auction, "bid on");
    if (this.config.clock.now() >= Date.parse(auction.endsAt)) {
      throw new ExpiredError(`Auction '${id}' ended at ${auction.endsAt}`, { auctionId: id });
    }
    if (caller === auction.seller) {
      throw new AuthorizationError(`The seller cannot bid on auction '${id}'`, { auctionId: id, caller });
    }
    this.ledger.assertPrincipal(caller, "Bidder");

    const bid = toPositiveBaseUnits(amount, "Bid");
    assertSameCurrency(amount, auction.startingPrice);
    const minimum = toBaseUnits(auction.currentPrice) + toBaseUnits(auction.minIncrement);
    if (bid < minimum) {
      const { currency, decimals } = auction.startingPrice;
      throw new ThresholdError(
        "BID_TOO_LOW",
        `Bid of ${amount.amount} ${currency} is below the minimum of ${fromBaseUnits(minimum, currency, decimals).amount}`,
        { auctionId: id, minimum: fromBaseUnits(minimum, currency, decimals).amount },
      );
    }

    const custody = custodyAccountId("auction", id);
    const money = fromBaseUnits(bid, amount.currency, amount.decimals);
    const movements: Movement[] = [{ from: caller, to: custody, money }];
    const previousBidder = auction.highestBidder;
    if (previousBidder !== undefined) {
      movements.push({ from: custody, to: previousBidder, money: auction.currentPrice });
    }
    this.ledger.applyBatch(id, movements, { actor: caller, memo: "auction.bid" });

    const placedAt = toIso(this.config.clock.now());
    const updated: EnglishAuction = {
      ...auction,
      currentPrice: money,
      highestBidder: caller,
      bidCount: auction.bidCount + 1,
    };
    this.auctions.set(id, updated);
    this.bids.get(id)?.push({ bidder: caller, amount: money, placedAt });

    this.events.record("auction", id, "bid-placed", caller, {
      bidder: caller,
      amount: money.amount,
      currency: money.currency,
      ...(previousBidder !== undefined ? { previousBidder } : {}),
    });
    return updated;
  }

  /**
   * Close the auction and settle it.
   */
  end(id: string, caller: Principal): EnglishAuction {
    const auction = this.get(id);
    this.assertActive(auction, "end");
    if (caller !== auction.seller && this.config.clock.now() < Date.parse(auction.endsAt)) {
      throw new StateError("AUCTION_RUNNING", `Auction '${id}' runs until ${auction.endsAt}`, {
        auctionId: id,
        endsAt: auction.endsAt,
      });
    }

    const winner = auction.highestBidder;
    if (winner === undefined) {
      return this.fail(auction, caller, "no-bids");
    }

    const custody = custodyAccountId("auction", id);
    const reserveMet =
      auction.reservePrice === undefined || toBaseUnits(auction.currentPrice) >= toBaseUnits(auction.reservePrice);
    const deliverable = canDeliver(this.config.items, auction.itemRef, auction.seller);
    if (!reserveMet || !deliverable) {
      this.ledger.applyBatch(id, [{ from: custody, to: winner, money: auction.currentPrice }], {
        actor: caller,
        memo: "auction.refund",
      });
      return this.fail(auction, caller, reserveMet ? "item-unavailable" : "reserve-not-met");
    }

    const plan = this.ledger.planFeeTransfer(custody, auction.seller, auction.currentPrice, auction.feeBps);
    this.ledger.applyBatch(id, plan.movements, { actor: caller, memo: "auction.settle" });
    deliverItem(this.config.items, auction.itemRef, id, auction.seller, winner);

    const completed: EnglishAuction = {
      ...auction,
      status: "COMPLETED",
      settledAt: toIso(this.config.clock.now()),
    };
    this.auctions.set(id, completed);

    this.events.record("auction", id, "completed", caller, {
      winner,
      price: auction.currentPrice.amount,
      net: plan.net.amount,
      fee: plan.fee.amount,
      currency: auction.currentPrice.currency,
    });
    return completed;
  }

  /** Seller withdraws an auction nobody has bid on. */
  cancel(id: string, caller: Principal): EnglishAuction {
    const auction = this.get(id);
    if (caller !== auction.seller) {
      throw new AuthorizationError(`Only the seller can cancel auction '${id}'`, { auctionId: id, caller });
    }
    this.assertActive(auction, "cancel");
    if (auction.bidCount > 0) {
      throw new StateError("BIDS_PLACED", `Auction '${id}' already has ${String(auction.bidCount)} bid(s)`, {
        auctionId: id,
      });
    }

    const cancelled: EnglishAuction = { ...auction, status: "CANCELLED", settledAt: toIso(this.config.clock.now()) };
    this.auctions.set(id, cancelled);
    this.config.items?.release(auction.itemRef, id);
    this.events.record("auction", id, "cancelled", caller, {});
    return cancelled;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(id: string): EnglishAuction {
    const auction = this.auctions.get(id);
    if (!auction) {
      throw new NotFoundError(`Auction '${id}' not found`, { auctionId: id });
    }
    return auction;
  }

  list(filter?: AuctionFilter): readonly EnglishAuction[] {
    return [...this.auctions.values()].filter(
      (a) =>
        (filter?.seller === undefined || a.seller === filter.seller) &&
        (filter?.status === undefined || a.status === filter.status),
    );
  }

  /** Accepted bids, oldest first. */
  getBids(id: string): readonly Bid[] {
    this.get(id);
    return [...(this.bids.get(id) ?? [])];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private fail(auction: EnglishAuction, caller: Principal, reason: AuctionFailureReason): EnglishAuction {
    const failed: EnglishAuction = {
      ...auction,
      status: "FAILED",
      failureReason: reason,
      settledAt: toIso(this.config.clock.now()),
    };
    this.auctions.set(auction.id, failed);
    this.config.items?.release(auction.itemRef, auction.id);
    this.events.record("auction", auction.id, "failed", caller, { reason });
    return failed;
  }

  private assertActive(auction: EnglishAuction, action: string): void {
    if (auction.status !== "ACTIVE") {
      throw new StateError("AUCTION_CLOSED", `Cannot ${action} auction '${auction.id}': it is ${auction.status}`, {
        auctionId: auction.id,
        status: auction.status,
      });
    }
  }
}
