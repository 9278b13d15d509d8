/**
 * Auction Types
 *
 * English auction: ascending bids held in `auction:<id>`, settled to the
 * seller (fee-skimmed) when the auction ends with the reserve met.
 *
 * Dutch auction: a price that falls by `decrement` every `intervalMs`
 * down to the reserve; the first buyer paying at least the current price
 * takes the item.
 */

import type { EngineDeps } from "@ledgerline/ledger";
import type { Money, Principal } from "@ledgerline/types";

// =============================================================================
// Items
// =============================================================================

/**
 * Ownership of the things being auctioned. An auction holds its item from
 * creation until it closes; a held item cannot be re-registered or put
 * up in a second auction.
 */
export interface ItemRegistry {
  /** Current owner, or undefined for items the registry does not track. */
  ownerOf(itemRef: string): Principal | undefined;
  /** Id of the auction holding the item, if any. */
  holderOf(itemRef: string): string | undefined;
  /** Hold the item for `holder`, first registering an untracked item to `owner`. */
  hold(itemRef: string, owner: Principal, holder: string): void;
  /** No-op unless `holder` holds the item. */
  release(itemRef: string, holder: string): void;
  transfer(itemRef: string, from: Principal, to: Principal): void;
}

export interface AuctionEngineConfig extends EngineDeps {
  readonly items?: ItemRegistry | undefined;
}

// =============================================================================
// English auction
// =============================================================================

export type EnglishAuctionStatus = "ACTIVE" | "CANCELLED" | "COMPLETED" | "FAILED";

export type AuctionFailureReason = "no-bids" | "reserve-not-met" | "item-unavailable";

export interface Bid {
  readonly bidder: Principal;
  readonly amount: Money;
  readonly placedAt: string;
}

export interface EnglishAuction {
  readonly id: string;
  readonly itemRef: string;
  readonly seller: Principal;
  readonly startingPrice: Money;
  /** Highest bid so far, or the starting price before any bid. */
  readonly currentPrice: Money;
  readonly highestBidder?: Principal;
  readonly minIncrement: Money;
  readonly reservePrice?: Money;
  readonly feeBps: number;
  readonly bidCount: number;
  readonly startsAt: string;
  readonly endsAt: string;
  readonly status: EnglishAuctionStatus;
  readonly failureReason?: AuctionFailureReason;
  readonly settledAt?: string;
}

export interface CreateAuctionInput {
  readonly itemRef: string;
  readonly startingPrice: Money;
  readonly durationMs: number;
  readonly minIncrement: Money;
  readonly reservePrice?: Money | undefined;
}

export interface AuctionFilter {
  readonly seller?: Principal | undefined;
  readonly status?: EnglishAuctionStatus | undefined;
}

// =============================================================================
// Dutch auction
// =============================================================================

export type DutchAuctionStatus = "ACTIVE" | "COMPLETED" | "ENDED" | "CANCELLED";

export interface DutchAuction {
  readonly id: string;
  readonly itemRef: string;
  readonly seller: Principal;
  readonly startingPrice: Money;
  readonly reservePrice: Money;
  readonly decrement: Money;
  readonly intervalMs: number;
  /** Price as of lastPriceUpdateAt. */
  readonly lastPrice: Money;
  readonly lastPriceUpdateAt: string;
  readonly startsAt: string;
  readonly endsAt: string;
  readonly feeBps: number;
  readonly status: DutchAuctionStatus;
  readonly buyer?: Principal;
  readonly soldPrice?: Money;
  readonly settledAt?: string;
}

export interface CreateDutchAuctionInput {
  readonly itemRef: string;
  readonly startingPrice: Money;
  readonly reservePrice: Money;
  readonly decrement: Money;
  readonly intervalMs: number;
  readonly durationMs: number;
}

export interface DutchAuctionFilter {
  readonly seller?: Principal | undefined;
  readonly status?: DutchAuctionStatus | undefined;
}

/** Outcome of a Dutch purchase. */
export interface DutchPurchase {
  readonly auction: DutchAuction;
  readonly price: Money;
  readonly fee: Money;
  readonly net: Money;
  readonly refunded: Money;
}
