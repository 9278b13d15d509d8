/**
 * @ledgerline/auctions — English and Dutch auctions.
 */

export { EnglishAuctionEngine } from "./english-auction.js";
export { DutchAuctionEngine } from "./dutch-auction.js";
export { assertItemAvailable, canDeliver, deliverItem, InMemoryItemRegistry } from "./item-registry.js";
export {
  assertFeasibleCurve,
  elapsedSteps,
  priceAfterSteps,
  stepsToReserve,
} from "./pricing.js";
export type { PriceCurve } from "./pricing.js";
export type {
  AuctionEngineConfig,
  AuctionFailureReason,
  AuctionFilter,
  Bid,
  CreateAuctionInput,
  CreateDutchAuctionInput,
  DutchAuction,
  DutchAuctionFilter,
  DutchAuctionStatus,
  DutchPurchase,
  EnglishAuction,
  EnglishAuctionStatus,
  ItemRegistry,
} from "./types.js";
