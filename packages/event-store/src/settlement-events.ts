/**
 * @ledgerline/event-store — Settlement Domain Event Definitions.
 *
 * The catalog of every event the settlement core emits.
 *
 * Naming convention: `<source>.<entity>.<action>`
 * Examples:
 * - ledger.batch.committed
 * - escrow.escrow.released
 * - multisig.transaction.executed
 * - auction.dutch-auction.purchased
 * - payments.payment.fulfilled
 *
 * Each event type defines:
 * - A payload interface (what data the event carries)
 * - A schema registration (type + version + validation)
 */

import type { EventSource } from "@ledgerline/types";
import type { EventSchema } from "./catalog.js";
import { CatalogError, EventCatalog } from "./catalog.js";

// =============================================================================
// Payloads
// =============================================================================

export interface BatchCommittedPayload {
  readonly correlationId: string;
  readonly memo?: string;
  readonly movements: readonly {
    readonly from: string;
    readonly to: string;
    readonly amount: string;
    readonly currency: string;
  }[];
}

export interface EscrowCreatedPayload {
  readonly buyer: string;
  readonly seller: string;
  readonly arbiter: string;
  readonly amount: string;
  readonly currency: string;
  readonly expiresAt: string;
}

/** Released, or resolved in the seller's favour. */
export interface EscrowSettledPayload {
  readonly seller: string;
  readonly net: string;
  readonly fee: string;
  readonly currency: string;
}

export interface EscrowRefundedPayload {
  readonly buyer: string;
  readonly amount: string;
  readonly currency: string;
  readonly reason: "refunded" | "expired" | "dispute";
}

export interface TransactionProposedPayload {
  readonly walletId: string;
  readonly txId: string;
  readonly command: string;
  readonly value: string;
  readonly currency: string;
}

export interface TransactionExecutedPayload {
  readonly walletId: string;
  readonly txId: string;
  readonly outcome: "SUCCEEDED" | "CALL_FAILED";
  readonly failureReason?: string;
}

export interface BidPlacedPayload {
  readonly bidder: string;
  readonly amount: string;
  readonly currency: string;
  readonly previousBidder?: string;
}

export interface DutchPurchasedPayload {
  readonly buyer: string;
  readonly price: string;
  readonly refunded: string;
  readonly currency: string;
}

export interface PaymentCreatedPayload {
  readonly kind: string;
  readonly sender: string;
  readonly total: string;
  readonly currency: string;
  readonly status: string;
}

// =============================================================================
// Event Type Registry
// =============================================================================

export const SETTLEMENT_EVENTS = {
  // Ledger
  BATCH_COMMITTED: "ledger.batch.committed",

  // Escrow
  ESCROW_CREATED: "escrow.escrow.created",
  ESCROW_RELEASED: "escrow.escrow.released",
  ESCROW_REFUNDED: "escrow.escrow.refunded",
  ESCROW_DISPUTED: "escrow.escrow.disputed",
  ESCROW_RESOLVED: "escrow.escrow.resolved",

  // Multi-sig
  WALLET_CREATED: "multisig.wallet.created",
  WALLET_DEPOSITED: "multisig.wallet.deposited",
  WALLET_OWNER_ADDED: "multisig.wallet.owner-added",
  WALLET_OWNER_REMOVED: "multisig.wallet.owner-removed",
  WALLET_THRESHOLD_CHANGED: "multisig.wallet.threshold-changed",
  WALLET_DEACTIVATED: "multisig.wallet.deactivated",
  TRANSACTION_PROPOSED: "multisig.transaction.proposed",
  TRANSACTION_CONFIRMED: "multisig.transaction.confirmed",
  TRANSACTION_REVOKED: "multisig.transaction.revoked",
  TRANSACTION_EXECUTED: "multisig.transaction.executed",
  TRANSACTION_CANCELLED: "multisig.transaction.cancelled",

  // English auctions
  AUCTION_CREATED: "auction.auction.created",
  AUCTION_BID_PLACED: "auction.auction.bid-placed",
  AUCTION_COMPLETED: "auction.auction.completed",
  AUCTION_FAILED: "auction.auction.failed",
  AUCTION_CANCELLED: "auction.auction.cancelled",

  // Dutch auctions
  DUTCH_CREATED: "auction.dutch-auction.created",
  DUTCH_PRICE_REFRESHED: "auction.dutch-auction.price-refreshed",
  DUTCH_PURCHASED: "auction.dutch-auction.purchased",
  DUTCH_ENDED: "auction.dutch-auction.ended",
  DUTCH_CANCELLED: "auction.dutch-auction.cancelled",

  // Payments
  PAYMENT_CREATED: "payments.payment.created",
  PAYMENT_EXECUTED: "payments.payment.executed",
  PAYMENT_EXECUTION_FAILED: "payments.payment.execution-failed",
  PAYMENT_CANCELLED: "payments.payment.cancelled",
  PAYMENT_FULFILLED: "payments.payment.fulfilled",
  PAYMENT_EXPIRED: "payments.payment.expired",
  PAYMENT_REJECTED: "payments.payment.rejected",
  PLAN_CREATED: "payments.plan.created",
  PLAN_CANCELLED: "payments.plan.cancelled",
} as const;

export type SettlementEventType =
  (typeof SETTLEMENT_EVENTS)[keyof typeof SETTLEMENT_EVENTS];

// =============================================================================
// Schema Definitions
// =============================================================================

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function hasStrings(...keys: readonly string[]): (p: unknown) => boolean {
  return (p) => isObject(p) && keys.every((key) => typeof p[key] === "string");
}

function schema(
  type: SettlementEventType,
  description: string,
  validate: (payload: unknown) => boolean,
): EventSchema {
  const source = type.slice(0, type.indexOf("."));
  return { type, version: 1, description, source: toSource(source), validate };
}

function toSource(prefix: string): EventSource {
  switch (prefix) {
    case "ledger":
    case "escrow":
    case "multisig":
    case "auction":
    case "payments":
      return prefix;
    default:
      throw new CatalogError(`Unknown event source prefix "${prefix}"`);
  }
}

const E = SETTLEMENT_EVENTS;

const SETTLEMENT_SCHEMAS: readonly EventSchema[] = [
  schema(E.BATCH_COMMITTED, "A batch of movements was committed to the ledger", (p) =>
    isObject(p) && typeof p["correlationId"] === "string" && Array.isArray(p["movements"])),

  schema(E.ESCROW_CREATED, "A buyer funded a new escrow", hasStrings("buyer", "seller", "amount")),
  schema(E.ESCROW_RELEASED, "The buyer released an escrow to the seller", hasStrings("seller", "net", "fee")),
  schema(E.ESCROW_REFUNDED, "Escrowed funds went back to the buyer", hasStrings("buyer", "amount", "reason")),
  schema(E.ESCROW_DISPUTED, "A party disputed an escrow", hasStrings("disputedBy")),
  schema(E.ESCROW_RESOLVED, "The arbiter resolved a disputed escrow", hasStrings("winner")),

  schema(E.WALLET_CREATED, "A multi-sig wallet was created", (p) =>
    isObject(p) && Array.isArray(p["owners"]) && typeof p["threshold"] === "number"),
  schema(E.WALLET_DEPOSITED, "Funds were deposited into a wallet", hasStrings("from", "amount", "currency")),
  schema(E.WALLET_OWNER_ADDED, "An owner was added to a wallet", hasStrings("owner")),
  schema(E.WALLET_OWNER_REMOVED, "An owner was removed from a wallet", hasStrings("owner")),
  schema(E.WALLET_THRESHOLD_CHANGED, "A wallet's confirmation threshold changed", (p) =>
    isObject(p) && typeof p["threshold"] === "number"),
  schema(E.WALLET_DEACTIVATED, "A wallet was deactivated", isObject),
  schema(E.TRANSACTION_PROPOSED, "An owner proposed a wallet transaction", hasStrings("walletId", "txId", "command")),
  schema(E.TRANSACTION_CONFIRMED, "An owner confirmed a wallet transaction", hasStrings("walletId", "txId", "owner")),
  schema(E.TRANSACTION_REVOKED, "An owner revoked a confirmation", hasStrings("walletId", "txId", "owner")),
  schema(E.TRANSACTION_EXECUTED, "A wallet transaction was executed", hasStrings("walletId", "txId", "outcome")),
  schema(E.TRANSACTION_CANCELLED, "A wallet transaction was cancelled", hasStrings("walletId", "txId")),

  schema(E.AUCTION_CREATED, "An English auction opened", hasStrings("seller", "itemRef", "startingPrice")),
  schema(E.AUCTION_BID_PLACED, "A bid became the highest bid", hasStrings("bidder", "amount")),
  schema(E.AUCTION_COMPLETED, "An English auction settled with a winner", hasStrings("winner", "price")),
  schema(E.AUCTION_FAILED, "An English auction closed without a sale", hasStrings("reason")),
  schema(E.AUCTION_CANCELLED, "The seller cancelled an English auction", isObject),

  schema(E.DUTCH_CREATED, "A Dutch auction opened", hasStrings("seller", "itemRef", "startingPrice")),
  schema(E.DUTCH_PRICE_REFRESHED, "A Dutch auction's stored price was brought up to date", hasStrings("price")),
  schema(E.DUTCH_PURCHASED, "A buyer purchased the item of a Dutch auction", hasStrings("buyer", "price")),
  schema(E.DUTCH_ENDED, "A Dutch auction closed without a sale", isObject),
  schema(E.DUTCH_CANCELLED, "The seller cancelled a Dutch auction", isObject),

  schema(E.PAYMENT_CREATED, "A payment was created", hasStrings("kind", "sender", "total")),
  schema(E.PAYMENT_EXECUTED, "A scheduled payment was released", hasStrings("recipient", "net")),
  schema(E.PAYMENT_EXECUTION_FAILED, "A due payment could not settle and stays pending", hasStrings("code", "reason")),
  schema(E.PAYMENT_CANCELLED, "A pending payment was cancelled and refunded", hasStrings("refunded")),
  schema(E.PAYMENT_FULFILLED, "A conditional payment's condition was met", hasStrings("recipient", "net")),
  schema(E.PAYMENT_EXPIRED, "A conditional payment passed its deadline unfulfilled", hasStrings("refunded")),
  schema(E.PAYMENT_REJECTED, "The verifier rejected a conditional payment", hasStrings("refunded")),
  schema(E.PLAN_CREATED, "A recurring payment plan was created", (p) =>
    isObject(p) && typeof p["count"] === "number"),
  schema(E.PLAN_CANCELLED, "A recurring payment plan was cancelled", (p) =>
    isObject(p) && Array.isArray(p["cancelled"])),
];

/**
 * Create an EventCatalog with every settlement event registered.
 */
export function createSettlementCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const s of SETTLEMENT_SCHEMAS) {
    catalog.register(s);
  }
  return catalog;
}
