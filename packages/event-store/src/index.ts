/**
 * @ledgerline/event-store — Append-only event log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - EventCatalog for payload checks and read-time upcasting
 * - Settlement domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  SubscriberErrorHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
  InMemoryEventStoreOptions,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";

// Catalog
export type { EventSchema, EventUpcaster, CatalogCheck } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Settlement domain events
export { SETTLEMENT_EVENTS, createSettlementCatalog } from "./settlement-events.js";
export type {
  SettlementEventType,
  BatchCommittedPayload,
  EscrowCreatedPayload,
  EscrowSettledPayload,
  EscrowRefundedPayload,
  TransactionProposedPayload,
  TransactionExecutedPayload,
  BidPlacedPayload,
  DutchPurchasedPayload,
  PaymentCreatedPayload,
} from "./settlement-events.js";
