/**
 * @ledgerline/types — Shared domain types for the settlement core.
 *
 * These types are used across all Ledgerline packages:
 * - Financial primitives (Money, journal entries, principals)
 * - Event architecture
 * - Injected runtime collaborators (clock, id generator)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type {
  Money,
  Currency,
  Principal,
  AccountId,
  LedgerEntry,
  LedgerEntryType,
} from "./financial.js";

// Event types
export type {
  DomainEvent,
  DomainEventSink,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime collaborators
export type { Clock, IdGenerator } from "./runtime.js";

// Runtime type guards
export {
  isMoney,
  isLedgerEntryType,
  isLedgerEntry,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
