/**
 * Runtime type guards for values crossing a boundary: ledger snapshots
 * being restored, events read back from a store, collaborator payloads.
 */

import type { Money, LedgerEntry, LedgerEntryType } from "./financial.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

type Fields = Readonly<Record<string, unknown>>;

function isFields(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const isString = (v: unknown): v is string => typeof v === "string";
const isNonEmptyString = (v: unknown): v is string => typeof v === "string" && v.length > 0;

// =============================================================================
// Financial
// =============================================================================

const ENTRY_TYPES: readonly LedgerEntryType[] = ["debit", "credit"];

export function isMoney(value: unknown): value is Money {
  return (
    isFields(value) &&
    isString(value["amount"]) &&
    isNonEmptyString(value["currency"]) &&
    Number.isInteger(value["decimals"]) &&
    Number(value["decimals"]) >= 0
  );
}

export function isLedgerEntryType(value: unknown): value is LedgerEntryType {
  return ENTRY_TYPES.some((t) => t === value);
}

export function isLedgerEntry(value: unknown): value is LedgerEntry {
  if (!isFields(value)) {
    return false;
  }
  const memo = value["memo"];
  return (
    ["id", "accountId", "timestamp", "batchId", "correlationId"].every((k) => isString(value[k])) &&
    isLedgerEntryType(value["type"]) &&
    isMoney(value["money"]) &&
    (memo === undefined || isString(memo))
  );
}

// =============================================================================
// Events
// =============================================================================

const EVENT_SOURCES: readonly EventSource[] = ["ledger", "escrow", "multisig", "auction", "payments"];

export function isEventSource(value: unknown): value is EventSource {
  return EVENT_SOURCES.some((s) => s === value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  return (
    isFields(value) &&
    ["eventId", "timestamp", "actor", "correlationId"].every((k) => isString(value[k])) &&
    isEventSource(value["source"])
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  return (
    isFields(value) &&
    isString(value["type"]) &&
    isEventMetadata(value["metadata"]) &&
    isFields(value["payload"])
  );
}
