/**
 * @ledgerline/event-store — Core types.
 *
 * Every settlement (ledger batch, escrow transition, wallet transaction,
 * auction and payment) is recorded as a DomainEvent on the stream of the
 * entity it changed, e.g. "escrow:escrow-1".
 */

import type { Clock, DomainEvent, EventMetadata } from "@ledgerline/types";

// =============================================================================
// Stored Event
// =============================================================================

/** A DomainEvent plus its place in the log. */
export interface StoredEvent<TPayload = Record<string, unknown>> {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<TPayload>;
  }>;

  /** `<entity>:<entityId>` */
  readonly streamId: string;
  /** 1-based within the stream */
  readonly version: number;
  /** 1-based across all streams */
  readonly globalPosition: number;
  /** Store time; the domain time is `event.metadata.timestamp` */
  readonly appendedAt: string;
}

/**
 * A stored event linked into the store's SHA-256 hash chain.
 */
export interface HashedStoredEvent<TPayload = Record<string, unknown>>
  extends StoredEvent<TPayload> {
  /** SHA-256 of this event's canonical content plus previousHash */
  readonly hash: string;

  /** Hash of the event at the preceding global position, or "genesis" */
  readonly previousHash: string;
}

// =============================================================================
// Append Options
// =============================================================================

/**
 * Version the stream must be at before an append: an exact number,
 * "no_stream" for a first write, or "any" to skip the check.
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion | undefined;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  /** New stream head */
  readonly toVersion: number;
  readonly count: number;
}

// =============================================================================
// Read Options
// =============================================================================

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Inclusive. Default 1 */
  readonly fromVersion?: number | undefined;
  readonly maxCount?: number | undefined;
  /** Default "forward" */
  readonly direction?: ReadDirection | undefined;
}

export interface ReadAllOptions {
  /** Inclusive. Default 1 */
  readonly fromPosition?: number | undefined;
  readonly maxCount?: number | undefined;
  readonly direction?: ReadDirection | undefined;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: StoredEvent) => void | Promise<void>;

/**
 * Receives errors thrown (or rejected) by subscription handlers.
 * A failing handler never fails the append that triggered it.
 */
export type SubscriberErrorHandler = (error: unknown, event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store. Stream versions and global positions start at
 * 1 and have no gaps; subscribers see events in append order.
 */
export interface EventStore {
  /** @throws EventStoreError on an empty append or a failed version check */
  append(streamId: string, events: readonly DomainEvent[], options?: AppendOptions): AppendResult;

  /** Empty for a stream that does not exist. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** 0 for a stream that does not exist. */
  streamVersion(streamId: string): number;

  /** 0 for an empty store. */
  globalPosition(): number;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}

// =============================================================================
// Integrity
// =============================================================================

/**
 * A break in the hash chain.
 */
export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event checked (0 for an empty store) */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Options
// =============================================================================

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt`. Default: wall clock */
  readonly clock?: Clock | undefined;

  /** Default: report through process.emitWarning */
  readonly onSubscriberError?: SubscriberErrorHandler | undefined;
}
