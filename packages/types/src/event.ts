/**
 * Event Types
 *
 * Every successful state change in the settlement core is captured as a
 * DomainEvent. Events are observational: collaborators (notifications,
 * analytics) subscribe to them, but correctness never depends on them.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which entity)
 * - Append only: no update, no delete
 */

/**
 * Subsystems that emit events.
 */
export type EventSource =
  | "ledger"
  | "escrow"
  | "multisig"
  | "auction"
  | "payments";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp (read from the engine's clock) */
  readonly timestamp: string;

  /** Principal whose call caused this event */
  readonly actor: string;

  /** ID of the entity the event is about (escrow id, wallet id, ...) */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event.
 * Discriminated by `type` (`<source>.<entity>.<action>`, e.g. "escrow.escrow.released").
 */
export interface DomainEvent {
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}

/**
 * Where engines publish their events.
 * Implemented by the event store adapter; engines never read it back.
 */
export interface DomainEventSink {
  publish(streamId: string, event: DomainEvent): void;
}
