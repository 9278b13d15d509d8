/**
 * @ledgerline/ledger — Domain event recorder shared by all engines.
 *
 * Events are published after the state change has been committed.
 * Streams are named `<entity>:<entityId>`.
 */

import type {
  Clock,
  DomainEvent,
  DomainEventSink,
  EventSource,
  IdGenerator,
} from "@ledgerline/types";
import { toIso } from "./runtime.js";

export interface EventRecorderDeps {
  readonly clock: Clock;
  readonly ids: IdGenerator;
  readonly sink?: DomainEventSink | undefined;
}

export class EventRecorder {
  private readonly _source: EventSource;
  private readonly _deps: EventRecorderDeps;

  constructor(source: EventSource, deps: EventRecorderDeps) {
    this._source = source;
    this._deps = deps;
  }

  /**
   * Build and publish `<source>.<entity>.<action>`.
   * Returns the event even when no sink is attached.
   */
  record(
    entity: string,
    entityId: string,
    action: string,
    actor: string,
    payload: Readonly<Record<string, unknown>> = {},
  ): DomainEvent {
    const event: DomainEvent = {
      type: `${this._source}.${entity}.${action}`,
      metadata: {
        eventId: this._deps.ids.next("evt"),
        timestamp: toIso(this._deps.clock.now()),
        actor,
        correlationId: entityId,
        source: this._source,
      },
      payload,
    };

    this._deps.sink?.publish(`${entity}:${entityId}`, event);
    return event;
  }
}
