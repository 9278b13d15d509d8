/**
 * @ledgerline/event-store — In-memory EventStore.
 *
 * One global log plus a per-stream index into it. Each appended event is
 * sealed into the hash chain before it becomes visible. Subscribers run
 * synchronously after the append has been committed; their failures go to
 * `onSubscriberError` and never reach the appender.
 */

import type { Clock, DomainEvent } from "@ledgerline/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ExpectedVersion,
  HashedStoredEvent,
  InMemoryEventStoreOptions,
  ReadAllOptions,
  ReadDirection,
  ReadOptions,
  StoredEvent,
  SubscriberErrorHandler,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

const ALL_STREAMS = Symbol("all-streams");
type ListenerKey = string | typeof ALL_STREAMS;

export class InMemoryEventStore implements EventStore {
  private readonly _log: HashedStoredEvent[] = [];
  private readonly _streams = new Map<string, HashedStoredEvent[]>();
  private readonly _listeners = new Map<ListenerKey, Set<EventHandler>>();
  private readonly _clock: Clock | undefined;
  private readonly _onSubscriberError: SubscriberErrorHandler;

  constructor(options?: InMemoryEventStoreOptions) {
    this._clock = options?.clock;
    this._onSubscriberError = options?.onSubscriberError ?? warnSubscriberFailure;
  }

  append(streamId: string, events: readonly DomainEvent[], options?: AppendOptions): AppendResult {
    assertStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const head = this.streamVersion(streamId);
    assertExpectedVersion(streamId, head, options?.expectedVersion);

    const appendedAt = new Date(this._clock?.now() ?? Date.now()).toISOString();
    const stream = this._streams.get(streamId) ?? [];
    this._streams.set(streamId, stream);

    const sealed = events.map((event, i) =>
      this._seal({
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: head + i + 1,
        globalPosition: this._log.length + 1,
        appendedAt,
      }),
    );
    // _seal pushes onto the global log; the stream index follows.
    stream.push(...sealed);

    this._notify(this._listeners.get(streamId), sealed);
    this._notify(this._listeners.get(ALL_STREAMS), sealed);

    return { streamId, fromVersion: head + 1, toVersion: head + events.length, count: events.length };
  }

  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[] {
    assertStreamId(streamId);
    const from = options?.fromVersion ?? 1;
    if (from < 1) {
      throw new EventStoreError("INVALID_VERSION", `fromVersion must be >= 1, got ${String(from)}`, streamId);
    }
    const stream = this._streams.get(streamId) ?? [];
    return slice(stream, (e) => e.version, from, options?.direction, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    return slice(this._log, (e) => e.globalPosition, options?.fromPosition ?? 1, options?.direction, options?.maxCount);
  }

  subscribe(streamId: string, handler: EventHandler): Subscription {
    assertStreamId(streamId);
    return this._listen(streamId, handler);
  }

  subscribeAll(handler: EventHandler): Subscription {
    return this._listen(ALL_STREAMS, handler);
  }

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._log.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _seal(base: StoredEvent): HashedStoredEvent {
    const previousHash = this._log.at(-1)?.hash ?? GENESIS_HASH;
    const sealed: HashedStoredEvent = { ...base, hash: computeEventHash(base, previousHash), previousHash };
    this._log.push(sealed);
    return sealed;
  }

  private _listen(key: ListenerKey, handler: EventHandler): Subscription {
    const handlers = this._listeners.get(key) ?? new Set<EventHandler>();
    handlers.add(handler);
    this._listeners.set(key, handlers);

    return {
      unsubscribe: () => {
        handlers.delete(handler);
        if (handlers.size === 0) {
          this._listeners.delete(key);
        }
      },
    };
  }

  private _notify(handlers: ReadonlySet<EventHandler> | undefined, events: readonly StoredEvent[]): void {
    for (const handler of [...(handlers ?? [])]) {
      for (const event of events) {
        this._deliver(handler, event);
      }
    }
  }

  private _deliver(handler: EventHandler, event: StoredEvent): void {
    try {
      const pending = handler(event);
      if (pending instanceof Promise) {
        void pending.catch((error: unknown) => {
          this._onSubscriberError(error, event);
        });
      }
    } catch (error) {
      this._onSubscriberError(error, event);
    }
  }
}

function assertStreamId(streamId: string): void {
  if (streamId.length === 0) {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}

function assertExpectedVersion(streamId: string, head: number, expected: ExpectedVersion | undefined): void {
  if (expected === undefined || expected === "any") {
    return;
  }
  if (expected === "no_stream" && head !== 0) {
    throw new EventStoreError(
      "CONCURRENCY_CONFLICT",
      `Stream "${streamId}" already exists (version ${String(head)}), expected no_stream`,
      streamId,
    );
  }
  if (typeof expected === "number" && head !== expected) {
    throw new EventStoreError(
      "CONCURRENCY_CONFLICT",
      `Stream "${streamId}" is at version ${String(head)}, expected ${String(expected)}`,
      streamId,
    );
  }
}

/**
 * Events from `from` onward (forward) or from `from` down to the start
 * (backward), capped at `maxCount`.
 */
function slice(
  events: readonly HashedStoredEvent[],
  position: (e: HashedStoredEvent) => number,
  from: number,
  direction: ReadDirection = "forward",
  maxCount?: number,
): HashedStoredEvent[] {
  const picked =
    direction === "forward"
      ? events.filter((e) => position(e) >= from)
      : events.filter((e) => position(e) <= from).reverse();
  return maxCount !== undefined && maxCount >= 0 ? picked.slice(0, maxCount) : picked;
}

function warnSubscriberFailure(error: unknown, event: StoredEvent): void {
  const reason = error instanceof Error ? error.message : String(error);
  process.emitWarning(
    `Event subscriber failed on "${event.event.type}" at position ${String(event.globalPosition)}: ${reason}`,
    "SubscriberWarning",
  );
}
