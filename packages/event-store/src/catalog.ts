/**
 * @ledgerline/event-store — Event catalog.
 *
 * Every event type the settlement core may store is registered here with
 * its payload check and schema version. The node service runs each
 * outgoing event through `check()`; readers of old streams run stored
 * events through `upcast()`, which applies registered upcasters in order.
 * Stored events are never rewritten.
 */

import type { DomainEvent, EventSource } from "@ledgerline/types";

// =============================================================================
// Types
// =============================================================================

export interface EventSchema {
  /** `<source>.<entity>.<action>`, e.g. "escrow.escrow.released" */
  readonly type: string;
  /** Positive integer, bumped when the payload shape changes */
  readonly version: number;
  readonly description: string;
  readonly source: EventSource;
  validate(payload: unknown): boolean;
}

/** Lifts a payload from version `n` to `n + 1`. */
export type EventUpcaster = (payload: Record<string, unknown>) => Record<string, unknown>;

export type CatalogCheck =
  | { readonly ok: true; readonly schema: EventSchema }
  | { readonly ok: false; readonly reason: "unknown_type" | "invalid_payload" };

interface CatalogEntry {
  readonly schema: EventSchema;
  /** Keyed by source version */
  readonly upcasters: Map<number, EventUpcaster>;
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

// =============================================================================
// Catalog
// =============================================================================

export class EventCatalog {
  private readonly _entries = new Map<string, CatalogEntry>();

  /**
   * Register a schema. Registering the same version again is a no-op;
   * a newer version replaces the schema and keeps its upcasters.
   *
   * @throws CatalogError when the version is older than the registered one
   */
  register(schema: EventSchema): void {
    const existing = this._entries.get(schema.type);
    if (existing === undefined) {
      this._entries.set(schema.type, { schema, upcasters: new Map() });
      return;
    }
    if (schema.version === existing.schema.version) {
      return;
    }
    if (schema.version < existing.schema.version) {
      throw new CatalogError(
        `"${schema.type}" is registered at version ${String(existing.schema.version)}; cannot downgrade to ${String(schema.version)}`,
      );
    }
    this._entries.set(schema.type, { schema, upcasters: existing.upcasters });
  }

  registerUpcaster(eventType: string, fromVersion: number, upcaster: EventUpcaster): void {
    const entry = this._entries.get(eventType);
    if (entry === undefined) {
      throw new CatalogError(`Cannot register an upcaster for unknown event type "${eventType}"`);
    }
    entry.upcasters.set(fromVersion, upcaster);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._entries.get(eventType)?.schema;
  }

  has(eventType: string): boolean {
    return this._entries.has(eventType);
  }

  /** Registered types, sorted. */
  listTypes(): readonly string[] {
    return [...this._entries.keys()].sort();
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._entries.values()]
      .map((e) => e.schema)
      .filter((s) => s.source === source);
  }

  get size(): number {
    return this._entries.size;
  }

  /** False for unregistered types. */
  validate(eventType: string, payload: unknown): boolean {
    return this.check(eventType, payload).ok;
  }

  check(eventType: string, payload: unknown): CatalogCheck {
    const entry = this._entries.get(eventType);
    if (entry === undefined) {
      return { ok: false, reason: "unknown_type" };
    }
    if (!entry.schema.validate(payload)) {
      return { ok: false, reason: "invalid_payload" };
    }
    return { ok: true, schema: entry.schema };
  }

  /**
   * Bring a stored event to the current schema version.
   *
   * Unknown types and payloads at or beyond the current version come back
   * unchanged (same reference).
   *
   * @throws CatalogError when an upcaster in the chain is missing
   */
  upcast(event: DomainEvent, storedVersion: number): DomainEvent {
    const entry = this._entries.get(event.type);
    if (entry === undefined || storedVersion >= entry.schema.version) {
      return event;
    }

    let payload = event.payload;
    for (let v = storedVersion; v < entry.schema.version; v++) {
      const upcaster = entry.upcasters.get(v);
      if (upcaster === undefined) {
        throw new CatalogError(
          `No upcaster for "${event.type}" from version ${String(v)} to ${String(v + 1)}`,
        );
      }
      payload = upcaster(payload);
    }

    return { ...event, payload };
  }
}
