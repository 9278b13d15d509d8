/**
 * Runtime collaborators injected into every engine.
 *
 * Time and identity generation are never read from ambient globals inside
 * the core, so every operation is deterministic under test.
 */

/**
 * Monotonic clock supplied by the host.
 * The engines only read it; they never advance it and never wait on it.
 */
export interface Clock {
  /** Current time as epoch milliseconds. */
  now(): number;
}

/**
 * Source of entity identifiers.
 */
export interface IdGenerator {
  /** Next identifier for an entity of the given kind (e.g. "escrow"). */
  next(kind: string): string;
}
