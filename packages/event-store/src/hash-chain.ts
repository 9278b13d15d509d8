/**
 * @ledgerline/event-store — Hash chain over the global event log.
 *
 *   hash(n) = sha256(jcs(record n) || hash(n - 1)),   hash(0) = "genesis"
 *
 * `jcs` is RFC 8785 canonical JSON, so payload key order never changes a
 * hash. Altering, dropping or reordering any stored event breaks every
 * link from that position on.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  HashedStoredEvent,
  IntegrityError,
  StoredEvent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

/**
 * SHA-256 (hex) of a record chained to its predecessor's hash.
 * Only the StoredEvent fields take part, so a sealed event hashes the
 * same as the record it was sealed from.
 */
export function computeEventHash(record: StoredEvent, previousHash: string): string {
  const { event, streamId, version, globalPosition, appendedAt } = record;
  const canonical = canonicalize({
    event: { type: event.type, metadata: event.metadata, payload: event.payload },
    streamId,
    version,
    globalPosition,
    appendedAt,
  });
  return createHash("sha256").update(canonical).update(previousHash).digest("hex");
}

/**
 * Walk a log in global order from genesis. Each event may contribute a
 * broken-link error and a content error.
 */
export function verifyHashChain(log: readonly HashedStoredEvent[]): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let expectedPrevious = GENESIS_HASH;

  for (const sealed of log) {
    const at = sealed.globalPosition;

    if (sealed.previousHash !== expectedPrevious) {
      errors.push({
        position: at,
        reason: `previousHash mismatch at position ${String(at)}: expected "${expectedPrevious}", got "${sealed.previousHash}"`,
      });
    }

    const recomputed = computeEventHash(sealed, sealed.previousHash);
    if (recomputed !== sealed.hash) {
      errors.push({
        position: at,
        reason: `Hash mismatch at position ${String(at)}: expected "${recomputed}", got "${sealed.hash}"`,
      });
    }

    expectedPrevious = sealed.hash;
  }

  return { valid: errors.length === 0, lastVerifiedPosition: log.at(-1)?.globalPosition ?? 0, errors };
}
