/**
 * Idempotent POSTs.
 *
 * A POST carrying an Idempotency-Key is executed once per caller and key;
 * repeats within the TTL get the stored response back with
 * `X-Idempotent-Replay: true`. Reusing a key for a different body is a
 * 409. Only responses below 400 are stored, so a request that failed
 * (say on insufficient funds) can be retried under the same key.
 */

import { createHash } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { Clock } from "@ledgerline/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CachedResponse {
  readonly status: number;
  readonly body: string;
  readonly headers: Record<string, string>;
  /** sha256 of the request body that produced this response */
  readonly fingerprint: string;
}

export interface IdempotencyStore {
  recall(key: string): CachedResponse | undefined;
  remember(key: string, response: CachedResponse): void;
}

interface Entry {
  readonly response: CachedResponse;
  readonly storedAt: number;
}

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _entries = new Map<string, Entry>();

  constructor(
    private readonly _ttlMs: number = DAY_MS,
    private readonly _clock: Clock = { now: () => Date.now() },
  ) {}

  /** Entries live for exactly the TTL. */
  recall(key: string): CachedResponse | undefined {
    const entry = this._entries.get(key);
    if (entry !== undefined && this._clock.now() - entry.storedAt > this._ttlMs) {
      this._entries.delete(key);
      return undefined;
    }
    return entry?.response;
  }

  remember(key: string, response: CachedResponse): void {
    this._entries.set(key, { response, storedAt: this._clock.now() });
  }

  get size(): number {
    return this._entries.size;
  }
}

export function idempotencyMiddleware(store: IdempotencyStore): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const key = c.req.header(IDEMPOTENCY_HEADER);
    if (c.req.method !== "POST" || key === undefined) {
      return next();
    }

    const scoped = `${c.get("auth").identity}:${key}`;
    const fingerprint = createHash("sha256").update(await c.req.text()).digest("hex");

    const cached = store.recall(scoped);
    if (cached !== undefined) {
      if (cached.fingerprint !== fingerprint) {
        return c.json(
          createErrorEnvelope("IDEMPOTENCY_KEY_REUSED", `${IDEMPOTENCY_HEADER} '${key}' was used for a different request`),
          409,
        );
      }
      const headers = new Headers(cached.headers);
      headers.set(REPLAY_HEADER, "true");
      return new Response(cached.body, { status: cached.status, headers });
    }

    await next();

    if (c.res.status >= 400) {
      return;
    }
    const copy = c.res.clone();
    store.remember(scoped, {
      status: copy.status,
      body: await copy.text(),
      headers: Object.fromEntries(copy.headers.entries()),
      fingerprint,
    });
  };
}
