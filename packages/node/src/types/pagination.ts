/**
 * Cursor pagination.
 *
 * Every paged listing is ordered by a positive integer position (global
 * position, stream version, or 1-based index in the list). A cursor is an
 * opaque base64url token naming the last position returned. List
 * endpoints answer `{ data, pagination: { cursor, hasMore } }`.
 */

import { ApiError } from "./error.js";

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  /** null on the last page */
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

export function encodeCursor(after: number): string {
  return Buffer.from(JSON.stringify({ after })).toString("base64url");
}

/** The position a cursor names, or undefined for a token this API did not issue. */
export function decodeCursor(cursor: string): number | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (typeof data !== "object" || data === null || !("after" in data)) {
    return undefined;
  }
  const { after } = data;
  return typeof after === "number" && Number.isSafeInteger(after) && after >= 0 ? after : undefined;
}

/**
 * One page of `items`, which must be in ascending position order.
 *
 * @throws ApiError(400, INVALID_CURSOR) for a cursor that does not decode
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  positionOf: (item: T) => number,
): PaginatedResponse<T> {
  let after = 0;
  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded === undefined) {
      throw new ApiError(400, "INVALID_CURSOR", "Malformed pagination cursor");
    }
    after = decoded;
  }

  const remaining = items.filter((item) => positionOf(item) > after);
  const data = remaining.slice(0, query.limit);
  const hasMore = remaining.length > query.limit;
  const last = data.at(-1);

  return {
    data,
    pagination: {
      cursor: hasMore && last !== undefined ? encodeCursor(positionOf(last)) : null,
      hasMore,
    },
  };
}

/** Pages a list in its stored order; positions are 1-based indexes. */
export function paginateList<T>(items: readonly T[], query: PaginationQuery): PaginatedResponse<T> {
  const page = paginate(
    items.map((item, i) => ({ item, position: i + 1 })),
    query,
    (e) => e.position,
  );
  return { data: page.data.map((e) => e.item), pagination: page.pagination };
}
