/**
 * Every non-2xx body is `{ error: { code, message, details? } }`.
 *
 * Settlement failures carry their engine code (INSUFFICIENT_FUNDS,
 * NOT_DUE, ...); ApiErrorCode lists the ones the HTTP layer raises itself.
 */

import type { ContentfulStatusCode } from "hono/utils/http-status";

export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "INVALID_CURSOR"
  | "IDEMPOTENCY_KEY_REUSED"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "INTERNAL_ERROR";

type Details = Readonly<Record<string, unknown>>;

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Details;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

/** `details` is left out of the body entirely when not given. */
export function createErrorEnvelope(code: ApiErrorCode | string, message: string, details?: Details): ErrorEnvelope {
  return { error: details === undefined ? { code, message } : { code, message, details } };
}

/** Thrown where no context is at hand; rendered with its own status. */
export class ApiError extends Error {
  constructor(
    public readonly status: ContentfulStatusCode,
    public readonly code: ApiErrorCode,
    message: string,
    public readonly details?: Details,
  ) {
    super(message);
    this.name = "ApiError";
  }
}
