/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Settlement errors map to a status by category and ApiErrors carry their
 * own; anything else is a 500 whose message is not exposed.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { isSettlementError } from "@ledgerline/ledger";
import type { SettlementErrorCategory } from "@ledgerline/ledger";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const STATUS_BY_CATEGORY: Record<SettlementErrorCategory, ContentfulStatusCode> = {
  validation: 400,
  authorization: 403,
  not_found: 404,
  state: 409,
  threshold: 409,
  expired: 409,
  insufficient_funds: 422,
  external_call: 502,
};

export type ErrorReporter = (err: Error) => void;

// =============================================================================
// Middleware
// =============================================================================

/**
 * Build the global error handler. Registered as Hono's onError handler.
 * `report` sees every error that becomes a 500.
 */
export function createErrorHandler(report?: ErrorReporter): (err: Error, c: Context) => Response {
  return (err, c) => {
    if (err instanceof ApiError) {
      return c.json(createErrorEnvelope(err.code, err.message, err.details), err.status);
    }
    if (isSettlementError(err)) {
      return c.json(
        createErrorEnvelope(err.code, err.message, err.details),
        STATUS_BY_CATEGORY[err.category],
      );
    }

    report?.(err);
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}

/** Error handler without reporting. */
export const handleError = createErrorHandler();
