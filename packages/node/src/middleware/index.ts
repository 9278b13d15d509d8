/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, handleError, STATUS_BY_CATEGORY } from "./error-handler.js";
export type { ErrorReporter } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, parseQuery } from "./validate.js";
export type { ValidatedEnv } from "./validate.js";
export {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
  IDEMPOTENCY_HEADER,
  REPLAY_HEADER,
} from "./idempotency.js";
export type { IdempotencyStore, CachedResponse } from "./idempotency.js";
export {
  authMiddleware,
  principalHeaderMiddleware,
  requirePermission,
  verifyJwt,
  signJwt,
  PRINCIPAL_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
