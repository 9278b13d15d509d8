/**
 * Type barrel — re-exports all public types from @ledgerline/node.
 */

// DTOs
export * from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate, paginateList } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export { hasPermission } from "./auth.js";
export type {
  Role,
  Permission,
  AuthContext,
  ApiKeyRecord,
  JwtClaims,
} from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
