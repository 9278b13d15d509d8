/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { SettlementService } from "../services/settlement-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The settlement service (set for every /api request) */
    service: SettlementService;

    /** Verified caller (set by auth middleware) */
    auth: AuthContext;
  };
}
