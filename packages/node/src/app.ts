/**
 * Builds the Hono app around one SettlementService. main.ts serves it;
 * tests drive it through `app.request()` with no server.
 *
 * Order on /api/*: authentication, write permission on mutating methods,
 * then idempotent replay for POSTs.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { SettlementService } from "./services/settlement-service.js";
import type { SettlementServiceConfig } from "./services/settlement-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import type { ErrorReporter } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { idempotencyMiddleware, InMemoryIdempotencyStore } from "./middleware/idempotency.js";
import { authMiddleware, principalHeaderMiddleware, requirePermission } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import {
  createAccountRoutes,
  createAuctionRoutes,
  createDutchAuctionRoutes,
  createEscrowRoutes,
  createEventRoutes,
  createHealthRoutes,
  createItemRoutes,
  createPaymentRoutes,
  createWalletRoutes,
} from "./routes/index.js";

export interface CreateAppOptions {
  readonly serviceConfig?: SettlementServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Sees every error that becomes a 500. */
  readonly reportError?: ErrorReporter;
  readonly idempotencyTtlMs?: number;
  /** Without one, callers name themselves in X-Principal. */
  readonly auth?: AuthConfig;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: SettlementService;
  readonly idempotencyStore: InMemoryIdempotencyStore;
}

export function createApp(options: CreateAppOptions = {}): AppInstance {
  const service = new SettlementService(options.serviceConfig);
  const idempotencyStore = new InMemoryIdempotencyStore(options.idempotencyTtlMs, service.clock);

  const app = new Hono<AppEnv>();
  app.use("*", requestIdMiddleware());
  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }
  app.onError(createErrorHandler(options.reportError));

  app.route("/", createHealthRoutes(service));

  const isPrincipal = (identity: string): boolean => service.ledger.kindOf(identity) === "principal";
  app.use(
    "/api/*",
    options.auth === undefined
      ? principalHeaderMiddleware(isPrincipal)
      : authMiddleware({ isPrincipal, ...options.auth }),
  );
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });
  app.on(["POST", "PUT", "DELETE"], "/api/*", requirePermission("write"));
  app.use("/api/*", idempotencyMiddleware(idempotencyStore));

  const v1: ReadonlyArray<readonly [string, Hono<AppEnv>]> = [
    ["accounts", createAccountRoutes()],
    ["escrows", createEscrowRoutes()],
    ["wallets", createWalletRoutes()],
    ["items", createItemRoutes()],
    ["auctions", createAuctionRoutes()],
    ["dutch-auctions", createDutchAuctionRoutes()],
    ["payments", createPaymentRoutes()],
    ["events", createEventRoutes()],
  ];
  for (const [path, routes] of v1) {
    app.route(`/api/v1/${path}`, routes);
  }

  return { app, service, idempotencyStore };
}
