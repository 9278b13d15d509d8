/**
 * @ledgerline/node — Entry point.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import type { Logger } from "pino";
import { loadConfig, toAuthConfig, toServiceConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createApp } from "./app.js";
import type { RequestLogEntry } from "./middleware/logger.js";

function createLogger(config: AppConfig): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development" ? { transport: { target: "pino-pretty" } } : {}),
  });
}

function logRequest(logger: Logger, entry: RequestLogEntry): void {
  const message = `${entry.method} ${entry.path} ${String(entry.status)}`;
  if (entry.status >= 500) {
    logger.error(entry, message);
  } else if (entry.status >= 400) {
    logger.warn(entry, message);
  } else {
    logger.info(entry, message);
  }
}

function start(): void {
  const config = loadConfig();
  const logger = createLogger(config);

  const auth = toAuthConfig(config);
  if (auth === undefined) {
    logger.warn("No API keys or JWT secret configured, callers are trusted via X-Principal");
  } else {
    logger.info({ apiKeys: auth.apiKeys.size, jwt: auth.jwtSecret !== undefined }, "Auth configured");
  }

  const { app, service } = createApp({
    serviceConfig: { ...toServiceConfig(config), logger },
    logFn: (entry) => logRequest(logger, entry),
    reportError: (err) => logger.error({ err }, "Unhandled request error"),
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
    auth,
  });

  const server = serve({ fetch: app.fetch, port: config.PORT, hostname: config.HOST });
  logger.info(
    { port: config.PORT, host: config.HOST, feeBps: service.feeBps, currency: config.NATIVE_CURRENCY },
    "Ledgerline node started",
  );

  const stop = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, "Shutting down");
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Server did not close cleanly");
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once("SIGTERM", stop);
  process.once("SIGINT", stop);
}

try {
  start();
} catch (err) {
  // Config errors surface before the logger exists.
  console.error("Fatal startup error:", err);
  process.exit(1);
}
