/**
 * @ledgerline/node — HTTP service over the settlement core.
 */

export { SettlementService } from "./services/settlement-service.js";
export type { SettlementServiceConfig } from "./services/settlement-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
