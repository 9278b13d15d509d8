/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAccountRoutes } from "./accounts.js";
export { createEscrowRoutes } from "./escrows.js";
export { createWalletRoutes } from "./wallets.js";
export { createAuctionRoutes, createDutchAuctionRoutes, createItemRoutes } from "./auctions.js";
export { createPaymentRoutes } from "./payments.js";
export { createEventRoutes } from "./events.js";
