/**
 * @ledgerline/escrow — Buyer/seller escrow.
 *
 * Funds sit in an `escrow:<id>` custody account until the buyer releases
 * them, the seller refunds them, the buyer reclaims them after expiry, or
 * the arbiter resolves a dispute.
 */

export { DEFAULT_ARBITER, EscrowEngine } from "./escrow.js";
export type {
  CreateEscrowInput,
  Escrow,
  EscrowEngineConfig,
  EscrowFilter,
  EscrowParty,
  EscrowSettlement,
  EscrowStatus,
} from "./types.js";
