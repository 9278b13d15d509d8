/**
 * Multi-signature wallet routes.
 *
 * POST /api/v1/wallets                                   — Create a wallet
 * GET  /api/v1/wallets                                   — List wallets (optionally by owner)
 * GET  /api/v1/wallets/:id                               — Wallet and its balance
 * POST /api/v1/wallets/:id/deposit                       — Fund the wallet from the caller
 * POST /api/v1/wallets/:id/owners                        — Add an owner (admin)
 * DELETE /api/v1/wallets/:id/owners/:owner               — Remove an owner (admin)
 * POST /api/v1/wallets/:id/threshold                     — Change threshold (admin)
 * POST /api/v1/wallets/:id/deactivate                    — Deactivate (admin)
 * POST /api/v1/wallets/:id/transactions                  — Propose a transaction
 * GET  /api/v1/wallets/:id/transactions                  — List transactions
 * GET  /api/v1/wallets/:id/transactions/:txId            — Get one transaction
 * POST /api/v1/wallets/:id/transactions/:txId/confirm    — Confirm
 * POST /api/v1/wallets/:id/transactions/:txId/revoke     — Revoke a confirmation
 * POST /api/v1/wallets/:id/transactions/:txId/execute    — Execute
 * POST /api/v1/wallets/:id/transactions/:txId/cancel     — Cancel
 *
 * The admin routes act at once; owners change the same settings through
 * a proposed transaction.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateWalletSchema,
  ListTransactionsQuerySchema,
  OwnerSchema,
  ProposeTransactionSchema,
  ThresholdSchema,
  WalletDepositSchema,
} from "../types/dto.js";
import { parseQuery, validateBody } from "../middleware/validate.js";

export function createWalletRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateWalletSchema), (c) => {
    const { owners, threshold } = c.get("validatedBody");
    const wallet = c.get("service").createMultiSigWallet(c.get("auth").identity, owners, threshold);
    return c.json({ data: wallet }, 201);
  });

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").listWallets(c.req.query("owner")) });
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("service").getWallet(c.req.param("id")) });
  });

  routes.post("/:id/deposit", validateBody(WalletDepositSchema), (c) => {
    const { amount } = c.get("validatedBody");
    const balance = c.get("service").depositToWallet(c.get("auth").identity, c.req.param("id"), amount);
    return c.json({ data: { walletId: c.req.param("id"), balance } });
  });

  routes.post("/:id/owners", validateBody(OwnerSchema), (c) => {
    const { owner } = c.get("validatedBody");
    return c.json({
      data: c.get("service").addWalletOwner(c.get("auth").identity, c.req.param("id"), owner),
    });
  });

  routes.delete("/:id/owners/:owner", (c) => {
    return c.json({
      data: c.get("service").removeWalletOwner(
        c.get("auth").identity,
        c.req.param("id"),
        c.req.param("owner"),
      ),
    });
  });

  routes.post("/:id/threshold", validateBody(ThresholdSchema), (c) => {
    const { threshold } = c.get("validatedBody");
    return c.json({
      data: c.get("service").changeWalletThreshold(c.get("auth").identity, c.req.param("id"), threshold),
    });
  });

  routes.post("/:id/deactivate", (c) => {
    return c.json({ data: c.get("service").deactivateWallet(c.get("auth").identity, c.req.param("id")) });
  });

  // ─── Transactions ───────────────────────────────────────────────

  routes.post("/:id/transactions", validateBody(ProposeTransactionSchema), (c) => {
    const { command, value } = c.get("validatedBody");
    const tx = c.get("service").proposeTransaction(c.get("auth").identity, c.req.param("id"), command, value);
    return c.json({ data: tx }, 201);
  });

  routes.get("/:id/transactions", (c) => {
    const query = parseQuery(ListTransactionsQuerySchema, c.req.query());
    return c.json({ data: c.get("service").listTransactions(c.req.param("id"), { state: query.state }) });
  });

  routes.get("/:id/transactions/:txId", (c) => {
    return c.json({ data: c.get("service").getTransaction(c.req.param("id"), c.req.param("txId")) });
  });

  routes.post("/:id/transactions/:txId/confirm", (c) => {
    const tx = c.get("service").confirmTransaction(
      c.get("auth").identity,
      c.req.param("id"),
      c.req.param("txId"),
    );
    return c.json({ data: tx });
  });

  routes.post("/:id/transactions/:txId/revoke", (c) => {
    const tx = c.get("service").revokeConfirmation(
      c.get("auth").identity,
      c.req.param("id"),
      c.req.param("txId"),
    );
    return c.json({ data: tx });
  });

  routes.post("/:id/transactions/:txId/execute", (c) => {
    const tx = c.get("service").executeTransaction(
      c.get("auth").identity,
      c.req.param("id"),
      c.req.param("txId"),
    );
    return c.json({ data: tx });
  });

  routes.post("/:id/transactions/:txId/cancel", (c) => {
    const tx = c.get("service").cancelTransaction(
      c.get("auth").identity,
      c.req.param("id"),
      c.req.param("txId"),
    );
    return c.json({ data: tx });
  });

  return routes;
}
