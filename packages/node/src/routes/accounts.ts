/**
 * Account routes.
 *
 * POST /api/v1/accounts/deposit        — Credit value entering the platform (admin)
 * POST /api/v1/accounts/withdraw       — Take value out of the caller's account
 * POST /api/v1/accounts/transfer       — Fee-bearing transfer from the caller
 * GET  /api/v1/accounts/:id/balances   — Balances of one account
 * GET  /api/v1/accounts/:id/entries    — Journal lines of one account (cursor pagination)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  DepositSchema,
  ListEntriesQuerySchema,
  TransferSchema,
  WithdrawSchema,
} from "../types/dto.js";
import { parseQuery, validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import { paginateList } from "../types/pagination.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/deposit", requirePermission("admin"), validateBody(DepositSchema), (c) => {
    const body = c.get("validatedBody");
    const balances = c.get("service").deposit(c.get("auth").identity, body.account, body.amount);
    return c.json({ data: balances }, 201);
  });

  routes.post("/withdraw", validateBody(WithdrawSchema), (c) => {
    const body = c.get("validatedBody");
    const balances = c.get("service").withdraw(c.get("auth").identity, body.amount);
    return c.json({ data: balances });
  });

  routes.post("/transfer", validateBody(TransferSchema), (c) => {
    const body = c.get("validatedBody");
    const result = c.get("service").transferWithFee(c.get("auth").identity, body.to, body.amount);
    return c.json({ data: result }, 201);
  });

  routes.get("/:id/balances", (c) => {
    const currency = c.req.query("currency");
    return c.json({ data: c.get("service").getBalance(c.req.param("id"), currency) });
  });

  routes.get("/:id/entries", (c) => {
    const query = parseQuery(ListEntriesQuerySchema, c.req.query());
    const entries = c.get("service").getEntries(c.req.param("id"), query.currency);
    return c.json(paginateList(entries, query));
  });

  return routes;
}
