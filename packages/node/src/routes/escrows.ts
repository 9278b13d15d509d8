/**
 * Escrow routes.
 *
 * POST /api/v1/escrows                — Open and fund an escrow (caller is buyer)
 * GET  /api/v1/escrows                — List escrows (cursor pagination)
 * GET  /api/v1/escrows/:id            — Get one escrow
 * POST /api/v1/escrows/:id/release    — Buyer releases to seller
 * POST /api/v1/escrows/:id/refund     — Seller refunds the buyer
 * POST /api/v1/escrows/:id/dispute    — Either party disputes
 * POST /api/v1/escrows/:id/resolve    — Arbiter settles a dispute
 * POST /api/v1/escrows/:id/claim      — Buyer reclaims after expiry
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateEscrowSchema, ListEscrowsQuerySchema, ResolveEscrowSchema } from "../types/dto.js";
import { parseQuery, validateBody } from "../middleware/validate.js";
import { paginateList } from "../types/pagination.js";

export function createEscrowRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateEscrowSchema), (c) => {
    const escrow = c.get("service").createEscrow(c.get("auth").identity, c.get("validatedBody"));
    return c.json({ data: escrow }, 201);
  });

  routes.get("/", (c) => {
    const query = parseQuery(ListEscrowsQuerySchema, c.req.query());
    const escrows = c.get("service").listEscrows({ party: query.party, status: query.status });
    return c.json(paginateList(escrows, query));
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("service").getEscrow(c.req.param("id")) });
  });

  routes.post("/:id/release", (c) => {
    return c.json({ data: c.get("service").releaseEscrow(c.get("auth").identity, c.req.param("id")) });
  });

  routes.post("/:id/refund", (c) => {
    return c.json({ data: c.get("service").refundEscrow(c.get("auth").identity, c.req.param("id")) });
  });

  routes.post("/:id/dispute", (c) => {
    return c.json({ data: c.get("service").disputeEscrow(c.get("auth").identity, c.req.param("id")) });
  });

  routes.post("/:id/resolve", validateBody(ResolveEscrowSchema), (c) => {
    const { winner } = c.get("validatedBody");
    return c.json({
      data: c.get("service").resolveEscrow(c.get("auth").identity, c.req.param("id"), winner),
    });
  });

  routes.post("/:id/claim", (c) => {
    return c.json({
      data: c.get("service").claimExpiredEscrow(c.get("auth").identity, c.req.param("id")),
    });
  });

  return routes;
}
