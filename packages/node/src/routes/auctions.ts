/**
 * Auction routes.
 *
 * POST /api/v1/items                          — Claim an item for the caller
 * GET  /api/v1/items?owner=                   — Items held by an owner
 *
 * POST /api/v1/auctions                       — Open an English auction
 * GET  /api/v1/auctions                       — List (cursor pagination)
 * GET  /api/v1/auctions/:id                   — Auction and its bid history
 * POST /api/v1/auctions/:id/bids              — Place a bid
 * POST /api/v1/auctions/:id/end               — Settle after the end time
 * POST /api/v1/auctions/:id/cancel            — Seller cancels before any bid
 *
 * POST /api/v1/dutch-auctions                 — Open a Dutch auction
 * GET  /api/v1/dutch-auctions                 — List (cursor pagination)
 * GET  /api/v1/dutch-auctions/:id             — Auction and its effective price
 * POST /api/v1/dutch-auctions/:id/purchase    — Buy at the current price
 * POST /api/v1/dutch-auctions/:id/refresh     — Record the decayed price
 * POST /api/v1/dutch-auctions/:id/end         — Close unsold after the end time
 * POST /api/v1/dutch-auctions/:id/cancel      — Seller cancels
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  BidSchema,
  CreateAuctionSchema,
  CreateDutchAuctionSchema,
  ListAuctionsQuerySchema,
  ListDutchAuctionsQuerySchema,
  PurchaseSchema,
  RegisterItemSchema,
} from "../types/dto.js";
import { parseQuery, validateBody } from "../middleware/validate.js";
import { paginateList } from "../types/pagination.js";

export function createItemRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(RegisterItemSchema), (c) => {
    const { itemRef } = c.get("validatedBody");
    return c.json({ data: c.get("service").registerItem(c.get("auth").identity, itemRef) }, 201);
  });

  routes.get("/", (c) => {
    const owner = c.req.query("owner") ?? c.get("auth").identity;
    return c.json({ data: c.get("service").itemsOf(owner) });
  });

  return routes;
}

export function createAuctionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateAuctionSchema), (c) => {
    const auction = c.get("service").createAuction(c.get("auth").identity, c.get("validatedBody"));
    return c.json({ data: auction }, 201);
  });

  routes.get("/", (c) => {
    const query = parseQuery(ListAuctionsQuerySchema, c.req.query());
    const auctions = c.get("service").listAuctions({ seller: query.seller, status: query.status });
    return c.json(paginateList(auctions, query));
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("service").getAuction(c.req.param("id")) });
  });

  routes.post("/:id/bids", validateBody(BidSchema), (c) => {
    const { amount } = c.get("validatedBody");
    const auction = c.get("service").placeBid(c.get("auth").identity, c.req.param("id"), amount);
    return c.json({ data: auction }, 201);
  });

  routes.post("/:id/end", (c) => {
    return c.json({ data: c.get("service").endAuction(c.get("auth").identity, c.req.param("id")) });
  });

  routes.post("/:id/cancel", (c) => {
    return c.json({ data: c.get("service").cancelAuction(c.get("auth").identity, c.req.param("id")) });
  });

  return routes;
}

export function createDutchAuctionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateDutchAuctionSchema), (c) => {
    const auction = c.get("service").createDutchAuction(c.get("auth").identity, c.get("validatedBody"));
    return c.json({ data: auction }, 201);
  });

  routes.get("/", (c) => {
    const query = parseQuery(ListDutchAuctionsQuerySchema, c.req.query());
    const auctions = c.get("service").listDutchAuctions({ seller: query.seller, status: query.status });
    return c.json(paginateList(auctions, query));
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("service").getDutchAuction(c.req.param("id")) });
  });

  routes.post("/:id/purchase", validateBody(PurchaseSchema), (c) => {
    const { payment } = c.get("validatedBody");
    const purchase = c.get("service").purchaseDutchAuctionItem(
      c.get("auth").identity,
      c.req.param("id"),
      payment,
    );
    return c.json({ data: purchase }, 201);
  });

  routes.post("/:id/refresh", (c) => {
    return c.json({ data: c.get("service").refreshDutchPrice(c.get("auth").identity, c.req.param("id")) });
  });

  routes.post("/:id/end", (c) => {
    return c.json({ data: c.get("service").endDutchAuction(c.get("auth").identity, c.req.param("id")) });
  });

  routes.post("/:id/cancel", (c) => {
    return c.json({ data: c.get("service").cancelDutchAuction(c.get("auth").identity, c.req.param("id")) });
  });

  return routes;
}
