/**
 * Event query routes.
 *
 * GET /api/v1/events            — List all events (cursor pagination)
 * GET /api/v1/events/:streamId  — List events for a stream
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/events — All events
  routes.get("/", (c) => {
    const query = parseQuery(ListEventsQuerySchema, c.req.query());

    const events = c.get("service").readAllEvents(
      query.afterPosition !== undefined
        ? { fromPosition: query.afterPosition + 1 }
        : undefined,
    );

    return c.json(paginate(events, query, (e) => e.globalPosition));
  });

  // GET /api/v1/events/:streamId — one stream, e.g. "escrow:escrow-1"
  routes.get("/:streamId", (c) => {
    const query = parseQuery(ListStreamEventsQuerySchema, c.req.query());

    const events = c.get("service").readStreamEvents(
      c.req.param("streamId"),
      query.afterVersion !== undefined
        ? { fromVersion: query.afterVersion + 1 }
        : undefined,
    );

    return c.json(paginate(events, query, (e) => e.version));
  });

  return routes;
}
