/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (deep health: event store and journal integrity)
 */

import { Hono } from "hono";
import type { SettlementService } from "../services/settlement-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: SettlementService): Hono {
  const routes = new Hono();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date(service.clock.now()).toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.checkEventStore();
    const journal = service.verifyJournal();

    const subsystems: Record<string, SubsystemStatus> = {
      eventStore: integrity.valid
        ? { status: "ok" }
        : { status: "down", detail: `chainValid=false, errors=${String(integrity.errors.length)}` },
      ledger: journal.consistent
        ? { status: "ok" }
        : { status: "down", detail: `discrepancies=${String(journal.discrepancies.length)}` },
    };

    const ready =
      service.isReady() &&
      Object.values(subsystems).every((s) => s.status === "ok");

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        subsystems,
        timestamp: new Date(service.clock.now()).toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
