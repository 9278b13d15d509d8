/**
 * Payment routes.
 *
 * POST /api/v1/payments/direct             — Settle at once
 * POST /api/v1/payments/scheduled          — Hold until a release time
 * POST /api/v1/payments/conditional        — Hold until a verifier fulfills
 * POST /api/v1/payments/recurring          — Fixed number of installments
 * POST /api/v1/payments/split              — One amount across recipients by percentage
 * POST /api/v1/payments/batch              — Explicit amounts, excess funding refunded
 * POST /api/v1/payments/execute-due        — Execute every due installment, reporting failures
 * GET  /api/v1/payments                    — List (cursor pagination)
 * GET  /api/v1/payments/plans/:planId      — Recurring plan
 * POST /api/v1/payments/plans/:planId/cancel
 * GET  /api/v1/payments/:id                — Get one payment
 * POST /api/v1/payments/:id/execute
 * POST /api/v1/payments/:id/cancel
 * POST /api/v1/payments/:id/fulfill
 * POST /api/v1/payments/:id/expire
 * POST /api/v1/payments/:id/reject
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  BatchPaymentSchema,
  ConditionalPaymentSchema,
  DirectPaymentSchema,
  ExecuteDueSchema,
  FulfillPaymentSchema,
  ListPaymentsQuerySchema,
  RecurringPaymentSchema,
  ScheduledPaymentSchema,
  SplitPaymentSchema,
} from "../types/dto.js";
import { parseQuery, validateBody } from "../middleware/validate.js";
import { paginateList } from "../types/pagination.js";

export function createPaymentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Creation ───────────────────────────────────────────────────

  routes.post("/direct", validateBody(DirectPaymentSchema), (c) => {
    const { recipient, amount } = c.get("validatedBody");
    const payment = c.get("service").createDirectPayment(c.get("auth").identity, recipient, amount);
    return c.json({ data: payment }, 201);
  });

  routes.post("/scheduled", validateBody(ScheduledPaymentSchema), (c) => {
    const { recipient, amount, releaseAt } = c.get("validatedBody");
    const payment = c.get("service").createScheduledPayment(
      c.get("auth").identity,
      recipient,
      amount,
      releaseAt,
    );
    return c.json({ data: payment }, 201);
  });

  routes.post("/conditional", validateBody(ConditionalPaymentSchema), (c) => {
    const payment = c.get("service").createConditionalPayment(
      c.get("auth").identity,
      c.get("validatedBody"),
    );
    return c.json({ data: payment }, 201);
  });

  routes.post("/recurring", validateBody(RecurringPaymentSchema), (c) => {
    const { recipient, amount, intervalMs, count } = c.get("validatedBody");
    const plan = c.get("service").createRecurringPayment(
      c.get("auth").identity,
      recipient,
      amount,
      intervalMs,
      count,
    );
    return c.json({ data: plan }, 201);
  });

  routes.post("/split", validateBody(SplitPaymentSchema), (c) => {
    const { recipients, percentages, amount } = c.get("validatedBody");
    const payment = c.get("service").createSplitPayment(
      c.get("auth").identity,
      recipients,
      percentages,
      amount,
    );
    return c.json({ data: payment }, 201);
  });

  routes.post("/batch", validateBody(BatchPaymentSchema), (c) => {
    const { recipients, amounts, funded } = c.get("validatedBody");
    const payment = c.get("service").createBatchPayment(
      c.get("auth").identity,
      recipients,
      amounts,
      funded,
    );
    return c.json({ data: payment }, 201);
  });

  routes.post("/execute-due", validateBody(ExecuteDueSchema), (c) => {
    const { limit } = c.get("validatedBody");
    return c.json({ data: c.get("service").executeDuePayments(c.get("auth").identity, limit) });
  });

  // ─── Queries ────────────────────────────────────────────────────

  routes.get("/", (c) => {
    const query = parseQuery(ListPaymentsQuerySchema, c.req.query());
    const payments = c.get("service").listPayments({
      sender: query.sender,
      recipient: query.recipient,
      kind: query.kind,
      status: query.status,
      planId: query.planId,
    });
    return c.json(paginateList(payments, query));
  });

  routes.get("/plans/:planId", (c) => {
    return c.json({ data: c.get("service").getPlan(c.req.param("planId")) });
  });

  routes.post("/plans/:planId/cancel", (c) => {
    return c.json({
      data: c.get("service").cancelRecurringPayment(c.get("auth").identity, c.req.param("planId")),
    });
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("service").getPayment(c.req.param("id")) });
  });

  // ─── Lifecycle ──────────────────────────────────────────────────

  routes.post("/:id/execute", (c) => {
    return c.json({
      data: c.get("service").executeScheduledPayment(c.get("auth").identity, c.req.param("id")),
    });
  });

  routes.post("/:id/cancel", (c) => {
    return c.json({ data: c.get("service").cancelPayment(c.get("auth").identity, c.req.param("id")) });
  });

  routes.post("/:id/fulfill", validateBody(FulfillPaymentSchema), (c) => {
    const payment = c.get("service").fulfillConditionalPayment(
      c.get("auth").identity,
      c.req.param("id"),
      c.get("validatedBody"),
    );
    return c.json({ data: payment });
  });

  routes.post("/:id/expire", (c) => {
    return c.json({
      data: c.get("service").expireConditionalPayment(c.get("auth").identity, c.req.param("id")),
    });
  });

  routes.post("/:id/reject", (c) => {
    return c.json({
      data: c.get("service").rejectConditionalPayment(c.get("auth").identity, c.req.param("id")),
    });
  });

  return routes;
}
