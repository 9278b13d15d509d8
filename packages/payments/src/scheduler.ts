/**
 * Payment Scheduler
 *
 * Rules:
 * - Every leg is fee-skimmed independently at the scheduler's rate
 * - Each operation is one ledger batch; nothing is written on failure
 * - Held payments (scheduled, conditional, recurring installments) sit in
 *   `payment:<id>` until they settle or go back to the sender
 * - Nothing runs by itself: due payments settle on execute() or
 *   executeDue()
 */

import {
  assertSameCurrency,
  AuthorizationError,
  custodyAccountId,
  DEFAULT_FEE_BPS,
  EventRecorder,
  ExpiredError,
  fromBaseUnits,
  NotFoundError,
  SettlementError,
  StateError,
  ThresholdError,
  toIso,
  toPositiveBaseUnits,
  ValidationError,
} from "@ledgerline/ledger";
import type { AccountLedger, Movement } from "@ledgerline/ledger";
import type { Money, Principal } from "@ledgerline/types";
import { assertConditionMet, validateCondition } from "./conditions.js";
import type {
  ConditionalPaymentInput,
  DueExecution,
  DueFailure,
  FulfillmentProof,
  Payment,
  PaymentFilter,
  PaymentKind,
  PaymentLeg,
  PaymentSchedulerConfig,
  PaymentStatus,
  RecurringPlan,
} from "./types.js";

interface PlannedLeg {
  readonly leg: PaymentLeg;
  readonly movements: readonly Movement[];
}

/** Upper bound on the installments of one recurring plan. */
export const MAX_INSTALLMENTS = 1000;

/** Placeholder custody used to validate a batch before ids exist. */
function placeholderCustody(n = 0): string {
  return custodyAccountId("payment", `pending-${String(n)}`);
}

export class PaymentScheduler {
  private readonly payments: Map<string, Payment> = new Map();
  private readonly plans: Map<string, RecurringPlan> = new Map();
  private readonly ledger: AccountLedger;
  private readonly config: PaymentSchedulerConfig;
  private readonly events: EventRecorder;
  readonly feeBps: number;

  constructor(config: PaymentSchedulerConfig) {
    this.config = config;
    this.ledger = config.ledger;
    this.feeBps = config.ledger.fees.clamp(config.feeBps ?? DEFAULT_FEE_BPS);
    this.events = new EventRecorder("payments", {
      clock: config.clock,
      ids: config.ids,
      sink: config.events,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Immediate payments
  // ───────────────────────────────────────────────────────────────────────

  /** Settle a fee-skimmed transfer at once. */
  direct(sender: Principal, recipient: Principal, amount: Money): Payment {
    this.assertParties(sender, [recipient]);
    const planned = this.planLeg(sender, recipient, amount);
    this.ledger.validateBatch(planned.movements);

    const id = this.config.ids.next("payment");
    this.ledger.applyBatch(id, planned.movements, { actor: sender, memo: "payment.direct" });
    return this.created(this.base(id, "DIRECT", sender, [planned.leg], "COMPLETED"));
  }

  /**
   * Fan `amount` out by integer percentages summing to 100. Each share is
   * floor(amount * pct / 100); the rounding dust is never taken from the
   * sender.
   */
  split(sender: Principal, recipients: readonly Principal[], percentages: readonly number[], amount: Money): Payment {
    this.assertLengths(recipients, percentages);
    this.assertParties(sender, recipients);
    for (const pct of percentages) {
      if (!Number.isInteger(pct) || pct <= 0) {
        throw new ValidationError("INVALID_PERCENTAGES", `Percentages must be positive integers, got ${String(pct)}`);
      }
    }
    const sum = percentages.reduce((a, b) => a + b, 0);
    if (sum !== 100) {
      throw new ValidationError("INVALID_PERCENTAGES", `Percentages must sum to 100, got ${String(sum)}`);
    }

    const units = toPositiveBaseUnits(amount, "Split amount");
    const planned = recipients.map((recipient, i) => {
      const share = (units * BigInt(percentages[i] ?? 0)) / 100n;
      if (share === 0n) {
        throw new ValidationError("INVALID_AMOUNT", `The ${String(percentages[i])}% share of ${amount.amount} rounds to zero`);
      }
      return this.planLeg(sender, recipient, fromBaseUnits(share, amount.currency, amount.decimals));
    });
    const movements = planned.flatMap((p) => p.movements);
    this.ledger.validateBatch(movements);

    const id = this.config.ids.next("payment");
    this.ledger.applyBatch(id, movements, { actor: sender, memo: "payment.split" });
    return this.created(this.base(id, "SPLIT", sender, planned.map((p) => p.leg), "COMPLETED"));
  }

  /**
   * Pay several recipients out of one funded amount. The whole `funded`
   * amount is taken into custody and the unused part handed back in the
   * same batch.
   */
  batch(sender: Principal, recipients: readonly Principal[], amounts: readonly Money[], funded: Money): Payment {
    this.assertLengths(recipients, amounts);
    this.assertParties(sender, recipients);
    const fundedUnits = toPositiveBaseUnits(funded, "Funded amount");
    let total = 0n;
    for (const amount of amounts) {
      assertSameCurrency(amount, funded);
      total += toPositiveBaseUnits(amount, "Batch amount");
    }
    if (total > fundedUnits) {
      const { currency, decimals } = funded;
      const required = fromBaseUnits(total, currency, decimals).amount;
      const available = fromBaseUnits(fundedUnits, currency, decimals).amount;
      throw new ThresholdError(
        "FUNDING_SHORTFALL",
        `Batch needs ${required} ${currency} but only ${available} is funded`,
        { required, funded: available },
      );
    }
    const excess = fromBaseUnits(fundedUnits - total, funded.currency, funded.decimals);

    const build = (custody: string): { legs: PaymentLeg[]; movements: Movement[] } => {
      const planned = recipients.map((recipient, i) => {
        const amount = amounts[i];
        if (amount === undefined) {
          throw new ValidationError("LENGTH_MISMATCH", "Missing amount");
        }
        return this.planLeg(custody, recipient, amount);
      });
      const movements: Movement[] = [
        { from: sender, to: custody, money: fromBaseUnits(fundedUnits, funded.currency, funded.decimals) },
        ...planned.flatMap((p) => p.movements),
      ];
      if (fundedUnits > total) {
        movements.push({ from: custody, to: sender, money: excess });
      }
      return { legs: planned.map((p) => p.leg), movements };
    };
    this.ledger.validateBatch(build(placeholderCustody()).movements);

    const id = this.config.ids.next("payment");
    const { legs, movements } = build(custodyAccountId("payment", id));
    this.ledger.applyBatch(id, movements, { actor: sender, memo: "payment.batch" });
    return this.created({ ...this.base(id, "BATCH", sender, legs, "COMPLETED"), refunded: excess });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Scheduled payments
  // ───────────────────────────────────────────────────────────────────────

  /** Hold `amount` until `releaseAt`. */
  scheduled(sender: Principal, recipient: Principal, amount: Money, releaseAt: string): Payment {
    this.assertParties(sender, [recipient]);
    const release = Date.parse(releaseAt);
    if (!Number.isFinite(release) || release <= this.config.clock.now()) {
      throw new ValidationError("INVALID_SCHEDULE", `Release time must be a future instant, got "${releaseAt}"`);
    }

    const held = this.hold(sender, recipient, amount, "payment.schedule");
    return this.created({
      ...this.base(held.id, "SCHEDULED", sender, [held.leg], "PENDING"),
      releaseAt: toIso(release),
    });
  }

  /** Settle a due scheduled payment or recurring installment. Anyone may call. */
  execute(id: string, caller: Principal = "system"): Payment {
    const payment = this.get(id);
    this.assertKind(payment, ["SCHEDULED", "RECURRING"], "execute");
    this.assertPending(payment, "execute");
    const releaseAt = payment.releaseAt ?? payment.createdAt;
    if (this.config.clock.now() < Date.parse(releaseAt)) {
      throw new StateError("NOT_DUE", `Payment '${id}' is not due until ${releaseAt}`, { paymentId: id, releaseAt });
    }

    const settled = this.settle(payment, caller, "payment.execute");
    const leg = settled.legs[0];
    this.events.record("payment", id, "executed", caller, {
      recipient: leg?.recipient,
      net: leg?.net.amount,
      fee: leg?.fee.amount,
      currency: settled.total.currency,
    });
    this.syncPlan(settled);
    return settled;
  }

  /**
   * Execute every due scheduled payment, earliest release first. A payment
   * that cannot settle stays PENDING and is reported under `failed`; the
   * rest still run.
   */
  executeDue(limit?: number, caller: Principal = "system"): DueExecution {
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
      throw new ValidationError("INVALID_SCHEDULE", `Limit must be a non-negative integer, got ${String(limit)}`);
    }
    const now = this.config.clock.now();
    const due = [...this.payments.values()]
      .filter(
        (p) =>
          p.status === "PENDING" &&
          (p.kind === "SCHEDULED" || p.kind === "RECURRING") &&
          p.releaseAt !== undefined &&
          Date.parse(p.releaseAt) <= now,
      )
      .sort((a, b) => Date.parse(a.releaseAt ?? "") - Date.parse(b.releaseAt ?? ""));

    const executed: Payment[] = [];
    const failed: DueFailure[] = [];
    for (const payment of due.slice(0, limit ?? due.length)) {
      try {
        executed.push(this.execute(payment.id, caller));
      } catch (err) {
        const failure: DueFailure =
          err instanceof SettlementError
            ? { paymentId: payment.id, code: err.code, message: err.message }
            : { paymentId: payment.id, code: "INTERNAL_ERROR", message: err instanceof Error ? err.message : String(err) };
        failed.push(failure);
        this.events.record("payment", payment.id, "execution-failed", caller, {
          code: failure.code,
          reason: failure.message,
        });
      }
    }
    return { executed, failed };
  }

  /** Sender withdraws a pending scheduled payment or installment. */
  cancel(id: string, caller: Principal): Payment {
    const payment = this.get(id);
    this.assertKind(payment, ["SCHEDULED", "RECURRING"], "cancel");
    this.assertSender(payment, caller, "cancel");
    this.assertPending(payment, "cancel");

    const cancelled = this.refund(payment, "CANCELLED", caller, "payment.cancel");
    this.events.record("payment", id, "cancelled", caller, {
      refunded: payment.total.amount,
      currency: payment.total.currency,
    });
    this.syncPlan(cancelled);
    return cancelled;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Conditional payments
  // ───────────────────────────────────────────────────────────────────────

  conditional(sender: Principal, input: ConditionalPaymentInput): Payment {
    this.assertParties(sender, [input.recipient]);
    if (typeof input.verifier !== "string" || input.verifier.length === 0) {
      throw new ValidationError("INVALID_PARTIES", "A conditional payment needs a verifier");
    }
    this.ledger.assertPrincipal(input.verifier, "Verifier");
    let deadline: number | undefined;
    if (input.deadline !== undefined) {
      deadline = Date.parse(input.deadline);
      if (!Number.isFinite(deadline) || deadline <= this.config.clock.now()) {
        throw new ValidationError("INVALID_EXPIRY", `Deadline must be a future instant, got "${input.deadline}"`);
      }
    }
    validateCondition(input.condition, this.config.presence, deadline);

    const held = this.hold(sender, input.recipient, input.amount, "payment.conditional");
    return this.created({
      ...this.base(held.id, "CONDITIONAL", sender, [held.leg], "PENDING"),
      condition: input.condition,
      verifier: input.verifier,
      ...(deadline !== undefined ? { deadline: toIso(deadline) } : {}),
    });
  }

  /**
   * Verifier submits a proof. A met condition settles the payment; after
   * the deadline nothing settles.
   */
  fulfill(id: string, caller: Principal, proof: FulfillmentProof): Payment {
    const payment = this.get(id);
    this.assertKind(payment, ["CONDITIONAL"], "fulfill");
    this.assertVerifier(payment, caller, "fulfill");
    this.assertPending(payment, "fulfill");
    const now = this.config.clock.now();
    if (payment.deadline !== undefined && now > Date.parse(payment.deadline)) {
      throw new ExpiredError(`Payment '${id}' expired at ${payment.deadline}`, { paymentId: id });
    }
    if (payment.condition !== undefined) {
      assertConditionMet(payment.condition, proof, now, this.config.presence);
    }

    const settled = this.settle(payment, caller, "payment.fulfill");
    const leg = settled.legs[0];
    this.events.record("payment", id, "fulfilled", caller, {
      recipient: leg?.recipient,
      net: leg?.net.amount,
      fee: leg?.fee.amount,
      currency: settled.total.currency,
    });
    return settled;
  }

  /** Return an unfulfilled payment to the sender once its deadline has passed. */
  expire(id: string, caller: Principal = "system"): Payment {
    const payment = this.get(id);
    this.assertKind(payment, ["CONDITIONAL"], "expire");
    this.assertPending(payment, "expire");
    if (payment.deadline === undefined || this.config.clock.now() <= Date.parse(payment.deadline)) {
      throw new StateError("NOT_DUE", `Payment '${id}' has not passed its deadline`, {
        paymentId: id,
        deadline: payment.deadline,
      });
    }

    const failed = this.refund(payment, "FAILED", caller, "payment.expire");
    this.events.record("payment", id, "expired", caller, {
      refunded: payment.total.amount,
      currency: payment.total.currency,
    });
    return failed;
  }

  /** Verifier declares the condition unmet; the sender gets everything back. */
  reject(id: string, caller: Principal): Payment {
    const payment = this.get(id);
    this.assertKind(payment, ["CONDITIONAL"], "reject");
    this.assertVerifier(payment, caller, "reject");
    this.assertPending(payment, "reject");

    const rejected = this.refund(payment, "REFUNDED", caller, "payment.reject");
    this.events.record("payment", id, "rejected", caller, {
      refunded: payment.total.amount,
      currency: payment.total.currency,
    });
    return rejected;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Recurring payments
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Settle the first installment now and hold the remaining `count - 1`,
   * released at now + intervalMs * k. Everything is funded in one batch.
   */
  recurring(
    sender: Principal,
    recipient: Principal,
    amount: Money,
    intervalMs: number,
    count: number,
  ): RecurringPlan {
    this.assertParties(sender, [recipient]);
    if (!Number.isSafeInteger(intervalMs) || intervalMs <= 0) {
      throw new ValidationError("INVALID_SCHEDULE", `Interval must be a positive integer, got ${String(intervalMs)}`);
    }
    if (!Number.isSafeInteger(count) || count < 1) {
      throw new ValidationError("INVALID_SCHEDULE", `Count must be a positive integer, got ${String(count)}`);
    }
    if (count > MAX_INSTALLMENTS) {
      throw new ValidationError(
        "TOO_MANY_INSTALLMENTS",
        `A plan holds at most ${String(MAX_INSTALLMENTS)} installments, got ${String(count)}`,
        { count, max: MAX_INSTALLMENTS },
      );
    }

    const first = this.planLeg(sender, recipient, amount);
    const gross = first.leg.gross;
    const build = (custodies: readonly string[]): Movement[] => [
      ...first.movements,
      ...custodies.map((to) => ({ from: sender, to, money: gross })),
    ];
    const rest = Array.from({ length: count - 1 }, (_, k) => k + 1);
    this.ledger.validateBatch(build(rest.map((k) => placeholderCustody(k))));

    const planId = this.config.ids.next("plan");
    const paymentIds = Array.from({ length: count }, () => this.config.ids.next("payment"));
    this.ledger.applyBatch(
      planId,
      build(paymentIds.slice(1).map((pid) => custodyAccountId("payment", pid))),
      { actor: sender, memo: "payment.recurring" },
    );

    const now = this.config.clock.now();
    const plan: RecurringPlan = {
      id: planId,
      sender,
      recipient,
      amount: gross,
      intervalMs,
      count,
      paymentIds,
      status: count === 1 ? "COMPLETED" : "ACTIVE",
      createdAt: toIso(now),
    };
    this.plans.set(planId, plan);
    this.events.record("plan", planId, "created", sender, {
      count,
      sender,
      recipient,
      amount: gross.amount,
      currency: gross.currency,
      intervalMs,
    });

    paymentIds.forEach((paymentId, k) => {
      const held = k === 0 ? first.leg : this.planLeg(custodyAccountId("payment", paymentId), recipient, gross).leg;
      const base = this.base(paymentId, "RECURRING", sender, [held], k === 0 ? "COMPLETED" : "PENDING");
      this.created({
        ...base,
        planId,
        sequence: k + 1,
        ...(k > 0 ? { releaseAt: toIso(now + intervalMs * k) } : {}),
      });
    });
    return plan;
  }

  /** Cancel every pending installment of a plan and refund them together. */
  cancelRecurring(planId: string, caller: Principal): RecurringPlan {
    const plan = this.getPlan(planId);
    if (caller !== plan.sender) {
      throw new AuthorizationError(`Only the sender can cancel plan '${planId}'`, { planId, caller });
    }
    const pending = plan.paymentIds
      .map((id) => this.get(id))
      .filter((p) => p.status === "PENDING");
    if (plan.status !== "ACTIVE" || pending.length === 0) {
      throw new StateError("INVALID_TRANSITION", `Plan '${planId}' is ${plan.status}`, { planId, status: plan.status });
    }

    this.ledger.applyBatch(
      planId,
      pending.map((p) => ({ from: custodyAccountId("payment", p.id), to: p.sender, money: p.total })),
      { actor: caller, memo: "payment.recurring.cancel" },
    );
    const settledAt = toIso(this.config.clock.now());
    for (const p of pending) {
      this.payments.set(p.id, { ...p, status: "CANCELLED", refunded: p.total, settledAt });
      this.events.record("payment", p.id, "cancelled", caller, {
        refunded: p.total.amount,
        currency: p.total.currency,
      });
    }

    const cancelled: RecurringPlan = { ...plan, status: "CANCELLED" };
    this.plans.set(planId, cancelled);
    this.events.record("plan", planId, "cancelled", caller, { cancelled: pending.map((p) => p.id) });
    return cancelled;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(id: string): Payment {
    const payment = this.payments.get(id);
    if (!payment) {
      throw new NotFoundError(`Payment '${id}' not found`, { paymentId: id });
    }
    return payment;
  }

  list(filter?: PaymentFilter): readonly Payment[] {
    return [...this.payments.values()].filter(
      (p) =>
        (filter?.sender === undefined || p.sender === filter.sender) &&
        (filter?.recipient === undefined || p.legs.some((l) => l.recipient === filter.recipient)) &&
        (filter?.kind === undefined || p.kind === filter.kind) &&
        (filter?.status === undefined || p.status === filter.status) &&
        (filter?.planId === undefined || p.planId === filter.planId),
    );
  }

  getPlan(planId: string): RecurringPlan {
    const plan = this.plans.get(planId);
    if (!plan) {
      throw new NotFoundError(`Plan '${planId}' not found`, { planId });
    }
    return plan;
  }

  listPlans(sender?: Principal): readonly RecurringPlan[] {
    const all = [...this.plans.values()];
    return sender === undefined ? all : all.filter((p) => p.sender === sender);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private planLeg(from: string, recipient: Principal, amount: Money): PlannedLeg {
    const plan = this.ledger.planFeeTransfer(from, recipient, amount, this.feeBps);
    return {
      leg: { recipient, gross: plan.gross, fee: plan.fee, net: plan.net },
      movements: plan.movements,
    };
  }

  /** Move `amount` from the sender into a new payment's custody. */
  private hold(sender: Principal, recipient: Principal, amount: Money, memo: string): { id: string; leg: PaymentLeg } {
    const gross = fromBaseUnits(toPositiveBaseUnits(amount), amount.currency, amount.decimals);
    this.ledger.validateBatch([{ from: sender, to: placeholderCustody(), money: gross }]);

    const id = this.config.ids.next("payment");
    const custody = custodyAccountId("payment", id);
    const leg = this.planLeg(custody, recipient, gross).leg;
    this.ledger.applyBatch(id, [{ from: sender, to: custody, money: gross }], { actor: sender, memo });
    return { id, leg };
  }

  /** Pay a held payment out of custody. */
  private settle(payment: Payment, actor: Principal, memo: string): Payment {
    const custody = custodyAccountId("payment", payment.id);
    const planned = payment.legs.map((leg) => this.planLeg(custody, leg.recipient, leg.gross));
    this.ledger.applyBatch(payment.id, planned.flatMap((p) => p.movements), { actor, memo });

    const settled: Payment = {
      ...payment,
      legs: planned.map((p) => p.leg),
      status: "COMPLETED",
      settledAt: toIso(this.config.clock.now()),
    };
    this.payments.set(payment.id, settled);
    return settled;
  }

  /** Return a held payment to its sender. */
  private refund(payment: Payment, status: PaymentStatus, actor: Principal, memo: string): Payment {
    this.ledger.applyBatch(
      payment.id,
      [{ from: custodyAccountId("payment", payment.id), to: payment.sender, money: payment.total }],
      { actor, memo },
    );
    const refunded: Payment = {
      ...payment,
      status,
      refunded: payment.total,
      settledAt: toIso(this.config.clock.now()),
    };
    this.payments.set(payment.id, refunded);
    return refunded;
  }

  /** Mark a plan COMPLETED once none of its installments is pending. */
  private syncPlan(payment: Payment): void {
    if (payment.planId === undefined) return;
    const plan = this.getPlan(payment.planId);
    if (plan.status !== "ACTIVE") return;
    const open = plan.paymentIds.some((id) => this.get(id).status === "PENDING");
    if (!open) {
      this.plans.set(plan.id, { ...plan, status: "COMPLETED" });
    }
  }

  private base(
    id: string,
    kind: PaymentKind,
    sender: Principal,
    legs: readonly PaymentLeg[],
    status: PaymentStatus,
  ): Payment {
    const now = toIso(this.config.clock.now());
    const first = legs[0];
    if (first === undefined) {
      throw new ValidationError("LENGTH_MISMATCH", "A payment needs at least one leg");
    }
    let total = 0n;
    for (const leg of legs) {
      total += toPositiveBaseUnits(leg.gross);
    }
    return {
      id,
      kind,
      sender,
      legs,
      total: fromBaseUnits(total, first.gross.currency, first.gross.decimals),
      feeBps: this.feeBps,
      status,
      createdAt: now,
      ...(status === "COMPLETED" ? { settledAt: now } : {}),
    };
  }

  private created(payment: Payment): Payment {
    this.payments.set(payment.id, payment);
    this.events.record("payment", payment.id, "created", payment.sender, {
      kind: payment.kind,
      sender: payment.sender,
      total: payment.total.amount,
      currency: payment.total.currency,
      status: payment.status,
      recipients: payment.legs.map((l) => l.recipient),
    });
    return payment;
  }

  private assertParties(sender: Principal, recipients: readonly Principal[]): void {
    this.ledger.assertPrincipal(sender, "Sender");
    for (const recipient of recipients) {
      this.ledger.assertPrincipal(recipient, "Recipient");
    }
    if (recipients.includes(sender)) {
      throw new ValidationError("INVALID_PARTIES", `"${sender}" cannot pay themselves`);
    }
  }

  private assertLengths(recipients: readonly unknown[], values: readonly unknown[]): void {
    if (recipients.length === 0 || recipients.length !== values.length) {
      throw new ValidationError(
        "LENGTH_MISMATCH",
        `Expected one value per recipient, got ${String(recipients.length)} recipients and ${String(values.length)} values`,
      );
    }
  }

  private assertKind(payment: Payment, kinds: readonly PaymentKind[], action: string): void {
    if (!kinds.includes(payment.kind)) {
      throw new StateError("INVALID_TRANSITION", `Cannot ${action} a ${payment.kind} payment`, {
        paymentId: payment.id,
        kind: payment.kind,
      });
    }
  }

  private assertPending(payment: Payment, action: string): void {
    if (payment.status !== "PENDING") {
      throw new StateError("INVALID_TRANSITION", `Cannot ${action} payment '${payment.id}': it is ${payment.status}`, {
        paymentId: payment.id,
        status: payment.status,
      });
    }
  }

  private assertSender(payment: Payment, caller: Principal, action: string): void {
    if (caller !== payment.sender) {
      throw new AuthorizationError(`Only the sender can ${action} payment '${payment.id}'`, {
        paymentId: payment.id,
        caller,
      });
    }
  }

  private assertVerifier(payment: Payment, caller: Principal, action: string): void {
    if (caller !== payment.verifier) {
      throw new AuthorizationError(`Only the verifier can ${action} payment '${payment.id}'`, {
        paymentId: payment.id,
        caller,
      });
    }
  }
}
