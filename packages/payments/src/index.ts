/**
 * @ledgerline/payments — Payment scheduling.
 *
 * Direct, split and batch payments settle at once. Scheduled, conditional
 * and recurring payments hold their funds in `payment:<id>` until they
 * settle or return to the sender.
 */

export { MAX_INSTALLMENTS, PaymentScheduler } from "./scheduler.js";
export { assertConditionMet, validateCondition } from "./conditions.js";
export type {
  ConditionalPaymentInput,
  ContractPresenceCondition,
  CustomCondition,
  DueExecution,
  DueFailure,
  FulfillmentProof,
  Payment,
  PaymentCondition,
  PaymentFilter,
  PaymentKind,
  PaymentLeg,
  PaymentSchedulerConfig,
  PaymentStatus,
  PresenceChecker,
  RecurringPlan,
  RecurringPlanStatus,
  SignaturesCondition,
  TimeCondition,
} from "./types.js";
