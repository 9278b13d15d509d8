/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type. Schemas check
 * shape only; amounts, parties and schedules are validated by the
 * settlement engines, which own those rules.
 */

import { z } from "zod";
import { MAX_INSTALLMENTS } from "@ledgerline/payments";

// =============================================================================
// Shared Schemas
// =============================================================================

export const MoneySchema = z.object({
  amount: z.string().min(1),
  currency: z.string().min(1),
  decimals: z.number().int().min(0).max(18),
});

export const PrincipalSchema = z.string().min(1).max(256);

const IsoTimeSchema = z.string().min(1);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Account DTOs
// =============================================================================

export const DepositSchema = z.object({
  account: PrincipalSchema,
  amount: MoneySchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const WithdrawSchema = z.object({
  amount: MoneySchema,
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const TransferSchema = z.object({
  to: PrincipalSchema,
  amount: MoneySchema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const ListEntriesQuerySchema = PaginationQuerySchema.extend({
  currency: z.string().optional(),
});

// =============================================================================
// Escrow DTOs
// =============================================================================

export const CreateEscrowSchema = z.object({
  seller: PrincipalSchema,
  amount: MoneySchema,
  expiresAt: IsoTimeSchema.optional(),
  ttlMs: z.number().int().positive().optional(),
  arbiter: PrincipalSchema.optional(),
});

export type CreateEscrowDto = z.infer<typeof CreateEscrowSchema>;

export const ResolveEscrowSchema = z.object({
  winner: z.enum(["buyer", "seller"]),
});

export type ResolveEscrowDto = z.infer<typeof ResolveEscrowSchema>;

export const ListEscrowsQuerySchema = PaginationQuerySchema.extend({
  party: z.string().optional(),
  status: z.enum(["CREATED", "FUNDED", "RELEASED", "REFUNDED", "DISPUTED", "RESOLVED"]).optional(),
});

// =============================================================================
// Wallet DTOs
// =============================================================================

export const CreateWalletSchema = z.object({
  owners: z.array(PrincipalSchema).min(1),
  threshold: z.number().int(),
});

export type CreateWalletDto = z.infer<typeof CreateWalletSchema>;

export const WalletDepositSchema = z.object({
  amount: MoneySchema,
});

export const WalletCommandSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("transfer"), to: PrincipalSchema }),
  z.object({ kind: z.literal("add-owner"), owner: PrincipalSchema }),
  z.object({ kind: z.literal("remove-owner"), owner: PrincipalSchema }),
  z.object({ kind: z.literal("change-threshold"), threshold: z.number().int() }),
  z.object({ kind: z.literal("forward"), target: PrincipalSchema, data: z.string().max(65536) }),
]);

export const ProposeTransactionSchema = z.object({
  command: WalletCommandSchema,
  value: MoneySchema.optional(),
});

export type ProposeTransactionDto = z.infer<typeof ProposeTransactionSchema>;

export const OwnerSchema = z.object({
  owner: PrincipalSchema,
});

export const ThresholdSchema = z.object({
  threshold: z.number().int(),
});

export const ListTransactionsQuerySchema = z.object({
  state: z.enum(["pending", "executed", "cancelled"]).optional(),
});

// =============================================================================
// Auction DTOs
// =============================================================================

export const RegisterItemSchema = z.object({
  itemRef: z.string().min(1).max(256),
});

export const CreateAuctionSchema = z.object({
  itemRef: z.string().min(1).max(256),
  startingPrice: MoneySchema,
  durationMs: z.number().int(),
  minIncrement: MoneySchema,
  reservePrice: MoneySchema.optional(),
});

export type CreateAuctionDto = z.infer<typeof CreateAuctionSchema>;

export const BidSchema = z.object({
  amount: MoneySchema,
});

export const ListAuctionsQuerySchema = PaginationQuerySchema.extend({
  seller: z.string().optional(),
  status: z.enum(["ACTIVE", "CANCELLED", "COMPLETED", "FAILED"]).optional(),
});

export const CreateDutchAuctionSchema = z.object({
  itemRef: z.string().min(1).max(256),
  startingPrice: MoneySchema,
  reservePrice: MoneySchema,
  decrement: MoneySchema,
  intervalMs: z.number().int(),
  durationMs: z.number().int(),
});

export type CreateDutchAuctionDto = z.infer<typeof CreateDutchAuctionSchema>;

export const PurchaseSchema = z.object({
  payment: MoneySchema,
});

export const ListDutchAuctionsQuerySchema = PaginationQuerySchema.extend({
  seller: z.string().optional(),
  status: z.enum(["ACTIVE", "COMPLETED", "ENDED", "CANCELLED"]).optional(),
});

// =============================================================================
// Payment DTOs
// =============================================================================

export const DirectPaymentSchema = z.object({
  recipient: PrincipalSchema,
  amount: MoneySchema,
});

export const ScheduledPaymentSchema = DirectPaymentSchema.extend({
  releaseAt: IsoTimeSchema,
});

export const PaymentConditionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("time"), notBefore: IsoTimeSchema }),
  z.object({
    type: z.literal("signatures"),
    signers: z.array(PrincipalSchema).min(1),
    required: z.number().int(),
  }),
  z.object({ type: z.literal("contract-presence"), address: z.string().min(1) }),
  z.object({ type: z.literal("custom"), description: z.string().min(1).max(1024) }),
]);

export const ConditionalPaymentSchema = DirectPaymentSchema.extend({
  verifier: PrincipalSchema,
  condition: PaymentConditionSchema,
  deadline: IsoTimeSchema.optional(),
});

export type ConditionalPaymentDto = z.infer<typeof ConditionalPaymentSchema>;

export const FulfillPaymentSchema = z.object({
  signatures: z.array(PrincipalSchema).optional(),
  approved: z.boolean().optional(),
});

export const RecurringPaymentSchema = DirectPaymentSchema.extend({
  intervalMs: z.number().int(),
  count: z.number().int().min(1).max(MAX_INSTALLMENTS),
});

export const SplitPaymentSchema = z.object({
  recipients: z.array(PrincipalSchema).min(1),
  percentages: z.array(z.number()).min(1),
  amount: MoneySchema,
});

export const BatchPaymentSchema = z.object({
  recipients: z.array(PrincipalSchema).min(1),
  amounts: z.array(MoneySchema).min(1),
  funded: MoneySchema,
});

export const ExecuteDueSchema = z.object({
  limit: z.number().int().min(0).optional(),
});

export const ListPaymentsQuerySchema = PaginationQuerySchema.extend({
  sender: z.string().optional(),
  recipient: z.string().optional(),
  kind: z.enum(["DIRECT", "SCHEDULED", "CONDITIONAL", "RECURRING", "SPLIT", "BATCH"]).optional(),
  status: z.enum(["PENDING", "COMPLETED", "CANCELLED", "FAILED", "REFUNDED"]).optional(),
  planId: z.string().optional(),
});

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;
