/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type. Amounts
 * travel as base-unit digit strings and are parsed to bigint here.
 */

import { z } from "zod";
import { isAmountString, isBasisPoints } from "@tidepool/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .refine(isAmountString, { message: "Expected a non-negative integer string" })
  .transform((v) => BigInt(v));

const AssetIdSchema = z.string().min(1).max(64);

const BpsSchema = z
  .number()
  .refine(isBasisPoints, { message: "Expected an integer between 0 and 10000 basis points" });

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Asset DTOs
// =============================================================================

export const RegisterAssetSchema = z.object({
  assetId: AssetIdSchema,
  symbol: z.string().min(1).max(16),
  decimals: z.number().int().min(0).max(36),
  minDeposit: AmountSchema,
  maxDeposit: AmountSchema,
  minWithdraw: AmountSchema,
  maxWithdraw: AmountSchema,
  enabledForDeposit: z.boolean().optional(),
  enabledForWithdraw: z.boolean().optional(),
});

export type RegisterAssetDto = z.infer<typeof RegisterAssetSchema>;

export const UpdateAssetSchema = z
  .object({
    minDeposit: AmountSchema.optional(),
    maxDeposit: AmountSchema.optional(),
    minWithdraw: AmountSchema.optional(),
    maxWithdraw: AmountSchema.optional(),
    enabledForDeposit: z.boolean().optional(),
    enabledForWithdraw: z.boolean().optional(),
  })
  .strict();

export type UpdateAssetDto = z.infer<typeof UpdateAssetSchema>;

export const InjectYieldSchema = z.object({
  amount: AmountSchema,
});

// =============================================================================
// Wallet DTOs
// =============================================================================

export const RegisterWalletSchema = z.object({
  walletId: z.string().min(1),
  owner: z.string().min(1).max(128),
  referrerId: z.string().optional(),
  referralPercents: z.array(BpsSchema).max(16).optional(),
  systemFeeBps: BpsSchema.optional(),
});

export type RegisterWalletDto = z.infer<typeof RegisterWalletSchema>;

export const AssignReferrerSchema = z.object({
  referrerId: z.string().min(1),
});

export const AssetAmountSchema = z.object({
  assetId: AssetIdSchema,
  amount: AmountSchema,
});

export type AssetAmountDto = z.infer<typeof AssetAmountSchema>;

export const RedeemSchema = z.object({
  assetId: AssetIdSchema,
  /** "0" redeems every share */
  shares: AmountSchema,
});

export const SwapSchema = z.object({
  fromAssetId: AssetIdSchema,
  toAssetId: AssetIdSchema,
  amountIn: AmountSchema,
});

// =============================================================================
// Withdraw Request DTOs
// =============================================================================

const WithdrawStatusSchema = z.enum(["pending", "success", "failed"]);

export const UpdateWithdrawRequestSchema = z.object({
  status: WithdrawStatusSchema,
  addAvailable: AmountSchema.default("0"),
  errorMessage: z.string().max(1024).default(""),
  expectedVersion: z.number().int().min(1).optional(),
});

export type UpdateWithdrawRequestDto = z.infer<typeof UpdateWithdrawRequestSchema>;

export const ListWithdrawRequestsQuerySchema = z.object({
  status: WithdrawStatusSchema.optional(),
  assetId: AssetIdSchema.optional(),
});

// =============================================================================
// Strategy DTOs
// =============================================================================

export const StrategyWithdrawSchema = AssetAmountSchema.extend({
  /** Interest to recall; the strategy reports it when omitted */
  interestAmount: AmountSchema.optional(),
});

// =============================================================================
// Custody DTOs
// =============================================================================

export const CreditCustodySchema = z.object({
  account: z.string().min(1),
  amount: AmountSchema,
});

export const SwapRateSchema = z.object({
  fromAssetId: AssetIdSchema,
  toAssetId: AssetIdSchema,
  numerator: AmountSchema,
  denominator: AmountSchema,
});

// =============================================================================
// Record & Audit DTOs
// =============================================================================

export const ListRecordsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListRecordsQuery = z.infer<typeof ListRecordsQuerySchema>;

export const ListStreamRecordsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export const AuditQuerySchema = z.object({
  action: z.string().optional(),
  resourceType: z.string().optional(),
  resourceId: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});
