/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Amounts travel as base-10 digit strings and are parsed to bigint here,
 * so route handlers only ever see validated integers.
 */

import { z } from "zod";
import { MAX_VOTING_PERIOD } from "@keelson/protocol";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "must be a base-10 digit string")
  .transform((value) => BigInt(value));

export const AccountSchema = z.string().trim().min(1).max(256);

export const SymbolSchema = z.string().min(1).max(64);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Portfolio DTOs
// =============================================================================

export const ConfigurePortfolioSchema = z
  .object({
    managementFee: AmountSchema.optional(),
    performanceFee: AmountSchema.optional(),
    minValueThreshold: AmountSchema.optional(),
    maxValueThreshold: AmountSchema.nullable().optional(),
    riskScore: AmountSchema.optional(),
  })
  .strict();

export type ConfigurePortfolioDto = z.infer<typeof ConfigurePortfolioSchema>;

export const AddAssetSchema = z.object({
  symbol: SymbolSchema,
  amount: AmountSchema,
  value: AmountSchema,
});

export type AddAssetDto = z.infer<typeof AddAssetSchema>;

export const WithdrawSchema = z.object({
  token: z.string().min(1),
  symbol: SymbolSchema,
  amount: AmountSchema,
  /** Defaults to the caller */
  to: AccountSchema.optional(),
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const EmergencyWithdrawSchema = z.object({
  tokens: z.array(z.string().min(1)).min(1),
});

export type EmergencyWithdrawDto = z.infer<typeof EmergencyWithdrawSchema>;

export const RebalanceSchema = z.object({
  symbols: z.array(SymbolSchema),
  targetRatios: z.array(AmountSchema),
});

export type RebalanceDto = z.infer<typeof RebalanceSchema>;

export const ApplyFeesSchema = z.object({
  bonusThreshold: AmountSchema,
});

export type ApplyFeesDto = z.infer<typeof ApplyFeesSchema>;

export const PriceFeedSchema = z.object({
  source: z.string().min(1),
});

export type PriceFeedDto = z.infer<typeof PriceFeedSchema>;

// =============================================================================
// Staking & Token DTOs
// =============================================================================

export const StakeAmountSchema = z.object({
  amount: AmountSchema,
});

export type StakeAmountDto = z.infer<typeof StakeAmountSchema>;

export const IssueTokensSchema = z.object({
  to: AccountSchema,
  amount: AmountSchema,
});

export type IssueTokensDto = z.infer<typeof IssueTokensSchema>;

export const ApproveSchema = z.object({
  spender: AccountSchema,
  amount: AmountSchema,
});

export type ApproveDto = z.infer<typeof ApproveSchema>;

export const TransferSchema = z.object({
  to: AccountSchema,
  amount: AmountSchema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

// =============================================================================
// Flash Loan DTOs
// =============================================================================

export const FlashLoanSchema = z.object({
  amount: AmountSchema,
});

export type FlashLoanDto = z.infer<typeof FlashLoanSchema>;

// =============================================================================
// Governance DTOs
// =============================================================================

export const CreateProposalSchema = z.object({
  description: z.string().min(1).max(1024),
  /** Seconds from now until voting closes */
  votingPeriod: z.number().int().min(0).max(MAX_VOTING_PERIOD),
});

export type CreateProposalDto = z.infer<typeof CreateProposalSchema>;

export const VoteSchema = z.object({
  votes: AmountSchema,
});

export type VoteDto = z.infer<typeof VoteSchema>;

export const ProposalIdSchema = z.coerce.number().int().min(0);

export const ListProposalsQuerySchema = PaginationQuerySchema;

export type ListProposalsQuery = z.infer<typeof ListProposalsQuerySchema>;

// =============================================================================
// Insurance & Referral DTOs
// =============================================================================

export const BuyInsuranceSchema = z.object({
  coverageAmount: AmountSchema,
  premium: AmountSchema,
});

export type BuyInsuranceDto = z.infer<typeof BuyInsuranceSchema>;

export const ReferSchema = z.object({
  newUser: AccountSchema,
});

export type ReferDto = z.infer<typeof ReferSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
