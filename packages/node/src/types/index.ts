/**
 * Type barrel — re-exports all public types from @keelson/node.
 */

// DTOs
export {
  AmountSchema,
  AccountSchema,
  SymbolSchema,
  PaginationQuerySchema,
  ConfigurePortfolioSchema,
  AddAssetSchema,
  WithdrawSchema,
  EmergencyWithdrawSchema,
  RebalanceSchema,
  ApplyFeesSchema,
  PriceFeedSchema,
  StakeAmountSchema,
  IssueTokensSchema,
  ApproveSchema,
  TransferSchema,
  FlashLoanSchema,
  CreateProposalSchema,
  VoteSchema,
  ProposalIdSchema,
  ListProposalsQuerySchema,
  BuyInsuranceSchema,
  ReferSchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  ConfigurePortfolioDto,
  AddAssetDto,
  WithdrawDto,
  EmergencyWithdrawDto,
  RebalanceDto,
  ApplyFeesDto,
  PriceFeedDto,
  StakeAmountDto,
  IssueTokensDto,
  ApproveDto,
  TransferDto,
  FlashLoanDto,
  CreateProposalDto,
  VoteDto,
  ListProposalsQuery,
  BuyInsuranceDto,
  ReferDto,
  ListEventsQuery,
} from "./dto.js";

// Views
export {
  portfolioView,
  withdrawalView,
  feeView,
  stakeView,
  rewardView,
  flashLoanView,
  proposalView,
  policyView,
} from "./views.js";
export type { PortfolioView, StakeView, ProposalView } from "./views.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope, ErrorStatus } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export type { Role, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv, ValidatedEnv } from "./api-contract.js";
