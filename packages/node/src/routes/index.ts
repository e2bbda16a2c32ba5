/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createPortfolioRoutes } from "./portfolios.js";
export { createPriceFeedRoutes } from "./price-feeds.js";
export { createStakingRoutes, createGovernanceTokenRoutes } from "./staking.js";
export { createFlashLoanRoutes } from "./flash-loans.js";
export { createProposalRoutes } from "./proposals.js";
export { createInsuranceRoutes } from "./insurance.js";
export { createReferralRoutes } from "./referrals.js";
export { createTokenRoutes } from "./tokens.js";
export { createEventRoutes } from "./events.js";
