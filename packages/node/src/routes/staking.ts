/**
 * Staking routes.
 *
 * POST /api/v1/staking/stake     — Move governance tokens into custody stake
 * POST /api/v1/staking/unstake   — Return stake to the caller
 * POST /api/v1/staking/rewards   — Claim accrued period rewards
 * GET  /api/v1/staking           — Total staked
 * GET  /api/v1/staking/:account  — Stake and pending reward of an account
 *
 * POST /api/v1/governance-tokens — Issue governance tokens from custody (admins)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { IssueTokensSchema, StakeAmountSchema } from "../types/dto.js";
import { rewardView, stakeView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";

export function createStakingRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/stake", validateBody(StakeAmountSchema), (c) => {
    const caller = c.get("auth").account;
    const service = c.get("service");
    service.stake(caller, c.get("validatedBody").amount);
    const { stake, pendingReward } = service.stakeOf(caller);
    return c.json({ data: stakeView(caller, stake, pendingReward) });
  });

  routes.post("/unstake", validateBody(StakeAmountSchema), (c) => {
    const caller = c.get("auth").account;
    const service = c.get("service");
    service.unstake(caller, c.get("validatedBody").amount);
    const { stake, pendingReward } = service.stakeOf(caller);
    return c.json({ data: stakeView(caller, stake, pendingReward) });
  });

  routes.post("/rewards", (c) => {
    const claim = c.get("service").claimRewards(c.get("auth").account);
    return c.json({ data: rewardView(claim) });
  });

  routes.get("/", (c) => {
    return c.json({ data: { totalStaked: c.get("service").totalStaked().toString() } });
  });

  routes.get("/:account", (c) => {
    const account = c.req.param("account");
    const { stake, pendingReward } = c.get("service").stakeOf(account);
    return c.json({ data: stakeView(account, stake, pendingReward) });
  });

  return routes;
}

export function createGovernanceTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(IssueTokensSchema), (c) => {
    const body = c.get("validatedBody");
    c.get("service").issueGovernanceTokens(c.get("auth").account, body.to, body.amount);
    return c.json({ data: { to: body.to, amount: body.amount.toString() } }, 201);
  });

  return routes;
}
