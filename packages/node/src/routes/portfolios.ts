/**
 * Portfolio routes.
 *
 * POST  /api/v1/portfolios                          — Initialize the caller's portfolio
 * PATCH /api/v1/portfolios/config                   — Fee rates, value band, risk score
 * POST  /api/v1/portfolios/assets                   — Add an asset position
 * POST  /api/v1/portfolios/assets/:symbol/refresh   — Revalue an asset from its price feed
 * POST  /api/v1/portfolios/withdrawals              — Withdraw part of an asset
 * POST  /api/v1/portfolios/emergency-withdrawals    — Withdraw every asset in full
 * POST  /api/v1/portfolios/rebalance                — Reassign asset values by ratio
 * POST  /api/v1/portfolios/fees                     — Deduct dynamic fees
 * POST  /api/v1/portfolios/valuations               — Record a valuation point
 * GET   /api/v1/portfolios/risk                     — Is the caller inside its value band?
 * GET   /api/v1/portfolios/:account                 — Read a portfolio
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddAssetSchema,
  ApplyFeesSchema,
  ConfigurePortfolioSchema,
  EmergencyWithdrawSchema,
  RebalanceSchema,
  WithdrawSchema,
} from "../types/dto.js";
import { feeView, portfolioView, withdrawalView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";

export function createPortfolioRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", (c) => {
    const portfolio = c.get("service").initializePortfolio(c.get("auth").account);
    return c.json({ data: portfolioView(portfolio) }, 201);
  });

  routes.patch("/config", validateBody(ConfigurePortfolioSchema), (c) => {
    const settings = c.get("validatedBody");
    const portfolio = c.get("service").configurePortfolio(c.get("auth").account, settings);
    return c.json({ data: portfolioView(portfolio) });
  });

  routes.post("/assets", validateBody(AddAssetSchema), (c) => {
    const body = c.get("validatedBody");
    const portfolio = c
      .get("service")
      .addAsset(c.get("auth").account, body.symbol, body.amount, body.value);
    return c.json({ data: portfolioView(portfolio) }, 201);
  });

  routes.post("/assets/:symbol/refresh", (c) => {
    const portfolio = c
      .get("service")
      .refreshAssetValue(c.get("auth").account, c.req.param("symbol"));
    return c.json({ data: portfolioView(portfolio) });
  });

  routes.post("/withdrawals", validateBody(WithdrawSchema), (c) => {
    const body = c.get("validatedBody");
    const caller = c.get("auth").account;
    const receipt = c
      .get("service")
      .withdraw(caller, body.token, body.to ?? caller, body.symbol, body.amount);
    return c.json({ data: withdrawalView(receipt) });
  });

  routes.post("/emergency-withdrawals", validateBody(EmergencyWithdrawSchema), (c) => {
    const body = c.get("validatedBody");
    const receipts = c.get("service").emergencyWithdrawAll(c.get("auth").account, body.tokens);
    return c.json({ data: receipts.map(withdrawalView) });
  });

  routes.post("/rebalance", validateBody(RebalanceSchema), (c) => {
    const body = c.get("validatedBody");
    const portfolio = c
      .get("service")
      .rebalance(c.get("auth").account, body.symbols, body.targetRatios);
    return c.json({ data: portfolioView(portfolio) });
  });

  routes.post("/fees", validateBody(ApplyFeesSchema), (c) => {
    const body = c.get("validatedBody");
    const fees = c.get("service").applyDynamicFees(c.get("auth").account, body.bonusThreshold);
    return c.json({ data: feeView(fees) });
  });

  routes.post("/valuations", (c) => {
    const portfolio = c.get("service").recordValuation(c.get("auth").account);
    return c.json({ data: portfolioView(portfolio) }, 201);
  });

  routes.get("/risk", (c) => {
    const withinBand = c.get("service").checkRisk(c.get("auth").account);
    return c.json({ data: { withinBand } });
  });

  routes.get("/:account", (c) => {
    const portfolio = c.get("service").portfolioOf(c.req.param("account"));
    return c.json({ data: portfolioView(portfolio) });
  });

  return routes;
}
