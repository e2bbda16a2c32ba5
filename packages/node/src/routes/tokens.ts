/**
 * Host token ledger routes.
 *
 * The in-process ledgers stand in for external token contracts, so
 * holders need a way to move and approve their own balances.
 *
 * GET  /api/v1/tokens                          — Known token symbols
 * GET  /api/v1/tokens/:token/balances/:account — Balance of an account
 * POST /api/v1/tokens/:token/approvals         — Set the caller's allowance for a spender
 * POST /api/v1/tokens/:token/transfers         — Move the caller's tokens
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ApproveSchema, TransferSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").tokenSymbols() });
  });

  routes.get("/:token/balances/:account", (c) => {
    const token = c.req.param("token");
    const account = c.req.param("account");
    const balance = c.get("service").tokenBalance(token, account);
    return c.json({ data: { token, account, balance: balance.toString() } });
  });

  routes.post("/:token/approvals", validateBody(ApproveSchema), (c) => {
    const token = c.req.param("token");
    const body = c.get("validatedBody");
    const caller = c.get("auth").account;
    const service = c.get("service");
    service.approve(caller, token, body.spender, body.amount);
    const allowance = service.tokenAllowance(token, caller, body.spender);
    return c.json({
      data: { token, owner: caller, spender: body.spender, allowance: allowance.toString() },
    });
  });

  routes.post("/:token/transfers", validateBody(TransferSchema), (c) => {
    const token = c.req.param("token");
    const body = c.get("validatedBody");
    const caller = c.get("auth").account;
    c.get("service").transfer(caller, token, body.to, body.amount);
    return c.json({
      data: { token, from: caller, to: body.to, amount: body.amount.toString() },
    });
  });

  return routes;
}
