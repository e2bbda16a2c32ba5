/**
 * Insurance routes.
 *
 * POST /api/v1/insurance           — Buy (or replace) the caller's policy
 * POST /api/v1/insurance/claims    — Pay out the caller's active policy
 * GET  /api/v1/insurance/:account  — Read an account's policy
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { BuyInsuranceSchema } from "../types/dto.js";
import { policyView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";

export function createInsuranceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(BuyInsuranceSchema), (c) => {
    const caller = c.get("auth").account;
    const body = c.get("validatedBody");
    const policy = c.get("service").buyInsurance(caller, body.coverageAmount, body.premium);
    return c.json({ data: policyView(caller, policy) }, 201);
  });

  routes.post("/claims", (c) => {
    const caller = c.get("auth").account;
    const policy = c.get("service").claimInsurance(caller);
    return c.json({ data: policyView(caller, policy) });
  });

  routes.get("/:account", (c) => {
    const account = c.req.param("account");
    return c.json({ data: policyView(account, c.get("service").policyOf(account)) });
  });

  return routes;
}
