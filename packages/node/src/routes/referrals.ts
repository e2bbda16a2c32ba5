/**
 * Referral routes.
 *
 * POST /api/v1/referrals           — Record the caller as referrer of a new user
 * GET  /api/v1/referrals/:account  — Who referred the account, and whom it referred
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ReferSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createReferralRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(ReferSchema), (c) => {
    const edge = c.get("service").refer(c.get("auth").account, c.get("validatedBody").newUser);
    return c.json({ data: edge }, 201);
  });

  routes.get("/:account", (c) => {
    const account = c.req.param("account");
    const { referrer, referrals } = c.get("service").referralsFor(account);
    return c.json({ data: { account, referrer, referrals } });
  });

  return routes;
}
