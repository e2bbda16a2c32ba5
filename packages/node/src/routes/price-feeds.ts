/**
 * Price feed routes.
 *
 * PUT /api/v1/price-feeds/:symbol  — Bind a symbol to an oracle feed (write-once)
 * GET /api/v1/price-feeds/:symbol  — Read the bound feed
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { PriceFeedSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createPriceFeedRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.put("/:symbol", validateBody(PriceFeedSchema), (c) => {
    const symbol = c.req.param("symbol");
    const { source } = c.get("validatedBody");
    c.get("service").setPriceFeedSource(c.get("auth").account, symbol, source);
    return c.json({ data: { symbol, source } }, 201);
  });

  routes.get("/:symbol", (c) => {
    const symbol = c.req.param("symbol");
    const source = c.get("service").priceFeedOf(symbol);
    return c.json({ data: { symbol, source } });
  });

  return routes;
}
