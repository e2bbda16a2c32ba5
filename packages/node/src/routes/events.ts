/**
 * Audit trail routes.
 *
 * GET /api/v1/events            — Committed audit records (cursor pagination)
 * GET /api/v1/events/integrity  — Verify the hash chain
 * GET /api/v1/events/snapshot   — Serializable state of every subsystem
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");

    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const query = queryResult.data;
    const events = service.readAllEvents(
      query.afterPosition !== undefined
        ? { fromPosition: query.afterPosition + 1 }
        : undefined,
    );

    const result = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.globalPosition,
      "globalPosition",
    );

    return c.json(result);
  });

  routes.get("/integrity", (c) => {
    return c.json({ data: c.get("service").verifyIntegrity() });
  });

  routes.get("/snapshot", (c) => {
    return c.json({ data: c.get("service").snapshot() });
  });

  return routes;
}
