/**
 * Governance proposal routes.
 *
 * POST /api/v1/proposals            — Create a proposal
 * GET  /api/v1/proposals            — List proposals (cursor pagination by id)
 * GET  /api/v1/proposals/:id        — Read a proposal and its status
 * POST /api/v1/proposals/:id/votes  — Add votes to an open proposal
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateProposalSchema,
  ListProposalsQuerySchema,
  ProposalIdSchema,
  VoteSchema,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";
import { proposalView } from "../types/views.js";
import { formatZodErrors, validateBody } from "../middleware/validate.js";

export function createProposalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateProposalSchema), (c) => {
    const body = c.get("validatedBody");
    const service = c.get("service");
    const proposal = service.createProposal(
      c.get("auth").account,
      body.description,
      body.votingPeriod,
    );
    return c.json({ data: proposalView(proposal, service.proposal(proposal.id).status) }, 201);
  });

  routes.get("/", (c) => {
    const queryResult = ListProposalsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const result = paginate(
      c.get("service").proposals(),
      queryResult.data,
      (entry) => entry.proposal.id,
      "id",
    );

    return c.json({
      data: result.data.map((entry) => proposalView(entry.proposal, entry.status)),
      pagination: result.pagination,
    });
  });

  routes.get("/:id", (c) => {
    const id = ProposalIdSchema.safeParse(c.req.param("id"));
    if (!id.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid proposal id"), 400);
    }
    const { proposal, status } = c.get("service").proposal(id.data);
    return c.json({ data: proposalView(proposal, status) });
  });

  routes.post("/:id/votes", validateBody(VoteSchema), (c) => {
    const id = ProposalIdSchema.safeParse(c.req.param("id"));
    if (!id.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid proposal id"), 400);
    }
    const service = c.get("service");
    const proposal = service.vote(c.get("auth").account, id.data, c.get("validatedBody").votes);
    return c.json({ data: proposalView(proposal, service.proposal(proposal.id).status) });
  });

  return routes;
}
