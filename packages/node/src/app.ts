/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { ProtocolService } from "./services/protocol-service.js";
import type {
  ProtocolServiceConfig,
  ProtocolServiceDeps,
} from "./services/protocol-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { accountHeaderMiddleware, authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import {
  createEventRoutes,
  createFlashLoanRoutes,
  createGovernanceTokenRoutes,
  createHealthRoutes,
  createInsuranceRoutes,
  createPortfolioRoutes,
  createPriceFeedRoutes,
  createProposalRoutes,
  createReferralRoutes,
  createStakingRoutes,
  createTokenRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: ProtocolServiceConfig;
  /** Clock and logger handed to the service */
  readonly serviceDeps?: ProtocolServiceDeps;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Auth configuration. When provided, API keys are required. */
  readonly auth?: AuthConfig;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: ProtocolService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new ProtocolService(options.serviceConfig, options.serviceDeps);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): caller from X-Account-Id
    app.use("/api/*", accountHeaderMiddleware());
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // Mount v1 API routes
  app.route("/api/v1/portfolios", createPortfolioRoutes());
  app.route("/api/v1/price-feeds", createPriceFeedRoutes());
  app.route("/api/v1/staking", createStakingRoutes());
  app.route("/api/v1/governance-tokens", createGovernanceTokenRoutes());
  app.route("/api/v1/flash-loans", createFlashLoanRoutes());
  app.route("/api/v1/proposals", createProposalRoutes());
  app.route("/api/v1/insurance", createInsuranceRoutes());
  app.route("/api/v1/referrals", createReferralRoutes());
  app.route("/api/v1/tokens", createTokenRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
