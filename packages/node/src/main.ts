/**
 * @keelson/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import {
  adminAccounts,
  loadConfig,
  parseApiKeys,
  parseOraclePrices,
  splitList,
} from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import { apiKeyMap } from "./middleware/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    authConfig = { apiKeys: apiKeyMap(parsedKeys) };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured — running in unsecured mode (X-Account-Id)");
  }

  const admins = adminAccounts(config);
  const assetTokens = splitList(config.ASSET_TOKENS);

  const { app, service } = createApp({
    serviceConfig: {
      custodyAccount: config.CUSTODY_ACCOUNT,
      admins,
      flashLoanFeeRate: BigInt(config.FLASH_LOAN_FEE_WAD),
      governanceSymbol: config.GOVERNANCE_SYMBOL,
      nativeSymbol: config.NATIVE_SYMBOL,
      assetTokens,
      custodyBalances: {
        governance: BigInt(config.CUSTODY_GOVERNANCE_BALANCE),
        native: BigInt(config.CUSTODY_NATIVE_BALANCE),
        asset: BigInt(config.CUSTODY_ASSET_BALANCE),
      },
      oraclePrices: parseOraclePrices(config.ORACLE_PRICES),
    },
    serviceDeps: { logger },
    logFn: (entry) => {
      const line = `${entry.method} ${entry.path} ${entry.status}`;
      if (entry.status >= 500) {
        logger.error(entry, line);
      } else {
        logger.info(entry, line);
      }
    },
    auth: authConfig,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      custody: config.CUSTODY_ACCOUNT,
      admins: admins.length,
      assetTokens: assetTokens.length,
    },
    "Keelson node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      service.stop();
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
