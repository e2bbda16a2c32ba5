/**
 * @keelson/node — package public API.
 *
 * main.ts boots the server; everything else is importable without
 * starting one.
 */

export { ProtocolService } from "./services/protocol-service.js";
export type {
  CustodyBalances,
  ProtocolServiceConfig,
  ProtocolServiceDeps,
} from "./services/protocol-service.js";
export {
  ConfigSchema,
  adminAccounts,
  loadConfig,
  parseApiKeys,
  parseOraclePrices,
  splitList,
} from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
