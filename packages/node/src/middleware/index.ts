/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, PROTOCOL_STATUS_MAP } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export {
  authMiddleware,
  accountHeaderMiddleware,
  apiKeyMap,
  API_KEY_HEADER,
  ACCOUNT_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
