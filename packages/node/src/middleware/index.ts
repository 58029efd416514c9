/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { readBody, readQuery } from "./validate.js";
export {
  authMiddleware,
  CALLER_HEADER,
  requirePermission,
  signJwt,
  unsecuredMiddleware,
  verifyJwt,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
