/**
 * Middleware barrel: re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, validateQuery } from "./validate.js";
export {
  authMiddleware,
  unsecuredAuthMiddleware,
  requirePermission,
  requireAccountAccess,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
