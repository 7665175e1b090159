/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, pinoRequestLog } from "./logger.js";
export type { RequestLogEntry, RequestLogFn } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export {
  authMiddleware,
  anonymousAuthMiddleware,
  requirePermission,
  keyFingerprint,
  API_KEY_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
