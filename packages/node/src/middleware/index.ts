/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, statusForCode } from "./error-handler.js";
export type { ErrorHandlerDeps } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export { validateBody, validateQuery } from "./validate.js";
export { authMiddleware, requireRole, API_KEY_HEADER } from "./auth.js";
export type { AuthConfig } from "./auth.js";
