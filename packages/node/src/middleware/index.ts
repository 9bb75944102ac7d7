/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, handleNotFound } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody } from "./validate.js";
export type { ValidatedEnv } from "./validate.js";
