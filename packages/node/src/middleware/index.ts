/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, STATUS_OF_CATEGORY } from "./error-handler.js";
export type { ErrorStatus, FailureLogEntry } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry, RequestLogLevel } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export type { ValidatedEnv } from "./validate.js";
