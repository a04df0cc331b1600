/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler } from "./error-handler.js";
export type { UnexpectedErrorHook } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { parseJsonBody, parseParams, parseQuery, RequestValidationError } from "./validate.js";
export type { ValidationIssue } from "./validate.js";
export { accountMiddleware, EXTERNAL_ID_HEADER, DISPLAY_NAME_HEADER } from "./account.js";
