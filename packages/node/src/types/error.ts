/**
 * Error envelopes returned by the HTTP boundary.
 *
 * Shape: { error: { code, message, details? } }. `code` is what clients
 * branch on; `message` is user-facing text from userMessage().
 */

import type { FinanceError, FinanceErrorCode } from "@coinpurse/types";

/**
 * Codes a client can see. ACCESS_DENIED never leaves the server: it is
 * reported as NOT_FOUND.
 */
export type ApiErrorCode = Exclude<FinanceErrorCode, "ACCESS_DENIED"> | "INTERNAL_ERROR";

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

/** Public code of a core error. */
export function publicErrorCode(error: FinanceError): ApiErrorCode {
  return error.code === "ACCESS_DENIED" ? "NOT_FOUND" : error.code;
}

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined ? { error: { code, message } } : { error: { code, message, details } };
}
