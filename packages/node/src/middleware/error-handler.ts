/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope. FinanceError codes map to HTTP statuses; NOT_FOUND and
 * ACCESS_DENIED share one status and message so a caller cannot probe
 * for other accounts' records.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { isFinanceError, userMessage } from "@coinpurse/types";
import type { FinanceErrorCode } from "@coinpurse/types";
import { createErrorEnvelope, publicErrorCode } from "../types/error.js";
import { RequestValidationError } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 404 | 409 | 422;

const STATUS_MAP: Readonly<Record<FinanceErrorCode, ErrorStatus>> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  ACCESS_DENIED: 404,
  INVALID_OPERATION: 422,
  ALREADY_SETTLED: 409,
  CONFLICT: 409,
  RATE_UNAVAILABLE: 422,
};

/** Errors with no mapping, before the 500 goes out. */
export type UnexpectedErrorHook = (error: Error, c: Context) => void;

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the handler registered as Hono's onError.
 */
export function createErrorHandler(
  onUnexpected?: UnexpectedErrorHook,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    if (isFinanceError(err)) {
      return c.json(
        createErrorEnvelope(publicErrorCode(err), userMessage(err)),
        STATUS_MAP[err.code],
      );
    }

    if (err instanceof RequestValidationError) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", err.message, { issues: err.issues }),
        400,
      );
    }

    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    onUnexpected?.(err, c);
    // Don't leak internal details
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
