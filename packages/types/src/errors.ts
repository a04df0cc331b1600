/**
 * Error taxonomy shared by every core package.
 *
 * Core operations throw FinanceError; they never return error codes and
 * never coerce a failure into a default value. The outer layer recovers
 * and turns the code into a message via userMessage().
 */

export type FinanceErrorCode =
  /** No exchange rate could be resolved for a currency pair */
  | "RATE_UNAVAILABLE"
  | "NOT_FOUND"
  /** The record exists but belongs to other accounts */
  | "ACCESS_DENIED"
  /** Structurally nonsensical request (reversing a reversal, self-debt) */
  | "INVALID_OPERATION"
  | "ALREADY_SETTLED"
  /** Malformed input */
  | "VALIDATION_ERROR"
  /** A concurrent write changed the records this operation read */
  | "CONFLICT";

export class FinanceError extends Error {
  public readonly code: FinanceErrorCode;

  constructor(code: FinanceErrorCode, message: string) {
    super(message);
    this.name = "FinanceError";
    this.code = code;
  }
}

export function isFinanceError(value: unknown): value is FinanceError {
  return value instanceof FinanceError;
}

/**
 * Text shown to the end user for a core failure.
 *
 * NOT_FOUND and ACCESS_DENIED read the same so a caller cannot probe for
 * other accounts' records.
 */
export function userMessage(error: FinanceError): string {
  switch (error.code) {
    case "RATE_UNAVAILABLE":
      return `Currency not supported: ${error.message}`;
    case "NOT_FOUND":
    case "ACCESS_DENIED":
      return "Not found or access denied";
    case "ALREADY_SETTLED":
      return "Debt is already settled";
    case "CONFLICT":
      return "The records changed while processing, please try again";
    case "INVALID_OPERATION":
    case "VALIDATION_ERROR":
      return error.message;
  }
}
