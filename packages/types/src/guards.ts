/**
 * Runtime Type Guards
 *
 * Narrowing functions for domain values arriving at system boundaries
 * (HTTP input, rows read back from storage, flow inputs).
 */

import { REFERENCE_CURRENCIES } from "./financial.js";
import type {
  Currency,
  FlowKind,
  FrozenAmount,
  ReferenceCurrency,
  TransactionKind,
} from "./financial.js";

const TRANSACTION_KINDS = new Set<string>(["EXPENSE", "INCOME", "REVERSAL", "SETTLEMENT"]);
const FLOW_KINDS = new Set<string>(["EXPENSE", "INCOME"]);
const REFERENCE_SET = new Set<string>(REFERENCE_CURRENCIES);

const CURRENCY_PATTERN = /^[A-Z]{3}$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/** Three upper-case letters. Callers upper-case user input first. */
export function isCurrencyCode(value: unknown): value is Currency {
  return typeof value === "string" && CURRENCY_PATTERN.test(value);
}

export function isReferenceCurrency(value: unknown): value is ReferenceCurrency {
  return typeof value === "string" && REFERENCE_SET.has(value);
}

export function isTransactionKind(value: unknown): value is TransactionKind {
  return typeof value === "string" && TRANSACTION_KINDS.has(value);
}

export function isFlowKind(value: unknown): value is FlowKind {
  return typeof value === "string" && FLOW_KINDS.has(value);
}

/** A real calendar day written as YYYY-MM-DD. */
export function isIsoDate(value: unknown): value is string {
  if (typeof value !== "string") return false;
  const match = ISO_DATE_PATTERN.exec(value);
  if (match === null) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export function isDecimalString(value: unknown): value is string {
  return typeof value === "string" && DECIMAL_PATTERN.test(value);
}

export function isFrozenAmount(value: unknown): value is FrozenAmount {
  if (value === null || typeof value !== "object") return false;
  if (
    !("amountMinor" in value) ||
    !("currency" in value) ||
    !("amountEur" in value) ||
    !("amountUsd" in value) ||
    !("fxRateToEur" in value) ||
    !("fxRateToUsd" in value)
  ) {
    return false;
  }
  return (
    typeof value.amountMinor === "number" &&
    Number.isSafeInteger(value.amountMinor) &&
    isCurrencyCode(value.currency) &&
    isDecimalString(value.amountEur) &&
    isDecimalString(value.amountUsd) &&
    isDecimalString(value.fxRateToEur) &&
    isDecimalString(value.fxRateToUsd)
  );
}
