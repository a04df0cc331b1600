/**
 * @coinpurse/types — Shared domain types for the finance core.
 *
 * These types are used across all packages:
 * - Accounts, transactions, debts, exchange rates, categories
 * - Report and debt read models
 * - The FinanceError taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Decimal values travel as strings
 */

// Financial types
export type {
  Currency,
  ReferenceCurrency,
  FrozenAmount,
  Account,
  TransactionKind,
  FlowKind,
  Transaction,
  Debt,
  FxRate,
  Category,
} from "./financial.js";
export {
  REFERENCE_CURRENCIES,
  RATE_DECIMALS,
  MINOR_DECIMALS,
  REFERENCE_DECIMALS,
} from "./financial.js";

// Read models
export type {
  MonthlyPeriod,
  DateRangePeriod,
  ReportPeriod,
  ReportLine,
  ReportTotals,
  Report,
  CounterpartyTotals,
  DebtSummary,
  NetDirection,
  NetBreakdownLine,
  NetCalculation,
  CancelMutualDebtsResult,
} from "./report.js";

// Errors
export type { FinanceErrorCode } from "./errors.js";
export { FinanceError, isFinanceError, userMessage } from "./errors.js";

// Guards
export {
  isCurrencyCode,
  isReferenceCurrency,
  isTransactionKind,
  isFlowKind,
  isIsoDate,
  isDecimalString,
  isFrozenAmount,
} from "./guards.js";
