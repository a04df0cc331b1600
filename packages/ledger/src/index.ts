/**
 * @coinpurse/ledger — Append-only multi-currency ledger.
 *
 * Enforces the ledger invariants:
 * - Transactions are immutable once written
 * - Corrections are new REVERSAL transactions, at most one per original
 * - Every record freezes its EUR and USD conversions at creation
 * - All monetary arithmetic uses bigint (no floating point)
 * - Reports sum frozen reference amounts and convert once
 */

// Core engine
export { Ledger, requirePositiveInteger } from "./ledger.js";

// Reports
export { buildReport, referenceCurrencyFor } from "./report.js";
export type { ReportInput } from "./report.js";
export { periodBounds, monthlyPeriod, dateRangePeriod, daysInMonth } from "./periods.js";

// Lookups
export {
  requireAccount,
  requireOwnedTransaction,
  requireOwnedCategory,
  requireCategory,
  normalizeNote,
  normalizeInstant,
} from "./access.js";

// Money arithmetic
export {
  parseAmount,
  formatAmount,
  rescale,
  roundDecimal,
  toMinorUnits,
  toPositiveMinorUnits,
  formatMinor,
  convertMinor,
  freezeAmount,
  referenceAmount,
  convertReference,
} from "./money-math.js";

// Types
export type { FinanceCoreOptions, CreateTransactionInput, PeriodBounds } from "./types.js";
export {
  DEFAULT_HISTORY_LIMIT,
  DEFAULT_RECENT_CURRENCIES,
  UNCATEGORIZED_NAME,
  UNCATEGORIZED_ICON,
} from "./types.js";
