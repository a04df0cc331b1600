/**
 * Report Types
 *
 * Read models produced by the ledger and the debt book.
 * All amounts are decimal strings.
 */

import type { Currency, Debt, ReferenceCurrency } from "./financial.js";

// =============================================================================
// Ledger reports
// =============================================================================

/** A calendar month, UTC. */
export interface MonthlyPeriod {
  readonly kind: "monthly";
  readonly year: number;
  /** 1-12 */
  readonly month: number;
}

/** An inclusive range of calendar days, UTC. */
export interface DateRangePeriod {
  readonly kind: "range";
  /** YYYY-MM-DD, inclusive from 00:00 */
  readonly start: string;
  /** YYYY-MM-DD, inclusive through 23:59:59.999 */
  readonly end: string;
}

export type ReportPeriod = MonthlyPeriod | DateRangePeriod;

/** Total of one category within a report. */
export interface ReportLine {
  readonly categoryId: number | null;
  readonly name: string;
  readonly icon: string;
  /** Display currency, 2 digits */
  readonly amount: string;
}

export interface ReportTotals {
  readonly expenses: string;
  readonly income: string;
  /** income − expenses */
  readonly balance: string;
}

/**
 * Expense and income breakdown of one period.
 *
 * Amounts were summed in referenceCurrency (frozen at write time) and
 * converted once into displayCurrency with conversionRate.
 */
export interface Report {
  readonly period: ReportPeriod;
  readonly displayCurrency: Currency;
  readonly referenceCurrency: ReferenceCurrency;
  readonly conversionRate: string;
  /** Date of conversionRate; null when no conversion was needed */
  readonly conversionDate: string | null;
  readonly expenses: readonly ReportLine[];
  readonly income: readonly ReportLine[];
  readonly totals: ReportTotals;
}

// =============================================================================
// Debt read models
// =============================================================================

/** counterparty name → currency → amount (2 digits) */
export type CounterpartyTotals = Readonly<Record<string, Readonly<Record<Currency, string>>>>;

/**
 * Unsettled debts of one account, grouped by counterparty and by the
 * debts' own currencies. No conversion is applied.
 */
export interface DebtSummary {
  readonly displayCurrency: Currency;
  readonly owedToMe: CounterpartyTotals;
  readonly iOwe: CounterpartyTotals;
}

export type NetDirection = "A_OWES_B" | "B_OWES_A";

export interface NetBreakdownLine {
  readonly debtId: string;
  readonly direction: NetDirection;
  readonly amountMinor: number;
  readonly currency: Currency;
  /** Frozen amount in the base currency */
  readonly baseAmount: string;
}

/**
 * Bilateral position between two accounts.
 * netAmount > 0 means A owes B on balance.
 */
export interface NetCalculation {
  readonly accountA: number;
  readonly accountB: number;
  readonly baseCurrency: ReferenceCurrency;
  readonly debts: readonly Debt[];
  readonly breakdown: readonly NetBreakdownLine[];
  readonly totalAOwesB: string;
  readonly totalBOwesA: string;
  readonly netAmount: string;
}

export interface CancelMutualDebtsResult {
  readonly cancelledDebtIds: readonly string[];
  /** Residual obligation; absent when the position was balanced */
  readonly netDebt?: Debt | undefined;
  readonly calculation: NetCalculation;
}
